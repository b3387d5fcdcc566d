/**
 * Middlewares registered with the Seyfert client. Keys are the names used in
 * `@Middlewares([...])`.
 */
import { guardMiddleware } from "./guards/middleware";

export const middlewares = {
  guard: guardMiddleware,
};
