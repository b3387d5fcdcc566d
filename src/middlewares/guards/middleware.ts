/**
 * Purpose: Enforce guard metadata before a command runs.
 * Context: Registered as the "guard" middleware; commands opt in with
 * `@Middlewares(["guard"])`.
 * Gotchas:
 * - stop() triggers onMiddlewaresError; the denial reply is sent here, so
 *   commands must not reply again from that hook.
 */
import { createMiddleware } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { withSnark } from "@/modules/commentary";
import { getGuardMetadata } from "./decorator";

export const GUILD_ONLY_MESSAGE = "This command can only be used in a server.";

export const guardMiddleware = createMiddleware<void>(async ({ context, next, stop }) => {
  const metadata = getGuardMetadata("command" in context ? context.command : null);

  // No metadata means the command opted out of guard checks.
  if (!metadata) return next();

  if (metadata.guildOnly && !context.guildId) {
    await context.write({
      content: withSnark(GUILD_ONLY_MESSAGE, "guild_only"),
      flags: MessageFlags.Ephemeral,
    });
    return stop("No guild context");
  }

  return next();
});
