/**
 * Loads the Seyfert event modules in this directory. Each file default-exports
 * the result of `createEvent(...)` and re-emits the event on its hook.
 */
import { autoRequireDirectory } from "../autoRequireDirectory";

const loaded = autoRequireDirectory(__dirname, "events");
console.log(`[events] ${loaded} event handlers loaded`);
