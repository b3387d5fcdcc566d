/**
 * Loads every listener module in this directory. Each module registers itself
 * on a hook (e.g. `onMessageCreate`) when it is required.
 */
import { autoRequireDirectory } from "../autoRequireDirectory";

const loaded = autoRequireDirectory(__dirname, "listeners");
console.log(`[listeners] ${loaded} listeners registered`);
