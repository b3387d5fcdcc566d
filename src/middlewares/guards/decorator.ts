/**
 * Purpose: Attach guard metadata to command classes.
 * Context: Read by the guard middleware before command execution.
 * Invariants:
 * - Metadata is keyed by the command class, so every instance shares it.
 * Gotchas:
 * - `@Middlewares(["guard"])` must also be present or the metadata is never read.
 */

export interface GuardMetadata {
  /** true when the command must run inside a guild. */
  guildOnly?: boolean;
}

const guardMetadata = new WeakMap<object, GuardMetadata>();

/** Decorator that attaches guard configuration to a command class. */
export function Guard(metadata: GuardMetadata): ClassDecorator {
  return (target) => {
    guardMetadata.set(target, metadata);
  };
}

/** Guard metadata of a command instance, or null when not configured. */
export function getGuardMetadata(command: unknown): GuardMetadata | null {
  if (typeof command !== "object" || command === null) return null;
  return guardMetadata.get(command.constructor) ?? null;
}
