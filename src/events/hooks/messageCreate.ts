/**
 * Hook for Seyfert's `messageCreate`: game answers and mention replies
 * subscribe here.
 */
import type { ResolveEventParams } from "seyfert";
import { createEventHook } from "@/events/hooks/createEventHook";

export type MessageCreateArgs = ResolveEventParams<"messageCreate">;

export const [onMessageCreate, , , emitMessageCreate] = createEventHook<MessageCreateArgs>("messageCreate").make();
