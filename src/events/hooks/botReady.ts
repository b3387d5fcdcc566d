/**
 * Hook for Seyfert's `botReady`: start-up listeners subscribe here.
 */
import type { ResolveEventParams } from "seyfert";
import { createEventHook } from "@/events/hooks/createEventHook";

export type BotReadyArgs = ResolveEventParams<"botReady">;

export const [onBotReady, , , emitBotReady] = createEventHook<BotReadyArgs>("botReady").make();
