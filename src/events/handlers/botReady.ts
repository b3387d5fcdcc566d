import { createEvent } from "seyfert";
import { emitBotReady } from "@/events/hooks/botReady";

/** Forwards Seyfert's `botReady` to the registered listeners. */
export default createEvent({
  data: { name: "botReady", once: true },
  async run(user, client, shardId) {
    await emitBotReady(user, client, shardId);
  },
});
