import { createEvent } from "seyfert";
import { emitMessageCreate } from "@/events/hooks/messageCreate";

/** Forwards Seyfert's `messageCreate` to the registered listeners. */
export default createEvent({
  data: { name: "messageCreate" },
  async run(message, client, shardId) {
    await emitMessageCreate(message, client, shardId);
  },
});
