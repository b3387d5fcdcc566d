/**
 * Feeds chat messages to the game engine while a round is open in the channel.
 */
import { createDiscordGameChannel } from "@/adapters/seyfert";
import { onMessageCreate } from "@/events/hooks/messageCreate";
import { getGameEngine } from "@/modules/games";
import { resolveDisplayName } from "@/utils/displayName";

onMessageCreate((message, client) => {
  if (message.author.bot || !message.guildId) return;

  const engine = getGameEngine();
  if (!engine.registry.activeRound(message.channelId)) return;

  engine.submitAnswer(createDiscordGameChannel(client, message.channelId, message.guildId), {
    userId: message.author.id,
    displayName: resolveDisplayName(message.author, message.member),
    messageId: message.id,
    content: message.content,
  });
});
