/**
 * Replies in character when the bot is mentioned outside of an open round.
 */
import { onMessageCreate } from "@/events/hooks/messageCreate";
import { getCommentary } from "@/modules/commentary";
import { getGameEngine } from "@/modules/games";
import { stripUserMentions } from "@/utils/mentions";

onMessageCreate(async (message, client) => {
  if (message.author.bot) return;

  // While a round is open, messages are answers.
  if (getGameEngine().registry.activeRound(message.channelId)) return;

  const mentioned = message.mentions.users.some((user) => user.id === client.applicationId);
  if (!mentioned) return;

  const reply = await getCommentary().mentionReply(stripUserMentions(message.content));
  await message.reply({ content: reply, allowed_mentions: { parse: [] } });
});
