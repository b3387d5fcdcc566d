import { onBotReady } from "@/events/hooks/botReady";

onBotReady((user, client) => {
  client.logger.info(`${user.username} is online`);
});
