/**
 * Bot entrypoint: validates the environment, makes sure the schema exists,
 * then starts the Seyfert client and uploads slash commands.
 */
import "module-alias/register";
import "dotenv/config";

import type { ParseClient, ParseMiddlewares } from "seyfert";
import { Client } from "seyfert";
import { getEnv } from "@/configuration";
import { disconnectDb, initSchema } from "@/db";
import { middlewares } from "./middlewares";

import "./events/handlers"; // Seyfert event handlers that re-emit to the hooks
import "./events/listeners"; // Listeners that subscribe to those hooks

const client = new Client<true>();

client.setServices({
  middlewares,
});

async function bootstrap(): Promise<void> {
  console.log("[bootstrap] Starting bot...");
  const env = getEnv();
  console.log(`[bootstrap] Persona "${env.BOT_PERSONA}", AI provider ${env.AI_PROVIDER}`);

  await initSchema();
  await client.start();
  await client.uploadCommands({ cachePath: "./commands.json" });
}

bootstrap().catch(async (error) => {
  console.error("[bootstrap] Failed to start bot:", error);
  process.exitCode = 1;
  await disconnectDb().catch((closeError) => {
    console.error("[bootstrap] Failed to close the database pool:", closeError);
  });
});

declare module "seyfert" {
  interface UsingClient extends ParseClient<Client<true>> {}
  interface RegisteredMiddlewares extends ParseMiddlewares<typeof middlewares> {}
}
