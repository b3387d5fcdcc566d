/**
 * Seyfert adapter layer.
 *
 * Purpose: connect the platform-neutral game engine to Discord through
 * Seyfert, and share the start/stop flow between the game subcommands.
 */
import type { GuildCommandContext, UsingClient } from "seyfert";
import { AllowedMentionsTypes, MessageFlags } from "seyfert/lib/types";
import { withSnark, type SnarkCategory } from "@/modules/commentary";
import {
  gameStartMessage,
  gameStoppedMessage,
  getGameEngine,
  type GameChannel,
  type GameEngine,
  type GameMode,
  type GameStartErrorCode,
  type GameState,
} from "@/modules/games";

const START_REFUSAL_SNARK: Record<GameStartErrorCode, SnarkCategory> = {
  ROUNDS_OUT_OF_RANGE: "rounds_out_of_range",
  GAME_ALREADY_RUNNING: "game_already_running",
};

/** Game channel that posts through the REST client. Only user mentions ping. */
export function createDiscordGameChannel(
  client: UsingClient,
  channelId: string,
  guildId: string,
): GameChannel {
  return {
    id: channelId,
    guildId,
    async send(content) {
      await client.messages.write(channelId, {
        content,
        allowed_mentions: { parse: [AllowedMentionsTypes.User] },
      });
    },
  };
}

/** What the start/stop flow needs from a guild command context. */
export type GameCommandContext = Pick<GuildCommandContext, "client" | "channelId" | "guildId" | "write">;

/** Refusals are only shown to the user who ran the command. */
async function refuse(ctx: GameCommandContext, message: string, category: SnarkCategory) {
  await ctx.write({
    content: withSnark(message, category),
    flags: MessageFlags.Ephemeral,
  });
}

export async function startGameFromCommand(
  ctx: GameCommandContext,
  mode: GameMode,
  rounds: number,
): Promise<void> {
  const engine = getGameEngine();
  const channel = createDiscordGameChannel(ctx.client, ctx.channelId, ctx.guildId);

  const started = engine.start({ channel, mode, rounds });
  if (started.isErr()) {
    await refuse(ctx, started.error.message, START_REFUSAL_SNARK[started.error.code]);
    return;
  }

  await announceAndRun(engine, channel, started.value, async () => {
    await ctx.write({ content: gameStartMessage(mode, rounds) });
  });
}

/**
 * Posts the start message, then asks the first round in the background.
 * When the announcement fails the game is cancelled and the channel freed.
 */
export async function announceAndRun(
  engine: GameEngine,
  channel: GameChannel,
  state: GameState,
  announce: () => Promise<void>,
): Promise<void> {
  try {
    await announce();
  } catch (error) {
    engine.cancel(state);
    throw error;
  }

  engine.run(channel, state).catch((error) => {
    console.error(`[games] ${state.mode} game in channel ${channel.id} failed to start:`, error);
  });
}

export async function stopGameFromCommand(ctx: GameCommandContext, mode: GameMode): Promise<void> {
  const engine = getGameEngine();

  const stopped = engine.stop(ctx.channelId, mode);
  if (stopped.isErr()) {
    await refuse(ctx, stopped.error.message, "nothing_to_stop");
    return;
  }

  await ctx.write({ content: gameStoppedMessage(mode) });

  const channel = createDiscordGameChannel(ctx.client, ctx.channelId, ctx.guildId);
  await engine.finish(channel, stopped.value);
}
