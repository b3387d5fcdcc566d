import { Declare, Middlewares, Options, SubCommand, createIntegerOption } from "seyfert";
import type { GuildCommandContext } from "seyfert";
import { startGameFromCommand } from "@/adapters/seyfert";
import { Guard } from "@/middlewares/guards/decorator";
import { MAX_ROUNDS, MIN_ROUNDS } from "@/modules/games";

const options = {
  rounds: createIntegerOption({
    description: "Number of words (5-100)",
    required: true,
    min_value: MIN_ROUNDS,
    max_value: MAX_ROUNDS,
  }),
};

@Declare({
  name: "start",
  description: "Start a multi-round word scramble game in this channel",
})
@Options(options)
@Guard({ guildOnly: true })
@Middlewares(["guard"])
export default class ScrambleStartCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await startGameFromCommand(ctx, "scramble", ctx.options.rounds);
  }
}
