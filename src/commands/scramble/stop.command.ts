import { Declare, Middlewares, SubCommand } from "seyfert";
import type { GuildCommandContext } from "seyfert";
import { stopGameFromCommand } from "@/adapters/seyfert";
import { Guard } from "@/middlewares/guards/decorator";

@Declare({
  name: "stop",
  description: "Force-stop the scramble game in this channel",
})
@Guard({ guildOnly: true })
@Middlewares(["guard"])
export default class ScrambleStopCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    await stopGameFromCommand(ctx, "scramble");
  }
}
