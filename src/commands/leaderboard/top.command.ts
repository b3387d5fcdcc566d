import { Declare, Middlewares, SubCommand } from "seyfert";
import type { GuildCommandContext } from "seyfert";
import { DEFAULT_LEADERBOARD_SIZE, scoreRepo } from "@/db";
import { Guard } from "@/middlewares/guards/decorator";
import {
  EMPTY_LEADERBOARD_MESSAGE,
  LEADERBOARD_UNAVAILABLE_MESSAGE,
  buildLeaderboardEmbed,
} from "@/modules/leaderboard";

@Declare({
  name: "top",
  description: "Show the top players in this server",
})
@Guard({ guildOnly: true })
@Middlewares(["guard"])
export default class LeaderboardTopCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    await ctx.deferReply();

    const result = await scoreRepo.getLeaderboard(ctx.guildId, DEFAULT_LEADERBOARD_SIZE);
    if (result.isErr()) {
      await ctx.editOrReply({ content: LEADERBOARD_UNAVAILABLE_MESSAGE });
      return;
    }

    const rows = result.value;
    if (rows.length === 0) {
      await ctx.editOrReply({ content: EMPTY_LEADERBOARD_MESSAGE });
      return;
    }

    const guild = await ctx.guild();
    await ctx.editOrReply({ embeds: [buildLeaderboardEmbed(rows, guild.name)] });
  }
}
