import { Declare, Middlewares, SubCommand } from "seyfert";
import type { GuildCommandContext } from "seyfert";
import { scoreRepo } from "@/db";
import { Guard } from "@/middlewares/guards/decorator";
import {
  LEADERBOARD_UNAVAILABLE_MESSAGE,
  UNRANKED_MESSAGE,
  buildRankEmbed,
} from "@/modules/leaderboard";
import { resolveDisplayName } from "@/utils/displayName";

@Declare({
  name: "me",
  description: "Show your rank and score in this server",
})
@Guard({ guildOnly: true })
@Middlewares(["guard"])
export default class LeaderboardMeCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    await ctx.deferReply(true);

    const result = await scoreRepo.getUserRank(ctx.guildId, ctx.author.id);
    if (result.isErr()) {
      await ctx.editOrReply({ content: LEADERBOARD_UNAVAILABLE_MESSAGE });
      return;
    }

    const rank = result.value;
    if (!rank) {
      await ctx.editOrReply({ content: UNRANKED_MESSAGE });
      return;
    }

    const guild = await ctx.guild();
    const displayName = resolveDisplayName(ctx.author, ctx.member);
    await ctx.editOrReply({ embeds: [buildRankEmbed(displayName, rank, guild.name)] });
  }
}
