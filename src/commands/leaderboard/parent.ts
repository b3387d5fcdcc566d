/**
 * `/leaderboard` namespace; `top` and `me` live in this directory.
 */
import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "leaderboard",
  description: "Server rankings for trivia and scramble",
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@AutoLoad()
export default class LeaderboardParentCommand extends Command {}
