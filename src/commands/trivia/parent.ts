/**
 * `/trivia` namespace; `start` and `stop` live in this directory.
 */
import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "trivia",
  description: "Play multi-round trivia in this channel",
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@AutoLoad()
export default class TriviaParentCommand extends Command {}
