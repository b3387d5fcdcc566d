/**
 * `/scramble` namespace; `start` and `stop` live in this directory.
 */
import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "scramble",
  description: "Play the word scramble game in this channel",
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@AutoLoad()
export default class ScrambleParentCommand extends Command {}
