import type { CommandContext } from "seyfert";
import { Command, Declare } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";

@Declare({
  name: "ping",
  description: "Show the gateway latency to Discord",
})
export default class PingCommand extends Command {
  async run(ctx: CommandContext) {
    const latency = ctx.client.gateway.latency;

    await ctx.write({
      content: `Pong! Gateway latency is \`${latency}ms\`.`,
      flags: MessageFlags.Ephemeral,
    });
  }
}
