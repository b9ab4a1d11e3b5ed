import { Command, Option } from "clipanion";
import { createRequire } from "node:module";
const require = createRequire(import.meta.url);
const pkg = require("../../../package.json") as { version: string };
import { startGateway } from "../../gateway/lifecycle.js";
import { errorMessage } from "../../utils/errors.js";
import { printBanner } from "../banner.js";

export class GatewayRunCommand extends Command {
  static override paths = [["gateway", "run"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the twin gateway",
    examples: [
      ["Start with default config", "twin gateway run"],
      ["Start with custom config", "twin gateway run --config ./my-config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number> {
    printBanner(pkg.version);

    try {
      const ctx = await startGateway(this.config);
      // Runs until SIGINT/SIGTERM triggers shutdown and aborts the controller
      await new Promise<void>((resolve) => {
        ctx.abortController.signal.addEventListener("abort", () => resolve(), { once: true });
      });
      return 0;
    } catch (err) {
      this.context.stderr.write(`Failed to start gateway: ${errorMessage(err)}\n`);
      return 1;
    }
  }
}
