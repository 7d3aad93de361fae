/**
 * Cave grid explorer
 *
 * Usage:
 *   npm start -- [options]     (see --help)
 */

import { CaveError, freshSeed, validateConfig } from "@cavern/contracts";
import { Simulation } from "@cavern/engine";
import { TerminalApp } from "./app";
import { HELP, parseArgs } from "./cli";
import { asciiWorld } from "./print";

async function main(argv: readonly string[]): Promise<void> {
  const options = parseArgs(argv).getOrThrow();

  if (options.help) {
    process.stdout.write(HELP);
    return;
  }

  const config = validateConfig({
    ...options.config,
    seed: options.seed ?? freshSeed(),
  }).getOrThrow();

  if (options.ascii) {
    process.stdout.write(asciiWorld(config));
    return;
  }

  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    throw CaveError.terminalUnavailable(
      "Interactive mode needs a terminal; use --ascii to print a map",
    );
  }

  const color = options.color && process.env.NO_COLOR === undefined;
  const app = new TerminalApp(new Simulation(config, Date.now()), {
    input: process.stdin,
    output: process.stdout,
    color,
  });

  process.once("SIGTERM", () => app.stop());
  await app.run();
}

main(process.argv.slice(2)).catch((error: unknown) => {
  if (CaveError.isCaveError(error)) {
    console.error(`${error.code}: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
