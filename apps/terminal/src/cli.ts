/**
 * Command line parsing
 *
 * Usage:
 *   cavern [options]
 *
 * Flags only collect raw values; ranges are checked when the result is
 * validated as a simulation config.
 */

import {
  CaveError,
  Err,
  Ok,
  parseSeed,
  type Result,
  SIMULATION_MODES,
  type Seed,
  type SimulationConfigInput,
  type SimulationModeName,
} from "@cavern/contracts";
import { modeForSlot } from "@cavern/engine";

export interface CliOptions {
  /** Config fields given on the command line, minus the seed */
  config: SimulationConfigInput;
  /** Undefined when no seed was given */
  seed: Seed | undefined;
  ascii: boolean;
  color: boolean;
  help: boolean;
}

export const HELP = `Cave grid explorer

Usage:
  cavern [options]

Options:
  --width, -w <n>        World width in cells (default: 160)
  --height, -h <n>       World height in cells (default: 90)
  --seed, -s <n>         Seed, decimal or 0x hex (default: random)
  --fill, -f <p>         Wall probability for random fill (default: 0.45)
  --ratio, -r <p>        Share of cells a drunk walk opens (default: 0.4)
  --tick, -t <ms>        Milliseconds between steps while running (default: 50)
  --mode, -m <mode>      Starting mode: paint, life, drunk-walk or 1-3
  --max-walk-steps <n>   Step budget for one drunk walk
  --ascii, -a            Regenerate once, print the world and exit
  --no-color             Disable ANSI colors (also NO_COLOR)
  --help                 Show this help

Examples:
  cavern --seed 12345
  cavern --mode drunk-walk --width 80 --height 40
  cavern --ascii --width 40 --height 20 --seed 0x2a
`;

function missingValue(flag: string): CaveError {
  return CaveError.configInvalid(`Missing value for ${flag}`, { flag });
}

function parseNumber(flag: string, text: string): Result<number, CaveError> {
  const value = Number(text);
  if (text.trim() === "" || !Number.isFinite(value)) {
    return Err(
      CaveError.configInvalid(`${flag} expects a number, got "${text}"`, {
        flag,
        input: text,
      }),
    );
  }
  return Ok(value);
}

function parseMode(text: string): Result<SimulationModeName, CaveError> {
  const byName = SIMULATION_MODES.find((mode) => mode === text);
  const bySlot = /^\d$/.test(text) ? modeForSlot(Number(text)) : undefined;
  const mode = byName ?? bySlot;
  if (mode === undefined) {
    return Err(
      CaveError.configInvalid(
        `Unknown mode "${text}"; expected ${SIMULATION_MODES.join(", ")} or 1-3`,
        { input: text },
      ),
    );
  }
  return Ok(mode);
}

type NumericField = Exclude<
  keyof SimulationConfigInput,
  "seed" | "initialMode"
>;

const NUMERIC_FLAGS: Readonly<Record<string, NumericField>> = {
  "--width": "worldWidth",
  "-w": "worldWidth",
  "--height": "worldHeight",
  "-h": "worldHeight",
  "--fill": "fillProbability",
  "-f": "fillProbability",
  "--ratio": "walkRatio",
  "-r": "walkRatio",
  "--tick": "tickIntervalMs",
  "-t": "tickIntervalMs",
  "--max-walk-steps": "maxWalkSteps",
};

export function parseArgs(
  args: readonly string[],
): Result<CliOptions, CaveError> {
  const options: CliOptions = {
    config: {},
    seed: undefined,
    ascii: false,
    color: true,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    const next = args[i + 1];

    const field = NUMERIC_FLAGS[arg];
    if (field !== undefined) {
      if (next === undefined) return Err(missingValue(arg));
      const parsed = parseNumber(arg, next);
      if (parsed.isErr()) return Err(parsed.error);
      options.config[field] = parsed.value;
      i++;
      continue;
    }

    switch (arg) {
      case "--seed":
      case "-s": {
        if (next === undefined) return Err(missingValue(arg));
        const seed = parseSeed(next);
        if (seed.isErr()) return Err(seed.error);
        options.seed = seed.value;
        i++;
        break;
      }
      case "--mode":
      case "-m": {
        if (next === undefined) return Err(missingValue(arg));
        const mode = parseMode(next);
        if (mode.isErr()) return Err(mode.error);
        options.config.initialMode = mode.value;
        i++;
        break;
      }
      case "--ascii":
      case "-a":
        options.ascii = true;
        break;
      case "--no-color":
        options.color = false;
        break;
      case "--help":
        options.help = true;
        break;
      default:
        return Err(
          CaveError.configInvalid(`Unknown option: ${arg}`, { flag: arg }),
        );
    }
  }

  return Ok(options);
}
