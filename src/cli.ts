import { parseArgs } from "node:util";
import type { SimulationConfig } from "./core/config";
import { isSimulatorError } from "./core/errors";
import { isLogLevel, logger, setLogLevel } from "./core/logger";
import { assertSchedulable } from "./engine/pageTable";
import { createSimulation, runToCompletion } from "./engine/simulation";
import { loadWorkload } from "./io/parser";
import { TraceWriter } from "./report/trace";

export const USAGE =
  "Usage: pagesim <input-file> [--memory KB] [--page-size KB] [--max-ticks N] [--log-level LEVEL] [--strict]";

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_TICK_LIMIT = 2;

export type CliIO = {
  out: (line: string) => void;
};

const defaultIO: CliIO = {
  out: (line) => console.log(line),
};

type CliArgs = {
  inputFile: string;
  overrides: Partial<SimulationConfig>;
  // reject processes that can never fit before the first tick
  strict: boolean;
};

const OPTIONS = {
  memory: { type: "string" },
  "page-size": { type: "string" },
  "max-ticks": { type: "string" },
  "log-level": { type: "string" },
  strict: { type: "boolean" },
} as const;

const NUMERIC_OPTIONS = [
  ["memory", "totalMemory"],
  ["page-size", "pageSize"],
  ["max-ticks", "maxTicks"],
] as const;

function readArgv(argv: string[]) {
  return parseArgs({ args: argv, allowPositionals: true, options: OPTIONS });
}

// Returns the parsed arguments, or a message describing the usage error.
function parseCliArgs(argv: string[]): CliArgs | string {
  let parsed: ReturnType<typeof readArgv>;
  try {
    parsed = readArgv(argv);
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }

  const { values, positionals } = parsed;

  if (positionals.length !== 1) {
    return "expected exactly one input file";
  }

  const level = values["log-level"];
  if (level !== undefined) {
    if (!isLogLevel(level)) return `unknown log level "${level}"`;
    setLogLevel(level);
  }

  const overrides: Partial<SimulationConfig> = {};
  for (const [option, key] of NUMERIC_OPTIONS) {
    const raw = values[option];
    if (raw === undefined) continue;
    if (!/^\d+$/.test(raw)) {
      return `--${option} expects a decimal integer, got "${raw}"`;
    }
    overrides[key] = Number.parseInt(raw, 10);
  }

  return { inputFile: positionals[0], overrides, strict: values.strict === true };
}

export async function main(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const args = parseCliArgs(argv);
  if (typeof args === "string") {
    logger.error(args);
    logger.error(USAGE);
    return EXIT_ERROR;
  }

  try {
    const processes = await loadWorkload(args.inputFile);
    const trace = new TraceWriter(io.out);

    const state = createSimulation(processes, args.overrides);
    if (args.strict) assertSchedulable(state.pageTable, state.processes);

    const { summary } = runToCompletion(state, {
      onEvent: (event) => trace.event(event),
    });
    trace.summary(summary);

    return summary.terminationReason === "tick-limit" ? EXIT_TICK_LIMIT : EXIT_OK;
  } catch (err) {
    if (isSimulatorError(err)) {
      logger.error(`${err.name}: ${err.message}`);
      return EXIT_ERROR;
    }
    throw err;
  }
}
