import { Command, InvalidArgumentError } from "commander";
import { registerAskCommand } from "./ask-command.js";
import {
  CLI_DESCRIPTION,
  CLI_NAME,
  CLI_VERSION,
  type CLILogLevel,
  LOG_LEVELS,
  OPTION_DESCRIPTIONS,
  OPTION_FLAGS,
} from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { createDefaultEnvironment } from "./environment.js";
import { registerServeCommand } from "./serve-command.js";

const isLogLevel = (value: string): value is CLILogLevel =>
  LOG_LEVELS.some((level) => level === value);

/**
 * Parses and validates the log level option value.
 */
export function parseLogLevel(value: string): CLILogLevel {
  const normalized = value.toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new InvalidArgumentError(`Log level must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  return normalized;
}

/**
 * Global CLI options that apply to all commands.
 */
interface GlobalOptions {
  logLevel?: CLILogLevel;
}

/**
 * Creates the commander program with the `ask` and `serve` commands.
 */
export function createProgram(env: CLIEnvironment): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(CLI_VERSION)
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevel)
    .configureOutput({
      writeOut: (str) => env.stdout.write(str),
      writeErr: (str) => env.stderr.write(str),
    });

  registerAskCommand(program, env);
  registerServeCommand(program, env);

  return program;
}

/**
 * Main entry point: reads the global log level, builds the environment and
 * runs the selected command.
 */
export async function runCLI(overrides: Partial<CLIEnvironment> = {}): Promise<void> {
  const argv = overrides.argv ?? process.argv;

  // First pass: global options only, so loggers are created at the right level
  const preParser = new Command();
  preParser
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel)
    .allowUnknownOption()
    .allowExcessArguments()
    .helpOption(false)
    .exitOverride();
  preParser.parse(argv);

  // Invalid values are left for the full program to report
  const requested = preParser.opts<{ logLevel?: string }>().logLevel?.toLowerCase();
  const globalOpts: GlobalOptions = {
    logLevel: requested !== undefined && isLogLevel(requested) ? requested : undefined,
  };

  const env: CLIEnvironment = {
    ...createDefaultEnvironment({ logLevel: globalOpts.logLevel }),
    ...overrides,
    argv,
  };
  const program = createProgram(env);
  await program.parseAsync(env.argv);
}
