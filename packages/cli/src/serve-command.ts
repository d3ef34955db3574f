import chalk from "chalk";
import type { Command } from "commander";
import { describeError } from "parley";
import { OPTION_DESCRIPTIONS, OPTION_FLAGS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { executeAction, parsePort } from "./utils.js";

export interface ServeOptions {
  port?: number;
  host?: string;
}

export async function executeServe(options: ServeOptions, env: CLIEnvironment): Promise<void> {
  const logger = env.createLogger("parley");
  const running = await env.startServer({
    env: env.env,
    host: options.host,
    port: options.port,
    logger,
    ...env.engineOverrides,
  });
  env.stdout.write(`${chalk.green("Listening on")} ${running.url}\n`);

  env.onShutdown((signal) => {
    logger.info("Shutting down", { signal });
    running.close().catch((error: unknown) => {
      env.stderr.write(`${chalk.red.bold("Error:")} ${describeError(error)}\n`);
      env.setExitCode(1);
    });
  });
}

export function registerServeCommand(program: Command, env: CLIEnvironment): void {
  program
    .command("serve")
    .description("Start the HTTP API.")
    .option(OPTION_FLAGS.port, OPTION_DESCRIPTIONS.port, parsePort)
    .option(OPTION_FLAGS.host, OPTION_DESCRIPTIONS.host)
    .action((options: ServeOptions) => executeAction(() => executeServe(options, env), env));
}
