import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import { describeError } from "parley";
import type { CLIEnvironment } from "./environment.js";

/**
 * Runs a command action, printing failures to stderr and setting exit code 1.
 */
export async function executeAction(
  action: () => Promise<void>,
  env: CLIEnvironment,
): Promise<void> {
  try {
    await action();
  } catch (error) {
    env.stderr.write(`${chalk.red.bold("Error:")} ${describeError(error)}\n`);
    env.setExitCode(1);
  }
}

/**
 * Commander argument parser for TCP ports.
 */
export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError("Port must be an integer between 1 and 65535.");
  }
  return port;
}

/**
 * First line of a message, shortened to fit a conversation title.
 */
export function titleFrom(message: string, maxLength = 60): string {
  const firstLine = message.trim().split("\n")[0] ?? "";
  if (firstLine.length <= maxLength) {
    return firstLine;
  }
  return `${firstLine.slice(0, maxLength - 3)}...`;
}
