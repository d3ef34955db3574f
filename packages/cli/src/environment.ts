import type { RunningServer, StartServerOptions } from "@parley/server";
import { startServer } from "@parley/server";
import type { EngineOverrides, Env, LoggerOptions } from "parley";
import { createLogger } from "parley";
import type { ILogObj, Logger } from "tslog";

/**
 * Logger configuration for CLI commands.
 */
export interface CLILoggerConfig {
  logLevel?: string;
}

/** The part of a running server the CLI needs */
export type ServerHandle = Pick<RunningServer, "url" | "close">;

/**
 * Environment abstraction for CLI dependencies and I/O.
 * Allows dependency injection for testing.
 */
export interface CLIEnvironment {
  argv: string[];
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  /** Variables the engine and server configuration are read from */
  env: Env;
  setExitCode: (code: number) => void;
  loggerConfig?: CLILoggerConfig;
  createLogger: (name: string) => Logger<ILogObj>;
  /** Completion client and tools handed to the engine instead of the configured ones */
  engineOverrides?: Pick<EngineOverrides, "completionClient" | "tools">;
  startServer: (options: StartServerOptions) => Promise<ServerHandle>;
  /** Registers a handler for SIGINT and SIGTERM */
  onShutdown: (handler: (signal: NodeJS.Signals) => void) => void;
}

const LOG_LEVEL_MAP: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

/**
 * Creates a logger factory based on CLI configuration.
 * Priority: CLI options > PARLEY_LOG_LEVEL > defaults
 */
export function createLoggerFactory(config?: CLILoggerConfig): (name: string) => Logger<ILogObj> {
  return (name: string) => {
    const options: LoggerOptions = { name };

    if (config?.logLevel) {
      const level = config.logLevel.toLowerCase();
      if (level in LOG_LEVEL_MAP) {
        options.minLevel = LOG_LEVEL_MAP[level];
      }
    }

    return createLogger(options);
  };
}

/**
 * Creates the default CLI environment using Node.js process globals.
 */
export function createDefaultEnvironment(loggerConfig?: CLILoggerConfig): CLIEnvironment {
  return {
    argv: process.argv,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    setExitCode: (code: number) => {
      process.exitCode = code;
    },
    loggerConfig,
    createLogger: createLoggerFactory(loggerConfig),
    startServer,
    onShutdown: (handler) => {
      process.once("SIGINT", handler);
      process.once("SIGTERM", handler);
    },
  };
}
