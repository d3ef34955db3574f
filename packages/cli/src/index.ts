export type { AskOptions } from "./ask-command.js";
export { executeAsk, renderEvent } from "./ask-command.js";
export type { CLILogLevel } from "./constants.js";
export { CLI_NAME, LOG_LEVELS } from "./constants.js";
export type { CLIEnvironment, CLILoggerConfig, ServerHandle } from "./environment.js";
export { createDefaultEnvironment, createLoggerFactory } from "./environment.js";
export { createProgram, parseLogLevel, runCLI } from "./program.js";
export type { ServeOptions } from "./serve-command.js";
export { executeServe } from "./serve-command.js";
