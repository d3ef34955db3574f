export const CLI_NAME = "parley";
export const CLI_DESCRIPTION = "Chat with a tool-using research agent from the terminal or over HTTP.";
export const CLI_VERSION = "0.1.0";

export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;
export type CLILogLevel = (typeof LOG_LEVELS)[number];

/** Owner of the conversation `ask` creates in its throwaway store */
export const LOCAL_USER_ID = "local";

export const OPTION_FLAGS = {
  logLevel: "--log-level <level>",
  port: "-p, --port <port>",
  host: "--host <host>",
  title: "-t, --title <title>",
  quiet: "-q, --quiet",
} as const;

export const OPTION_DESCRIPTIONS = {
  logLevel: "Log level: silly, trace, debug, info, warn, error, fatal.",
  port: "Port to listen on (overrides PORT).",
  host: "Interface to bind (overrides HOST).",
  title: "Title of the conversation the turn is recorded under.",
  quiet: "Hide tool activity on stderr.",
} as const;

export const SUMMARY_PREFIX = "[parley]";
