import chalk from "chalk";
import type { Command } from "commander";
import {
  type AgentEvent,
  createEngine,
  InMemoryConversationStore,
  loadEngineConfig,
} from "parley";
import { LOCAL_USER_ID, OPTION_DESCRIPTIONS, OPTION_FLAGS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { executeAction, titleFrom } from "./utils.js";

export interface AskOptions {
  title?: string;
  quiet?: boolean;
}

/**
 * Writes one agent event to the terminal: answer tokens to stdout, tool
 * activity and failures to stderr.
 */
export function renderEvent(event: AgentEvent, env: CLIEnvironment, quiet = false): void {
  switch (event.type) {
    case "token":
      env.stdout.write(event.data.token);
      return;
    case "tool_activity": {
      if (quiet) return;
      const { tool, status, message, error } = event.data;
      if (status === "started") {
        env.stderr.write(`${chalk.cyan("→")} ${message ?? tool}\n`);
      } else if (error) {
        env.stderr.write(`${chalk.yellow("✗")} ${tool}: ${error}\n`);
      } else {
        env.stderr.write(`${chalk.green("✓")} ${tool}\n`);
      }
      return;
    }
    case "done":
      env.stdout.write("\n");
      return;
    case "error":
      env.stderr.write(`${chalk.red.bold("Error:")} ${event.data.error}\n`);
      env.setExitCode(1);
      return;
    default:
      // loading, responding, streaming
      return;
  }
}

/**
 * Runs one turn against the configured backends. The conversation lives in an
 * in-memory store and is gone when the process exits.
 */
export async function executeAsk(
  message: string,
  options: AskOptions,
  env: CLIEnvironment,
): Promise<void> {
  const logger = env.createLogger("parley:ask");
  const config = loadEngineConfig(env.env);
  const store = new InMemoryConversationStore();
  const { agent, trends } = createEngine(config, {
    store,
    logger,
    ...env.engineOverrides,
  });

  const conversation = await store.createConversation(
    LOCAL_USER_ID,
    options.title ?? titleFrom(message),
  );
  await store.saveMessage(conversation.id, LOCAL_USER_ID, "user", message);

  try {
    for await (const event of agent.process(message, conversation.id, LOCAL_USER_ID)) {
      renderEvent(event, env, options.quiet);
    }
  } finally {
    await trends?.close();
  }
}

export function registerAskCommand(program: Command, env: CLIEnvironment): void {
  program
    .command("ask")
    .description("Ask the agent one question and stream the answer.")
    .argument("<message...>", "Message to send; words are joined with spaces.")
    .option(OPTION_FLAGS.title, OPTION_DESCRIPTIONS.title)
    .option(OPTION_FLAGS.quiet, OPTION_DESCRIPTIONS.quiet)
    .action((words: string[], options: AskOptions) =>
      executeAction(() => executeAsk(words.join(" "), options, env), env),
    );
}
