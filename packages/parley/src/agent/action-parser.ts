import { ACTION_MARKER, INPUT_MARKER } from "../core/constants.js";

/**
 * A tool request found in a completion.
 */
export interface Action {
  toolName: string;
  input: string;
}

/**
 * Anything that can turn completion text into an {@link Action}.
 * `null` means the text is a final answer candidate.
 */
export interface ActionExtractor {
  parse(text: string): Action | null;
}

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Reads the two-line directive
 *
 * ```
 * ACTION: <tool name>
 * INPUT: <tool input>
 * ```
 *
 * Markers match case-insensitively, tool names exactly. Only the first action
 * marker counts. A name outside the registered set means "no action". A missing
 * input marker yields an empty input.
 */
export class ActionParser implements ActionExtractor {
  private readonly toolNames: ReadonlySet<string>;
  private readonly actionPattern: RegExp;
  private readonly inputPattern: RegExp;

  constructor(toolNames: Iterable<string>) {
    this.toolNames = new Set(toolNames);
    this.actionPattern = new RegExp(`\\b${escapeRegExp(ACTION_MARKER)}\\s*(\\w+)`, "i");
    this.inputPattern = new RegExp(`\\b${escapeRegExp(INPUT_MARKER)}[ \\t]*([^\\r\\n]*)`, "i");
  }

  parse(text: string): Action | null {
    const actionMatch = this.actionPattern.exec(text);
    if (!actionMatch) {
      return null;
    }

    const toolName = actionMatch[1];
    if (toolName === undefined || !this.toolNames.has(toolName)) {
      return null;
    }

    const rest = text.slice(actionMatch.index + actionMatch[0].length);
    const inputMatch = this.inputPattern.exec(rest);
    const input = inputMatch?.[1]?.trim() ?? "";

    return { toolName, input };
  }
}
