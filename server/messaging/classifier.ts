/**
 * Message Classifier
 *
 * Anything starting with the command prefix is a command, even when the
 * word is unknown, so typos never reach the (rate-limited) extraction path.
 */

import { COMMAND_CONSTANTS } from "../config/constants";

export type BotCommand =
  | { type: "ping" }
  | { type: "list" }
  | { type: "todo" }
  | { type: "help" }
  | { type: "today" }
  | { type: "week" }
  | { type: "undo" }
  | { type: "expand"; index: number }
  | { type: "done"; index: number }
  | { type: "unknown"; command: string };

export type MessageClassification =
  | { kind: "command"; command: BotCommand }
  | { kind: "needs_extraction"; text: string };

function parseIndex(text: string): number | null {
  const trimmed = text.trim();
  return /^\d+$/.test(trimmed) ? Number(trimmed) : null;
}

export function parseCommand(text: string): BotCommand | null {
  const lower = text.trim().toLowerCase();
  const prefix = COMMAND_CONSTANTS.PREFIX;

  switch (lower) {
    case `${prefix}ping`:
      return { type: "ping" };
    case `${prefix}tugas`:
      return { type: "list" };
    case `${prefix}todo`:
      return { type: "todo" };
    case `${prefix}help`:
      return { type: "help" };
    case `${prefix}today`:
      return { type: "today" };
    case `${prefix}week`:
      return { type: "week" };
    case `${prefix}undo`:
      return { type: "undo" };
  }

  const withArgument: Array<[string, "done" | "expand"]> = [
    [`${prefix}done `, "done"],
    [`${prefix}expand `, "expand"],
    [`${prefix}tugas `, "expand"],
  ];
  for (const [head, type] of withArgument) {
    if (lower.startsWith(head)) {
      const index = parseIndex(lower.slice(head.length));
      return index === null ? null : { type, index };
    }
  }

  // "#3" is shorthand for "#expand 3"
  const rest = lower.slice(prefix.length);
  return /^\d+$/.test(rest) ? { type: "expand", index: Number(rest) } : null;
}

export function classifyMessage(text: string): MessageClassification {
  const trimmed = text.trim();
  if (!trimmed.startsWith(COMMAND_CONSTANTS.PREFIX)) {
    return { kind: "needs_extraction", text };
  }

  const command = parseCommand(trimmed);
  if (command) return { kind: "command", command };

  const word = trimmed.split(/\s+/)[0] ?? trimmed;
  return { kind: "command", command: { type: "unknown", command: word } };
}
