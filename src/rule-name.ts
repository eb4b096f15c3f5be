import { EmptyIdentifierError, ReservedIdentifierError } from "./errors.ts";

const DISALLOWED = /[^A-Za-z0-9_]/g;

// Built into ninja; redeclaring it makes the file unloadable
const RESERVED = new Set(["phony"]);

/**
 * Derive a ninja rule name from a command by keeping only ASCII letters,
 * digits and underscores. Not injective: "run!" and "run@" both give "run".
 */
export function toRuleName(command: string): string {
  return command.replace(DISALLOWED, "");
}

export function ruleNameFor(command: string): string {
  const name = toRuleName(command);
  if (name.length === 0) throw new EmptyIdentifierError(command);
  if (RESERVED.has(name)) throw new ReservedIdentifierError(name, command);
  return name;
}
