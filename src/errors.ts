// Error kinds surfaced by the registry, the compiler and the CLI.
// Library code throws these; only cli.ts maps them to exit codes.

export type ErrorCode =
  | "MISSING_FIELD"
  | "INVALID_JOB"
  | "MALFORMED_CACHE"
  | "EMPTY_IDENTIFIER"
  | "RESERVED_IDENTIFIER"
  | "DUPLICATE_RULE_NAME"
  | "DUPLICATE_OUTPUT"
  | "CONCURRENT_MODIFICATION"
  | "USAGE";

export interface RuleDeclaration {
  command: string;
  description: string;
}

export abstract class JobgraphError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingFieldError extends JobgraphError {
  readonly code = "MISSING_FIELD";

  constructor(
    readonly record: Record<string, unknown>,
    readonly fields: readonly string[],
    readonly index: number
  ) {
    super(`Job #${index} is missing required field(s): ${fields.join(", ")}`);
  }
}

export class InvalidJobError extends JobgraphError {
  readonly code = "INVALID_JOB";

  constructor(
    readonly record: Record<string, unknown>,
    readonly index: number,
    readonly issues: readonly string[]
  ) {
    super(`Job #${index} is invalid: ${issues.join("; ")}`);
  }
}

export class MalformedCacheError extends JobgraphError {
  readonly code = "MALFORMED_CACHE";

  constructor(readonly location: string, detail: string, options?: ErrorOptions) {
    super(`Job registry at ${location} is malformed: ${detail}`, options);
  }
}

export class EmptyIdentifierError extends JobgraphError {
  readonly code = "EMPTY_IDENTIFIER";

  constructor(readonly command: string) {
    super(`Command ${JSON.stringify(command)} yields an empty rule name`);
  }
}

export class ReservedIdentifierError extends JobgraphError {
  readonly code = "RESERVED_IDENTIFIER";

  constructor(readonly ruleName: string, readonly command: string) {
    super(`Command ${JSON.stringify(command)} yields the reserved rule name '${ruleName}'`);
  }
}

export class DuplicateRuleNameError extends JobgraphError {
  readonly code = "DUPLICATE_RULE_NAME";

  constructor(
    readonly ruleName: string,
    readonly first: RuleDeclaration,
    readonly second: RuleDeclaration
  ) {
    super(
      first.command === second.command
        ? `Rule '${ruleName}' for ${JSON.stringify(first.command)} has conflicting descriptions: ` +
            `${JSON.stringify(first.description)} and ${JSON.stringify(second.description)}`
        : `Rule name '${ruleName}' is derived from conflicting declarations: ` +
            `${JSON.stringify(first.command)} and ${JSON.stringify(second.command)}`
    );
  }
}

export class DuplicateOutputError extends JobgraphError {
  readonly code = "DUPLICATE_OUTPUT";

  constructor(readonly output: string, readonly index: number, readonly withinJob = false) {
    super(
      withinJob
        ? `Job #${index} lists output '${output}' more than once`
        : `Job #${index} declares output '${output}', which an earlier job already produces`
    );
  }
}

export class ConcurrentModificationError extends JobgraphError {
  readonly code = "CONCURRENT_MODIFICATION";

  constructor(readonly location: string) {
    super(`Job registry at ${location} changed while appending; re-run the command`);
  }
}

export class UsageError extends JobgraphError {
  readonly code = "USAGE";
}
