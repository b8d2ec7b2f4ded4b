export type ErrorSeverity = "warn" | "error";

export type ErrorKind =
  | "MissingCredential"
  | "NoStagedChanges"
  | "CollectorShapeError"
  | "DiffTooLarge"
  | "TransportError"
  | "ParseError"
  | "EmptyMessage"
  | "ConfigFileError";

/**
 * Base class for every failure the generator knows how to report.
 * `severity` decides whether the CLI treats the outcome as "nothing to do"
 * or as a failed run.
 */
export abstract class CommitlineError extends Error {
  abstract readonly kind: ErrorKind;
  readonly severity: ErrorSeverity = "error";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingCredentialError extends CommitlineError {
  readonly kind = "MissingCredential";

  constructor(readonly envVar: string) {
    super(`Missing API key. Set ${envVar} or pass an explicit apiKey.`);
  }
}

export class NoStagedChangesError extends CommitlineError {
  readonly kind = "NoStagedChanges";
  override readonly severity = "warn";

  constructor() {
    super("No staged changes found.");
  }
}

export class CollectorShapeError extends CommitlineError {
  readonly kind = "CollectorShapeError";

  constructor(readonly received: string) {
    super(`Unexpected diff type: expected a list of lines, got ${received}.`);
  }
}

export class DiffTooLargeError extends CommitlineError {
  readonly kind = "DiffTooLarge";

  constructor(readonly size: number, readonly limit: number) {
    super(`Staged diff is ${size} characters, over the configured limit of ${limit}.`);
  }
}

export class TransportError extends CommitlineError {
  readonly kind = "TransportError";

  constructor(
    readonly status: number | undefined,
    readonly body: string,
    options?: { cause?: unknown }
  ) {
    super(
      status === undefined
        ? `Failed to generate commit message: ${body}`
        : `Failed to generate commit message (HTTP ${status}): ${body}`,
      options
    );
  }
}

export class ParseError extends CommitlineError {
  readonly kind = "ParseError";

  constructor(options?: { cause?: unknown }) {
    super("Could not parse response from model.", options);
  }
}

export class EmptyMessageError extends CommitlineError {
  readonly kind = "EmptyMessage";
  override readonly severity = "warn";

  constructor() {
    super("Empty response from model.");
  }
}

export class ConfigFileError extends CommitlineError {
  readonly kind = "ConfigFileError";

  constructor(readonly source: string, detail: string, options?: { cause?: unknown }) {
    super(`Invalid configuration in ${source}: ${detail}`, options);
  }
}
