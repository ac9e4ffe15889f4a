/**
 * Errors raised while converting the ontology.
 *
 * Only a MappingGapError is recovered from; every other ConversionError
 * stops the run.
 */

export type ConversionErrorCode =
  | "MAPPING_GAP" // RDF type or predicate absent from the rule table
  | "AUTHENTICATION" // credentials rejected by the target store
  | "NETWORK" // the target store could not be reached
  | "REMOTE_FAULT" // the target store answered with an error
  | "CONSISTENCY" // correspondence invariant violated
  | "ONTOLOGY" // input could not be read or parsed
  | "CONFIG"; // invalid configuration or rule table

export interface ConversionErrorOptions {
  subject?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ConversionError extends Error {
  readonly code: ConversionErrorCode;
  readonly details: Record<string, unknown>;
  subject?: string;

  constructor(
    code: ConversionErrorCode,
    message: string,
    options: ConversionErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "ConversionError";
    this.code = code;
    this.subject = options.subject;
    this.details = options.details ?? {};
  }

  /** Process exit status used when this error ends the run. */
  get exitCode(): number {
    return 1;
  }

  /** Attaches the node being converted, unless one is already known. */
  at(subject: string): this {
    this.subject ??= subject;
    return this;
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      ...(this.subject && { subject: this.subject }),
      ...(Object.keys(this.details).length > 0 && { details: this.details }),
    };
  }
}

export class MappingGapError extends ConversionError {
  readonly predicate?: string;

  constructor(
    message: string,
    options: ConversionErrorOptions & { predicate?: string } = {},
  ) {
    super("MAPPING_GAP", message, options);
    this.name = "MappingGapError";
    this.predicate = options.predicate;
  }
}

export class AuthenticationError extends ConversionError {
  constructor(message: string, options: ConversionErrorOptions = {}) {
    super("AUTHENTICATION", message, options);
    this.name = "AuthenticationError";
  }

  override get exitCode(): number {
    return 2;
  }
}

export class NetworkError extends ConversionError {
  constructor(message: string, options: ConversionErrorOptions = {}) {
    super("NETWORK", message, options);
    this.name = "NetworkError";
  }
}

export class RemoteFaultError extends ConversionError {
  /** API error code (e.g. `modification-failed`) or `http-<status>`. */
  readonly remoteCode: string;

  constructor(
    remoteCode: string,
    message: string,
    options: ConversionErrorOptions = {},
  ) {
    super("REMOTE_FAULT", message, options);
    this.name = "RemoteFaultError";
    this.remoteCode = remoteCode;
  }
}

export class ConsistencyError extends ConversionError {
  constructor(message: string, options: ConversionErrorOptions = {}) {
    super("CONSISTENCY", message, options);
    this.name = "ConsistencyError";
  }
}

export class OntologyError extends ConversionError {
  constructor(message: string, options: ConversionErrorOptions = {}) {
    super("ONTOLOGY", message, options);
    this.name = "OntologyError";
  }
}

export class ConfigError extends ConversionError {
  constructor(message: string, options: ConversionErrorOptions = {}) {
    super("CONFIG", message, options);
    this.name = "ConfigError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof ConversionError) {
    const where = error.subject ? ` (at <${error.subject}>)` : "";
    return `${error.name}: ${error.message}${where}`;
  }
  if (error instanceof Error) {
    return error.stack ?? error.message;
  }
  return String(error);
}
