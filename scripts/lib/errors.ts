export type ErrorKind =
  | 'SourceUnavailable'
  | 'MalformedEntry'
  | 'DuplicateRelease'
  | 'RenderError'
  | 'WriteError'
  | 'Usage';

export type Stage = 'config' | 'collect' | 'render' | 'write';

export class ReleaseIndexError extends Error {
  readonly kind: ErrorKind;
  readonly stage: Stage;

  constructor(kind: ErrorKind, stage: Stage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.stage = stage;
  }
}

export class UsageError extends ReleaseIndexError {
  constructor(message: string) {
    super('Usage', 'config', message);
  }
}

export class SourceUnavailableError extends ReleaseIndexError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SourceUnavailable', 'collect', message, options);
  }
}

/**
 * One release entry that could not be turned into a catalog release. Collected as a
 * warning; only raised when strict mode turns warnings into a failure.
 */
export class MalformedEntryError extends ReleaseIndexError {
  readonly entry: string;

  constructor(entry: string, message: string) {
    super('MalformedEntry', 'collect', message);
    this.entry = entry;
  }
}

export class DuplicateReleaseError extends ReleaseIndexError {
  readonly version: string;

  constructor(version: string, message?: string) {
    super('DuplicateRelease', 'collect', message ?? `Duplicate release version '${version}'`);
    this.version = version;
  }
}

export class RenderError extends ReleaseIndexError {
  constructor(message: string) {
    super('RenderError', 'render', message);
  }
}

export class WriteError extends ReleaseIndexError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('WriteError', 'write', message, options);
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
