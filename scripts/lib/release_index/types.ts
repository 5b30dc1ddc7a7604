import type { MalformedEntryError } from '../errors.js';

export const RELEASE_STREAMS = ['stable', 'preview'] as const;

export type ReleaseStream = (typeof RELEASE_STREAMS)[number];

export interface Artifact {
  readonly name: string;
  readonly url: string;
  readonly size?: number;
  readonly sha256?: string;
}

export interface CompatibilityRange {
  readonly min: string;
  readonly max?: string;
}

export interface Release {
  readonly version: string;
  readonly name?: string;
  readonly publishedAt?: string;
  readonly stream: ReleaseStream;
  readonly requires?: string;
  readonly compatibility?: CompatibilityRange;
  readonly notes?: string;
  readonly runtimes?: readonly number[];
  readonly overrides?: Readonly<Record<string, unknown>>;
  readonly artifacts: readonly Artifact[];
}

export interface ReleaseCatalog {
  readonly releases: readonly Release[];
  readonly warnings: readonly MalformedEntryError[];
}

/**
 * Unvalidated release record as a source found it. `label` names the entry in
 * warnings (a manifest key, a directory name, a list position).
 */
export interface RawRelease {
  label: string;
  version: unknown;
  data: unknown;
}

export interface RawReleaseBatch {
  releases: RawRelease[];
  warnings: MalformedEntryError[];
}

export interface SourceContext {
  signal: AbortSignal;
  reporter: Reporter;
}

export type SourceKind = 'manifest' | 'directory' | 'feed';

export interface ReleaseSource {
  readonly kind: SourceKind;
  readonly location: string;
  enumerateReleases(context: SourceContext): Promise<RawReleaseBatch>;
}

export interface RenderedPage {
  readonly path: string;
  readonly content: Buffer;
}

export interface Reporter {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleReporter: Reporter = {
  info(message: string): void {
    console.log(message);
  },
  warn(message: string): void {
    console.warn(message);
  },
  error(message: string): void {
    console.error(message);
  }
};

export const silentReporter: Reporter = {
  info(): void {},
  warn(): void {},
  error(): void {}
};
