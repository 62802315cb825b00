/**
 * Error taxonomy for diffscribe.
 *
 * Only source and configuration failures abort a run. The others are
 * recovered where they occur and reported through the logger.
 */

export class DiffscribeError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1
  ) {
    super(message);
    this.name = 'DiffscribeError';
  }
}

export class SourceUnavailableError extends DiffscribeError {
  constructor(what: string, detail?: string) {
    super(
      `Cannot read ${what} from the repository.` +
        (detail ? `\n${detail}` : '') +
        '\nCheck that you are inside a Git repository and that the requested range exists.',
      2
    );
    this.name = 'SourceUnavailableError';
  }
}

export class DiffParseAnomalyError extends DiffscribeError {
  constructor(
    public readonly filePath: string,
    reason: string
  ) {
    super(`Unreadable diff for ${filePath}: ${reason}`);
    this.name = 'DiffParseAnomalyError';
  }
}

export class SummarizationUnavailableError extends DiffscribeError {
  constructor(reason: string) {
    super(`AI summary unavailable: ${reason}`);
    this.name = 'SummarizationUnavailableError';
  }
}

export class CacheIOError extends DiffscribeError {
  constructor(
    operation: string,
    public readonly cachePath: string,
    cause: unknown
  ) {
    super(`Commit cache ${operation} failed (${cachePath}): ${errorMessage(cause)}`);
    this.name = 'CacheIOError';
  }
}

/** A commit that cannot be placed where the changelog expects it. */
export class RenderConflictError extends DiffscribeError {
  constructor(
    public readonly commitId: string,
    message: string
  ) {
    super(message);
    this.name = 'RenderConflictError';
  }
}

export class ConfigError extends DiffscribeError {
  constructor(
    source: string,
    public readonly issues: string[]
  ) {
    super(`Invalid configuration in ${source}:\n` + issues.map(i => `  - ${i}`).join('\n'), 78);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
