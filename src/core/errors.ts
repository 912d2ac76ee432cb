export class ConfigurationError extends Error {
  public constructor(public readonly problems: string[]) {
    super(`Invalid Tidemark configuration:\n- ${problems.join('\n- ')}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * An ASR call that raised, timed out, or answered with something that is not a
 * segment list. Carried inside an engine result; the pipeline never throws it.
 */
export class EngineFailure extends Error {
  public constructor(
    message: string,
    public readonly detail?: unknown
  ) {
    super(message);
    this.name = 'EngineFailure';
  }
}

export class AudioUnderrun extends Error {
  public constructor(public readonly waitedMs: number) {
    super(`Audio source produced no frames for ${waitedMs}ms`);
    this.name = 'AudioUnderrun';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
