export class ConfigurationError extends Error {
  readonly code = 'CONFIGURATION_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ModelLoadError extends Error {
  readonly code = 'MODEL_LOAD_ERROR';

  constructor(
    public readonly profile: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to load model for profile ${profile}: ${message}`, options);
    this.name = 'ModelLoadError';
  }
}

export class ExtractionRuntimeError extends Error {
  readonly code = 'EXTRACTION_RUNTIME_ERROR';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionRuntimeError';
  }
}

export class RemoteServiceError extends Error {
  readonly code = 'REMOTE_SERVICE_ERROR';

  constructor(
    message: string,
    public readonly upstreamStatus?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RemoteServiceError';
  }
}

export class JobStateError extends Error {
  readonly code = 'INVALID_JOB_STATE';

  constructor(
    public readonly jobId: number,
    message: string
  ) {
    super(message);
    this.name = 'JobStateError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
