export class PipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Both search collaborators returned nothing or failed.
 */
export class RetrievalUnavailable extends PipelineError {
  constructor(message = "No candidates from vector or keyword search") {
    super(message);
  }
}

export class ExternalCallTimeout extends PipelineError {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
  }
}

export class ExternalCallError extends PipelineError {
  constructor(
    public readonly label: string,
    public readonly failure: unknown
  ) {
    super(`${label} failed: ${describeError(failure)}`);
  }
}

export class FallbackExhausted extends PipelineError {
  constructor(public readonly scope: string) {
    super(`Fallback already used for "${scope}"`);
  }
}

export class VerificationTimeout extends PipelineError {
  constructor(
    public readonly check: string,
    public readonly timeoutMs: number
  ) {
    super(`Verification check "${check}" timed out after ${timeoutMs}ms`);
  }
}

export class ConfigurationError extends PipelineError {
  constructor(public readonly issues: string[]) {
    super(`Invalid pipeline configuration: ${issues.join("; ")}`);
  }
}

export class PipelineInputError extends PipelineError {}

export class EvaluationDatasetError extends PipelineError {
  constructor(public readonly issues: string[]) {
    super(`Invalid evaluation cases: ${issues.join("; ")}`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
