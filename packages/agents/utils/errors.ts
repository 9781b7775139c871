// Error taxonomy for the CIM agent core
// Agent-level failures travel inside AgentResult; only programming errors are thrown past execute()

export type CimErrorCode =
  | 'NO_STRUCTURED_BLOCK'
  | 'MALFORMED_STRUCTURE'
  | 'MODEL_UNAVAILABLE'
  | 'MODEL_TIMEOUT'
  | 'MODEL_CANCELLED'
  | 'VALIDATION_IMPOSSIBLE'
  | 'ORCHESTRATION_FAILURE'
  | 'CONFIG_ERROR'
  | 'RECORD_STORE_ERROR';

export class CimError extends Error {
  constructor(
    message: string,
    public readonly code: CimErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'CimError';
  }
}

// ── Response extraction ─────────────────────────────────────────────

export class ExtractionFailure extends CimError {
  constructor(message: string, code: 'NO_STRUCTURED_BLOCK' | 'MALFORMED_STRUCTURE', cause?: unknown) {
    super(message, code, cause);
    this.name = 'ExtractionFailure';
  }
}

export class NoStructuredBlockFound extends ExtractionFailure {
  constructor(expected: string) {
    super(`No structured block found in model response (expected ${expected})`, 'NO_STRUCTURED_BLOCK');
    this.name = 'NoStructuredBlockFound';
  }
}

export class MalformedStructure extends ExtractionFailure {
  constructor(
    message: string,
    public readonly fragment: string,
    cause?: unknown,
  ) {
    super(`Malformed structured block: ${message}`, 'MALFORMED_STRUCTURE', cause);
    this.name = 'MalformedStructure';
  }
}

// ── Model invocation ────────────────────────────────────────────────

export class ModelInvocationFailure extends CimError {
  constructor(
    message: string,
    code: 'MODEL_UNAVAILABLE' | 'MODEL_TIMEOUT' | 'MODEL_CANCELLED',
    public readonly model: string,
    public readonly retriable: boolean,
    cause?: unknown,
  ) {
    super(message, code, cause);
    this.name = 'ModelInvocationFailure';
  }
}

export class ModelUnavailable extends ModelInvocationFailure {
  constructor(model: string, detail: string, retriable = true, cause?: unknown) {
    super(`Model ${model} unavailable: ${detail}`, 'MODEL_UNAVAILABLE', model, retriable, cause);
    this.name = 'ModelUnavailable';
  }
}

export class ModelTimeout extends ModelInvocationFailure {
  constructor(model: string, timeoutMs: number, cause?: unknown) {
    super(`Model ${model} timed out after ${timeoutMs}ms`, 'MODEL_TIMEOUT', model, true, cause);
    this.name = 'ModelTimeout';
  }
}

export class ModelCancelled extends ModelInvocationFailure {
  constructor(model: string, cause?: unknown) {
    super(`Model ${model} call was cancelled`, 'MODEL_CANCELLED', model, false, cause);
    this.name = 'ModelCancelled';
  }
}

// ── Validation / orchestration / infrastructure ─────────────────────

/** A normalized output failed its own schema. Indicates a bug in the normalizer or a schema. */
export class ValidationImpossible extends CimError {
  constructor(
    public readonly schemaName: string,
    public readonly problems: string[],
  ) {
    super(`Normalized output does not conform to schema "${schemaName}": ${problems.join('; ')}`, 'VALIDATION_IMPOSSIBLE');
    this.name = 'ValidationImpossible';
  }
}

export class OrchestrationFailure extends CimError {
  constructor(message: string, public readonly stage: string, cause?: unknown) {
    super(message, 'ORCHESTRATION_FAILURE', cause);
    this.name = 'OrchestrationFailure';
  }
}

export class ConfigError extends CimError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class RecordStoreError extends CimError {
  constructor(message: string, public readonly table: string, cause?: unknown) {
    super(message, 'RECORD_STORE_ERROR', cause);
    this.name = 'RecordStoreError';
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
