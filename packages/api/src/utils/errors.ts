export class AppError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string) {
    super(message, 'AUTHENTICATION_ERROR');
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
  }
}

/**
 * A pipeline definition that cannot be scheduled: a dependency cycle, a
 * dependency on an unknown stage, duplicate stage names or no stages at all.
 * Raised before any run is created.
 */
export class DefinitionInvalidError extends AppError {
  constructor(
    public readonly pipeline: string,
    public readonly problems: string[]
  ) {
    super(`Pipeline definition "${pipeline}" is invalid: ${problems.join('; ')}`, 'DEFINITION_INVALID');
  }
}

/**
 * An upstream run did not produce exactly one artifact from a publish stage,
 * so no downstream run can be started from it.
 */
export class AmbiguousArtifactError extends AppError {
  constructor(
    public readonly runId: string,
    public readonly publishStages: string[]
  ) {
    super(
      publishStages.length === 0
        ? `Run ${runId} has no successful publish stage with an artifact`
        : `Run ${runId} has ${publishStages.length} publish stages with artifacts: ${publishStages.join(', ')}`,
      'AMBIGUOUS_ARTIFACT'
    );
  }
}

export class LedgerConflictError extends AppError {
  constructor(
    public readonly runId: string,
    public readonly recordedOutcome: string,
    public readonly attemptedOutcome: string
  ) {
    super(
      `Run ${runId} is already recorded as ${recordedOutcome}; refusing to record ${attemptedOutcome}`,
      'LEDGER_CONFLICT'
    );
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
