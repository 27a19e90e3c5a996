// Typed failures of the calculation core

export type TariffErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'AMBIGUOUS_TIER'
  | 'CALCULATION_ERROR'
  | 'EXPLANATION_UNAVAILABLE'
  | 'SCHEDULE_INTEGRITY';

export abstract class TariffError extends Error {
  abstract readonly code: TariffErrorCode;

  /** Caller-facing errors describe a request defect; the rest are data defects. */
  abstract readonly callerFacing: boolean;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends TariffError {
  readonly code = 'VALIDATION_ERROR';
  readonly callerFacing = true;

  constructor(
    public readonly field: string,
    public readonly constraint: string
  ) {
    super(`Invalid ${field}: ${constraint}`);
  }
}

export class NotFoundError extends TariffError {
  readonly code = 'NOT_FOUND';
  readonly callerFacing = true;

  constructor(
    public readonly port: string,
    public readonly version?: string
  ) {
    super(
      version
        ? `No applicable tariff for port ${port} in schedule version ${version}`
        : `No applicable tariff for port ${port}`
    );
  }
}

export class AmbiguousTierError extends TariffError {
  readonly code = 'AMBIGUOUS_TIER';
  readonly callerFacing = false;

  constructor(
    public readonly dueType: string,
    public readonly ruleIds: string[],
    public readonly scheduleVersion: string
  ) {
    super(
      `Tiers ${ruleIds.join(', ')} all match due type ${dueType} in schedule ${scheduleVersion}`
    );
  }
}

export class CalculationError extends TariffError {
  readonly code = 'CALCULATION_ERROR';
  readonly callerFacing = false;

  constructor(
    public readonly ruleId: string,
    public readonly reason: string
  ) {
    super(`Rule ${ruleId} cannot be evaluated: ${reason}`);
  }
}

export class ExplanationUnavailableError extends TariffError {
  readonly code = 'EXPLANATION_UNAVAILABLE';
  readonly callerFacing = false;
}

export class ScheduleIntegrityError extends TariffError {
  readonly code = 'SCHEDULE_INTEGRITY';
  readonly callerFacing = true;

  constructor(
    public readonly version: string,
    public readonly issues: string[]
  ) {
    super(`Schedule ${version} rejected: ${issues.join('; ')}`);
  }
}
