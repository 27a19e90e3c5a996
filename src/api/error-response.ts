import {
  NotFoundError,
  ScheduleIntegrityError,
  TariffError,
  ValidationError
} from '../errors/tariff.errors';

export interface ErrorResponse {
  status: number;
  body: {
    success: false;
    error: string;
    code?: string;
    field?: string;
    constraint?: string;
    issues?: string[];
  };
}

/**
 * Maps a failure to its HTTP shape. Request defects carry actionable detail;
 * data defects and unknown failures stay opaque.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ValidationError) {
    return {
      status: 400,
      body: {
        success: false,
        error: error.message,
        code: error.code,
        field: error.field,
        constraint: error.constraint
      }
    };
  }

  if (error instanceof NotFoundError) {
    return {
      status: 404,
      body: { success: false, error: 'No applicable tariff', code: error.code }
    };
  }

  if (error instanceof ScheduleIntegrityError) {
    return {
      status: 422,
      body: { success: false, error: error.message, code: error.code, issues: error.issues }
    };
  }

  if (error instanceof TariffError) {
    return {
      status: 500,
      body: {
        success: false,
        error: 'Calculation failed because of a tariff data defect',
        code: error.code
      }
    };
  }

  return {
    status: 500,
    body: { success: false, error: 'Unknown error occurred' }
  };
}
