import { ValidationError } from '../errors/tariff.errors';
import { CalculationRequest } from '../types/vessel.types';

/**
 * Guardrail outcome as discriminated union.
 * A request only reaches resolution through the success branch.
 */
export type GuardrailResult =
  | { readonly success: true; readonly data: CalculationRequest }
  | { readonly success: false; readonly error: ValidationError };

export interface IGuardrailValidator {
  validate(rawRequest: unknown): GuardrailResult;
}
