import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { ValidationError } from '../errors/tariff.errors';
import {
  CalculationRequest,
  isOperationalFlagName,
  isValidFlagValue,
  OPERATIONAL_FLAGS,
  OperationalFlags
} from '../types/vessel.types';
import { toCanonicalInstant } from '../utils/date.util';
import { GuardrailResult, IGuardrailValidator } from './guardrail-validator.interface';
import { ITariffRepository } from './tariff-repository.interface';

const REQUIRED_FIELDS = ['port', 'grossTonnage', 'arrivalDate', 'departureDate'] as const;

const RawRequestSchema = z.record(z.unknown());
const GrossTonnageSchema = z.number().finite().positive();
const PortSchema = z.string().trim().min(1).transform(port => port.toUpperCase());
const OptionalBooleanSchema = z.boolean().optional();
const OptionalVersionSchema = z.string().trim().min(1).optional();

/**
 * Gate between untrusted input (API bodies, CSV rows, parsed natural
 * language) and the calculation core. Checks run in a fixed order and the
 * first failure is reported.
 */
@injectable()
export class GuardrailValidatorService implements IGuardrailValidator {
  constructor(
    @inject('ITariffRepository') private readonly repository: ITariffRepository
  ) {}

  validate(rawRequest: unknown): GuardrailResult {
    try {
      return { success: true, data: this.check(rawRequest) };
    } catch (error) {
      if (error instanceof ValidationError) {
        return { success: false, error };
      }
      throw error;
    }
  }

  private check(rawRequest: unknown): CalculationRequest {
    const parsedRequest = RawRequestSchema.safeParse(rawRequest);
    if (!parsedRequest.success || Array.isArray(rawRequest)) {
      throw new ValidationError('request', 'must be a JSON object');
    }
    const raw = parsedRequest.data;

    for (const field of REQUIRED_FIELDS) {
      const value = raw[field];
      if (value === undefined || value === null || value === '') {
        throw new ValidationError(field, 'is required');
      }
    }

    const grossTonnage = GrossTonnageSchema.safeParse(raw.grossTonnage);
    if (!grossTonnage.success) {
      throw new ValidationError('grossTonnage', 'must be a positive finite number');
    }

    const arrivalDate = this.parseDate('arrivalDate', raw.arrivalDate);
    const departureDate = this.parseDate('departureDate', raw.departureDate);
    if (Date.parse(arrivalDate) >= Date.parse(departureDate)) {
      throw new ValidationError(
        'departureDate',
        'date ordering violated: arrivalDate must be strictly before departureDate'
      );
    }

    const flags = this.parseFlags(raw.flags);

    const includeExplanation = OptionalBooleanSchema.safeParse(raw.includeExplanation);
    if (!includeExplanation.success) {
      throw new ValidationError('includeExplanation', 'must be a boolean');
    }

    const scheduleVersion = OptionalVersionSchema.safeParse(raw.scheduleVersion);
    if (!scheduleVersion.success) {
      throw new ValidationError('scheduleVersion', 'must be a non-empty string');
    }

    const port = PortSchema.safeParse(raw.port);
    if (!port.success) {
      throw new ValidationError('port', 'must be a port code');
    }
    if (!this.repository.hasPort(port.data)) {
      throw new ValidationError('port', `${port.data} does not resolve to a known tariff schedule`);
    }

    return {
      profile: {
        port: port.data,
        grossTonnage: grossTonnage.data,
        arrivalDate,
        departureDate,
        flags
      },
      includeExplanation: includeExplanation.data ?? false,
      ...(scheduleVersion.data !== undefined && { scheduleVersion: scheduleVersion.data })
    };
  }

  private parseDate(field: string, value: unknown): string {
    const canonical = typeof value === 'string' ? toCanonicalInstant(value.trim()) : null;
    if (canonical === null) {
      throw new ValidationError(
        field,
        'must be a calendar date (YYYY-MM-DD) or an ISO 8601 date-time with offset'
      );
    }
    return canonical;
  }

  private parseFlags(value: unknown): OperationalFlags {
    if (value === undefined || value === null) {
      return {};
    }

    const parsed = RawRequestSchema.safeParse(value);
    if (!parsed.success || Array.isArray(value)) {
      throw new ValidationError('flags', 'must be an object of flag names to values');
    }

    const flags: OperationalFlags = {};
    for (const [name, flagValue] of Object.entries(parsed.data)) {
      if (!isOperationalFlagName(name)) {
        throw new ValidationError(`flags.${name}`, 'is not a recognised operational flag');
      }
      if (!isValidFlagValue(name, flagValue)) {
        const kind = OPERATIONAL_FLAGS[name];
        throw new ValidationError(
          `flags.${name}`,
          kind.type === 'boolean' ? 'must be a boolean' : `must be one of ${kind.values.join(', ')}`
        );
      }
      flags[name] = flagValue;
    }
    return flags;
  }
}
