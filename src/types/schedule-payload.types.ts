import { z } from 'zod';
import { ALL_PORTS, RATE_UNITS, RateUnit } from './tariff.types';

// Zod schemas for the structured schedule produced by the ingestion pipeline.
// The payload is snake_case; the schedule adapter maps it to the domain.

const RateUnitSchema = z.custom<RateUnit>(
  value => typeof value === 'string' && RATE_UNITS.some(unit => unit === value),
  { message: `unit must be one of ${RATE_UNITS.join(', ')}` }
);

// Requests are matched on uppercase codes, so ingested codes are normalised the same way
const PortCodeSchema = z
  .string()
  .trim()
  .min(1, 'Port cannot be empty')
  .transform(port => (port === ALL_PORTS ? port : port.toUpperCase()));

const FlagValueSchema = z.union([z.boolean(), z.string()]);

const EffectiveRangeShape = {
  effective_from: z.string().min(1, 'effective_from cannot be empty'),
  effective_to: z.string().min(1).nullable().default(null)
};

const PricedRuleShape = {
  rule_id: z.string().min(1, 'Rule id cannot be empty'),
  port: PortCodeSchema,
  due_type: z.string().min(1, 'Due type cannot be empty'),
  rate: z.number().finite().nonnegative(),
  unit: RateUnitSchema,
  currency: z.string().regex(/^[A-Z]{3}$/, 'Currency must be an ISO 4217 code').optional(),
  min_amount: z.number().finite().nonnegative().optional(),
  max_amount: z.number().finite().nonnegative().optional(),
  ...EffectiveRangeShape
};

const FlagPredicateShape = {
  flag: z.string().min(1, 'Flag cannot be empty'),
  comparison: z.enum(['eq', 'neq', 'in', 'not_in']),
  value: z.union([FlagValueSchema, z.array(z.string())])
};

export const RateTierPayloadSchema = z.object({
  ...PricedRuleShape,
  min_gt: z.number().finite().nonnegative(),
  max_gt: z.number().finite().positive().nullable()
});

export const FeeRulePayloadSchema = z.object({
  ...PricedRuleShape,
  condition: z.object(FlagPredicateShape).optional()
});

export const ExemptionPayloadSchema = z.object({
  rule_id: z.string().min(1, 'Rule id cannot be empty'),
  port: PortCodeSchema,
  due_type: z.string().min(1, 'Due type cannot be empty'),
  ...FlagPredicateShape,
  effect: z.discriminatedUnion('type', [
    z.object({ type: z.literal('waive') }),
    z.object({ type: z.literal('discount'), percent: z.number().gt(0).max(100) })
  ]),
  ...EffectiveRangeShape
});

export const SchedulePayloadSchema = z.object({
  version: z.string().min(1, 'Schedule version cannot be empty'),
  currency: z.string().regex(/^[A-Z]{3}$/, 'Currency must be an ISO 4217 code'),
  ports: z.array(PortCodeSchema).min(1, 'At least one port is required'),
  due_types: z.array(z.string().min(1)).min(1, 'At least one due type is required'),
  rate_tiers: z.array(RateTierPayloadSchema).default([]),
  fee_rules: z.array(FeeRulePayloadSchema).default([]),
  exemptions: z.array(ExemptionPayloadSchema).default([])
});

export type SchedulePayload = z.infer<typeof SchedulePayloadSchema>;
