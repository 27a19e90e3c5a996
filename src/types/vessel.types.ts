// Vessel call domain - the validated input to the calculation core

export type FlagValue = boolean | string;

export type FlagKind =
  | { readonly type: 'boolean' }
  | { readonly type: 'enum'; readonly values: readonly string[] };

export const OPERATIONAL_FLAGS = {
  coaster: { type: 'boolean' },
  double_hull_tanker: { type: 'boolean' },
  outside_working_hours: { type: 'boolean' },
  government_vessel: { type: 'boolean' },
  vessel_type: {
    type: 'enum',
    values: ['bulk_carrier', 'container', 'tanker', 'passenger', 'fishing', 'pleasure', 'general']
  },
  activity: {
    type: 'enum',
    values: ['loading', 'discharging', 'bunkering', 'repairs', 'lay_up', 'transit']
  }
} as const satisfies Record<string, FlagKind>;

export type OperationalFlagName = keyof typeof OPERATIONAL_FLAGS;

export type OperationalFlags = Partial<Record<OperationalFlagName, FlagValue>>;

export function isOperationalFlagName(name: string): name is OperationalFlagName {
  return Object.prototype.hasOwnProperty.call(OPERATIONAL_FLAGS, name);
}

/**
 * Checks a value against the registered kind of a flag.
 * Enum flags only accept their listed values.
 */
export function isValidFlagValue(name: OperationalFlagName, value: unknown): value is FlagValue {
  const kind: FlagKind = OPERATIONAL_FLAGS[name];
  if (kind.type === 'boolean') {
    return typeof value === 'boolean';
  }
  return typeof value === 'string' && kind.values.includes(value);
}

export interface VesselProfile {
  port: string;
  grossTonnage: number;
  arrivalDate: string;          // ISO 8601 UTC instant
  departureDate: string;        // ISO 8601 UTC instant, after arrivalDate
  flags: OperationalFlags;
}

export interface CalculationRequest {
  profile: VesselProfile;
  includeExplanation: boolean;
  scheduleVersion?: string;     // defaults to latest
}
