// Flat records exchanged with the CSV batch interface

export interface PortCallCsvRow {
  callId: string;
  port?: string;
  grossTonnage?: string;
  arrivalDate?: string;
  departureDate?: string;
  flags?: string;              // name=value pairs joined with ';'
  includeExplanation?: string;
}

export interface PortDuesCsvRecord {
  callId: string;
  scheduleVersion?: string;
  dueType?: string;
  ruleId?: string;
  tierApplied?: string;        // "min-max" GT, max empty when unbounded
  baseAmount?: string;         // 2 decimals
  currency?: string;
  exemptionApplied?: string;   // exemption rule id
  clauseReference?: string;
  callTotals?: string;         // "ZAR 8195.00; USD 12.00"
  error?: string;
}
