// Flattens batch calculation output into CSV records, one per line item

import { BatchCalculationResult, CurrencyTotals, DueLineItem } from '../types/calculation.types';
import { PortDuesCsvRecord } from '../types/port-call-record.types';

function formatTotals(totals: CurrencyTotals): string {
  return Object.entries(totals)
    .map(([currency, total]) => `${currency} ${total.toFixed(2)}`)
    .join('; ');
}

function formatTier(item: DueLineItem): string | undefined {
  if (!item.tierApplied) {
    return undefined;
  }
  return `${item.tierApplied.minGt}-${item.tierApplied.maxGt ?? ''}`;
}

/**
 * Keeps the input order of calls. A call with no applicable dues still gets
 * one row carrying its (empty) totals; a failed call gets one row with its error.
 */
export function buildPortDuesRecords(
  callIds: string[],
  batch: BatchCalculationResult
): PortDuesCsvRecord[] {
  const rowsByCall = new Map<string, PortDuesCsvRecord[]>();

  for (const { requestId, result } of batch.records) {
    const callTotals = formatTotals(result.totals);
    const rows: PortDuesCsvRecord[] = result.lineItems.map(item => ({
      callId: requestId,
      scheduleVersion: result.scheduleVersion,
      dueType: item.dueType,
      ruleId: item.ruleId,
      tierApplied: formatTier(item),
      baseAmount: item.baseAmount.toFixed(2),
      currency: item.currency,
      exemptionApplied: item.exemptionApplied?.ruleId,
      clauseReference: result.explanationRefs?.[item.ruleId],
      callTotals
    }));
    rowsByCall.set(
      requestId,
      rows.length > 0 ? rows : [{ callId: requestId, scheduleVersion: result.scheduleVersion, callTotals }]
    );
  }

  for (const error of batch.errors) {
    rowsByCall.set(error.requestId, [
      { callId: error.requestId, error: `${error.errorType}: ${error.message}` }
    ]);
  }

  return callIds.flatMap(callId => rowsByCall.get(callId) ?? []);
}
