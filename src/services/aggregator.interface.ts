import { CurrencyTotals, DueLineItem } from '../types/calculation.types';

export interface IAggregator {
  /** Per-currency totals of line items rounded half-up to 2 decimals before summing. */
  aggregate(items: DueLineItem[]): CurrencyTotals;

  /** Same items, same order, amounts rounded the way they are summed. */
  roundLineItems(items: DueLineItem[]): DueLineItem[];
}
