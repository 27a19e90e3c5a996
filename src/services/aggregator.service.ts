import { injectable } from 'tsyringe';
import { CurrencyTotals, DueLineItem } from '../types/calculation.types';
import { roundHalfUp, sumRounded } from '../utils/money.util';
import { IAggregator } from './aggregator.interface';

@injectable()
export class AggregatorService implements IAggregator {
  aggregate(items: DueLineItem[]): CurrencyTotals {
    // Map keeps currencies in order of first appearance
    const amountsByCurrency = new Map<string, number[]>();
    for (const item of items) {
      const amounts = amountsByCurrency.get(item.currency) ?? [];
      amounts.push(item.baseAmount);
      amountsByCurrency.set(item.currency, amounts);
    }

    const totals: CurrencyTotals = {};
    for (const [currency, amounts] of amountsByCurrency) {
      totals[currency] = sumRounded(amounts);
    }
    return totals;
  }

  roundLineItems(items: DueLineItem[]): DueLineItem[] {
    return items.map(item => ({ ...item, baseAmount: roundHalfUp(item.baseAmount) }));
  }
}
