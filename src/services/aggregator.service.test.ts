import 'reflect-metadata';
import { DueLineItem } from '../types/calculation.types';
import { AggregatorService } from './aggregator.service';

function lineItem(ruleId: string, baseAmount: number, currency = 'ZAR'): DueLineItem {
  return {
    dueType: 'port_dues',
    ruleId,
    source: 'fee',
    baseAmount,
    currency,
    calculation: {
      unit: 'flat',
      rate: baseAmount,
      grossTonnage: 1000,
      billedQuantity: 1,
      formulaAmount: baseAmount
    }
  };
}

describe('AggregatorService', () => {
  let aggregator: AggregatorService;

  beforeEach(() => {
    aggregator = new AggregatorService();
  });

  describe('aggregate', () => {
    // Test: Each item is rounded before it joins the total
    it('should sum rounded items', () => {
      // Arrange
      const items = [lineItem('A', 100.005), lineItem('B', 50.004)];

      // Act
      const totals = aggregator.aggregate(items);

      // Assert
      expect(totals).toEqual({ ZAR: 150.01 });
    });

    it('should keep one total per currency in order of first appearance', () => {
      const totals = aggregator.aggregate([
        lineItem('A', 500),
        lineItem('B', 12, 'USD'),
        lineItem('C', 7695.0000000000009)
      ]);

      expect(totals).toEqual({ ZAR: 8195, USD: 12 });
      expect(Object.keys(totals)).toEqual(['ZAR', 'USD']);
    });

    it('should return no totals for no items', () => {
      expect(aggregator.aggregate([])).toEqual({});
    });
  });

  describe('roundLineItems', () => {
    it('should round amounts and keep the order and the other fields', () => {
      // Arrange
      const items = [lineItem('A', 100.005), lineItem('B', 50.004)];

      // Act
      const rounded = aggregator.roundLineItems(items);

      // Assert
      expect(rounded.map(item => [item.ruleId, item.baseAmount])).toEqual([
        ['A', 100.01],
        ['B', 50]
      ]);
      expect(rounded[0].calculation.formulaAmount).toBe(100.005);
      expect(items[0].baseAmount).toBe(100.005);
    });
  });
});
