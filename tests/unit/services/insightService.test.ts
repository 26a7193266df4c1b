import { describe, it, expect } from '@jest/globals';
import { computeInsights } from '@/services/insightService';
import { ORDER_COLUMNS } from '@/types/data';
import { MissingColumnError } from '@/utils/errors';
import { order, viewOf } from '../../helpers/orders';

describe('computeInsights', () => {
  it('should pick the best seller by quantity, not revenue', () => {
    const view = viewOf([
      order({ orderId: '1', productName: 'A', category: 'X', lineRevenue: 100, quantity: 2 }),
      order({ orderId: '2', productName: 'B', category: 'X', lineRevenue: 50, quantity: 5 })
    ]);
    const insights = computeInsights(view);

    expect(insights.bestSellingProduct).toEqual({ name: 'B', value: 5, metric: 'quantity' });
    expect(insights.mostProfitableCategory).toEqual({ name: 'X', value: 150, metric: 'revenue' });
  });

  it('should rank states and age brackets by revenue', () => {
    const view = viewOf([
      order({ orderId: '1', state: 'SP', ageBracket: '25-34', lineRevenue: 30 }),
      order({ orderId: '2', state: 'RJ', ageBracket: '18-24', lineRevenue: 45 }),
      order({ orderId: '3', state: 'SP', ageBracket: '18-24', lineRevenue: 20 })
    ]);
    const insights = computeInsights(view);

    expect(insights.highestRevenueState).toEqual({ name: 'SP', value: 50, metric: 'revenue' });
    expect(insights.highestSpendingAgeBracket).toEqual({ name: '18-24', value: 65, metric: 'revenue' });
  });

  it('should let the first-seen group win a tie', () => {
    const view = viewOf([
      order({ orderId: '1', category: 'Toys', lineRevenue: 40 }),
      order({ orderId: '2', category: 'Books', lineRevenue: 40 })
    ]);
    expect(computeInsights(view).mostProfitableCategory.name).toBe('Toys');
  });

  it('should group customers by id and name by default', () => {
    const view = viewOf([
      order({ orderId: '1', customerId: 'C1', customerName: 'Ana', lineRevenue: 50 }),
      order({ orderId: '2', customerId: 'C1', customerName: 'ANA', lineRevenue: 60 }),
      order({ orderId: '3', customerId: 'C2', customerName: 'Bia', lineRevenue: 100 })
    ]);
    expect(computeInsights(view).topCustomer).toEqual({ name: 'Bia', customerId: 'C2', value: 100, metric: 'revenue' });
  });

  it('should group customers by id alone when asked to', () => {
    const view = viewOf([
      order({ orderId: '1', customerId: 'C1', customerName: 'Ana', lineRevenue: 50 }),
      order({ orderId: '2', customerId: 'C1', customerName: 'ANA', lineRevenue: 60 }),
      order({ orderId: '3', customerId: 'C2', customerName: 'Bia', lineRevenue: 100 })
    ]);
    expect(computeInsights(view, { customerGrouping: 'id' }).topCustomer).toEqual({
      name: 'Ana',
      customerId: 'C1',
      value: 110,
      metric: 'revenue'
    });
  });

  it('should never pick rows without a customer id or name as the top customer', () => {
    const view = viewOf([
      order({ orderId: '1', customerId: 'C1', customerName: 'Ana', lineRevenue: 100 }),
      order({ lineRevenue: 150 }),
      order({ lineRevenue: 150 }),
      order({ orderId: '4', customerId: 'C2', lineRevenue: 120 })
    ]);

    expect(computeInsights(view).topCustomer).toEqual({ name: 'Ana', customerId: 'C1', value: 100, metric: 'revenue' });
    expect(computeInsights(view, { customerGrouping: 'id' }).topCustomer).toEqual({
      name: 'N/A',
      customerId: 'C2',
      value: 120,
      metric: 'revenue'
    });
  });

  it('should return sentinels for an empty view', () => {
    expect(computeInsights(viewOf([]))).toEqual({
      bestSellingProduct: { name: 'N/A', value: 0, metric: 'quantity' },
      mostProfitableCategory: { name: 'N/A', value: 0, metric: 'revenue' },
      highestRevenueState: { name: 'N/A', value: 0, metric: 'revenue' },
      highestSpendingAgeBracket: { name: 'N/A', value: 0, metric: 'revenue' },
      topCustomer: { name: 'N/A', customerId: 'N/A', value: 0, metric: 'revenue' }
    });
  });

  it('should raise when a required column is missing', () => {
    const view = viewOf([order({ lineRevenue: 1 })], ORDER_COLUMNS.filter(col => col !== 'customerName'));
    expect(() => computeInsights(view)).toThrow(MissingColumnError);
  });
});
