import { describe, it, expect } from '@jest/globals';
import { computeKpis } from '@/services/kpiService';
import { order, viewOf } from '../../helpers/orders';

describe('computeKpis', () => {
  it('should compute all five KPIs from one view', () => {
    const view = viewOf([
      order({ orderId: '1', customerId: 'C1', lineRevenue: 100, quantity: 2 }),
      order({ orderId: '1', customerId: 'C1', lineRevenue: 60, quantity: 3 }),
      order({ orderId: '2', customerId: 'C2', lineRevenue: 50, quantity: 1 }),
      order({ orderId: '3', customerId: 'C1', lineRevenue: 40, quantity: 4 })
    ]);

    expect(computeKpis(view)).toEqual({
      totalRevenue: 250,
      totalOrders: 3,
      uniqueCustomers: 2,
      totalQuantity: 10,
      avgTicket: 250 / 3
    });
  });

  it('should return zeros for an empty view', () => {
    expect(computeKpis(viewOf([]))).toEqual({
      totalRevenue: 0,
      totalOrders: 0,
      uniqueCustomers: 0,
      totalQuantity: 0,
      avgTicket: 0
    });
  });

  it('should keep rows without ids in the totals but not in the distinct counts', () => {
    const view = viewOf([
      order({ orderId: '1', customerId: 'C1', customerName: 'Ana', lineRevenue: 100, quantity: 1 }),
      order({ lineRevenue: 150, quantity: 2 }),
      order({ lineRevenue: 150, quantity: 3 })
    ]);

    expect(computeKpis(view)).toEqual({
      totalRevenue: 400,
      totalOrders: 1,
      uniqueCustomers: 1,
      totalQuantity: 6,
      avgTicket: 400
    });
  });

  it('should not divide by zero when no row has an order id', () => {
    const kpis = computeKpis(viewOf([order({ lineRevenue: 10 })]));
    expect(kpis.totalOrders).toBe(0);
    expect(kpis.avgTicket).toBe(0);
  });

  it('should keep the average ticket equal to revenue over orders', () => {
    const view = viewOf([
      order({ orderId: 'a', lineRevenue: 19.99 }),
      order({ orderId: 'b', lineRevenue: 5.01 }),
      order({ orderId: 'b', lineRevenue: 7 })
    ]);
    const kpis = computeKpis(view);
    expect(kpis.avgTicket * kpis.totalOrders).toBeCloseTo(kpis.totalRevenue, 10);
  });
});
