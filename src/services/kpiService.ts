import _ from 'lodash';
import { DataView, KpiSet } from '@/types/data';

function countDistinct(values: (string | null)[]): number {
  return new Set(values.filter(v => v !== null)).size;
}

/**
 * Calculate the headline KPIs for a view. All five numbers come from the same
 * rows; an empty view gives all zeros. Rows without an order or customer id
 * add to revenue and quantity but not to the distinct counts.
 */
export function computeKpis(view: DataView): KpiSet {
  const rows = view.rows;
  const totalRevenue = _.sumBy(rows, 'lineRevenue');
  const totalOrders = countDistinct(rows.map(r => r.orderId));
  const uniqueCustomers = countDistinct(rows.map(r => r.customerId));
  const totalQuantity = _.sumBy(rows, 'quantity');
  const avgTicket = totalOrders > 0 ? totalRevenue / totalOrders : 0;

  return {
    totalRevenue,
    totalOrders,
    uniqueCustomers,
    totalQuantity,
    avgTicket
  };
}
