import {
  CustomerGrouping,
  CustomerInsight,
  DataView,
  FilterColumn,
  Insight,
  InsightSet,
  Measure,
  NOT_AVAILABLE,
  OrderRow
} from '@/types/data';
import { MissingColumnError } from '@/utils/errors';
import { aggregate, reduceGroups } from './aggregationService';
import { hasColumn } from './filterService';

export interface InsightOptions {
  customerGrouping?: CustomerGrouping;
}

const REVENUE: Measure = { column: 'lineRevenue', aggregator: 'sum' };
const QUANTITY: Measure = { column: 'quantity', aggregator: 'sum' };

// Highest group wins; on a tie the group seen first in the view wins.
function top(view: DataView, dimension: FilterColumn | 'ageBracket', measure: Measure): Insight {
  const [best] = aggregate(view, dimension, measure, 1);
  const metric = measure.column === 'quantity' ? 'quantity' : 'revenue';
  return best ? { name: best.key, value: best.value, metric } : { name: NOT_AVAILABLE, value: 0, metric };
}

/**
 * Top customer by total spend.
 *
 * `pair` groups by (customer id, customer name), so an id recorded under two
 * spellings counts as two customers. `id` groups by id only and shows the
 * name from the first row of that customer. Rows missing a grouping field
 * belong to no customer.
 */
function topCustomer(view: DataView, grouping: CustomerGrouping): CustomerInsight {
  for (const column of ['customerId', 'customerName', 'lineRevenue'] as const) {
    if (!hasColumn(view, column)) {
      throw new MissingColumnError(column, 'top customer insight');
    }
  }

  const keyFn =
    grouping === 'id'
      ? (row: OrderRow) => row.customerId
      : (row: OrderRow) =>
          row.customerId === null || row.customerName === null ? null : JSON.stringify([row.customerId, row.customerName]);

  const [best] = reduceGroups(view.rows, keyFn, row => row.lineRevenue, 'sum');
  if (!best) {
    return { name: NOT_AVAILABLE, customerId: NOT_AVAILABLE, value: 0, metric: 'revenue' };
  }
  return {
    name: best.first.customerName ?? NOT_AVAILABLE,
    customerId: best.first.customerId ?? NOT_AVAILABLE,
    value: best.value,
    metric: 'revenue'
  };
}

/**
 * Compute the five headline insights for a view. An empty view yields the
 * "N/A" / 0 sentinel for each of them.
 */
export function computeInsights(view: DataView, options: InsightOptions = {}): InsightSet {
  return {
    bestSellingProduct: top(view, 'productName', QUANTITY),
    mostProfitableCategory: top(view, 'category', REVENUE),
    highestRevenueState: top(view, 'state', REVENUE),
    highestSpendingAgeBracket: top(view, 'ageBracket', REVENUE),
    topCustomer: topCustomer(view, options.customerGrouping || 'pair')
  };
}
