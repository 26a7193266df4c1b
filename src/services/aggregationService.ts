import _ from 'lodash';
import moment from 'moment';
import {
  AggregationPair,
  Aggregator,
  DataView,
  GroupOrdering,
  HistogramBin,
  Measure,
  NUMERIC_COLUMNS,
  NumericColumn,
  OrderColumn,
  OrderRow,
  TimeSeriesPoint
} from '@/types/data';
import { MissingColumnError } from '@/utils/errors';
import { hasColumn } from './filterService';

export interface RankedGroup<T> {
  key: string;
  value: number;
  /** First row that fell into the group; used for display labels. */
  first: T;
}

interface Accumulator<T> {
  key: string;
  seen: number;
  first: T;
  sum: number;
  distinct: Set<string>;
}

/**
 * Group rows by key and reduce each group to one number, in a single pass.
 * Rows whose key is null belong to no group; null measures are not counted
 * as distinct values.
 *
 * With `desc` ordering groups are ranked by value, highest first; groups with
 * equal values keep the order in which their keys were first encountered.
 * `firstSeen` returns groups in encounter order.
 */
export function reduceGroups<T>(
  rows: readonly T[],
  keyFn: (row: T) => string | null,
  measureFn: (row: T) => number | string | null,
  aggregator: Aggregator,
  ordering: GroupOrdering = 'desc'
): RankedGroup<T>[] {
  const groups = new Map<string, Accumulator<T>>();

  for (const row of rows) {
    const key = keyFn(row);
    if (key === null) continue;
    let group = groups.get(key);
    if (!group) {
      group = { key, seen: groups.size, first: row, sum: 0, distinct: new Set() };
      groups.set(key, group);
    }
    const measure = measureFn(row);
    if (aggregator === 'sum') {
      group.sum += Number(measure);
    } else if (measure !== null) {
      group.distinct.add(String(measure));
    }
  }

  const reduced = [...groups.values()].map(group => ({
    key: group.key,
    seen: group.seen,
    first: group.first,
    value: aggregator === 'sum' ? group.sum : group.distinct.size
  }));

  const ordered = ordering === 'desc' ? _.orderBy(reduced, ['value', 'seen'], ['desc', 'asc']) : reduced;
  return ordered.map(({ key, value, first }) => ({ key, value, first }));
}

export function isNumericColumn(column: OrderColumn): column is NumericColumn {
  return NUMERIC_COLUMNS.some(c => c === column);
}

function measureValue(measure: Measure): (row: OrderRow) => number | string | null {
  if (measure.aggregator === 'sum') {
    const column = measure.column;
    return row => row[column];
  }
  const column = measure.column;
  return row => {
    const value = row[column];
    return value instanceof Date ? value.toISOString() : value;
  };
}

function groupKey(dimension: OrderColumn): (row: OrderRow) => string | null {
  return row => {
    const value = row[dimension];
    if (value instanceof Date) return moment.utc(value).format('YYYY-MM-DD');
    return value === null ? null : String(value);
  };
}

function requireColumns(view: DataView, operation: string, ...columns: OrderColumn[]) {
  for (const column of columns) {
    if (!hasColumn(view, column)) {
      throw new MissingColumnError(column, operation);
    }
  }
}

/**
 * Group the view by a dimension and reduce a measure per group, highest first.
 * Rows with no value for the dimension (blank id, missing date) are left out.
 * Throws MissingColumnError when either column is not in the dataset.
 */
export function aggregate(view: DataView, dimension: OrderColumn, measure: Measure, topN?: number): AggregationPair[] {
  requireColumns(view, 'aggregation', dimension, measure.column);

  const groups = reduceGroups(view.rows, groupKey(dimension), measureValue(measure), measure.aggregator);
  const limited = topN === undefined ? groups : _.take(groups, topN);
  return limited.map(({ key, value }) => ({ key, value }));
}

/**
 * One point per calendar day (UTC) that has orders, ascending. Rows without an
 * order date are left out.
 */
export function aggregateByDate(view: DataView, measure: Measure): TimeSeriesPoint[] {
  requireColumns(view, 'time series', 'orderDate', measure.column);

  const dated = view.rows.filter(row => row.orderDate !== null);
  const groups = reduceGroups(dated, groupKey('orderDate'), measureValue(measure), measure.aggregator, 'firstSeen');

  return _.sortBy(groups, 'key').map(({ key, value }) => ({ date: key, value }));
}

/**
 * Histogram of order values: line revenue summed per order id (rows without
 * an order id are left out), split into
 * equal-width bins between the smallest and largest order. The last bin is
 * closed on the right.
 */
export function orderValueDistribution(view: DataView, bins: number): HistogramBin[] {
  requireColumns(view, 'order value distribution', 'orderId', 'lineRevenue');

  const totals = reduceGroups(view.rows, row => row.orderId, row => row.lineRevenue, 'sum', 'firstSeen').map(g => g.value);
  if (totals.length === 0) return [];

  const min = _.min(totals) ?? 0;
  const max = _.max(totals) ?? 0;
  if (min === max || bins <= 1) {
    return [{ start: min, end: max, count: totals.length }];
  }

  const width = (max - min) / bins;
  const histogram: HistogramBin[] = _.range(bins).map(i => ({
    start: min + i * width,
    end: i === bins - 1 ? max : min + (i + 1) * width,
    count: 0
  }));

  for (const total of totals) {
    const index = Math.min(Math.floor((total - min) / width), bins - 1);
    histogram[index].count += 1;
  }
  return histogram;
}
