import moment from 'moment';
import { ALL, DataView, FILTER_COLUMNS, FilterOptions, OrderColumn } from '@/types/data';
import { MissingColumnError } from '@/utils/errors';

export function hasColumn(view: DataView, column: OrderColumn): boolean {
  return view.columns.includes(column);
}

/**
 * Apply filters to data.
 *
 * Every option narrows the rows further (logical AND). The input view is never
 * touched; the result is a new array holding the surviving rows in their
 * original order, so applying the same options twice gives the same rows.
 */
export function applyFilters(view: DataView, options: FilterOptions): DataView {
  let filtered = view.rows.slice();

  // Calendar-day range, both ends inclusive. Skipped when the file has no order date.
  if (options.dateRange && hasColumn(view, 'orderDate')) {
    const start = moment.utc(options.dateRange.start).startOf('day').valueOf();
    const end = moment.utc(options.dateRange.end).endOf('day').valueOf();
    filtered = filtered.filter(row => {
      if (!row.orderDate) return false;
      const time = row.orderDate.getTime();
      return time >= start && time <= end;
    });
  }

  const equals = options.categoricalEquals || {};
  for (const column of FILTER_COLUMNS) {
    const value = equals[column];
    if (value === undefined || value === ALL || !hasColumn(view, column)) {
      continue;
    }
    filtered = filtered.filter(row => row[column] === value);
  }

  if (options.minRevenue !== undefined) {
    if (!hasColumn(view, 'lineRevenue')) {
      throw new MissingColumnError('lineRevenue', 'minimum revenue filter');
    }
    const threshold = options.minRevenue;
    filtered = filtered.filter(row => row.lineRevenue >= threshold);
  }

  return { columns: view.columns, rows: filtered };
}
