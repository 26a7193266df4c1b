import _ from 'lodash';
import moment from 'moment';
import {
  AggregationPair,
  ALL,
  CustomerGrouping,
  DashboardSnapshot,
  DataHealth,
  DataView,
  FetchMeta,
  FILTER_COLUMNS,
  FilterColumn,
  FilterOptionLists,
  FilterOptions,
  HistogramBin,
  InsightSet,
  KpiSet,
  Measure,
  OrderColumn,
  OrderTable,
  TimeSeriesPoint
} from '@/types/data';
import { config } from '@/utils/config';
import { logger } from '@/utils/logger';
import { aggregate, aggregateByDate, orderValueDistribution } from './aggregationService';
import { CacheService } from './cacheService';
import { DatasetService, getDatasetService } from './datasetService';
import { applyFilters, hasColumn } from './filterService';
import { computeInsights } from './insightService';
import { computeKpis } from './kpiService';

export interface AnalyticsOptions {
  cacheTtlSeconds: number;
  cacheMaxEntries: number;
  topNDefaultLimit: number;
  orderValueBins: number;
  customerGrouping: CustomerGrouping;
}

const REVENUE: Measure = { column: 'lineRevenue', aggregator: 'sum' };
const QUANTITY: Measure = { column: 'quantity', aggregator: 'sum' };

const OPTION_LIST_KEYS: Record<FilterColumn, keyof Omit<FilterOptionLists, 'dateBounds'>> = {
  productName: 'products',
  category: 'categories',
  state: 'states',
  gender: 'genders'
};

export class AnalyticsService {
  private views: CacheService<DataView>;
  private dashboards: CacheService<DashboardSnapshot>;

  constructor(private readonly dataset: DatasetService, private readonly options: AnalyticsOptions) {
    this.views = new CacheService<DataView>('views', options.cacheTtlSeconds, options.cacheMaxEntries);
    this.dashboards = new CacheService<DashboardSnapshot>('dashboards', options.cacheTtlSeconds, options.cacheMaxEntries);
  }

  private cacheKey(table: OrderTable, filters: FilterOptions): string {
    return `${table.version}_${JSON.stringify(filters)}`;
  }

  /**
   * Get the filtered view for the current snapshot
   */
  async getFilteredView(filters: FilterOptions): Promise<DataView> {
    const table = await this.dataset.getTable();
    return this.viewFor(table, filters);
  }

  private async viewFor(table: OrderTable, filters: FilterOptions): Promise<DataView> {
    const key = this.cacheKey(table, filters);
    const cached = await this.views.get(key);
    if (cached) {
      return cached;
    }
    const view = applyFilters(table, filters);
    await this.views.set(key, view);
    return view;
  }

  /**
   * Everything the dashboard shows, computed from one filtered view.
   */
  async getDashboard(filters: FilterOptions): Promise<DashboardSnapshot> {
    const table = await this.dataset.getTable();
    const key = this.cacheKey(table, filters);

    const cached = await this.dashboards.get(key);
    if (cached) {
      return cached;
    }

    const view = await this.viewFor(table, filters);
    const topN = this.options.topNDefaultLimit;

    const snapshot: DashboardSnapshot = {
      datasetVersion: table.version,
      filteredRecords: view.rows.length,
      kpis: computeKpis(view),
      charts: {
        revenueOverTime: hasColumn(view, 'orderDate') ? aggregateByDate(view, REVENUE) : [],
        revenueByCategory: aggregate(view, 'category', REVENUE),
        topProductsByRevenue: aggregate(view, 'productName', REVENUE, topN),
        topProductsByQuantity: aggregate(view, 'productName', QUANTITY, topN),
        revenueByState: aggregate(view, 'state', REVENUE),
        revenueByGender: _.sortBy(aggregate(view, 'gender', REVENUE), 'key'),
        orderValueDistribution: orderValueDistribution(view, this.options.orderValueBins)
      },
      insights: computeInsights(view, { customerGrouping: this.options.customerGrouping })
    };

    logger.debug('Dashboard computed', { version: table.version, rows: view.rows.length });
    await this.dashboards.set(key, snapshot);
    return snapshot;
  }

  async getKpis(filters: FilterOptions): Promise<KpiSet> {
    return computeKpis(await this.getFilteredView(filters));
  }

  async getInsights(filters: FilterOptions): Promise<InsightSet> {
    const view = await this.getFilteredView(filters);
    return computeInsights(view, { customerGrouping: this.options.customerGrouping });
  }

  async getAggregation(filters: FilterOptions, dimension: OrderColumn, measure: Measure, limit?: number): Promise<AggregationPair[]> {
    return aggregate(await this.getFilteredView(filters), dimension, measure, limit);
  }

  async getRevenueTrend(filters: FilterOptions): Promise<TimeSeriesPoint[]> {
    return aggregateByDate(await this.getFilteredView(filters), REVENUE);
  }

  async getOrderValueDistribution(filters: FilterOptions, bins: number = this.options.orderValueBins): Promise<HistogramBin[]> {
    return orderValueDistribution(await this.getFilteredView(filters), bins);
  }

  /**
   * Values offered by each filter. The lists cascade: the date range narrows
   * the products, the product choice narrows the categories, and so on down
   * to gender.
   */
  async getFilterOptions(filters: FilterOptions): Promise<FilterOptionLists> {
    const table = await this.dataset.getTable();

    const dates = table.rows.map(r => r.orderDate).filter((d): d is Date => d !== null);
    const dateBounds =
      hasColumn(table, 'orderDate') && dates.length
        ? {
            min: moment.utc(_.minBy(dates, d => d.getTime())).format('YYYY-MM-DD'),
            max: moment.utc(_.maxBy(dates, d => d.getTime())).format('YYYY-MM-DD')
          }
        : null;

    const lists: FilterOptionLists = { products: [], categories: [], states: [], genders: [], dateBounds };
    let view = applyFilters(table, { dateRange: filters.dateRange });

    for (const column of FILTER_COLUMNS) {
      if (hasColumn(table, column)) {
        const values = _.uniq(view.rows.map(r => r[column])).sort();
        lists[OPTION_LIST_KEYS[column]] = [ALL, ...values];
      }
      const choice = filters.categoricalEquals?.[column];
      if (choice !== undefined && choice !== ALL) {
        view = applyFilters(view, { categoricalEquals: { [column]: choice } });
      }
    }

    return lists;
  }

  getFetchMeta(): FetchMeta {
    return this.dataset.getLastFetchMeta();
  }

  async getDataHealth(): Promise<DataHealth> {
    return this.dataset.getDataHealth();
  }

  /**
   * Reload the dataset and drop every cached result of the old snapshot.
   */
  async reload(): Promise<OrderTable> {
    const table = await this.dataset.reload();
    await this.views.clear();
    await this.dashboards.clear();
    return table;
  }
}

// Lazy initialization to ensure environment variables are loaded
let _analyticsService: AnalyticsService | null = null;

export const getAnalyticsService = (): AnalyticsService => {
  if (!_analyticsService) {
    _analyticsService = new AnalyticsService(getDatasetService(), {
      cacheTtlSeconds: config.cacheTtlSeconds,
      cacheMaxEntries: config.cacheMaxEntries,
      topNDefaultLimit: config.topNDefaultLimit,
      orderValueBins: config.orderValueBins,
      customerGrouping: config.customerInsightGrouping
    });
  }
  return _analyticsService;
};
