import Joi from 'joi';
import { AnalyticsService, getAnalyticsService } from '@/services/analyticsService';
import { isNumericColumn } from '@/services/aggregationService';
import {
  Aggregator,
  ApiResponse,
  ErrorResponse,
  FilterColumn,
  FilterOptions,
  Measure,
  NUMERIC_COLUMNS,
  ORDER_COLUMNS,
  OrderColumn
} from '@/types/data';
import { AppError, InvalidQueryError } from '@/utils/errors';
import { logger } from '@/utils/logger';

/** The part of an express request the dashboard handlers read. */
export interface QueryRequest {
  query: unknown;
}

export interface JsonResponse {
  setHeader(name: string, value: string): unknown;
  status(code: number): JsonResponse;
  json(body: unknown): unknown;
}

export interface DashboardQuery {
  startDate?: Date;
  endDate?: Date;
  product?: string;
  category?: string;
  state?: string;
  gender?: string;
  minRevenue?: number;
  dimension?: OrderColumn;
  measure?: OrderColumn;
  reduction?: Aggregator;
  limit?: number;
  bins?: number;
}

const querySchema = Joi.object<DashboardQuery>({
  startDate: Joi.date().iso(),
  endDate: Joi.date().iso(),
  product: Joi.string().trim().min(1),
  category: Joi.string().trim().min(1),
  state: Joi.string().trim().min(1),
  gender: Joi.string().trim().min(1),
  minRevenue: Joi.number().min(0),
  dimension: Joi.string().valid(...ORDER_COLUMNS),
  reduction: Joi.string().valid('sum', 'countDistinct'),
  measure: Joi.when('reduction', {
    is: 'countDistinct',
    then: Joi.string().valid(...ORDER_COLUMNS),
    otherwise: Joi.string().valid(...NUMERIC_COLUMNS)
  }),
  limit: Joi.number().integer().min(1).max(1000),
  bins: Joi.number().integer().min(1).max(500)
})
  .and('startDate', 'endDate')
  .unknown(true);

/**
 * Validate and convert the dashboard query string.
 */
export function parseDashboardQuery(query: unknown): DashboardQuery {
  const { error, value } = querySchema.validate(query, { abortEarly: false, convert: true });
  if (error) {
    throw new InvalidQueryError(error.details.map(d => d.message));
  }
  return value;
}

export function toFilterOptions(query: DashboardQuery): FilterOptions {
  const filters: FilterOptions = {};

  if (query.startDate && query.endDate) {
    filters.dateRange = { start: query.startDate, end: query.endDate };
  }

  const equals: Partial<Record<FilterColumn, string>> = {};
  if (query.product) equals.productName = query.product;
  if (query.category) equals.category = query.category;
  if (query.state) equals.state = query.state;
  if (query.gender) equals.gender = query.gender;
  if (Object.keys(equals).length) {
    filters.categoricalEquals = equals;
  }

  if (query.minRevenue !== undefined) {
    filters.minRevenue = query.minRevenue;
  }
  return filters;
}

function toMeasure(query: DashboardQuery): Measure {
  const column = query.measure || 'lineRevenue';
  if (query.reduction === 'countDistinct') {
    return { column, aggregator: 'countDistinct' };
  }
  if (!isNumericColumn(column)) {
    throw new InvalidQueryError([`"measure" must be a numeric column when summing`]);
  }
  return { column, aggregator: 'sum' };
}

export class DashboardController {
  constructor(private readonly resolveService: () => AnalyticsService = getAnalyticsService) {}

  private get analytics(): AnalyticsService {
    return this.resolveService();
  }

  private send<T>(res: JsonResponse, data: T) {
    const meta = this.analytics.getFetchMeta();
    res.setHeader('x-data-source', meta.source);
    res.setHeader('x-row-count', String(meta.rowCount));
    res.setHeader('x-last-updated', meta.lastUpdated);
    const body: ApiResponse<T> = { success: true, data };
    res.json(body);
  }

  private fail(res: JsonResponse, error: unknown, code: string, message: string) {
    if (error instanceof AppError) {
      const body: ErrorResponse = {
        success: false,
        error: { code: error.code, message: error.message, ...(error.details !== undefined && { details: error.details }) }
      };
      if (error.status >= 500) {
        logger.error(`${message}:`, error);
      } else {
        logger.warn(`${message}: ${error.message}`, { code: error.code });
      }
      res.status(error.status).json(body);
      return;
    }

    logger.error(`${message}:`, error);
    const body: ErrorResponse = {
      success: false,
      error: {
        code,
        message,
        details: error instanceof Error ? error.message : 'Unknown error'
      }
    };
    res.status(500).json(body);
  }

  /**
   * Get the full dashboard: KPIs, chart series and insights
   */
  async getDashboardOverview(req: QueryRequest, res: JsonResponse) {
    try {
      logger.info('Getting dashboard overview');
      const filters = toFilterOptions(parseDashboardQuery(req.query));
      const dashboard = await this.analytics.getDashboard(filters);
      this.send(res, dashboard);
    } catch (error) {
      this.fail(res, error, 'DASHBOARD_ERROR', 'Failed to get dashboard overview');
    }
  }

  async getKpis(req: QueryRequest, res: JsonResponse) {
    try {
      const filters = toFilterOptions(parseDashboardQuery(req.query));
      this.send(res, await this.analytics.getKpis(filters));
    } catch (error) {
      this.fail(res, error, 'KPI_ERROR', 'Failed to get KPIs');
    }
  }

  async getInsights(req: QueryRequest, res: JsonResponse) {
    try {
      const filters = toFilterOptions(parseDashboardQuery(req.query));
      this.send(res, await this.analytics.getInsights(filters));
    } catch (error) {
      this.fail(res, error, 'INSIGHTS_ERROR', 'Failed to get insights');
    }
  }

  /**
   * Ranked groups for any dimension and measure
   */
  async getAggregation(req: QueryRequest, res: JsonResponse) {
    try {
      const query = parseDashboardQuery(req.query);
      if (!query.dimension) {
        throw new InvalidQueryError(['"dimension" is required']);
      }
      const data = await this.analytics.getAggregation(toFilterOptions(query), query.dimension, toMeasure(query), query.limit);
      this.send(res, data);
    } catch (error) {
      this.fail(res, error, 'AGGREGATION_ERROR', 'Failed to aggregate data');
    }
  }

  async getTrend(req: QueryRequest, res: JsonResponse) {
    try {
      const filters = toFilterOptions(parseDashboardQuery(req.query));
      this.send(res, await this.analytics.getRevenueTrend(filters));
    } catch (error) {
      this.fail(res, error, 'TREND_ERROR', 'Failed to get revenue trend');
    }
  }

  async getOrderValues(req: QueryRequest, res: JsonResponse) {
    try {
      const query = parseDashboardQuery(req.query);
      this.send(res, await this.analytics.getOrderValueDistribution(toFilterOptions(query), query.bins));
    } catch (error) {
      this.fail(res, error, 'ORDER_VALUES_ERROR', 'Failed to get order value distribution');
    }
  }

  async getFilterOptions(req: QueryRequest, res: JsonResponse) {
    try {
      const filters = toFilterOptions(parseDashboardQuery(req.query));
      this.send(res, await this.analytics.getFilterOptions(filters));
    } catch (error) {
      this.fail(res, error, 'FILTER_OPTIONS_ERROR', 'Failed to get filter options');
    }
  }

  async getDataHealth(_req: QueryRequest, res: JsonResponse) {
    try {
      this.send(res, await this.analytics.getDataHealth());
    } catch (error) {
      this.fail(res, error, 'DATA_HEALTH_ERROR', 'Failed to get data health');
    }
  }

  async reload(_req: QueryRequest, res: JsonResponse) {
    try {
      logger.info('Reloading dataset');
      const table = await this.analytics.reload();
      this.send(res, {
        version: table.version,
        source: table.source,
        rowCount: table.rows.length,
        loadedAt: table.loadedAt
      });
    } catch (error) {
      this.fail(res, error, 'RELOAD_ERROR', 'Failed to reload dataset');
    }
  }
}

export const dashboardController = new DashboardController();
