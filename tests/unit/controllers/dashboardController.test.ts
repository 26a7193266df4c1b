import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { DashboardController, parseDashboardQuery, toFilterOptions } from '@/controllers/dashboardController';
import { AnalyticsService } from '@/services/analyticsService';
import { DatasetService } from '@/services/datasetService';
import { InvalidQueryError } from '@/utils/errors';
import { FakeResponse } from '../../helpers/http';
import { aliases, day, MemorySource, SAMPLE_CSV } from '../../helpers/orders';

describe('parseDashboardQuery', () => {
  it('should convert and trim query string values', () => {
    const query = parseDashboardQuery({
      startDate: '2024-03-01',
      endDate: '2024-03-02',
      product: '  Lamp  ',
      minRevenue: '12.5',
      limit: '3'
    });

    expect(query).toEqual({
      startDate: day('2024-03-01'),
      endDate: day('2024-03-02'),
      product: 'Lamp',
      minRevenue: 12.5,
      limit: 3
    });
  });

  it('should ignore unknown parameters', () => {
    expect(parseDashboardQuery({ utm_source: 'mail' })).toEqual({ utm_source: 'mail' });
  });

  it('should require both ends of a date range', () => {
    expect(() => parseDashboardQuery({ startDate: '2024-03-01' })).toThrow(InvalidQueryError);
  });

  it('should reject out-of-range numbers', () => {
    expect(() => parseDashboardQuery({ minRevenue: '-1' })).toThrow(InvalidQueryError);
    expect(() => parseDashboardQuery({ limit: '0' })).toThrow(InvalidQueryError);
  });

  it('should only allow numeric measures when summing', () => {
    expect(() => parseDashboardQuery({ dimension: 'state', measure: 'category' })).toThrow(InvalidQueryError);
    expect(parseDashboardQuery({ dimension: 'state', measure: 'category', reduction: 'countDistinct' })).toEqual({
      dimension: 'state',
      measure: 'category',
      reduction: 'countDistinct'
    });
  });
});

describe('toFilterOptions', () => {
  it('should map query parameters onto filter options', () => {
    expect(
      toFilterOptions({ startDate: day('2024-03-01'), endDate: day('2024-03-02'), product: 'Lamp', gender: 'F', minRevenue: 0 })
    ).toEqual({
      dateRange: { start: day('2024-03-01'), end: day('2024-03-02') },
      categoricalEquals: { productName: 'Lamp', gender: 'F' },
      minRevenue: 0
    });
  });

  it('should produce no options for an empty query', () => {
    expect(toFilterOptions({})).toEqual({});
  });
});

describe('DashboardController', () => {
  let source: MemorySource;
  let analytics: AnalyticsService;
  let controller: DashboardController;
  let res: FakeResponse;

  beforeEach(() => {
    source = new MemorySource(SAMPLE_CSV);
    analytics = new AnalyticsService(new DatasetService(source, aliases), {
      cacheTtlSeconds: 60,
      cacheMaxEntries: 100,
      topNDefaultLimit: 10,
      orderValueBins: 50,
      customerGrouping: 'pair'
    });
    controller = new DashboardController(() => analytics);
    res = new FakeResponse();
  });

  it('should return KPIs with data source headers', async () => {
    await controller.getKpis({ query: { minRevenue: '75' } }, res);

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({
      success: true,
      data: { totalRevenue: 300, totalOrders: 3, uniqueCustomers: 2, totalQuantity: 7, avgTicket: 100 }
    });
    expect(res.headers['x-data-source']).toBe('memory:test');
    expect(res.headers['x-row-count']).toBe('5');
  });

  it('should filter the overview by product', async () => {
    await controller.getDashboardOverview({ query: { product: 'Lamp' } }, res);

    expect(res.body).toMatchObject({
      success: true,
      data: { filteredRecords: 2, kpis: { totalRevenue: 150, totalOrders: 2 } }
    });
  });

  it('should answer 400 for an invalid query', async () => {
    await controller.getKpis({ query: { startDate: '2024-03-01' } }, res);

    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({ success: false, error: { code: 'INVALID_QUERY', message: 'Invalid query parameters' } });
  });

  it('should require a dimension for aggregation', async () => {
    await controller.getAggregation({ query: {} }, res);

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({
      success: false,
      error: { code: 'INVALID_QUERY', message: 'Invalid query parameters', details: ['"dimension" is required'] }
    });
  });

  it('should aggregate revenue by state with a limit', async () => {
    await controller.getAggregation({ query: { dimension: 'state', limit: '2' } }, res);

    expect(res.body).toEqual({
      success: true,
      data: [
        { key: 'SP', value: 240 },
        { key: 'MG', value: 120 }
      ]
    });
  });

  it('should count distinct customers per category', async () => {
    await controller.getAggregation({ query: { dimension: 'category', reduction: 'countDistinct', measure: 'customerId' } }, res);

    expect(res.body).toEqual({
      success: true,
      data: [
        { key: 'Home', value: 2 },
        { key: 'Kitchen', value: 2 }
      ]
    });
  });

  it('should answer 422 when the dimension column is missing from the file', async () => {
    await controller.getAggregation({ query: { dimension: 'registrationDate' } }, res);

    expect(res.statusCode).toBe(422);
    expect(res.body).toEqual({
      success: false,
      error: {
        code: 'MISSING_COLUMN',
        message: 'Column "registrationDate" is not present in the dataset (required by aggregation)',
        details: { column: 'registrationDate', operation: 'aggregation' }
      }
    });
  });

  it('should return the revenue trend for a category', async () => {
    await controller.getTrend({ query: { category: 'Kitchen' } }, res);

    expect(res.body).toEqual({
      success: true,
      data: [
        { date: '2024-03-01', value: 60 },
        { date: '2024-03-05', value: 120 }
      ]
    });
  });

  it('should return the order value histogram with the requested bins', async () => {
    await controller.getOrderValues({ query: { bins: '1' } }, res);
    expect(res.body).toEqual({ success: true, data: [{ start: 50, end: 160, count: 4 }] });
  });

  it('should return filter options', async () => {
    await controller.getFilterOptions({ query: { state: 'SP' } }, res);

    expect(res.body).toMatchObject({
      success: true,
      data: { states: ['All', 'MG', 'RJ', 'SP'], genders: ['All', 'F'] }
    });
  });

  it('should report data health', async () => {
    await controller.getDataHealth({ query: {} }, res);
    expect(res.body).toMatchObject({ success: true, data: { sourceChanged: false, meta: { rowCount: 5 } } });
  });

  it('should reload the dataset', async () => {
    await controller.reload({ query: {} }, res);

    const meta = analytics.getFetchMeta();
    expect(res.body).toEqual({
      success: true,
      data: { version: meta.version, source: 'memory:test', rowCount: 5, loadedAt: meta.lastUpdated }
    });
  });

  it('should answer 503 when the source cannot be read', async () => {
    jest.spyOn(source, 'open').mockRejectedValueOnce(new Error('blob not found'));
    await controller.reload({ query: {} }, res);

    expect(res.statusCode).toBe(503);
    expect(res.body).toEqual({
      success: false,
      error: { code: 'DATASET_UNAVAILABLE', message: 'Dataset could not be loaded from memory:test', details: 'blob not found' }
    });
  });

  it('should wrap unexpected failures in the handler error code', async () => {
    jest.spyOn(analytics, 'getKpis').mockRejectedValueOnce(new Error('boom'));
    await controller.getKpis({ query: {} }, res);

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({
      success: false,
      error: { code: 'KPI_ERROR', message: 'Failed to get KPIs', details: 'boom' }
    });
  });
});
