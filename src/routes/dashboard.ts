import { Router } from 'express';
import { dashboardController, JsonResponse, parseDashboardQuery, QueryRequest } from '@/controllers/dashboardController';
import { ErrorResponse } from '@/types/data';
import { InvalidQueryError } from '@/utils/errors';

const router = Router();

/**
 * Reject a malformed query string before it reaches a handler.
 */
export function validateQuery(req: QueryRequest, res: JsonResponse, next: (error?: unknown) => void) {
  try {
    parseDashboardQuery(req.query);
  } catch (error) {
    if (error instanceof InvalidQueryError) {
      const body: ErrorResponse = { success: false, error: { code: error.code, message: error.message, details: error.details } };
      res.status(error.status).json(body);
      return;
    }
    next(error);
    return;
  }
  next();
}

/**
 * @route GET /api/v1/dashboard/overview
 * @desc Get KPIs, chart series and insights for the filtered orders
 * @access Public
 */
router.get('/overview', validateQuery, dashboardController.getDashboardOverview.bind(dashboardController));

/**
 * @route GET /api/v1/dashboard/kpis
 * @desc Get total revenue, orders, customers, quantity and average ticket
 * @access Public
 */
router.get('/kpis', validateQuery, dashboardController.getKpis.bind(dashboardController));

/**
 * @route GET /api/v1/dashboard/insights
 * @desc Get best-selling product, top category, state, age bracket and customer
 * @access Public
 */
router.get('/insights', validateQuery, dashboardController.getInsights.bind(dashboardController));

/**
 * @route GET /api/v1/dashboard/aggregate
 * @desc Get ranked groups for a dimension and measure
 * @access Public
 */
router.get('/aggregate', validateQuery, dashboardController.getAggregation.bind(dashboardController));

/**
 * @route GET /api/v1/dashboard/trend
 * @desc Get daily revenue time series
 * @access Public
 */
router.get('/trend', validateQuery, dashboardController.getTrend.bind(dashboardController));

/**
 * @route GET /api/v1/dashboard/order-values
 * @desc Get histogram of order values
 * @access Public
 */
router.get('/order-values', validateQuery, dashboardController.getOrderValues.bind(dashboardController));

/**
 * @route GET /api/v1/dashboard/filter-options
 * @desc Get available filter options for all dimensions
 * @access Public
 */
router.get('/filter-options', validateQuery, dashboardController.getFilterOptions.bind(dashboardController));

/**
 * @route GET /api/v1/dashboard/data-health
 * @desc Get dataset schema and load information
 * @access Public
 */
router.get('/data-health', dashboardController.getDataHealth.bind(dashboardController));

/**
 * @route POST /api/v1/dashboard/reload
 * @desc Reload the dataset from its source
 * @access Public
 */
router.post('/reload', dashboardController.reload.bind(dashboardController));

export default router;
