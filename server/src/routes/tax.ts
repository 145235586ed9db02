import { Router, Request, Response, NextFunction } from 'express';
import { parseSalaryComponents } from '../services/taxInputSchema.js';
import { calculateSalariedTax } from '../services/taxCalculator.js';
import { buildTaxReport, renderReportMarkdown } from '../services/taxReport.js';
import { recordInvalidInput } from '../services/metrics.js';
import { createRouteLogger } from '../services/logger.js';
import { calculationLimiter } from '../middleware/rateLimit.js';
import { SALARIED_TAX_SLABS } from '../tax/slabs.js';
import { SALARY_FIELDS } from '../tax/salaryFields.js';
import { TaxInputError } from '../utils/AppError.js';
import { sendSuccess } from '../utils/response.js';

const router = Router();
const log = createRouteLogger('tax');

/**
 * @swagger
 * /api/v1/tax/calculate:
 *   post:
 *     summary: Calculate annual and monthly salaried income tax
 *     tags: [Tax]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/SalaryComponents'
 *     responses:
 *       200:
 *         description: Calculation with the four report blocks rendered as Markdown
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/TaxCalculationResponse'
 *       400:
 *         description: One or more fields are not valid numbers
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/Error'
 */
export function calculateTax(req: Request, res: Response, next: NextFunction): void {
  try {
    const components = parseSalaryComponents(req.body);
    const calculation = calculateSalariedTax(components);
    const report = renderReportMarkdown(buildTaxReport(calculation));

    log.debug(`Calculated tax using ${calculation.slab.label}`, { requestId: req.requestId });

    sendSuccess(res, { calculation, report });
  } catch (error) {
    if (error instanceof TaxInputError) {
      recordInvalidInput('api');
    }
    next(error);
  }
}

/**
 * @swagger
 * /api/v1/tax/slabs:
 *   get:
 *     summary: List the salaried tax slabs in evaluation order
 *     tags: [Tax]
 *     responses:
 *       200:
 *         description: Slab table
 */
export function listSlabs(_req: Request, res: Response): void {
  sendSuccess(res, SALARIED_TAX_SLABS);
}

/**
 * @swagger
 * /api/v1/tax/fields:
 *   get:
 *     summary: List the 17 salary input fields with their labels
 *     tags: [Tax]
 *     responses:
 *       200:
 *         description: Field keys, labels and groups in form order
 */
export function listFields(_req: Request, res: Response): void {
  sendSuccess(res, SALARY_FIELDS);
}

router.post('/calculate', calculationLimiter, calculateTax);
router.get('/slabs', listSlabs);
router.get('/fields', listFields);

export default router;
