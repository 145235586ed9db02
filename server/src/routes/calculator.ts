import { Router, Request, Response, NextFunction } from 'express';
import { parseSalaryComponents } from '../services/taxInputSchema.js';
import { calculateSalariedTax } from '../services/taxCalculator.js';
import { buildTaxReport } from '../services/taxReport.js';
import { renderCalculatorPage, FormValues } from '../services/taxPage.js';
import { recordInvalidInput } from '../services/metrics.js';
import { calculationLimiter } from '../middleware/rateLimit.js';
import { SALARY_COMPONENT_KEYS } from '../tax/incomeAggregator.js';
import { TaxInputError } from '../utils/AppError.js';

const router = Router();

/**
 * Keep what the user typed so the form can be re-rendered as submitted
 */
export function extractFormValues(body: unknown): FormValues {
  const values: FormValues = {};
  if (body === null || typeof body !== 'object') return values;

  for (const key of SALARY_COMPONENT_KEYS) {
    const value: unknown = Reflect.get(body, key);
    if (typeof value === 'string') {
      values[key] = value;
    } else if (typeof value === 'number') {
      values[key] = String(value);
    }
  }
  return values;
}

// GET / - empty form, every field defaults to 0
export function showCalculator(_req: Request, res: Response): void {
  res.type('html').send(renderCalculatorPage());
}

// POST / - validate, calculate and render the four blocks (or one error message)
export function submitCalculator(req: Request, res: Response, next: NextFunction): void {
  const values = extractFormValues(req.body);

  try {
    const calculation = calculateSalariedTax(parseSalaryComponents(req.body));
    res.type('html').send(renderCalculatorPage({ values, report: buildTaxReport(calculation) }));
  } catch (error) {
    if (error instanceof TaxInputError) {
      recordInvalidInput('form');
      res.status(400).type('html').send(renderCalculatorPage({ values, error: error.message }));
      return;
    }
    next(error);
  }
}

router.get('/', showCalculator);
router.post('/', calculationLimiter, submitCalculator);

export default router;
