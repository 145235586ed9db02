import { z } from 'zod';
import {
  SalaryComponents,
  SalaryComponentKey,
  SALARY_COMPONENT_KEYS,
  calculateTaxableIncome
} from '../tax/incomeAggregator.js';
import { TaxInputError } from '../utils/AppError.js';

// Plain decimal notation, optional exponent: "50000", "-1.5", ".5", "1e6"
const NUMERIC_STRING = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

function coerceNumeric(value: unknown) {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  return NUMERIC_STRING.test(trimmed) ? Number(trimmed) : value;
}

const amount = z.preprocess(
  coerceNumeric,
  z.number({ required_error: 'Expected a number', invalid_type_error: 'Expected a number' })
    .finite('Expected a finite number')
);

export const salaryComponentsSchema = z.object({
  basicSalary: amount,
  houseRentAllowance: amount,
  conveyanceAllowance: amount,
  medicalAllowance: amount,
  otherAllowance: amount,
  utilityAllowance: amount,
  specialAllowance: amount,
  performanceBonus: amount,
  overtime: amount,
  dailyAllowance: amount,
  housingAllowance: amount,
  educationAllowance: amount,
  leaveEncashment: amount,
  mealAllowance: amount,
  commission: amount,
  miscellaneousBonus: amount,
  employerPfAnnual: amount
}).superRefine((components, ctx) => {
  // Each field is finite, but x12 and the sum can still overflow
  if (Number.isFinite(calculateTaxableIncome(components))) return;

  for (const key of SALARY_COMPONENT_KEYS) {
    if (components[key] !== 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'Amount is too large' });
    }
  }
});

function isSalaryComponentKey(value: unknown): value is SalaryComponentKey {
  return SALARY_COMPONENT_KEYS.some(key => key === value);
}

/**
 * Coerce 17 raw fields (numbers or numeric strings) into SalaryComponents.
 * Any field that is not a finite number fails the whole input.
 */
export function parseSalaryComponents(raw: unknown): SalaryComponents {
  const result = salaryComponentsSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const fields = new Set<SalaryComponentKey>();
  for (const issue of result.error.issues) {
    const [field] = issue.path;
    if (isSalaryComponentKey(field)) {
      fields.add(field);
    }
  }

  // Not an object at all: every field is missing
  const invalid = fields.size > 0 ? [...fields] : [...SALARY_COMPONENT_KEYS];
  throw new TaxInputError(invalid);
}
