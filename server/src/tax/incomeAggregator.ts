/**
 * Income Aggregator
 *
 * Annual taxable income = (sum of the 16 monthly components × 12) + employer PF (annual).
 * Inputs are expected to be numeric already; coercion happens in taxInputSchema.
 */

import { MONTHS_PER_YEAR } from './slabs.js';

export const MONTHLY_COMPONENT_KEYS = [
  'basicSalary',
  'houseRentAllowance',
  'conveyanceAllowance',
  'medicalAllowance',
  'otherAllowance',
  'utilityAllowance',
  'specialAllowance',
  'performanceBonus',
  'overtime',
  'dailyAllowance',
  'housingAllowance',
  'educationAllowance',
  'leaveEncashment',
  'mealAllowance',
  'commission',
  'miscellaneousBonus'
] as const;

export type MonthlyComponentKey = typeof MONTHLY_COMPONENT_KEYS[number];

export type MonthlyComponents = Record<MonthlyComponentKey, number>;

export interface SalaryComponents extends MonthlyComponents {
  employerPfAnnual: number;
}

export type SalaryComponentKey = keyof SalaryComponents;

export const SALARY_COMPONENT_KEYS: readonly SalaryComponentKey[] = [
  ...MONTHLY_COMPONENT_KEYS,
  'employerPfAnnual'
];

export function sumMonthlyComponents(components: MonthlyComponents): number {
  return MONTHLY_COMPONENT_KEYS.reduce((sum, key) => sum + components[key], 0);
}

export function calculateGrossAnnualSalary(components: MonthlyComponents): number {
  return sumMonthlyComponents(components) * MONTHS_PER_YEAR;
}

export function calculateTaxableIncome(components: SalaryComponents): number {
  return calculateGrossAnnualSalary(components) + components.employerPfAnnual;
}
