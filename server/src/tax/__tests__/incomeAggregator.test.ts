import { describe, it, expect } from '@jest/globals';
import {
  calculateGrossAnnualSalary,
  calculateTaxableIncome,
  sumMonthlyComponents,
  MONTHLY_COMPONENT_KEYS,
  SALARY_COMPONENT_KEYS,
  SalaryComponents
} from '../incomeAggregator';

const createComponents = (overrides: Partial<SalaryComponents> = {}): SalaryComponents => ({
  basicSalary: 0,
  houseRentAllowance: 0,
  conveyanceAllowance: 0,
  medicalAllowance: 0,
  otherAllowance: 0,
  utilityAllowance: 0,
  specialAllowance: 0,
  performanceBonus: 0,
  overtime: 0,
  dailyAllowance: 0,
  housingAllowance: 0,
  educationAllowance: 0,
  leaveEncashment: 0,
  mealAllowance: 0,
  commission: 0,
  miscellaneousBonus: 0,
  employerPfAnnual: 0,
  ...overrides,
});

describe('Income Aggregator', () => {
  it('should list 16 monthly components and 17 fields overall', () => {
    expect(MONTHLY_COMPONENT_KEYS).toHaveLength(16);
    expect(SALARY_COMPONENT_KEYS).toHaveLength(17);
    expect(SALARY_COMPONENT_KEYS[16]).toBe('employerPfAnnual');
  });

  it('should annualize 16 components of 50,000 and add PF of 100,000', () => {
    const components = createComponents(
      Object.fromEntries(MONTHLY_COMPONENT_KEYS.map(key => [key, 50000]))
    );
    components.employerPfAnnual = 100000;

    // 50,000 * 16 * 12 + 100,000
    expect(sumMonthlyComponents(components)).toBe(800000);
    expect(calculateGrossAnnualSalary(components)).toBe(9600000);
    expect(calculateTaxableIncome(components)).toBe(9700000);
  });

  it('should not annualize the employer PF contribution', () => {
    const components = createComponents({ basicSalary: 10, employerPfAnnual: 120000 });

    expect(sumMonthlyComponents(components)).toBe(10);
    expect(calculateGrossAnnualSalary(components)).toBe(120);
    expect(calculateTaxableIncome(components)).toBe(120120);
  });

  it('should return zero for an all-zero salary', () => {
    expect(calculateTaxableIncome(createComponents())).toBe(0);
  });

  it('should keep fractional amounts without rounding', () => {
    const components = createComponents({ basicSalary: 0.1, houseRentAllowance: 0.2 });

    expect(calculateGrossAnnualSalary(components)).toBeCloseTo(3.6, 10);
  });

  it('should pass negative amounts through unchanged', () => {
    const components = createComponents({ basicSalary: 1000, overtime: -1500 });

    expect(calculateTaxableIncome(components)).toBe(-6000);
  });
});
