import {
  SalaryComponents,
  sumMonthlyComponents,
  calculateGrossAnnualSalary,
  calculateTaxableIncome
} from '../tax/incomeAggregator.js';
import { calculateAnnualTax, calculateMonthlyTax, SlabTaxResult } from '../tax/slabResolver.js';
import { recordTaxCalculation } from './metrics.js';

export interface TaxCalculation {
  components: SalaryComponents;
  monthlyTotal: number;
  grossAnnualSalary: number;
  taxableIncome: number;
  annualTax: number;
  monthlyTax: number;
  slab: SlabTaxResult;
}

/**
 * Runs a single salaried-tax calculation: aggregate → resolve slab → monthly tax.
 * Holds no state between calls.
 */
export class TaxCalculator {
  calculate(components: SalaryComponents): TaxCalculation {
    const monthlyTotal = sumMonthlyComponents(components);
    const grossAnnualSalary = calculateGrossAnnualSalary(components);
    const taxableIncome = calculateTaxableIncome(components);

    const slab = calculateAnnualTax(taxableIncome);
    const monthlyTax = calculateMonthlyTax(slab.annualTax);

    recordTaxCalculation(slab.slab);

    return {
      components,
      monthlyTotal,
      grossAnnualSalary,
      taxableIncome,
      annualTax: slab.annualTax,
      monthlyTax,
      slab
    };
  }
}

export const taxCalculator = new TaxCalculator();

export function calculateSalariedTax(components: SalaryComponents): TaxCalculation {
  return taxCalculator.calculate(components);
}
