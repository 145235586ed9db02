/**
 * Slab Resolver
 *
 * Maps annual taxable income to its slab and computes the annual tax.
 * Boundaries belong to the lower slab (income <= ceiling).
 *
 * Negative income is not a business case; it lands in S#1 with zero tax.
 */

import { SALARIED_TAX_SLABS, MONTHS_PER_YEAR, TaxSlab } from './slabs.js';

export interface SlabTaxResult {
  annualTax: number;
  slab: number;
  label: string;
  fixedTax: number;
  rate: number;
  exceedingAmount: number;
  excessAmount: number;     // income - exceedingAmount
}

/**
 * Find the slab covering an income. The last slab is unbounded, so this
 * always returns.
 */
export function findSlab(taxableIncome: number, slabs: readonly TaxSlab[] = SALARIED_TAX_SLABS): TaxSlab {
  for (const slab of slabs) {
    if (slab.ceiling === null || taxableIncome <= slab.ceiling) {
      return slab;
    }
  }
  return slabs[slabs.length - 1];
}

export function calculateAnnualTax(taxableIncome: number): SlabTaxResult {
  const slab = findSlab(taxableIncome);
  const excessAmount = taxableIncome - slab.exceedingAmount;

  let annualTax: number;
  if (slab.slab === 1) {
    annualTax = 0;
  } else if (slab.fixedTax === 0) {
    // S#2 has no fixed component
    annualTax = excessAmount * slab.rate;
  } else {
    annualTax = slab.fixedTax + excessAmount * slab.rate;
  }

  return {
    annualTax,
    slab: slab.slab,
    label: slab.label,
    fixedTax: slab.fixedTax,
    rate: slab.rate,
    exceedingAmount: slab.exceedingAmount,
    excessAmount
  };
}

export function calculateMonthlyTax(annualTax: number): number {
  return annualTax / MONTHS_PER_YEAR;
}
