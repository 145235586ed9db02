/**
 * Pakistan Salaried Individual Tax Slabs
 *
 * Progressive rates for salaried taxpayers. Each slab charges a fixed amount
 * plus a marginal rate on income exceeding the previous slab's ceiling.
 *
 * Order matters: the resolver walks the table top to bottom and the first
 * slab whose ceiling covers the income wins.
 */

export interface TaxSlab {
  slab: number;
  label: string;
  ceiling: number | null;     // null = no upper bound
  fixedTax: number;
  rate: number;               // fraction, 0.01 = 1%
  exceedingAmount: number;    // marginal rate applies above this
}

export const SALARIED_TAX_SLABS: readonly TaxSlab[] = Object.freeze([
  { slab: 1, label: 'S#1 (Upto Rs. 600,000)', ceiling: 600000, fixedTax: 0, rate: 0, exceedingAmount: 0 },
  { slab: 2, label: 'S#2 (Rs. 600,000 to Rs. 1,200,000)', ceiling: 1200000, fixedTax: 0, rate: 0.01, exceedingAmount: 600000 },
  { slab: 3, label: 'S#3 (Rs. 1,200,000 to Rs. 2,200,000)', ceiling: 2200000, fixedTax: 6000, rate: 0.11, exceedingAmount: 1200000 },
  { slab: 4, label: 'S#4 (Rs. 2,200,000 to Rs. 3,200,000)', ceiling: 3200000, fixedTax: 116000, rate: 0.23, exceedingAmount: 2200000 },
  { slab: 5, label: 'S#5 (Rs. 3,200,000 to Rs. 4,100,000)', ceiling: 4100000, fixedTax: 346000, rate: 0.30, exceedingAmount: 3200000 },
  { slab: 6, label: 'S#6 (Over Rs. 4,100,000)', ceiling: null, fixedTax: 616000, rate: 0.35, exceedingAmount: 4100000 }
].map(slab => Object.freeze(slab)));

// Income up to this amount carries no tax and no filing obligation
export const TAX_FREE_THRESHOLD = 600000;

export const MONTHS_PER_YEAR = 12;
