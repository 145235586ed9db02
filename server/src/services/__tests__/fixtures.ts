import { SalaryComponents } from '../../tax/incomeAggregator';

export const createComponents = (overrides: Partial<SalaryComponents> = {}): SalaryComponents => ({
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
