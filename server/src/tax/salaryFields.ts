import { SalaryComponentKey } from './incomeAggregator.js';

export type SalaryFieldGroup = 'standard' | 'common' | 'specific' | 'annual';

export interface SalaryField {
  key: SalaryComponentKey;
  label: string;
  group: SalaryFieldGroup;
}

export const SALARY_FIELD_GROUPS: ReadonlyArray<{ group: SalaryFieldGroup; legend: string }> = [
  { group: 'standard', legend: 'Standard' },
  { group: 'common', legend: 'Common Extras' },
  { group: 'specific', legend: 'Specific / Less Common' },
  { group: 'annual', legend: 'Annual' }
];

// Form order; numbering in labels follows it
export const SALARY_FIELDS: readonly SalaryField[] = [
  { key: 'basicSalary', label: '1. Basic Salary (Monthly): Rs.', group: 'standard' },
  { key: 'houseRentAllowance', label: '2. House Rent Allowance (HRA) (Monthly): Rs.', group: 'standard' },
  { key: 'conveyanceAllowance', label: '3. Conveyance Allowance (Monthly): Rs.', group: 'standard' },
  { key: 'medicalAllowance', label: '4. Medical Allowance (Monthly): Rs.', group: 'standard' },
  { key: 'otherAllowance', label: '5. Other General Allowance (Monthly): Rs.', group: 'standard' },
  { key: 'utilityAllowance', label: '6. Utility Allowance (Monthly): Rs.', group: 'common' },
  { key: 'specialAllowance', label: '7. Special/Technical Allowance (Monthly): Rs.', group: 'common' },
  { key: 'performanceBonus', label: '8. Performance/Ad-hoc Bonus (Monthly Avg): Rs.', group: 'common' },
  { key: 'overtime', label: '9. Overtime (Monthly Avg): Rs.', group: 'common' },
  { key: 'dailyAllowance', label: '10. TADA/Daily Allowance (Monthly Avg): Rs.', group: 'common' },
  { key: 'housingAllowance', label: '11. Housing/Accommodation Allowance (Monthly): Rs.', group: 'specific' },
  { key: 'educationAllowance', label: '12. Education/Children Allowance (Monthly): Rs.', group: 'specific' },
  { key: 'leaveEncashment', label: '13. Leave Encashment (Monthly Avg): Rs.', group: 'specific' },
  { key: 'mealAllowance', label: '14. Food/Meal Allowance (Monthly): Rs.', group: 'specific' },
  { key: 'commission', label: '15. Commission/Incentive (Monthly Avg): Rs.', group: 'specific' },
  { key: 'miscellaneousBonus', label: '16. Miscellaneous Bonus/Receipt (Monthly Avg): Rs.', group: 'specific' },
  { key: 'employerPfAnnual', label: "17. Employer's PF Contribution (Annual): Rs.", group: 'annual' }
];
