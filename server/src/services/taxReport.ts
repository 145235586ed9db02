/**
 * Tax Report Builder
 *
 * Turns a TaxCalculation into the four blocks shown to the user:
 * summary, step-by-step derivation, filing assistant and disclaimer.
 * Blocks are structured so the form page can render HTML and the API
 * can render Markdown from the same content.
 */

import { TaxCalculation } from './taxCalculator.js';
import { TAX_FREE_THRESHOLD, MONTHS_PER_YEAR } from '../tax/slabs.js';
import { formatAmount, formatPercent, formatRupees, formatWhole } from '../utils/decimal.js';

export const FBR_PORTAL_URL = 'https://share.google/5QbLZn6MdDWtL43xT';

export type Inline =
  | string
  | { bold: string }
  | { text: string; href: string };

export type ReportLine = Inline[];

export interface SummaryRow {
  metric: string;
  value: string;
  emphasize: boolean;
}

export interface SummaryBlock {
  kind: 'summary';
  title: string;
  rows: SummaryRow[];
}

export interface StepsBlock {
  kind: 'steps';
  title: string;
  steps: Array<{ heading: string; lines: ReportLine[] }>;
}

export interface ListBlock {
  kind: 'list';
  title: string;
  items: ReportLine[];
}

export interface NoteBlock {
  kind: 'note';
  label: string;
  text: string;
}

export type ReportBlock = SummaryBlock | StepsBlock | ListBlock | NoteBlock;

export interface TaxReport {
  summary: SummaryBlock;
  steps: StepsBlock;
  assistant: ListBlock;
  disclaimer: NoteBlock;
}

export type RenderedReport = Record<keyof TaxReport, string>;

const bold = (text: string): Inline => ({ bold: text });

export function buildSummary(calculation: TaxCalculation): SummaryBlock {
  return {
    kind: 'summary',
    title: '💰 Calculated Tax Summary',
    rows: [
      { metric: 'Annual Taxable Income', value: formatRupees(calculation.taxableIncome), emphasize: false },
      { metric: 'Annual Tax', value: formatRupees(calculation.annualTax), emphasize: true },
      { metric: 'Monthly Tax', value: formatRupees(calculation.monthlyTax), emphasize: true }
    ]
  };
}

function slabCalculationLines(calculation: TaxCalculation): ReportLine[] {
  const { slab, taxableIncome, annualTax } = calculation;

  if (slab.slab === 1) {
    return [[`Annual Tax: 0% as income does not exceed Rs. ${formatWhole(TAX_FREE_THRESHOLD)}.`]];
  }

  if (slab.fixedTax === 0) {
    return [[
      `Annual Tax Calculation: ${formatPercent(slab.rate)}% of (${formatRupees(taxableIncome)} - Rs. ${formatWhole(slab.exceedingAmount)}) = `,
      bold(formatRupees(annualTax))
    ]];
  }

  const marginalTax = slab.excessAmount * slab.rate;
  return [
    [
      `Annual Tax Calculation: Fixed Tax (${formatRupees(slab.fixedTax)}) + ${formatPercent(slab.rate)}% of excess ` +
      `(${formatRupees(slab.excessAmount)} x ${slab.rate} = ${formatRupees(marginalTax)})`
    ],
    ['Total Annual Tax: ', bold(formatRupees(annualTax))]
  ];
}

export function buildSteps(calculation: TaxCalculation): StepsBlock {
  return {
    kind: 'steps',
    title: '📝 Step-by-Step Guide',
    steps: [
      {
        heading: 'STEP 1: Calculate Annual Taxable Income',
        lines: [
          [`Gross Annual Salary (16 components * ${MONTHS_PER_YEAR}): ${formatRupees(calculation.grossAnnualSalary)}`],
          ['Annual Taxable Income (Gross Salary + Employer PF): ', bold(formatRupees(calculation.taxableIncome))]
        ]
      },
      {
        heading: 'STEP 2 & 3: Apply Tax Slab and Calculate Annual Tax',
        lines: [
          ['Applicable Slab: ', bold(calculation.slab.label)],
          ...slabCalculationLines(calculation)
        ]
      },
      {
        heading: 'STEP 4: Calculate Monthly Tax',
        lines: [
          [
            `Monthly Tax: ${formatRupees(calculation.annualTax)} / ${MONTHS_PER_YEAR} = `,
            bold(formatRupees(calculation.monthlyTax))
          ]
        ]
      }
    ]
  };
}

export function buildFilingAssistant(calculation: TaxCalculation): ListBlock {
  const items: ReportLine[] = [];
  const threshold = `Rs. ${formatWhole(TAX_FREE_THRESHOLD)}`;

  if (calculation.monthlyTax > 0) {
    items.push([
      bold('Verify TDS:'),
      ' Check your payslips to ensure your employer deducts ',
      bold(formatRupees(calculation.monthlyTax)),
      ' (Tax Deducted at Source).'
    ]);
  } else {
    items.push([bold('No Tax Liability:'), ` Your income falls below the minimum taxable limit (${threshold}).`]);
  }

  // At exactly the threshold both this and "No Tax Liability" apply
  if (calculation.taxableIncome >= TAX_FREE_THRESHOLD) {
    items.push([
      bold('Mandatory Filing:'),
      ` Since your income is above ${threshold}, you are legally required to file an annual income tax return with the FBR.`
    ]);
  }

  items.push([
    bold('FBR Portal:'),
    ' The filing is done electronically via the ',
    { text: 'FBR Iris Portal', href: FBR_PORTAL_URL },
    '.'
  ]);

  return { kind: 'list', title: '💡 Tax Filing Assistant & Next Steps', items };
}

export const DISCLAIMER: NoteBlock = {
  kind: 'note',
  label: 'General Advice:',
  text: 'Always consult the official FBR income tax ordinance and a qualified tax professional for your specific filing needs.'
};

export function buildTaxReport(calculation: TaxCalculation): TaxReport {
  return {
    summary: buildSummary(calculation),
    steps: buildSteps(calculation),
    assistant: buildFilingAssistant(calculation),
    disclaimer: DISCLAIMER
  };
}

// --- Markdown rendering ---

function inlineToMarkdown(inline: Inline): string {
  if (typeof inline === 'string') return inline;
  if ('bold' in inline) return `**${inline.bold}**`;
  return `[${inline.text}](${inline.href})`;
}

export function lineToMarkdown(line: ReportLine): string {
  return line.map(inlineToMarkdown).join('');
}

export function blockToMarkdown(block: ReportBlock): string {
  switch (block.kind) {
    case 'summary':
      return [
        `### ${block.title}`,
        '| Metric | Value |',
        '| :--- | :--- |',
        ...block.rows.map(row =>
          `| **${row.metric}** | ${row.emphasize ? `**${row.value}**` : row.value} |`
        )
      ].join('\n');
    case 'steps':
      return [
        `### ${block.title}`,
        ...block.steps.map(step =>
          [`**${step.heading}**`, ...step.lines.map(lineToMarkdown)].join('  \n')
        )
      ].join('\n\n');
    case 'list':
      return [`## ${block.title}`, ...block.items.map(item => `* ${lineToMarkdown(item)}`)].join('\n');
    case 'note':
      return `**${block.label}** ${block.text}`;
  }
}

export function renderReportMarkdown(report: TaxReport): RenderedReport {
  return {
    summary: blockToMarkdown(report.summary),
    steps: blockToMarkdown(report.steps),
    assistant: blockToMarkdown(report.assistant),
    disclaimer: blockToMarkdown(report.disclaimer)
  };
}
