/**
 * Server-rendered calculator page: the 17-field form plus either the four
 * report blocks or a single error message.
 */

import { SalaryComponentKey } from '../tax/incomeAggregator.js';
import { SALARY_FIELDS, SALARY_FIELD_GROUPS } from '../tax/salaryFields.js';
import { escapeHtml } from '../middleware/sanitize.js';
import { Inline, ReportBlock, ReportLine, TaxReport } from './taxReport.js';

export const PAGE_TITLE = 'Pakistan Salaried Income Tax Calculator (16 Monthly Inputs)';

export type FormValues = Partial<Record<SalaryComponentKey, string>>;

export interface CalculatorPageState {
  values?: FormValues;
  report?: TaxReport;
  error?: string;
}

function inlineToHtml(inline: Inline): string {
  if (typeof inline === 'string') return escapeHtml(inline);
  if ('bold' in inline) return `<strong>${escapeHtml(inline.bold)}</strong>`;
  return `<a href="${escapeHtml(inline.href)}" target="_blank" rel="noopener noreferrer">${escapeHtml(inline.text)}</a>`;
}

export function lineToHtml(line: ReportLine): string {
  return line.map(inlineToHtml).join('');
}

export function blockToHtml(block: ReportBlock): string {
  switch (block.kind) {
    case 'summary': {
      const rows = block.rows.map(row => {
        const value = escapeHtml(row.value);
        return `<tr><th scope="row">${escapeHtml(row.metric)}</th><td>${row.emphasize ? `<strong>${value}</strong>` : value}</td></tr>`;
      });
      return [
        `<section class="summary"><h3>${escapeHtml(block.title)}</h3>`,
        '<table><thead><tr><th>Metric</th><th>Value</th></tr></thead>',
        `<tbody>${rows.join('')}</tbody></table></section>`
      ].join('');
    }
    case 'steps': {
      const steps = block.steps.map(step =>
        `<h4>${escapeHtml(step.heading)}</h4>` + step.lines.map(line => `<p>${lineToHtml(line)}</p>`).join('')
      );
      return `<section class="steps"><h3>${escapeHtml(block.title)}</h3>${steps.join('')}</section>`;
    }
    case 'list': {
      const items = block.items.map(item => `<li>${lineToHtml(item)}</li>`);
      return `<section class="assistant"><h3>${escapeHtml(block.title)}</h3><ul>${items.join('')}</ul></section>`;
    }
    case 'note':
      return `<section class="disclaimer"><p><strong>${escapeHtml(block.label)}</strong> ${escapeHtml(block.text)}</p></section>`;
  }
}

function renderField(key: SalaryComponentKey, label: string, value: string): string {
  return [
    '<label>',
    `<span>${escapeHtml(label)}</span>`,
    `<input type="text" inputmode="decimal" name="${key}" value="${escapeHtml(value)}">`,
    '</label>'
  ].join('');
}

export function renderForm(values: FormValues = {}): string {
  const fieldsets = SALARY_FIELD_GROUPS.map(({ group, legend }) => {
    const fields = SALARY_FIELDS
      .filter(field => field.group === group)
      .map(field => renderField(field.key, field.label, values[field.key] ?? '0'));
    return `<fieldset><legend>${escapeHtml(legend)}</legend>${fields.join('')}</fieldset>`;
  });

  return `<form method="post" action="/">${fieldsets.join('')}<button type="submit">Calculate</button></form>`;
}

function renderResults(state: CalculatorPageState): string {
  if (state.error !== undefined) {
    return `<section class="error" role="alert"><p><strong>Error:</strong> ${escapeHtml(state.error)}</p></section>`;
  }
  if (!state.report) return '';

  const { summary, steps, assistant, disclaimer } = state.report;
  return [summary, steps, assistant, disclaimer].map(blockToHtml).join('');
}

const STYLES = `
body { font-family: system-ui, sans-serif; max-width: 960px; margin: 2rem auto; padding: 0 1rem; color: #1f2933; }
fieldset { border: 1px solid #d9e2ec; border-radius: 6px; margin-bottom: 1rem; display: grid; grid-template-columns: repeat(auto-fill, minmax(260px, 1fr)); gap: .75rem; }
label span { display: block; font-size: .85rem; margin-bottom: .25rem; }
input { width: 100%; padding: .4rem; box-sizing: border-box; }
button { padding: .6rem 1.5rem; font-size: 1rem; }
table { border-collapse: collapse; } th, td { text-align: left; padding: .3rem .8rem; border-bottom: 1px solid #d9e2ec; }
.error { color: #b91c1c; }
`;

export function renderCalculatorPage(state: CalculatorPageState = {}): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(PAGE_TITLE)}</title>
<style>${STYLES}</style>
</head>
<body>
<h1>${escapeHtml(PAGE_TITLE)}</h1>
<p>Enter your 16 monthly salary components and annual Employer PF contribution to calculate the applicable income tax based on FBR tax slabs.</p>
${renderForm(state.values)}
<div class="results">${renderResults(state)}</div>
</body>
</html>`;
}
