import { describe, it, expect } from '@jest/globals';
import { renderCalculatorPage, renderForm, blockToHtml, lineToHtml } from '../taxPage';
import { buildTaxReport, DISCLAIMER, FBR_PORTAL_URL } from '../taxReport';
import { calculateSalariedTax } from '../taxCalculator';
import { createComponents } from './fixtures';

describe('Calculator page', () => {
  describe('renderForm()', () => {
    it('should render 17 inputs defaulting to 0', () => {
      const html = renderForm();

      expect(html.match(/<input /g)).toHaveLength(17);
      expect(html).toContain('<input type="text" inputmode="decimal" name="basicSalary" value="0">');
      expect(html).toContain('<input type="text" inputmode="decimal" name="employerPfAnnual" value="0">');
    });

    it('should group fields into four fieldsets', () => {
      const html = renderForm();

      expect(html.match(/<fieldset>/g)).toHaveLength(4);
      expect(html).toContain('<legend>Common Extras</legend>');
    });

    it('should escape submitted values', () => {
      const html = renderForm({ basicSalary: '"><b>' });
      expect(html).toContain('name="basicSalary" value="&quot;&gt;&lt;b&gt;"');
    });
  });

  describe('Report blocks', () => {
    it('should render inline emphasis and links', () => {
      expect(lineToHtml(['Total: ', { bold: 'Rs. 1.00' }])).toBe('Total: <strong>Rs. 1.00</strong>');
      expect(lineToHtml([{ text: 'FBR Iris Portal', href: FBR_PORTAL_URL }])).toBe(
        `<a href="${FBR_PORTAL_URL}" target="_blank" rel="noopener noreferrer">FBR Iris Portal</a>`
      );
    });

    it('should render the disclaimer', () => {
      expect(blockToHtml(DISCLAIMER)).toBe(
        '<section class="disclaimer"><p><strong>General Advice:</strong> Always consult the official FBR income tax ordinance and a qualified tax professional for your specific filing needs.</p></section>'
      );
    });

    it('should escape ampersands in titles', () => {
      const calculation = calculateSalariedTax(createComponents());
      expect(blockToHtml(buildTaxReport(calculation).assistant)).toContain('<h3>💡 Tax Filing Assistant &amp; Next Steps</h3>');
    });
  });

  describe('renderCalculatorPage()', () => {
    it('should render all four blocks for a result', () => {
      const report = buildTaxReport(calculateSalariedTax(createComponents({ basicSalary: 250000 })));
      const html = renderCalculatorPage({ values: { basicSalary: '250000' }, report });

      expect(html).toContain('name="basicSalary" value="250000"');
      expect(html).toContain('<tr><th scope="row">Annual Tax</th><td><strong>Rs. 300,000.00</strong></td></tr>');
      expect(html).toContain('<p>Applicable Slab: <strong>S#4 (Rs. 2,200,000 to Rs. 3,200,000)</strong></p>');
      expect(html).toContain('<section class="assistant">');
      expect(html).toContain('<section class="disclaimer">');
    });

    it('should show only the error message on invalid input', () => {
      const html = renderCalculatorPage({ error: 'Please ensure all fields contain valid numbers.' });

      expect(html).toContain(
        '<div class="results"><section class="error" role="alert"><p><strong>Error:</strong> Please ensure all fields contain valid numbers.</p></section></div>'
      );
      expect(html).not.toContain('<section class="summary">');
    });

    it('should render an empty results area on first load', () => {
      expect(renderCalculatorPage()).toContain('<div class="results"></div>');
    });
  });
});
