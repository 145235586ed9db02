import { describe, it, expect } from '@jest/globals';
import { containsDangerousContent, findDangerousField, escapeHtml } from '../sanitize';

describe('Input Sanitization', () => {
  describe('containsDangerousContent', () => {
    it('should flag script tags and event handlers', () => {
      expect(containsDangerousContent('<script>alert(1)</script>')).toBe(true);
      expect(containsDangerousContent('x onerror=alert(1)')).toBe(true);
      expect(containsDangerousContent('javascript:void(0)')).toBe(true);
    });

    it('should give the same answer on repeated calls', () => {
      expect(containsDangerousContent('<iframe src=x>')).toBe(true);
      expect(containsDangerousContent('<iframe src=x>')).toBe(true);
    });

    it('should accept numbers', () => {
      expect(containsDangerousContent('125000.50')).toBe(false);
      expect(containsDangerousContent(' 1e5 ')).toBe(false);
    });
  });

  describe('findDangerousField', () => {
    it('should return the path of the offending field', () => {
      const body = { basicSalary: '1000', overtime: '<script>x</script>' };
      expect(findDangerousField(body, 'body')).toBe('body.overtime');
    });

    it('should walk into arrays', () => {
      expect(findDangerousField({ values: ['1', '<embed src=x>'] }, 'body')).toBe('body.values[1]');
    });

    it('should return null for clean input', () => {
      expect(findDangerousField({ basicSalary: '50000', commission: 0 }, 'body')).toBeNull();
      expect(findDangerousField(undefined, 'body')).toBeNull();
    });
  });

  describe('escapeHtml', () => {
    it('should escape markup characters', () => {
      expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#039;&amp;&#039;&lt;/a&gt;');
    });
  });
});
