import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { Logger } from '../logger';

describe('Logger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should redact salary fields from logged objects', () => {
    const spy = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = new Logger({ level: 'debug' });

    logger.info('calculated', { basicSalary: 50000, employerPfAnnual: 100000, requestId: 'req-1' });

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][1]).toBe('calculated');
    expect(spy.mock.calls[0][2]).toEqual({
      basicSalary: '[REDACTED]',
      employerPfAnnual: '[REDACTED]',
      requestId: 'req-1',
    });
  });

  it('should redact nested components', () => {
    const logger = new Logger();
    expect(logger.sanitizeObject({ body: { Components: { overtime: 1 } }, path: '/' })).toEqual({
      body: { Components: '[REDACTED]' },
      path: '/',
    });
  });

  it('should mask CNIC numbers and emails in messages', () => {
    const logger = new Logger();

    expect(logger.sanitizeString('cnic 35202-1234567-1')).toBe('cnic *****-*******-*');
    expect(logger.sanitizeString('cnic 3520212345671')).toBe('cnic *************');
    expect(logger.sanitizeString('from user@example.com')).toBe('from ***@example.com');
  });

  it('should leave values alone when sanitizing is off', () => {
    const logger = new Logger({ sanitize: false });
    const value = { basicSalary: 50000 };
    expect(logger.sanitizeObject(value)).toBe(value);
  });

  it('should skip messages below the configured level', () => {
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new Logger({ level: 'warn' });

    logger.info('hidden');
    logger.warn('shown');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should prefix child logger messages with context', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new Logger({ level: 'debug' });

    logger.child({ route: 'tax' }).error('failed');

    expect(spy.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T.+Z\] \[ERROR\]$/);
    expect(spy.mock.calls[0][1]).toBe('[route=tax] failed');
  });
});
