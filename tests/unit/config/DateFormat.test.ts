import { describe, it, expect } from '@jest/globals';
import { convertStrftimePattern, formatUtcTimestamp } from '../../../src/config/DateFormat.js';
import { UserError } from '../../../src/errors/ComponentErrors.js';

describe('convertStrftimePattern', () => {
  it('should translate the default suffix pattern', () => {
    expect(convertStrftimePattern('%Y%m%d%H%M%S')).toBe('yyyyMMddHHmmss');
  });

  it('should quote literal text', () => {
    expect(convertStrftimePattern('%Y-%m-%d')).toBe("yyyy'-'MM'-'dd");
    expect(convertStrftimePattern("it's %Y")).toBe("'it''s 'yyyy");
  });

  it('should turn %% and a trailing % into literal percent signs', () => {
    expect(convertStrftimePattern('100%% at %H')).toBe("'100% at 'HH");
    expect(convertStrftimePattern('abc%')).toBe("'abc%'");
  });

  it('should reject unsupported directives', () => {
    expect(() => convertStrftimePattern('%Q')).toThrow(UserError);
    expect(() => convertStrftimePattern('%Q')).toThrow('Unsupported date format directive "%Q" in "%Q"');
  });
});

describe('formatUtcTimestamp', () => {
  it('should format in UTC', () => {
    expect(formatUtcTimestamp('%Y%m%d%H%M%S', new Date(Date.UTC(2024, 0, 5, 12, 30, 0)))).toBe('20240105123000');
  });

  it('should pad microseconds from milliseconds', () => {
    const date = new Date(Date.UTC(2024, 1, 29, 23, 59, 58, 7));
    expect(formatUtcTimestamp('%Y-%m-%dT%H:%M:%S.%f', date)).toBe('2024-02-29T23:59:58.007000');
  });

  it('should format names and the day of the year', () => {
    const date = new Date(Date.UTC(2024, 1, 29, 15, 0, 0));
    expect(formatUtcTimestamp('%a %d %b %Y', date)).toBe('Thu 29 Feb 2024');
    expect(formatUtcTimestamp('%j', date)).toBe('060');
    expect(formatUtcTimestamp('%I%p', date)).toBe('03PM');
  });

  it('should ignore local daylight saving changes', () => {
    // tests/globalSetup.ts runs the suite in America/New_York
    expect(new Date(Date.UTC(2024, 0, 15)).getTimezoneOffset()).toBe(300);
    expect(new Date(Date.UTC(2024, 6, 15)).getTimezoneOffset()).toBe(240);

    expect(formatUtcTimestamp('%Y%m%d%H%M%S', new Date(Date.UTC(2024, 2, 10, 6, 30)))).toBe('20240310063000');
    expect(formatUtcTimestamp('%Y%m%d%H%M%S', new Date(Date.UTC(2024, 10, 3, 5, 30)))).toBe('20241103053000');
  });
});
