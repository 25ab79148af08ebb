import { describe, it, expect } from 'vitest';
import { DynamicValueGenerator } from '../src/execution/DynamicValueGenerator.js';
import { ConfigurationError } from '../src/errors/index.js';
import { ManualClock } from '../src/utils/SystemClock.js';

describe('DynamicValueGenerator', () => {
  const lowest = new DynamicValueGenerator({ random: () => 0 });
  const highest = new DynamicValueGenerator({ random: () => 0.999 });

  it('returns fixed values', () => {
    expect(lowest.generate({ name: 'v', type: 'Fixed', value: 'abc' })).toBe('abc');
  });

  it('requires a value for fixed variables', () => {
    expect(() => lowest.generate({ name: 'v', type: 'Fixed' })).toThrow(ConfigurationError);
    expect(() => lowest.generate({ name: 'v', type: 'Fixed', value: ' ' })).toThrow(
      "Variable 'v': Fixed variables require a value.",
    );
  });

  it('draws padded numbers within the range', () => {
    expect(lowest.generate({ name: 'n', type: 'Number', min: 5, max: 10, padding: 3 })).toBe('005');
    expect(highest.generate({ name: 'n', type: 'Number', min: 5, max: 10, padding: 3 })).toBe('010');
  });

  it('builds text of the requested length', () => {
    expect(lowest.generate({ name: 't', type: 'Text', length: 4 })).toBe('AAAA');
    expect(highest.generate({ name: 't', type: 'Text' })).toHaveLength(16);
  });

  it('steps sequences from their start', () => {
    expect(lowest.generate({ name: 's', type: 'Sequence', start: 10, step: 5, padding: 4 }, 3)).toBe('0020');
    expect(lowest.generate({ name: 's', type: 'Sequence' })).toBe('1');
  });

  it('formats dates inside a fixed range', () => {
    const variable = { name: 'd', type: 'Date' as const, fromDate: '2024-03-01', toDate: '2024-03-01' };
    expect(lowest.generate(variable)).toBe('2024-03-01');
    expect(lowest.generate({ ...variable, format: 'dd/MM/yyyy' })).toBe('01/03/2024');
  });

  it('formats date-times as ISO-8601 by default', () => {
    const variable = {
      name: 'dt',
      type: 'DateTime' as const,
      fromDateTime: '2024-03-01T10:20:30Z',
      toDateTime: '2024-03-01T10:20:30Z',
    };
    expect(lowest.generate(variable)).toBe('2024-03-01T10:20:30.000Z');
    expect(lowest.generate({ ...variable, format: 'yyyy-MM-dd HH:mm' })).toBe('2024-03-01 10:20');
  });

  it('formats times of day', () => {
    expect(lowest.generate({ name: 't', type: 'Time', fromTime: '08:30', toTime: '08:30' })).toBe('08:30:00');
  });

  it('rejects unparseable bounds', () => {
    expect(() => lowest.generate({ name: 'd', type: 'Date', fromDate: 'March 1' })).toThrow(
      "Variable 'd': 'March 1' is not a valid date (yyyy-MM-dd).",
    );
    expect(() => lowest.generate({ name: 't', type: 'Time', fromTime: '25:00' })).toThrow(
      "Variable 't': '25:00' is not a valid time (HH:mm:ss).",
    );
  });

  it('generates identifiers', () => {
    const clocked = new DynamicValueGenerator({ clock: new ManualClock(0) });
    expect(clocked.generate({ name: 'g', type: 'Guid' })).toMatch(/^[0-9a-f-]{36}$/);
    expect(clocked.generate({ name: 'u', type: 'Ulid' })).toMatch(/^0{10}[0-9A-HJKMNP-TV-Z]{16}$/);
  });
});
