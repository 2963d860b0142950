import { describe, expect, test } from 'vitest';

import {
  parseBoolean,
  parseInteger,
  parseLogLevel,
} from '../../../src/config/env-parsers.js';

describe('env-parsers', () => {
  test('parseInteger falls back outside bounds', () => {
    expect(parseInteger('5000', 30000, 1000, 600000)).toBe(5000);
    expect(parseInteger('10', 30000, 1000, 600000)).toBe(30000);
    expect(parseInteger('abc', 30000)).toBe(30000);
    expect(parseInteger(undefined, 7)).toBe(7);
  });

  test('parseBoolean treats anything but "false" as true', () => {
    expect(parseBoolean('false', true)).toBe(false);
    expect(parseBoolean(' FALSE ', true)).toBe(false);
    expect(parseBoolean('1', false)).toBe(true);
    expect(parseBoolean(undefined, false)).toBe(false);
  });

  test('parseLogLevel accepts known levels only', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(undefined)).toBe('info');
  });
});
