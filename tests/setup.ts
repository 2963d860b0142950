import { afterEach, vi } from 'vitest';

// Logging is off under NODE_ENV=test; keep stray console output quiet too.
global.console = {
  ...console,
  log: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

afterEach(() => {
  vi.useRealTimers();
});
