import { Logger } from '../../src/core/logger';

// Logger whose calls are recorded instead of printed
export function createQuietLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    log: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}
