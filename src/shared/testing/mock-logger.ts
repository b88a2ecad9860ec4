import type { LoggerService } from '../types';

export function createMockLogger(): jest.Mocked<LoggerService> {
  return {
    app: 'test-app',
    log: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    error: jest.fn(),
  };
}
