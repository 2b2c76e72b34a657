/**
 * Mock service logger
 *
 * Drop-in replacement for `createServiceLogger` results that records calls for assertions.
 */

import { vi, type Mock } from 'vitest';
import type { OperationLogger, ServiceLogger } from '@outlook-connector/core';

type LogFn = ServiceLogger['info'];

export interface MockServiceLogger extends ServiceLogger {
  debug: Mock<LogFn>;
  info: Mock<LogFn>;
  warn: Mock<LogFn>;
  error: Mock<LogFn>;
  startOperation: Mock<ServiceLogger['startOperation']>;
  /** Operation handles in the order startOperation handed them out */
  operations: Array<{ name: string; success: Mock<OperationLogger['success']>; failure: Mock<OperationLogger['failure']> }>;
}

export function createMockServiceLogger(): MockServiceLogger {
  const operations: MockServiceLogger['operations'] = [];

  return {
    debug: vi.fn<LogFn>(),
    info: vi.fn<LogFn>(),
    warn: vi.fn<LogFn>(),
    error: vi.fn<LogFn>(),
    startOperation: vi.fn<ServiceLogger['startOperation']>((name: string) => {
      const handle = {
        name,
        success: vi.fn<OperationLogger['success']>(),
        failure: vi.fn<OperationLogger['failure']>(),
      };
      operations.push(handle);
      return handle;
    }),
    operations,
  };
}
