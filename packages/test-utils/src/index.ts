/**
 * @outlook-connector/test-utils
 *
 * Shared test utilities for the workspace:
 * - mock service logger and test configuration
 * - Microsoft Graph resource factories
 * - `fetch` stand-ins built on real `Response` objects
 *
 * @example
 * ```typescript
 * import { createFetchMock, jsonResponse, createGraphUser } from '@outlook-connector/test-utils';
 *
 * const fetchMock = createFetchMock(jsonResponse(createGraphUser()));
 * vi.stubGlobal('fetch', fetchMock);
 * ```
 */

export * from './mocks/index.js';
export * from './factories/index.js';
export * from './helpers/index.js';
