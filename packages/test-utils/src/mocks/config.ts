/**
 * Test configuration
 */

import { DEFAULT_CONFIG, type AppConfig } from '@outlook-connector/core';

type ConfigOverrides = {
  graph?: Partial<AppConfig['graph']>;
  auth?: Partial<AppConfig['auth']>;
  server?: Partial<AppConfig['server']>;
};

/**
 * Defaults with a placeholder app registration and a token file under /tmp
 */
export function createMockConfig(overrides: ConfigOverrides = {}): AppConfig {
  return {
    graph: { ...DEFAULT_CONFIG.graph, ...overrides.graph },
    auth: {
      ...DEFAULT_CONFIG.auth,
      clientId: 'test-client-id',
      clientSecret: 'test-secret',
      tokenFile: '/tmp/outlook-connector-test-token.json',
      ...overrides.auth,
    },
    server: { ...DEFAULT_CONFIG.server, ...overrides.server },
  };
}
