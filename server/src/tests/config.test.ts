import { loadConfig } from '../config';
import { ConfigError } from '../service/errors';

describe('loadConfig', () => {
  test('applies defaults when only the secret is set', () => {
    expect(loadConfig({ AUTH_TOKEN: 'test-secret' })).toEqual({
      port: 3001,
      collaboratorBaseUrl: 'http://localhost:8080/api/calculate-cpi',
      authToken: 'test-secret',
      collaboratorTimeoutMs: 10_000,
      simulatedDelayMs: 30_000,
      taskConcurrency: 1,
      taskHistoryLimit: 1000,
      corsOrigins: ['*'],
    });
  });

  test('reads overrides and trims the collaborator base url', () => {
    const config = loadConfig({
      AUTH_TOKEN: ' test-secret ',
      PORT: '8000',
      COLLABORATOR_BASE_URL: 'http://collaborator.test/api/calculate-cpi/',
      COLLABORATOR_TIMEOUT_MS: '2500',
      SIMULATED_DELAY_MS: '0',
      TASK_CONCURRENCY: '2',
      TASK_HISTORY_LIMIT: '50',
      CORS_ORIGIN: 'http://a.test, http://b.test',
    });

    expect(config).toEqual({
      port: 8000,
      collaboratorBaseUrl: 'http://collaborator.test/api/calculate-cpi',
      authToken: 'test-secret',
      collaboratorTimeoutMs: 2500,
      simulatedDelayMs: 0,
      taskConcurrency: 2,
      taskHistoryLimit: 50,
      corsOrigins: ['http://a.test', 'http://b.test'],
    });
  });

  test('requires the shared secret', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ AUTH_TOKEN: '   ' })).toThrow(
      'AUTH_TOKEN is required'
    );
  });

  test('rejects invalid numbers', () => {
    expect(() =>
      loadConfig({ AUTH_TOKEN: 'test-secret', TASK_CONCURRENCY: '0' })
    ).toThrow('TASK_CONCURRENCY must be an integer >= 1 (received "0")');
    expect(() =>
      loadConfig({ AUTH_TOKEN: 'test-secret', COLLABORATOR_TIMEOUT_MS: '1.5' })
    ).toThrow('COLLABORATOR_TIMEOUT_MS must be an integer >= 1 (received "1.5")');
  });

  test('rejects a relative collaborator url', () => {
    expect(() =>
      loadConfig({ AUTH_TOKEN: 'test-secret', COLLABORATOR_BASE_URL: '/api' })
    ).toThrow('COLLABORATOR_BASE_URL must be an absolute URL (received "/api")');
  });
});
