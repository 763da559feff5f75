import { loadOptionsFromEnv } from './env-config';

describe('loadOptionsFromEnv', () => {
  it('should map every supported variable', () => {
    const options = loadOptionsFromEnv({
      FAULTLINE_PROJECT_ID: '42',
      FAULTLINE_PROJECT_KEY: 'test-key',
      FAULTLINE_HOST: 'https://errors.example.test',
      FAULTLINE_ENVIRONMENT: 'production',
      FAULTLINE_IGNORE_ENVIRONMENTS: 'test, development ,',
      FAULTLINE_WORKERS: '4',
      FAULTLINE_QUEUE_SIZE: '250',
      FAULTLINE_TIMEOUT_MS: '3000',
    });

    expect(options).toEqual({
      projectId: 42,
      projectKey: 'test-key',
      host: 'https://errors.example.test',
      environment: 'production',
      ignoreEnvironments: ['test', 'development'],
      workers: 4,
      queueSize: 250,
      timeoutMs: 3000,
    });
  });

  it('should fall back to NODE_ENV for the environment', () => {
    const options = loadOptionsFromEnv({ NODE_ENV: 'staging' });

    expect(options).toEqual({ environment: 'staging' });
  });

  it('should pass malformed numbers through as NaN', () => {
    const options = loadOptionsFromEnv({ FAULTLINE_WORKERS: 'four' });

    expect(options.workers).toBeNaN();
  });

  it('should return no options for an empty environment', () => {
    expect(loadOptionsFromEnv({})).toEqual({});
  });
});
