import { validateAndLogEnvironment, validateEnvironment } from '../core/config/env.validation';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('validateEnvironment', () => {
  it('accepts an empty development environment using defaults', () => {
    const result = validateEnvironment({});

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.loaded.PORT).toBe('3000');
    expect(result.loaded.NOMINATIM_BASE_URL).toBe('https://nominatim.openstreetmap.org');
  });

  it('requires a routing key in production', () => {
    const result = validateEnvironment({ NODE_ENV: 'production', REDIS_ENABLED: 'true' });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['ORS_API_KEY is required in production']);
  });

  it('warns when production runs without Redis', () => {
    const result = validateEnvironment({ NODE_ENV: 'production', ORS_API_KEY: 'test-secret' });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['REDIS_ENABLED should be true in production to share lookup cache']);
  });

  it('redacts keys in the loaded summary', () => {
    const result = validateEnvironment({ ORS_API_KEY: 'test-secret' });

    expect(result.loaded.ORS_API_KEY).toBe('[REDACTED]');
  });

  it('rejects malformed values', () => {
    const result = validateEnvironment({ PORT: '70000', ORS_BASE_URL: 'not-a-url' });

    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(2);
    expect(result.errors[0]).toBe('Invalid value for PORT: "70000" - Server port number');
  });
});

describe('validateAndLogEnvironment', () => {
  it('throws when the environment is unusable', () => {
    expect(() => validateAndLogEnvironment({ LOOKUP_TIMEOUT_MS: '0' })).toThrow('Environment validation failed');
  });

  it('returns the result when valid', () => {
    expect(validateAndLogEnvironment({}).valid).toBe(true);
  });
});
