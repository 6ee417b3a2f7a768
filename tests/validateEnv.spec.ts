import { getEnv, parseEnvironment, validateEnvironment } from '../src/middleware/validateEnv';

describe('parseEnvironment', () => {
  test('applies defaults for a memory-backed setup', () => {
    const result = parseEnvironment({ STORAGE_DRIVER: 'memory' });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.env).toMatchObject({
        PORT: 3000,
        NODE_ENV: 'development',
        STORAGE_DRIVER: 'memory',
        OPENAI_MODEL: 'gpt-4.1-mini',
        OPENAI_TIMEOUT_MS: 25000,
        AUTH_TOKEN_TTL: '30d',
        UPLOAD_MAX_BYTES: 8 * 1024 * 1024,
        PENDING_MEAL_TTL_MINUTES: 30,
      });
      expect(result.env.OPENAI_API_KEY).toBeUndefined();
      expect(result.warnings).toEqual([
        'OPENAI_API_KEY is not set - meal analysis will not work',
        'AUTH_USERNAME / AUTH_PASSWORD_HASH / AUTH_TOKEN_SECRET not set - login will be refused',
        'STORAGE_DRIVER=memory - records are lost on restart',
      ]);
    }
  });

  test('postgres storage needs DATABASE_URL', () => {
    expect(parseEnvironment({})).toEqual({
      ok: false,
      errors: ['DATABASE_URL: DATABASE_URL is required when STORAGE_DRIVER=postgres'],
    });
  });

  test('a fully configured environment has no warnings', () => {
    const result = parseEnvironment({
      PORT: '8080',
      DATABASE_URL: 'postgres://localhost/health_test',
      OPENAI_API_KEY: 'test-key',
      AUTH_USERNAME: 'owner',
      AUTH_PASSWORD_HASH: 'scrypt:00:00',
      AUTH_TOKEN_SECRET: 'test-secret-test-secret-test-secret',
    });

    expect(result).toMatchObject({ ok: true, warnings: [] });
    if (result.ok) {
      expect(result.env.PORT).toBe(8080);
      expect(result.env.STORAGE_DRIVER).toBe('postgres');
    }
  });

  test('blank optional values count as unset', () => {
    const result = parseEnvironment({ STORAGE_DRIVER: 'memory', OPENAI_API_KEY: '   ' });
    expect(result.ok && result.env.OPENAI_API_KEY).toBeUndefined();
  });

  test('rejects a short token secret and a malformed TTL', () => {
    const result = parseEnvironment({
      STORAGE_DRIVER: 'memory',
      AUTH_TOKEN_SECRET: 'test-secret',
      AUTH_TOKEN_TTL: 'one month',
    });

    expect(result).toEqual({
      ok: false,
      errors: [
        'AUTH_TOKEN_SECRET: AUTH_TOKEN_SECRET must be at least 32 characters',
        'AUTH_TOKEN_TTL: AUTH_TOKEN_TTL must look like 30d, 12h, 45m or 60s',
      ],
    });
  });
});

describe('validateEnvironment', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('refuses to start on invalid configuration, then caches a valid one', () => {
    expect(() => validateEnvironment({})).toThrow('Invalid environment configuration. See errors above.');
    expect(() => getEnv()).toThrow('Environment not validated. Call validateEnvironment() first.');

    const env = validateEnvironment({ STORAGE_DRIVER: 'memory', PORT: '4000' });

    expect(env.PORT).toBe(4000);
    expect(getEnv()).toBe(env);
    expect(validateEnvironment({ STORAGE_DRIVER: 'memory', PORT: '5000' })).toBe(env);
  });
});
