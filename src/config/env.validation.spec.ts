import { validateEnv } from './env.validation';

describe('validateEnv', () => {
  it('should apply defaults to an empty environment', () => {
    expect(validateEnv({})).toEqual({
      NODE_ENV: 'development',
      PORT: 3000,
      CORS_ORIGIN: 'http://localhost:5173',
      DB_HOST: 'localhost',
      DB_PORT: 5432,
      DB_USERNAME: 'admin',
      DB_PASSWORD: 'admin',
      DB_DATABASE: 'solar_db',
      DB_SSL: false,
    });
  });

  it('should coerce numeric and boolean settings', () => {
    const env = validateEnv({ PORT: '8080', DB_PORT: '6543', DB_SSL: 'true' });

    expect(env.PORT).toBe(8080);
    expect(env.DB_PORT).toBe(6543);
    expect(env.DB_SSL).toBe(true);
  });

  it('should keep PPA settings as raw strings', () => {
    const env = validateEnv({
      DEFAULT_PPA_RATE: '55',
      SITE_PPA_RATES: '{"site001": 60}',
    });

    expect(env.DEFAULT_PPA_RATE).toBe('55');
    expect(env.SITE_PPA_RATES).toBe('{"site001": 60}');
  });

  it('should list every invalid variable', () => {
    expect(() => validateEnv({ PORT: 'abc', NODE_ENV: 'staging' })).toThrow(
      /^Invalid environment configuration: .*NODE_ENV.*PORT/,
    );
  });
});
