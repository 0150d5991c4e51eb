import { corsOrigins, parseEnv } from '../config';

describe('config', () => {
  it('should apply defaults', () => {
    const env = parseEnv({});
    expect(env.PORT).toBe(3000);
    expect(env.LOG_LEVEL).toBe('info');
    expect(env.DEFAULT_MAX_CANDIDATES).toBe(1000);
    expect(env.MAX_CANDIDATES_LIMIT).toBe(10000);
  });

  it('should coerce numeric variables', () => {
    const env = parseEnv({ PORT: '8080', DEFAULT_MAX_CANDIDATES: '50' });
    expect(env.PORT).toBe(8080);
    expect(env.DEFAULT_MAX_CANDIDATES).toBe(50);
  });

  it('should reject invalid values', () => {
    expect(() => parseEnv({ DEFAULT_MAX_CANDIDATES: '0' })).toThrow();
    expect(() => parseEnv({ LOG_LEVEL: 'verbose' })).toThrow();
  });

  it('should split the CORS origin list', () => {
    const env = parseEnv({ CORS_ORIGIN: 'https://a.example, https://b.example,' });
    expect(corsOrigins(env)).toEqual(['https://a.example', 'https://b.example']);
  });
});
