import { loadConfig } from './app.config';

describe('loadConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.OPENAI_API_KEY;
    delete process.env.SCHEDULE_RETENTION;
    delete process.env.EXPLANATION_TIMEOUT_MS;
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('should fall back to defaults and leave OpenAI unconfigured', () => {
    const config = loadConfig();

    expect(config.scheduleRetention).toBe(5);
    expect(config.explanationTimeoutMs).toBe(500);
    expect(config.openai).toBeUndefined();
  });

  it('should configure OpenAI when an API key is present', () => {
    process.env.OPENAI_API_KEY = 'test-secret';

    const config = loadConfig();

    expect(config.openai?.apiKey).toBe('test-secret');
  });

  // Test: Bad numeric settings stop start-up
  it('should reject an out-of-range setting', () => {
    process.env.SCHEDULE_RETENTION = '0';

    expect(() => loadConfig()).toThrow('SCHEDULE_RETENTION must be an integer between 1 and 100');
  });

  it('should reject a non-numeric setting', () => {
    process.env.EXPLANATION_TIMEOUT_MS = 'soon';

    expect(() => loadConfig()).toThrow('EXPLANATION_TIMEOUT_MS must be an integer between 1 and 60000');
  });
});
