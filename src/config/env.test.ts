import { loadEnv } from './env';

const base = { DATABASE_URL: 'postgres://localhost:5432/jobs_test', OPENAI_API_KEY: 'test-secret' };

describe('loadEnv', () => {
  it('applies defaults', () => {
    const env = loadEnv(base);

    expect(env).toMatchObject({
      PORT: 3000,
      NODE_ENV: 'development',
      EMBEDDING_MODEL: 'text-embedding-3-small',
      EMBEDDING_DIMENSIONS: 384,
      LLM_API_KEY: 'test-secret',
      LLM_BASE_URL: undefined,
      LLM_MODEL: 'gpt-4o-mini',
      RESCORING_ENABLED: true,
      MATCH_TOP_K: 10,
      MATCH_MAX_TOP_K: 50,
      CHAT_MAX_HISTORY_TURNS: 10,
      CHAT_MAX_HISTORY_CHARS: 8000,
      TIKA_URL: undefined,
      MAX_UPLOAD_BYTES: 10 * 1024 * 1024
    });
  });

  it('reads overrides', () => {
    const env = loadEnv({
      ...base,
      PORT: '8080',
      LLM_API_KEY: 'test-llm-secret',
      LLM_BASE_URL: 'https://llm.example.test/openai/v1',
      RESCORING_ENABLED: 'false',
      TIKA_URL: ' http://localhost:9998 '
    });

    expect(env.PORT).toBe(8080);
    expect(env.LLM_API_KEY).toBe('test-llm-secret');
    expect(env.LLM_BASE_URL).toBe('https://llm.example.test/openai/v1');
    expect(env.RESCORING_ENABLED).toBe(false);
    expect(env.TIKA_URL).toBe('http://localhost:9998');
  });

  it('names the missing variable', () => {
    expect(() => loadEnv({ OPENAI_API_KEY: 'test-secret' })).toThrow('Missing required environment variable: DATABASE_URL');
  });

  it('rejects malformed values', () => {
    expect(() => loadEnv({ ...base, PORT: 'abc' })).toThrow('Environment variable PORT must be an integer >= 1, got "abc"');
    expect(() => loadEnv({ ...base, RESCORING_ENABLED: 'maybe' })).toThrow('Environment variable RESCORING_ENABLED must be a boolean, got "maybe"');
  });

  it('keeps the default top_k within the maximum', () => {
    expect(() => loadEnv({ ...base, MATCH_TOP_K: '60' })).toThrow('MATCH_TOP_K must not exceed MATCH_MAX_TOP_K');
  });
});
