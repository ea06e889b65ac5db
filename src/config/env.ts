import dotenv from 'dotenv';

dotenv.config();

export interface EnvConfig {
  PORT: number;
  NODE_ENV: string;
  LOG_LEVEL: string;
  CORS_ORIGIN: string;
  DATABASE_URL: string;
  DB_STATEMENT_TIMEOUT_MS: number;
  OPENAI_API_KEY: string;
  EMBEDDING_MODEL: string;
  EMBEDDING_DIMENSIONS: number;
  EMBEDDING_MAX_CHARS: number;
  EMBEDDING_TIMEOUT_MS: number;
  LLM_API_KEY: string;
  LLM_BASE_URL: string | undefined;
  LLM_MODEL: string;
  LLM_TIMEOUT_MS: number;
  LLM_MAX_RETRIES: number;
  RESCORING_ENABLED: boolean;
  MATCH_TOP_K: number;
  MATCH_MAX_TOP_K: number;
  CHAT_MAX_HISTORY_TURNS: number;
  CHAT_MAX_HISTORY_CHARS: number;
  TIKA_URL: string | undefined;
  TIKA_TIMEOUT_MS: number;
  MAX_UPLOAD_BYTES: number;
}

type EnvSource = Record<string, string | undefined>;

function requireVar(source: EnvSource, name: string): string {
  const value = source[name]?.trim();
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function optionalVar(source: EnvSource, name: string): string | undefined {
  const value = source[name]?.trim();
  return value ? value : undefined;
}

function intVar(source: EnvSource, name: string, fallback: number, min = 0): number {
  const raw = optionalVar(source, name);
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new Error(`Environment variable ${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return parsed;
}

function boolVar(source: EnvSource, name: string, fallback: boolean): boolean {
  const raw = optionalVar(source, name);
  if (raw === undefined) {
    return fallback;
  }
  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new Error(`Environment variable ${name} must be a boolean, got "${raw}"`);
  }
}

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const openAiKey = requireVar(source, 'OPENAI_API_KEY');
  const matchTopK = intVar(source, 'MATCH_TOP_K', 10, 1);
  const matchMaxTopK = intVar(source, 'MATCH_MAX_TOP_K', 50, 1);

  if (matchTopK > matchMaxTopK) {
    throw new Error('MATCH_TOP_K must not exceed MATCH_MAX_TOP_K');
  }

  return {
    PORT: intVar(source, 'PORT', 3000, 1),
    NODE_ENV: optionalVar(source, 'NODE_ENV') ?? 'development',
    LOG_LEVEL: optionalVar(source, 'LOG_LEVEL') ?? 'info',
    CORS_ORIGIN: optionalVar(source, 'CORS_ORIGIN') ?? '*',
    DATABASE_URL: requireVar(source, 'DATABASE_URL'),
    DB_STATEMENT_TIMEOUT_MS: intVar(source, 'DB_STATEMENT_TIMEOUT_MS', 10000),
    OPENAI_API_KEY: openAiKey,
    EMBEDDING_MODEL: optionalVar(source, 'EMBEDDING_MODEL') ?? 'text-embedding-3-small',
    EMBEDDING_DIMENSIONS: intVar(source, 'EMBEDDING_DIMENSIONS', 384, 1),
    EMBEDDING_MAX_CHARS: intVar(source, 'EMBEDDING_MAX_CHARS', 8000, 1),
    EMBEDDING_TIMEOUT_MS: intVar(source, 'EMBEDDING_TIMEOUT_MS', 15000, 1),
    LLM_API_KEY: optionalVar(source, 'LLM_API_KEY') ?? openAiKey,
    LLM_BASE_URL: optionalVar(source, 'LLM_BASE_URL'),
    LLM_MODEL: optionalVar(source, 'LLM_MODEL') ?? 'gpt-4o-mini',
    LLM_TIMEOUT_MS: intVar(source, 'LLM_TIMEOUT_MS', 20000, 1),
    LLM_MAX_RETRIES: intVar(source, 'LLM_MAX_RETRIES', 1),
    RESCORING_ENABLED: boolVar(source, 'RESCORING_ENABLED', true),
    MATCH_TOP_K: matchTopK,
    MATCH_MAX_TOP_K: matchMaxTopK,
    CHAT_MAX_HISTORY_TURNS: intVar(source, 'CHAT_MAX_HISTORY_TURNS', 10),
    CHAT_MAX_HISTORY_CHARS: intVar(source, 'CHAT_MAX_HISTORY_CHARS', 8000),
    TIKA_URL: optionalVar(source, 'TIKA_URL'),
    TIKA_TIMEOUT_MS: intVar(source, 'TIKA_TIMEOUT_MS', 30000, 1),
    MAX_UPLOAD_BYTES: intVar(source, 'MAX_UPLOAD_BYTES', 10 * 1024 * 1024, 1)
  };
}
