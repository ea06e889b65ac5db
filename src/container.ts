import { DataSource } from 'typeorm';
import { createDataSource } from './config/data-source';
import type { EnvConfig } from './config/env';
import { AdvisorService } from './models/advisor/advisor.service';
import { JobIngestionService } from './models/jobs/jobIngestion.service';
import { JobStore } from './models/jobs/jobStore';
import { PgVectorJobStore, assertEmbeddingDimensions } from './models/jobs/pgVectorJobStore';
import { MatcherService } from './models/matching/matcher.service';
import { Rescorer } from './models/matching/rescorer';
import { EmbeddingBackend, EmbeddingService, OpenAiEmbeddingBackend } from './utils/embedding';
import { LlmClient, OpenAiLlmClient } from './utils/llmClient';
import { logger } from './utils/logger';
import { DocumentExtractor } from './utils/textParser';

const MAX_DOCUMENT_CHARS = 50_000;
const RESCORE_MAX_CV_CHARS = 6_000;
const RESCORE_MAX_TOKENS = 1_500;
const ANALYSIS_MAX_CV_CHARS = 3_000;
const ANALYSIS_MAX_TOKENS = 1_000;
const CHAT_MAX_TOKENS = 800;

export type ServiceSettings = Pick<
  EnvConfig,
  | 'EMBEDDING_DIMENSIONS'
  | 'EMBEDDING_MAX_CHARS'
  | 'RESCORING_ENABLED'
  | 'MATCH_TOP_K'
  | 'MATCH_MAX_TOP_K'
  | 'CHAT_MAX_HISTORY_TURNS'
  | 'CHAT_MAX_HISTORY_CHARS'
  | 'TIKA_URL'
  | 'TIKA_TIMEOUT_MS'
>;

export interface ServiceDependencies {
  embeddingBackend: EmbeddingBackend;
  store: JobStore;
  llm: LlmClient;
}

export interface Services {
  extractor: DocumentExtractor;
  embeddings: EmbeddingService;
  store: JobStore;
  matcher: MatcherService;
  ingestion: JobIngestionService;
  advisor: AdvisorService;
}

export interface ServiceContainer extends Services {
  dataSource: DataSource;
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
}

/** Wires the services around whichever backends it is given. */
export function assembleServices(deps: ServiceDependencies, settings: ServiceSettings): Services {
  const embeddings = new EmbeddingService(deps.embeddingBackend, {
    dimensions: settings.EMBEDDING_DIMENSIONS,
    maxChars: settings.EMBEDDING_MAX_CHARS
  });

  const rescorer = new Rescorer(deps.llm, {
    maxCvChars: RESCORE_MAX_CV_CHARS,
    maxTokens: RESCORE_MAX_TOKENS
  });

  return {
    extractor: new DocumentExtractor({
      tikaUrl: settings.TIKA_URL,
      tikaTimeoutMs: settings.TIKA_TIMEOUT_MS,
      maxDocumentChars: MAX_DOCUMENT_CHARS
    }),
    embeddings,
    store: deps.store,
    matcher: new MatcherService(embeddings, deps.store, rescorer, deps.llm, {
      defaultTopK: settings.MATCH_TOP_K,
      maxTopK: settings.MATCH_MAX_TOP_K,
      rescoringEnabled: settings.RESCORING_ENABLED,
      analysisMaxCvChars: ANALYSIS_MAX_CV_CHARS,
      analysisMaxTokens: ANALYSIS_MAX_TOKENS
    }),
    ingestion: new JobIngestionService(embeddings, deps.store),
    advisor: new AdvisorService(deps.llm, {
      maxHistoryTurns: settings.CHAT_MAX_HISTORY_TURNS,
      maxHistoryChars: settings.CHAT_MAX_HISTORY_CHARS,
      maxTokens: CHAT_MAX_TOKENS
    })
  };
}

export function createServices(env: EnvConfig): ServiceContainer {
  const dataSource = createDataSource(env);
  const store = new PgVectorJobStore(dataSource);

  const services = assembleServices(
    {
      embeddingBackend: new OpenAiEmbeddingBackend({
        apiKey: env.OPENAI_API_KEY,
        model: env.EMBEDDING_MODEL,
        dimensions: env.EMBEDDING_DIMENSIONS,
        timeoutMs: env.EMBEDDING_TIMEOUT_MS,
        maxRetries: env.LLM_MAX_RETRIES
      }),
      store,
      llm: new OpenAiLlmClient({
        apiKey: env.LLM_API_KEY,
        baseURL: env.LLM_BASE_URL,
        model: env.LLM_MODEL,
        timeoutMs: env.LLM_TIMEOUT_MS,
        maxRetries: env.LLM_MAX_RETRIES
      })
    },
    env
  );

  return {
    ...services,
    dataSource,

    async initialize() {
      logger.info('Initializing database connection...');
      await dataSource.initialize();
      const migrations = await dataSource.runMigrations({ transaction: 'each' });
      logger.info('Database connected', { migrationsApplied: migrations.length });
      assertEmbeddingDimensions(await store.embeddingDimensions(), env.EMBEDDING_DIMENSIONS);

      await services.embeddings.initialize();
    },

    async shutdown() {
      if (dataSource.isInitialized) {
        await dataSource.destroy();
        logger.info('Database connection closed');
      }
    }
  };
}
