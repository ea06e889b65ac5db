import { assembleServices, ServiceSettings, Services } from '../container';
import {
  BulkInsertItem,
  BulkInsertOutcome,
  InsertResult,
  JobPosting,
  JobSearchHit,
  NewJobPosting,
  StoreStats
} from '../interfaces/domain/JobPosting';
import { insertEach, JobStore } from '../models/jobs/jobStore';
import { EmbeddingBackend } from '../utils/embedding';
import { LlmError } from '../utils/errorHandler';
import { LlmClient, LlmRequest } from '../utils/llmClient';
import { cosineSimilarity, similarityToScore } from '../utils/similarity';

export const TEST_DIMENSIONS = 64;

function hashToken(token: string): number {
  // FNV-1a
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/** Bag-of-words vectors: texts sharing words point the same way. */
export class HashingEmbeddingBackend implements EmbeddingBackend {
  readonly model = 'hashing-test';
  calls: string[][] = [];
  failure: Error | null = null;

  constructor(private readonly dimensions = TEST_DIMENSIONS) {}

  async embed(inputs: string[]): Promise<number[][]> {
    this.calls.push(inputs);
    if (this.failure) {
      throw this.failure;
    }
    return inputs.map(input => this.vectorize(input));
  }

  vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of text.toLowerCase().split(/[^\p{L}\p{N}]+/u)) {
      if (token) {
        vector[hashToken(token) % this.dimensions] += 1;
      }
    }
    return vector;
  }
}

export class InMemoryJobStore implements JobStore {
  private readonly rows = new Map<string, { job: JobPosting; embedding: number[] }>();
  private sequence = 0;
  failure: Error | null = null;

  async insert(job: NewJobPosting, embedding: number[]): Promise<InsertResult> {
    this.check();
    const id = job.id ?? `generated-${++this.sequence}`;
    const created = !this.rows.has(id);
    this.rows.set(id, { job: { ...job, id }, embedding });
    return { id, created };
  }

  async bulkInsert(items: BulkInsertItem[]): Promise<BulkInsertOutcome[]> {
    return insertEach(this, items);
  }

  async search(embedding: number[], topK: number): Promise<JobSearchHit[]> {
    this.check();
    if (topK < 1) {
      return [];
    }
    return [...this.rows.values()]
      .map(row => ({ job: row.job, similarity: cosineSimilarity(embedding, row.embedding) }))
      .sort((a, b) => b.similarity - a.similarity || a.job.id.localeCompare(b.job.id))
      .slice(0, topK)
      .map(({ job, similarity }) => ({ job, similarityScore: similarityToScore(similarity) }));
  }

  async get(id: string): Promise<JobPosting | null> {
    this.check();
    return this.rows.get(id)?.job ?? null;
  }

  async remove(id: string): Promise<boolean> {
    this.check();
    return this.rows.delete(id);
  }

  async stats(): Promise<StoreStats> {
    this.check();
    return { collectionName: 'job_postings', rowCount: this.rows.size };
  }

  private check(): void {
    if (this.failure) {
      throw this.failure;
    }
  }
}

type ScriptedReply = string | Error | ((request: LlmRequest) => string);

/** Replies by request purpose. Unscripted purposes fail like an unreachable model. */
export class ScriptedLlmClient implements LlmClient {
  readonly requests: LlmRequest[] = [];
  private readonly replies = new Map<string, ScriptedReply>();

  respond(purpose: string, reply: ScriptedReply): this {
    this.replies.set(purpose, reply);
    return this;
  }

  async complete(request: LlmRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.get(request.purpose);
    if (reply === undefined) {
      throw new LlmError();
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === 'function' ? reply(request) : reply;
  }

  callsFor(purpose: string): LlmRequest[] {
    return this.requests.filter(request => request.purpose === purpose);
  }
}

/** A well-formed rescoring reply covering the given job ids. */
export function rescoreReply(scores: Record<string, number>): string {
  return JSON.stringify({
    scores: Object.entries(scores).map(([job_id, score]) => ({ job_id, score, justification: `Scored ${score}` }))
  });
}

export const testSettings: ServiceSettings = {
  EMBEDDING_DIMENSIONS: TEST_DIMENSIONS,
  EMBEDDING_MAX_CHARS: 8000,
  RESCORING_ENABLED: true,
  MATCH_TOP_K: 10,
  MATCH_MAX_TOP_K: 50,
  CHAT_MAX_HISTORY_TURNS: 10,
  CHAT_MAX_HISTORY_CHARS: 8000,
  TIKA_URL: undefined,
  TIKA_TIMEOUT_MS: 1000
};

export interface TestServices extends Services {
  backend: HashingEmbeddingBackend;
  memoryStore: InMemoryJobStore;
  llm: ScriptedLlmClient;
}

export async function createTestServices(overrides: Partial<ServiceSettings> = {}): Promise<TestServices> {
  const backend = new HashingEmbeddingBackend();
  const memoryStore = new InMemoryJobStore();
  const llm = new ScriptedLlmClient();
  const services = assembleServices({ embeddingBackend: backend, store: memoryStore, llm }, { ...testSettings, ...overrides });
  await services.embeddings.initialize();
  return { ...services, backend, memoryStore, llm };
}

export function makeJob(id: string, fields: Partial<NewJobPosting> = {}): NewJobPosting {
  return {
    id,
    title: 'Software Engineer',
    company: '',
    description: '',
    requiredSkills: '',
    location: '',
    salaryRange: '',
    experienceLevel: '',
    educationRequirements: '',
    ...fields
  };
}
