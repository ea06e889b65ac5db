import OpenAI from 'openai';
import { EmbeddingError, describeError } from './errorHandler';
import { logger } from './logger';

export interface EmbeddingBackend {
  readonly model: string;
  embed(inputs: string[]): Promise<number[][]>;
}

export interface OpenAiEmbeddingBackendOptions {
  apiKey: string;
  model: string;
  dimensions: number;
  timeoutMs: number;
  maxRetries?: number;
}

export class OpenAiEmbeddingBackend implements EmbeddingBackend {
  readonly model: string;
  private readonly client: OpenAI;
  private readonly dimensions: number;

  constructor(options: OpenAiEmbeddingBackendOptions) {
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: options.maxRetries ?? 1
    });
  }

  async embed(inputs: string[]): Promise<number[][]> {
    const response = await this.client.embeddings.create({
      model: this.model,
      input: inputs,
      dimensions: this.dimensions
    });

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map(item => item.embedding);
  }
}

export interface EmbeddingServiceOptions {
  dimensions: number;
  maxChars: number;
}

export function l2Normalize(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  if (norm === 0) {
    return vector.slice();
  }
  return vector.map(value => value / norm);
}

/**
 * Process-wide embedding generator. Built once by the service container,
 * initialized at start-up and shared read-only by every request.
 */
export class EmbeddingService {
  private initialized = false;

  constructor(
    private readonly backend: EmbeddingBackend,
    private readonly options: EmbeddingServiceOptions
  ) {}

  get dimensions(): number {
    return this.options.dimensions;
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    logger.info('Loading embedding model', { model: this.backend.model, dimensions: this.options.dimensions });
    await this.request(['embedding model warm-up']);
    this.initialized = true;
    logger.info('Embedding model ready', { model: this.backend.model });
  }

  /** Collapses whitespace and cuts the input to the model's character budget. */
  prepareInput(text: string): string {
    const collapsed = (text || '').replace(/\s+/g, ' ').trim();
    return collapsed.length > this.options.maxChars ? collapsed.slice(0, this.options.maxChars) : collapsed;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedMany([text]);
    return vector;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (!this.initialized) {
      throw new EmbeddingError('Embedding model is not initialized');
    }
    if (texts.length === 0) {
      return [];
    }
    return this.request(texts);
  }

  private async request(texts: string[]): Promise<number[][]> {
    const inputs = texts.map(text => this.prepareInput(text));
    if (inputs.some(input => input.length === 0)) {
      throw new EmbeddingError('Cannot embed empty text');
    }

    let vectors: number[][];
    try {
      vectors = await this.backend.embed(inputs);
    } catch (error) {
      logger.error('Failed to generate embeddings', { model: this.backend.model, error: describeError(error) });
      throw new EmbeddingError();
    }

    if (vectors.length !== inputs.length) {
      logger.error('Embedding backend returned wrong number of vectors', { expected: inputs.length, actual: vectors.length });
      throw new EmbeddingError();
    }

    const wrongSize = vectors.find(vector => vector.length !== this.options.dimensions);
    if (wrongSize) {
      logger.error('Embedding dimensionality mismatch', {
        expected: this.options.dimensions,
        actual: wrongSize.length
      });
      throw new EmbeddingError('Embedding model returned vectors of unexpected size');
    }

    return vectors.map(l2Normalize);
  }
}
