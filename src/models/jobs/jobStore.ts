import {
  BulkInsertItem,
  BulkInsertOutcome,
  InsertResult,
  JobPosting,
  JobSearchHit,
  NewJobPosting,
  StoreStats
} from '../../interfaces/domain/JobPosting';

/**
 * Vector-indexed collection of job postings.
 *
 * Inserting an id that already exists replaces the stored posting and its
 * embedding (`created: false`). Implementations must allow concurrent reads
 * while writes are in flight.
 */
export interface JobStore {
  insert(job: NewJobPosting, embedding: number[]): Promise<InsertResult>;
  /** Inserts each item on its own; a failed item never aborts the rest. */
  bulkInsert(items: BulkInsertItem[]): Promise<BulkInsertOutcome[]>;
  /** At most `topK` hits, best first. Empty store gives an empty list. */
  search(embedding: number[], topK: number): Promise<JobSearchHit[]>;
  get(id: string): Promise<JobPosting | null>;
  remove(id: string): Promise<boolean>;
  stats(): Promise<StoreStats>;
}

export async function insertEach(
  store: Pick<JobStore, 'insert'>,
  items: BulkInsertItem[]
): Promise<BulkInsertOutcome[]> {
  const outcomes: BulkInsertOutcome[] = [];
  for (const [index, item] of items.entries()) {
    try {
      const result = await store.insert(item.job, item.embedding);
      outcomes.push({ index, status: 'inserted', id: result.id, created: result.created });
    } catch (error) {
      outcomes.push({
        index,
        status: 'failed',
        error: error instanceof Error ? error.message : String(error),
        ...(item.job.id ? { id: item.job.id } : {})
      });
    }
  }
  return outcomes;
}
