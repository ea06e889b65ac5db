import { ZodError } from 'zod';
import sampleJobs from '../../data/sampleJobs.json';
import {
  BulkInsertItem,
  BulkInsertOutcome,
  InsertResult,
  NewJobPosting,
  jobEmbeddingText
} from '../../interfaces/domain/JobPosting';
import { jobRecordSchema, toNewJobPosting } from '../../interfaces/dto/JobRecordDto';
import { EmbeddingService } from '../../utils/embedding';
import { ValidationError, describeError } from '../../utils/errorHandler';
import { UploadedDocument } from '../../utils/textParser';
import { parseJobFile } from '../../utils/jobImport';
import { logger } from '../../utils/logger';
import { JobStore } from './jobStore';

export interface IngestionReport {
  insertedCount: number;
  failedCount: number;
  results: BulkInsertOutcome[];
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export class JobIngestionService {
  constructor(
    private readonly embeddings: EmbeddingService,
    private readonly store: JobStore
  ) {}

  async addJob(record: unknown): Promise<InsertResult> {
    const parsed = jobRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'Invalid job record');
    }
    const job = toNewJobPosting(parsed.data);
    const embedding = await this.embeddings.embed(jobEmbeddingText(job));
    return this.store.insert(job, embedding);
  }

  /**
   * Validates, embeds and stores every record independently. Invalid records
   * and records whose embedding or insert fails are reported, never thrown.
   */
  async addJobs(records: unknown[]): Promise<IngestionReport> {
    const results: BulkInsertOutcome[] = [];
    const valid: Array<{ index: number; job: NewJobPosting }> = [];

    records.forEach((record, index) => {
      const parsed = jobRecordSchema.safeParse(record);
      if (parsed.success) {
        valid.push({ index, job: toNewJobPosting(parsed.data) });
      } else {
        results.push({ index, status: 'failed', error: `Invalid job record: ${formatIssues(parsed.error)}` });
      }
    });

    const embedded = await this.embedAll(valid, results);
    const outcomes = await this.store.bulkInsert(embedded.map(({ item }) => item));

    // Store outcomes are indexed by position in `embedded`; map back to the request.
    for (const outcome of outcomes) {
      results.push({ ...outcome, index: embedded[outcome.index].index });
    }

    results.sort((a, b) => a.index - b.index);
    const insertedCount = results.filter(result => result.status === 'inserted').length;
    const report: IngestionReport = {
      insertedCount,
      failedCount: results.length - insertedCount,
      results
    };

    logger.info('Job batch ingested', {
      received: records.length,
      inserted: report.insertedCount,
      failed: report.failedCount
    });
    return report;
  }

  async importFile(file: UploadedDocument): Promise<IngestionReport> {
    const records = parseJobFile(file);
    if (records.length === 0) {
      throw new ValidationError('No job records found in file');
    }
    logger.info('Parsed job file', { filename: file.originalname, records: records.length });
    return this.addJobs(records);
  }

  async addSampleJobs(): Promise<IngestionReport> {
    return this.addJobs(sampleJobs);
  }

  private async embedAll(
    valid: Array<{ index: number; job: NewJobPosting }>,
    results: BulkInsertOutcome[]
  ): Promise<Array<{ index: number; item: BulkInsertItem }>> {
    if (valid.length === 0) {
      return [];
    }

    try {
      const vectors = await this.embeddings.embedMany(valid.map(({ job }) => jobEmbeddingText(job)));
      return valid.map(({ index, job }, i) => ({ index, item: { job, embedding: vectors[i] } }));
    } catch (error) {
      logger.warn('Batch embedding failed, embedding jobs one by one', { error: describeError(error) });
    }

    const embedded: Array<{ index: number; item: BulkInsertItem }> = [];
    for (const { index, job } of valid) {
      try {
        const embedding = await this.embeddings.embed(jobEmbeddingText(job));
        embedded.push({ index, item: { job, embedding } });
      } catch (error) {
        results.push({
          index,
          status: 'failed',
          error: describeError(error),
          ...(job.id ? { id: job.id } : {})
        });
      }
    }
    return embedded;
  }
}
