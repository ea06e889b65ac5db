import { DataSource, Repository } from 'typeorm';
import { JobPostingEntity } from '../../entities/JobPostingEntity';
import {
  BulkInsertItem,
  BulkInsertOutcome,
  InsertResult,
  JobPosting,
  JobSearchHit,
  NewJobPosting,
  StoreStats
} from '../../interfaces/domain/JobPosting';
import { StoreUnavailableError, describeError } from '../../utils/errorHandler';
import { logger } from '../../utils/logger';
import { cosineDistanceToScore } from '../../utils/similarity';
import { JobStore, insertEach } from './jobStore';

const TABLE_NAME = 'job_postings';

interface JobRow {
  id: string;
  title: string;
  company: string;
  description: string;
  required_skills: string;
  location: string;
  salary_range: string;
  experience_level: string;
  education_requirements: string;
}

interface SearchRow extends JobRow {
  distance: number | string;
}

interface UpsertRow {
  id: string;
  created: boolean;
}

interface ColumnRow {
  dimensions: number | string;
}

export function toVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(',')}]`;
}

export function rowToJobPosting(row: JobRow): JobPosting {
  return {
    id: row.id,
    title: row.title,
    company: row.company,
    description: row.description,
    requiredSkills: row.required_skills,
    location: row.location,
    salaryRange: row.salary_range,
    experienceLevel: row.experience_level,
    educationRequirements: row.education_requirements
  };
}

export function rowToSearchHit(row: SearchRow): JobSearchHit {
  return {
    job: rowToJobPosting(row),
    similarityScore: cosineDistanceToScore(Number(row.distance))
  };
}

/**
 * Fails start-up when the configured embedding size differs from the column,
 * which would otherwise reject every insert and search. An unsized `VECTOR`
 * column (typmod -1) accepts any size.
 */
export function assertEmbeddingDimensions(columnDimensions: number | null, expected: number): void {
  if (columnDimensions === null) {
    throw new Error(`Table ${TABLE_NAME} has no embedding column; run the migrations first`);
  }
  if (columnDimensions >= 0 && columnDimensions !== expected) {
    throw new Error(
      `EMBEDDING_DIMENSIONS is ${expected} but ${TABLE_NAME}.embedding is VECTOR(${columnDimensions})`
    );
  }
}

function entityToJobPosting(entity: JobPostingEntity): JobPosting {
  return {
    id: entity.id,
    title: entity.title,
    company: entity.company,
    description: entity.description,
    requiredSkills: entity.requiredSkills,
    location: entity.location,
    salaryRange: entity.salaryRange,
    experienceLevel: entity.experienceLevel,
    educationRequirements: entity.educationRequirements
  };
}

/**
 * Job store backed by PostgreSQL with the pgvector extension.
 * Similarity is cosine distance (`<=>`) served by an HNSW index.
 */
export class PgVectorJobStore implements JobStore {
  constructor(private readonly dataSource: DataSource) {}

  private get repository(): Repository<JobPostingEntity> {
    return this.dataSource.getRepository(JobPostingEntity);
  }

  async insert(job: NewJobPosting, embedding: number[]): Promise<InsertResult> {
    const rows: UpsertRow[] = await this.run('insert', () => this.dataSource.query(
      `
        INSERT INTO ${TABLE_NAME} (
          id, title, company, description, required_skills, location,
          salary_range, experience_level, education_requirements, embedding
        )
        VALUES (COALESCE($1, uuid_generate_v4()::text), $2, $3, $4, $5, $6, $7, $8, $9, $10::vector)
        ON CONFLICT (id) DO UPDATE SET
          title = EXCLUDED.title,
          company = EXCLUDED.company,
          description = EXCLUDED.description,
          required_skills = EXCLUDED.required_skills,
          location = EXCLUDED.location,
          salary_range = EXCLUDED.salary_range,
          experience_level = EXCLUDED.experience_level,
          education_requirements = EXCLUDED.education_requirements,
          embedding = EXCLUDED.embedding,
          updated_at = now()
        RETURNING id, (xmax = 0) AS created
      `,
      [
        job.id ?? null,
        job.title,
        job.company,
        job.description,
        job.requiredSkills,
        job.location,
        job.salaryRange,
        job.experienceLevel,
        job.educationRequirements,
        toVectorLiteral(embedding)
      ]
    ));

    const [row] = rows;
    if (!row) {
      throw new StoreUnavailableError('Job store did not confirm the insert, please retry');
    }

    logger.info(row.created ? 'Inserted job posting' : 'Replaced job posting', { jobId: row.id });
    return { id: row.id, created: row.created };
  }

  async bulkInsert(items: BulkInsertItem[]): Promise<BulkInsertOutcome[]> {
    return insertEach(this, items);
  }

  async search(embedding: number[], topK: number): Promise<JobSearchHit[]> {
    if (topK < 1) {
      return [];
    }

    const rows: SearchRow[] = await this.run('search', () => this.dataSource.query(
      `
        SELECT
          id, title, company, description, required_skills, location,
          salary_range, experience_level, education_requirements,
          embedding <=> $1::vector AS distance
        FROM ${TABLE_NAME}
        ORDER BY embedding <=> $1::vector, id
        LIMIT $2
      `,
      [toVectorLiteral(embedding), Math.floor(topK)]
    ));

    return rows.map(rowToSearchHit);
  }

  async get(id: string): Promise<JobPosting | null> {
    const entity = await this.run('get', () => this.repository.findOne({ where: { id } }));
    return entity ? entityToJobPosting(entity) : null;
  }

  async remove(id: string): Promise<boolean> {
    const result = await this.run('remove', () => this.repository.delete({ id }));
    const removed = (result.affected ?? 0) > 0;
    if (removed) {
      logger.info('Deleted job posting', { jobId: id });
    }
    return removed;
  }

  async stats(): Promise<StoreStats> {
    const rowCount = await this.run('stats', () => this.repository.count());
    return { collectionName: TABLE_NAME, rowCount };
  }

  /** Declared size of the embedding column, or null when the table does not exist. */
  async embeddingDimensions(): Promise<number | null> {
    const rows: ColumnRow[] = await this.run('describe', () => this.dataSource.query(
      `
        SELECT atttypmod AS dimensions
        FROM pg_attribute
        WHERE attrelid = to_regclass($1) AND attname = 'embedding' AND NOT attisdropped
      `,
      [TABLE_NAME]
    ));

    const [row] = rows;
    return row ? Number(row.dimensions) : null;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        throw error;
      }
      logger.error('Job store operation failed', { operation, error: describeError(error) });
      throw new StoreUnavailableError();
    }
  }
}
