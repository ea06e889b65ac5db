import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateJobPostings1700000000000 implements MigrationInterface {
  name = 'CreateJobPostings1700000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    // Enable extensions
    await queryRunner.query('CREATE EXTENSION IF NOT EXISTS "uuid-ossp"');
    await queryRunner.query('CREATE EXTENSION IF NOT EXISTS "vector"');

    // Dimension must match EMBEDDING_DIMENSIONS
    await queryRunner.query(`
      CREATE TABLE job_postings (
        id TEXT PRIMARY KEY DEFAULT uuid_generate_v4()::text,
        title TEXT NOT NULL,
        company TEXT NOT NULL DEFAULT '',
        description TEXT NOT NULL,
        required_skills TEXT NOT NULL DEFAULT '',
        location TEXT NOT NULL DEFAULT '',
        salary_range TEXT NOT NULL DEFAULT '',
        experience_level TEXT NOT NULL DEFAULT '',
        education_requirements TEXT NOT NULL DEFAULT '',
        embedding VECTOR(384) NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `);

    await queryRunner.query(
      'CREATE INDEX job_postings_embedding_idx ON job_postings USING hnsw (embedding vector_cosine_ops)'
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('DROP INDEX IF EXISTS job_postings_embedding_idx');
    await queryRunner.query('DROP TABLE IF EXISTS job_postings');
  }
}
