import { makeJob } from '../../testing/fakes';
import { insertEach } from './jobStore';
import { assertEmbeddingDimensions, rowToSearchHit, toVectorLiteral } from './pgVectorJobStore';

describe('toVectorLiteral', () => {
  it('formats embeddings the way pgvector parses them', () => {
    expect(toVectorLiteral([0.5, -0.25, 1])).toBe('[0.5,-0.25,1]');
  });
});

describe('rowToSearchHit', () => {
  it('converts cosine distance to a 0-100 score', () => {
    const hit = rowToSearchHit({
      id: 'job-1',
      title: 'Software Engineer',
      company: 'Acme',
      description: 'Build services',
      required_skills: 'Python, SQL',
      location: '',
      salary_range: '',
      experience_level: 'Mid-level',
      education_requirements: '',
      distance: '0.1234'
    });

    expect(hit).toEqual({
      job: {
        id: 'job-1',
        title: 'Software Engineer',
        company: 'Acme',
        description: 'Build services',
        requiredSkills: 'Python, SQL',
        location: '',
        salaryRange: '',
        experienceLevel: 'Mid-level',
        educationRequirements: ''
      },
      similarityScore: 87.66
    });
  });
});

describe('assertEmbeddingDimensions', () => {
  it('accepts a matching or unsized column', () => {
    expect(() => assertEmbeddingDimensions(384, 384)).not.toThrow();
    expect(() => assertEmbeddingDimensions(-1, 1536)).not.toThrow();
  });

  it('rejects a column of another size', () => {
    expect(() => assertEmbeddingDimensions(384, 1536))
      .toThrow('EMBEDDING_DIMENSIONS is 1536 but job_postings.embedding is VECTOR(384)');
  });

  it('rejects a missing column', () => {
    expect(() => assertEmbeddingDimensions(null, 384))
      .toThrow('Table job_postings has no embedding column; run the migrations first');
  });
});

describe('insertEach', () => {
  it('keeps going after a failed item', async () => {
    const store = {
      insert: jest.fn(async (job: { id?: string }) => {
        if (job.id === 'bad') {
          throw new Error('value too long');
        }
        return { id: job.id ?? 'generated', created: true };
      })
    };

    const outcomes = await insertEach(store, [
      { job: makeJob('good-1'), embedding: [1] },
      { job: makeJob('bad'), embedding: [1] },
      { job: makeJob('good-2'), embedding: [1] }
    ]);

    expect(outcomes).toEqual([
      { index: 0, status: 'inserted', id: 'good-1', created: true },
      { index: 1, status: 'failed', error: 'value too long', id: 'bad' },
      { index: 2, status: 'inserted', id: 'good-2', created: true }
    ]);
  });
});
