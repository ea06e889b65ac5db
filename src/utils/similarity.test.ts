import { clampScore, cosineDistanceToScore, cosineSimilarity, roundScore, similarityToScore } from './similarity';

describe('similarity', () => {
  it('computes cosine similarity', () => {
    expect(cosineSimilarity([1, 0], [2, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('rejects vectors of different lengths', () => {
    expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow('Vector length mismatch: 2 vs 3');
  });

  it('maps similarity to a rounded 0-100 score', () => {
    expect(similarityToScore(0.87654)).toBe(87.65);
    expect(similarityToScore(-0.3)).toBe(0);
    expect(similarityToScore(1.2)).toBe(100);
  });

  it('maps cosine distance to a score', () => {
    expect(cosineDistanceToScore(0.25)).toBe(75);
    expect(cosineDistanceToScore(0)).toBe(100);
    expect(cosineDistanceToScore(1.5)).toBe(0);
  });

  it('treats non-finite scores as zero', () => {
    expect(clampScore(Number.NaN)).toBe(0);
    expect(roundScore(12.345678)).toBe(12.35);
  });
});
