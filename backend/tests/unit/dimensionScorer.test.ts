import { describe, it, expect } from 'vitest';
import type { DimensionResponse } from '@maturity/shared';
import { ValidationError } from '../../src/lib/errors.js';
import { scoreDimensions } from '../../src/services/maturity/dimensionScorer.js';
import { classifyMaturity } from '../../src/services/maturity/maturityClassifier.js';
import { DEFAULT_WEIGHTS, responsesFor } from '../utils/testHelpers.js';

describe('scoreDimensions', () => {
  it('computes the weighted overall score from dimension scores', () => {
    const responses = responsesFor({ data: 80, process: 60, people: 40, technology: 60, governance: 20 });

    const result = scoreDimensions(responses, DEFAULT_WEIGHTS);

    expect(result.dimensionScores).toEqual({
      data: 80,
      process: 60,
      people: 40,
      technology: 60,
      governance: 20,
    });
    expect(result.overallScore).toBe(55);
    expect(classifyMaturity(result.overallScore)).toEqual({ level: 3, label: 'Defined' });
  });

  it('rejects responses for dimensions outside the model', () => {
    const responses = [
      ...responsesFor({ data: 80, process: 60, people: 40, technology: 60, governance: 20 }),
      { dimension: 'strategy', questionId: 'strategy-q1', value: 50 },
    ];

    expect(() => scoreDimensions(responses, DEFAULT_WEIGHTS)).toThrow(
      new ValidationError('Unknown dimensions for questions: strategy-q1')
    );
  });

  it('weights responses within a dimension', () => {
    const responses: DimensionResponse[] = [
      ...responsesFor({ data: 0, process: 50, people: 50, technology: 50, governance: 50 }).filter(
        (response) => response.dimension !== 'data'
      ),
      { id: 'r1', assessmentId: 'assessment-1', dimension: 'data', questionId: 'data-q1', value: 100, weight: 3 },
      { id: 'r2', assessmentId: 'assessment-1', dimension: 'data', questionId: 'data-q2', value: 20 },
    ];

    const result = scoreDimensions(responses, DEFAULT_WEIGHTS);

    expect(result.dimensionScores.data).toBe(80);
  });

  it('honours a custom weight table', () => {
    const responses = responsesFor({ data: 100, process: 0, people: 0, technology: 0, governance: 0 });

    const result = scoreDimensions(responses, {
      data: 0.5,
      process: 0.125,
      people: 0.125,
      technology: 0.125,
      governance: 0.125,
    });

    expect(result.overallScore).toBe(50);
  });

  it('requires every dimension', () => {
    const responses = responsesFor({ data: 80, process: 60, people: 40, technology: 60, governance: 20 }).filter(
      (response) => response.dimension !== 'governance'
    );

    expect(() => scoreDimensions(responses, DEFAULT_WEIGHTS)).toThrow(
      'Responses missing for dimensions: governance'
    );
  });

  it('rejects values outside [0, 100]', () => {
    const responses = responsesFor({ data: 120, process: 60, people: 40, technology: 60, governance: 20 });

    try {
      scoreDimensions(responses, DEFAULT_WEIGHTS);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError && error.details).toEqual({
        questions: [{ questionId: 'data-q1', value: 120 }],
      });
    }
  });

  it('rejects weight tables that do not sum to 1', () => {
    const responses = responsesFor({ data: 80, process: 60, people: 40, technology: 60, governance: 20 });

    expect(() =>
      scoreDimensions(responses, { data: 0.5, process: 0.5, people: 0.5, technology: 0, governance: 0 })
    ).toThrow(ValidationError);
  });
});
