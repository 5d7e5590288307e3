import { describe, it, expect } from 'vitest';
import { calculateProgress } from './progress';
import { buildCatalog } from './catalog';
import { createTestCatalog, partialAnswers } from '../test-utils/fixtures';
import type { RawCollection } from '../types/questions';

describe('calculateProgress', () => {
  const collection = (id: string): RawCollection => ({
    collection_id: id,
    questions: [{ question_text: 'One' }, { question_text: 'Two' }, { question_text: 'Three' }]
  });

  it('counts answered questions against all questions', () => {
    const catalog = buildCatalog({
      './questionnaires/p.json': { question_collections: [collection('X'), collection('Y')] }
    });
    const answers = {
      p: {
        X: {
          '0': { optionId: 'A', optionText: '' },
          '2': { optionId: 'B', optionText: '' }
        }
      }
    };

    const progress = calculateProgress(catalog, answers);
    expect(progress.pages.p).toEqual({ total: 6, answered: 2, progress: 1 / 3 });
    expect(progress.overall).toEqual({ total: 6, answered: 2, progress: 1 / 3 });
  });

  it('does not count answers of a collection whose id extends another', () => {
    const catalog = buildCatalog({
      './questionnaires/p.json': {
        question_collections: [
          { collection_id: 'C1', questions: [{ question_text: 'One' }, { question_text: 'Two' }] },
          { collection_id: 'C10', questions: [{ question_text: 'Three' }, { question_text: 'Four' }] }
        ]
      }
    });
    const answers = { p: { C10: { '0': { optionId: 'B', optionText: '' } } } };

    expect(calculateProgress(catalog, answers).pages.p).toEqual({ total: 4, answered: 1, progress: 0.25 });
  });

  it('sums raw counts across questionnaires', () => {
    const progress = calculateProgress(createTestCatalog(), partialAnswers);

    expect(progress.pages).toEqual({
      q1: { total: 3, answered: 2, progress: 2 / 3 },
      s1: { total: 1, answered: 0, progress: 0 }
    });
    expect(progress.overall).toEqual({ total: 4, answered: 2, progress: 0.5 });
  });

  it('reports 0 progress when there is nothing to answer', () => {
    expect(calculateProgress({}, {})).toEqual({
      pages: {},
      overall: { total: 0, answered: 0, progress: 0 }
    });
  });
});
