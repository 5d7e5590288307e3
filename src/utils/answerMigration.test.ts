import { describe, it, expect } from 'vitest';
import { migrateAnswers, needsMigration } from './answerMigration';
import { createTestCatalog, partialAnswers } from '../test-utils/fixtures';

describe('answerMigration', () => {
  const catalog = createTestCatalog();

  describe('needsMigration', () => {
    it('returns false for empty answers', () => {
      expect(needsMigration({})).toBe(false);
    });

    it('returns false when answers are already nested', () => {
      expect(needsMigration(partialAnswers)).toBe(false);
    });

    it('returns true when any answer is a flat option record', () => {
      const answers = {
        q1_C1_0: { option_id: 'B', option_text: 'Partly' },
        q1: { C1: {} }
      };
      expect(needsMigration(answers)).toBe(true);
    });

    it('returns false for values that are not objects', () => {
      expect(needsMigration(null)).toBe(false);
      expect(needsMigration('q1_C1_0')).toBe(false);
      expect(needsMigration([{ option_id: 'B' }])).toBe(false);
    });
  });

  describe('migrateAnswers', () => {
    it('converts flat keys into nested answers', () => {
      const result = migrateAnswers(
        {
          q1_C1_0: { option_id: 'B', option_text: 'Partly' },
          q1_C1_1: { option_id: 'D', option_text: 'Fully' }
        },
        catalog
      );

      expect(result).toEqual({ answers: partialAnswers, migratedCount: 2, unmatchedCount: 0 });
    });

    it('defaults a missing option text to an empty string', () => {
      const result = migrateAnswers({ s1_S1_0: { option_id: 'C' } }, catalog);

      expect(result.answers).toEqual({ s1: { S1: { '0': { optionId: 'C', optionText: '' } } } });
    });

    it('counts keys and values it cannot use as unmatched', () => {
      const result = migrateAnswers(
        {
          q1_C1_0: { option_id: 'B', option_text: 'Partly' },
          q1_C1_9: { option_id: 'A' },
          zz_C1_0: { option_id: 'A' },
          q1_C9_0: { option_id: 'A' },
          bad: { option_id: 'A' },
          q1_C2_0: { option_text: 'no id' },
          s1_S1_0: 'C'
        },
        catalog
      );

      expect(result).toEqual({
        answers: { q1: { C1: { '0': { optionId: 'B', optionText: 'Partly' } } } },
        migratedCount: 1,
        unmatchedCount: 6
      });
    });

    it('returns empty results for empty input', () => {
      expect(migrateAnswers({}, catalog)).toEqual({ answers: {}, migratedCount: 0, unmatchedCount: 0 });
    });
  });
});
