/**
 * Answer migration utilities to handle backwards compatibility
 * with flat answer sets keyed by "<page>_<collection>_<index>" strings
 */

import type { Answers, LegacyAnswer } from '../types/answers';
import type { QuestionnaireCatalog } from '../types/questions';
import { parseLegacyKey, withAnswer } from './answers';
import { isRecord, optionalString } from './guards';

interface MigrationResult {
  answers: Answers;
  migratedCount: number;
  unmatchedCount: number;
}

const toLegacyAnswer = (value: unknown): LegacyAnswer | undefined => {
  if (!isRecord(value)) return undefined;
  const optionId = optionalString(value.option_id);
  if (optionId === undefined) return undefined;
  return { option_id: optionId, option_text: optionalString(value.option_text) };
};

/**
 * Migrate answers from the flat format to nested answers
 *
 * - Old: { "quality_C1_0": { "option_id": "B", "option_text": "Partly" } }
 * - New: { quality: { C1: { 0: { optionId: "B", optionText: "Partly" } } } }
 *
 * Keys with fewer than three segments or a non-numeric index, values without an
 * option id, and answers that no longer resolve to a question in the catalog are
 * counted as unmatched and left out.
 *
 * @param legacyAnswers - Flat answers, typically from an imported version 1 backup
 * @returns Migration result with converted answers and statistics
 */
export const migrateAnswers = (
  legacyAnswers: Record<string, unknown>,
  catalog: QuestionnaireCatalog
): MigrationResult => {
  let migratedAnswers: Answers = {};
  let migratedCount = 0;
  let unmatchedCount = 0;

  Object.entries(legacyAnswers).forEach(([rawKey, value]) => {
    const key = parseLegacyKey(rawKey);
    const legacy = toLegacyAnswer(value);
    if (!key || !legacy) {
      unmatchedCount++;
      return;
    }

    const questionnaire = Object.hasOwn(catalog, key.pageKey) ? catalog[key.pageKey] : undefined;
    const resolves = questionnaire?.collections.some(
      (c) => c.collectionId === key.collectionId && key.questionIndex < c.questions.length
    );
    if (!resolves) {
      // Question doesn't exist anymore - skip it
      unmatchedCount++;
      return;
    }

    migratedAnswers = withAnswer(migratedAnswers, key, {
      optionId: legacy.option_id,
      optionText: legacy.option_text ?? ''
    });
    migratedCount++;
  });

  return {
    answers: migratedAnswers,
    migratedCount,
    unmatchedCount
  };
};

/**
 * Validate if an answers object is in the flat format
 * Returns true if any value is a flat `{ option_id }` answer
 */
export const needsMigration = (answers: unknown): answers is Record<string, unknown> => {
  if (!isRecord(answers)) return false;
  return Object.values(answers).some((value) => toLegacyAnswer(value) !== undefined);
};
