import type { Answers } from '../types/answers';
import type { Question, QuestionnaireCatalog } from '../types/questions';
import { listAnswers } from './answers';
import { letterToValue } from './grades';

// Built through Map and Object.fromEntries so ids such as "__proto__" stay own keys
export interface ScoreData {
  indicatorScores: Record<string, number>; // question id -> 0..6
  criterionScores: Record<string, number>; // collection id -> mean of its indicators
  valueScores: Record<string, number>; // questionnaire title -> mean of its criteria
}

const mean = (values: number[]): number => values.reduce((sum, v) => sum + v, 0) / values.length;

/**
 * Scores every answer that resolves to a question in the catalog, keyed by question id.
 * Answers pointing at unknown pages, collections or indexes are skipped.
 */
export const calculateIndicatorScores = (
  catalog: QuestionnaireCatalog,
  answers: Answers
): Record<string, number> => {
  const indicatorScores = new Map<string, number>();

  for (const { key, option } of listAnswers(answers)) {
    if (!Object.hasOwn(catalog, key.pageKey)) continue;
    const questionnaire = catalog[key.pageKey];

    const { questionIndex } = key;
    const collection = questionnaire.collections.find(
      (c) => c.collectionId === key.collectionId && questionIndex >= 0 && questionIndex < c.questions.length
    );
    if (!collection) continue;

    const question: Question = collection.questions[questionIndex];
    indicatorScores.set(question.questionId, letterToValue(option.optionId));
  }

  return Object.fromEntries(indicatorScores);
};

// Mean indicator score per collection; collections with no scored question are left out.
export const calculateCriterionScores = (
  catalog: QuestionnaireCatalog,
  indicatorScores: Record<string, number>
): Record<string, number> => {
  const criterionScores = new Map<string, number>();

  for (const questionnaire of Object.values(catalog)) {
    for (const collection of questionnaire.collections) {
      const scores = collection.questions
        .filter((q) => Object.hasOwn(indicatorScores, q.questionId))
        .map((q) => indicatorScores[q.questionId]);
      if (scores.length > 0) criterionScores.set(collection.collectionId, mean(scores));
    }
  }

  return Object.fromEntries(criterionScores);
};

// Mean criterion score per questionnaire, keyed by its display title.
export const calculateValueScores = (
  catalog: QuestionnaireCatalog,
  criterionScores: Record<string, number>
): Record<string, number> => {
  const valueScores = new Map<string, number>();

  for (const questionnaire of Object.values(catalog)) {
    const scores = questionnaire.collections
      .filter((c) => Object.hasOwn(criterionScores, c.collectionId))
      .map((c) => criterionScores[c.collectionId]);
    if (scores.length > 0) valueScores.set(questionnaire.info.title, mean(scores));
  }

  return Object.fromEntries(valueScores);
};

/**
 * Recomputes all three score layers from scratch. Pure: the same catalog and
 * answers always give the same result.
 */
export const calculateAllScores = (catalog: QuestionnaireCatalog, answers: Answers): ScoreData => {
  const indicatorScores = calculateIndicatorScores(catalog, answers);
  const criterionScores = calculateCriterionScores(catalog, indicatorScores);
  const valueScores = calculateValueScores(catalog, criterionScores);
  return { indicatorScores, criterionScores, valueScores };
};

// Mean of the value scores, 0 while nothing is scored.
export const calculateOverallScore = (valueScores: Record<string, number>): number => {
  const scores = Object.values(valueScores);
  return scores.length === 0 ? 0 : mean(scores);
};
