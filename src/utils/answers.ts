import type { AnswerEntry, AnswerKey, Answers, SelectedOption } from '../types/answers';
import { isIndexKey, isRecord, optionalString } from './guards';

export const getAnswer = (answers: Answers, key: AnswerKey): SelectedOption | undefined =>
  answers[key.pageKey]?.[key.collectionId]?.[key.questionIndex];

/**
 * Returns a copy of `answers` with `option` recorded under `key`.
 * Replaces any earlier answer for the same question.
 */
export const withAnswer = (answers: Answers, key: AnswerKey, option: SelectedOption): Answers => {
  const page = answers[key.pageKey] ?? {};
  const collection = page[key.collectionId] ?? {};
  return {
    ...answers,
    [key.pageKey]: {
      ...page,
      [key.collectionId]: { ...collection, [key.questionIndex]: option }
    }
  };
};

// Page and collection in insertion order, question indexes ascending.
export const listAnswers = (answers: Answers): AnswerEntry[] => {
  const entries: AnswerEntry[] = [];
  for (const [pageKey, collections] of Object.entries(answers)) {
    for (const [collectionId, byIndex] of Object.entries(collections)) {
      for (const [index, option] of Object.entries(byIndex)) {
        entries.push({ key: { pageKey, collectionId, questionIndex: Number(index) }, option });
      }
    }
  }
  return entries;
};

export const countCollectionAnswers = (answers: Answers, pageKey: string, collectionId: string): number =>
  Object.keys(answers[pageKey]?.[collectionId] ?? {}).length;

export const hasAnswers = (answers: Answers): boolean => listAnswers(answers).length > 0;

// Unique string form of a key, for list keys and element ids
export const answerKeyId = (key: AnswerKey): string =>
  [key.pageKey, key.collectionId, String(key.questionIndex)].map(encodeURIComponent).join('/');

/**
 * Parses a flat "<page>_<collection>_<index>" key. Segments past the third are ignored,
 * so page keys and collection ids containing "_" cannot be recovered from this form.
 */
export const parseLegacyKey = (raw: string): AnswerKey | undefined => {
  const parts = raw.split('_');
  if (parts.length < 3) return undefined;
  const [pageKey, collectionId, index] = parts;
  if (!isIndexKey(index)) return undefined;
  return { pageKey, collectionId, questionIndex: Number(index) };
};

const toSelectedOption = (value: unknown): SelectedOption | undefined => {
  if (!isRecord(value)) return undefined;
  const optionId = optionalString(value.optionId);
  if (optionId === undefined) return undefined;
  return { optionId, optionText: optionalString(value.optionText) ?? '' };
};

/**
 * Narrows answers read from storage or an import. Entries that are not
 * page -> collection -> index -> option objects are dropped.
 */
export const normalizeAnswers = (raw: unknown): Answers => {
  let result: Answers = {};
  if (!isRecord(raw)) return result;

  for (const [pageKey, collections] of Object.entries(raw)) {
    if (!isRecord(collections)) continue;
    for (const [collectionId, byIndex] of Object.entries(collections)) {
      if (!isRecord(byIndex)) continue;
      for (const [index, value] of Object.entries(byIndex)) {
        const option = toSelectedOption(value);
        if (!option || !isIndexKey(index)) continue;
        result = withAnswer(result, { pageKey, collectionId, questionIndex: Number(index) }, option);
      }
    }
  }
  return result;
};
