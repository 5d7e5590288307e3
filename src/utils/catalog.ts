/**
 * Turns questionnaire definition files into the catalog the app works from.
 *
 * The files use the snake_case layout in `src/data/questionnaires/`. Missing optional
 * fields get defaults and malformed entries are dropped instead of failing the load,
 * so a partly broken file still yields whatever questions it does describe.
 */

import type {
  AnswerOption,
  Collection,
  Question,
  Questionnaire,
  QuestionnaireCatalog
} from '../types/questions';
import { isRecord, optionalString } from './guards';

const asArray = (value: unknown): unknown[] => (Array.isArray(value) ? value : []);

const normalizeOption = (raw: unknown): AnswerOption | undefined => {
  if (!isRecord(raw)) return undefined;
  const optionId = optionalString(raw.option_id);
  if (!optionId) return undefined;
  return { optionId, optionText: optionalString(raw.option_text) ?? '' };
};

// Never drops an entry: answers are keyed by position, so positions must not shift
const normalizeQuestion = (value: unknown, collectionId: string, index: number): Question => {
  const raw: Record<string, unknown> = isRecord(value) ? value : {};
  return {
    questionId: optionalString(raw.question_id) || `${collectionId}_${index}`,
    text: optionalString(raw.question_text) ?? '',
    subquestion: optionalString(raw.subquestion),
    guidance: optionalString(raw.guidance),
    answerOptions: asArray(raw.answer_options)
      .map(normalizeOption)
      .filter((o): o is AnswerOption => o !== undefined),
    followupQuestions: asArray(raw.followup_questions).filter((f): f is string => typeof f === 'string')
  };
};

const normalizeCollection = (raw: unknown): Collection | undefined => {
  if (!isRecord(raw)) return undefined;
  const collectionId = optionalString(raw.collection_id);
  if (!collectionId) return undefined;

  return {
    collectionId,
    title: optionalString(raw.collection_title) ?? '',
    description: optionalString(raw.collection_description) ?? '',
    questions: asArray(raw.questions).map((q, index) => normalizeQuestion(q, collectionId, index))
  };
};

export const normalizeQuestionnaire = (raw: unknown, pageKey: string): Questionnaire | undefined => {
  if (!isRecord(raw)) return undefined;
  const info: Record<string, unknown> = isRecord(raw.questionnaire_info) ? raw.questionnaire_info : {};

  return {
    pageKey,
    info: {
      title: optionalString(info.title) || pageKey,
      description: optionalString(info.description),
      version: optionalString(info.version),
      createdDate: optionalString(info.created_date)
    },
    collections: asArray(raw.question_collections)
      .map(normalizeCollection)
      .filter((c): c is Collection => c !== undefined)
  };
};

// "./questionnaires/safety.json" -> "safety"
export const pageKeyFromPath = (path: string): string => {
  const file = path.split('/').pop() ?? path;
  return file.replace(/\.json$/i, '');
};

/**
 * Builds the catalog from loaded files keyed by path, in path order.
 * Files that are not questionnaire objects are skipped.
 */
export const buildCatalog = (files: Record<string, unknown>): QuestionnaireCatalog => {
  const catalog: QuestionnaireCatalog = {};
  Object.keys(files)
    .sort()
    .forEach((path) => {
      const pageKey = pageKeyFromPath(path);
      const questionnaire = normalizeQuestionnaire(files[path], pageKey);
      if (questionnaire) catalog[pageKey] = questionnaire;
    });
  return catalog;
};

// Options with blank text are never offered for selection
export const selectableOptions = (question: Question): AnswerOption[] =>
  question.answerOptions.filter((o) => o.optionText.trim() !== '');

// "(B) -- Some processes are described informally"
export const formatOptionLabel = (option: AnswerOption): string => `(${option.optionId}) -- ${option.optionText}`;
