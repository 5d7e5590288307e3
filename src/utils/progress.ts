import type { Answers } from '../types/answers';
import type { QuestionnaireCatalog } from '../types/questions';
import { countCollectionAnswers } from './answers';

export interface ProgressStats {
  total: number;
  answered: number;
  progress: number; // 0..1, 0 when there is nothing to answer
}

export interface ProgressData {
  pages: Record<string, ProgressStats>; // by page key
  overall: ProgressStats; // raw sums across pages, not a mean of ratios
}

const toStats = (total: number, answered: number): ProgressStats => ({
  total,
  answered,
  progress: total > 0 ? answered / total : 0
});

export const calculateProgress = (catalog: QuestionnaireCatalog, answers: Answers): ProgressData => {
  const pages: Record<string, ProgressStats> = {};
  let totalAll = 0;
  let answeredAll = 0;

  for (const [pageKey, questionnaire] of Object.entries(catalog)) {
    let total = 0;
    let answered = 0;
    for (const collection of questionnaire.collections) {
      total += collection.questions.length;
      answered += countCollectionAnswers(answers, pageKey, collection.collectionId);
    }
    totalAll += total;
    answeredAll += answered;
    pages[pageKey] = toStats(total, answered);
  }

  return { pages, overall: toStats(totalAll, answeredAll) };
};
