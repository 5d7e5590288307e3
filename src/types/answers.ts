export interface AnswerKey {
  pageKey: string;
  collectionId: string;
  questionIndex: number; // Position within the collection, not the question id
}

export interface SelectedOption {
  optionId: string;
  optionText: string;
}

/**
 * Recorded answers, nested page key -> collection id -> question index.
 * Plain objects so the map survives a JSON round trip through storage and backups;
 * the innermost keys are the question index in decimal.
 */
export type Answers = Record<string, Record<string, Record<string, SelectedOption>>>;

export interface AnswerEntry {
  key: AnswerKey;
  option: SelectedOption;
}

// Flat answer sets written before answers were nested: "<page>_<collection>_<index>" keys
export interface LegacyAnswer {
  option_id: string;
  option_text?: string;
}
