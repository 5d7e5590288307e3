// Shapes of the questionnaire definition files as they sit on disk.
export interface RawOption {
  option_id?: string;
  option_text?: string;
}
export interface RawQuestion {
  question_id?: string;
  question_text?: string;
  subquestion?: string;
  guidance?: string;
  answer_options?: RawOption[];
  followup_questions?: string[];
}
export interface RawCollection {
  collection_id?: string;
  collection_title?: string;
  collection_description?: string;
  questions?: RawQuestion[];
}
export interface RawQuestionnaire {
  questionnaire_info?: {
    title?: string;
    description?: string;
    version?: string;
    created_date?: string;
  };
  question_collections?: RawCollection[];
}

export interface AnswerOption {
  optionId: string; // Grade letter A-G
  optionText: string;
}

export interface Question {
  questionId: string; // From the file, or `<collectionId>_<index>` when missing
  text: string;
  subquestion?: string;
  guidance?: string;
  answerOptions: AnswerOption[];
  followupQuestions: string[];
}

export interface Collection {
  collectionId: string;
  title: string;
  description: string;
  questions: Question[];
}

export interface QuestionnaireInfo {
  title: string; // Falls back to the page key
  description?: string;
  version?: string;
  createdDate?: string;
}

export interface Questionnaire {
  pageKey: string;
  info: QuestionnaireInfo;
  collections: Collection[];
}

// page key -> questionnaire, in file name order
export type QuestionnaireCatalog = Record<string, Questionnaire>;
