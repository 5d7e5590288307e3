import type { RawOption, RawQuestionnaire } from '../types/questions';
import type { Answers } from '../types/answers';
import { buildCatalog } from '../utils/catalog';

const gradeOptions: RawOption[] = [
  { option_id: 'A', option_text: 'Not at all' },
  { option_id: 'B', option_text: 'Partly' },
  { option_id: 'C', option_text: 'Mostly' },
  { option_id: 'D', option_text: 'Fully' }
];

export const qualityFile: RawQuestionnaire = {
  questionnaire_info: {
    title: 'Quality',
    description: 'Test questionnaire about quality',
    version: '1.0',
    created_date: '2025-01-01'
  },
  question_collections: [
    {
      collection_id: 'C1',
      collection_title: 'Documentation',
      collection_description: 'Written processes',
      questions: [
        {
          question_id: 'I1',
          question_text: 'Are processes written down?',
          answer_options: gradeOptions,
          followup_questions: ['Where are they stored?']
        },
        {
          question_id: 'I2',
          question_text: 'Are they reviewed?',
          answer_options: [...gradeOptions, { option_id: 'E', option_text: '  ' }]
        }
      ]
    },
    {
      collection_id: 'C2',
      collection_title: 'Reviews',
      questions: [{ question_text: 'Are releases reviewed?', answer_options: gradeOptions }]
    }
  ]
};

export const safetyFile: RawQuestionnaire = {
  questionnaire_info: { title: 'Safety' },
  question_collections: [
    {
      collection_id: 'S1',
      collection_title: 'Hazards',
      questions: [
        {
          question_id: 'H1',
          question_text: 'Are hazards listed?',
          guidance: 'See https://example.com/hazards for a template',
          answer_options: gradeOptions
        }
      ]
    }
  ]
};

// Pages "q1" (Quality: C1 with I1, I2 and C2 with one unnamed question) and "s1" (Safety: S1 with H1)
export const createTestCatalog = () =>
  buildCatalog({
    './questionnaires/s1.json': safetyFile,
    './questionnaires/q1.json': qualityFile
  });

// I1 answered B, I2 answered D
export const partialAnswers: Answers = {
  q1: {
    C1: {
      '0': { optionId: 'B', optionText: 'Partly' },
      '1': { optionId: 'D', optionText: 'Fully' }
    }
  }
};
