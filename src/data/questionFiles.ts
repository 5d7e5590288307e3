import type { QuestionnaireCatalog } from '../types/questions';
import { buildCatalog } from '../utils/catalog';

// Every JSON file in ./questionnaires is one questionnaire; its file name is the page key.
const files = import.meta.glob('./questionnaires/*.json', { eager: true, import: 'default' });

export const loadQuestionFiles = (): QuestionnaireCatalog => buildCatalog(files);
