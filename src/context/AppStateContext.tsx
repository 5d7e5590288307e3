import React, { createContext, useCallback, useContext, useEffect, useMemo, useState } from 'react';
import type { AnswerKey, Answers } from '../types/answers';
import type { AnswerOption, QuestionnaireCatalog } from '../types/questions';
import { loadQuestionFiles } from '../data/questionFiles';
import { normalizeAnswers, withAnswer } from '../utils/answers';
import { migrateAnswers, needsMigration } from '../utils/answerMigration';
import { calculateAllScores, calculateOverallScore, type ScoreData } from '../utils/scoring';
import { calculateProgress, type ProgressData } from '../utils/progress';
import { CURRENT_EXPORT_VERSION, validateImportJSON } from '../utils/importValidation';
import { APP_CONFIG } from '../config/appConfig';
import { initAnalytics, trackEvent, trackImport } from '../utils/analytics';
import { isRecord } from '../utils/guards';

// page key -> collection id -> index of the question currently shown
export type QuestionPositions = Record<string, Record<string, number>>;

interface AppStateContextValue {
  catalog: QuestionnaireCatalog;
  answers: Answers;
  setAnswer: (key: AnswerKey, option: AnswerOption) => void;
  getQuestionIndex: (pageKey: string, collectionId: string) => number;
  goToQuestion: (pageKey: string, collectionId: string, index: number) => void;
  resetAll: () => void;
  scoreData: ScoreData;
  overallScore: number;
  progress: ProgressData;

  exportJSON: () => string;
  importJSON: (json: string) => { success: boolean; error?: string };
}

export type { AppStateContextValue };

const AppStateContext = createContext<AppStateContextValue | undefined>(undefined);

const ANSWERS_KEY = `${APP_CONFIG.storagePrefix}_answers_v2`;
const POSITIONS_KEY = `${APP_CONFIG.storagePrefix}_positions_v1`;

const loadStored = (key: string): unknown => {
  try {
    const raw = localStorage.getItem(key);
    return raw ? JSON.parse(raw) : undefined;
  } catch {
    return undefined;
  }
};

const persist = (key: string, value: unknown) => {
  try {
    localStorage.setItem(key, JSON.stringify(value));
  } catch {
    trackEvent('storage_write_failed', { key });
  }
};

const clearStored = (key: string) => {
  try {
    localStorage.removeItem(key);
  } catch {
    trackEvent('storage_write_failed', { key });
  }
};

const normalizePositions = (raw: unknown): QuestionPositions => {
  const positions: QuestionPositions = {};
  if (!isRecord(raw)) return positions;
  for (const [pageKey, byCollection] of Object.entries(raw)) {
    if (!isRecord(byCollection)) continue;
    const page: Record<string, number> = {};
    for (const [collectionId, index] of Object.entries(byCollection)) {
      if (typeof index === 'number' && Number.isInteger(index) && index >= 0) page[collectionId] = index;
    }
    positions[pageKey] = page;
  }
  return positions;
};

interface AppStateProviderProps {
  children: React.ReactNode;
  catalog?: QuestionnaireCatalog; // Defaults to the bundled questionnaire files
}

export const AppStateProvider: React.FC<AppStateProviderProps> = ({ children, catalog: catalogOverride }) => {
  const catalog = useMemo(() => catalogOverride ?? loadQuestionFiles(), [catalogOverride]);

  const [answers, setAnswers] = useState<Answers>(() => {
    const stored = loadStored(ANSWERS_KEY);
    // Answers kept by older builds are flat "<page>_<collection>_<index>" maps
    return needsMigration(stored) ? migrateAnswers(stored, catalog).answers : normalizeAnswers(stored);
  });

  const [positions, setPositions] = useState<QuestionPositions>(() =>
    normalizePositions(loadStored(POSITIONS_KEY))
  );

  useEffect(() => {
    initAnalytics(APP_CONFIG.amplitudeApiKey);
  }, []);

  const setAnswer = useCallback((key: AnswerKey, option: AnswerOption) => {
    setAnswers((prev) => {
      const updated = withAnswer(prev, key, { optionId: option.optionId, optionText: option.optionText });
      persist(ANSWERS_KEY, updated);
      return updated;
    });
    trackEvent('answer_set', {
      page_key: key.pageKey,
      collection_id: key.collectionId,
      question_index: key.questionIndex,
      option_id: option.optionId
    });
  }, []);

  const getQuestionIndex = useCallback(
    (pageKey: string, collectionId: string) => positions[pageKey]?.[collectionId] ?? 0,
    [positions]
  );

  const goToQuestion = useCallback(
    (pageKey: string, collectionId: string, index: number) => {
      const collection = Object.hasOwn(catalog, pageKey)
        ? catalog[pageKey].collections.find((c) => c.collectionId === collectionId)
        : undefined;
      if (!collection || collection.questions.length === 0) return;

      const clamped = Math.max(0, Math.min(index, collection.questions.length - 1));
      setPositions((prev) => {
        const updated = { ...prev, [pageKey]: { ...prev[pageKey], [collectionId]: clamped } };
        persist(POSITIONS_KEY, updated);
        return updated;
      });
      trackEvent('question_navigated', { page_key: pageKey, collection_id: collectionId, question_index: clamped });
    },
    [catalog]
  );

  const resetAll = useCallback(() => {
    setAnswers({});
    setPositions({});
    clearStored(ANSWERS_KEY);
    clearStored(POSITIONS_KEY);
    trackEvent('reset_all');
  }, []);

  // Recomputed from scratch whenever the answers change
  const scoreData = useMemo(() => calculateAllScores(catalog, answers), [catalog, answers]);
  const overallScore = useMemo(() => calculateOverallScore(scoreData.valueScores), [scoreData]);
  const progress = useMemo(() => calculateProgress(catalog, answers), [catalog, answers]);

  const exportJSON = () =>
    JSON.stringify(
      {
        version: CURRENT_EXPORT_VERSION,
        exportedAt: new Date().toISOString(),
        answers
      },
      null,
      2
    );

  const importJSON = (json: string): { success: boolean; error?: string } => {
    const validation = validateImportJSON(json);
    if (!validation.isValid) {
      trackImport('json', false, { error: validation.error });
      return { success: false, error: validation.error };
    }

    const { version, answers: rawAnswers } = validation.data;
    let imported: Answers;

    // Version 1 backups hold flat answers keyed "<page>_<collection>_<index>"
    if (version === 1 || needsMigration(rawAnswers)) {
      const migrationResult = migrateAnswers(rawAnswers, catalog);
      imported = migrationResult.answers;

      trackEvent('answers_migrated_import', {
        migrated_count: migrationResult.migratedCount,
        unmatched_count: migrationResult.unmatchedCount
      });
    } else {
      imported = normalizeAnswers(rawAnswers);
    }

    setAnswers(imported);
    persist(ANSWERS_KEY, imported);
    trackImport('json', true, { version });
    return { success: true };
  };

  const value: AppStateContextValue = {
    catalog,
    answers,
    setAnswer,
    getQuestionIndex,
    goToQuestion,
    resetAll,
    scoreData,
    overallScore,
    progress,
    exportJSON,
    importJSON
  };

  return <AppStateContext.Provider value={value}>{children}</AppStateContext.Provider>;
};

export const useAppState = (): AppStateContextValue => {
  const ctx = useContext(AppStateContext);
  if (!ctx) throw new Error('useAppState must be used within AppStateProvider');
  return ctx;
};
