import React from 'react';
import { describe, it, expect } from 'vitest';
import { act, renderHook } from '@testing-library/react';
import { AppStateProvider, useAppState } from './AppStateContext';
import { createTestCatalog, partialAnswers } from '../test-utils/fixtures';

const catalog = createTestCatalog();
const wrapper = ({ children }: { children: React.ReactNode }) => (
  <AppStateProvider catalog={catalog}>{children}</AppStateProvider>
);

const ANSWERS_KEY = 'questionnaire_eval_answers_v2';

describe('AppStateContext', () => {
  it('throws outside the provider', () => {
    expect(() => renderHook(() => useAppState())).toThrow('useAppState must be used within AppStateProvider');
  });

  it('records answers, persists them and updates the scores', () => {
    const { result } = renderHook(() => useAppState(), { wrapper });

    act(() => {
      result.current.setAnswer({ pageKey: 'q1', collectionId: 'C1', questionIndex: 0 }, { optionId: 'B', optionText: 'Partly' });
    });
    act(() => {
      result.current.setAnswer({ pageKey: 'q1', collectionId: 'C1', questionIndex: 1 }, { optionId: 'D', optionText: 'Fully' });
    });

    expect(result.current.answers).toEqual(partialAnswers);
    expect(JSON.parse(localStorage.getItem(ANSWERS_KEY) ?? '{}')).toEqual(partialAnswers);
    expect(result.current.scoreData).toEqual({
      indicatorScores: { I1: 1, I2: 3 },
      criterionScores: { C1: 2 },
      valueScores: { Quality: 2 }
    });
    expect(result.current.overallScore).toBe(2);
    expect(result.current.progress.overall).toEqual({ total: 4, answered: 2, progress: 0.5 });
  });

  it('restores stored answers', () => {
    localStorage.setItem(ANSWERS_KEY, JSON.stringify(partialAnswers));
    const { result } = renderHook(() => useAppState(), { wrapper });

    expect(result.current.answers).toEqual(partialAnswers);
  });

  it('migrates flat answers kept by older versions', () => {
    localStorage.setItem(ANSWERS_KEY, JSON.stringify({ q1_C1_0: { option_id: 'B', option_text: 'Partly' } }));
    const { result } = renderHook(() => useAppState(), { wrapper });

    expect(result.current.answers).toEqual({ q1: { C1: { '0': { optionId: 'B', optionText: 'Partly' } } } });
  });

  it('ignores stored data that is not JSON', () => {
    localStorage.setItem(ANSWERS_KEY, '{broken');
    const { result } = renderHook(() => useAppState(), { wrapper });

    expect(result.current.answers).toEqual({});
  });

  it('moves between questions within the collection bounds', () => {
    const { result } = renderHook(() => useAppState(), { wrapper });
    expect(result.current.getQuestionIndex('q1', 'C1')).toBe(0);

    act(() => result.current.goToQuestion('q1', 'C1', 1));
    expect(result.current.getQuestionIndex('q1', 'C1')).toBe(1);

    act(() => result.current.goToQuestion('q1', 'C1', 5));
    expect(result.current.getQuestionIndex('q1', 'C1')).toBe(1);

    act(() => result.current.goToQuestion('q1', 'C1', -3));
    expect(result.current.getQuestionIndex('q1', 'C1')).toBe(0);

    act(() => result.current.goToQuestion('q1', 'C9', 1));
    expect(result.current.getQuestionIndex('q1', 'C9')).toBe(0);
  });

  it('resets answers and positions', () => {
    localStorage.setItem(ANSWERS_KEY, JSON.stringify(partialAnswers));
    const { result } = renderHook(() => useAppState(), { wrapper });

    act(() => result.current.goToQuestion('q1', 'C1', 1));
    act(() => result.current.resetAll());

    expect(result.current.answers).toEqual({});
    expect(result.current.getQuestionIndex('q1', 'C1')).toBe(0);
    expect(result.current.scoreData.valueScores).toEqual({});
    expect(localStorage.getItem(ANSWERS_KEY)).toBeNull();
  });

  it('exports a version 2 backup', () => {
    localStorage.setItem(ANSWERS_KEY, JSON.stringify(partialAnswers));
    const { result } = renderHook(() => useAppState(), { wrapper });

    const backup: unknown = JSON.parse(result.current.exportJSON());
    expect(backup).toEqual({ version: 2, exportedAt: expect.any(String), answers: partialAnswers });
  });

  it('imports a version 2 backup', () => {
    const { result } = renderHook(() => useAppState(), { wrapper });

    let outcome: { success: boolean; error?: string } = { success: false };
    act(() => {
      outcome = result.current.importJSON(JSON.stringify({ version: 2, answers: partialAnswers }));
    });

    expect(outcome).toEqual({ success: true });
    expect(result.current.answers).toEqual(partialAnswers);
  });

  it('migrates a version 1 backup on import', () => {
    const { result } = renderHook(() => useAppState(), { wrapper });
    const legacy = {
      q1_C1_0: { option_id: 'B', option_text: 'Partly' },
      q1_C1_1: { option_id: 'D', option_text: 'Fully' },
      gone_X_0: { option_id: 'A' }
    };

    act(() => {
      result.current.importJSON(JSON.stringify({ version: 1, answers: legacy }));
    });

    expect(result.current.answers).toEqual(partialAnswers);
  });

  it('reports invalid imports without changing the answers', () => {
    localStorage.setItem(ANSWERS_KEY, JSON.stringify(partialAnswers));
    const { result } = renderHook(() => useAppState(), { wrapper });

    let outcome: { success: boolean; error?: string } = { success: true };
    act(() => {
      outcome = result.current.importJSON('not json');
    });

    expect(outcome).toEqual({ success: false, error: 'Invalid JSON format' });
    expect(result.current.answers).toEqual(partialAnswers);
  });
});
