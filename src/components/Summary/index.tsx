import React, { useMemo, useState } from 'react';
import { useTranslation } from 'react-i18next';
import { useAppState } from '../../context/AppStateContext';
import { APP_CONFIG } from '../../config/appConfig';
import { answerKeyId, listAnswers } from '../../utils/answers';
import { letterToValue, valueToLetter } from '../../utils/grades';
import { copyTextToClipboard, formatScore, generateResultsText } from '../../utils/exportResults';
import { trackEvent } from '../../utils/analytics';
import { TrackedButton } from '../TrackedButton';
import ScoreSection from '../ScoreSection';
import Footer from '../Footer';

type CopyState = 'idle' | 'copied' | 'failed';

const Summary: React.FC = () => {
  const { t } = useTranslation('common');
  const { answers, scoreData, overallScore } = useAppState();
  const [copyState, setCopyState] = useState<CopyState>('idle');

  const entries = useMemo(() => listAnswers(answers), [answers]);
  const heading = t('export.heading', { appTitle: APP_CONFIG.appTitle });
  const resultsText = useMemo(
    () => generateResultsText({ scoreData, heading, t: (key: string) => t(key) }),
    [scoreData, heading, t]
  );

  if (entries.length === 0) {
    return (
      <div className='panel summary-panel'>
        <h1>{APP_CONFIG.appTitle}</h1>
        <h2>{t('summary.title')}</h2>
        <p className='info'>{t('summary.noAnswers')}</p>
        <Footer />
      </div>
    );
  }

  const onCopy = async () => {
    try {
      const copied = await copyTextToClipboard(resultsText);
      setCopyState(copied ? 'copied' : 'failed');
      trackEvent('results_copied', { copied });
    } catch {
      // Permission denied or no clipboard: the text stays on screen for manual copying
      setCopyState('failed');
    }
  };

  return (
    <div className='panel summary-panel'>
      <h1>{APP_CONFIG.appTitle}</h1>
      <h2>{t('summary.title')}</h2>

      <h3 className='overall-grade'>
        {t('summary.overallGrade', { grade: valueToLetter(overallScore), score: formatScore(overallScore) })}
      </h3>
      <ScoreSection title={`🎯 ${t('summary.valueScores')}`} scores={scoreData.valueScores} />
      <ScoreSection title={`🔍 ${t('summary.criterionScores')}`} scores={scoreData.criterionScores} />
      <ScoreSection title={`📋 ${t('summary.indicatorScores')}`} scores={scoreData.indicatorScores} whole />

      <section className='detailed-answers'>
        <h2>{t('summary.detailedAnswers')}</h2>
        <details>
          <summary>{t('summary.viewAllAnswers')}</summary>
          <ul className='answer-list'>
            {entries.map(({ key, option }) => (
              <li key={answerKeyId(key)}>
                <strong>
                  {t('summary.answerHeading', {
                    page: key.pageKey,
                    collection: key.collectionId,
                    number: key.questionIndex + 1
                  })}
                </strong>
                <div>{option.optionText}</div>
                <div className='answer-grade'>
                  {t('summary.answerGrade', { optionId: option.optionId, value: letterToValue(option.optionId) })}
                </div>
              </li>
            ))}
          </ul>
        </details>
      </section>

      <section className='export-section'>
        <h2>{t('summary.exportTitle')}</h2>
        <TrackedButton
          trackingName='copy_results'
          onClick={() => {
            void onCopy();
          }}
        >
          {t('buttons.copyResults')}
        </TrackedButton>
        {copyState === 'copied' && <p className='success'>{t('summary.copied')}</p>}
        {copyState === 'failed' && <p className='warning'>{t('summary.copyFailed')}</p>}
        <pre className='results-text'>{resultsText}</pre>
      </section>
      <Footer />
    </div>
  );
};

export default Summary;
