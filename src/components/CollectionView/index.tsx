import React, { useState } from 'react';
import { useTranslation } from 'react-i18next';
import { useAppState } from '../../context/AppStateContext';
import type { Collection } from '../../types/questions';
import { countCollectionAnswers } from '../../utils/answers';
import { trackEvent } from '../../utils/analytics';
import { TrackedButton } from '../TrackedButton';
import QuestionView from '../QuestionView';
import { Toast, type ToastType } from '../Toast';

interface CollectionViewProps {
  pageKey: string;
  collection: Collection;
}

interface ToastState {
  message: string;
  type: ToastType;
}

// One collection of a questionnaire, shown a question at a time.
const CollectionView: React.FC<CollectionViewProps> = ({ pageKey, collection }) => {
  const { t } = useTranslation('common');
  const { answers, getQuestionIndex, goToQuestion } = useAppState();
  const [toast, setToast] = useState<ToastState | null>(null);

  const { collectionId, questions } = collection;
  const total = questions.length;

  const header = (
    <>
      <h3>
        {collectionId} - {collection.title}
      </h3>
      <p className='collection-description'>{collection.description}</p>
    </>
  );

  if (total === 0) {
    return (
      <section className='collection'>
        {header}
        <p className='warning'>{t('questionnaire.noQuestions')}</p>
      </section>
    );
  }

  const currentIndex = Math.min(getQuestionIndex(pageKey, collectionId), total - 1);

  const onSave = () => {
    const answered = countCollectionAnswers(answers, pageKey, collectionId);
    if (answered === 0) {
      setToast({ message: t('questionnaire.noAnswersForCollection'), type: 'warning' });
      return;
    }
    trackEvent('answers_saved', { page_key: pageKey, collection_id: collectionId, answered });
    setToast({ message: t('questionnaire.answersSaved'), type: 'success' });
  };

  return (
    <section className='collection'>
      {header}
      <progress
        className='collection-progress'
        value={currentIndex + 1}
        max={total}
        aria-label={t('questionnaire.questionOf', { current: currentIndex + 1, total })}
      />
      <p className='question-counter'>{t('questionnaire.questionOf', { current: currentIndex + 1, total })}</p>

      <QuestionView
        pageKey={pageKey}
        collectionId={collectionId}
        questionIndex={currentIndex}
        question={questions[currentIndex]}
      />

      <div className='question-nav'>
        <div>
          {currentIndex > 0 && (
            <TrackedButton
              trackingName='question_previous'
              onClick={() => goToQuestion(pageKey, collectionId, currentIndex - 1)}
            >
              {t('buttons.previous')}
            </TrackedButton>
          )}
        </div>
        <div className='question-nav-position'>{t('questionnaire.questionNumber', { number: currentIndex + 1 })}</div>
        <div>
          {currentIndex < total - 1 && (
            <TrackedButton
              trackingName='question_next'
              onClick={() => goToQuestion(pageKey, collectionId, currentIndex + 1)}
            >
              {t('buttons.next')}
            </TrackedButton>
          )}
          <TrackedButton className='btn-primary' trackingName='save_answers' onClick={onSave}>
            {t('buttons.save')}
          </TrackedButton>
        </div>
      </div>

      {toast && <Toast message={toast.message} type={toast.type} onClose={() => setToast(null)} />}
    </section>
  );
};

export default CollectionView;
