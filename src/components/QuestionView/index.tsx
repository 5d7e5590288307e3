import React from 'react';
import { useTranslation } from 'react-i18next';
import { useAppState } from '../../context/AppStateContext';
import type { AnswerKey } from '../../types/answers';
import type { Question } from '../../types/questions';
import { answerKeyId, getAnswer } from '../../utils/answers';
import { formatOptionLabel, selectableOptions } from '../../utils/catalog';
import { renderTextWithLinks } from '../../utils/text';

interface QuestionViewProps {
  pageKey: string;
  collectionId: string;
  questionIndex: number;
  question: Question;
}

const QuestionView: React.FC<QuestionViewProps> = ({ pageKey, collectionId, questionIndex, question }) => {
  const { t } = useTranslation('common');
  const { answers, setAnswer } = useAppState();

  const key: AnswerKey = { pageKey, collectionId, questionIndex };
  const selected = getAnswer(answers, key);
  const options = selectableOptions(question);

  const renderOptions = () => {
    if (question.answerOptions.length === 0) {
      return <p className='warning'>{t('questionnaire.noOptions')}</p>;
    }
    if (options.length === 0) {
      return <p className='warning'>{t('questionnaire.noValidOptions')}</p>;
    }
    return (
      <fieldset className='answer-options'>
        <legend>{t('questionnaire.selectAnswer')}</legend>
        {options.map((option, i) => (
          <label key={`${option.optionId}-${i}`} className='answer-option'>
            <input
              type='radio'
              name={answerKeyId(key)}
              value={option.optionId}
              checked={selected?.optionId === option.optionId}
              onChange={() => setAnswer(key, option)}
            />
            {formatOptionLabel(option)}
          </label>
        ))}
      </fieldset>
    );
  };

  return (
    <div className='question-item'>
      <h4 className='question-text'>{question.text}</h4>
      <p className='caption'>{t('questionnaire.questionId', { id: question.questionId })}</p>
      {question.subquestion && <p className='caption'>{question.subquestion}</p>}
      {question.guidance && (
        <p className='guidance'>
          <em>{renderTextWithLinks(question.guidance)}</em>
        </p>
      )}

      {renderOptions()}

      {selected && question.followupQuestions.length > 0 && (
        <div className='followups'>
          <strong>{t('questionnaire.followupTitle')}</strong>
          <ul>
            {question.followupQuestions.map((followup, i) => (
              <li key={i}>{followup}</li>
            ))}
          </ul>
        </div>
      )}
    </div>
  );
};

export default QuestionView;
