import React from 'react';
import { useTranslation } from 'react-i18next';
import { valueToLetter } from '../../utils/grades';
import { formatScore } from '../../utils/exportResults';

interface ScoreSectionProps {
  title: string;
  scores: Record<string, number>;
  whole?: boolean; // Show scores without decimals (indicator scores)
}

const ScoreSection: React.FC<ScoreSectionProps> = ({ title, scores, whole = false }) => {
  const { t } = useTranslation('common');
  const entries = Object.entries(scores);
  if (entries.length === 0) return null;

  return (
    <section className='score-section'>
      <h3>{title}</h3>
      <table className='score-table'>
        <tbody>
          {entries.map(([name, score]) => {
            const grade = valueToLetter(score);
            return (
              <tr key={name}>
                <th scope='row'>{name}</th>
                <td>{t('summary.score', { score: formatScore(score, whole) })}</td>
                <td className={`grade grade-${grade}`}>{t('summary.grade', { grade })}</td>
              </tr>
            );
          })}
        </tbody>
      </table>
    </section>
  );
};

export default ScoreSection;
