import React from 'react';
import { useTranslation } from 'react-i18next';
import { useAppState } from '../../context/AppStateContext';

const ProgressOverview: React.FC = () => {
  const { t } = useTranslation('common');
  const { catalog, progress } = useAppState();
  const { overall } = progress;

  return (
    <section className='progress-overview'>
      <h2>{t('progress.title')}</h2>
      <ul className='progress-list'>
        {Object.entries(progress.pages).map(([pageKey, stats]) => {
          const label = t('progress.pageCount', {
            name: catalog[pageKey].info.title,
            answered: stats.answered,
            total: stats.total
          });
          return (
            <li key={pageKey} className='progress-row'>
              <progress value={stats.progress} max={1} aria-label={label} />
              <span>{label}</span>
            </li>
          );
        })}
      </ul>

      <h3>{t('progress.overall')}</h3>
      <div className='progress-row'>
        <progress value={overall.progress} max={1} aria-label={t('progress.overall')} />
        <span>{t('progress.totalCount', { answered: overall.answered, total: overall.total })}</span>
      </div>
    </section>
  );
};

export default ProgressOverview;
