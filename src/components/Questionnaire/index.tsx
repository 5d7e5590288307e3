import React from 'react';
import { useParams } from 'react-router-dom';
import { useTranslation } from 'react-i18next';
import { useAppState } from '../../context/AppStateContext';
import CollectionView from '../CollectionView';
import Footer from '../Footer';

const Questionnaire: React.FC = () => {
  const { pageKey = '' } = useParams();
  const { catalog } = useAppState();
  const { t } = useTranslation('common');

  const questionnaire = Object.hasOwn(catalog, pageKey) ? catalog[pageKey] : undefined;
  if (!questionnaire) {
    return (
      <div className='panel questionnaire-panel'>
        <p className='warning'>{t('questionnaire.notFound', { pageKey })}</p>
      </div>
    );
  }

  const { info, collections } = questionnaire;
  const infoParts: string[] = [];
  if (info.version) infoParts.push(t('questionnaire.version', { version: info.version }));
  if (info.createdDate) infoParts.push(t('questionnaire.created', { date: info.createdDate }));

  return (
    <div className='panel questionnaire-panel'>
      <div className='questionnaire-header'>
        <h2>{info.title}</h2>
        {info.description && (
          <p className='questionnaire-subtitle'>
            <strong>{t('questionnaire.description')}</strong> {info.description}
          </p>
        )}
        {infoParts.length > 0 && <p className='caption'>{infoParts.join(' | ')}</p>}
      </div>

      {collections.map((collection) => (
        <React.Fragment key={collection.collectionId}>
          <CollectionView pageKey={questionnaire.pageKey} collection={collection} />
          <hr />
        </React.Fragment>
      ))}
      <Footer />
    </div>
  );
};

export default Questionnaire;
