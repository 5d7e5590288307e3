import { useTranslation } from 'react-i18next';
import { Link } from 'react-router-dom';

const PageNotFound = () => {
  const { t } = useTranslation('common');

  return (
    <div>
      <div className='wrapper'>
        <section>
          {t('notFound.message')}
          {' '}
          <Link to='/'>{t('notFound.home')}</Link>
          {' '}
          {t('notFound.suffix')}
        </section>
      </div>
    </div>
  );
};

export default PageNotFound;
