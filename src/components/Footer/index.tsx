import React from 'react';
import { useTranslation } from 'react-i18next';
import { APP_CONFIG } from '../../config/appConfig';
import { SUPPORTED_LANGUAGES } from '../../i18n/languages';

const Footer: React.FC = () => {
  const { t, i18n } = useTranslation('common');

  const changeLanguage = (lng: string) => {
    void i18n.changeLanguage(lng);
  };

  return (
    <footer className='app-footer'>
      <div className='footer-content'>
        <div className='footer-text'>
          {t('footer.note', { appTitle: APP_CONFIG.appTitle })}
        </div>
        <div className='footer-language-selector'>
          <select
            value={i18n.resolvedLanguage ?? i18n.language}
            onChange={(e) => changeLanguage(e.target.value)}
            className='language-dropdown'
            aria-label={t('footer.selectLanguage')}
            title={t('footer.selectLanguage')}
          >
            {SUPPORTED_LANGUAGES.map((lng) => (
              <option key={lng} value={lng}>
                {t(`footer.language.${lng}`)}
              </option>
            ))}
          </select>
        </div>
      </div>
    </footer>
  );
};

export default Footer;
