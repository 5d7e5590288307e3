import i18n from 'i18next';
import { initReactI18next } from 'react-i18next';
import LanguageDetector from 'i18next-browser-languagedetector';

import { APP_CONFIG } from '../config/appConfig';
import { SUPPORTED_LANGUAGES } from './languages';
import commonEN from './locales/en/common.json';
import commonDE from './locales/de/common.json';

const resources = {
  en: {
    common: commonEN,
  },
  de: {
    common: commonDE,
  },
};

// Resources are bundled, so init settles synchronously; a rejection surfaces as unhandled
void i18n
  .use(LanguageDetector)
  .use(initReactI18next)
  .init({
    resources,
    fallbackLng: 'en',
    supportedLngs: [...SUPPORTED_LANGUAGES],
    defaultNS: 'common',
    ns: ['common'],
    interpolation: {
      escapeValue: false, // React already escapes values
    },
    detection: {
      order: ['localStorage', 'navigator'],
      caches: ['localStorage'],
      lookupLocalStorage: `${APP_CONFIG.storagePrefix}_language`,
    },
  });

export default i18n;
