// Setup i18n for tests
import i18n from 'i18next';
import { initReactI18next } from 'react-i18next';

import commonEN from '../i18n/locales/en/common.json';

// English only, loaded synchronously so components render final text
void i18n
  .use(initReactI18next)
  .init({
    lng: 'en',
    fallbackLng: 'en',
    debug: false,
    defaultNS: 'common',
    ns: ['common'],
    resources: {
      en: {
        common: commonEN,
      },
    },
    interpolation: {
      escapeValue: false,
    },
    react: {
      useSuspense: false,
    },
  });

export default i18n;
