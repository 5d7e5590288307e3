// Build-time settings, read from VITE_* variables (.env, .env.local or the shell).
export const APP_CONFIG = {
  appTitle: import.meta.env.VITE_APP_TITLE || 'Questionnaire Evaluation',
  // Analytics stay off unless a key is configured
  amplitudeApiKey: import.meta.env.VITE_AMPLITUDE_API_KEY || '',
  storagePrefix: 'questionnaire_eval'
} as const;
