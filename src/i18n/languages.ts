export const SUPPORTED_LANGUAGES = ['en', 'de'] as const;
