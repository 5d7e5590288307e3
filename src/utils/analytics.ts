import * as amplitude from '@amplitude/analytics-browser';

type EventProperties = Record<string, string | number | boolean | undefined>;

let initialized = false;

export const initAnalytics = (apiKey: string): void => {
  if (!apiKey || initialized) return;
  amplitude.init(apiKey, undefined, {
    autocapture: true,
    cookieOptions: { secure: true, upgrade: true },
    defaultTracking: true
  });
  initialized = true;
};

// No-op until initAnalytics has run with a key
export const trackEvent = (name: string, properties?: EventProperties): void => {
  if (!initialized) return;
  amplitude.track(name, properties);
};

export const trackImport = (source: 'json' | 'file', success: boolean, properties?: EventProperties): void => {
  trackEvent(success ? 'import_success' : 'import_failed', { source, ...properties });
};
