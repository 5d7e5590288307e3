import './i18n-setup';

// The analytics SDK is never reached from tests
vi.mock('@amplitude/analytics-browser', () => ({
  init: vi.fn(),
  track: vi.fn(),
  setOptOut: vi.fn(),
}));

afterEach(() => {
  localStorage.clear();
});
