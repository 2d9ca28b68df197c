import '@testing-library/jest-dom';

// Suppress React act warning (harmless - React 18 + RTL 14 compatibility)
const originalError = console.error;
beforeAll(() => {
  console.error = (...args: unknown[]) => {
    if (
      typeof args[0] === 'string' &&
      args[0].includes('ReactDOMTestUtils.act')
    ) {
      return;
    }
    originalError.call(console, ...args);
  };
});

afterAll(() => {
  console.error = originalError;
});

// Set default timeout
jest.setTimeout(10000);

// Global cleanup after each test
afterEach(() => {
  jest.clearAllMocks();
  localStorage.clear();
});
