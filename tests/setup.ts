/**
 * Test setup file
 */

// Logger and reporters print through console; tests assert on these mocks
global.console = {
  ...console,
  log: jest.fn(),
  info: jest.fn(),
  debug: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
};

afterAll(() => {
  jest.restoreAllMocks();
});
