// Jest setup file for tests
afterEach(() => {
  jest.restoreAllMocks();
});

jest.setTimeout(10000);
