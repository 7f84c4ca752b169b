// Increase timeout for all tests
jest.setTimeout(30000);

afterEach(() => {
    // Clear all mocks and timers after each test
    jest.clearAllMocks();
    jest.clearAllTimers();
});
