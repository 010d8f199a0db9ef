process.env.NODE_ENV = 'test';

// Keep run logs out of the test output unless a test asks for them
process.env.LOG_LEVEL ??= 'error';

export {};
