import { jest } from '@jest/globals';

// Global test timeout for unit tests
jest.setTimeout(10000);
