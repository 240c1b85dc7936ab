import { afterAll, afterEach, beforeAll } from 'vitest';
import { resetMockHandlers, startMockServer, stopMockServer } from './mocks/server.js';

if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'error';
}
if (!process.env.NODE_ENV) {
  process.env.NODE_ENV = 'test';
}

beforeAll(() => {
  startMockServer({ onUnhandledRequest: 'error' });
});

afterEach(() => {
  resetMockHandlers();
});

afterAll(() => {
  stopMockServer();
});
