import { afterEach, vi } from 'vitest';

// After each test: drop mock history and env stubs so one test's environment
// (BOT_TOKEN, CLIENT_NAMES, ...) never leaks into the next validator run.
afterEach(() => {
  vi.clearAllMocks();
  vi.unstubAllEnvs();
  vi.unstubAllGlobals();
  // Admin command tests drive reply deletion with fake timers; restore them even
  // when a test threw before its own cleanup.
  vi.useRealTimers();
});
