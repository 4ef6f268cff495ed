// Quiet test output unless a level is asked for
process.env.NODE_ENV = 'test';
if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'error';
}
