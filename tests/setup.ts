// tests/setup.ts
// Deterministic defaults for every test file. Backtrace tests override these before re-importing modules.
process.env.FAULTLINE_BACKTRACE = '0';
process.env.LOG_LEVEL = 'warn';
