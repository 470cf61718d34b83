// Keep test output readable; individual suites can raise this when debugging.
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? "silent";
