// test/setup.ts
// Keep pino quiet; tests assert on responses, not log lines.
process.env.LOG_LEVEL = "silent";
process.env.SERVICE_NAME = "service-kit-test";
