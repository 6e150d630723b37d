// Keep test output bounded; builder debug lines are noise under vitest.
if (!process.env.GCM_LOG_LEVEL) {
  process.env.GCM_LOG_LEVEL = "silent";
}
