// Keep test output quiet; the logger reads LOG_LEVEL when first imported
process.env.LOG_LEVEL = 'fatal';
