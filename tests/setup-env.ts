// Deterministic environment for modules that read configuration during tests
process.env.LOG_LEVEL = process.env.LOG_LEVEL || "silent";
delete process.env.LOG_DIR;
process.env.MOCK_DATA = process.env.MOCK_DATA || "true";
process.env.CURRENCY_SYMBOL = process.env.CURRENCY_SYMBOL || "€";
