// Vitest setup file
// This runs before all tests

// Point the catalog loader at the fixture and keep scheduling at minute granularity
process.env.CATALOG_PATH = "src/lib/__tests__/fixtures/catalog.json";
process.env.DEFAULT_LANGUAGE = "en";
process.env.SLOT_GRANULARITY_MINUTES = "1";
process.env.OPENAI_API_KEY = "test-key";
