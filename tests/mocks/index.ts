/**
 * Mock Index
 *
 * Central export for all test mocks
 */

// Logger
export { createMockLogger, type MockLogger } from './logger.mock.js';

// Storage
export { createMockStorage, mockLink, type MockStorageClient } from './storage.mock.js';

// Rasterizer
export { createMockRasterizer, createHangingRasterizer, type MockRasterizer } from './rasterizer.mock.js';

// Record source
export { ScriptedRecordSource } from './source.mock.js';

// Fixtures
export {
    TEST_SOURCE_FILE,
    TEST_TEMPLATE_SOURCE,
    createMockRecord,
    createMockResolvedConfig,
    createTestPdf,
    createTestTemplate,
    toJsonl,
} from './fixtures.js';
