/**
 * iotdb-mcp - Test Mocks
 *
 * Centralized mock factories for testing. All tests should import
 * mocks from this module for consistency.
 */

// Adapter helpers
export {
  createTestConfig,
  createTimeAlignedDataSet,
  createPlainDataSet,
  createMockRequestContext,
  findTool,
} from "./adapter.js";

// Session pool mocks
export {
  createMockSession,
  createMockSessionSource,
  createMockConnectionPool,
} from "./pool.js";
export type { MockSession, MockSessionSource } from "./pool.js";
