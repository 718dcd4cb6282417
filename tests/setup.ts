/**
 * @fileoverview Jest test setup and global utilities
 *
 * Provides a recording logger for tests.
 */

// ============================================================================
// CRITICAL: This export {} makes this file a module
// Without it, declare global won't work properly
// ============================================================================
export {};

// ============================================================================
// Global Type Declarations
// ============================================================================

/**
 * Logger whose methods are jest mocks
 */
interface TestLogger {
  debug: jest.Mock<void, [string, ...unknown[]]>;
  info: jest.Mock<void, [string, ...unknown[]]>;
  warn: jest.Mock<void, [string, ...unknown[]]>;
  error: jest.Mock<void, [string, ...unknown[]]>;
}

declare global {
  /**
   * Create a logger that records calls instead of printing
   */
  // eslint-disable-next-line no-var
  var createTestLogger: () => TestLogger;
}

// ============================================================================
// Global Utility Functions
// ============================================================================

/**
 * Recording logger
 *
 * @example
 * ```typescript
 * const logger = createTestLogger();
 * const dispatcher = createDispatcher({ logger });
 * // ...
 * expect(logger.warn).toHaveBeenCalledTimes(1);
 * ```
 */
globalThis.createTestLogger = (): TestLogger => ({
  debug: jest.fn<void, [string, ...unknown[]]>(),
  info: jest.fn<void, [string, ...unknown[]]>(),
  warn: jest.fn<void, [string, ...unknown[]]>(),
  error: jest.fn<void, [string, ...unknown[]]>(),
});
