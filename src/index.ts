/**
 * @fileoverview event-dispatcher - In-process publish/subscribe dispatcher
 * @description
 * Register callbacks against named events within namespaces, dispatch an
 * event to run them synchronously by priority, and inspect the returned
 * notification for results and failures.
 *
 * ## Layers
 *
 * - **domain**: events, notifications, identity, errors
 * - **application**: subscription registries, dispatcher, helpers
 *
 * @packageDocumentation
 * @module event-dispatcher
 * @version 0.1.0
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

/**
 * Errors, identity, namespace constants, events and notifications.
 */
export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

/**
 * Logging, subscription registries, the dispatcher and helpers.
 */
export * from './application';

// ==================== Default Export ====================
export { Dispatcher as default } from './application/dispatcher';

// ==================== Version ====================
export const VERSION = '0.1.0';
