/**
 * Predefined namespaces. Any string is a valid namespace; these two are the
 * conventional ones.
 */

/** Namespace for subscriptions shared across the whole application */
export const GLOBAL = 'global' as const;

/** Namespace for subscriptions private to one component */
export const LOCAL = 'local' as const;

export type PredefinedNamespace = typeof GLOBAL | typeof LOCAL;
