/**
 * @module event-dispatcher/domain
 * @description Value types, identity and errors. No dependency on the
 * application layer.
 */

export * from './exceptions';
export * from './identity';
export * from './constants';
export * from './events';
export * from './notifications';
