/**
 * @fileoverview Identity generation for events, notifications and registries
 *
 * @remarks
 * Every factory receives its own generator instead of sharing a class-level
 * counter, so tests can start from a known id and two dispatchers never
 * interfere with each other's numbering.
 *
 * @module event-dispatcher/domain/identity
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * First id handed out by a default {@link SequentialIdGenerator}.
 */
export const BASE_ID = 10000;

/**
 * Source of strictly increasing integer ids.
 */
export interface IIdGenerator {
  /**
   * Return the next id. Never returns the same value twice.
   */
  next(): number;

  /**
   * Peek at the id the next call to `next()` will return.
   */
  readonly current: number;
}

/**
 * In-memory counter starting at `seed`.
 *
 * @example
 * ```typescript
 * const ids = new SequentialIdGenerator();
 * ids.next(); // 10000
 * ids.next(); // 10001
 * ```
 */
export class SequentialIdGenerator implements IIdGenerator {
  private value: number;

  constructor(seed: number = BASE_ID) {
    this.value = seed;
  }

  get current(): number {
    return this.value;
  }

  next(): number {
    return this.value++;
  }
}

/**
 * Produces opaque unique strings (event codes, subscription function ids).
 */
export type CodeGenerator = () => string;

/**
 * Default code generator: random UUID v4.
 */
export const uuidCodeGenerator: CodeGenerator = () => uuidv4();
