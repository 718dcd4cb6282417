/**
 * @module event-dispatcher/domain/identity
 */

export { BASE_ID, SequentialIdGenerator, uuidCodeGenerator } from './IdGenerator';
export type { IIdGenerator, CodeGenerator } from './IdGenerator';
