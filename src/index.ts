/**
 * tagged-stack - LIFO stack whose items carry a value plus a set of tags
 *
 * Main entry point for the library
 */

// Export everything from core modules
export * from './abstractTaggedStack.js';
export * from './taggedStack.js';
export * from './concurrentTaggedStack.js';
export * from './stackItem.js';
export * from './errors.js';
export * from './tags/index.js';

export type {StackDeque, DequeCursor} from './deque/stackDeque.js';
export {ArrayDeque} from './deque/arrayDeque.js';
export {ConcurrentLinkedDeque} from './deque/concurrentLinkedDeque.js';

export {resolveConfig, getConfigKeys, DEFAULT_CONFIG_PREFIXES} from './config.js';
export type {StackConfig} from './config.js';
