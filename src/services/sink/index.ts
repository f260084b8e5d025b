/**
 * Sink Module
 */

export { RecordSink, ImmediateSink, BatchedSink } from './sink';
export { mergeDefaults } from './merge';
export * from './interfaces';
