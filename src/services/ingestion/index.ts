/**
 * Ingestion Module
 * Decoder, filters, collector and the ingestion loop.
 */

export { IngestionService } from './service';
export type { IngestionConfig } from './service';
export { BatchCollector } from './collector';
export { decodeFrame, encodeRecord } from './decoder';
export { acceptAll, createFieldFilter } from './filter';
export * from './interfaces';
