/**
 * Database Module
 */

export { PgRecordStore } from './record-store';
export { prepareStatement, bindParameters } from './statement';
export type { PreparedStatement, ParameterValue } from './statement';
export * from './interfaces';
