/**
 * DynamoDB table handles
 * Table find-or-create, item CRUD, batch writes, scans and JSON import/export
 */

export * from './types/types';
export * from './types/errors';
export * from './clients/dynamo-client';
export * from './table';
export * from './config';
export * from './logger';
export * from './items/itemPreprocessor';
export * from './items/filterUtils';
export * from './transfer/jsonTransfer';

// Version information
export const VERSION = '1.0.0';
