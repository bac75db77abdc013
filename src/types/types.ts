import {
  AttributeDefinition,
  CreateTableCommandInput,
  DynamoDBClient,
  KeySchemaElement,
} from '@aws-sdk/client-dynamodb';
import { NativeAttributeValue } from '@aws-sdk/util-dynamodb';
import { Logger } from '../logger';

export interface Config {
  region?: string;
  endpoint?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
}

export interface ClientOptions {
  logger?: Logger;
  /** adopt an existing DynamoDBClient instead of building one from Config */
  client?: DynamoDBClient;
}

/**
 * Table definition, passed verbatim to CreateTable when the table is missing.
 * Only TableName is needed to open an existing table.
 */
export interface TableConfig
  extends Omit<CreateTableCommandInput, 'TableName' | 'KeySchema' | 'AttributeDefinitions'> {
  TableName: string;
  KeySchema?: KeySchemaElement[];
  AttributeDefinitions?: AttributeDefinition[];
}

export type Item = Record<string, NativeAttributeValue>;
export type Key = Record<string, string | number | Uint8Array>;

export type SortDirection = 'asc' | 'desc';
export type SortOrder = [attr: string, direction: SortDirection][];

export interface ReadOptions {
  /** Limit per Scan request; the loop still reads every page */
  pageSize?: number;
}

export interface DeleteTableOptions {
  /** seconds to wait for the table to disappear */
  maxWaitTime?: number;
}

export interface LoadResult {
  originalCount: number;
  loadedCount: number;
  finalCount: number;
}
