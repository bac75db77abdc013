import { readFile, writeFile } from 'fs/promises';
import { z } from 'zod';
import { DynamoClient } from '../clients/dynamo-client';
import { DynamoErrorFactory } from '../types/errors';
import { Item, LoadResult, TableConfig } from '../types/types';

const itemsFileSchema = z.array(z.record(z.unknown()));

/**
 * JSON has no sets, binary values or big integers. Sets are written as
 * arrays, binary attributes as base64 strings, and numbers beyond
 * Number.MAX_SAFE_INTEGER (read back as bigint) as their decimal text.
 */
function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Set) {
    return Array.from(value);
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString('base64');
  }
  return value;
}

/**
 * Writes every item of an existing table to `jsonFilePath` as a JSON array.
 * @returns the number of items written
 */
export async function dumpToJson(
  client: DynamoClient,
  tableName: string,
  jsonFilePath: string
): Promise<number> {
  const logger = client.getLogger();
  const table = await client.existingTable(tableName);
  const items = await table.scanAll();
  logger.info(
    `dumping ${items.length} items from table ${tableName} to ${jsonFilePath}`,
    { tableName }
  );
  await writeFile(jsonFilePath, JSON.stringify(items, jsonReplacer, 4), 'utf-8');
  logger.info(`table ${tableName} dumped ${items.length} items`, { tableName });
  return items.length;
}

async function readItemsFile(jsonFilePath: string): Promise<Item[]> {
  let text: string;
  try {
    text = await readFile(jsonFilePath, 'utf-8');
  } catch (error) {
    throw DynamoErrorFactory.invalidJsonFile(
      jsonFilePath,
      error instanceof Error ? error.message : String(error)
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw DynamoErrorFactory.invalidJsonFile(
      jsonFilePath,
      error instanceof Error ? error.message : String(error)
    );
  }

  const parsed = itemsFileSchema.safeParse(data);
  if (!parsed.success) {
    throw DynamoErrorFactory.invalidJsonFile(
      jsonFilePath,
      'expected an array of item objects'
    );
  }
  return parsed.data;
}

/**
 * Loads a JSON array of items into the table, creating the table from
 * `config` when it does not exist. All items go through one batch flush.
 */
export async function loadFromJson(
  client: DynamoClient,
  config: TableConfig,
  jsonFilePath: string
): Promise<LoadResult> {
  const logger = client.getLogger();
  const table = await client.table(config);
  const tableName = table.getTableName();

  const originalCount = await table.count();
  const items = await readItemsFile(jsonFilePath);
  logger.info(
    `loading ${items.length} items from ${jsonFilePath} into table ${tableName}`,
    { tableName }
  );

  table.resetBatch();
  for (const item of items) {
    table.addToBatch(item);
  }
  const loadedCount = await table.flushBatch();
  const finalCount = await table.count();

  logger.info(
    `table ${tableName} original_count:${originalCount} loaded_count:${loadedCount} final_count:${finalCount}`,
    { tableName, originalCount, loadedCount, finalCount }
  );
  return { originalCount, loadedCount, finalCount };
}
