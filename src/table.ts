// table.ts
import {
  AttributeValue,
  BatchWriteItemCommand,
  DeleteItemCommand,
  DeleteTableCommand,
  DynamoDBClient,
  GetItemCommand,
  PutItemCommand,
  ResourceNotFoundException,
  ScanCommand,
  ScanCommandOutput,
  UpdateItemCommand,
  WriteRequest,
  waitUntilTableNotExists,
} from '@aws-sdk/client-dynamodb';
import { marshall, unmarshall } from '@aws-sdk/util-dynamodb';
import { DynamoClient } from './clients/dynamo-client';
import { parseTableConfig } from './config';
import { DefaultItemPreprocessor, ItemPreprocessor } from './items/itemPreprocessor';
import { selectItemsByAttrs, sortItemsByAttrs } from './items/filterUtils';
import { Logger } from './logger';
import { DynamoErrorFactory, ErrorContext } from './types/errors';
import {
  DeleteTableOptions,
  Item,
  Key,
  ReadOptions,
  SortOrder,
  TableConfig,
} from './types/types';

export interface TableHandleOptions {
  preprocessor?: ItemPreprocessor;
  /** resubmissions of UnprocessedItems per BatchWriteItem chunk */
  maxUnprocessedRetries?: number;
}

/** BatchWriteItem accepts at most 25 requests */
export const BATCH_WRITE_LIMIT = 25;
const DEFAULT_UNPROCESSED_RETRIES = 3;
const DEFAULT_DELETE_WAIT_SECONDS = 120;

const marshallOptions = { removeUndefinedValues: true };

// ----------------------------- Implementation -----------------------------

/**
 * A handle on one DynamoDB table plus a buffer of items waiting for a bulk write.
 * After `deleteTable` the handle is stale and every table operation rejects
 * with StaleHandleError.
 */
export class TableHandle {
  private readonly client: DynamoDBClient;
  private readonly logger: Logger;
  private readonly tableName: string;
  private readonly preprocessor: ItemPreprocessor;
  private readonly maxUnprocessedRetries: number;
  private batch: Item[] = [];
  private deleted = false;

  private constructor(
    private readonly dynamoClient: DynamoClient,
    tableConfig: TableConfig,
    options: TableHandleOptions
  ) {
    this.client = dynamoClient.getClient();
    this.logger = dynamoClient.getLogger();
    this.tableName = tableConfig.TableName;
    this.preprocessor = options.preprocessor ?? new DefaultItemPreprocessor();
    this.maxUnprocessedRetries =
      options.maxUnprocessedRetries ?? DEFAULT_UNPROCESSED_RETRIES;
    this.resetBatch();
  }

  /**
   * Binds to the table named in `config`, creating it from the full config
   * when it does not exist yet.
   */
  static async open(
    dynamoClient: DynamoClient,
    config: TableConfig,
    options: TableHandleOptions = {}
  ): Promise<TableHandle> {
    const tableConfig = parseTableConfig(config);
    const existing = await dynamoClient.findTable(tableConfig.TableName);
    if (!existing) {
      await dynamoClient.createTable(tableConfig);
    }
    const handle = new TableHandle(dynamoClient, tableConfig, options);
    dynamoClient
      .getLogger()
      .info(`table ${tableConfig.TableName} successfully initialized`, {
        tableName: tableConfig.TableName,
        created: !existing,
      });
    return handle;
  }

  /**
   * Binds to a table that must already exist; never creates one.
   */
  static async openExisting(
    dynamoClient: DynamoClient,
    tableName: string,
    options: TableHandleOptions = {}
  ): Promise<TableHandle> {
    const tableConfig = parseTableConfig({ TableName: tableName });
    if (!(await dynamoClient.findTable(tableConfig.TableName))) {
      throw DynamoErrorFactory.tableNotFound(tableConfig.TableName, 'open');
    }
    return new TableHandle(dynamoClient, tableConfig, options);
  }

  // ------------------------------ Metadata ---------------------------------------

  getTableName(): string {
    return this.tableName;
  }

  isStale(): boolean {
    return this.deleted;
  }

  async exists(): Promise<boolean> {
    this.assertLive('exists');
    return await this.dynamoClient.tableExists(this.tableName);
  }

  /**
   * Rebuilds the table config from the live table description.
   */
  async getTableConfig(): Promise<TableConfig> {
    this.assertLive('getTableConfig');
    return await this.dynamoClient.getTableConfig(this.tableName);
  }

  getPreprocessedItem(item: Item): Item {
    return this.preprocessor.preprocess(item);
  }

  // ------------------------------ Item methods ------------------------------------

  /**
   * Returns undefined when no item has this key.
   */
  async get(key: Key): Promise<Item | undefined> {
    this.assertLive('get');
    return await this.execute('get', { key }, async () => {
      const output = await this.client.send(
        new GetItemCommand({ TableName: this.tableName, Key: marshall(key) })
      );
      return output.Item ? unmarshall(output.Item) : undefined;
    });
  }

  /**
   * Writes the item, replacing any item stored under the same key.
   */
  async put(item: Item): Promise<void> {
    this.assertLive('put');
    await this.execute('put', {}, async () => {
      const prepared = this.getPreprocessedItem(item);
      await this.client.send(
        new PutItemCommand({
          TableName: this.tableName,
          Item: marshall(prepared, marshallOptions),
        })
      );
    });
  }

  /**
   * Sends the update expression and its values to DynamoDB untouched.
   */
  async update(
    key: Key,
    updateExpression: string,
    expressionAttributeValues: Item = {},
    expressionAttributeNames?: Record<string, string>
  ): Promise<void> {
    this.assertLive('update');
    await this.execute('update', { key }, async () => {
      const hasValues = Object.keys(expressionAttributeValues).length > 0;
      await this.client.send(
        new UpdateItemCommand({
          TableName: this.tableName,
          Key: marshall(key),
          UpdateExpression: updateExpression,
          ExpressionAttributeValues: hasValues
            ? marshall(expressionAttributeValues, marshallOptions)
            : undefined,
          ExpressionAttributeNames: expressionAttributeNames,
        })
      );
    });
  }

  /**
   * Deleting a key that is not stored is not an error.
   */
  async delete(key: Key): Promise<void> {
    this.assertLive('delete');
    await this.execute('delete', { key }, async () => {
      await this.client.send(
        new DeleteItemCommand({ TableName: this.tableName, Key: marshall(key) })
      );
    });
  }

  // ------------------------------ Batch methods ------------------------------------

  resetBatch(): void {
    this.batch = [];
  }

  /**
   * Buffers an item without touching DynamoDB. The buffer is unbounded.
   */
  addToBatch(item: Item): void {
    this.assertLive('addToBatch');
    this.batch.push(item);
  }

  getBatchSize(): number {
    return this.batch.length;
  }

  /**
   * Writes every buffered item with BatchWriteItem, 25 per request, and
   * removes the written items from the buffer. On failure the buffer is kept
   * as it was, so the flush can be repeated: batched puts overwrite whatever
   * was written before.
   * @returns the number of items written
   */
  async flushBatch(): Promise<number> {
    this.assertLive('flushBatch');
    const numItems = this.batch.length;
    if (numItems === 0) {
      this.logger.info('flush of empty batch ignored', {
        tableName: this.tableName,
      });
      return 0;
    }

    this.logger.info(`flushing ${numItems} items from batch`, {
      tableName: this.tableName,
    });
    const buffer = this.batch;
    const flushed = buffer.slice(0, numItems);
    await this.execute('flushBatch', { itemCount: numItems }, async () => {
      const requests: WriteRequest[] = flushed.map(item => ({
        PutRequest: {
          Item: marshall(this.getPreprocessedItem(item), marshallOptions),
        },
      }));
      for (let i = 0; i < requests.length; i += BATCH_WRITE_LIMIT) {
        await this.writeChunk(requests.slice(i, i + BATCH_WRITE_LIMIT));
      }
    });
    // items added while the requests were in flight stay for the next flush;
    // a buffer replaced by resetBatch meanwhile is left alone
    buffer.splice(0, numItems);
    return numItems;
  }

  private async writeChunk(requests: WriteRequest[]): Promise<void> {
    let pending = requests;
    for (let attempt = 0; ; attempt++) {
      const output = await this.client.send(
        new BatchWriteItemCommand({
          RequestItems: { [this.tableName]: pending },
        })
      );
      const unprocessed = output.UnprocessedItems?.[this.tableName] ?? [];
      if (unprocessed.length === 0) return;
      if (attempt >= this.maxUnprocessedRetries) {
        throw DynamoErrorFactory.unprocessedItems(
          this.tableName,
          unprocessed.length
        );
      }
      pending = unprocessed;
    }
  }

  // ------------------------------ READ methods ---------------------------------------

  /**
   * Reads the whole table, following LastEvaluatedKey until the last page.
   * Items come back in the order DynamoDB delivers them.
   */
  async scanAll(options: ReadOptions = {}): Promise<Item[]> {
    this.assertLive('scanAll');
    return await this.execute('scanAll', {}, async () => {
      const items: Item[] = [];
      let exclusiveStartKey: Record<string, AttributeValue> | undefined = undefined;
      do {
        const output: ScanCommandOutput = await this.client.send(
          new ScanCommand({
            TableName: this.tableName,
            Limit: options.pageSize,
            ExclusiveStartKey: exclusiveStartKey,
          })
        );
        for (const record of output.Items ?? []) {
          items.push(unmarshall(record));
        }
        exclusiveStartKey = output.LastEvaluatedKey;
      } while (exclusiveStartKey);
      return items;
    });
  }

  /**
   * Counts items with `Select: COUNT` scans. Every page, including the last
   * one, adds its Count.
   */
  async count(options: ReadOptions = {}): Promise<number> {
    this.assertLive('count');
    return await this.execute('count', {}, async () => {
      let total = 0;
      let exclusiveStartKey: Record<string, AttributeValue> | undefined = undefined;
      do {
        const output: ScanCommandOutput = await this.client.send(
          new ScanCommand({
            TableName: this.tableName,
            Select: 'COUNT',
            Limit: options.pageSize,
            ExclusiveStartKey: exclusiveStartKey,
          })
        );
        total += output.Count ?? 0;
        exclusiveStartKey = output.LastEvaluatedKey;
      } while (exclusiveStartKey);
      return total;
    });
  }

  selectItems(items: Item[], attrs: string[]): Item[] {
    return selectItemsByAttrs(items, attrs);
  }

  sortItems(items: Item[], order: SortOrder): Item[] {
    return sortItemsByAttrs(items, order);
  }

  // ------------------------------ Table deletion ------------------------------------

  /**
   * Deletes the table and waits until DynamoDB no longer reports it.
   * The handle is stale afterwards, also when the table was already gone.
   */
  async deleteTable(options: DeleteTableOptions = {}): Promise<void> {
    this.assertLive('deleteTable');
    if (!(await this.exists())) {
      this.logger.warn(
        `deleteTable ignored: table ${this.tableName} does not exist`,
        { tableName: this.tableName }
      );
      this.markDeleted();
      return;
    }

    await this.execute('deleteTable', {}, async () => {
      try {
        await this.client.send(
          new DeleteTableCommand({ TableName: this.tableName })
        );
      } catch (error) {
        if (!(error instanceof ResourceNotFoundException)) throw error;
      }
      await waitUntilTableNotExists(
        {
          client: this.client,
          maxWaitTime: options.maxWaitTime ?? DEFAULT_DELETE_WAIT_SECONDS,
        },
        { TableName: this.tableName }
      );
    });
    this.markDeleted();
    this.logger.info(`table ${this.tableName} has been deleted`, {
      tableName: this.tableName,
    });
  }

  // ------------------------------ Helpers ---------------------------------------

  private markDeleted(): void {
    this.deleted = true;
    this.resetBatch();
  }

  private assertLive(operation: string): void {
    if (this.deleted) {
      throw DynamoErrorFactory.staleHandle(this.tableName, operation);
    }
  }

  /**
   * Runs a request, logging and rethrowing failures as DynamoErrors.
   */
  private async execute<T>(
    operation: string,
    context: ErrorContext,
    run: () => Promise<T>
  ): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof ResourceNotFoundException) {
        const notFound = DynamoErrorFactory.tableNotFound(this.tableName, operation);
        this.logger.error(`${operation} failed: ${notFound.message}`, {
          ...notFound.context,
        });
        throw notFound;
      }
      const wrapped = DynamoErrorFactory.backendError(error, {
        ...context,
        tableName: this.tableName,
        operation,
      });
      this.logger.error(`${operation} failed: ${wrapped.message}`, {
        ...wrapped.context,
      });
      throw wrapped;
    }
  }
}
