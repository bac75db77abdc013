// dynamo-client.ts
import {
  CreateTableCommand,
  DescribeTableCommand,
  DynamoDBClient,
  ResourceInUseException,
  ResourceNotFoundException,
  TableDescription,
  waitUntilTableExists,
} from '@aws-sdk/client-dynamodb';
import dotenv from 'dotenv';
import {
  loadConfig,
  loadLogLevel,
  parseCreateTableInput,
  parseTableConfig,
} from '../config';
import { ConsoleLogger, Logger } from '../logger';
import { TableHandle, TableHandleOptions } from '../table';
import { dumpToJson, loadFromJson } from '../transfer/jsonTransfer';
import { DynamoErrorFactory } from '../types/errors';
import { ClientOptions, Config, LoadResult, TableConfig } from '../types/types';

const DEFAULT_CREATE_WAIT_SECONDS = 120;

/**
 * Owns the DynamoDBClient shared by every table handle it opens. Construct
 * one per process and pass it where tables are needed.
 */
export class DynamoClient {
  private readonly client: DynamoDBClient;
  private readonly logger: Logger;

  constructor(config?: Config, options: ClientOptions = {}) {
    this.client = options.client ?? new DynamoDBClient(config ?? {});
    this.logger = options.logger ?? new ConsoleLogger({ name: 'dynamo' });
  }

  /**
   * Reads `.env` and the process environment. DYNAMODB_URL selects a local
   * or test endpoint.
   */
  static fromEnv(options: ClientOptions = {}): DynamoClient {
    dotenv.config();
    const logger =
      options.logger ??
      new ConsoleLogger({ name: 'dynamo', level: loadLogLevel(process.env) });
    return new DynamoClient(loadConfig(process.env), { ...options, logger });
  }

  /**
   * Opens a handle on the table, creating the table when it is missing.
   * Calling this twice with the same TableName creates one table.
   */
  async table(
    config: TableConfig,
    options?: TableHandleOptions
  ): Promise<TableHandle> {
    return await TableHandle.open(this, config, options);
  }

  /**
   * Opens a handle on a table that must already exist.
   * Raises NotFoundError instead of creating it.
   */
  async existingTable(
    tableName: string,
    options?: TableHandleOptions
  ): Promise<TableHandle> {
    return await TableHandle.openExisting(this, tableName, options);
  }

  /**
   * Returns undefined only when DynamoDB reports the table as not found;
   * any other failure is raised as a BackendError.
   */
  async findTable(tableName: string): Promise<TableDescription | undefined> {
    try {
      const output = await this.client.send(
        new DescribeTableCommand({ TableName: tableName })
      );
      return output.Table ?? { TableName: tableName };
    } catch (error) {
      if (error instanceof ResourceNotFoundException) {
        return undefined;
      }
      const wrapped = DynamoErrorFactory.backendError(error, {
        tableName,
        operation: 'describeTable',
      });
      this.logger.error(
        `error checking for table ${tableName}: ${wrapped.message}`,
        { ...wrapped.context }
      );
      throw wrapped;
    }
  }

  async tableExists(tableName: string): Promise<boolean> {
    return (await this.findTable(tableName)) !== undefined;
  }

  /**
   * Creates the table and waits until it is active.
   *
   * Two processes racing to create the same table both send CreateTable; the
   * loser gets ResourceInUseException and binds to the winner's table.
   */
  async createTable(config: TableConfig): Promise<TableDescription> {
    const tableConfig = parseTableConfig(config);
    const tableName = tableConfig.TableName;
    const input = parseCreateTableInput(tableConfig);

    try {
      const output = await this.client.send(new CreateTableCommand(input));
      await waitUntilTableExists(
        { client: this.client, maxWaitTime: DEFAULT_CREATE_WAIT_SECONDS },
        { TableName: tableName }
      );
      this.logger.info(`created table ${tableName}`, {
        tableName,
        tableConfig: input,
      });
      return output.TableDescription ?? { TableName: tableName };
    } catch (error) {
      if (error instanceof ResourceInUseException) {
        const existing = await this.findTable(tableName);
        if (existing) {
          this.logger.warn(
            `table ${tableName} was created concurrently, using the existing table`,
            { tableName }
          );
          return existing;
        }
      }
      const wrapped = DynamoErrorFactory.tableCreationFailed(tableName, error);
      this.logger.error(wrapped.getDetailedMessage(), { ...wrapped.context });
      throw wrapped;
    }
  }

  /**
   * Rebuilds a TableConfig from the live table description.
   */
  async getTableConfig(tableName: string): Promise<TableConfig> {
    const description = await this.findTable(tableName);
    if (!description) {
      throw DynamoErrorFactory.tableNotFound(tableName, 'getTableConfig');
    }

    const config: TableConfig = { TableName: description.TableName ?? tableName };
    if (description.KeySchema) {
      config.KeySchema = description.KeySchema;
    }
    if (description.AttributeDefinitions) {
      config.AttributeDefinitions = description.AttributeDefinitions;
    }

    const throughput = description.ProvisionedThroughput;
    if (description.BillingModeSummary?.BillingMode === 'PAY_PER_REQUEST') {
      config.BillingMode = 'PAY_PER_REQUEST';
    } else if (
      throughput?.ReadCapacityUnits !== undefined &&
      throughput.WriteCapacityUnits !== undefined
    ) {
      config.ProvisionedThroughput = {
        ReadCapacityUnits: throughput.ReadCapacityUnits,
        WriteCapacityUnits: throughput.WriteCapacityUnits,
      };
    }
    return config;
  }

  async dumpToJson(tableName: string, jsonFilePath: string): Promise<number> {
    return await dumpToJson(this, tableName, jsonFilePath);
  }

  async loadFromJson(
    config: TableConfig,
    jsonFilePath: string
  ): Promise<LoadResult> {
    return await loadFromJson(this, config, jsonFilePath);
  }

  /**
   * Returns the native DynamoDB client instance.
   */
  getClient(): DynamoDBClient {
    return this.client;
  }

  getLogger(): Logger {
    return this.logger;
  }
}
