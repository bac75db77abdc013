import { CreateTableCommandInput } from '@aws-sdk/client-dynamodb';
import { z } from 'zod';
import { Config, TableConfig } from './types/types';
import { DynamoErrorFactory } from './types/errors';
import { LogLevel, parseLogLevel } from './logger';

const envSchema = z
  .object({
    DYNAMODB_URL: z.string().url().optional(),
    AWS_REGION: z.string().min(1).optional(),
    AWS_ACCESS_KEY_ID: z.string().min(1).optional(),
    AWS_SECRET_ACCESS_KEY: z.string().min(1).optional(),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .refine(env => !env.AWS_ACCESS_KEY_ID === !env.AWS_SECRET_ACCESS_KEY, {
    message: 'AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY must be set together',
  });

const tableNameSchema = z.object({
  TableName: z.string().min(1),
});

// Only the fields checked here; every other CreateTable field is passed on as given.
const createParametersSchema = z
  .object({
    KeySchema: z.array(
      z.object({
        AttributeName: z.string().min(1),
        KeyType: z.enum(['HASH', 'RANGE']),
      })
    ),
    AttributeDefinitions: z.array(
      z.object({
        AttributeName: z.string().min(1),
        AttributeType: z.enum(['S', 'N', 'B']),
      })
    ),
    ProvisionedThroughput: z
      .object({
        ReadCapacityUnits: z.number().int().positive(),
        WriteCapacityUnits: z.number().int().positive(),
      })
      .optional(),
    BillingMode: z.enum(['PROVISIONED', 'PAY_PER_REQUEST']).optional(),
  })
  .passthrough();

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Builds the client configuration from environment variables.
 * DYNAMODB_URL points the client at a local or test endpoint; when absent the
 * default AWS endpoint for the region is used.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw DynamoErrorFactory.invalidEnvironment(describeIssues(parsed.error));
  }

  const config: Config = {};
  if (parsed.data.DYNAMODB_URL) {
    config.endpoint = parsed.data.DYNAMODB_URL;
  }
  if (parsed.data.AWS_REGION) {
    config.region = parsed.data.AWS_REGION;
  }
  if (parsed.data.AWS_ACCESS_KEY_ID && parsed.data.AWS_SECRET_ACCESS_KEY) {
    config.credentials = {
      accessKeyId: parsed.data.AWS_ACCESS_KEY_ID,
      secretAccessKey: parsed.data.AWS_SECRET_ACCESS_KEY,
    };
  }
  return config;
}

export function loadLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  return parseLogLevel(env.LOG_LEVEL ?? 'info');
}

/**
 * Checks the table name. The rest of the config is only looked at when the
 * table has to be created.
 */
export function parseTableConfig(input: unknown): TableConfig {
  if (
    typeof input !== 'object' ||
    input === null ||
    !('TableName' in input) ||
    input.TableName === undefined
  ) {
    throw DynamoErrorFactory.tableNameRequired();
  }
  const parsed = tableNameSchema.safeParse(input);
  if (!parsed.success) {
    throw DynamoErrorFactory.invalidTableConfig(describeIssues(parsed.error));
  }
  return { ...input, TableName: parsed.data.TableName };
}

/**
 * Builds the CreateTable request from a table config, keeping every field it
 * carries (indexes, streams, tags, ...).
 */
export function parseCreateTableInput(config: TableConfig): CreateTableCommandInput {
  const tableName = config.TableName;
  if (!config.KeySchema?.length || !config.AttributeDefinitions?.length) {
    throw DynamoErrorFactory.keySchemaRequired(tableName);
  }
  const parsed = createParametersSchema.safeParse(config);
  if (!parsed.success) {
    throw DynamoErrorFactory.invalidCreateParameters(
      tableName,
      describeIssues(parsed.error)
    );
  }
  return {
    ...config,
    TableName: tableName,
    KeySchema: parsed.data.KeySchema,
    AttributeDefinitions: parsed.data.AttributeDefinitions,
    ProvisionedThroughput: parsed.data.ProvisionedThroughput,
    BillingMode: parsed.data.BillingMode,
  };
}
