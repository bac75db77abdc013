import { ResourceNotFoundException } from '@aws-sdk/client-dynamodb';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { dumpToJson, loadFromJson } from '../../transfer/jsonTransfer';
import { ConfigError, ErrorCode, NotFoundError } from '../../types/errors';
import { createFakeClient, simpleTableConfig } from '../helpers/fakeDynamo';

jest.mock('@aws-sdk/client-dynamodb', () => {
  const actual = jest.requireActual('@aws-sdk/client-dynamodb');
  return {
    ...actual,
    waitUntilTableExists: jest.fn().mockResolvedValue({ state: 'SUCCESS' }),
    waitUntilTableNotExists: jest.fn().mockResolvedValue({ state: 'SUCCESS' }),
  };
});

const sortById = (items: Record<string, unknown>[]) =>
  [...items].sort((a, b) => String(a.id).localeCompare(String(b.id)));

describe('JSON transfer', () => {
  let dir: string;

  beforeEach(async () => {
    jest.clearAllMocks();
    dir = await mkdtemp(join(tmpdir(), 'table-json-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('dumpToJson', () => {
    it('writes all items as a JSON array indented by 4 spaces', async () => {
      const { client } = createFakeClient();
      const table = await client.table(simpleTableConfig('Videos'));
      await table.put({ id: 'v1', views: 3 });
      const path = join(dir, 'videos.json');

      await expect(dumpToJson(client, 'Videos', path)).resolves.toBe(1);

      const text = await readFile(path, 'utf-8');
      expect(text).toBe(
        '[\n    {\n        "id": "v1",\n        "views": 3\n    }\n]'
      );
    });

    it('writes sets as arrays and binary values as base64', async () => {
      const { client } = createFakeClient();
      const table = await client.table(simpleTableConfig('Videos'));
      await table.put({
        id: 'v1',
        tags: new Set(['x', 'y']),
        thumb: new Uint8Array([1, 2, 3]),
      });
      const path = join(dir, 'videos.json');

      await client.dumpToJson('Videos', path);

      expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual([
        { id: 'v1', tags: ['x', 'y'], thumb: 'AQID' },
      ]);
    });

    it('writes numbers beyond the safe integer range as decimal text', async () => {
      const { client } = createFakeClient();
      const table = await client.table(simpleTableConfig('Videos'));
      await table.put({ id: 'v1', views: BigInt('12345678901234567890') });
      const path = join(dir, 'videos.json');

      await expect(client.dumpToJson('Videos', path)).resolves.toBe(1);

      expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual([
        { id: 'v1', views: '12345678901234567890' },
      ]);
    });

    it('raises NotFoundError when the table vanishes during the dump', async () => {
      const { fake, client } = createFakeClient();
      await client.table(simpleTableConfig('Videos'));
      fake.failNext(
        'ScanCommand',
        new ResourceNotFoundException({ message: 'Requested resource not found', $metadata: {} })
      );

      await expect(
        dumpToJson(client, 'Videos', join(dir, 'videos.json'))
      ).rejects.toMatchObject({
        name: 'NotFoundError',
        code: ErrorCode.TABLE_NOT_FOUND,
        context: { tableName: 'Videos', operation: 'scanAll' },
      });
      expect(fake.commandsSent()).not.toContain('CreateTableCommand');
    });

    it('raises NotFoundError for a missing table without creating it', async () => {
      const { fake, client } = createFakeClient();

      await expect(
        dumpToJson(client, 'Missing', join(dir, 'missing.json'))
      ).rejects.toBeInstanceOf(NotFoundError);
      expect(fake.commandsSent()).toEqual(['DescribeTableCommand']);
    });
  });

  describe('loadFromJson', () => {
    it('loads every item with one flush and reports the counts', async () => {
      const { fake, client, logger } = createFakeClient();
      const table = await client.table(simpleTableConfig('Videos'));
      await table.put({ id: 'old' });
      const path = join(dir, 'input.json');
      await writeFile(
        path,
        JSON.stringify([{ id: 'a', views: 1 }, { id: 'b', views: 2 }]),
        'utf-8'
      );
      fake.send.mockClear();

      const result = await loadFromJson(client, simpleTableConfig('Videos'), path);

      expect(result).toEqual({ originalCount: 1, loadedCount: 2, finalCount: 3 });
      expect(
        fake.commandsSent().filter(name => name === 'BatchWriteItemCommand')
      ).toHaveLength(1);
      expect(logger.info).toHaveBeenCalledWith(
        'table Videos original_count:1 loaded_count:2 final_count:3',
        { tableName: 'Videos', originalCount: 1, loadedCount: 2, finalCount: 3 }
      );
    });

    it('creates the table from the supplied config when it is missing', async () => {
      const { fake, client } = createFakeClient();
      const path = join(dir, 'input.json');
      await writeFile(path, JSON.stringify([{ id: 'a' }]), 'utf-8');

      const result = await client.loadFromJson(simpleTableConfig('Fresh'), path);

      expect(result).toEqual({ originalCount: 0, loadedCount: 1, finalCount: 1 });
      expect(fake.tables.has('Fresh')).toBe(true);
    });

    it('refuses to create a missing table without a key schema', async () => {
      const { fake, client } = createFakeClient();
      const path = join(dir, 'input.json');
      await writeFile(path, '[]', 'utf-8');

      await expect(
        loadFromJson(client, { TableName: 'Fresh' }, path)
      ).rejects.toMatchObject({ code: ErrorCode.KEY_SCHEMA_REQUIRED });
      expect(fake.tables.has('Fresh')).toBe(false);
    });

    it.each([
      ['malformed JSON', '[{"id": '],
      ['a JSON object', '{"id": "a"}'],
      ['an array of scalars', '[1, 2]'],
    ])('raises ConfigError for %s', async (_label, content) => {
      const { client } = createFakeClient();
      const path = join(dir, 'bad.json');
      await writeFile(path, content, 'utf-8');

      const attempt = loadFromJson(client, simpleTableConfig('Videos'), path);

      await expect(attempt).rejects.toBeInstanceOf(ConfigError);
      await expect(attempt).rejects.toMatchObject({
        code: ErrorCode.INVALID_JSON_FILE,
        context: { path },
      });
    });

    it('raises ConfigError when the file does not exist', async () => {
      const { client } = createFakeClient();

      await expect(
        loadFromJson(client, simpleTableConfig('Videos'), join(dir, 'nope.json'))
      ).rejects.toMatchObject({ name: 'ConfigError', code: ErrorCode.INVALID_JSON_FILE });
    });
  });

  it('reproduces the item set when a dump is loaded into an empty table', async () => {
    const { client } = createFakeClient({ pageSize: 2 });
    const source = await client.table(simpleTableConfig('Source'));
    const items = [
      { id: 'c', title: 'Gamma', views: 30, tags: ['x'] },
      { id: 'a', title: 'Alpha', views: 10, meta: { live: true } },
      { id: 'b', title: 'Beta', views: 20, note: null },
    ];
    for (const item of items) {
      source.addToBatch(item);
    }
    await source.flushBatch();
    const path = join(dir, 'dump.json');

    await client.dumpToJson('Source', path);
    const result = await client.loadFromJson(simpleTableConfig('Target'), path);

    expect(result).toEqual({ originalCount: 0, loadedCount: 3, finalCount: 3 });
    const target = await client.table(simpleTableConfig('Target'));
    expect(sortById(await target.scanAll())).toEqual(sortById(items));
  });
});
