import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest'

import { IN_MEMORY, DuckDbDatabase } from '../src/duckdb/database.js'
import { DuckDbMetadataRecords } from '../src/duckdb/metadataRecords.js'
import { DuckDbTableStore } from '../src/duckdb/tableStore.js'
import { METADATA_TABLE, quoteIdent, quoteLiteral } from '../src/schema/identifiers.js'

// Runs against a real in-memory DuckDB instance; no files outside a temp directory
describe('DuckDbTableStore', () => {
  let dir: string
  let db: DuckDbDatabase
  let store: DuckDbTableStore

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'localdb-test-'))
  })

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  beforeEach(async () => {
    db = await DuckDbDatabase.open(IN_MEMORY)
    store = new DuckDbTableStore(db)
  })

  async function importCsv(name: string, text: string, kind: 'csv' | 'tsv' = 'csv', replace = false) {
    const path = join(dir, `${name}.${kind}`)
    await writeFile(path, text, 'utf-8')
    return store.importFile(path, kind, { tableName: name, replace })
  }

  it('imports a CSV file and reports its shape', async () => {
    const [imported] = await importCsv('people', 'name,age\nann,31\nbob,42\ncid,27\n')
    expect(imported).toEqual({ name: 'people', row_count: 3, display_name: null, comment: null, column_comments: {} })

    expect(await store.listTables()).toEqual(['people'])
    expect(await store.tableExists('people')).toBe(true)
    expect(await store.countRows('people')).toBe(3)
    expect(await store.getSchema('people')).toEqual([
      { name: 'name', type: 'VARCHAR', nullable: true, default: null },
      { name: 'age', type: 'BIGINT', nullable: true, default: null },
    ])

    const page = await store.readRows('people', { limit: 1, offset: 1 })
    expect(page.columns).toEqual(['name', 'age'])
    expect(page.rows.map((r) => r.name)).toEqual(['bob'])
  })

  it('imports TSV files and table names with spaces', async () => {
    const [imported] = await importCsv('sales 2024', 'region\tamount\neast\t10\nwest\t20\n', 'tsv')
    expect(imported?.row_count).toBe(2)
    const result = await store.runQuery('SELECT region FROM "sales 2024" ORDER BY region', 10)
    expect(result).toEqual({ columns: ['region'], rows: [{ region: 'east' }, { region: 'west' }], truncated: false })
  })

  it('refuses to overwrite an existing table unless asked', async () => {
    await importCsv('items', 'id\n1\n')
    await expect(importCsv('items', 'id\n1\n2\n')).rejects.toMatchObject({
      code: 'ConflictError',
      message: 'Table "items" already exists',
    })
    const [replaced] = await importCsv('items', 'id\n1\n2\n', 'csv', true)
    expect(replaced?.row_count).toBe(2)
  })

  it('maps engine errors to error codes', async () => {
    await expect(store.runQuery('SELEC 1', 10)).rejects.toMatchObject({ code: 'ValidationError' })
    await expect(store.runQuery('SELECT * FROM nope', 10)).rejects.toMatchObject({ code: 'NotFound' })
    await expect(store.getSchema('nope')).rejects.toMatchObject({ code: 'NotFound', message: 'Table "nope" does not exist' })
  })

  it('reads at most maxRows rows and flags the rest', async () => {
    const result = await store.runQuery('SELECT CAST(range AS INTEGER) AS n FROM range(10000) ORDER BY n', 3)
    expect(result).toEqual({ columns: ['n'], rows: [{ n: 0 }, { n: 1 }, { n: 2 }], truncated: true })

    const exact = await store.runQuery('SELECT 1 AS one', 1)
    expect(exact).toEqual({ columns: ['one'], rows: [{ one: 1 }], truncated: false })
  })

  it('runs only a single read statement', async () => {
    await importCsv('people', 'name\nann\nbob\n')

    await expect(store.runQuery(`SELECT $$'$$; DROP TABLE people; SELECT 'x'`, 10)).rejects.toMatchObject({
      code: 'ValidationError',
      message: 'Expected a single statement but got 3',
    })
    await expect(store.runQuery('DELETE FROM people', 10)).rejects.toMatchObject({ code: 'ValidationError' })
    await expect(store.runQuery('EXPLAIN ANALYZE DELETE FROM people', 10)).rejects.toMatchObject({
      code: 'ValidationError',
    })
    await expect(store.runQuery('', 10)).rejects.toMatchObject({ code: 'ValidationError', message: 'Query is empty' })

    expect(await store.listTables()).toEqual(['people'])
    expect(await store.countRows('people')).toBe(2)
  })

  it('accepts SHOW and DESCRIBE', async () => {
    await importCsv('people', 'name\nann\n')
    const described = await store.runQuery('DESCRIBE people', 10)
    expect(described.rows.map((r) => r.column_name)).toEqual(['name'])
    const shown = await store.runQuery('SHOW TABLES', 10)
    expect(shown.rows).toEqual([{ name: 'people' }])
  })

  it('renames columns and drops tables', async () => {
    await importCsv('t', 'a\nx\n')
    await store.renameColumn('t', 'a', 'b')
    expect((await store.getSchema('t')).map((c) => c.name)).toEqual(['b'])

    expect(await store.dropTable('t')).toBe(true)
    expect(await store.dropTable('t')).toBe(false)
    expect(await store.listTables()).toEqual([])
  })

  it('imports every table of an uploaded database with its comments', async () => {
    const source = join(dir, `source-${Date.now()}.duckdb`)
    await db.withConnection('fixture', async (conn) => {
      await conn.run(`ATTACH ${quoteLiteral(source)} AS src`)
      await conn.run(`CREATE TABLE src.main.cities AS SELECT * FROM (VALUES ('Oslo'), ('Lima')) v(city)`)
      await conn.run(`CREATE TABLE src.main.empty_one (x INTEGER)`)
      await conn.run(`COMMENT ON TABLE src.main.cities IS 'Capital cities'`)
      await conn.run(
        `CREATE TABLE src.main.${quoteIdent(METADATA_TABLE)} AS
         SELECT 'cities' AS table_name, 'Cities' AS display_name, NULL::VARCHAR AS comment, '{"city":"Name"}' AS column_comments`,
      )
      await conn.run('CHECKPOINT src')
      await conn.run('DETACH src')
    })

    const imported = await store.importFile(source, 'duckdb')
    expect(imported).toEqual([
      { name: 'cities', row_count: 2, display_name: 'Cities', comment: 'Capital cities', column_comments: { city: 'Name' } },
      { name: 'empty_one', row_count: 0, display_name: null, comment: null, column_comments: {} },
    ])
    expect(await store.listTables()).toEqual(['cities', 'empty_one'])

    await expect(store.importFile(source, 'duckdb')).rejects.toMatchObject({
      code: 'ConflictError',
      message: 'Tables already exist: cities, empty_one',
    })
  })

  it('has no database file when held in memory', async () => {
    expect(await store.databaseFile()).toBeUndefined()
  })
})

describe('DuckDbMetadataRecords', () => {
  it('stores, lists and deletes records', async () => {
    const db = await DuckDbDatabase.open(IN_MEMORY)
    const records = await DuckDbMetadataRecords.create(db)
    const store = new DuckDbTableStore(db)

    await records.put({
      table_name: 'b',
      display_name: 'Bee',
      comment: null,
      column_comments: { x: 'ex' },
      updated_at: '2024-01-01T00:00:00.000Z',
    })
    await records.put({ table_name: 'a', display_name: null, comment: 'first', column_comments: {}, updated_at: 't1' })
    await records.put({ table_name: 'a', display_name: null, comment: 'second', column_comments: {}, updated_at: 't2' })

    expect(await records.get('b')).toEqual({
      table_name: 'b',
      display_name: 'Bee',
      comment: null,
      column_comments: { x: 'ex' },
      updated_at: '2024-01-01T00:00:00.000Z',
    })
    expect((await records.list()).map((r) => [r.table_name, r.comment])).toEqual([
      ['a', 'second'],
      ['b', null],
    ])

    await records.delete('a')
    expect(await records.get('a')).toBeUndefined()
    // The side table is never treated as a user table
    expect(await store.listTables()).toEqual([])
    expect(await store.tableExists(METADATA_TABLE)).toBe(false)
    expect(await store.dropTable(METADATA_TABLE)).toBe(false)
    await expect(store.getSchema(METADATA_TABLE)).rejects.toMatchObject({ code: 'NotFound' })
    expect((await records.list()).map((r) => r.table_name)).toEqual(['b'])
  })
})
