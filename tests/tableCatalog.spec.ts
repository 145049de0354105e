import { beforeEach, describe, expect, it } from 'vitest'

import { TableMetadataService } from '../src/catalog/metadataService.js'
import { TableCatalog } from '../src/catalog/tableCatalog.js'
import { InMemoryMetadataRecords, MockTableStore } from '../src/duckdb/mockStore.js'

const csv = (text: string) => new TextEncoder().encode(text)

class UndeletableRecords extends InMemoryMetadataRecords {
  async delete(): Promise<void> {
    throw new Error('IO Error: disk full')
  }
}

describe('TableCatalog with mock store', () => {
  let store: MockTableStore
  let records: InMemoryMetadataRecords
  let metadata: TableMetadataService
  let catalog: TableCatalog

  beforeEach(() => {
    store = new MockTableStore()
    records = new InMemoryMetadataRecords()
    metadata = new TableMetadataService(store, records)
    catalog = new TableCatalog(store, metadata)
  })

  it('imports a CSV upload as a table named after the file', async () => {
    const result = await catalog.importUpload({ filename: 'people.csv', content: csv('name,age\nann,31\nbob,42\n') })
    expect(result).toEqual({
      kind: 'table',
      message: 'File "people.csv" was imported',
      table_name: 'people',
      row_count: 2,
    })
    expect(await catalog.listTables()).toEqual([{ name: 'people', display_name: 'people', comment: '', row_count: 2 }])
  })

  it('imports TSV uploads with tab delimiters', async () => {
    await catalog.importUpload({ filename: 'items.tsv', content: csv('id\tlabel\n1\tpen\n') })
    const page = await catalog.readPage('items', 10, 0)
    expect(page.rows).toEqual([{ id: '1', label: 'pen' }])
  })

  it('rejects a name clash unless replace is set', async () => {
    await catalog.importUpload({ filename: 'people.csv', content: csv('name\nann\n') })
    await metadata.setMetadata('people', { display_name: 'People' })

    await expect(catalog.importUpload({ filename: 'people.csv', content: csv('name\nbob\n') })).rejects.toMatchObject({
      code: 'ConflictError',
    })

    const result = await catalog.importUpload({ filename: 'people.csv', content: csv('name\nbob\ncid\n'), replace: true })
    expect(result).toMatchObject({ kind: 'table', row_count: 2 })
    // Metadata of the replaced table is dropped with it
    expect(await metadata.getRecord('people')).toBeUndefined()
  })

  it('rejects unsupported file types and reserved names', async () => {
    await expect(catalog.importUpload({ filename: 'book.xlsx', content: csv('x') })).rejects.toMatchObject({
      code: 'ValidationError',
      message: 'Only CSV, TSV and DuckDB files are supported',
    })
    await expect(catalog.importUpload({ filename: '_localdb_x.csv', content: csv('a\n1\n') })).rejects.toMatchObject({
      code: 'ValidationError',
    })
  })

  it('pages through rows and reports the total', async () => {
    store.seedTable('nums', [{ n: '1' }, { n: '2' }, { n: '3' }])
    expect(await catalog.readPage('nums', 2, 1)).toEqual({
      table: 'nums',
      columns: ['n'],
      rows: [{ n: '2' }, { n: '3' }],
      limit: 2,
      offset: 1,
      row_count: 3,
    })
  })

  it('searches names, display names and comments case-insensitively', async () => {
    store.seedTable('orders', [{ id: '1' }])
    store.seedTable('customers', [{ id: '1' }])
    await metadata.setMetadata('customers', { display_name: 'Clients', comment: 'People who placed ORDERS' })

    const hits = await catalog.searchTables('orders')
    expect(hits.map((h) => [h.name, h.matched])).toEqual([
      ['customers', ['comment']],
      ['orders', ['name', 'display_name']],
    ])
    await expect(catalog.searchTables('  ')).rejects.toMatchObject({ code: 'ValidationError' })
  })

  it('deletes a table together with its metadata', async () => {
    store.seedTable('tmp', [{ a: '1' }])
    await metadata.setMetadata('tmp', { comment: 'scratch' })
    await catalog.deleteTable('tmp')
    expect(await catalog.listTables()).toEqual([])
    expect(await records.list()).toEqual([])
    await expect(metadata.getMetadata('tmp')).rejects.toMatchObject({ code: 'NotFound' })
    await expect(catalog.deleteTable('tmp')).rejects.toMatchObject({ code: 'NotFound', message: 'Table "tmp" does not exist' })
  })

  it('reports a delete as done when only the metadata cleanup fails', async () => {
    const failing = new UndeletableRecords()
    const failingCatalog = new TableCatalog(store, new TableMetadataService(store, failing))
    store.seedTable('tmp', [{ a: '1' }])
    await failing.put({ table_name: 'tmp', display_name: null, comment: 'scratch', column_comments: {}, updated_at: 't' })

    await expect(failingCatalog.deleteTable('tmp')).resolves.toBeUndefined()
    expect(await store.tableExists('tmp')).toBe(false)
    // The leftover record stays until pruneOrphanMetadata runs
    expect((await failing.list()).map((r) => r.table_name)).toEqual(['tmp'])
  })

  it('rejects reserved table names on every table operation', async () => {
    const reserved = '_localdb_table_metadata'
    const invalid = { code: 'ValidationError', message: `Invalid table name "${reserved}": Table names starting with _localdb_ are reserved` }
    await expect(catalog.deleteTable(reserved)).rejects.toMatchObject(invalid)
    await expect(catalog.getSchema(reserved)).rejects.toMatchObject(invalid)
    await expect(catalog.readPage(reserved, 10, 0)).rejects.toMatchObject(invalid)
    await expect(catalog.renameColumn(reserved, 'table_name', 'x')).rejects.toMatchObject(invalid)
    await expect(metadata.getMetadata(reserved)).rejects.toMatchObject(invalid)
  })

  it('moves the column comment when renaming a column', async () => {
    store.seedTable('sales', [{ amt: '5' }])
    await metadata.setMetadata('sales', { column_comments: { amt: 'USD' } })
    await catalog.renameColumn('sales', 'amt', 'amount')

    expect(await catalog.getSchema('sales')).toEqual([{ name: 'amount', type: 'VARCHAR', nullable: true, default: null }])
    expect((await metadata.getRecord('sales'))?.column_comments).toEqual({ amount: 'USD' })
    await expect(catalog.renameColumn('sales', 'missing', 'x')).rejects.toThrow('Binder Error')
  })

  it('prunes metadata of tables that no longer exist', async () => {
    store.seedTable('kept', [{ a: '1' }])
    await metadata.putRecord({ table_name: 'kept', display_name: 'Kept', comment: null, column_comments: {}, updated_at: 't' })
    await metadata.putRecord({ table_name: 'gone', display_name: 'Gone', comment: null, column_comments: {}, updated_at: 't' })

    expect(await catalog.pruneOrphanMetadata()).toEqual(['gone'])
    expect((await records.list()).map((r) => r.table_name)).toEqual(['kept'])
  })
})
