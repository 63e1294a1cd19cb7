import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { PGlite } from '@electric-sql/pglite';
import { extractTable, listTables, normalizeDefault } from './schemaExtractor';
import { SqlAdapter } from './sqlAdapter';
import { SetAdapter } from './setAdapter';
import { compareIR } from './roundTrip';
import { UnsupportedConstructError } from './errors';

const ordersDdl = `CREATE TABLE orders (
  id INTEGER PRIMARY KEY,
  customer_id INTEGER NOT NULL REFERENCES customers (id) ON DELETE CASCADE,
  status VARCHAR(20) DEFAULT 'new',
  placed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);
COMMENT ON TABLE orders IS 'Customer orders';
COMMENT ON COLUMN orders.status IS 'Lifecycle state';
CREATE INDEX orders_customer_idx ON orders (customer_id);`;

describe('extractTable', () => {
  let db: PGlite;

  beforeEach(async () => {
    db = new PGlite();
    await db.exec('CREATE TABLE customers (id INTEGER PRIMARY KEY, email TEXT NOT NULL UNIQUE);');
  });

  afterEach(async () => {
    await db.close();
  });

  test('reads what the DDL declared', async () => {
    await db.exec(ordersDdl);

    const ir = await extractTable(db, 'orders');

    expect(compareIR(new SqlAdapter().parse(ordersDdl), ir)).toEqual([]);
    expect(new SqlAdapter().generate(ir)).toBe(ordersDdl);
  });

  test('leaves derived constraint names out and keeps chosen ones', async () => {
    await db.exec(`
      CREATE TABLE memberships (
        user_id INTEGER,
        customer_id INTEGER,
        role TEXT NOT NULL DEFAULT 'member',
        CONSTRAINT memberships_pk PRIMARY KEY (user_id, customer_id),
        CONSTRAINT role_per_customer UNIQUE (customer_id, role),
        FOREIGN KEY (customer_id) REFERENCES customers (id) ON UPDATE RESTRICT ON DELETE SET NULL
      );
    `);

    const { schema } = await extractTable(db, 'memberships');

    expect(schema.primaryKey).toEqual({ name: 'memberships_pk', columns: ['user_id', 'customer_id'] });
    expect(schema.uniques).toEqual([{ name: 'role_per_customer', columns: ['customer_id', 'role'] }]);
    expect(schema.foreignKeys).toEqual([
      {
        name: undefined,
        columns: ['customer_id'],
        referencedTable: 'customers',
        referencedColumns: ['id'],
        onDelete: 'set-null',
        onUpdate: 'restrict',
      },
    ]);
    expect(schema.columns.map(c => [c.name, c.nullable])).toEqual([
      ['user_id', false],
      ['customer_id', false],
      ['role', false],
    ]);
    expect(schema.columns[2].default).toEqual({ kind: 'literal', literal: { kind: 'string', value: 'member' } });
    expect(schema.indexes).toEqual([]);
  });

  test('renders an extracted table in another representation', async () => {
    await db.exec(ordersDdl);

    const ir = await extractTable(db, 'orders');

    expect(new SetAdapter().generate(ir)).toBe(`relation orders {
  id ∈ Int
  customer_id ∈ Int
  status ∈ VarChar[20]
  placed_at ∈ Timestamp
}
key orders = {id}
total orders = {customer_id}
refs orders {customer_id} ⊆ customers {id} on delete cascade
default orders.status = "new"
default orders.placed_at = now
index orders as orders_customer_idx = {customer_id}
note orders = "Customer orders"
note orders.status = "Lifecycle state"`);
  });

  test('refuses CHECK constraints', async () => {
    await db.exec('CREATE TABLE products (id INTEGER PRIMARY KEY, price DECIMAL(10,2) CHECK (price > 0));');

    await expect(extractTable(db, 'products')).rejects.toThrow(UnsupportedConstructError);
  });

  test('keeps mixed-case and keyword names through generated DDL', async () => {
    const sql = new SqlAdapter();
    await db.exec(sql.generate(sql.parse('CREATE TABLE t ("createdAt" INTEGER, "limit" TEXT, "exclude" TEXT);')));

    const { schema } = await extractTable(db, 't');

    expect(schema.columns.map(c => c.name)).toEqual(['createdAt', 'limit', 'exclude']);
  });

  test('refuses indexes beyond plain column lists', async () => {
    await db.exec('CREATE TABLE t (a INTEGER, b INTEGER);');

    await db.exec('CREATE INDEX t_b_hash ON t USING hash (b);');
    await expect(extractTable(db, 't')).rejects.toThrow(
      'CREATE INDEX t_b_hash ON public.t USING hash (b) cannot be translated from DeclarativeQuery to IR'
    );

    await db.exec('DROP INDEX t_b_hash; CREATE INDEX t_a_pos ON t (a) WHERE a > 0;');
    await expect(extractTable(db, 't')).rejects.toThrow(UnsupportedConstructError);

    await db.exec('DROP INDEX t_a_pos; CREATE INDEX t_sum ON t ((a + b));');
    await expect(extractTable(db, 't')).rejects.toThrow(UnsupportedConstructError);

    await db.exec('DROP INDEX t_sum; CREATE INDEX t_a_desc ON t (a DESC);');
    await expect(extractTable(db, 't')).rejects.toThrow(UnsupportedConstructError);

    await db.exec('DROP INDEX t_a_desc; CREATE INDEX t_a ON t (a);');
    expect((await extractTable(db, 't')).schema.indexes).toEqual([{ name: 't_a', columns: ['a'], unique: false }]);
  });

  test('fails on a missing table', async () => {
    await expect(extractTable(db, 'missing')).rejects.toThrow('Table "public.missing" not found');
  });
});

describe('listTables', () => {
  test('lists base tables by name', async () => {
    const db = new PGlite();
    try {
      await db.exec(`
        CREATE TABLE zebra (id INTEGER);
        CREATE TABLE apple (id INTEGER);
        CREATE VIEW apple_view AS SELECT * FROM apple;
      `);
      expect(await listTables(db)).toEqual(['apple', 'zebra']);
    } finally {
      await db.close();
    }
  });
});

describe('normalizeDefault', () => {
  const varchar = { base: 'varchar', params: [20] } as const;
  const integer = { base: 'integer', params: [] } as const;

  test('strips the casts PostgreSQL adds', () => {
    expect(normalizeDefault("'new'::character varying", varchar)).toEqual({
      kind: 'literal',
      literal: { kind: 'string', value: 'new' },
    });
    expect(normalizeDefault("'-1'::integer", integer)).toEqual({ kind: 'literal', literal: { kind: 'number', text: '-1' } });
  });

  test('maps function defaults to tokens', () => {
    expect(normalizeDefault('now()', { base: 'timestamp', params: [] })).toEqual({ kind: 'token', token: 'current-timestamp' });
    expect(normalizeDefault('CURRENT_TIMESTAMP', { base: 'timestamp', params: [] })).toEqual({
      kind: 'token',
      token: 'current-timestamp',
    });
  });

  test('refuses sequences', () => {
    expect(() => normalizeDefault("nextval('t_id_seq'::regclass)", integer)).toThrow(
      "DEFAULT nextval('t_id_seq'::regclass) cannot be translated from DeclarativeQuery to IR"
    );
  });
});
