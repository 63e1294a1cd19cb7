import { describe, test, expect } from "vitest";
import { SqlAdapter, escapeIdentifier } from "./sqlAdapter";
import {
	ParseError,
	TranslationCancelledError,
	UnknownConstraintError,
	UnknownTypeError,
	UnsupportedConstructError,
} from "./errors";

const adapter = new SqlAdapter();

const usersDdl = `CREATE TABLE users (
  id INTEGER PRIMARY KEY,
  email VARCHAR(255) NOT NULL UNIQUE,
  created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);`;

describe("escapeIdentifier", () => {
	test("quotes always by default", () => {
		expect(escapeIdentifier("users")).toBe('"users"');
		expect(escapeIdentifier('say "hi"')).toBe('"say ""hi"""');
	});

	test("quotes only reserved or irregular names when asked", () => {
		expect(escapeIdentifier("users", "needed")).toBe("users");
		expect(escapeIdentifier("order", "needed")).toBe('"order"');
		expect(escapeIdentifier("Order Items", "needed")).toBe('"Order Items"');
	});

	test("quotes names PostgreSQL would fold or read as keywords", () => {
		expect(escapeIdentifier("createdAt", "needed")).toBe('"createdAt"');
		expect(escapeIdentifier("limit", "needed")).toBe('"limit"');
		expect(escapeIdentifier("desc", "needed")).toBe('"desc"');
		expect(escapeIdentifier("exclude", "needed")).toBe('"exclude"');
		expect(escapeIdentifier("created_at", "needed")).toBe("created_at");
	});
});

describe("SqlAdapter.parse", () => {
	test("reads columns and inline constraints", () => {
		const ir = adapter.parse(usersDdl);

		expect(ir.schema.name).toBe("users");
		expect(ir.schema.columns).toEqual([
			{ name: "id", type: { base: "integer", params: [] }, nullable: false },
			{ name: "email", type: { base: "varchar", params: [255] }, nullable: false },
			{
				name: "created_at",
				type: { base: "timestamp", params: [] },
				nullable: true,
				default: { kind: "token", token: "current-timestamp" },
			},
		]);
		expect(ir.schema.primaryKey).toEqual({ columns: ["id"] });
		expect(ir.schema.uniques).toEqual([{ columns: ["email"] }]);
		expect(ir.operations).toEqual([{ kind: "create" }]);
		expect(ir.lineage).toEqual([]);
	});

	test("reads table constraints, indexes and comments", () => {
		const ir = adapter.parse(`
			CREATE TABLE order_items (
				order_id INTEGER,
				line_no INTEGER,
				product_id INTEGER NOT NULL,
				price DECIMAL(10,2) DEFAULT 0.00,
				CONSTRAINT order_items_pk PRIMARY KEY (order_id, line_no),
				FOREIGN KEY (product_id) REFERENCES products (id) ON DELETE CASCADE ON UPDATE SET NULL
			);
			CREATE UNIQUE INDEX idx_product ON order_items (product_id, price);
			COMMENT ON TABLE order_items IS 'Line items';
			COMMENT ON COLUMN order_items.price IS 'Unit price';
		`);

		expect(ir.schema.primaryKey).toEqual({ name: "order_items_pk", columns: ["order_id", "line_no"] });
		expect(ir.schema.columns.map(c => [c.name, c.nullable])).toEqual([
			["order_id", false],
			["line_no", false],
			["product_id", false],
			["price", true],
		]);
		expect(ir.schema.columns[3].default).toEqual({ kind: "literal", literal: { kind: "number", text: "0.00" } });
		expect(ir.schema.columns[3].description).toBe("Unit price");
		expect(ir.schema.foreignKeys).toEqual([
			{
				columns: ["product_id"],
				referencedTable: "products",
				referencedColumns: ["id"],
				onDelete: "cascade",
				onUpdate: "set-null",
			},
		]);
		expect(ir.schema.indexes).toEqual([{ name: "idx_product", columns: ["product_id", "price"], unique: true }]);
		expect(ir.schema.description).toBe("Line items");
	});

	test("names an unnamed index the default way", () => {
		const ir = adapter.parse("CREATE TABLE t (a INTEGER); CREATE INDEX ON t (a);");
		expect(ir.schema.indexes).toEqual([{ name: "idx_t_a_t", columns: ["a"], unique: false }]);
	});

	test("reads alterations in order", () => {
		const ir = adapter.parse(`
			CREATE TABLE t (id INTEGER PRIMARY KEY);
			ALTER TABLE t ADD COLUMN memo TEXT NOT NULL DEFAULT 'n/a';
			ALTER TABLE t ADD CONSTRAINT t_memo_key UNIQUE (memo);
			ALTER TABLE t ALTER COLUMN memo DROP DEFAULT;
			ALTER TABLE t DROP CONSTRAINT t_memo_key;
			ALTER TABLE t DROP COLUMN memo;
		`);

		expect(ir.operations).toEqual([
			{ kind: "create" },
			{
				kind: "add-column",
				column: {
					name: "memo",
					type: { base: "text", params: [] },
					nullable: false,
					default: { kind: "literal", literal: { kind: "string", value: "n/a" } },
				},
			},
			{ kind: "add-constraint", constraint: { kind: "unique", name: "t_memo_key", columns: ["memo"] } },
			{ kind: "drop-constraint", ref: { kind: "default", column: "memo" } },
			{ kind: "drop-constraint", ref: { kind: "named", name: "t_memo_key" } },
			{ kind: "drop-column", column: "memo" },
		]);
	});

	test("reads quoted identifiers and multi-word types", () => {
		const ir = adapter.parse('CREATE TABLE "Order" ("select" TIMESTAMP WITH TIME ZONE, total DOUBLE PRECISION);');
		expect(ir.schema.name).toBe("Order");
		expect(ir.schema.columns.map(c => [c.name, c.type.base])).toEqual([
			["select", "timestamptz"],
			["total", "double"],
		]);
	});

	test("folds unquoted names to lower case", () => {
		const ir = adapter.parse('CREATE TABLE Users (CreatedAt INTEGER, "Mixed" TEXT); COMMENT ON COLUMN USERS.createdat IS \'when\';');
		expect(ir.schema.name).toBe("users");
		expect(ir.schema.columns.map(c => [c.name, c.description])).toEqual([
			["createdat", "when"],
			["Mixed", undefined],
		]);
	});

	test("rejects an index created after an alteration", () => {
		expect(() =>
			adapter.parse("CREATE TABLE t (a INTEGER); ALTER TABLE t ADD COLUMN b INTEGER; CREATE INDEX t_b_idx ON t (b);")
		).toThrow("CREATE INDEX t_b_idx ON t (b) after ALTER TABLE cannot be translated from DeclarativeQuery to IR at 1:65");
	});

	test("rejects IF NOT EXISTS on indexes as on tables", () => {
		expect(() => adapter.parse("CREATE TABLE t (a INTEGER); CREATE INDEX IF NOT EXISTS t_a_idx ON t (a);")).toThrow(
			"IF NOT EXISTS cannot be translated from DeclarativeQuery to IR at 1:42"
		);
	});

	test("rejects CHECK constraints as unsupported", () => {
		const ddl = "CREATE TABLE products (id INTEGER PRIMARY KEY, price DECIMAL(10,2) CHECK (price > 0));";
		expect(() => adapter.parse(ddl)).toThrow(UnsupportedConstructError);
		try {
			adapter.parse(ddl);
		} catch (e) {
			expect(e).toBeInstanceOf(UnsupportedConstructError);
			if (e instanceof UnsupportedConstructError) {
				expect(e.fragment).toBe("CHECK (price > 0)");
				expect(e.source).toBe("DeclarativeQuery");
			}
		}
	});

	test("rejects unknown types with the offending token", () => {
		try {
			adapter.parse("CREATE TABLE p (amount MONEY);");
			expect.unreachable();
		} catch (e) {
			expect(e).toBeInstanceOf(UnknownTypeError);
			if (e instanceof UnknownTypeError) {
				expect(e.token).toBe("MONEY");
				expect(e.span).toEqual({ offset: 23, line: 1, column: 24, length: 5 });
			}
		}
	});

	test("rejects unknown constraint words", () => {
		expect(() => adapter.parse("CREATE TABLE p (id INTEGER SPARKLY);")).toThrow(UnknownConstraintError);
	});

	test("rejects queries and other statements", () => {
		expect(() => adapter.parse("SELECT * FROM users;")).toThrow(
			"SELECT * FROM users cannot be translated from DeclarativeQuery to IR at 1:1"
		);
	});

	test("rejects IF NOT EXISTS and qualified names", () => {
		expect(() => adapter.parse("CREATE TABLE IF NOT EXISTS t (a INTEGER);")).toThrow(UnsupportedConstructError);
		expect(() => adapter.parse("CREATE TABLE public.t (a INTEGER);")).toThrow(UnsupportedConstructError);
	});

	test("reports syntax errors with a position", () => {
		try {
			adapter.parse("CREATE TABLE t (id INTEGER");
			expect.unreachable();
		} catch (e) {
			expect(e).toBeInstanceOf(ParseError);
			if (e instanceof ParseError) {
				expect(e.detail).toBe('Expected ")", found end of input');
				expect(e.span.line).toBe(1);
				expect(e.span.column).toBe(27);
			}
		}
	});

	test("rejects a second table and statements against another table", () => {
		expect(() => adapter.parse("CREATE TABLE a (x INTEGER); CREATE TABLE b (y INTEGER);")).toThrow(ParseError);
		expect(() => adapter.parse("CREATE TABLE a (x INTEGER); ALTER TABLE b DROP COLUMN y;")).toThrow(ParseError);
	});

	test("rejects a column declared both NULL and NOT NULL", () => {
		expect(() => adapter.parse("CREATE TABLE a (x INTEGER NULL NOT NULL);")).toThrow(ParseError);
	});
});

describe("SqlAdapter.generate", () => {
	test("writes canonical DDL", () => {
		expect(adapter.generate(adapter.parse(usersDdl))).toBe(usersDdl);
	});

	test("keeps named and composite constraints at table level", () => {
		const ir = adapter.parse(`
			create table order_items (
				order_id integer, line_no integer, product_id integer not null, price decimal(10,2) default 0.00,
				constraint order_items_pk primary key (order_id, line_no),
				foreign key (product_id) references products (id) on delete cascade
			);
			comment on column order_items.price is 'Unit price';
			comment on table order_items is 'Line items';
			create index idx_product on order_items (product_id);
		`);

		expect(adapter.generate(ir)).toBe(`CREATE TABLE order_items (
  order_id INTEGER,
  line_no INTEGER,
  product_id INTEGER NOT NULL REFERENCES products (id) ON DELETE CASCADE,
  price DECIMAL(10,2) DEFAULT 0.00,
  CONSTRAINT order_items_pk PRIMARY KEY (order_id, line_no)
);
COMMENT ON TABLE order_items IS 'Line items';
COMMENT ON COLUMN order_items.price IS 'Unit price';
CREATE INDEX idx_product ON order_items (product_id);`);
	});

	test("writes alterations after the table", () => {
		const ir = adapter.parse(`
			CREATE TABLE t (id INTEGER PRIMARY KEY);
			ALTER TABLE t ADD COLUMN memo TEXT NOT NULL DEFAULT 'n/a';
			ALTER TABLE t ALTER COLUMN memo DROP DEFAULT;
			ALTER TABLE t DROP COLUMN memo;
		`);

		expect(adapter.generate(ir)).toBe(`CREATE TABLE t (
  id INTEGER PRIMARY KEY
);
ALTER TABLE t ADD COLUMN memo TEXT NOT NULL DEFAULT 'n/a';
ALTER TABLE t ALTER COLUMN memo DROP DEFAULT;
ALTER TABLE t DROP COLUMN memo;`);
	});

	test("honours the formatting options", () => {
		const ir = adapter.parse('CREATE TABLE "Order" ("select" TEXT);');
		expect(adapter.generate(ir)).toBe('CREATE TABLE "Order" (\n  "select" TEXT\n);');
		expect(adapter.generate(adapter.parse(usersDdl), { quoteIdentifiers: "always", indent: "\t" })).toBe(
			'CREATE TABLE "users" (\n\t"id" INTEGER PRIMARY KEY,\n\t"email" VARCHAR(255) NOT NULL UNIQUE,\n\t"created_at" TIMESTAMP DEFAULT CURRENT_TIMESTAMP\n);'
		);
	});

	test("quotes mixed-case and keyword names", () => {
		const ir = adapter.parse('CREATE TABLE t ("createdAt" INTEGER, "limit" TEXT, "exclude" TEXT);');
		const ddl = adapter.generate(ir);
		expect(ddl).toBe('CREATE TABLE t (\n  "createdAt" INTEGER,\n  "limit" TEXT,\n  "exclude" TEXT\n);');
		expect(adapter.parse(ddl)).toEqual(ir);
	});

	test("escapes quotes in comments", () => {
		const ir = adapter.parse("CREATE TABLE t (a TEXT); COMMENT ON TABLE t IS 'it''s';");
		expect(ir.schema.description).toBe("it's");
		expect(adapter.generate(ir)).toBe("CREATE TABLE t (\n  a TEXT\n);\nCOMMENT ON TABLE t IS 'it''s';");
	});

	test("refuses lineage, which DDL cannot express", () => {
		const ir = adapter.parse("CREATE TABLE t (a TEXT);");
		expect(() => adapter.generate({ ...ir, lineage: [{ from: "s", to: "t" }] })).toThrow(
			"lineage edge s -> t cannot be translated from IR to DeclarativeQuery"
		);
	});

	test("stops on an aborted signal instead of truncating", () => {
		const controller = new AbortController();
		controller.abort();
		const ir = adapter.parse(usersDdl);
		expect(() => adapter.generate(ir, { signal: controller.signal })).toThrow(TranslationCancelledError);
	});
});
