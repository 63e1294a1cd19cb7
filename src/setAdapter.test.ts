import { describe, test, expect } from "vitest";
import { SetAdapter, quoteSetIdentifier } from "./setAdapter";
import { SqlAdapter } from "./sqlAdapter";
import { createIR, createSchema } from "./model";
import { ParseError, UnknownConstraintError, UnknownTypeError, UnsupportedConstructError } from "./errors";

const adapter = new SetAdapter();
const sql = new SqlAdapter();

const ordersDdl = `CREATE TABLE orders (
  id INTEGER PRIMARY KEY,
  customer_id INTEGER NOT NULL REFERENCES customers (id) ON DELETE CASCADE,
  status VARCHAR(20) DEFAULT 'new',
  placed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);
COMMENT ON TABLE orders IS 'Customer orders';
COMMENT ON COLUMN orders.status IS 'Lifecycle state';
CREATE INDEX orders_customer_idx ON orders (customer_id);`;

const ordersSet = `relation orders {
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
note orders.status = "Lifecycle state"`;

describe("quoteSetIdentifier", () => {
	test("quotes keywords and irregular names", () => {
		expect(quoteSetIdentifier("orders")).toBe("orders");
		expect(quoteSetIdentifier("note")).toBe("`note`");
		expect(quoteSetIdentifier("unit price")).toBe("`unit price`");
		expect(quoteSetIdentifier("a`b")).toBe("`a``b`");
		expect(quoteSetIdentifier("orders", "always")).toBe("`orders`");
	});
});

describe("SetAdapter.generate", () => {
	test("writes the heading followed by its facts", () => {
		expect(adapter.generate(sql.parse(ordersDdl))).toBe(ordersSet);
	});

	test("writes alterations as extend, assert, retract and project", () => {
		const ir = sql.parse(`
			CREATE TABLE t (id INTEGER PRIMARY KEY);
			ALTER TABLE t ADD COLUMN memo TEXT NOT NULL DEFAULT 'n/a';
			ALTER TABLE t ADD CONSTRAINT t_memo_key UNIQUE (memo);
			ALTER TABLE t ALTER COLUMN memo DROP DEFAULT;
			ALTER TABLE t DROP CONSTRAINT t_memo_key;
			ALTER TABLE t DROP COLUMN memo;
		`);

		const text = adapter.generate(ir);
		expect(text).toBe(`relation t {
  id ∈ Int
}
key t = {id}
extend t with memo ∈ Text total default "n/a"
assert unique t as t_memo_key = {memo}
retract default t.memo
retract constraint t.t_memo_key
project t without memo`);
		expect(adapter.parse(text).operations).toEqual(ir.operations);
	});

	test("quotes attribute names that are keywords", () => {
		const ir = createIR(
			createSchema(
				"notes",
				[
					{ name: "id", type: { base: "integer", params: [] }, nullable: false },
					{ name: "key", type: { base: "text", params: [] }, nullable: true },
					{ name: "note", type: { base: "text", params: [] }, nullable: true },
				],
				{ primaryKey: { columns: ["id"] } }
			)
		);

		const text = adapter.generate(ir);
		expect(text).toBe("relation notes {\n  id ∈ Int\n  `key` ∈ Text\n  `note` ∈ Text\n}\nkey notes = {id}");
		expect(adapter.parse(text).schema).toEqual(ir.schema);
	});

	test("honours the formatting options", () => {
		const ir = sql.parse("CREATE TABLE t (a INTEGER);");
		expect(adapter.generate(ir, { quoteIdentifiers: "always", indent: "\t" })).toBe("relation `t` {\n\t`a` ∈ Int\n}");
	});

	test("has no spelling for a random UUID default", () => {
		const ir = createIR(
			createSchema("t", [
				{ name: "id", type: { base: "uuid", params: [] }, nullable: false, default: { kind: "token", token: "random-uuid" } },
			])
		);
		expect(() => adapter.generate(ir)).toThrow("default token random-uuid cannot be translated from IR to Set");
	});

	test("refuses lineage", () => {
		const ir = sql.parse("CREATE TABLE t (a INTEGER);");
		expect(() => adapter.generate({ ...ir, lineage: [{ from: "s", to: "t" }] })).toThrow(UnsupportedConstructError);
	});
});

describe("SetAdapter.parse", () => {
	test("reads back what it writes", () => {
		expect(adapter.parse(ordersSet).schema).toEqual(sql.parse(ordersDdl).schema);
	});

	test("reads named constraints and referential actions", () => {
		const ir = adapter.parse(`
			-- who belongs to which group
			relation memberships {
				user_id ∈ Int,
				group_id ∈ Int,
				role ∈ Text
			}
			key memberships as memberships_pk = {user_id, group_id}
			total memberships = {role}
			unique memberships as role_per_group = {group_id, role}
			refs memberships as member_user {user_id} ⊆ users {id} on delete set-null on update restrict
			default memberships.role = "member"
			index unique memberships as by_group = {group_id, user_id}
		`);

		expect(ir.schema).toEqual(
			createSchema(
				"memberships",
				[
					{ name: "user_id", type: { base: "integer", params: [] }, nullable: false },
					{ name: "group_id", type: { base: "integer", params: [] }, nullable: false },
					{
						name: "role",
						type: { base: "text", params: [] },
						nullable: false,
						default: { kind: "literal", literal: { kind: "string", value: "member" } },
					},
				],
				{
					primaryKey: { name: "memberships_pk", columns: ["user_id", "group_id"] },
					uniques: [{ name: "role_per_group", columns: ["group_id", "role"] }],
					foreignKeys: [
						{
							name: "member_user",
							columns: ["user_id"],
							referencedTable: "users",
							referencedColumns: ["id"],
							onDelete: "set-null",
							onUpdate: "restrict",
						},
					],
					indexes: [{ name: "by_group", columns: ["group_id", "user_id"], unique: true }],
				}
			)
		);
	});

	test("reads every kind of retraction and assertion", () => {
		const ir = adapter.parse(`
			relation t {
				a ∈ Int
			}
			assert total t = {a}
			assert default t.a = -5
			retract total t.a
			retract default t.a
		`);

		expect(ir.operations).toEqual([
			{ kind: "create" },
			{ kind: "add-constraint", constraint: { kind: "not-null", column: "a" } },
			{ kind: "add-constraint", constraint: { kind: "default", column: "a", value: { kind: "literal", literal: { kind: "number", text: "-5" } } } },
			{ kind: "drop-constraint", ref: { kind: "not-null", column: "a" } },
			{ kind: "drop-constraint", ref: { kind: "default", column: "a" } },
		]);
	});

	test("rejects queries", () => {
		try {
			adapter.parse('σ[status = "new"](orders)');
			expect.unreachable();
		} catch (e) {
			expect(e).toBeInstanceOf(UnsupportedConstructError);
			if (e instanceof UnsupportedConstructError) {
				expect(e.fragment).toBe('σ[status = "new"](orders)');
			}
		}
	});

	test("rejects check clauses as unsupported", () => {
		try {
			adapter.parse("relation p {\n  price ∈ Int check\n}");
			expect.unreachable();
		} catch (e) {
			expect(e).toBeInstanceOf(UnsupportedConstructError);
			if (e instanceof UnsupportedConstructError) {
				expect(e.fragment).toBe("check");
				expect(e.span?.line).toBe(2);
			}
		}
	});

	test("rejects unknown domains", () => {
		try {
			adapter.parse("relation p {\n  amount ∈ Money\n}");
			expect.unreachable();
		} catch (e) {
			expect(e).toBeInstanceOf(UnknownTypeError);
			if (e instanceof UnknownTypeError) {
				expect(e.token).toBe("Money");
				expect(e.span).toEqual({ offset: 24, line: 2, column: 12, length: 5 });
			}
		}
	});

	test("rejects unknown referential actions", () => {
		expect(() => adapter.parse("relation t {\n  a ∈ Int\n}\nrefs t {a} ⊆ u {b} on delete explode")).toThrow(
			UnknownConstraintError
		);
	});

	test("requires facts before alterations", () => {
		try {
			adapter.parse("relation t {\n  a ∈ Int\n}\nproject t without a\ntotal t = {a}");
			expect.unreachable();
		} catch (e) {
			expect(e).toBeInstanceOf(ParseError);
			if (e instanceof ParseError) {
				expect(e.detail).toBe("Constraint facts must precede alterations; state later ones with assert");
				expect(e.span.line).toBe(5);
			}
		}
	});

	test("rejects duplicate attributes and notes on unknown ones", () => {
		expect(() => adapter.parse("relation t {\n  a ∈ Int\n  a ∈ Text\n}")).toThrow('Set: Duplicate attribute "a" at 3:3');
		expect(() => adapter.parse('relation t {\n  a ∈ Int\n}\nnote t.zz = "x"')).toThrow('Set: Unknown column "zz" at 4:1');
	});
});
