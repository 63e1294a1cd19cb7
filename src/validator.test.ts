import { describe, test, expect } from "vitest";
import { validateIR } from "./validator";
import { createIR, createSchema, type ColumnDef, type OperationDef, type SchemaDefinition } from "./model";
import { InvalidSchemaError, type SchemaIssue } from "./errors";

const integer = { base: "integer", params: [] } as const;
const text = { base: "text", params: [] } as const;

function column(name: string, type: ColumnDef["type"] = integer, extra: Partial<ColumnDef> = {}): ColumnDef {
	return { name, type, nullable: true, ...extra };
}

const customers = createSchema("customers", [column("id"), column("email", text)], { primaryKey: { columns: ["id"] } });

const orders = createSchema("orders", [column("id"), column("customer_id", integer, { nullable: false })], {
	primaryKey: { columns: ["id"] },
	foreignKeys: [{ columns: ["customer_id"], referencedTable: "customers", referencedColumns: ["id"], onDelete: "cascade" }],
});

/** Runs the validator and returns the issues it threw with. */
function errorsOf(schema: SchemaDefinition, operations: OperationDef[] = [], referencedSchemas?: SchemaDefinition[]): SchemaIssue[] {
	try {
		validateIR(createIR(schema, operations), { referencedSchemas });
	} catch (e) {
		if (e instanceof InvalidSchemaError) return [...e.issues];
		throw e;
	}
	throw new Error("expected the schema to be rejected");
}

describe("validateIR", () => {
	test("accepts a consistent schema", () => {
		expect(validateIR(createIR(orders), { referencedSchemas: [customers] })).toEqual([]);
	});

	test("warns about references it cannot check", () => {
		expect(validateIR(createIR(orders))).toEqual([
			{ severity: "warning", path: "foreignKeys[0]", message: 'unverified external reference to "customers"' },
		]);
	});

	test("checks self references against the table itself", () => {
		const employees = createSchema("employees", [column("id"), column("manager_id")], {
			primaryKey: { columns: ["id"] },
			foreignKeys: [{ columns: ["manager_id"], referencedTable: "employees", referencedColumns: ["id"] }],
		});
		expect(validateIR(createIR(employees))).toEqual([]);
	});

	test("reports every error at once", () => {
		const schema = createSchema("t", [column("a"), column("a", text)], { primaryKey: { columns: ["x"] } });
		expect(errorsOf(schema)).toEqual([
			{ severity: "error", path: "columns[1]", message: 'duplicate column "a"' },
			{ severity: "error", path: "primaryKey", message: 'unknown column "x"' },
		]);
		expect(() => validateIR(createIR(schema))).toThrow(
			'Invalid schema: columns[1]: duplicate column "a"; primaryKey: unknown column "x"'
		);
	});

	test("rejects a table without columns", () => {
		expect(errorsOf(createSchema("t", []))).toEqual([{ severity: "error", path: "columns", message: "table has no columns" }]);
	});

	test("rejects defaults the column type cannot hold", () => {
		const schema = createSchema("t", [column("a", integer, { default: { kind: "literal", literal: { kind: "string", value: "x" } } })]);
		expect(errorsOf(schema)).toEqual([
			{ severity: "error", path: "columns.a.default", message: "string literal cannot default a integer column" },
		]);
	});

	test("checks foreign key arity and targets", () => {
		const fk = (referencedColumns: string[]) =>
			createSchema("orders", [column("id"), column("customer_ref", text)], {
				foreignKeys: [{ columns: ["customer_ref"], referencedTable: "customers", referencedColumns }],
			});

		expect(errorsOf(fk(["id", "email"]), [], [customers])).toEqual([
			{ severity: "error", path: "foreignKeys[0]", message: "1 columns reference 2 columns" },
		]);
		expect(errorsOf(fk(["zip"]), [], [customers])).toEqual([
			{ severity: "error", path: "foreignKeys[0]", message: '"customers" has no column "zip"' },
		]);
		expect(errorsOf(fk(["email"]), [], [customers])).toEqual([
			{ severity: "error", path: "foreignKeys[0]", message: '(email) is neither primary nor unique in "customers"' },
		]);

		const indexed = createSchema("customers", customers.columns, {
			primaryKey: customers.primaryKey,
			indexes: [{ name: "customers_email_idx", columns: ["email"], unique: true }],
		});
		expect(validateIR(createIR(fk(["email"])), { referencedSchemas: [indexed] })).toEqual([]);
	});

	test("warns about an index that repeats the primary key", () => {
		const schema = createSchema("t", [column("id")], {
			primaryKey: { columns: ["id"] },
			indexes: [{ name: "t_id_idx", columns: ["id"], unique: false }],
		});
		expect(validateIR(createIR(schema))).toEqual([
			{ severity: "warning", path: "indexes[0]", message: 'index "t_id_idx" duplicates the primary key' },
		]);
	});

	test("rejects duplicate constraint names", () => {
		const schema = createSchema("t", [column("a"), column("b")], {
			uniques: [
				{ name: "k", columns: ["a"] },
				{ name: "k", columns: ["b"] },
			],
		});
		expect(errorsOf(schema)).toEqual([{ severity: "error", path: "constraints", message: 'duplicate constraint name "k"' }]);
	});
});

describe("validateIR operations", () => {
	const table = createSchema("t", [column("id"), column("a")], { primaryKey: { columns: ["id"] } });

	test("tracks the primary key through alterations", () => {
		expect(
			errorsOf(table, [{ kind: "add-constraint", constraint: { kind: "primary-key", columns: ["a"] } }])
		).toEqual([
			{ severity: "error", path: "operations[1]", message: "table already has a primary key" },
			{ severity: "error", path: "operations[1]", message: 'constraint "t_pkey" already exists' },
		]);

		expect(
			validateIR(
				createIR(table, [
					{ kind: "drop-constraint", ref: { kind: "named", name: "t_pkey" } },
					{ kind: "add-constraint", constraint: { kind: "primary-key", columns: ["a"] } },
				])
			)
		).toEqual([]);
	});

	test("rejects references to dropped or missing things", () => {
		expect(
			errorsOf(table, [
				{ kind: "drop-column", column: "a" },
				{ kind: "add-constraint", constraint: { kind: "not-null", column: "a" } },
				{ kind: "drop-constraint", ref: { kind: "named", name: "nope" } },
				{ kind: "add-column", column: column("id") },
				{ kind: "drop-constraint", ref: { kind: "default", column: "zz" } },
			])
		).toEqual([
			{ severity: "error", path: "operations[2]", message: 'unknown column "a"' },
			{ severity: "error", path: "operations[3]", message: 'unknown constraint "nope"' },
			{ severity: "error", path: "operations[4]", message: 'column "id" already exists' },
			{ severity: "error", path: "operations[5]", message: "unknown column in default(zz)" },
		]);
	});

	test("checks defaults added later", () => {
		expect(
			errorsOf(table, [
				{
					kind: "add-constraint",
					constraint: { kind: "default", column: "a", value: { kind: "token", token: "current-timestamp" } },
				},
			])
		).toEqual([
			{ severity: "error", path: "operations[1].constraint.value", message: "current-timestamp cannot default a integer column" },
		]);
	});

	test("requires create to come first and only once", () => {
		const issues = errorsOf(table, [{ kind: "create" }]);
		expect(issues).toEqual([{ severity: "error", path: "operations[1]", message: "create may only be the first operation" }]);
	});
});
