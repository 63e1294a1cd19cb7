import { describe, test, expect } from "vitest";
import { Translator, createAdapters } from "./translator";
import { SetAdapter } from "./setAdapter";
import type { FormatOptions, RepresentationAdapter } from "./adapter";
import type { CanonicalIR, RepresentationTag } from "./model";
import {
	AmbiguousMappingError,
	InvalidSchemaError,
	InvariantViolationError,
	ParseError,
	TranslationCancelledError,
	UnknownTypeError,
	UnsupportedConstructError,
} from "./errors";

const translator = new Translator();

const usersDdl = `CREATE TABLE users (
  id INTEGER PRIMARY KEY,
  email VARCHAR(255) NOT NULL UNIQUE,
  created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);`;

const usersCalls = `create_table(
  target_table = "users",
  column_defs = [
    column(name = "id", type = "INTEGER"),
    column(name = "email", type = "VARCHAR(255)", not_null = TRUE, unique = TRUE),
    column(name = "created_at", type = "TIMESTAMP", default = "CURRENT_TIMESTAMP")
  ],
  primary_key = "id"
)`;

const ordersDdl = `CREATE TABLE orders (
  id INTEGER PRIMARY KEY,
  customer_id INTEGER NOT NULL REFERENCES customers (id) ON DELETE CASCADE,
  status VARCHAR(20) DEFAULT 'new',
  placed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);
COMMENT ON TABLE orders IS 'Customer orders';
COMMENT ON COLUMN orders.status IS 'Lifecycle state';
CREATE INDEX orders_customer_idx ON orders (customer_id);`;

/** Forgets the table description when reading, as a broken adapter would. */
class ForgetfulSetAdapter implements RepresentationAdapter {
	readonly representation = "Set";
	private readonly _inner = new SetAdapter();

	parse(text: string): CanonicalIR {
		const ir = this._inner.parse(text);
		return { ...ir, schema: { ...ir.schema, description: undefined } };
	}

	generate(ir: CanonicalIR, options?: FormatOptions): string {
		return this._inner.generate(ir, options);
	}
}

/** Writes set notation it cannot read back. */
class WriteOnlySetAdapter implements RepresentationAdapter {
	readonly representation = "Set";
	private readonly _inner = new SetAdapter();

	parse(): CanonicalIR {
		throw new ParseError("Set", "Expected relation, found end of input", { offset: 0, line: 1, column: 1, length: 0 });
	}

	generate(ir: CanonicalIR, options?: FormatOptions): string {
		return this._inner.generate(ir, options);
	}
}

describe("Translator", () => {
	test("translates DDL into a call tree", () => {
		expect(translator.translate("DeclarativeQuery", usersDdl, "FunctionalCall").text).toBe(usersCalls);
	});

	test("translates a call tree back into the same DDL", () => {
		const result = translator.translate("FunctionalCall", usersCalls, "DeclarativeQuery");
		expect(result.text).toBe(usersDdl);
		expect(result.warnings).toEqual([]);
	});

	test("fails closed on CHECK constraints", () => {
		expect(() =>
			translator.translate(
				"DeclarativeQuery",
				"CREATE TABLE products (id INTEGER PRIMARY KEY, price DECIMAL(10,2) CHECK (price > 0));",
				"Set"
			)
		).toThrow(UnsupportedConstructError);
	});

	test("names the unknown type", () => {
		expect(() => translator.translate("DeclarativeQuery", "CREATE TABLE p (amount MONEY);", "Graph")).toThrow(
			new UnknownTypeError("MONEY", "DeclarativeQuery", { offset: 23, line: 1, column: 24, length: 5 })
		);
	});

	test("produces the same text every time", () => {
		const first = translator.translate("DeclarativeQuery", ordersDdl, "Set").text;
		const second = new Translator().translate("DeclarativeQuery", ordersDdl, "Set").text;
		expect(second).toBe(first);
	});

	test("survives a trip through every representation", () => {
		const chain: RepresentationTag[] = ["Graph", "Set", "FunctionalCall", "DeclarativeQuery"];
		let source: RepresentationTag = "DeclarativeQuery";
		let text = ordersDdl;
		for (const target of chain) {
			text = translator.translate(source, text, target).text;
			source = target;
		}
		expect(text).toBe(ordersDdl);
	});

	test("returns the canonical form on self-translation", () => {
		const messy = "create table users (id int primary key, email character varying(255) not null unique, created_at timestamp default now());";
		expect(translator.translate("DeclarativeQuery", messy, "DeclarativeQuery").text).toBe(usersDdl);
	});

	test("needs a preferred spelling where the target offers several", () => {
		const ddl = "CREATE TABLE sessions (id UUID DEFAULT gen_random_uuid() PRIMARY KEY);";
		expect(() => translator.translate("DeclarativeQuery", ddl, "DeclarativeQuery")).toThrow(AmbiguousMappingError);

		const result = translator.translate("DeclarativeQuery", ddl, "DeclarativeQuery", {
			preferredSpellings: { "random-uuid": "uuid_generate_v4()" },
		});
		expect(result.text).toBe("CREATE TABLE sessions (\n  id UUID PRIMARY KEY DEFAULT uuid_generate_v4()\n);");
		expect(translator.translate("DeclarativeQuery", ddl, "Graph").text).toContain('uuid id PK "default random_uuid"');
	});

	test("refuses a token the target cannot spell", () => {
		expect(() =>
			translator.translate("DeclarativeQuery", "CREATE TABLE sessions (id UUID DEFAULT gen_random_uuid());", "Set")
		).toThrow("default token random-uuid cannot be translated from IR to Set");
	});

	test("validates before generating", () => {
		expect(() => translator.translate("DeclarativeQuery", "CREATE TABLE t (a INTEGER DEFAULT 'x');", "Set")).toThrow(
			new InvalidSchemaError([{ severity: "error", path: "columns.a.default", message: "string literal cannot default a integer column" }])
		);
	});

	test("checks foreign keys against referenced schemas", () => {
		const unchecked = translator.translate("DeclarativeQuery", ordersDdl, "DeclarativeQuery");
		expect(unchecked.warnings).toEqual([
			{ severity: "warning", path: "foreignKeys[0]", message: 'unverified external reference to "customers"' },
		]);

		const customers = translator.parse("DeclarativeQuery", "CREATE TABLE customers (id INTEGER PRIMARY KEY);").schema;
		const checked = translator.translate("DeclarativeQuery", ordersDdl, "DeclarativeQuery", { referencedSchemas: [customers] });
		expect(checked.warnings).toEqual([]);

		const keyless = translator.parse("DeclarativeQuery", "CREATE TABLE customers (id INTEGER);").schema;
		expect(() =>
			translator.translate("DeclarativeQuery", ordersDdl, "DeclarativeQuery", { referencedSchemas: [keyless] })
		).toThrow('(id) is neither primary nor unique in "customers"');
	});

	test("stops when cancelled", () => {
		const controller = new AbortController();
		controller.abort();
		expect(() => translator.translate("DeclarativeQuery", usersDdl, "Set", { signal: controller.signal })).toThrow(
			new TranslationCancelledError("parse")
		);
	});

	test("reports meaning lost on the way back", () => {
		const forgetful = new Translator({ ...createAdapters(), Set: new ForgetfulSetAdapter() });
		try {
			forgetful.translate("DeclarativeQuery", ordersDdl, "Set");
			expect.unreachable();
		} catch (e) {
			expect(e).toBeInstanceOf(InvariantViolationError);
			if (e instanceof InvariantViolationError) {
				expect(e.violations).toEqual([
					{ category: "Metadata", path: "description", expected: "Customer orders", actual: "-" },
				]);
				expect(e.categories).toEqual(["Metadata"]);
				expect(e.text).toBe(translator.translate("DeclarativeQuery", ordersDdl, "Set").text);
			}
		}
	});

	test("keeps the text when its own output does not read back", () => {
		const writeOnly = new Translator({ ...createAdapters(), Set: new WriteOnlySetAdapter() });
		try {
			writeOnly.translate("DeclarativeQuery", ordersDdl, "Set");
			expect.unreachable();
		} catch (e) {
			expect(e).toBeInstanceOf(InvariantViolationError);
			if (e instanceof InvariantViolationError) {
				expect(e.violations).toEqual([
					{
						category: "Cardinality",
						path: "schema",
						expected: "text readable as Set",
						actual: "Set: Expected relation, found end of input at 1:1",
					},
				]);
				expect(e.text).toBe(translator.translate("DeclarativeQuery", ordersDdl, "Set").text);
			}
		}
	});

	test("skips the check in Fast mode", () => {
		const forgetful = new Translator({ ...createAdapters(), Set: new ForgetfulSetAdapter() });
		const result = forgetful.translate("DeclarativeQuery", ordersDdl, "Set", { mode: "Fast" });
		expect(result.text).toContain('note orders = "Customer orders"');
	});
});
