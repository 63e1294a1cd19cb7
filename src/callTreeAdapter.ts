import Ajv, { type ErrorObject, type SchemaObject } from "ajv";
import type { Catalog } from "./catalog";
import { defaultCatalog } from "./catalog";
import type {
	CanonicalIR,
	ColumnDef,
	ConstraintDef,
	ConstraintKind,
	ConstraintRef,
	ForeignKeyDef,
	LogicalType,
	OperationDef,
	ReferentialAction,
	SchemaDefinition,
} from "./model";
import { constraintOrder, defaultIndexName } from "./model";
import {
	ParseError,
	UnknownConstraintError,
	UnknownTypeError,
	UnsupportedConstructError,
	type SourceSpan,
} from "./errors";
import { tokenize, TokenStream, type Token } from "./lexer";
import { formatSqlDefault, parseSqlDefault } from "./literals";
import { IRBuilder } from "./irBuilder";
import { assertExpressible, checkpoint, type FormatOptions, type RepresentationAdapter } from "./adapter";

const REPR = "FunctionalCall";

// === Call tree ===

export type PlainValue = string | number | boolean | null | PlainValue[] | { [key: string]: PlainValue };

export interface ColumnArgs {
	name: string;
	type: string;
	not_null?: boolean;
	unique?: boolean;
	default?: string;
	description?: string;
}

export interface UniqueArgs {
	name?: string;
	columns: string | string[];
}

export interface ForeignKeyArgs {
	name?: string;
	columns: string | string[];
	ref_table: string;
	ref_columns: string | string[];
	on_delete?: string;
	on_update?: string;
}

export interface IndexArgs {
	name?: string;
	columns: string | string[];
	unique?: boolean;
}

/** Arguments of `create_table(...)`. */
export interface CreateTableArgs {
	target_table: string;
	description?: string;
	column_defs: ColumnArgs[];
	primary_key?: string | string[];
	primary_key_name?: string;
	unique_constraints?: UniqueArgs[];
	foreign_keys?: ForeignKeyArgs[];
	indexes?: IndexArgs[];
}

export interface AlterationCall {
	readonly call: string;
	readonly args: { [key: string]: PlainValue };
	readonly span: SourceSpan;
}

export interface FunctionalProgram {
	readonly create: CreateTableArgs;
	readonly alterations: readonly AlterationCall[];
}

/** Argument keys that carry a constraint. The catalog decides how each one is written. */
const constraintArguments: Record<ConstraintKind, string> = {
	"primary-key": "primary_key",
	"not-null": "not_null",
	"unique": "unique",
	"foreign-key": "foreign_keys",
	"default": "default",
};

const nestedCallees = new Set(["column", "unique", "foreign_key", "index"]);

const stringOrList = { anyOf: [{ type: "string" }, { type: "array", items: { type: "string" }, minItems: 1 }] };

const columnSchema = {
	type: "object",
	properties: {
		name: { type: "string" },
		type: { type: "string" },
		not_null: { type: "boolean" },
		unique: { type: "boolean" },
		default: { type: "string" },
		description: { type: "string" },
	},
	required: ["name", "type"],
	additionalProperties: false,
};

const uniqueSchema = {
	type: "object",
	properties: { name: { type: "string" }, columns: stringOrList },
	required: ["columns"],
	additionalProperties: false,
};

const foreignKeySchema = {
	type: "object",
	properties: {
		name: { type: "string" },
		columns: stringOrList,
		ref_table: { type: "string" },
		ref_columns: stringOrList,
		on_delete: { type: "string" },
		on_update: { type: "string" },
	},
	required: ["columns", "ref_table", "ref_columns"],
	additionalProperties: false,
};

const indexSchema = {
	type: "object",
	properties: { name: { type: "string" }, columns: stringOrList, unique: { type: "boolean" } },
	required: ["columns"],
	additionalProperties: false,
};

const createTableSchema = {
	type: "object",
	properties: {
		target_table: { type: "string" },
		description: { type: "string" },
		column_defs: { type: "array", items: columnSchema, minItems: 1 },
		primary_key: stringOrList,
		primary_key_name: { type: "string" },
		unique_constraints: { type: "array", items: uniqueSchema },
		foreign_keys: { type: "array", items: foreignKeySchema },
		indexes: { type: "array", items: indexSchema },
	},
	required: ["target_table", "column_defs"],
	additionalProperties: false,
};

const alterationSchemas: Record<string, SchemaObject> = {
	add_column: {
		type: "object",
		properties: { table: { type: "string" }, column: columnSchema },
		required: ["table", "column"],
		additionalProperties: false,
	},
	drop_column: {
		type: "object",
		properties: { table: { type: "string" }, column: { type: "string" } },
		required: ["table", "column"],
		additionalProperties: false,
	},
	add_constraint: {
		type: "object",
		properties: {
			table: { type: "string" },
			name: { type: "string" },
			column: { type: "string" },
			primary_key: stringOrList,
			unique: stringOrList,
			foreign_key: foreignKeySchema,
			not_null: { type: "string" },
			default: { type: "string" },
		},
		required: ["table"],
		minProperties: 2,
		maxProperties: 3,
		additionalProperties: false,
	},
	drop_constraint: {
		type: "object",
		properties: {
			table: { type: "string" },
			name: { type: "string" },
			not_null: { type: "string" },
			default: { type: "string" },
		},
		required: ["table"],
		minProperties: 2,
		maxProperties: 2,
		additionalProperties: false,
	},
};

const ajv = new Ajv({ strict: false });
const validateCreateTable = ajv.compile<CreateTableArgs>(createTableSchema);
const validateAlteration = new Map(
	Object.entries(alterationSchemas).map(([call, schema]) => [call, ajv.compile(schema)])
);

/** Argument keys each call accepts, for telling unknown keys from known-but-unsupported ones. */
const knownKeys: Record<string, readonly string[]> = {
	create_table: Object.keys(createTableSchema.properties),
	column: Object.keys(columnSchema.properties),
	unique: Object.keys(uniqueSchema.properties),
	foreign_key: Object.keys(foreignKeySchema.properties),
	index: Object.keys(indexSchema.properties),
	add_column: ["table", "column"],
	drop_column: ["table", "column"],
	add_constraint: ["table", "name", "column", "primary_key", "unique", "foreign_key", "not_null", "default"],
	drop_constraint: ["table", "name", "not_null", "default"],
};

interface DecodedCall {
	readonly callee: string;
	readonly args: { [key: string]: PlainValue };
	readonly span: SourceSpan;
}

/**
 * Reads call syntax into plain values, recording the source span of every value by JSON pointer.
 */
class CallTreeReader {
	readonly spans = new Map<string, SourceSpan>();
	private readonly _argumentKeys = new Map<string, string>();
	private readonly _respelled = new Set<string>();

	constructor(
		private readonly _stream: TokenStream,
		private readonly _catalog: Catalog
	) {
		for (const kind of constraintOrder) {
			const spelling = _catalog.constraintKeyword(kind, REPR);
			this._argumentKeys.set(spelling, constraintArguments[kind]);
			if (spelling !== constraintArguments[kind]) this._respelled.add(constraintArguments[kind]);
		}
	}

	readProgram(): DecodedCall[] {
		const s = this._stream;
		const calls: DecodedCall[] = [];
		let index = 0;
		while (!s.atEnd) {
			if (s.acceptSymbol(";")) continue;
			const start = s.peek();
			const callee = s.expectIdentifier("function name");
			if (callee !== "create_table" && !alterationSchemas[callee]) {
				throw new UnsupportedConstructError(`${callee}(...)`, REPR, "IR", start.span);
			}
			const args = this._readArgs(callee, `/${index}`);
			calls.push({ callee, args, span: start.span });
			index++;
		}
		return calls;
	}

	private _readArgs(callee: string, path: string): { [key: string]: PlainValue } {
		const s = this._stream;
		s.expectSymbol("(");
		const args: { [key: string]: PlainValue } = {};
		while (!s.isSymbol(")")) {
			const keyToken = s.peek();
			const written = s.expectIdentifier("argument name");
			const key = this._argumentKeys.get(written) ?? written;
			if (!(knownKeys[callee] ?? []).includes(key) || (key === written && this._respelled.has(key))) {
				this._rejectKey(written, keyToken);
			}
			if (key in args) {
				throw new ParseError(REPR, `Duplicate argument "${key}"`, keyToken.span);
			}
			s.expectSymbol("=");
			args[key] = this._readValue(`${path}/${key}`);
			if (!s.acceptSymbol(",")) break;
		}
		s.expectSymbol(")");
		return args;
	}

	private _rejectKey(key: string, token: Token): never {
		if (this._catalog.isUnsupportedConstruct(key, REPR)) {
			const s = this._stream;
			s.expectSymbol("=");
			this._readValue(`/unsupported/${key}`);
			throw new UnsupportedConstructError(s.textSince(token), REPR, "IR", token.span);
		}
		throw new UnknownConstraintError(key, REPR, token.span);
	}

	private _readValue(path: string): PlainValue {
		const s = this._stream;
		const token = s.peek();
		this.spans.set(path, token.span);

		switch (token.kind) {
			case "string":
				s.next();
				return token.value;
			case "number":
				s.next();
				return Number(token.value);
			case "symbol":
				if (s.acceptSymbol("-")) {
					const number = s.next();
					if (number.kind !== "number") throw s.error("Expected a number", number);
					return -Number(number.value);
				}
				if (s.acceptSymbol("[")) {
					return this._readItems("]", path);
				}
				throw s.error("Expected a value");
			case "word": {
				const upper = token.value.toUpperCase();
				if (upper === "TRUE" || upper === "FALSE") {
					s.next();
					return upper === "TRUE";
				}
				if (upper === "NULL") {
					s.next();
					return null;
				}
				s.next();
				if (!s.isSymbol("(")) throw s.error("Expected a call");
				if (token.value === "list") {
					s.next();
					return this._readItems(")", path);
				}
				if (!nestedCallees.has(token.value)) {
					if (this._catalog.isUnsupportedConstruct(token.value, REPR)) {
						this._readArgs(token.value, path);
						throw new UnsupportedConstructError(s.textSince(token), REPR, "IR", token.span);
					}
					throw new UnknownConstraintError(token.value, REPR, token.span);
				}
				return this._readArgs(token.value, path);
			}
			default:
				throw s.error("Expected a value");
		}
	}

	private _readItems(close: string, path: string): PlainValue[] {
		const s = this._stream;
		const items: PlainValue[] = [];
		while (!s.isSymbol(close)) {
			items.push(this._readValue(`${path}/${items.length}`));
			if (!s.acceptSymbol(",")) break;
		}
		s.expectSymbol(close);
		return items;
	}
}

interface DecodedProgram {
	readonly program: FunctionalProgram;
	readonly spans: ReadonlyMap<string, SourceSpan>;
	readonly end: SourceSpan;
}

function schemaError(errors: ErrorObject[] | null | undefined, basePath: string, spans: ReadonlyMap<string, SourceSpan>, fallback: SourceSpan): ParseError {
	const error = errors?.[0];
	const pointer = `${basePath}${error?.instancePath ?? ""}`;
	const where = error?.instancePath ? error.instancePath.slice(1).replace(/\//g, ".") : "arguments";
	const span = spans.get(pointer) ?? fallback;
	return new ParseError(REPR, `${where} ${error?.message ?? "is invalid"}`, span);
}

function decode(text: string, catalog: Catalog): DecodedProgram {
	const tokens = tokenize(text, REPR, { stringQuote: '"', stringEscape: "backslash", lineComment: "#" });
	const stream = new TokenStream(tokens, REPR, text);
	const reader = new CallTreeReader(stream, catalog);
	const calls = reader.readProgram();
	const spans = reader.spans;
	const end = stream.peek().span;

	const [first, ...rest] = calls;
	if (!first || first.callee !== "create_table") {
		throw new ParseError(REPR, "Expected create_table(...) as the first call", first?.span ?? end);
	}
	if (!validateCreateTable(first.args)) {
		throw schemaError(validateCreateTable.errors, "/0", spans, first.span);
	}
	const alterations = rest.map((call, i) => {
		const validate = validateAlteration.get(call.callee);
		if (call.callee === "create_table" || !validate) {
			throw new ParseError(REPR, "Only one create_table(...) per document is supported", call.span);
		}
		if (!validate(call.args)) {
			throw schemaError(validate.errors, `/${i + 1}`, spans, call.span);
		}
		return { call: call.callee, args: call.args, span: call.span };
	});
	return { program: { create: first.args, alterations }, spans, end };
}

/**
 * Decode call-tree text into its plain argument structure without resolving types.
 * @throws ParseError when the calls do not have the expected shape
 */
export function decodeCallTree(text: string, catalog: Catalog = defaultCatalog): FunctionalProgram {
	return decode(text, catalog).program;
}

function asList(value: string | string[]): string[] {
	return typeof value === "string" ? [value] : value;
}

function stringArg(args: { [key: string]: PlainValue }, key: string): string | undefined {
	const value = args[key];
	return typeof value === "string" ? value : undefined;
}

function listArg(args: { [key: string]: PlainValue }, key: string): string[] | undefined {
	const value = args[key];
	if (typeof value === "string") return [value];
	if (Array.isArray(value) && value.every((v): v is string => typeof v === "string")) return value;
	return undefined;
}

/**
 * FunctionalCall representation: a call tree mirroring a create-table generator function.
 */
export class CallTreeAdapter implements RepresentationAdapter {
	readonly representation = REPR;

	constructor(private readonly _catalog: Catalog = defaultCatalog) { }

	parse(text: string): CanonicalIR {
		const { program, spans, end } = decode(text, this._catalog);
		const create = program.create;
		const builder = new IRBuilder(REPR);
		const spanOf = (path: string) => spans.get(path);

		builder.setName(create.target_table, spanOf("/0/target_table") ?? end);
		if (create.description !== undefined) builder.setDescription(create.description);

		create.column_defs.forEach((column, i) => {
			builder.addColumn(this._column(column, `/0/column_defs/${i}`, spanOf));
			if (column.unique) builder.addUnique({ columns: [column.name] });
		});

		if (create.primary_key !== undefined) {
			builder.setPrimaryKey(
				{ name: create.primary_key_name, columns: asList(create.primary_key) },
				spanOf("/0/primary_key") ?? end
			);
		}
		for (const unique of create.unique_constraints ?? []) {
			builder.addUnique({ name: unique.name, columns: asList(unique.columns) });
		}
		(create.foreign_keys ?? []).forEach((fk, i) => {
			builder.addForeignKey(this._foreignKey(fk, `/0/foreign_keys/${i}`, spanOf));
		});
		for (const index of create.indexes ?? []) {
			const columns = asList(index.columns);
			builder.addIndex({
				name: index.name ?? defaultIndexName(create.target_table, columns),
				columns,
				unique: index.unique ?? false,
			});
		}

		program.alterations.forEach((alteration, i) => {
			const table = stringArg(alteration.args, "table");
			if (table !== undefined) builder.checkTable(table, alteration.span);
			for (const operation of this._alteration(alteration, `/${i + 1}`, spanOf)) {
				builder.addOperation(operation);
			}
		});

		return builder.build(end);
	}

	private _column(args: ColumnArgs, path: string, spanOf: (path: string) => SourceSpan | undefined): ColumnDef {
		return {
			name: args.name,
			type: this._type(args.type, spanOf(`${path}/type`)),
			nullable: !args.not_null,
			default: args.default === undefined
				? undefined
				: parseSqlDefault(args.default, REPR, this._catalog, spanOf(`${path}/default`)),
			description: args.description,
		};
	}

	private _type(spelling: string, span: SourceSpan | undefined): LogicalType {
		try {
			return this._catalog.resolveType(spelling, REPR);
		} catch (e) {
			if (e instanceof UnknownTypeError) throw new UnknownTypeError(e.token, REPR, span);
			throw e;
		}
	}

	private _action(spelling: string | undefined, span: SourceSpan | undefined): ReferentialAction | undefined {
		if (spelling === undefined) return undefined;
		const action = this._catalog.resolveReferentialAction(spelling, REPR);
		if (!action) throw new UnknownConstraintError(spelling, REPR, span);
		return action;
	}

	private _foreignKey(args: ForeignKeyArgs, path: string, spanOf: (path: string) => SourceSpan | undefined): ForeignKeyDef {
		return {
			name: args.name,
			columns: asList(args.columns),
			referencedTable: args.ref_table,
			referencedColumns: asList(args.ref_columns),
			onDelete: this._action(args.on_delete, spanOf(`${path}/on_delete`)),
			onUpdate: this._action(args.on_update, spanOf(`${path}/on_update`)),
		};
	}

	private _alteration(
		alteration: AlterationCall,
		path: string,
		spanOf: (path: string) => SourceSpan | undefined
	): OperationDef[] {
		const args = alteration.args;
		switch (alteration.call) {
			case "add_column": {
				const column = args["column"];
				if (typeof column !== "object" || column === null || Array.isArray(column)) break;
				const columnArgs = {
					name: stringArg(column, "name") ?? "",
					type: stringArg(column, "type") ?? "",
					not_null: column["not_null"] === true,
					unique: column["unique"] === true,
					default: stringArg(column, "default"),
					description: stringArg(column, "description"),
				};
				const operations: OperationDef[] = [{ kind: "add-column", column: this._column(columnArgs, `${path}/column`, spanOf) }];
				if (columnArgs.unique) {
					operations.push({ kind: "add-constraint", constraint: { kind: "unique", columns: [columnArgs.name] } });
				}
				return operations;
			}
			case "drop_column":
				return [{ kind: "drop-column", column: stringArg(args, "column") ?? "" }];
			case "add_constraint":
				return [{ kind: "add-constraint", constraint: this._constraint(args, path, spanOf, alteration.span) }];
			case "drop_constraint":
				return [{ kind: "drop-constraint", ref: this._constraintRef(args, alteration.span) }];
		}
		throw new ParseError(REPR, `Malformed ${alteration.call}(...)`, alteration.span);
	}

	private _constraint(
		args: { [key: string]: PlainValue },
		path: string,
		spanOf: (path: string) => SourceSpan | undefined,
		span: SourceSpan
	): ConstraintDef {
		const name = stringArg(args, "name");
		const column = stringArg(args, "column");
		const primaryKey = listArg(args, "primary_key");
		const unique = listArg(args, "unique");
		const notNull = stringArg(args, "not_null");
		const defaultValue = stringArg(args, "default");
		const fk = args["foreign_key"];

		if (primaryKey && column === undefined) return { kind: "primary-key", name, columns: primaryKey };
		if (unique && column === undefined) return { kind: "unique", name, columns: unique };
		if (notNull !== undefined && name === undefined && column === undefined) return { kind: "not-null", column: notNull };
		if (defaultValue !== undefined && column !== undefined && name === undefined) {
			return {
				kind: "default",
				column,
				value: parseSqlDefault(defaultValue, REPR, this._catalog, spanOf(`${path}/default`)),
			};
		}
		if (typeof fk === "object" && fk !== null && !Array.isArray(fk) && name === undefined && column === undefined) {
			const columns = listArg(fk, "columns");
			const refTable = stringArg(fk, "ref_table");
			const refColumns = listArg(fk, "ref_columns");
			if (columns && refTable !== undefined && refColumns) {
				return {
					kind: "foreign-key",
					...this._foreignKey(
						{
							name: stringArg(fk, "name"),
							columns,
							ref_table: refTable,
							ref_columns: refColumns,
							on_delete: stringArg(fk, "on_delete"),
							on_update: stringArg(fk, "on_update"),
						},
						`${path}/foreign_key`,
						spanOf
					),
				};
			}
		}
		throw new ParseError(REPR, "add_constraint(...) needs exactly one constraint", span);
	}

	private _constraintRef(args: { [key: string]: PlainValue }, span: SourceSpan): ConstraintRef {
		const name = stringArg(args, "name");
		if (name !== undefined) return { kind: "named", name };
		const notNull = stringArg(args, "not_null");
		if (notNull !== undefined) return { kind: "not-null", column: notNull };
		const column = stringArg(args, "default");
		if (column !== undefined) return { kind: "default", column };
		const notNullKey = this._catalog.constraintKeyword("not-null", REPR);
		const defaultKey = this._catalog.constraintKeyword("default", REPR);
		throw new ParseError(REPR, `drop_constraint(...) needs a name, ${notNullKey} or ${defaultKey} argument`, span);
	}

	generate(ir: CanonicalIR, options: FormatOptions = {}): string {
		assertExpressible(ir, REPR, this._catalog);
		const generator = new CallTreeGenerator(this._catalog, options);
		return generator.generate(ir);
	}
}

// === Generation ===

type Arg = readonly [string, string];

class CallTreeGenerator {
	private readonly _indent: string;

	constructor(
		private readonly _catalog: Catalog,
		private readonly _options: FormatOptions
	) {
		this._indent = _options.indent ?? "  ";
	}

	generate(ir: CanonicalIR): string {
		const calls = [this._createTable(ir.schema)];
		for (const operation of ir.operations) {
			checkpoint(this._options.signal, "generation");
			const call = this._operation(ir.schema.name, operation);
			if (call) calls.push(call);
		}
		return calls.join("\n");
	}

	private _keyword(kind: ConstraintKind): string {
		return this._catalog.constraintKeyword(kind, REPR);
	}

	private _call(callee: string, args: readonly Arg[]): string {
		return `${callee}(${args.map(([k, v]) => `${k} = ${v}`).join(", ")})`;
	}

	private _string(value: string): string {
		return JSON.stringify(value);
	}

	private _list(values: readonly string[]): string {
		return `[${values.map(v => this._string(v)).join(", ")}]`;
	}

	private _block(items: readonly string[], depth: number): string {
		const inner = this._indent.repeat(depth + 1);
		return `[\n${items.map(i => inner + i).join(",\n")}\n${this._indent.repeat(depth)}]`;
	}

	private _createTable(schema: SchemaDefinition): string {
		const inlineUniques = new Map<string, number>();
		schema.uniques.forEach((u, i) => {
			if (u.name === undefined && u.columns.length === 1 && !inlineUniques.has(u.columns[0])) {
				inlineUniques.set(u.columns[0], i);
			}
		});
		const pk = schema.primaryKey;
		const pkColumns = new Set(pk?.columns ?? []);

		const args: Arg[] = [["target_table", this._string(schema.name)]];
		if (schema.description !== undefined) args.push(["description", this._string(schema.description)]);

		const columns = schema.columns.map(column => this._column(column, pkColumns.has(column.name), inlineUniques.has(column.name)));
		args.push(["column_defs", this._block(columns, 1)]);

		if (pk) {
			args.push([this._keyword("primary-key"), pk.columns.length === 1 ? this._string(pk.columns[0]) : this._list(pk.columns)]);
			if (pk.name !== undefined) args.push(["primary_key_name", this._string(pk.name)]);
		}

		const inlined = new Set(inlineUniques.values());
		const uniques = schema.uniques
			.filter((_, i) => !inlined.has(i))
			.map(u => this._call("unique", [
				["columns", this._list(u.columns)],
				...(u.name !== undefined ? [["name", this._string(u.name)] as const] : []),
			]));
		if (uniques.length > 0) args.push(["unique_constraints", this._block(uniques, 1)]);

		if (schema.foreignKeys.length > 0) {
			args.push([this._keyword("foreign-key"), this._block(schema.foreignKeys.map(fk => this._foreignKey(fk)), 1)]);
		}

		if (schema.indexes.length > 0) {
			const indexes = schema.indexes.map(index => {
				const indexArgs: Arg[] = [["columns", this._list(index.columns)]];
				if (index.unique) indexArgs.push([this._keyword("unique"), "TRUE"]);
				if (index.name !== defaultIndexName(schema.name, index.columns)) {
					indexArgs.push(["name", this._string(index.name)]);
				}
				return this._call("index", indexArgs);
			});
			args.push(["indexes", this._block(indexes, 1)]);
		}

		return `create_table(\n${args.map(([k, v]) => `${this._indent}${k} = ${v}`).join(",\n")}\n)`;
	}

	private _column(column: ColumnDef, isPrimaryKey: boolean, unique: boolean): string {
		const args: Arg[] = [
			["name", this._string(column.name)],
			["type", this._string(this._catalog.mapType(column.type, REPR))],
		];
		if (!column.nullable && !isPrimaryKey) args.push([this._keyword("not-null"), "TRUE"]);
		if (unique) args.push([this._keyword("unique"), "TRUE"]);
		if (column.default) args.push([this._keyword("default"), this._string(this._default(column))]);
		if (column.description !== undefined) args.push(["description", this._string(column.description)]);
		return this._call("column", args);
	}

	private _default(column: ColumnDef): string {
		if (!column.default) return "";
		const compatibility = this._catalog.isDefaultCompatible(column.type, column.default);
		if (!compatibility.ok) {
			throw new UnsupportedConstructError(`default on ${column.name}: ${compatibility.reason}`, "IR", REPR);
		}
		return formatSqlDefault(column.default, REPR, this._catalog, this._options.preferredSpellings);
	}

	private _foreignKey(fk: ForeignKeyDef): string {
		const args: Arg[] = [
			["columns", this._list(fk.columns)],
			["ref_table", this._string(fk.referencedTable)],
			["ref_columns", this._list(fk.referencedColumns)],
		];
		if (fk.onDelete) args.push(["on_delete", this._string(this._catalog.mapReferentialAction(fk.onDelete, REPR))]);
		if (fk.onUpdate) args.push(["on_update", this._string(this._catalog.mapReferentialAction(fk.onUpdate, REPR))]);
		if (fk.name !== undefined) args.push(["name", this._string(fk.name)]);
		return this._call("foreign_key", args);
	}

	private _operation(table: string, operation: OperationDef): string | undefined {
		const tableArg: Arg = ["table", this._string(table)];
		switch (operation.kind) {
			case "create":
				return undefined;
			case "add-column":
				return this._call("add_column", [tableArg, ["column", this._column(operation.column, false, false)]]);
			case "drop-column":
				return this._call("drop_column", [tableArg, ["column", this._string(operation.column)]]);
			case "add-constraint":
				return this._call("add_constraint", [tableArg, ...this._constraintArgs(operation.constraint)]);
			case "drop-constraint":
				return this._call("drop_constraint", [tableArg, this._refArg(operation.ref)]);
		}
	}

	private _constraintArgs(constraint: ConstraintDef): Arg[] {
		const named = (name: string | undefined): Arg[] => (name !== undefined ? [["name", this._string(name)]] : []);
		switch (constraint.kind) {
			case "primary-key":
				return [[this._keyword("primary-key"), this._list(constraint.columns)], ...named(constraint.name)];
			case "unique":
				return [[this._keyword("unique"), this._list(constraint.columns)], ...named(constraint.name)];
			case "foreign-key":
				return [["foreign_key", this._foreignKey(constraint)]];
			case "not-null":
				return [[this._keyword("not-null"), this._string(constraint.column)]];
			case "default":
				return [
					["column", this._string(constraint.column)],
					[this._keyword("default"), this._string(formatSqlDefault(constraint.value, REPR, this._catalog, this._options.preferredSpellings))],
				];
		}
	}

	private _refArg(ref: ConstraintRef): Arg {
		switch (ref.kind) {
			case "named":
				return ["name", this._string(ref.name)];
			case "not-null":
				return [this._keyword("not-null"), this._string(ref.column)];
			case "default":
				return [this._keyword("default"), this._string(ref.column)];
		}
	}
}
