import type { Catalog } from "./catalog";
import { defaultCatalog } from "./catalog";
import type {
	CanonicalIR,
	ColumnDef,
	ConstraintDef,
	ConstraintKind,
	ConstraintRef,
	DefaultExpr,
	ForeignKeyDef,
	LogicalType,
	OperationDef,
	ReferentialAction,
	SchemaDefinition,
} from "./model";
import { constraintOrder } from "./model";
import {
	ParseError,
	UnknownConstraintError,
	UnknownTypeError,
	UnsupportedConstructError,
} from "./errors";
import { tokenize, TokenStream, type Token } from "./lexer";
import { IRBuilder } from "./irBuilder";
import { assertExpressible, checkpoint, type FormatOptions, type RepresentationAdapter } from "./adapter";

const REPR = "Set";

const MEMBER = "∈";
const SUBSET = "⊆";

const statementKeywords = new Set([
	"relation", "key", "total", "unique", "refs", "default", "index", "note", "extend", "project", "assert", "retract",
]);

const keywords = new Set([
	"relation", "key", "total", "unique", "refs", "default", "index", "note", "extend", "with",
	"project", "without", "assert", "retract", "constraint", "as", "on", "delete", "update",
	"true", "false", "null",
]);

export function quoteSetIdentifier(name: string, mode: "always" | "needed" = "needed"): string {
	if (mode === "needed" && /^[A-Za-z_][A-Za-z0-9_]*$/.test(name) && !keywords.has(name.toLowerCase())) {
		return name;
	}
	return `\`${name.replace(/`/g, "``")}\``;
}

/**
 * Set representation: a relation heading with its dependencies stated as set facts.
 *
 * ```
 * relation orders {
 *   id ∈ Int
 *   customer_id ∈ Int
 * }
 * key orders = {id}
 * total orders = {customer_id}
 * refs orders {customer_id} ⊆ customers {id} on delete cascade
 * ```
 */
export class SetAdapter implements RepresentationAdapter {
	readonly representation = REPR;

	constructor(private readonly _catalog: Catalog = defaultCatalog) { }

	parse(text: string): CanonicalIR {
		const tokens = tokenize(text, REPR, {
			stringQuote: '"',
			stringEscape: "backslash",
			identifierQuote: "`",
			lineComment: "--",
		});
		return new SetParser(new TokenStream(tokens, REPR, text), text, this._catalog).parse();
	}

	generate(ir: CanonicalIR, options: FormatOptions = {}): string {
		assertExpressible(ir, REPR, this._catalog);
		return new SetGenerator(this._catalog, options).generate(ir);
	}
}

class SetParser {
	private readonly _builder = new IRBuilder(REPR);

	constructor(
		private readonly _stream: TokenStream,
		private readonly _text: string,
		private readonly _catalog: Catalog
	) { }

	private _keyword(kind: ConstraintKind): string {
		return this._catalog.constraintKeyword(kind, REPR);
	}

	parse(): CanonicalIR {
		const s = this._stream;
		while (!s.atEnd) {
			if (s.acceptSymbol(";")) continue;
			this._statement();
		}
		return this._builder.build(s.peek().span);
	}

	private _statement(): void {
		const s = this._stream;
		const start = s.peek();
		const b = this._builder;

		if (s.acceptWord("relation")) {
			this._relation(start);
		} else if (s.acceptWord("extend")) {
			const table = this._table();
			s.expectWord("with");
			const column = this._columnDeclaration();
			let nullable = true;
			let defaultValue: DefaultExpr | undefined;
			let description: string | undefined;
			// clauses share the extend line
			for (let clause = s.peek(); clause.kind === "word" && clause.span.line === start.span.line; clause = s.peek()) {
				if (s.isWord(this._keyword("not-null")) && !s.isSymbol("=", 2)) {
					s.next();
					nullable = false;
				} else if (s.isWord(this._keyword("default")) && !s.isSymbol(".", 2)) {
					s.next();
					defaultValue = this._value();
				} else if (s.isWord("note") && s.peek(1).kind === "string") {
					s.next();
					description = s.expectString();
				} else if (statementKeywords.has(clause.value.toLowerCase())) {
					break;
				} else {
					this._rejectClause(clause);
				}
			}
			b.checkTable(table, start.span);
			b.addOperation({ kind: "add-column", column: { ...column, nullable, default: defaultValue, description } });
		} else if (s.acceptWord("project")) {
			const table = this._table();
			s.expectWord("without");
			const column = s.expectIdentifier("column name");
			b.checkTable(table, start.span);
			b.addOperation({ kind: "drop-column", column });
		} else if (s.acceptWord("assert")) {
			const constraintStart = s.peek();
			const { table, constraints } = this._constraint(constraintStart);
			b.checkTable(table, start.span);
			constraints.forEach(constraint => b.addOperation({ kind: "add-constraint", constraint }));
		} else if (s.acceptWord("retract")) {
			const { table, ref } = this._constraintRef();
			b.checkTable(table, start.span);
			b.addOperation({ kind: "drop-constraint", ref });
		} else if (s.acceptWord("index")) {
			const unique = s.acceptWord("unique");
			const table = this._table();
			s.expectWord("as");
			const name = s.expectIdentifier("index name");
			s.expectSymbol("=");
			const columns = this._columnSet();
			b.checkTable(table, start.span);
			b.addIndex({ name, columns, unique });
		} else if (s.acceptWord("note")) {
			const table = this._table();
			const column = s.acceptSymbol(".") ? s.expectIdentifier("column name") : undefined;
			s.expectSymbol("=");
			const note = s.expectString();
			b.checkTable(table, start.span);
			if (column === undefined) {
				b.setDescription(note);
			} else if (!b.describeColumn(column, note)) {
				throw new ParseError(REPR, `Unknown column "${column}"`, start.span);
			}
		} else if (constraintOrder.some(kind => s.isWord(this._keyword(kind)))) {
			const { table, constraints } = this._constraint(start);
			b.checkTable(table, start.span);
			if (b.hasAlterations) {
				throw new ParseError(REPR, "Constraint facts must precede alterations; state later ones with assert", start.span);
			}
			constraints.forEach(constraint => this._applyToSchema(constraint, start));
		} else {
			// Anything else (σ, π, ⋈, select ...) is a query, not a definition
			throw new UnsupportedConstructError(this._lineFrom(start), REPR, "IR", start.span);
		}
	}

	private _lineFrom(start: Token): string {
		const end = this._text.indexOf("\n", start.span.offset);
		return this._text.slice(start.span.offset, end === -1 ? undefined : end).trim();
	}

	private _rejectClause(token: Token): never {
		if (token.kind === "word" && this._catalog.isUnsupportedConstruct(token.value, REPR)) {
			throw new UnsupportedConstructError(this._lineFrom(token), REPR, "IR", token.span);
		}
		if (token.kind === "eof") {
			throw this._stream.error("Expected a clause");
		}
		throw new UnknownConstraintError(token.value, REPR, token.span);
	}

	private _table(): string {
		return this._stream.expectIdentifier("relation name");
	}

	private _relation(start: Token): void {
		const s = this._stream;
		const b = this._builder;
		b.setName(this._table(), start.span);
		s.expectSymbol("{");
		while (!s.isSymbol("}")) {
			const columnToken = s.peek();
			const column = this._columnDeclaration();
			if (b.hasColumn(column.name)) {
				throw new ParseError(REPR, `Duplicate attribute "${column.name}"`, columnToken.span);
			}
			b.addColumn(column);
			const next = s.peek();
			if (next.span.line === columnToken.span.line && next.kind !== "symbol") {
				this._rejectClause(next);
			}
			if (!s.acceptSymbol(",") && !s.isSymbol("}") && next.kind === "symbol") {
				this._rejectClause(next);
			}
		}
		s.expectSymbol("}");
	}

	private _columnDeclaration(): ColumnDef {
		const s = this._stream;
		const name = s.expectIdentifier("attribute name");
		s.expectSymbol(MEMBER);
		return { name, type: this._type(), nullable: true };
	}

	private _type(): LogicalType {
		const s = this._stream;
		const start = s.peek();
		if (start.kind !== "word") {
			throw s.error("Expected a domain");
		}
		s.next();
		let spelling = start.value;
		if (s.acceptSymbol("[")) {
			const params: string[] = [];
			do {
				const param = s.next();
				if (param.kind !== "number") throw s.error("Expected a number", param);
				params.push(param.value);
			} while (s.acceptSymbol(","));
			s.expectSymbol("]");
			spelling += `[${params.join(",")}]`;
		}
		try {
			return this._catalog.resolveType(spelling, REPR);
		} catch (e) {
			if (e instanceof UnknownTypeError) {
				throw new UnknownTypeError(spelling, REPR, { ...start.span, length: spelling.length });
			}
			throw e;
		}
	}

	private _columnSet(): string[] {
		const s = this._stream;
		s.expectSymbol("{");
		const columns: string[] = [];
		while (!s.isSymbol("}")) {
			columns.push(s.expectIdentifier("attribute name"));
			if (!s.acceptSymbol(",")) break;
		}
		s.expectSymbol("}");
		if (columns.length === 0) {
			throw s.error("Expected at least one attribute");
		}
		return columns;
	}

	private _name(): string | undefined {
		return this._stream.acceptWord("as") ? this._stream.expectIdentifier("constraint name") : undefined;
	}

	private _constraint(start: Token): { table: string; constraints: ConstraintDef[] } {
		const s = this._stream;
		if (s.acceptWord(this._keyword("primary-key"))) {
			const table = this._table();
			const name = this._name();
			s.expectSymbol("=");
			return { table, constraints: [{ kind: "primary-key", name, columns: this._columnSet() }] };
		}
		if (s.acceptWord(this._keyword("not-null"))) {
			const table = this._table();
			s.expectSymbol("=");
			return { table, constraints: this._columnSet().map(column => ({ kind: "not-null", column })) };
		}
		if (s.acceptWord(this._keyword("unique"))) {
			const table = this._table();
			const name = this._name();
			s.expectSymbol("=");
			return { table, constraints: [{ kind: "unique", name, columns: this._columnSet() }] };
		}
		if (s.acceptWord(this._keyword("foreign-key"))) {
			const table = this._table();
			const fk = this._foreignKey();
			return { table, constraints: [{ kind: "foreign-key", ...fk }] };
		}
		if (s.acceptWord(this._keyword("default"))) {
			const table = this._table();
			s.expectSymbol(".");
			const column = s.expectIdentifier("attribute name");
			s.expectSymbol("=");
			return { table, constraints: [{ kind: "default", column, value: this._value() }] };
		}
		return this._rejectClause(start);
	}

	private _foreignKey(): ForeignKeyDef {
		const s = this._stream;
		const name = this._name();
		const columns = this._columnSet();
		s.expectSymbol(SUBSET);
		const referencedTable = s.expectIdentifier("relation name");
		const referencedColumns = this._columnSet();
		let onDelete: ReferentialAction | undefined;
		let onUpdate: ReferentialAction | undefined;
		while (s.isWord("on")) {
			if (s.acceptWord("on", "delete")) onDelete = this._action();
			else if (s.acceptWord("on", "update")) onUpdate = this._action();
			else throw s.error("Expected on delete or on update");
		}
		return { name, columns, referencedTable, referencedColumns, onDelete, onUpdate };
	}

	private _action(): ReferentialAction {
		const s = this._stream;
		const start = s.peek();
		let spelling = s.expectIdentifier("referential action");
		while (s.isSymbol("-") && s.peek(1).kind === "word") {
			s.next();
			spelling += `-${s.next().value}`;
		}
		const action = this._catalog.resolveReferentialAction(spelling, REPR);
		if (!action) {
			throw new UnknownConstraintError(spelling, REPR, start.span);
		}
		return action;
	}

	private _value(): DefaultExpr {
		const s = this._stream;
		const token = s.peek();
		if (token.kind === "string") {
			s.next();
			return { kind: "literal", literal: { kind: "string", value: token.value } };
		}
		const negative = s.acceptSymbol("-");
		const next = s.peek();
		if (next.kind === "number") {
			s.next();
			return { kind: "literal", literal: { kind: "number", text: negative ? `-${next.value}` : next.value } };
		}
		if (negative || next.kind !== "word") {
			throw s.error("Expected a default value", next);
		}
		s.next();
		const word = next.value;
		if (word === "true" || word === "false") {
			return { kind: "literal", literal: { kind: "boolean", value: word === "true" } };
		}
		if (word === "null") {
			return { kind: "literal", literal: { kind: "null" } };
		}
		const defaultToken = this._catalog.resolveDefaultToken(word, REPR);
		if (!defaultToken) {
			throw new UnsupportedConstructError(`default ${word}`, REPR, "IR", next.span);
		}
		return { kind: "token", token: defaultToken };
	}

	private _constraintRef(): { table: string; ref: ConstraintRef } {
		const s = this._stream;
		const start = s.peek();
		const kind = s.acceptWord("constraint")
			? "named"
			: s.acceptWord(this._keyword("not-null"))
				? "not-null"
				: s.acceptWord(this._keyword("default")) ? "default" : undefined;
		if (kind === undefined) {
			return this._rejectClause(start);
		}
		const table = this._table();
		s.expectSymbol(".");
		const target = s.expectIdentifier(kind === "named" ? "constraint name" : "attribute name");
		return {
			table,
			ref: kind === "named" ? { kind, name: target } : { kind, column: target },
		};
	}

	private _applyToSchema(constraint: ConstraintDef, start: Token): void {
		const b = this._builder;
		switch (constraint.kind) {
			case "primary-key":
				b.setPrimaryKey({ name: constraint.name, columns: constraint.columns }, start.span);
				return;
			case "unique":
				b.addUnique({ name: constraint.name, columns: constraint.columns });
				return;
			case "foreign-key": {
				const { kind: _kind, ...fk } = constraint;
				b.addForeignKey(fk);
				return;
			}
			case "not-null":
				if (!b.updateColumn(constraint.column, c => ({ ...c, nullable: false }))) {
					throw new ParseError(REPR, `Unknown attribute "${constraint.column}"`, start.span);
				}
				return;
			case "default":
				if (!b.updateColumn(constraint.column, c => ({ ...c, default: constraint.value }))) {
					throw new ParseError(REPR, `Unknown attribute "${constraint.column}"`, start.span);
				}
				return;
		}
	}
}

class SetGenerator {
	private readonly _indent: string;
	private readonly _quoting: "always" | "needed";

	constructor(
		private readonly _catalog: Catalog,
		private readonly _options: FormatOptions
	) {
		this._indent = _options.indent ?? "  ";
		this._quoting = _options.quoteIdentifiers ?? "needed";
	}

	private _keyword(kind: ConstraintKind): string {
		return this._catalog.constraintKeyword(kind, REPR);
	}

	private _id(name: string): string {
		return quoteSetIdentifier(name, this._quoting);
	}

	private _set(columns: readonly string[]): string {
		return `{${columns.map(c => this._id(c)).join(", ")}}`;
	}

	private _named(name: string | undefined): string {
		return name !== undefined ? ` as ${this._id(name)}` : "";
	}

	generate(ir: CanonicalIR): string {
		const schema = ir.schema;
		const t = this._id(schema.name);
		const lines = [
			`relation ${t} {`,
			...schema.columns.map(c => `${this._indent}${this._id(c.name)} ${MEMBER} ${this._catalog.mapType(c.type, REPR)}`),
			"}",
		];

		const pk = new Set(schema.primaryKey?.columns ?? []);
		if (schema.primaryKey) {
			lines.push(`${this._keyword("primary-key")} ${t}${this._named(schema.primaryKey.name)} = ${this._set(schema.primaryKey.columns)}`);
		}
		const total = schema.columns.filter(c => !c.nullable && !pk.has(c.name)).map(c => c.name);
		if (total.length > 0) {
			lines.push(`${this._keyword("not-null")} ${t} = ${this._set(total)}`);
		}
		for (const unique of schema.uniques) {
			lines.push(`${this._keyword("unique")} ${t}${this._named(unique.name)} = ${this._set(unique.columns)}`);
		}
		for (const fk of schema.foreignKeys) {
			lines.push(this._refs(t, fk));
		}
		for (const column of schema.columns) {
			if (column.default) lines.push(`${this._keyword("default")} ${t}.${this._id(column.name)} = ${this._default(column)}`);
		}
		for (const index of schema.indexes) {
			lines.push(`index ${index.unique ? "unique " : ""}${t} as ${this._id(index.name)} = ${this._set(index.columns)}`);
		}
		this._notes(schema, lines);

		for (const operation of ir.operations) {
			checkpoint(this._options.signal, "generation");
			const line = this._operation(t, operation);
			if (line !== undefined) lines.push(line);
		}
		return lines.join("\n");
	}

	private _notes(schema: SchemaDefinition, lines: string[]): void {
		const t = this._id(schema.name);
		if (schema.description !== undefined) {
			lines.push(`note ${t} = ${JSON.stringify(schema.description)}`);
		}
		for (const column of schema.columns) {
			if (column.description !== undefined) {
				lines.push(`note ${t}.${this._id(column.name)} = ${JSON.stringify(column.description)}`);
			}
		}
	}

	private _refs(t: string, fk: ForeignKeyDef): string {
		let line = `${this._keyword("foreign-key")} ${t}${this._named(fk.name)} ${this._set(fk.columns)} ${SUBSET} ${this._id(fk.referencedTable)} ${this._set(fk.referencedColumns)}`;
		if (fk.onDelete) line += ` on delete ${this._catalog.mapReferentialAction(fk.onDelete, REPR)}`;
		if (fk.onUpdate) line += ` on update ${this._catalog.mapReferentialAction(fk.onUpdate, REPR)}`;
		return line;
	}

	private _default(column: ColumnDef): string {
		if (!column.default) return "";
		const compatibility = this._catalog.isDefaultCompatible(column.type, column.default);
		if (!compatibility.ok) {
			throw new UnsupportedConstructError(`default on ${column.name}: ${compatibility.reason}`, "IR", REPR);
		}
		return this._value(column.default);
	}

	private _value(value: DefaultExpr): string {
		if (value.kind === "token") {
			return this._catalog.mapDefaultToken(value.token, REPR, this._options.preferredSpellings);
		}
		const literal = value.literal;
		switch (literal.kind) {
			case "string":
				return JSON.stringify(literal.value);
			case "number":
				return literal.text;
			case "boolean":
				return String(literal.value);
			case "null":
				return "null";
		}
	}

	private _operation(t: string, operation: OperationDef): string | undefined {
		switch (operation.kind) {
			case "create":
				return undefined;
			case "add-column": {
				const column = operation.column;
				let line = `extend ${t} with ${this._id(column.name)} ${MEMBER} ${this._catalog.mapType(column.type, REPR)}`;
				if (!column.nullable) line += ` ${this._keyword("not-null")}`;
				if (column.default) line += ` ${this._keyword("default")} ${this._default(column)}`;
				if (column.description !== undefined) line += ` note ${JSON.stringify(column.description)}`;
				return line;
			}
			case "drop-column":
				return `project ${t} without ${this._id(operation.column)}`;
			case "add-constraint":
				return `assert ${this._constraint(t, operation.constraint)}`;
			case "drop-constraint": {
				const ref = operation.ref;
				return ref.kind === "named"
					? `retract constraint ${t}.${this._id(ref.name)}`
					: `retract ${this._keyword(ref.kind)} ${t}.${this._id(ref.column)}`;
			}
		}
	}

	private _constraint(t: string, constraint: ConstraintDef): string {
		switch (constraint.kind) {
			case "primary-key":
				return `${this._keyword("primary-key")} ${t}${this._named(constraint.name)} = ${this._set(constraint.columns)}`;
			case "not-null":
				return `${this._keyword("not-null")} ${t} = ${this._set([constraint.column])}`;
			case "unique":
				return `${this._keyword("unique")} ${t}${this._named(constraint.name)} = ${this._set(constraint.columns)}`;
			case "foreign-key":
				return this._refs(t, constraint);
			case "default":
				return `${this._keyword("default")} ${t}.${this._id(constraint.column)} = ${this._value(constraint.value)}`;
		}
	}
}
