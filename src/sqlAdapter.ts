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
import { defaultIndexName } from "./model";
import {
	ParseError,
	UnknownConstraintError,
	UnknownTypeError,
	UnsupportedConstructError,
} from "./errors";
import { tokenize, TokenStream, type Token } from "./lexer";
import { formatSqlDefault, parseSqlDefault } from "./literals";
import { IRBuilder } from "./irBuilder";
import reservedWordList from "./postgresReservedWords.json";
import { assertExpressible, checkpoint, type FormatOptions, type RepresentationAdapter } from "./adapter";

const REPR = "DeclarativeQuery";

/** PostgreSQL's reserved keywords, plus the words this parser reads as the start of a clause */
const reservedWords = new Set<string>(reservedWordList);

/** Words that end a DEFAULT expression inside a column definition. */
const columnConstraintWords = new Set([
	"CONSTRAINT", "PRIMARY", "NOT", "NULL", "UNIQUE", "REFERENCES", "DEFAULT", "CHECK", "COLLATE", "GENERATED",
]);

/**
 * Escape a PostgreSQL identifier (table or column name).
 * Doubles any embedded double-quotes to prevent SQL injection.
 */
export function escapeIdentifier(name: string, mode: "always" | "needed" = "always"): string {
	// unquoted names fold to lower case, so anything else needs quotes to survive
	if (mode === "needed" && /^[a-z_][a-z0-9_]*$/.test(name) && !reservedWords.has(name.toUpperCase())) {
		return name;
	}
	return `"${name.replace(/"/g, '""')}"`;
}

/**
 * DeclarativeQuery representation: PostgreSQL DDL.
 */
export class SqlAdapter implements RepresentationAdapter {
	readonly representation = REPR;

	constructor(private readonly _catalog: Catalog = defaultCatalog) { }

	parse(text: string): CanonicalIR {
		const tokens = tokenize(text, REPR, {
			stringQuote: "'",
			stringEscape: "double",
			identifierQuote: '"',
			lineComment: "--",
			blockComments: true,
		});
		const parser = new SqlParser(new TokenStream(tokens, REPR, text), this._catalog);
		return parser.parseDocument();
	}

	generate(ir: CanonicalIR, options: FormatOptions = {}): string {
		assertExpressible(ir, REPR, this._catalog);
		const generator = new SqlGenerator(this._catalog, options);
		return generator.generate(ir);
	}
}

// === Parsing ===

class SqlParser {
	private readonly _builder = new IRBuilder(REPR);

	constructor(
		private readonly _stream: TokenStream,
		private readonly _catalog: Catalog
	) { }

	/** Accepts the catalog's spelling of a constraint, after any words in `prefix`. */
	private _acceptKeyword(kind: ConstraintKind, ...prefix: string[]): boolean {
		return this._stream.acceptWord(...prefix, ...this._catalog.constraintKeyword(kind, REPR).split(" "));
	}

	parseDocument(): CanonicalIR {
		const s = this._stream;
		while (!s.atEnd) {
			if (s.acceptSymbol(";")) continue;
			this._parseStatement();
			if (!s.atEnd) s.expectSymbol(";");
		}
		return this._builder.build(s.peek().span);
	}

	private _parseStatement(): void {
		const s = this._stream;
		const start = s.peek();

		if (s.isWord("CREATE")) {
			if (s.isWord("TABLE", 1)) {
				s.next();
				s.next();
				this._parseCreateTable(start);
				return;
			}
			if (s.isWord("INDEX", 1) || (s.isWord("UNIQUE", 1) && s.isWord("INDEX", 2))) {
				s.next();
				this._parseCreateIndex(start);
				return;
			}
		}
		if (s.isWord("ALTER") && s.isWord("TABLE", 1)) {
			s.next();
			s.next();
			this._parseAlterTable();
			return;
		}
		if (s.isWord("COMMENT") && s.isWord("ON", 1)) {
			s.next();
			s.next();
			this._parseComment();
			return;
		}

		this._skipStatement();
		throw new UnsupportedConstructError(s.textSince(start), REPR, "IR", start.span);
	}

	private _skipStatement(): void {
		const s = this._stream;
		while (!s.atEnd && !s.isSymbol(";")) s.next();
	}

	private _parseCreateTable(start: Token): void {
		const s = this._stream;
		if (this._builder.name !== undefined) {
			throw new ParseError(REPR, "Only one CREATE TABLE per document is supported", start.span);
		}
		if (s.isWord("IF")) {
			const clause = s.peek();
			s.expectWord("IF", "NOT", "EXISTS");
			throw new UnsupportedConstructError(s.textSince(clause), REPR, "IR", clause.span);
		}

		const nameToken = s.peek();
		const name = this._parseTableName();
		this._builder.setName(name, nameToken.span);

		s.expectSymbol("(");
		do {
			if (this._isTableConstraintStart()) {
				this._parseTableConstraint(constraint => this._addConstraint(constraint));
			} else {
				this._parseColumn(column => this._builder.addColumn(column), constraint => this._addConstraint(constraint));
			}
		} while (s.acceptSymbol(","));
		s.expectSymbol(")");
	}

	private _parseTableName(): string {
		const s = this._stream;
		const token = s.peek();
		const name = this._identifier("table name");
		if (s.isSymbol(".")) {
			s.next();
			this._identifier("table name");
			throw new UnsupportedConstructError(`qualified table name ${s.textSince(token)}`, REPR, "IR", token.span);
		}
		return name;
	}

	/** Unquoted names fold to lower case, as PostgreSQL folds them. */
	private _identifier(what: string): string {
		const token = this._stream.peek();
		const name = this._stream.expectIdentifier(what);
		return token.kind === "word" ? name.replace(/[A-Z]+/g, letters => letters.toLowerCase()) : name;
	}

	private _isTableConstraintStart(): boolean {
		const s = this._stream;
		const keywords = (["primary-key", "unique", "foreign-key"] as const)
			.map(kind => this._catalog.constraintKeyword(kind, REPR).split(" ")[0]);
		return ["CONSTRAINT", ...keywords, "CHECK", "EXCLUDE"].some(k => s.isWord(k));
	}

	private _addConstraint(constraint: ConstraintDef): void {
		const b = this._builder;
		const span = this._stream.peek().span;
		switch (constraint.kind) {
			case "primary-key":
				b.setPrimaryKey({ name: constraint.name, columns: constraint.columns }, span);
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
				b.updateColumn(constraint.column, c => ({ ...c, nullable: false }));
				return;
			case "default":
				b.updateColumn(constraint.column, c => ({ ...c, default: constraint.value }));
				return;
		}
	}

	/** `[CONSTRAINT name] PRIMARY KEY (..) | UNIQUE (..) | FOREIGN KEY (..) REFERENCES ..` */
	private _parseTableConstraint(emit: (constraint: ConstraintDef) => void): void {
		const s = this._stream;
		const name = s.acceptWord("CONSTRAINT") ? this._identifier("constraint name") : undefined;
		const start = s.peek();

		if (this._acceptKeyword("primary-key")) {
			emit({ kind: "primary-key", name, columns: this._parseColumnList() });
		} else if (this._acceptKeyword("unique")) {
			emit({ kind: "unique", name, columns: this._parseColumnList() });
		} else if (this._acceptKeyword("foreign-key")) {
			const columns = this._parseColumnList();
			emit({ kind: "foreign-key", ...this._parseReferences(name, columns) });
		} else {
			this._rejectConstraint(start);
		}
	}

	private _parseColumn(emitColumn: (column: ColumnDef) => void, emit: (constraint: ConstraintDef) => void): void {
		const s = this._stream;
		const name = this._identifier("column name");
		const type = this._parseType();

		let nullable = true;
		let explicitNull = false;
		let defaultValue: ColumnDef["default"];
		const pending: ConstraintDef[] = [];

		while (!s.isSymbol(",") && !s.isSymbol(")") && !s.isSymbol(";") && !s.atEnd) {
			const constraintName = s.acceptWord("CONSTRAINT") ? this._identifier("constraint name") : undefined;
			const start = s.peek();

			if (this._acceptKeyword("primary-key")) {
				pending.push({ kind: "primary-key", name: constraintName, columns: [name] });
			} else if (this._acceptKeyword("not-null")) {
				if (explicitNull) throw new ParseError(REPR, `Column "${name}" is declared both NULL and NOT NULL`, start.span);
				nullable = false;
			} else if (s.acceptWord("NULL")) {
				if (!nullable) throw new ParseError(REPR, `Column "${name}" is declared both NULL and NOT NULL`, start.span);
				explicitNull = true;
			} else if (this._acceptKeyword("unique")) {
				pending.push({ kind: "unique", name: constraintName, columns: [name] });
			} else if (s.acceptWord("REFERENCES")) {
				pending.push({ kind: "foreign-key", ...this._parseReferences(constraintName, [name], true) });
			} else if (this._acceptKeyword("default")) {
				defaultValue = this._parseDefault();
			} else {
				this._rejectConstraint(start);
			}
		}

		emitColumn({ name, type, nullable, default: defaultValue });
		for (const constraint of pending) {
			emit(constraint);
		}
	}

	private _rejectConstraint(start: Token): never {
		const s = this._stream;
		const keyword = start.value.toUpperCase();
		if (start.kind === "word" && this._catalog.isUnsupportedConstruct(keyword, REPR)) {
			s.next();
			let depth = 0;
			while (!s.atEnd) {
				if (depth === 0 && (s.isSymbol(",") || s.isSymbol(")") || s.isSymbol(";"))) break;
				if (s.isSymbol("(")) depth++;
				if (s.isSymbol(")")) depth--;
				s.next();
			}
			throw new UnsupportedConstructError(s.textSince(start), REPR, "IR", start.span);
		}
		throw new UnknownConstraintError(start.value, REPR, start.span);
	}

	private _parseType(): LogicalType {
		const s = this._stream;
		const start = s.peek();
		if (start.kind !== "word") {
			throw s.error("Expected a type");
		}
		s.next();

		let spelling = start.value;
		while (s.peek().kind === "word") {
			const candidate = `${spelling} ${s.peek().value}`;
			if (!this._catalog.continuesTypeSpelling(candidate, REPR) && !this._catalog.isKnownType(candidate, REPR)) break;
			spelling = candidate;
			s.next();
		}

		if (s.acceptSymbol("(")) {
			const params: string[] = [];
			do {
				const token = s.next();
				if (token.kind !== "number") throw s.error("Expected a type parameter", token);
				params.push(token.value);
			} while (s.acceptSymbol(","));
			s.expectSymbol(")");
			spelling = `${spelling}(${params.join(",")})`;
		}
		if (s.isSymbol("[")) {
			throw new UnknownTypeError(`${spelling}[]`, REPR, start.span);
		}

		try {
			return this._catalog.resolveType(spelling, REPR);
		} catch (e) {
			if (e instanceof UnknownTypeError) {
				throw new UnknownTypeError(e.token, REPR, start.span);
			}
			throw e;
		}
	}

	private _parseDefault(): ColumnDef["default"] {
		const s = this._stream;
		const start = s.peek();
		let depth = 0;
		let count = 0;

		while (!s.atEnd) {
			const token = s.peek();
			if (depth === 0 && (s.isSymbol(",") || s.isSymbol(")") || s.isSymbol(";"))) break;
			if (depth === 0 && count > 0 && token.kind === "word" && columnConstraintWords.has(token.value.toUpperCase())) break;
			if (s.isSymbol("(")) depth++;
			if (s.isSymbol(")")) depth--;
			s.next();
			count++;
		}
		if (count === 0) {
			throw s.error("Expected a default expression");
		}
		return parseSqlDefault(s.textSince(start), REPR, this._catalog, start.span);
	}

	private _parseColumnList(): string[] {
		const s = this._stream;
		s.expectSymbol("(");
		const columns: string[] = [];
		do {
			columns.push(this._identifier("column name"));
		} while (s.acceptSymbol(","));
		s.expectSymbol(")");
		return columns;
	}

	private _parseReferences(name: string | undefined, columns: string[], inline = false): ForeignKeyDef {
		const s = this._stream;
		if (!inline) s.expectWord("REFERENCES");
		const tableToken = s.peek();
		const referencedTable = this._identifier("referenced table");
		if (!s.isSymbol("(")) {
			throw new UnsupportedConstructError(
				`REFERENCES ${referencedTable} without a column list`,
				REPR,
				"IR",
				tableToken.span
			);
		}
		const referencedColumns = this._parseColumnList();

		let onDelete: ReferentialAction | undefined;
		let onUpdate: ReferentialAction | undefined;
		while (s.isWord("ON") && (s.isWord("DELETE", 1) || s.isWord("UPDATE", 1))) {
			s.next();
			const isDelete = s.next().value.toUpperCase() === "DELETE";
			const action = this._parseAction();
			if (isDelete) onDelete = action;
			else onUpdate = action;
		}
		return { name, columns, referencedTable, referencedColumns, onDelete, onUpdate };
	}

	private _parseAction(): ReferentialAction {
		const s = this._stream;
		const start = s.peek();
		let spelling = s.expectIdentifier("referential action");
		if (spelling.toUpperCase() === "SET" || spelling.toUpperCase() === "NO") {
			spelling += ` ${s.expectIdentifier("referential action")}`;
		}
		const action = this._catalog.resolveReferentialAction(spelling, REPR);
		if (!action) {
			throw new UnknownConstraintError(spelling, REPR, start.span);
		}
		return action;
	}

	/** Indexes belong to the created table, so one created after an alteration has no place in the IR. */
	private _parseCreateIndex(start: Token): void {
		const s = this._stream;
		const unique = s.acceptWord("UNIQUE");
		s.expectWord("INDEX");
		if (s.isWord("IF")) {
			const clause = s.peek();
			s.expectWord("IF", "NOT", "EXISTS");
			throw new UnsupportedConstructError(s.textSince(clause), REPR, "IR", clause.span);
		}
		if (this._builder.hasAlterations) {
			this._skipStatement();
			throw new UnsupportedConstructError(`${s.textSince(start)} after ALTER TABLE`, REPR, "IR", start.span);
		}

		const explicitName = s.isWord("ON") ? undefined : this._identifier("index name");
		s.expectWord("ON");
		const tableToken = s.peek();
		const table = this._parseTableName();
		this._builder.checkTable(table, tableToken.span);
		if (s.isWord("USING")) {
			const clause = s.peek();
			s.next();
			s.expectIdentifier("index method");
			throw new UnsupportedConstructError(s.textSince(clause), REPR, "IR", clause.span);
		}
		const columns = this._parseColumnList();
		this._builder.addIndex({ name: explicitName ?? defaultIndexName(table, columns), columns, unique });
	}

	private _parseComment(): void {
		const s = this._stream;
		const start = s.peek();
		if (s.acceptWord("TABLE")) {
			const table = this._parseTableName();
			this._builder.checkTable(table, start.span);
			s.expectWord("IS");
			this._builder.setDescription(s.expectString());
			return;
		}
		if (s.acceptWord("COLUMN")) {
			const table = this._identifier("table name");
			this._builder.checkTable(table, start.span);
			s.expectSymbol(".");
			const columnToken = s.peek();
			const column = this._identifier("column name");
			s.expectWord("IS");
			const description = s.expectString();
			if (!this._builder.describeColumn(column, description)) {
				throw new ParseError(REPR, `COMMENT ON COLUMN names unknown column "${column}"`, columnToken.span);
			}
			return;
		}
		this._skipStatement();
		throw new UnsupportedConstructError(`COMMENT ON ${s.textSince(start)}`, REPR, "IR", start.span);
	}

	private _parseAlterTable(): void {
		const s = this._stream;
		const tableToken = s.peek();
		const table = this._parseTableName();
		this._builder.checkTable(table, tableToken.span);

		do {
			for (const operation of this._parseAlterAction()) {
				this._builder.addOperation(operation);
			}
		} while (s.acceptSymbol(","));
	}

	private _parseAlterAction(): OperationDef[] {
		const s = this._stream;
		const start = s.peek();

		if (s.acceptWord("ADD")) {
			if (s.isWord("COLUMN") || !this._isTableConstraintStart()) {
				s.acceptWord("COLUMN");
				const operations: OperationDef[] = [];
				const constraints: ConstraintDef[] = [];
				this._parseColumn(
					column => operations.push({ kind: "add-column", column }),
					constraint => constraints.push(constraint)
				);
				return [...operations, ...constraints.map(constraint => ({ kind: "add-constraint" as const, constraint }))];
			}
			const operations: OperationDef[] = [];
			this._parseTableConstraint(constraint => operations.push({ kind: "add-constraint", constraint }));
			return operations;
		}

		if (s.acceptWord("DROP")) {
			if (s.acceptWord("CONSTRAINT")) {
				return [{ kind: "drop-constraint", ref: { kind: "named", name: this._identifier("constraint name") } }];
			}
			s.acceptWord("COLUMN");
			return [{ kind: "drop-column", column: this._identifier("column name") }];
		}

		if (s.acceptWord("ALTER")) {
			s.acceptWord("COLUMN");
			const column = this._identifier("column name");
			if (this._acceptKeyword("not-null", "SET")) {
				return [{ kind: "add-constraint", constraint: { kind: "not-null", column } }];
			}
			if (this._acceptKeyword("not-null", "DROP")) {
				return [{ kind: "drop-constraint", ref: { kind: "not-null", column } }];
			}
			if (this._acceptKeyword("default", "SET")) {
				const value = this._parseDefault();
				if (value === undefined) throw s.error("Expected a default expression");
				return [{ kind: "add-constraint", constraint: { kind: "default", column, value } }];
			}
			if (this._acceptKeyword("default", "DROP")) {
				return [{ kind: "drop-constraint", ref: { kind: "default", column } }];
			}
		}

		while (!s.atEnd && !s.isSymbol(";") && !s.isSymbol(",")) s.next();
		throw new UnsupportedConstructError(`ALTER TABLE ${s.textSince(start)}`, REPR, "IR", start.span);
	}
}

// === Generation ===

class SqlGenerator {
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
		return escapeIdentifier(name, this._quoting);
	}

	private _ids(names: readonly string[]): string {
		return `(${names.map(n => this._id(n)).join(", ")})`;
	}

	generate(ir: CanonicalIR): string {
		const schema = ir.schema;
		const table = this._id(schema.name);
		const statements: string[] = [this._createTable(schema)];

		if (schema.description !== undefined) {
			statements.push(`COMMENT ON TABLE ${table} IS ${this._string(schema.description)};`);
		}
		for (const column of schema.columns) {
			if (column.description !== undefined) {
				statements.push(this._columnComment(schema.name, column));
			}
		}
		for (const index of schema.indexes) {
			statements.push(
				`CREATE ${index.unique ? "UNIQUE " : ""}INDEX ${this._id(index.name)} ON ${table} ${this._ids(index.columns)};`
			);
		}

		for (const operation of ir.operations) {
			checkpoint(this._options.signal, "generation");
			statements.push(...this._operation(schema.name, operation));
		}

		return statements.join("\n");
	}

	private _createTable(schema: SchemaDefinition): string {
		const pk = schema.primaryKey;
		const inlinePk = pk && pk.name === undefined && pk.columns.length === 1 ? pk.columns[0] : undefined;
		const inlineUniques = new Map<string, number>();
		schema.uniques.forEach((u, i) => {
			if (u.name === undefined && u.columns.length === 1 && !inlineUniques.has(u.columns[0])) {
				inlineUniques.set(u.columns[0], i);
			}
		});
		const inlineFks = new Map<string, number>();
		schema.foreignKeys.forEach((fk, i) => {
			if (fk.name === undefined && fk.columns.length === 1 && !inlineFks.has(fk.columns[0])) {
				inlineFks.set(fk.columns[0], i);
			}
		});

		const elements: string[] = [];
		for (const column of schema.columns) {
			const parts = [this._columnHead(column)];
			if (column.name === inlinePk) parts.push(this._keyword("primary-key"));
			if (!column.nullable && column.name !== inlinePk && !pk?.columns.includes(column.name)) parts.push(this._keyword("not-null"));
			if (inlineUniques.has(column.name)) parts.push(this._keyword("unique"));
			const fkIndex = inlineFks.get(column.name);
			if (fkIndex !== undefined) parts.push(this._references(schema.foreignKeys[fkIndex]));
			if (column.default) parts.push(`${this._keyword("default")} ${this._default(column)}`);
			elements.push(parts.join(" "));
		}

		if (pk && inlinePk === undefined) {
			elements.push(`${this._constraintName(pk.name)}${this._keyword("primary-key")} ${this._ids(pk.columns)}`);
		}
		const uniqueIndexes = new Set(inlineUniques.values());
		schema.uniques.forEach((u, i) => {
			if (!uniqueIndexes.has(i)) elements.push(`${this._constraintName(u.name)}${this._keyword("unique")} ${this._ids(u.columns)}`);
		});
		const fkIndexes = new Set(inlineFks.values());
		schema.foreignKeys.forEach((fk, i) => {
			if (!fkIndexes.has(i)) {
				elements.push(`${this._constraintName(fk.name)}${this._keyword("foreign-key")} ${this._ids(fk.columns)} ${this._references(fk)}`);
			}
		});

		return `CREATE TABLE ${this._id(schema.name)} (\n${elements.map(e => this._indent + e).join(",\n")}\n);`;
	}

	private _columnHead(column: ColumnDef): string {
		return `${this._id(column.name)} ${this._catalog.mapType(column.type, REPR)}`;
	}

	private _default(column: ColumnDef): string {
		if (!column.default) return "";
		const compatibility = this._catalog.isDefaultCompatible(column.type, column.default);
		if (!compatibility.ok) {
			throw new UnsupportedConstructError(`DEFAULT on ${column.name}: ${compatibility.reason}`, "IR", REPR);
		}
		return formatSqlDefault(column.default, REPR, this._catalog, this._options.preferredSpellings);
	}

	private _constraintName(name: string | undefined): string {
		return name === undefined ? "" : `CONSTRAINT ${this._id(name)} `;
	}

	private _references(fk: ForeignKeyDef): string {
		let text = `REFERENCES ${this._id(fk.referencedTable)} ${this._ids(fk.referencedColumns)}`;
		if (fk.onDelete) text += ` ON DELETE ${this._catalog.mapReferentialAction(fk.onDelete, REPR)}`;
		if (fk.onUpdate) text += ` ON UPDATE ${this._catalog.mapReferentialAction(fk.onUpdate, REPR)}`;
		return text;
	}

	private _string(value: string): string {
		return `'${value.replace(/'/g, "''")}'`;
	}

	private _columnComment(table: string, column: ColumnDef): string {
		return `COMMENT ON COLUMN ${this._id(table)}.${this._id(column.name)} IS ${this._string(column.description ?? "")};`;
	}

	private _operation(table: string, operation: OperationDef): string[] {
		const alter = `ALTER TABLE ${this._id(table)}`;
		switch (operation.kind) {
			case "create":
				return [];
			case "add-column": {
				const column = operation.column;
				const parts = [this._columnHead(column)];
				if (!column.nullable) parts.push(this._keyword("not-null"));
				if (column.default) parts.push(`${this._keyword("default")} ${this._default(column)}`);
				const statements = [`${alter} ADD COLUMN ${parts.join(" ")};`];
				if (column.description !== undefined) statements.push(this._columnComment(table, column));
				return statements;
			}
			case "drop-column":
				return [`${alter} DROP COLUMN ${this._id(operation.column)};`];
			case "add-constraint":
				return [`${alter} ${this._addConstraint(operation.constraint)};`];
			case "drop-constraint":
				return [`${alter} ${this._dropConstraint(operation.ref)};`];
		}
	}

	private _addConstraint(constraint: ConstraintDef): string {
		switch (constraint.kind) {
			case "primary-key":
				return `ADD ${this._constraintName(constraint.name)}${this._keyword("primary-key")} ${this._ids(constraint.columns)}`;
			case "unique":
				return `ADD ${this._constraintName(constraint.name)}${this._keyword("unique")} ${this._ids(constraint.columns)}`;
			case "foreign-key":
				return `ADD ${this._constraintName(constraint.name)}${this._keyword("foreign-key")} ${this._ids(constraint.columns)} ${this._references(constraint)}`;
			case "not-null":
				return `ALTER COLUMN ${this._id(constraint.column)} SET ${this._keyword("not-null")}`;
			case "default":
				return `ALTER COLUMN ${this._id(constraint.column)} SET ${this._keyword("default")} ${formatSqlDefault(
					constraint.value,
					REPR,
					this._catalog,
					this._options.preferredSpellings
				)}`;
		}
	}

	private _dropConstraint(ref: ConstraintRef): string {
		switch (ref.kind) {
			case "named":
				return `DROP CONSTRAINT ${this._id(ref.name)}`;
			case "not-null":
				return `ALTER COLUMN ${this._id(ref.column)} DROP ${this._keyword("not-null")}`;
			case "default":
				return `ALTER COLUMN ${this._id(ref.column)} DROP ${this._keyword("default")}`;
		}
	}
}
