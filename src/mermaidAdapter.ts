import type { Catalog } from "./catalog";
import { defaultCatalog } from "./catalog";
import type {
	CanonicalIR,
	ColumnDef,
	ConstraintKind,
	DefaultExpr,
	ForeignKeyDef,
	LogicalType,
	ReferentialAction,
	SchemaDefinition,
} from "./model";
import {
	ParseError,
	UnknownConstraintError,
	UnknownTypeError,
	UnsupportedConstructError,
	type SourceSpan,
} from "./errors";
import { IRBuilder } from "./irBuilder";
import { assertExpressible, checkpoint, type FormatOptions, type RepresentationAdapter } from "./adapter";

const REPR = "Graph";

/** Constraints an attribute carries as a key marker such as `PK`. */
const markerKinds = ["primary-key", "foreign-key", "unique"] as const;
type MarkerKind = (typeof markerKinds)[number];

const plainName = /^[A-Za-z_][A-Za-z0-9_]*$/;
const entityName = String.raw`("[^"]*"|[A-Za-z_][A-Za-z0-9_-]*)`;
const cardinality = String.raw`(\|\||\|o|o\||\}o|o\{|\}\||\|\{)`;
const relationshipLine = new RegExp(String.raw`^${entityName}\s+${cardinality}(--|\.\.)${cardinality}\s+${entityName}\s*:\s*(.*)$`);
const entityStart = new RegExp(String.raw`^${entityName}\s*\{\s*$`);
const pragmaLine = /^%%\s*@([a-z-]+)\s*(.*)$/;
/** `[unique] [name] (a, b)`; names that are not plain, or read `unique`, are quoted */
const pragmaShape = /^(unique\s+)?("[^"]*"|[^\s("]+)?\s*\(([^)]*)\)$/;

/**
 * Escape entity names (table names) for Mermaid ER diagrams.
 * Entity names can be quoted if they contain special characters.
 */
function escapeEntityName(name: string): string {
	if (plainName.test(name)) {
		return name;
	}
	if (name.includes('"')) {
		throw new UnsupportedConstructError(`entity name ${name}`, "IR", REPR);
	}
	return `"${name}"`;
}

function unquoteEntityName(name: string): string {
	return name.startsWith('"') ? name.slice(1, -1) : name;
}

/**
 * Attributes cannot be quoted (quotes mean comments in Mermaid ER),
 * so names outside the attribute alphabet have no spelling.
 */
function checkAttributeName(name: string): string {
	if (!plainName.test(name)) {
		throw new UnsupportedConstructError(`attribute name ${name}`, "IR", REPR);
	}
	return name;
}

/**
 * Mermaid comments are double-quoted and single-line; encode the characters that would end them.
 * Whitespace at either edge is encoded too, since the parser trims lines and comment parts.
 */
export function encodeText(text: string): string {
	return text
		.replace(/[#"\n\r]/g, ch => (ch === '"' ? "#quot;" : `#${ch.charCodeAt(0)};`))
		.replace(/^\s+|\s+$/g, run => [...run].map(ch => `#${ch.charCodeAt(0)};`).join(""));
}

export function decodeText(text: string): string {
	return text.replace(/#(quot|\d+);/g, (_, code: string) => (code === "quot" ? '"' : String.fromCharCode(Number(code))));
}

function splitColumns(text: string): string[] {
	return text.split(",").map(c => c.trim()).filter(c => c.length > 0);
}

interface Line {
	readonly text: string;
	readonly span: SourceSpan;
}

function splitLines(text: string): Line[] {
	const lines: Line[] = [];
	let offset = 0;
	text.split("\n").forEach((raw, i) => {
		const trimmed = raw.trim();
		const leading = raw.length - raw.trimStart().length;
		lines.push({
			text: trimmed.replace(/\r$/, ""),
			span: { offset: offset + leading, line: i + 1, column: leading + 1, length: trimmed.length },
		});
		offset += raw.length + 1;
	});
	return lines;
}

interface AttributeLine {
	readonly column: ColumnDef;
	readonly markers: ReadonlySet<MarkerKind>;
	readonly span: SourceSpan;
}

/**
 * Graph representation: a Mermaid `erDiagram` holding one entity.
 * Foreign keys and lineage edges are relationships; what the attribute syntax
 * cannot carry is written as `%% @pragma` comment lines.
 */
export class MermaidAdapter implements RepresentationAdapter {
	readonly representation = REPR;

	constructor(private readonly _catalog: Catalog = defaultCatalog) { }

	private _keyword(kind: ConstraintKind): string {
		return this._catalog.constraintKeyword(kind, REPR);
	}

	parse(text: string): CanonicalIR {
		const lines = splitLines(text).filter(l => l.text.length > 0);
		const builder = new IRBuilder(REPR);
		const end: SourceSpan = { offset: text.length, line: lines.length + 1, column: 1, length: 0 };

		const header = lines.findIndex(l => !l.text.startsWith("%%"));
		if (header === -1 || lines[header].text !== "erDiagram") {
			throw new ParseError(REPR, "Expected erDiagram", lines[header]?.span ?? end);
		}

		const pragmas: Line[] = [];
		const relationships: Line[] = [];
		let attributes: AttributeLine[] | undefined;
		let entitySpan: SourceSpan | undefined;

		for (let i = header + 1; i < lines.length; i++) {
			const line = lines[i];
			if (line.text.startsWith("%%")) {
				if (pragmaLine.test(line.text)) pragmas.push(line);
				continue;
			}
			const entity = entityStart.exec(line.text);
			if (entity) {
				builder.setName(unquoteEntityName(entity[1]), line.span);
				if (attributes) {
					throw new ParseError(REPR, "Only one entity block per document is supported", line.span);
				}
				attributes = [];
				entitySpan = line.span;
				for (i++; i < lines.length && lines[i].text !== "}"; i++) {
					if (lines[i].text.startsWith("%%")) continue;
					attributes.push(this._parseAttribute(lines[i]));
				}
				if (i === lines.length) {
					throw new ParseError(REPR, "Unterminated entity block", line.span);
				}
				continue;
			}
			if (relationshipLine.test(line.text)) {
				relationships.push(line);
				continue;
			}
			throw new ParseError(REPR, `Unexpected line "${line.text}"`, line.span);
		}

		if (!attributes || !entitySpan) {
			throw new ParseError(REPR, "No entity block found", end);
		}
		const table = builder.name ?? "";

		for (const attribute of attributes) {
			builder.addColumn(attribute.column);
		}
		const markedPrimaryKey = attributes.filter(a => a.markers.has("primary-key")).map(a => a.column.name);
		if (markedPrimaryKey.length > 0) {
			builder.setPrimaryKey({ columns: markedPrimaryKey }, entitySpan);
		}
		for (const attribute of attributes) {
			if (attribute.markers.has("unique")) builder.addUnique({ columns: [attribute.column.name] });
		}

		for (const pragma of pragmas) {
			this._applyPragma(pragma, builder);
		}

		const foreignKeyColumns = new Set<string>();
		for (const line of relationships) {
			const fk = this._parseRelationship(line, table, builder);
			if (fk) {
				builder.addForeignKey(fk);
				fk.columns.forEach(c => foreignKeyColumns.add(c));
			}
		}

		for (const attribute of attributes) {
			if (attribute.markers.has("foreign-key") !== foreignKeyColumns.has(attribute.column.name)) {
				const marker = this._keyword("foreign-key");
				throw new ParseError(
					REPR,
					attribute.markers.has("foreign-key")
						? `Attribute "${attribute.column.name}" is marked ${marker} but no relationship references it`
						: `Attribute "${attribute.column.name}" is used by a relationship but not marked ${marker}`,
					attribute.span
				);
			}
		}

		return builder.build(end);
	}

	private _parseAttribute(line: Line): AttributeLine {
		const match = /^(\S+)\s+(\S+)\s*([^"]*?)\s*(?:"([^"]*)")?\s*$/.exec(line.text);
		if (!match) {
			throw new ParseError(REPR, `Malformed attribute "${line.text}"`, line.span);
		}
		const [, typeSpelling, name, keys, comment] = match;

		const markers = new Set<MarkerKind>();
		for (const key of splitColumns(keys)) {
			const kind = markerKinds.find(k => this._keyword(k) === key);
			if (kind) {
				markers.add(kind);
			} else if (this._catalog.isUnsupportedConstruct(key, REPR)) {
				throw new UnsupportedConstructError(key, REPR, "IR", line.span);
			} else {
				throw new UnknownConstraintError(key, REPR, line.span);
			}
		}

		let type: LogicalType;
		try {
			type = this._catalog.resolveType(typeSpelling, REPR);
		} catch (e) {
			if (e instanceof UnknownTypeError) {
				throw new UnknownTypeError(typeSpelling, REPR, { ...line.span, length: typeSpelling.length });
			}
			throw e;
		}

		const details = comment === undefined ? {} : this._parseComment(comment, line.span);
		return {
			column: {
				name,
				type,
				nullable: !details.notNull,
				default: details.default,
				description: details.note,
			},
			markers,
			span: line.span,
		};
	}

	/**
	 * Attribute comment: `not null; default <value>; note <text>`, each part optional, in that order.
	 * Values are decoded part by part, so an encoded `;` or edge space stays inside its part.
	 */
	private _parseComment(text: string, span: SourceSpan): { notNull?: boolean; default?: DefaultExpr; note?: string } {
		const result: { notNull?: boolean; default?: DefaultExpr; note?: string } = {};
		const notNull = this._keyword("not-null");
		const defaultPrefix = `${this._keyword("default")} `;
		let rest = text.trim();
		while (rest.length > 0) {
			if (rest === "note") {
				result.note = "";
				break;
			}
			if (rest.startsWith("note ")) {
				result.note = decodeText(rest.slice("note ".length));
				break;
			}
			let part: string;
			if (rest.startsWith(`${defaultPrefix}'`)) {
				const literal = /^'(?:[^']|'')*'/.exec(rest.slice(defaultPrefix.length));
				if (!literal) throw new ParseError(REPR, `Unterminated default "${rest}"`, span);
				part = defaultPrefix + literal[0];
			} else {
				const separator = rest.indexOf(";");
				part = separator === -1 ? rest : rest.slice(0, separator);
			}
			rest = rest.slice(part.length).trim();
			if (rest.length > 0) {
				if (!rest.startsWith(";")) throw new ParseError(REPR, `Expected ";" after "${part}"`, span);
				rest = rest.slice(1).trim();
			}

			part = part.trim();
			if (part === notNull) {
				result.notNull = true;
			} else if (part.startsWith(defaultPrefix)) {
				result.default = this._parseDefault(decodeText(part.slice(defaultPrefix.length).trim()), span);
			} else {
				const keyword = part.split(/\s+/)[0];
				if (this._catalog.isUnsupportedConstruct(keyword, REPR)) {
					throw new UnsupportedConstructError(part, REPR, "IR", span);
				}
				throw new UnknownConstraintError(keyword, REPR, span);
			}
		}
		return result;
	}

	private _parseDefault(text: string, span: SourceSpan): DefaultExpr {
		const quoted = /^'((?:[^']|'')*)'$/.exec(text);
		if (quoted) {
			return { kind: "literal", literal: { kind: "string", value: quoted[1].replace(/''/g, "'") } };
		}
		if (/^-?\d+(\.\d+)?$/.test(text)) {
			return { kind: "literal", literal: { kind: "number", text } };
		}
		if (text === "true" || text === "false") {
			return { kind: "literal", literal: { kind: "boolean", value: text === "true" } };
		}
		if (text === "null") {
			return { kind: "literal", literal: { kind: "null" } };
		}
		const token = this._catalog.resolveDefaultToken(text, REPR);
		if (!token) {
			throw new UnsupportedConstructError(`default ${text}`, REPR, "IR", span);
		}
		return { kind: "token", token };
	}

	private _applyPragma(line: Line, builder: IRBuilder): void {
		const match = pragmaLine.exec(line.text);
		if (!match) return;
		const [, directive, argument] = match;

		if (directive === "description") {
			builder.setDescription(decodeText(argument));
			return;
		}

		const shape = pragmaShape.exec(argument.trim());
		if (!shape) {
			throw new ParseError(REPR, `Malformed @${directive} pragma`, line.span);
		}
		const [, uniqueFlag, rawName, columnList] = shape;
		const name = rawName === undefined ? undefined : decodeText(unquoteEntityName(rawName));
		const columns = splitColumns(columnList);

		switch (directive) {
			case "primary-key":
				if (uniqueFlag) break;
				builder.setPrimaryKey({ name, columns }, line.span);
				return;
			case "unique":
				if (uniqueFlag) break;
				builder.addUnique({ name, columns });
				return;
			case "index":
				if (name === undefined) break;
				builder.addIndex({ name, columns, unique: uniqueFlag !== undefined });
				return;
			default:
				if (this._catalog.isUnsupportedConstruct(directive, REPR)) {
					throw new UnsupportedConstructError(line.text, REPR, "IR", line.span);
				}
				throw new UnknownConstraintError(`@${directive}`, REPR, line.span);
		}
		throw new ParseError(REPR, `Malformed @${directive} pragma`, line.span);
	}

	private _parseRelationship(line: Line, table: string, builder: IRBuilder): ForeignKeyDef | undefined {
		const match = relationshipLine.exec(line.text);
		if (!match) return undefined;
		const [, left, leftCard, style, rightCard, right, rawLabel] = match;
		const from = unquoteEntityName(left);
		const to = unquoteEntityName(right);
		const encodedLabel = rawLabel.trim().replace(/^"(.*)"$/, "$1");
		const label = decodeText(encodedLabel);

		const derivation = /^derives(?:: (.*))?$/.exec(encodedLabel);
		if (leftCard === "||" && style === ".." && rightCard === "||" && derivation) {
			builder.addLineage({ from, to, label: derivation[1] === undefined ? undefined : decodeText(derivation[1]) });
			return undefined;
		}
		if (leftCard !== "||" || rightCard !== "o{") {
			throw new UnsupportedConstructError(line.text, REPR, "IR", line.span);
		}
		if (to !== table) {
			throw new ParseError(REPR, `Relationship targets "${to}" but the diagram defines "${table}"`, line.span);
		}

		// [name: ]a, b -> x, y[; on delete action][; on update action]
		const [head, ...clauses] = label.split(";").map(p => p.trim());
		const fkShape = /^(?:([^:]+):\s*)?([^>]+?)\s*->\s*(.+)$/.exec(head);
		if (!fkShape) {
			throw new ParseError(REPR, `Malformed relationship label "${label}"`, line.span);
		}
		const [, name, columns, referencedColumns] = fkShape;

		let onDelete: ReferentialAction | undefined;
		let onUpdate: ReferentialAction | undefined;
		for (const clause of clauses) {
			const action = /^on (delete|update) (.+)$/.exec(clause);
			if (!action) {
				throw new UnknownConstraintError(clause, REPR, line.span);
			}
			const resolved = this._catalog.resolveReferentialAction(action[2], REPR);
			if (!resolved) {
				throw new UnknownConstraintError(action[2], REPR, line.span);
			}
			if (action[1] === "delete") onDelete = resolved;
			else onUpdate = resolved;
		}
		if ((style === "--") !== (onDelete === "cascade")) {
			throw new ParseError(REPR, 'A solid relationship line ("--") must coincide with "on delete cascade"', line.span);
		}

		return {
			name: name?.trim(),
			columns: splitColumns(columns),
			referencedTable: from,
			referencedColumns: splitColumns(referencedColumns),
			onDelete,
			onUpdate,
		};
	}

	generate(ir: CanonicalIR, options: FormatOptions = {}): string {
		assertExpressible(ir, REPR, this._catalog);
		checkpoint(options.signal, "generation");
		const indent = options.indent ?? "    ";
		const schema = ir.schema;
		const lines: string[] = ["erDiagram"];

		const inlinePrimaryKey = isInlinePrimaryKey(schema);
		const inlineUniques = new Set<number>();
		const uniqueColumns = new Set<string>();
		schema.uniques.forEach((u, i) => {
			if (u.name === undefined && u.columns.length === 1 && !uniqueColumns.has(u.columns[0])) {
				uniqueColumns.add(u.columns[0]);
				inlineUniques.add(i);
			}
		});
		const fkColumns = new Set(schema.foreignKeys.flatMap(fk => fk.columns));
		const pkColumns = new Set(schema.primaryKey?.columns ?? []);

		if (schema.description !== undefined) {
			lines.push(`${indent}%% @description ${encodeText(schema.description)}`);
		}
		if (schema.primaryKey && !inlinePrimaryKey) {
			lines.push(`${indent}%% @primary-key ${pragmaTarget(schema.primaryKey.name, schema.primaryKey.columns)}`);
		}
		schema.uniques.forEach((u, i) => {
			if (!inlineUniques.has(i)) lines.push(`${indent}%% @unique ${pragmaTarget(u.name, u.columns)}`);
		});
		for (const index of schema.indexes) {
			lines.push(`${indent}%% @index ${index.unique ? "unique " : ""}${pragmaTarget(index.name, index.columns)}`);
		}

		lines.push(`${indent}${escapeEntityName(schema.name)} {`);
		for (const column of schema.columns) {
			const markers: string[] = [];
			if (inlinePrimaryKey && pkColumns.has(column.name)) markers.push(this._keyword("primary-key"));
			if (fkColumns.has(column.name)) markers.push(this._keyword("foreign-key"));
			if (uniqueColumns.has(column.name)) markers.push(this._keyword("unique"));
			// Mermaid supports comma-separated keys like "PK,FK" but not "PK FK"
			const keyMarker = markers.length > 0 ? ` ${markers.join(",")}` : "";
			const comment = this._comment(column, pkColumns.has(column.name), options);
			lines.push(
				`${indent}${indent}${this._catalog.mapType(column.type, REPR)} ${checkAttributeName(column.name)}${keyMarker}${comment}`
			);
		}
		lines.push(`${indent}}`);

		for (const fk of schema.foreignKeys) {
			// Mermaid ER syntax: Entity1 cardinality--cardinality Entity2 : "label"
			// The referenced table has exactly one (||), the referencing table zero or more (o{)
			const lineStyle = fk.onDelete === "cascade" ? "--" : "..";
			lines.push(
				`${indent}${escapeEntityName(fk.referencedTable)} ||${lineStyle}o{ ${escapeEntityName(schema.name)} : "${encodeText(this._relationshipLabel(fk))}"`
			);
		}
		for (const edge of ir.lineage) {
			const label = edge.label !== undefined ? `derives: ${encodeText(edge.label)}` : "derives";
			lines.push(`${indent}${escapeEntityName(edge.from)} ||..|| ${escapeEntityName(edge.to)} : "${label}"`);
		}

		return lines.join("\n");
	}

	private _comment(column: ColumnDef, isPrimaryKey: boolean, options: FormatOptions): string {
		const parts: string[] = [];
		if (!column.nullable && !isPrimaryKey) parts.push(this._keyword("not-null"));
		if (column.default) {
			const compatibility = this._catalog.isDefaultCompatible(column.type, column.default);
			if (!compatibility.ok) {
				throw new UnsupportedConstructError(`default on ${column.name}: ${compatibility.reason}`, "IR", REPR);
			}
			parts.push(`${this._keyword("default")} ${encodeText(this._formatDefault(column.default, options))}`);
		}
		if (column.description !== undefined) {
			parts.push(column.description === "" ? "note" : `note ${encodeText(column.description)}`);
		}
		return parts.length > 0 ? ` "${parts.join("; ")}"` : "";
	}

	private _formatDefault(value: DefaultExpr, options: FormatOptions): string {
		if (value.kind === "token") {
			return this._catalog.mapDefaultToken(value.token, REPR, options.preferredSpellings);
		}
		const literal = value.literal;
		switch (literal.kind) {
			case "string":
				return `'${literal.value.replace(/'/g, "''")}'`;
			case "number":
				return literal.text;
			case "boolean":
				return String(literal.value);
			case "null":
				return "null";
		}
	}

	private _relationshipLabel(fk: ForeignKeyDef): string {
		const parts = [`${fk.name !== undefined ? `${fk.name}: ` : ""}${fk.columns.join(", ")} -> ${fk.referencedColumns.join(", ")}`];
		if (fk.onDelete) parts.push(`on delete ${this._catalog.mapReferentialAction(fk.onDelete, REPR)}`);
		if (fk.onUpdate) parts.push(`on update ${this._catalog.mapReferentialAction(fk.onUpdate, REPR)}`);
		return parts.join("; ");
	}
}

/** PK markers only carry an unnamed key whose columns appear in table order. */
function isInlinePrimaryKey(schema: SchemaDefinition): boolean {
	const pk = schema.primaryKey;
	if (!pk || pk.name !== undefined) return false;
	const ordered = schema.columns.map(c => c.name).filter(name => pk.columns.includes(name));
	return ordered.length === pk.columns.length && ordered.every((name, i) => name === pk.columns[i]);
}

function pragmaName(name: string): string {
	return plainName.test(name) && name !== "unique" ? name : `"${encodeText(name)}"`;
}

function pragmaTarget(name: string | undefined, columns: readonly string[]): string {
	return `${name !== undefined ? `${pragmaName(name)} ` : ""}(${columns.join(", ")})`;
}
