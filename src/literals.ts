import type { Catalog } from "./catalog";
import type { DefaultExpr, RepresentationTag } from "./model";
import { UnsupportedConstructError, type SourceSpan } from "./errors";

/**
 * Parse a default expression written the SQL way: `'text'`, `42`, `-1.5`, `TRUE`, `NULL`,
 * or a catalog token spelling such as `CURRENT_TIMESTAMP`.
 * Used by the DDL adapter and by the call-tree adapter, whose defaults are SQL text.
 */
export function parseSqlDefault(
	text: string,
	repr: RepresentationTag,
	catalog: Catalog,
	span?: SourceSpan
): DefaultExpr {
	const trimmed = text.trim();

	const quoted = /^'((?:[^']|'')*)'$/.exec(trimmed);
	if (quoted) {
		return { kind: "literal", literal: { kind: "string", value: quoted[1].replace(/''/g, "'") } };
	}
	if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
		return { kind: "literal", literal: { kind: "number", text: trimmed } };
	}
	const upper = trimmed.toUpperCase();
	if (upper === "TRUE" || upper === "FALSE") {
		return { kind: "literal", literal: { kind: "boolean", value: upper === "TRUE" } };
	}
	if (upper === "NULL") {
		return { kind: "literal", literal: { kind: "null" } };
	}

	const token = catalog.resolveDefaultToken(trimmed.replace(/\s*\(\s*\)$/, "()"), repr);
	if (token) {
		return { kind: "token", token };
	}
	throw new UnsupportedConstructError(`DEFAULT ${trimmed}`, repr, "IR", span);
}

export function formatSqlDefault(
	value: DefaultExpr,
	repr: RepresentationTag,
	catalog: Catalog,
	preferredSpellings?: Readonly<Record<string, string>>
): string {
	if (value.kind === "token") {
		return catalog.mapDefaultToken(value.token, repr, preferredSpellings);
	}
	const literal = value.literal;
	switch (literal.kind) {
		case "string":
			return `'${literal.value.replace(/'/g, "''")}'`;
		case "number":
			return literal.text;
		case "boolean":
			return literal.value ? "TRUE" : "FALSE";
		case "null":
			return "NULL";
	}
}
