/**
 * Canonical intermediate representation shared by every representation adapter.
 *
 * Design principle: Immutable, readonly types. No methods that mutate.
 */

// === Representations ===

export const representations = ["DeclarativeQuery", "FunctionalCall", "Graph", "Set"] as const;

export type RepresentationTag = (typeof representations)[number];

export function isRepresentationTag(value: string): value is RepresentationTag {
	return representations.some(tag => tag === value);
}

// === Types ===

export type CanonicalType =
	| "smallint"
	| "integer"
	| "bigint"
	| "decimal"
	| "double"
	| "boolean"
	| "text"
	| "varchar"
	| "char"
	| "date"
	| "time"
	| "timestamp"
	| "timestamptz"
	| "uuid"
	| "json"
	| "bytes";

export interface LogicalType {
	readonly base: CanonicalType;
	/** Length for varchar/char, precision and scale for decimal */
	readonly params: readonly number[];
}

// === Defaults ===

export type DefaultToken = "current-timestamp" | "current-date" | "current-time" | "random-uuid";

export type Literal =
	| { readonly kind: "string"; readonly value: string }
	/** Numbers keep their source text so `1000.00` survives a translation */
	| { readonly kind: "number"; readonly text: string }
	| { readonly kind: "boolean"; readonly value: boolean }
	| { readonly kind: "null" };

export type DefaultExpr =
	| { readonly kind: "literal"; readonly literal: Literal }
	| { readonly kind: "token"; readonly token: DefaultToken };

// === Schema ===

export type ReferentialAction = "cascade" | "restrict" | "set-null" | "set-default" | "no-action";

export interface ColumnDef {
	readonly name: string;
	readonly type: LogicalType;
	readonly nullable: boolean;
	readonly default?: DefaultExpr;
	readonly description?: string;
}

export interface PrimaryKeyDef {
	readonly name?: string;
	readonly columns: readonly string[];
}

export interface ForeignKeyDef {
	readonly name?: string;
	readonly columns: readonly string[];
	readonly referencedTable: string;
	readonly referencedColumns: readonly string[];
	readonly onDelete?: ReferentialAction;
	readonly onUpdate?: ReferentialAction;
}

export interface UniqueDef {
	readonly name?: string;
	readonly columns: readonly string[];
}

export interface IndexDef {
	readonly name: string;
	readonly columns: readonly string[];
	readonly unique: boolean;
}

export interface SchemaDefinition {
	readonly name: string;
	readonly columns: readonly ColumnDef[];
	readonly primaryKey?: PrimaryKeyDef;
	readonly foreignKeys: readonly ForeignKeyDef[];
	readonly uniques: readonly UniqueDef[];
	readonly indexes: readonly IndexDef[];
	readonly description?: string;
}

// === Constraints ===

/** Constraint kinds in the order generators visit them. */
export const constraintOrder = ["primary-key", "not-null", "unique", "foreign-key", "default"] as const;

export type ConstraintKind = (typeof constraintOrder)[number];

export type ConstraintDef =
	| { readonly kind: "primary-key"; readonly name?: string; readonly columns: readonly string[] }
	| ({ readonly kind: "foreign-key" } & ForeignKeyDef)
	| { readonly kind: "unique"; readonly name?: string; readonly columns: readonly string[] }
	| { readonly kind: "not-null"; readonly column: string }
	| { readonly kind: "default"; readonly column: string; readonly value: DefaultExpr };

export type ConstraintRef =
	| { readonly kind: "named"; readonly name: string }
	| { readonly kind: "not-null"; readonly column: string }
	| { readonly kind: "default"; readonly column: string };

// === Operations ===

export type OperationDef =
	| { readonly kind: "create" }
	| { readonly kind: "add-column"; readonly column: ColumnDef }
	| { readonly kind: "drop-column"; readonly column: string }
	| { readonly kind: "add-constraint"; readonly constraint: ConstraintDef }
	| { readonly kind: "drop-constraint"; readonly ref: ConstraintRef };

export interface LineageEdge {
	readonly from: string;
	readonly to: string;
	readonly label?: string;
}

export interface CanonicalIR {
	readonly schema: SchemaDefinition;
	readonly operations: readonly OperationDef[];
	readonly lineage: readonly LineageEdge[];
}

// === Helpers ===

export function createIR(
	schema: SchemaDefinition,
	alterations: readonly OperationDef[] = [],
	lineage: readonly LineageEdge[] = []
): CanonicalIR {
	return {
		schema,
		operations: [{ kind: "create" }, ...alterations],
		lineage,
	};
}

/** Fills in the empty constraint sets and forces primary-key columns to be non-nullable. */
export function createSchema(
	name: string,
	columns: readonly ColumnDef[],
	extra: Partial<Omit<SchemaDefinition, "name" | "columns">> = {}
): SchemaDefinition {
	const pkColumns = new Set(extra.primaryKey?.columns ?? []);
	return {
		name,
		columns: columns.map(c => (pkColumns.has(c.name) && c.nullable ? { ...c, nullable: false } : c)),
		primaryKey: extra.primaryKey,
		foreignKeys: extra.foreignKeys ?? [],
		uniques: extra.uniques ?? [],
		indexes: extra.indexes ?? [],
		description: extra.description,
	};
}

export function typeToString(type: LogicalType): string {
	return type.params.length > 0 ? `${type.base}(${type.params.join(",")})` : type.base;
}

export function typesEqual(a: LogicalType, b: LogicalType): boolean {
	return a.base === b.base && a.params.length === b.params.length && a.params.every((p, i) => p === b.params[i]);
}

export function defaultToString(value: DefaultExpr): string {
	if (value.kind === "token") return `<${value.token}>`;
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

// === Constraint naming ===

export function primaryKeyName(schema: SchemaDefinition): string | undefined {
	if (!schema.primaryKey) return undefined;
	return schema.primaryKey.name ?? `${schema.name}_pkey`;
}

export function uniqueName(table: string, unique: UniqueDef): string {
	return unique.name ?? `${table}_${unique.columns.join("_")}_key`;
}

export function foreignKeyName(table: string, fk: ForeignKeyDef): string {
	return fk.name ?? `${table}_${fk.columns.join("_")}_fkey`;
}

/** Index naming used when a definition omits the name: idx_{table}_{columns}_{table}. */
export function defaultIndexName(table: string, columns: readonly string[]): string {
	return `idx_${table}_${columns.map(c => c.replace(/[^a-zA-Z0-9]/g, "_")).join("_")}_${table}`;
}

export function constraintColumns(constraint: ConstraintDef): readonly string[] {
	switch (constraint.kind) {
		case "primary-key":
		case "unique":
		case "foreign-key":
			return constraint.columns;
		case "not-null":
		case "default":
			return [constraint.column];
	}
}

export function constraintRefToString(ref: ConstraintRef): string {
	return ref.kind === "named" ? ref.name : `${ref.kind}(${ref.column})`;
}
