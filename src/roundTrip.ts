import type {
	CanonicalIR,
	ColumnDef,
	ConstraintDef,
	ForeignKeyDef,
	IndexDef,
	LineageEdge,
	OperationDef,
	UniqueDef,
} from "./model";
import { constraintRefToString, defaultToString, typeToString, typesEqual } from "./model";
import type { InvariantCategory, InvariantViolation } from "./errors";

function named(name: string | undefined): string {
	return name !== undefined ? `${name}: ` : "";
}

export function describeUnique(unique: UniqueDef): string {
	return `${named(unique.name)}unique(${unique.columns.join(", ")})`;
}

export function describeForeignKey(fk: ForeignKeyDef): string {
	let text = `${named(fk.name)}(${fk.columns.join(", ")}) -> ${fk.referencedTable}(${fk.referencedColumns.join(", ")})`;
	if (fk.onDelete) text += ` on delete ${fk.onDelete}`;
	if (fk.onUpdate) text += ` on update ${fk.onUpdate}`;
	return text;
}

export function describeIndex(index: IndexDef): string {
	return `${index.name}: ${index.unique ? "unique " : ""}(${index.columns.join(", ")})`;
}

function describeColumn(column: ColumnDef): string {
	let text = `${column.name} ${typeToString(column.type)}${column.nullable ? "" : " not null"}`;
	if (column.default) text += ` default ${defaultToString(column.default)}`;
	if (column.description !== undefined) text += ` note ${JSON.stringify(column.description)}`;
	return text;
}

function describeConstraint(constraint: ConstraintDef): string {
	switch (constraint.kind) {
		case "primary-key":
			return `${named(constraint.name)}primary key(${constraint.columns.join(", ")})`;
		case "unique":
			return describeUnique(constraint);
		case "foreign-key":
			return `foreign key ${describeForeignKey(constraint)}`;
		case "not-null":
			return `not null(${constraint.column})`;
		case "default":
			return `default(${constraint.column}) ${defaultToString(constraint.value)}`;
	}
}

export function describeOperation(operation: OperationDef): string {
	switch (operation.kind) {
		case "create":
			return "create";
		case "add-column":
			return `add column ${describeColumn(operation.column)}`;
		case "drop-column":
			return `drop column ${operation.column}`;
		case "add-constraint":
			return `add ${describeConstraint(operation.constraint)}`;
		case "drop-constraint":
			return `drop constraint ${constraintRefToString(operation.ref)}`;
	}
}

function describeLineage(edge: LineageEdge): string {
	return `${edge.from} -> ${edge.to}${edge.label !== undefined ? ` (${edge.label})` : ""}`;
}

class ViolationCollector {
	readonly violations: InvariantViolation[] = [];

	check(category: InvariantCategory, path: string, expected: string, actual: string): void {
		if (expected !== actual) {
			this.violations.push({ category, path, expected, actual });
		}
	}

	/** Compares two collections ignoring order, one violation per missing or extra member. */
	checkSet(category: InvariantCategory, path: string, expected: readonly string[], actual: readonly string[]): void {
		const remaining = [...actual];
		for (const item of expected) {
			const index = remaining.indexOf(item);
			if (index === -1) {
				this.violations.push({ category, path, expected: item, actual: "missing" });
			} else {
				remaining.splice(index, 1);
			}
		}
		for (const item of remaining) {
			this.violations.push({ category, path, expected: "nothing", actual: item });
		}
	}
}

const orDash = (value: string | undefined) => value ?? "-";

/**
 * Compare the IR a translation started from with the IR its output parses back to.
 * Columns are matched by position; constraints, indexes and lineage edges as sets.
 * @returns the violations, empty when the meaning was preserved
 */
export function compareIR(expected: CanonicalIR, actual: CanonicalIR): InvariantViolation[] {
	const v = new ViolationCollector();
	const e = expected.schema;
	const a = actual.schema;

	v.check("Metadata", "name", e.name, a.name);

	// Cardinality
	v.check("Cardinality", "columns.length", String(e.columns.length), String(a.columns.length));
	v.check("Cardinality", "columns", e.columns.map(c => c.name).join(", "), a.columns.map(c => c.name).join(", "));
	v.check("Cardinality", "primaryKey.columns.length", String(e.primaryKey?.columns.length ?? 0), String(a.primaryKey?.columns.length ?? 0));
	v.check("Cardinality", "foreignKeys.length", String(e.foreignKeys.length), String(a.foreignKeys.length));
	v.checkSet(
		"Cardinality",
		"foreignKeys.arity",
		e.foreignKeys.map(fk => `${fk.columns.length}:${fk.referencedColumns.length}`),
		a.foreignKeys.map(fk => `${fk.columns.length}:${fk.referencedColumns.length}`)
	);

	// Types and per-column constraints, by column name
	for (const column of e.columns) {
		const other = a.columns.find(c => c.name === column.name);
		if (!other) continue;
		const path = `columns.${column.name}`;
		if (!typesEqual(column.type, other.type)) {
			v.check("Types", `${path}.type`, typeToString(column.type), typeToString(other.type));
		}
		v.check("Constraints", `${path}.nullable`, String(column.nullable), String(other.nullable));
		v.check(
			"Constraints",
			`${path}.default`,
			column.default ? defaultToString(column.default) : "-",
			other.default ? defaultToString(other.default) : "-"
		);
		v.check("Metadata", `${path}.description`, orDash(column.description), orDash(other.description));
	}

	// Table-level constraints
	v.check(
		"Constraints",
		"primaryKey",
		e.primaryKey ? `${named(e.primaryKey.name)}(${e.primaryKey.columns.join(", ")})` : "-",
		a.primaryKey ? `${named(a.primaryKey.name)}(${a.primaryKey.columns.join(", ")})` : "-"
	);
	v.checkSet("Constraints", "uniques", e.uniques.map(describeUnique), a.uniques.map(describeUnique));
	v.checkSet("Constraints", "foreignKeys", e.foreignKeys.map(describeForeignKey), a.foreignKeys.map(describeForeignKey));
	v.checkSet("Constraints", "indexes", e.indexes.map(describeIndex), a.indexes.map(describeIndex));

	// Operations keep their exact sequence
	v.check("OperationOrder", "operations.length", String(expected.operations.length), String(actual.operations.length));
	expected.operations.forEach((operation, i) => {
		const other = actual.operations[i];
		if (other) {
			v.check("OperationOrder", `operations[${i}]`, describeOperation(operation), describeOperation(other));
		}
	});

	v.check("Metadata", "description", orDash(e.description), orDash(a.description));
	v.checkSet("Metadata", "lineage", expected.lineage.map(describeLineage), actual.lineage.map(describeLineage));

	return v.violations;
}
