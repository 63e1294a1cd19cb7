import type { Catalog } from "./catalog";
import { defaultCatalog } from "./catalog";
import type { CanonicalIR, ColumnDef, ConstraintDef, ForeignKeyDef, SchemaDefinition } from "./model";
import { constraintColumns, constraintRefToString, foreignKeyName, primaryKeyName, uniqueName } from "./model";
import { InvalidSchemaError, type SchemaIssue } from "./errors";

export interface ValidationOptions {
	/** Schemas that foreign keys may point at; references to tables not listed here are only warned about */
	readonly referencedSchemas?: readonly SchemaDefinition[];
}

function sameColumnSet(a: readonly string[], b: readonly string[]): boolean {
	return a.length === b.length && a.every(c => b.includes(c));
}

/** Column sets a foreign key may target: the primary key and every unique constraint. */
function candidateKeys(schema: SchemaDefinition): (readonly string[])[] {
	return [
		...(schema.primaryKey ? [schema.primaryKey.columns] : []),
		...schema.uniques.map(u => u.columns),
		...schema.indexes.filter(i => i.unique).map(i => i.columns),
	];
}

class IssueCollector {
	readonly issues: SchemaIssue[] = [];

	error(path: string, message: string): void {
		this.issues.push({ severity: "error", path, message });
	}

	warning(path: string, message: string): void {
		this.issues.push({ severity: "warning", path, message });
	}
}

/**
 * Check an IR against the model invariants and the catalog.
 * @returns the warnings
 * @throws InvalidSchemaError listing every error found
 */
export function validateIR(
	ir: CanonicalIR,
	options: ValidationOptions = {},
	catalog: Catalog = defaultCatalog
): SchemaIssue[] {
	const issues = new IssueCollector();
	validateSchema(ir.schema, options, catalog, issues);
	validateOperations(ir, catalog, issues);

	const errors = issues.issues.filter(i => i.severity === "error");
	if (errors.length > 0) {
		throw new InvalidSchemaError(errors);
	}
	return issues.issues;
}

function validateSchema(schema: SchemaDefinition, options: ValidationOptions, catalog: Catalog, issues: IssueCollector): void {
	if (schema.name.length === 0) {
		issues.error("name", "table name is empty");
	}
	if (schema.columns.length === 0) {
		issues.error("columns", "table has no columns");
	}

	const columns = new Map<string, ColumnDef>();
	schema.columns.forEach((column, i) => {
		if (columns.has(column.name)) {
			issues.error(`columns[${i}]`, `duplicate column "${column.name}"`);
		}
		columns.set(column.name, column);
		checkDefault(column, `columns.${column.name}.default`, catalog, issues);
	});

	const checkColumns = (path: string, names: readonly string[]) => {
		if (names.length === 0) {
			issues.error(path, "no columns");
		}
		for (const name of names) {
			if (!columns.has(name)) issues.error(path, `unknown column "${name}"`);
		}
		if (new Set(names).size !== names.length) {
			issues.error(path, "column listed twice");
		}
	};

	if (schema.primaryKey) {
		checkColumns("primaryKey", schema.primaryKey.columns);
		for (const name of schema.primaryKey.columns) {
			if (columns.get(name)?.nullable) {
				issues.error(`columns.${name}.nullable`, "primary-key column is nullable");
			}
		}
	}
	schema.uniques.forEach((unique, i) => checkColumns(`uniques[${i}]`, unique.columns));

	schema.foreignKeys.forEach((fk, i) => {
		const path = `foreignKeys[${i}]`;
		checkColumns(path, fk.columns);
		checkForeignKeyTarget(schema, fk, path, options, issues);
	});

	const indexNames = new Set<string>();
	schema.indexes.forEach((index, i) => {
		const path = `indexes[${i}]`;
		checkColumns(path, index.columns);
		if (indexNames.has(index.name)) {
			issues.error(path, `duplicate index name "${index.name}"`);
		}
		indexNames.add(index.name);
		if (schema.primaryKey && sameColumnSet(index.columns, schema.primaryKey.columns)) {
			issues.warning(path, `index "${index.name}" duplicates the primary key`);
		}
	});

	const constraintNames = new Set<string>();
	const names = [
		primaryKeyName(schema),
		...schema.uniques.map(u => uniqueName(schema.name, u)),
		...schema.foreignKeys.map(fk => foreignKeyName(schema.name, fk)),
	];
	for (const name of names) {
		if (name === undefined) continue;
		if (constraintNames.has(name)) {
			issues.error("constraints", `duplicate constraint name "${name}"`);
		}
		constraintNames.add(name);
	}
}

function checkDefault(column: ColumnDef, path: string, catalog: Catalog, issues: IssueCollector): void {
	if (!column.default) return;
	const compatibility = catalog.isDefaultCompatible(column.type, column.default);
	if (!compatibility.ok) {
		issues.error(path, compatibility.reason);
	}
}

function checkForeignKeyTarget(
	schema: SchemaDefinition,
	fk: ForeignKeyDef,
	path: string,
	options: ValidationOptions,
	issues: IssueCollector
): void {
	if (fk.columns.length !== fk.referencedColumns.length) {
		issues.error(path, `${fk.columns.length} columns reference ${fk.referencedColumns.length} columns`);
		return;
	}
	const target = fk.referencedTable === schema.name
		? schema
		: options.referencedSchemas?.find(s => s.name === fk.referencedTable);
	if (!target) {
		issues.warning(path, `unverified external reference to "${fk.referencedTable}"`);
		return;
	}
	for (const name of fk.referencedColumns) {
		if (!target.columns.some(c => c.name === name)) {
			issues.error(path, `"${fk.referencedTable}" has no column "${name}"`);
			return;
		}
	}
	if (!candidateKeys(target).some(key => sameColumnSet(key, fk.referencedColumns))) {
		issues.error(path, `(${fk.referencedColumns.join(", ")}) is neither primary nor unique in "${fk.referencedTable}"`);
	}
}

/**
 * Replays the alteration operations against a column and constraint-name model
 * so that each operation refers to things that exist at that point.
 */
function validateOperations(ir: CanonicalIR, catalog: Catalog, issues: IssueCollector): void {
	const schema = ir.schema;
	const table = schema.name;
	const columns = new Map(schema.columns.map(c => [c.name, c]));
	/** constraint name -> columns it covers */
	const named = new Map<string, readonly string[]>();
	let primaryKey = primaryKeyName(schema);
	if (primaryKey !== undefined && schema.primaryKey) named.set(primaryKey, schema.primaryKey.columns);
	for (const unique of schema.uniques) named.set(uniqueName(table, unique), unique.columns);
	for (const fk of schema.foreignKeys) named.set(foreignKeyName(table, fk), fk.columns);

	if (ir.operations[0]?.kind !== "create") {
		issues.error("operations[0]", "the first operation must be create");
	}

	ir.operations.forEach((operation, i) => {
		const path = `operations[${i}]`;
		switch (operation.kind) {
			case "create":
				if (i !== 0) issues.error(path, "create may only be the first operation");
				return;
			case "add-column": {
				const column = operation.column;
				if (columns.has(column.name)) {
					issues.error(path, `column "${column.name}" already exists`);
				}
				checkDefault(column, `${path}.column.default`, catalog, issues);
				columns.set(column.name, column);
				return;
			}
			case "drop-column":
				if (!columns.delete(operation.column)) {
					issues.error(path, `unknown column "${operation.column}"`);
				}
				for (const [name, covered] of named) {
					if (!covered.includes(operation.column)) continue;
					named.delete(name);
					if (name === primaryKey) primaryKey = undefined;
				}
				return;
			case "add-constraint": {
				const constraint = operation.constraint;
				for (const name of constraintColumns(constraint)) {
					if (!columns.has(name)) issues.error(path, `unknown column "${name}"`);
				}
				if (constraint.kind === "default") {
					const column = columns.get(constraint.column);
					if (column) checkDefault({ ...column, default: constraint.value }, `${path}.constraint.value`, catalog, issues);
				}
				if (constraint.kind === "foreign-key" && constraint.columns.length !== constraint.referencedColumns.length) {
					issues.error(path, `${constraint.columns.length} columns reference ${constraint.referencedColumns.length} columns`);
				}
				const name = addedConstraintName(table, constraint);
				if (constraint.kind === "primary-key") {
					if (primaryKey !== undefined) issues.error(path, "table already has a primary key");
					primaryKey = name;
				}
				if (name !== undefined) {
					if (named.has(name)) issues.error(path, `constraint "${name}" already exists`);
					named.set(name, constraintColumns(constraint));
				}
				return;
			}
			case "drop-constraint": {
				const ref = operation.ref;
				if (ref.kind === "named") {
					const covered = named.get(ref.name);
					if (!covered) {
						issues.error(path, `unknown constraint "${ref.name}"`);
					} else if (ref.name === primaryKey) {
						primaryKey = undefined;
					}
					named.delete(ref.name);
				} else if (!columns.has(ref.column)) {
					issues.error(path, `unknown column in ${constraintRefToString(ref)}`);
				}
				return;
			}
		}
	});
}

function addedConstraintName(table: string, constraint: ConstraintDef): string | undefined {
	switch (constraint.kind) {
		case "primary-key":
			return constraint.name ?? `${table}_pkey`;
		case "unique":
			return uniqueName(table, constraint);
		case "foreign-key":
			return foreignKeyName(table, constraint);
		case "not-null":
		case "default":
			return undefined;
	}
}
