import type {
	CanonicalIR,
	ColumnDef,
	ForeignKeyDef,
	IndexDef,
	LineageEdge,
	OperationDef,
	PrimaryKeyDef,
	RepresentationTag,
	UniqueDef,
} from "./model";
import { createSchema } from "./model";
import { ParseError, type SourceSpan } from "./errors";

/**
 * Mutable accumulator the parsers fill while reading a document.
 * `build` produces the immutable IR.
 */
export class IRBuilder {
	private _name: string | undefined;
	private _description: string | undefined;
	private _primaryKey: PrimaryKeyDef | undefined;
	private readonly _columns: ColumnDef[] = [];
	private readonly _foreignKeys: ForeignKeyDef[] = [];
	private readonly _uniques: UniqueDef[] = [];
	private readonly _indexes: IndexDef[] = [];
	private readonly _operations: OperationDef[] = [];
	private readonly _lineage: LineageEdge[] = [];

	constructor(private readonly _repr: RepresentationTag) { }

	get name(): string | undefined {
		return this._name;
	}

	get hasAlterations(): boolean {
		return this._operations.length > 0;
	}

	setName(name: string, span: SourceSpan): void {
		if (this._name !== undefined && this._name !== name) {
			throw new ParseError(this._repr, `Only one table per document is supported; found "${this._name}" and "${name}"`, span);
		}
		this._name = name;
	}

	/** Asserts that a statement targets the table the document defines. */
	checkTable(name: string, span: SourceSpan): void {
		if (this._name === undefined) {
			throw new ParseError(this._repr, `"${name}" is altered before it is created`, span);
		}
		if (name !== this._name) {
			throw new ParseError(this._repr, `Statement targets "${name}" but the document defines "${this._name}"`, span);
		}
	}

	setDescription(description: string): void {
		this._description = description;
	}

	addColumn(column: ColumnDef): void {
		this._columns.push(column);
	}

	hasColumn(name: string): boolean {
		return this._columns.some(c => c.name === name);
	}

	updateColumn(name: string, update: (column: ColumnDef) => ColumnDef): boolean {
		const index = this._columns.findIndex(c => c.name === name);
		if (index === -1) return false;
		this._columns[index] = update(this._columns[index]);
		return true;
	}

	setPrimaryKey(primaryKey: PrimaryKeyDef, span: SourceSpan): void {
		if (this._primaryKey) {
			throw new ParseError(this._repr, "Multiple primary keys", span);
		}
		this._primaryKey = primaryKey;
	}

	addUnique(unique: UniqueDef): void {
		this._uniques.push(unique);
	}

	addForeignKey(fk: ForeignKeyDef): void {
		this._foreignKeys.push(fk);
	}

	addIndex(index: IndexDef): void {
		this._indexes.push(index);
	}

	addOperation(operation: OperationDef): void {
		this._operations.push(operation);
	}

	addLineage(edge: LineageEdge): void {
		this._lineage.push(edge);
	}

	/**
	 * Attach a description to the latest definition of a column:
	 * the column added by the last matching add-column operation, else the table column.
	 */
	describeColumn(name: string, description: string): boolean {
		for (let i = this._operations.length - 1; i >= 0; i--) {
			const op = this._operations[i];
			if (op.kind === "add-column" && op.column.name === name) {
				this._operations[i] = { kind: "add-column", column: { ...op.column, description } };
				return true;
			}
		}
		return this.updateColumn(name, c => ({ ...c, description }));
	}

	build(span: SourceSpan): CanonicalIR {
		if (this._name === undefined) {
			throw new ParseError(this._repr, "No table definition found", span);
		}
		const schema = createSchema(this._name, this._columns, {
			primaryKey: this._primaryKey,
			foreignKeys: this._foreignKeys,
			uniques: this._uniques,
			indexes: this._indexes,
			description: this._description,
		});
		return {
			schema,
			operations: [{ kind: "create" }, ...this._operations],
			lineage: [...this._lineage],
		};
	}
}
