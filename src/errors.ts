import type { RepresentationTag } from "./model";

export interface SourceSpan {
	/** Zero-based character offset */
	readonly offset: number;
	/** One-based line */
	readonly line: number;
	/** One-based column */
	readonly column: number;
	readonly length: number;
}

export type TranslationErrorCode =
	| "parse-error"
	| "unknown-type"
	| "unknown-constraint"
	| "unsupported-construct"
	| "invariant-violation"
	| "ambiguous-mapping"
	| "invalid-schema"
	| "cancelled";

/**
 * Base class of every failure a translation request can end in.
 * None of them is retried: translation is deterministic.
 */
export abstract class TranslationError extends Error {
	abstract readonly code: TranslationErrorCode;

	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

function describeSpan(span: SourceSpan | undefined): string {
	return span ? ` at ${span.line}:${span.column}` : "";
}

export class ParseError extends TranslationError {
	readonly code = "parse-error";

	constructor(
		readonly representation: RepresentationTag,
		readonly detail: string,
		readonly span: SourceSpan
	) {
		super(`${representation}: ${detail}${describeSpan(span)}`);
	}
}

export class UnknownTypeError extends TranslationError {
	readonly code = "unknown-type";

	constructor(
		readonly token: string,
		readonly representation: RepresentationTag,
		readonly span?: SourceSpan
	) {
		super(`Unknown type "${token}" in ${representation}${describeSpan(span)}`);
	}
}

export class UnknownConstraintError extends TranslationError {
	readonly code = "unknown-constraint";

	constructor(
		readonly token: string,
		readonly representation: RepresentationTag,
		readonly span?: SourceSpan
	) {
		super(`Unknown constraint "${token}" in ${representation}${describeSpan(span)}`);
	}
}

export class UnsupportedConstructError extends TranslationError {
	readonly code = "unsupported-construct";

	/**
	 * @param fragment the offending source text or IR fragment
	 * @param source representation the construct came from
	 * @param target representation that cannot express it
	 */
	constructor(
		readonly fragment: string,
		readonly source: RepresentationTag | "IR",
		readonly target: RepresentationTag | "IR",
		readonly span?: SourceSpan
	) {
		super(`${fragment} cannot be translated from ${source} to ${target}${describeSpan(span)}`);
	}
}

export type InvariantCategory = "Cardinality" | "Constraints" | "Types" | "OperationOrder" | "Metadata";

export interface InvariantViolation {
	readonly category: InvariantCategory;
	/** Location in the IR, e.g. `columns.email.type` */
	readonly path: string;
	readonly expected: string;
	readonly actual: string;
}

export class InvariantViolationError extends TranslationError {
	readonly code = "invariant-violation";

	constructor(
		readonly violations: readonly InvariantViolation[],
		/** Generated target text; unverified. */
		readonly text: string
	) {
		super(
			`Round-trip check failed: ${violations
				.map(v => `[${v.category}] ${v.path}: expected ${v.expected}, got ${v.actual}`)
				.join("; ")}`
		);
	}

	get categories(): InvariantCategory[] {
		return [...new Set(this.violations.map(v => v.category))];
	}
}

export class AmbiguousMappingError extends TranslationError {
	readonly code = "ambiguous-mapping";

	constructor(
		readonly construct: string,
		readonly representation: RepresentationTag,
		readonly candidates: readonly string[]
	) {
		super(
			`${construct} has ${candidates.length} equally valid spellings in ${representation} (${candidates.join(", ")}); configure a preferred spelling`
		);
	}
}

export interface SchemaIssue {
	readonly severity: "error" | "warning";
	readonly path: string;
	readonly message: string;
}

export class InvalidSchemaError extends TranslationError {
	readonly code = "invalid-schema";

	constructor(readonly issues: readonly SchemaIssue[]) {
		super(`Invalid schema: ${issues.map(i => `${i.path}: ${i.message}`).join("; ")}`);
	}
}

export class TranslationCancelledError extends TranslationError {
	readonly code = "cancelled";

	constructor(readonly phase: string) {
		super(`Translation cancelled during ${phase}`);
	}
}
