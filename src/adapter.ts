import type { Catalog } from "./catalog";
import type { CanonicalIR, RepresentationTag } from "./model";
import { TranslationCancelledError, UnsupportedConstructError } from "./errors";

export interface FormatOptions {
	/** Indentation unit (default: two spaces, four for Mermaid) */
	readonly indent?: string;
	/** Quote identifiers always, or only where the syntax requires it (default) */
	readonly quoteIdentifiers?: "always" | "needed";
	/** Chosen spelling per default token where a representation offers several */
	readonly preferredSpellings?: Readonly<Record<string, string>>;
	/** Checked between operations; cancellation raises instead of truncating */
	readonly signal?: AbortSignal;
}

/**
 * Parse/generate pair for one surface syntax.
 * `generate` must be a pure function of the IR and the options.
 */
export interface RepresentationAdapter {
	readonly representation: RepresentationTag;
	parse(text: string): CanonicalIR;
	generate(ir: CanonicalIR, options?: FormatOptions): string;
}

export function checkpoint(signal: AbortSignal | undefined, phase: string): void {
	if (signal?.aborted) {
		throw new TranslationCancelledError(phase);
	}
}

/**
 * Fail closed when the IR holds a construct the target representation has no spelling for.
 */
export function assertExpressible(ir: CanonicalIR, repr: RepresentationTag, catalog: Catalog): void {
	if (ir.lineage.length > 0 && !catalog.supports(repr, "lineage")) {
		const edge = ir.lineage[0];
		throw new UnsupportedConstructError(`lineage edge ${edge.from} -> ${edge.to}`, "IR", repr);
	}
	const alteration = ir.operations.find(op => op.kind !== "create");
	if (alteration && !catalog.supports(repr, "alter-operations")) {
		throw new UnsupportedConstructError(`${alteration.kind} operation`, "IR", repr);
	}
	if (ir.schema.indexes.length > 0 && !catalog.supports(repr, "indexes")) {
		throw new UnsupportedConstructError(`index ${ir.schema.indexes[0].name}`, "IR", repr);
	}
	const described = ir.schema.description !== undefined || ir.schema.columns.some(c => c.description !== undefined);
	if (described && !catalog.supports(repr, "descriptions")) {
		throw new UnsupportedConstructError("description", "IR", repr);
	}
}
