import type { Catalog } from "./catalog";
import { defaultCatalog } from "./catalog";
import type { CanonicalIR, RepresentationTag, SchemaDefinition } from "./model";
import { InvariantViolationError, TranslationError, type SchemaIssue } from "./errors";
import { checkpoint, type FormatOptions, type RepresentationAdapter } from "./adapter";
import { SqlAdapter } from "./sqlAdapter";
import { CallTreeAdapter } from "./callTreeAdapter";
import { MermaidAdapter } from "./mermaidAdapter";
import { SetAdapter } from "./setAdapter";
import { validateIR } from "./validator";
import { compareIR } from "./roundTrip";

export type TranslationMode = "Fast" | "Verified";

export interface TranslateOptions extends FormatOptions {
	/** `Verified` (default) re-parses the output and compares it with the source IR */
	readonly mode?: TranslationMode;
	/** Tables foreign keys may reference, for checking the referenced columns */
	readonly referencedSchemas?: readonly SchemaDefinition[];
}

export interface Translation {
	readonly text: string;
	readonly ir: CanonicalIR;
	readonly warnings: readonly SchemaIssue[];
}

export type AdapterRegistry = { readonly [R in RepresentationTag]: RepresentationAdapter };

export function createAdapters(catalog: Catalog = defaultCatalog): AdapterRegistry {
	return {
		DeclarativeQuery: new SqlAdapter(catalog),
		FunctionalCall: new CallTreeAdapter(catalog),
		Graph: new MermaidAdapter(catalog),
		Set: new SetAdapter(catalog),
	};
}

/** The generator's own output must read back; when it does not, the text is returned unverified. */
function reparseOwnOutput(adapter: RepresentationAdapter, output: string): CanonicalIR {
	try {
		return adapter.parse(output);
	} catch (e) {
		if (e instanceof TranslationError) {
			throw new InvariantViolationError(
				[{ category: "Cardinality", path: "schema", expected: `text readable as ${adapter.representation}`, actual: e.message }],
				output
			);
		}
		throw e;
	}
}

/**
 * Parse, validate, generate and (in Verified mode) re-parse and compare.
 * Holds nothing but the adapters and the catalog, so one instance serves any number of requests.
 */
export class Translator {
	constructor(
		private readonly _adapters: AdapterRegistry = createAdapters(),
		private readonly _catalog: Catalog = defaultCatalog
	) { }

	parse(repr: RepresentationTag, text: string): CanonicalIR {
		return this._adapters[repr].parse(text);
	}

	/**
	 * @throws TranslationError subclasses; never returns partial output
	 */
	translate(source: RepresentationTag, text: string, target: RepresentationTag, options: TranslateOptions = {}): Translation {
		checkpoint(options.signal, "parse");
		const ir = this.parse(source, text);
		return this.emit(ir, target, options);
	}

	/** Generate an IR that did not come from text, such as one read from a database. */
	emit(ir: CanonicalIR, target: RepresentationTag, options: TranslateOptions = {}): Translation {
		checkpoint(options.signal, "validation");
		const warnings = validateIR(ir, { referencedSchemas: options.referencedSchemas }, this._catalog);

		checkpoint(options.signal, "generation");
		const adapter = this._adapters[target];
		const output = adapter.generate(ir, options);

		if ((options.mode ?? "Verified") === "Verified") {
			checkpoint(options.signal, "verification");
			const violations = compareIR(ir, reparseOwnOutput(adapter, output));
			if (violations.length > 0) {
				throw new InvariantViolationError(violations, output);
			}
		}

		checkpoint(options.signal, "completion");
		return { text: output, ir, warnings };
	}
}
