import type { Catalog } from "./catalog";
import { defaultCatalog } from "./catalog";
import type { CanonicalIR, RepresentationTag } from "./model";
import { InvariantViolationError, TranslationError, type SchemaIssue } from "./errors";
import { createAdapters, Translator, type AdapterRegistry, type TranslateOptions } from "./translator";

export type TranslationResult =
	| { readonly ok: true; readonly text: string; readonly warnings: readonly SchemaIssue[] }
	/** `text` is set for invariant violations and must be treated as unverified */
	| { readonly ok: false; readonly error: TranslationError; readonly text?: string };

/**
 * Public entry point: maps every translation failure to a result value.
 * Errors that are not translation errors are bugs and propagate.
 */
export class TranslationService {
	private readonly _translator: Translator;

	constructor(catalog: Catalog = defaultCatalog, adapters: AdapterRegistry = createAdapters(catalog)) {
		this._translator = new Translator(adapters, catalog);
	}

	translate(
		source: RepresentationTag,
		text: string,
		target: RepresentationTag,
		options: TranslateOptions = {}
	): TranslationResult {
		return this._run(() => this._translator.translate(source, text, target, options));
	}

	emit(ir: CanonicalIR, target: RepresentationTag, options: TranslateOptions = {}): TranslationResult {
		return this._run(() => this._translator.emit(ir, target, options));
	}

	/** Parse only; used to read referenced schemas. */
	parse(repr: RepresentationTag, text: string): { readonly ok: true; readonly ir: CanonicalIR } | { readonly ok: false; readonly error: TranslationError } {
		try {
			return { ok: true, ir: this._translator.parse(repr, text) };
		} catch (e) {
			if (e instanceof TranslationError) return { ok: false, error: e };
			throw e;
		}
	}

	private _run(fn: () => { text: string; warnings: readonly SchemaIssue[] }): TranslationResult {
		try {
			const { text, warnings } = fn();
			return { ok: true, text, warnings };
		} catch (e) {
			if (e instanceof InvariantViolationError) {
				return { ok: false, error: e, text: e.text };
			}
			if (e instanceof TranslationError) {
				return { ok: false, error: e };
			}
			throw e;
		}
	}
}

const defaultService = new TranslationService();

/** Translate with a service over the default catalog. */
export function translate(
	source: RepresentationTag,
	text: string,
	target: RepresentationTag,
	options: TranslateOptions = {}
): TranslationResult {
	return defaultService.translate(source, text, target, options);
}
