import type {
	CanonicalType,
	ConstraintKind,
	DefaultExpr,
	DefaultToken,
	LogicalType,
	ReferentialAction,
	RepresentationTag,
} from "./model";
import { representations } from "./model";
import { AmbiguousMappingError, UnknownTypeError, UnsupportedConstructError } from "./errors";

type PerRepresentation<T> = { readonly [R in RepresentationTag]: T };

interface TypeEntry {
	readonly base: CanonicalType;
	/** Allowed parameter counts */
	readonly arity: readonly number[];
	readonly spellings: PerRepresentation<string>;
	/** Parse-only spellings */
	readonly aliases?: Partial<PerRepresentation<readonly string[]>>;
	readonly jsonSchema: Readonly<Record<string, unknown>>;
}

interface TokenEntry {
	readonly token: DefaultToken;
	/** Generation candidates; more than one without a configured preference is ambiguous, none is unsupported */
	readonly spellings: PerRepresentation<readonly string[]>;
	readonly aliases?: Partial<PerRepresentation<readonly string[]>>;
	readonly compatibleTypes: readonly CanonicalType[];
}

export type Construct = "alter-operations" | "lineage" | "descriptions" | "indexes";

interface ParamStyle {
	readonly open: string;
	readonly separator: string;
	readonly close: string;
}

export interface CatalogData {
	readonly types: readonly TypeEntry[];
	readonly tokens: readonly TokenEntry[];
	readonly referentialActions: { readonly [A in ReferentialAction]: PerRepresentation<string> };
	readonly constraintKeywords: { readonly [K in ConstraintKind]: PerRepresentation<string> };
	/** Spellings that are recognised but have no canonical equivalent */
	readonly unsupportedConstructs: PerRepresentation<readonly string[]>;
	readonly paramStyles: PerRepresentation<ParamStyle>;
	readonly capabilities: PerRepresentation<readonly Construct[]>;
}

const sqlTypes = (dq: string, graph: string, set: string) => ({
	DeclarativeQuery: dq,
	FunctionalCall: dq,
	Graph: graph,
	Set: set,
});

const numericTypes: readonly CanonicalType[] = ["smallint", "integer", "bigint", "decimal", "double"];
const stringTypes: readonly CanonicalType[] = [
	"text", "varchar", "char", "date", "time", "timestamp", "timestamptz", "uuid", "json", "bytes",
];

export const builtinCatalogData: CatalogData = {
	types: [
		{
			base: "smallint", arity: [0], spellings: sqlTypes("SMALLINT", "smallint", "SmallInt"),
			aliases: { DeclarativeQuery: ["INT2"], FunctionalCall: ["INT2"] },
			jsonSchema: { type: "integer" },
		},
		{
			base: "integer", arity: [0], spellings: sqlTypes("INTEGER", "int", "Int"),
			aliases: { DeclarativeQuery: ["INT", "INT4"], FunctionalCall: ["INT", "INT4"], Graph: ["integer"] },
			jsonSchema: { type: "integer" },
		},
		{
			base: "bigint", arity: [0], spellings: sqlTypes("BIGINT", "bigint", "BigInt"),
			aliases: { DeclarativeQuery: ["INT8"], FunctionalCall: ["INT8"] },
			// JSON can't represent bigint precisely, use string
			jsonSchema: { type: "string", pattern: "^-?\\d+$" },
		},
		{
			base: "decimal", arity: [0, 1, 2], spellings: sqlTypes("DECIMAL", "decimal", "Decimal"),
			aliases: { DeclarativeQuery: ["NUMERIC"], FunctionalCall: ["NUMERIC"] },
			jsonSchema: { type: "number" },
		},
		{
			base: "double", arity: [0], spellings: sqlTypes("DOUBLE PRECISION", "double", "Double"),
			aliases: { DeclarativeQuery: ["FLOAT8", "DOUBLE"], FunctionalCall: ["FLOAT8", "DOUBLE"], Graph: ["float"] },
			jsonSchema: { type: "number" },
		},
		{
			base: "boolean", arity: [0], spellings: sqlTypes("BOOLEAN", "bool", "Bool"),
			aliases: { DeclarativeQuery: ["BOOL"], FunctionalCall: ["BOOL"], Graph: ["boolean"] },
			jsonSchema: { type: "boolean" },
		},
		{
			base: "text", arity: [0], spellings: sqlTypes("TEXT", "string", "Text"),
			aliases: { Graph: ["text"] },
			jsonSchema: { type: "string" },
		},
		{
			base: "varchar", arity: [0, 1], spellings: sqlTypes("VARCHAR", "varchar", "VarChar"),
			aliases: { DeclarativeQuery: ["CHARACTER VARYING"], FunctionalCall: ["CHARACTER VARYING"] },
			jsonSchema: { type: "string" },
		},
		{
			base: "char", arity: [0, 1], spellings: sqlTypes("CHAR", "char", "Char"),
			aliases: { DeclarativeQuery: ["CHARACTER", "BPCHAR"], FunctionalCall: ["CHARACTER", "BPCHAR"] },
			jsonSchema: { type: "string" },
		},
		{
			base: "date", arity: [0], spellings: sqlTypes("DATE", "date", "Date"),
			jsonSchema: { type: "string", format: "date" },
		},
		{
			base: "time", arity: [0], spellings: sqlTypes("TIME", "time", "Time"),
			aliases: { DeclarativeQuery: ["TIME WITHOUT TIME ZONE"], FunctionalCall: ["TIME WITHOUT TIME ZONE"] },
			jsonSchema: { type: "string", format: "time" },
		},
		{
			base: "timestamp", arity: [0], spellings: sqlTypes("TIMESTAMP", "timestamp", "Timestamp"),
			aliases: { DeclarativeQuery: ["TIMESTAMP WITHOUT TIME ZONE"], FunctionalCall: ["TIMESTAMP WITHOUT TIME ZONE"] },
			jsonSchema: { type: "string", format: "date-time" },
		},
		{
			base: "timestamptz", arity: [0], spellings: sqlTypes("TIMESTAMPTZ", "timestamptz", "TimestampTz"),
			aliases: { DeclarativeQuery: ["TIMESTAMP WITH TIME ZONE"], FunctionalCall: ["TIMESTAMP WITH TIME ZONE"] },
			jsonSchema: { type: "string", format: "date-time" },
		},
		{
			base: "uuid", arity: [0], spellings: sqlTypes("UUID", "uuid", "Uuid"),
			jsonSchema: {
				type: "string",
				format: "uuid",
				pattern: "^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$",
			},
		},
		{
			base: "json", arity: [0], spellings: sqlTypes("JSON", "json", "Json"),
			jsonSchema: {},
		},
		{
			base: "bytes", arity: [0], spellings: sqlTypes("BYTEA", "bytes", "Bytes"),
			aliases: { DeclarativeQuery: ["BLOB"], FunctionalCall: ["BLOB"] },
			jsonSchema: { type: "string", contentEncoding: "base64" },
		},
	],
	tokens: [
		{
			token: "current-timestamp",
			spellings: {
				DeclarativeQuery: ["CURRENT_TIMESTAMP"],
				FunctionalCall: ["CURRENT_TIMESTAMP"],
				Graph: ["current_timestamp"],
				Set: ["now"],
			},
			aliases: { DeclarativeQuery: ["now()"], FunctionalCall: ["now()"] },
			compatibleTypes: ["timestamp", "timestamptz"],
		},
		{
			token: "current-date",
			spellings: {
				DeclarativeQuery: ["CURRENT_DATE"],
				FunctionalCall: ["CURRENT_DATE"],
				Graph: ["current_date"],
				Set: ["today"],
			},
			compatibleTypes: ["date"],
		},
		{
			token: "current-time",
			spellings: {
				DeclarativeQuery: ["CURRENT_TIME"],
				FunctionalCall: ["CURRENT_TIME"],
				Graph: ["current_time"],
				Set: ["clock"],
			},
			compatibleTypes: ["time"],
		},
		{
			token: "random-uuid",
			spellings: {
				DeclarativeQuery: ["gen_random_uuid()", "uuid_generate_v4()"],
				FunctionalCall: ["gen_random_uuid()"],
				Graph: ["random_uuid"],
				Set: [],
			},
			compatibleTypes: ["uuid"],
		},
	],
	referentialActions: {
		"cascade": { DeclarativeQuery: "CASCADE", FunctionalCall: "CASCADE", Graph: "cascade", Set: "cascade" },
		"restrict": { DeclarativeQuery: "RESTRICT", FunctionalCall: "RESTRICT", Graph: "restrict", Set: "restrict" },
		"set-null": { DeclarativeQuery: "SET NULL", FunctionalCall: "SET NULL", Graph: "set null", Set: "set-null" },
		"set-default": { DeclarativeQuery: "SET DEFAULT", FunctionalCall: "SET DEFAULT", Graph: "set default", Set: "set-default" },
		"no-action": { DeclarativeQuery: "NO ACTION", FunctionalCall: "NO ACTION", Graph: "no action", Set: "no-action" },
	},
	constraintKeywords: {
		"primary-key": { DeclarativeQuery: "PRIMARY KEY", FunctionalCall: "primary_key", Graph: "PK", Set: "key" },
		"not-null": { DeclarativeQuery: "NOT NULL", FunctionalCall: "not_null", Graph: "not null", Set: "total" },
		"unique": { DeclarativeQuery: "UNIQUE", FunctionalCall: "unique", Graph: "UK", Set: "unique" },
		"foreign-key": { DeclarativeQuery: "FOREIGN KEY", FunctionalCall: "foreign_keys", Graph: "FK", Set: "refs" },
		"default": { DeclarativeQuery: "DEFAULT", FunctionalCall: "default", Graph: "default", Set: "default" },
	},
	unsupportedConstructs: {
		DeclarativeQuery: ["CHECK", "COLLATE", "GENERATED", "EXCLUDE"],
		FunctionalCall: [
			"check", "collate", "generated_as", "generated_type",
			"source_table", "or_replace", "temp", "if_not_exists", "schema",
		],
		Graph: ["check", "collate", "generated"],
		Set: ["check", "collate", "generated"],
	},
	paramStyles: {
		DeclarativeQuery: { open: "(", separator: ",", close: ")" },
		FunctionalCall: { open: "(", separator: ",", close: ")" },
		// Mermaid attribute types cannot contain commas
		Graph: { open: "(", separator: "-", close: ")" },
		Set: { open: "[", separator: ",", close: "]" },
	},
	capabilities: {
		DeclarativeQuery: ["alter-operations", "descriptions", "indexes"],
		FunctionalCall: ["alter-operations", "descriptions", "indexes"],
		Graph: ["lineage", "descriptions", "indexes"],
		Set: ["alter-operations", "descriptions", "indexes"],
	},
};

export type DefaultCompatibility = { readonly ok: true } | { readonly ok: false; readonly reason: string };

/**
 * Type and constraint mapping tables.
 * Built once and never mutated afterwards; adapters and the core share one instance.
 */
export class Catalog {
	private readonly _typesByBase = new Map<CanonicalType, TypeEntry>();
	private readonly _typesBySpelling = new Map<RepresentationTag, Map<string, TypeEntry>>();
	private readonly _tokensByName = new Map<DefaultToken, TokenEntry>();
	private readonly _tokensBySpelling = new Map<RepresentationTag, Map<string, DefaultToken>>();
	private readonly _actionsBySpelling = new Map<RepresentationTag, Map<string, ReferentialAction>>();

	private constructor(private readonly _data: CatalogData) {
		for (const repr of representations) {
			this._typesBySpelling.set(repr, new Map());
			this._tokensBySpelling.set(repr, new Map());
			this._actionsBySpelling.set(repr, new Map());
		}

		for (const entry of _data.types) {
			this._typesByBase.set(entry.base, entry);
			for (const repr of representations) {
				const bySpelling = this._lookup(this._typesBySpelling, repr);
				for (const spelling of [entry.spellings[repr], ...(entry.aliases?.[repr] ?? [])]) {
					bySpelling.set(normalizeSpelling(spelling), entry);
				}
			}
		}

		for (const entry of _data.tokens) {
			this._tokensByName.set(entry.token, entry);
			for (const repr of representations) {
				const bySpelling = this._lookup(this._tokensBySpelling, repr);
				for (const spelling of [...entry.spellings[repr], ...(entry.aliases?.[repr] ?? [])]) {
					bySpelling.set(normalizeSpelling(spelling), entry.token);
				}
			}
		}

		for (const [action, spellings] of Object.entries(_data.referentialActions)) {
			if (!isReferentialAction(action)) continue;
			for (const repr of representations) {
				this._lookup(this._actionsBySpelling, repr).set(normalizeSpelling(spellings[repr]), action);
			}
		}

		Object.freeze(this);
	}

	static create(data: CatalogData = builtinCatalogData): Catalog {
		return new Catalog(data);
	}

	private _lookup<T>(maps: Map<RepresentationTag, Map<string, T>>, repr: RepresentationTag): Map<string, T> {
		const map = maps.get(repr);
		if (!map) {
			throw new Error(`Catalog has no table for ${repr}`);
		}
		return map;
	}

	// === Types ===

	/** Spelling of a canonical type, parameters included, e.g. `DECIMAL(10,2)`. */
	mapType(type: LogicalType, repr: RepresentationTag): string {
		const entry = this._typesByBase.get(type.base);
		if (!entry) {
			throw new UnsupportedConstructError(`type ${type.base}`, "IR", repr);
		}
		const spelling = entry.spellings[repr];
		if (type.params.length === 0) {
			return spelling;
		}
		const style = this._data.paramStyles[repr];
		return `${spelling}${style.open}${type.params.join(style.separator)}${style.close}`;
	}

	/**
	 * Resolve a spelling (parameters included) to its canonical type.
	 * @throws UnknownTypeError when the spelling has no canonical counterpart
	 */
	resolveType(spelling: string, repr: RepresentationTag): LogicalType {
		const style = this._data.paramStyles[repr];
		let name = spelling.trim();
		let params: number[] = [];

		const open = name.indexOf(style.open);
		if (open !== -1 && name.endsWith(style.close)) {
			const inner = name.slice(open + style.open.length, name.length - style.close.length);
			const parts = inner.split(style.separator).map(p => p.trim());
			if (!parts.every(p => /^\d+$/.test(p))) {
				throw new UnknownTypeError(spelling, repr);
			}
			params = parts.map(p => Number(p));
			name = name.slice(0, open).trim();
		}

		const entry = this._lookup(this._typesBySpelling, repr).get(normalizeSpelling(name));
		if (!entry || !entry.arity.includes(params.length)) {
			throw new UnknownTypeError(spelling, repr);
		}
		return { base: entry.base, params };
	}

	/** True when `prefix` begins some multi-word type spelling, so a parser should keep reading words. */
	continuesTypeSpelling(prefix: string, repr: RepresentationTag): boolean {
		const normalized = normalizeSpelling(prefix) + " ";
		for (const spelling of this._lookup(this._typesBySpelling, repr).keys()) {
			if (spelling.startsWith(normalized)) return true;
		}
		return false;
	}

	isKnownType(spelling: string, repr: RepresentationTag): boolean {
		return this._lookup(this._typesBySpelling, repr).has(normalizeSpelling(spelling));
	}

	jsonSchemaFor(type: LogicalType): Readonly<Record<string, unknown>> {
		return this._typesByBase.get(type.base)?.jsonSchema ?? { type: "string" };
	}

	// === Default tokens ===

	/**
	 * @throws UnsupportedConstructError when the representation cannot spell the token
	 * @throws AmbiguousMappingError when several spellings qualify and no preference picks one
	 */
	mapDefaultToken(
		token: DefaultToken,
		repr: RepresentationTag,
		preferred: Readonly<Record<string, string>> = {}
	): string {
		const candidates = this._tokensByName.get(token)?.spellings[repr] ?? [];
		if (candidates.length === 0) {
			throw new UnsupportedConstructError(`default token ${token}`, "IR", repr);
		}
		if (candidates.length === 1) {
			return candidates[0];
		}
		const choice = preferred[token];
		if (choice !== undefined && candidates.includes(choice)) {
			return choice;
		}
		throw new AmbiguousMappingError(`default token ${token}`, repr, candidates);
	}

	resolveDefaultToken(spelling: string, repr: RepresentationTag): DefaultToken | undefined {
		return this._lookup(this._tokensBySpelling, repr).get(normalizeSpelling(spelling));
	}

	isDefaultCompatible(type: LogicalType, value: DefaultExpr): DefaultCompatibility {
		if (value.kind === "token") {
			const entry = this._tokensByName.get(value.token);
			if (entry && entry.compatibleTypes.includes(type.base)) return { ok: true };
			return { ok: false, reason: `${value.token} cannot default a ${type.base} column` };
		}

		const literal = value.literal;
		switch (literal.kind) {
			case "null":
				return { ok: true };
			case "boolean":
				return type.base === "boolean"
					? { ok: true }
					: { ok: false, reason: `boolean literal cannot default a ${type.base} column` };
			case "number":
				return numericTypes.includes(type.base)
					? { ok: true }
					: { ok: false, reason: `numeric literal cannot default a ${type.base} column` };
			case "string":
				return stringTypes.includes(type.base)
					? { ok: true }
					: { ok: false, reason: `string literal cannot default a ${type.base} column` };
		}
	}

	// === Constraints ===

	mapReferentialAction(action: ReferentialAction, repr: RepresentationTag): string {
		return this._data.referentialActions[action][repr];
	}

	resolveReferentialAction(spelling: string, repr: RepresentationTag): ReferentialAction | undefined {
		return this._lookup(this._actionsBySpelling, repr).get(normalizeSpelling(spelling));
	}

	constraintKeyword(kind: ConstraintKind, repr: RepresentationTag): string {
		return this._data.constraintKeywords[kind][repr];
	}

	/** Recognised spellings with no canonical equivalent, such as CHECK. */
	isUnsupportedConstruct(spelling: string, repr: RepresentationTag): boolean {
		const normalized = normalizeSpelling(spelling);
		return this._data.unsupportedConstructs[repr].some(s => normalizeSpelling(s) === normalized);
	}

	supports(repr: RepresentationTag, construct: Construct): boolean {
		return this._data.capabilities[repr].includes(construct);
	}
}

function normalizeSpelling(spelling: string): string {
	return spelling.trim().replace(/\s+/g, " ").toLowerCase();
}

function isReferentialAction(value: string): value is ReferentialAction {
	return ["cascade", "restrict", "set-null", "set-default", "no-action"].includes(value);
}

export const defaultCatalog = Catalog.create();
