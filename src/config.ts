import * as fs from "fs";
import * as path from "path";
import Ajv from "ajv";
import type { TranslationMode } from "./translator";

export const configFileName = "schema-bridge.config.json";

export interface TranslationConfig {
	readonly mode?: TranslationMode;
	readonly indent?: string;
	readonly quoteIdentifiers?: "always" | "needed";
	/** Tie-break per default token, e.g. `{ "random-uuid": "gen_random_uuid()" }` */
	readonly preferredSpellings?: Readonly<Record<string, string>>;
}

export class ConfigError extends Error {
	constructor(readonly file: string, detail: string) {
		super(`${file}: ${detail}`);
		this.name = "ConfigError";
	}
}

const configSchema = {
	type: "object",
	properties: {
		$schema: { type: "string" },
		mode: { enum: ["Fast", "Verified"] },
		indent: { type: "string", pattern: "^[ \\t]*$" },
		quoteIdentifiers: { enum: ["always", "needed"] },
		preferredSpellings: {
			type: "object",
			propertyNames: { enum: ["current-timestamp", "current-date", "current-time", "random-uuid"] },
			additionalProperties: { type: "string" },
		},
	},
	additionalProperties: false,
};

const validateConfig = new Ajv({ allErrors: true }).compile<TranslationConfig>(configSchema);

/**
 * Validate parsed JSON as a configuration.
 * @throws ConfigError with the validation messages
 */
export function parseConfig(value: unknown, file = "<config>"): TranslationConfig {
	if (!validateConfig(value)) {
		const messages = (validateConfig.errors ?? []).map(e => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`);
		throw new ConfigError(file, messages.join("; "));
	}
	return value;
}

/**
 * Read the configuration from `file`, or from `schema-bridge.config.json` in `cwd` when it exists.
 * No file means the defaults.
 */
export function loadConfig(file?: string, cwd: string = process.cwd()): TranslationConfig {
	const configPath = file !== undefined ? path.resolve(cwd, file) : path.join(cwd, configFileName);
	if (file === undefined && !fs.existsSync(configPath)) {
		return {};
	}

	let content: string;
	try {
		content = fs.readFileSync(configPath, "utf-8");
	} catch (e) {
		throw new ConfigError(configPath, e instanceof Error ? e.message : String(e));
	}

	let value: unknown;
	try {
		value = JSON.parse(content);
	} catch (e) {
		throw new ConfigError(configPath, `invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
	}
	return parseConfig(value, configPath);
}
