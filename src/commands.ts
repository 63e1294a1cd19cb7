import { Command, Option } from "commander";
import * as fs from "fs";
import type { CanonicalIR, RepresentationTag, SchemaDefinition } from "./model";
import { isRepresentationTag, representations } from "./model";
import type { SchemaIssue } from "./errors";
import { loadConfig, type TranslationConfig } from "./config";
import { TranslationService, type TranslationResult } from "./translationService";
import type { TranslateOptions } from "./translator";
import { DatabaseConnection } from "./database";
import { extractTable } from "./schemaExtractor";
import { generateJsonSchema } from "./jsonSchemaGenerator";

interface OutputOptions {
	readonly output?: string;
}

interface TranslateCommandOptions extends OutputOptions {
	readonly from: string;
	readonly to: string;
	readonly fast?: boolean;
	readonly config?: string;
	readonly reference?: readonly string[];
}

interface IntrospectCommandOptions extends OutputOptions {
	readonly connection: string;
	readonly table: string;
	readonly schema: string;
	readonly to: string;
	readonly fast?: boolean;
	readonly config?: string;
}

interface JsonSchemaCommandOptions extends OutputOptions {
	readonly from?: string;
	readonly connection?: string;
	readonly table?: string;
	readonly schema: string;
}

/** Thrown for command misuse; printed without a stack. */
class UsageError extends Error { }

function representation(value: string): RepresentationTag {
	if (!isRepresentationTag(value)) {
		throw new UsageError(`Unknown representation "${value}"; expected one of ${representations.join(", ")}`);
	}
	return value;
}

function readInput(file: string | undefined): string {
	// fd 0 is stdin
	return fs.readFileSync(file ?? 0, "utf-8");
}

function writeOutput(text: string, options: OutputOptions): void {
	if (options.output) {
		fs.writeFileSync(options.output, text.endsWith("\n") ? text : `${text}\n`);
		console.error(`Written to ${options.output}`);
	} else {
		console.log(text);
	}
}

function printWarnings(warnings: readonly SchemaIssue[]): void {
	for (const warning of warnings) {
		console.error(`warning: ${warning.path}: ${warning.message}`);
	}
}

function translateOptions(config: TranslationConfig, fast: boolean | undefined, referencedSchemas?: readonly SchemaDefinition[]): TranslateOptions {
	return {
		mode: fast ? "Fast" : config.mode,
		indent: config.indent,
		quoteIdentifiers: config.quoteIdentifiers,
		preferredSpellings: config.preferredSpellings,
		referencedSchemas,
	};
}

/** Prints a translation result; a failure sets the exit code. */
function report(result: TranslationResult, options: OutputOptions): void {
	if (result.ok) {
		printWarnings(result.warnings);
		writeOutput(result.text, options);
		return;
	}
	console.error(`${result.error.name}: ${result.error.message}`);
	if (result.text !== undefined) {
		console.error("Unverified output:");
		console.error(result.text);
	}
	process.exitCode = 1;
}

function collect(value: string, previous: readonly string[] = []): readonly string[] {
	return [...previous, value];
}

async function withConnection<T>(connectionString: string, fn: (connection: DatabaseConnection) => Promise<T>): Promise<T> {
	const connection = await DatabaseConnection.connect(connectionString);
	try {
		return await fn(connection);
	} finally {
		await connection.close();
	}
}

/**
 * Build the command line program. `service` is injectable for tests.
 */
export function createProgram(service: TranslationService = new TranslationService()): Command {
	const program = new Command();

	program
		.name("schema-bridge")
		.description("Translate table definitions between SQL DDL, call trees, Mermaid ER diagrams and set notation")
		.version("1.0.0");

	const parseReference = (repr: RepresentationTag, file: string): SchemaDefinition => {
		const parsed = service.parse(repr, readInput(file));
		if (!parsed.ok) {
			throw new UsageError(`${file}: ${parsed.error.message}`);
		}
		return parsed.ir.schema;
	};

	program
		.command("translate")
		.description("Translate a table definition from one representation to another")
		.argument("[file]", "Input file (defaults to stdin)")
		.addOption(new Option("--from <representation>", "Source representation").choices(representations).makeOptionMandatory())
		.addOption(new Option("--to <representation>", "Target representation").choices(representations).makeOptionMandatory())
		.option("--fast", "Skip the round-trip check")
		.option("--config <file>", "Configuration file (defaults to ./schema-bridge.config.json)")
		.option("--reference <file>", "Definition of a referenced table, in the source representation (repeatable)", collect)
		.option("-o, --output <file>", "Output file (defaults to stdout)")
		.action((file: string | undefined, options: TranslateCommandOptions) => {
			const from = representation(options.from);
			const to = representation(options.to);
			const config = loadConfig(options.config);
			const references = (options.reference ?? []).map(f => parseReference(from, f));
			const result = service.translate(from, readInput(file), to, translateOptions(config, options.fast, references));
			report(result, options);
		});

	program
		.command("introspect")
		.description("Read a table definition from a database and emit it in a representation")
		.requiredOption("-c, --connection <string>", "PostgreSQL connection string, or pglite:<dir>")
		.requiredOption("-t, --table <name>", "Table to read")
		.option("--schema <name>", "Database schema", "public")
		.addOption(new Option("--to <representation>", "Target representation").choices(representations).default("DeclarativeQuery"))
		.option("--fast", "Skip the round-trip check")
		.option("--config <file>", "Configuration file (defaults to ./schema-bridge.config.json)")
		.option("-o, --output <file>", "Output file (defaults to stdout)")
		.action(async (options: IntrospectCommandOptions) => {
			const to = representation(options.to);
			const config = loadConfig(options.config);
			const ir = await withConnection(options.connection, c => extractTable(c.client, options.table, options.schema));
			report(service.emit(ir, to, translateOptions(config, options.fast)), options);
		});

	program
		.command("json-schema")
		.description("Emit a JSON Schema describing the rows of a table")
		.argument("[file]", "Input file (defaults to stdin)")
		.addOption(new Option("--from <representation>", "Representation of the input file").choices(representations))
		.option("-c, --connection <string>", "Read the table from a database instead")
		.option("-t, --table <name>", "Table to read from the database")
		.option("--schema <name>", "Database schema", "public")
		.option("-o, --output <file>", "Output file (defaults to stdout)")
		.action(async (file: string | undefined, options: JsonSchemaCommandOptions) => {
			let ir: CanonicalIR;
			if (options.connection !== undefined) {
				const table = options.table;
				if (table === undefined) {
					throw new UsageError("--table is required with --connection");
				}
				ir = await withConnection(options.connection, c => extractTable(c.client, table, options.schema));
			} else {
				if (options.from === undefined) {
					throw new UsageError("--from is required when reading a file");
				}
				const parsed = service.parse(representation(options.from), readInput(file));
				if (!parsed.ok) {
					console.error(`${parsed.error.name}: ${parsed.error.message}`);
					process.exitCode = 1;
					return;
				}
				ir = parsed.ir;
			}
			writeOutput(JSON.stringify(generateJsonSchema(ir.schema), null, 2), options);
		});

	return program;
}

/** Runs the program; errors outside the translation results end up on stderr with exit code 1. */
export async function run(argv: readonly string[], program: Command = createProgram()): Promise<void> {
	try {
		await program.parseAsync([...argv], { from: "user" });
	} catch (e) {
		console.error(e instanceof UsageError || !(e instanceof Error) ? String(e instanceof Error ? e.message : e) : `${e.name}: ${e.message}`);
		process.exitCode = 1;
	}
}
