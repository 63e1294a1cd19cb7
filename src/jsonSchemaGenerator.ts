import type { Catalog } from "./catalog";
import { defaultCatalog } from "./catalog";
import type { ColumnDef, SchemaDefinition } from "./model";

export interface JsonSchema {
	readonly $schema: string;
	readonly title: string;
	readonly description?: string;
	readonly type: string;
	readonly properties: Record<string, unknown>;
	readonly required?: readonly string[];
	readonly additionalProperties: boolean;
}

/**
 * Generate a JSON Schema describing one row of a table.
 * This enables autocomplete and validation of fixtures in editors.
 */
export function generateJsonSchema(schema: SchemaDefinition, catalog: Catalog = defaultCatalog): JsonSchema {
	const properties: Record<string, unknown> = {};
	const required: string[] = [];

	for (const column of schema.columns) {
		properties[column.name] = columnToJsonSchemaType(column, catalog);

		// Required if: not nullable AND no default
		if (!column.nullable && !column.default) {
			required.push(column.name);
		}
	}

	return {
		$schema: "http://json-schema.org/draft-07/schema#",
		title: schema.name,
		...(schema.description !== undefined ? { description: schema.description } : {}),
		type: "object",
		properties,
		...(required.length > 0 ? { required } : {}),
		additionalProperties: false,
	};
}

function columnToJsonSchemaType(column: ColumnDef, catalog: Catalog): Record<string, unknown> {
	let baseType: Record<string, unknown> = { ...catalog.jsonSchemaFor(column.type) };
	if ((column.type.base === "varchar" || column.type.base === "char") && column.type.params.length === 1) {
		baseType = { ...baseType, maxLength: column.type.params[0] };
	}
	if (column.description !== undefined) {
		baseType = { ...baseType, description: column.description };
	}

	if (column.nullable) {
		const type = baseType["type"];
		// Allow null values
		if (typeof type === "string") {
			return { ...baseType, type: [type, "null"] };
		}
		if (type === undefined) {
			// Any JSON value, null included
			return baseType;
		}
		return { oneOf: [baseType, { type: "null" }] };
	}

	return baseType;
}
