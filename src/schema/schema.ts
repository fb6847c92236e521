/**
 * Schema: table name → definitions for every known version.
 * The schema is supplied from outside (JSON file or object); this module only looks definitions up.
 */

import { readFileSync } from "node:fs";
import { SchemaError } from "../errors.js";
import { type Definition, type Field, type FieldType, PRIMITIVE_FIELD_TYPES, type PrimitiveFieldType } from "./types.js";

export class Schema {
	private readonly tables = new Map<string, Definition[]>();

	constructor(definitions: Record<string, Definition[]> = {}) {
		for (const [table, list] of Object.entries(definitions)) {
			for (const definition of list) this.add(table, definition);
		}
	}

	add(table: string, definition: Definition): void {
		const list = this.tables.get(table) ?? [];
		const existing = list.findIndex((d) => d.version === definition.version);
		if (existing >= 0) list[existing] = definition;
		else list.push(definition);
		list.sort((a, b) => b.version - a.version);
		this.tables.set(table, list);
	}

	tableNames(): string[] {
		return [...this.tables.keys()].sort();
	}

	definitions(table: string): Definition[] {
		return this.tables.get(table) ?? [];
	}

	find(table: string, version: number): Definition | undefined {
		return this.tables.get(table)?.find((d) => d.version === version);
	}

	/** Definition for table name X at version V, or SchemaError. */
	definition(table: string, version: number): Definition {
		const found = this.find(table, version);
		if (!found) {
			throw new SchemaError(`No definition found for table "${table}", version ${version}`);
		}
		return found;
	}

	latest(table: string): Definition | undefined {
		return this.tables.get(table)?.[0];
	}

	toJSON(): { definitions: Record<string, Definition[]> } {
		return { definitions: Object.fromEntries(this.tables) };
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPrimitiveFieldType(value: unknown): value is PrimitiveFieldType {
	return typeof value === "string" && PRIMITIVE_FIELD_TYPES.some((t) => t === value);
}

function parseFieldType(raw: unknown, where: string): FieldType {
	if (isPrimitiveFieldType(raw)) return raw;
	if (isRecord(raw) && (raw.sequence === "U16" || raw.sequence === "U32")) {
		return { sequence: raw.sequence, definition: parseDefinition(raw.definition, `${where}.definition`) };
	}
	throw new SchemaError(`${where}: unknown field type ${JSON.stringify(raw)}`);
}

function parseEnumValues(raw: unknown, where: string): Record<number, string> {
	if (raw === undefined) return {};
	if (!isRecord(raw)) throw new SchemaError(`${where}: enumValues must be an object`);
	const values: Record<number, string> = {};
	for (const [key, value] of Object.entries(raw)) {
		const numeric = Number(key);
		if (!Number.isInteger(numeric) || typeof value !== "string") {
			throw new SchemaError(`${where}: invalid enum entry ${key}`);
		}
		values[numeric] = value;
	}
	return values;
}

function parseField(raw: unknown, where: string): Field {
	if (!isRecord(raw) || typeof raw.name !== "string") {
		throw new SchemaError(`${where}: field needs a name`);
	}
	const field: Field = {
		name: raw.name,
		fieldType: parseFieldType(raw.fieldType, `${where}.${raw.name}`),
		isKey: raw.isKey === true,
		isBitwise: typeof raw.isBitwise === "number" ? raw.isBitwise : 0,
		enumValues: parseEnumValues(raw.enumValues, `${where}.${raw.name}`)
	};
	if (typeof raw.defaultValue === "string") field.defaultValue = raw.defaultValue;
	if (typeof raw.isPartOfColour === "number") field.isPartOfColour = raw.isPartOfColour;
	if (typeof raw.description === "string") field.description = raw.description;
	return field;
}

export function parseDefinition(raw: unknown, where = "definition"): Definition {
	if (!isRecord(raw) || typeof raw.version !== "number" || !Array.isArray(raw.fields)) {
		throw new SchemaError(`${where}: expected { version, fields }`);
	}
	return {
		version: raw.version,
		fields: raw.fields.map((f, i) => parseField(f, `${where}.fields[${i}]`))
	};
}

export function parseSchema(raw: unknown): Schema {
	if (!isRecord(raw) || !isRecord(raw.definitions)) {
		throw new SchemaError("Invalid schema: no definitions object");
	}
	const schema = new Schema();
	for (const [table, list] of Object.entries(raw.definitions)) {
		if (!Array.isArray(list)) throw new SchemaError(`Invalid schema: ${table} is not a list`);
		list.forEach((d, i) => schema.add(table, parseDefinition(d, `${table}[${i}]`)));
	}
	return schema;
}

export function loadSchema(path: string): Schema {
	return parseSchema(JSON.parse(readFileSync(path, "utf8")));
}
