import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { SchemaError } from "../../src/errors.js";
import { columnPosition, keyColumns } from "../../src/schema/definition.js";
import { Schema, loadSchema, parseDefinition, parseSchema } from "../../src/schema/schema.js";

const rawSchema = {
	definitions: {
		units_tables: [
			{
				version: 1,
				fields: [{ name: "key", fieldType: "StringU8", isKey: true }]
			},
			{
				version: 4,
				fields: [
					{ name: "key", fieldType: "StringU8", isKey: true },
					{ name: "category", fieldType: "I32", enumValues: { "0": "infantry", "1": "cavalry" } },
					{
						name: "abilities",
						fieldType: {
							sequence: "U32",
							definition: { version: 0, fields: [{ name: "ability", fieldType: "StringU16", defaultValue: "none" }] }
						}
					}
				]
			}
		]
	}
};

describe("parseSchema", () => {
	it("sorts definitions newest first", () => {
		const schema = parseSchema(rawSchema);
		expect(schema.tableNames()).toEqual(["units_tables"]);
		expect(schema.definitions("units_tables").map((d) => d.version)).toEqual([4, 1]);
		expect(schema.latest("units_tables")?.version).toBe(4);
	});

	it("fills in field defaults", () => {
		const definition = parseSchema(rawSchema).definition("units_tables", 4);
		expect(definition.fields[1]).toEqual({
			name: "category",
			fieldType: "I32",
			isKey: false,
			isBitwise: 0,
			enumValues: { 0: "infantry", 1: "cavalry" }
		});
		const sequence = definition.fields[2]?.fieldType;
		expect(typeof sequence === "object" ? sequence.definition.fields[0]?.defaultValue : undefined).toBe("none");
	});

	it("reports missing definitions", () => {
		expect(() => parseSchema(rawSchema).definition("units_tables", 2)).toThrow(
			new SchemaError('No definition found for table "units_tables", version 2')
		);
	});

	it("rejects unknown field types", () => {
		expect(() => parseDefinition({ version: 1, fields: [{ name: "x", fieldType: "U8" }] })).toThrow(
			'definition.fields[0].x: unknown field type "U8"'
		);
		expect(() => parseSchema({ tables: {} })).toThrow(SchemaError);
	});

	it("loads from a JSON file", async () => {
		const dir = await mkdtemp(join(tmpdir(), "packfile-schema-"));
		try {
			const path = join(dir, "schema.json");
			await writeFile(path, JSON.stringify(rawSchema), "utf8");
			expect(loadSchema(path).find("units_tables", 1)?.fields).toHaveLength(1);
		} finally {
			await rm(dir, { recursive: true, force: true });
		}
	});
});

describe("Schema", () => {
	it("replaces a definition of the same version", () => {
		const schema = new Schema();
		schema.add("loc_tables", { version: 1, fields: [] });
		schema.add("loc_tables", { version: 1, fields: [{ name: "a", fieldType: "Boolean", isKey: false, isBitwise: 0, enumValues: {} }] });
		expect(schema.definitions("loc_tables")).toHaveLength(1);
		expect(schema.find("loc_tables", 1)?.fields).toHaveLength(1);
	});

	it("finds key columns and positions", () => {
		const definition = parseSchema(rawSchema).definition("units_tables", 4);
		expect(keyColumns(definition)).toEqual([0]);
		expect(columnPosition(definition, "abilities")).toBe(2);
		expect(columnPosition(definition, "missing")).toBe(-1);
	});
});
