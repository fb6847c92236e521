import { describe, expect, it } from "vitest";
import { ByteReader } from "../../src/binary/reader.js";
import { ByteWriter } from "../../src/binary/writer.js";
import { FieldTypeError, RowArityError } from "../../src/errors.js";
import type { Definition, Field, FieldType } from "../../src/schema/types.js";
import type { Row } from "../../src/table/codec.js";
import { Table } from "../../src/table/table.js";

function field(name: string, fieldType: FieldType, extra: Partial<Field> = {}): Field {
	return { name, fieldType, isKey: false, isBitwise: 0, enumValues: {}, ...extra };
}

const v1: Definition = { version: 1, fields: [field("key", "StringU8", { isKey: true }), field("cost", "I32")] };
const v2: Definition = {
	version: 2,
	fields: [field("key", "StringU8", { isKey: true }), field("cost", "F32"), field("upkeep", "I32", { defaultValue: "3" })]
};

describe("Table", () => {
	it("validates rows on construction", () => {
		expect(() => new Table("units_tables", v1, [[{ type: "StringU8", value: "a" }]])).toThrow(RowArityError);
		expect(
			() => new Table("units_tables", v1, [[{ type: "StringU8", value: "a" }, { type: "F32", value: 1 }]])
		).toThrow('Field "cost (row 1)" expects I32, got F32');
	});

	it("inserts default rows", () => {
		const table = new Table("units_tables", v2);
		table.insertRow();
		expect(table.rows).toEqual([
			[
				{ type: "StringU8", value: "" },
				{ type: "F32", value: 0 },
				{ type: "I32", value: 3 }
			]
		]);
	});

	it("inserts at an index and removes rows", () => {
		const table = new Table("units_tables", v1, [[{ type: "StringU8", value: "b" }, { type: "I32", value: 2 }]]);
		table.insertRow([{ type: "StringU8", value: "a" }, { type: "I32", value: 1 }], 0);
		expect(table.getCell(0, 0)).toEqual({ type: "StringU8", value: "a" });
		expect(table.removeRow(1)).toEqual([{ type: "StringU8", value: "b" }, { type: "I32", value: 2 }]);
		expect(table.length).toBe(1);
	});

	it("keeps its own copy of the rows", () => {
		const row: Row = [{ type: "StringU8", value: "a" }, { type: "I32", value: 1 }];
		const table = new Table("units_tables", v1, [row]);
		row[1] = { type: "StringU8", value: "not a number" };
		expect(table.getCell(0, 1)).toEqual({ type: "I32", value: 1 });

		const copy = new Table("units_tables", v1, table.rows);
		copy.setCell(0, 1, { type: "I32", value: 2 });
		expect(table.getCell(0, 1)).toEqual({ type: "I32", value: 1 });
	});

	it("type-checks single cells", () => {
		const table = new Table("units_tables", v1, [[{ type: "StringU8", value: "a" }, { type: "I32", value: 1 }]]);
		table.setCell(0, 1, { type: "I32", value: 9 });
		expect(table.getCell(0, 1)).toEqual({ type: "I32", value: 9 });
		expect(() => table.setCell(0, 1, { type: "StringU8", value: "9" })).toThrow(FieldTypeError);
	});

	it("migrates rows to another definition by column name", () => {
		const table = new Table("units_tables", v1, [[{ type: "StringU8", value: "a" }, { type: "I32", value: 10 }]]);
		table.setDefinition(v2);
		expect(table.definition.version).toBe(2);
		expect(table.rows[0]).toEqual([
			{ type: "StringU8", value: "a" },
			{ type: "F32", value: 10 },
			{ type: "I32", value: 3 }
		]);

		table.setCell(0, 1, { type: "F32", value: 10.7 });
		table.setDefinition(v1);
		expect(table.rows[0]).toEqual([
			{ type: "StringU8", value: "a" },
			{ type: "I32", value: 10 }
		]);
	});

	it("encodes and decodes its rows", () => {
		const rows: Row[] = [
			[
				{ type: "StringU8", value: "a" },
				{ type: "I32", value: 1 }
			],
			[
				{ type: "StringU8", value: "b" },
				{ type: "I32", value: -2 }
			]
		];
		const table = new Table("units_tables", v1, rows);
		const writer = new ByteWriter();
		table.encode(writer);

		const decoded = Table.decode("units_tables", v1, new ByteReader(writer.toBuffer()), 2);
		expect(decoded.incomplete).toBeUndefined();
		expect(decoded.table.rows).toEqual(rows);
	});
});
