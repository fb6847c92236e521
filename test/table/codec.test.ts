import { describe, expect, it, vi } from "vitest";
import { ByteReader } from "../../src/binary/reader.js";
import { ByteWriter } from "../../src/binary/writer.js";
import { FieldDecodeError, FieldTypeError, RowArityError } from "../../src/errors.js";
import { processedFields } from "../../src/schema/definition.js";
import type { Definition, Field, FieldType } from "../../src/schema/types.js";
import { type Row, decodeField, decodeRow, decodeTable, encodeRow, encodeTable } from "../../src/table/codec.js";

function field(name: string, fieldType: FieldType, extra: Partial<Field> = {}): Field {
	return { name, fieldType, isKey: false, isBitwise: 0, enumValues: {}, ...extra };
}

const unitDefinition: Definition = {
	version: 3,
	fields: [
		field("key", "StringU8", { isKey: true }),
		field("flags", "I32", { isBitwise: 3 }),
		field("kind", "I32", { enumValues: { 0: "infantry", 1: "cavalry" } }),
		field("tint_r", "I32", { isPartOfColour: 1 }),
		field("tint_g", "I32", { isPartOfColour: 1 }),
		field("tint_b", "F32", { isPartOfColour: 1 })
	]
};

const simpleDefinition: Definition = {
	version: 0,
	fields: [field("name", "StringU8"), field("amount", "I32")]
};

function unitBytes(flags: number, kind: number, r: number, g: number, b: number): Buffer {
	const writer = new ByteWriter();
	writer.sizedStringU8("spear");
	writer.i32(flags);
	writer.i32(kind);
	writer.i32(r);
	writer.i32(g);
	writer.f32(b);
	return writer.toBuffer();
}

describe("processedFields", () => {
	it("expands bitwise fields and merges colour channels", () => {
		expect(processedFields(unitDefinition).map((f) => `${f.name}:${String(f.fieldType)}`)).toEqual([
			"key:StringU8",
			"flags_1:Boolean",
			"flags_2:Boolean",
			"flags_3:Boolean",
			"kind:StringU8",
			"tint_hex:ColourRGB"
		]);
	});
});

describe("decodeRow", () => {
	it("postprocesses bitwise, enum and colour fields", () => {
		const row = decodeRow(unitDefinition, new ByteReader(unitBytes(0b101, 1, 18, 52, 86.7)));
		expect(row).toEqual([
			{ type: "StringU8", value: "spear" },
			{ type: "Boolean", value: true },
			{ type: "Boolean", value: false },
			{ type: "Boolean", value: true },
			{ type: "StringU8", value: "cavalry" },
			{ type: "ColourRGB", value: "123456" }
		]);
	});

	it("falls back to the number for unknown enum values", () => {
		const row = decodeRow(unitDefinition, new ByteReader(unitBytes(0, 7, 0, 0, 0)));
		expect(row[4]).toEqual({ type: "StringU8", value: "7" });
	});

	it("masks integer channels and clamps float channels", () => {
		const row = decodeRow(unitDefinition, new ByteReader(unitBytes(0, 0, 0x1ff, -1, 300)));
		expect(row[5]).toEqual({ type: "ColourRGB", value: "FFFFFF" });

		const nan = decodeRow(unitDefinition, new ByteReader(unitBytes(0, 0, 1, 2, Number.NaN)));
		expect(nan[5]).toEqual({ type: "ColourRGB", value: "010200" });
	});

	it.each([
		["I32", 3],
		["I16", 16]
	] as const)("reproduces every %s bit pattern over %i flags", (fieldType, bits) => {
		const definition: Definition = { version: 0, fields: [field("flags", fieldType, { isBitwise: bits })] };
		for (let pattern = 0; pattern < 2 ** bits; pattern++) {
			const bytes = new ByteWriter();
			if (fieldType === "I16") bytes.i16((pattern << 16) >> 16);
			else bytes.i32(pattern);
			const encoded = bytes.toBuffer();

			const row = decodeRow(definition, new ByteReader(encoded));
			expect(row.map((cell) => cell.value)).toEqual(
				Array.from({ length: bits }, (_, bit) => ((pattern >> bit) & 1) === 1)
			);
			const writer = new ByteWriter();
			encodeRow(definition, row, writer);
			expect(writer.toBuffer()).toEqual(encoded);
		}
	});

	it("rejects strings that are not valid UTF-8", () => {
		const bytes = Buffer.from([1, 0, 0, 0, 2, 0, 0xc3, 0x28]);
		const definition: Definition = { version: 0, fields: [field("name", "StringU8")] };
		expect(() => decodeTable(definition, new ByteReader(bytes))).toThrow(
			"Error decoding Row 1, Cell 1 as StringU8: Invalid UTF-8 string at offset 4"
		);
	});

	it("escapes newlines and tabs in strings", () => {
		const writer = new ByteWriter();
		writer.sizedStringU8("line\tone\nline two");
		const cell = decodeField(new ByteReader(writer.toBuffer()), field("text", "StringU8"));
		expect(cell).toEqual({ type: "StringU8", value: "line\\tone\\nline two" });
	});
});

describe("encodeRow", () => {
	it("inverts the postprocessing", () => {
		const row: Row = [
			{ type: "StringU8", value: "spear" },
			{ type: "Boolean", value: true },
			{ type: "Boolean", value: false },
			{ type: "Boolean", value: true },
			{ type: "StringU8", value: "CAVALRY" },
			{ type: "ColourRGB", value: "123456" }
		];
		const writer = new ByteWriter();
		encodeRow(unitDefinition, row, writer);
		expect(writer.toBuffer()).toEqual(unitBytes(0b101, 1, 18, 52, 86));
	});

	it("turns escaped text back into control characters", () => {
		const writer = new ByteWriter();
		encodeRow(simpleDefinition, [{ type: "StringU8", value: "a\\nb" }, { type: "I32", value: 1 }], writer);
		expect(writer.toBuffer()).toEqual(Buffer.from([3, 0, 0x61, 0x0a, 0x62, 1, 0, 0, 0]));
	});

	it("coerces cells through their text form", () => {
		const writer = new ByteWriter();
		encodeRow(simpleDefinition, [{ type: "StringU8", value: "x" }, { type: "StringU8", value: "12" }], writer);
		expect(writer.toBuffer().readInt32LE(3)).toBe(12);
	});

	it("uses the field default for cells that do not parse", () => {
		const definition: Definition = {
			version: 0,
			fields: [field("name", "StringU8"), field("amount", "I32", { defaultValue: "5" })]
		};
		const writer = new ByteWriter();
		encodeRow(definition, [{ type: "StringU8", value: "x" }, { type: "StringU8", value: "abc" }], writer);
		expect(writer.toBuffer().readInt32LE(3)).toBe(5);
	});

	it("rejects cells that cannot be coerced", () => {
		const row: Row = [{ type: "StringU8", value: "x" }, { type: "StringU8", value: "abc" }];
		expect(() => encodeRow(simpleDefinition, row, new ByteWriter())).toThrow(FieldTypeError);
		expect(() => encodeRow(simpleDefinition, row, new ByteWriter())).toThrow(
			'Field "amount" expects I32, got StringU8 "abc"'
		);
	});

	it("checks the row length", () => {
		expect(() => encodeRow(simpleDefinition, [{ type: "StringU8", value: "x" }], new ByteWriter())).toThrow(
			new RowArityError(2, 1)
		);
	});
});

describe("sequences", () => {
	const sequenceField = field("entries", { sequence: "U16", definition: simpleDefinition });

	function sequenceBytes(): Buffer {
		const writer = new ByteWriter();
		writer.u16(2);
		writer.sizedStringU8("a");
		writer.i32(1);
		writer.sizedStringU8("b");
		writer.i32(2);
		return writer.toBuffer();
	}

	it("decodes nested rows and keeps the raw bytes", () => {
		const bytes = sequenceBytes();
		const cell = decodeField(new ByteReader(bytes), sequenceField);
		expect(cell.type).toBe("SequenceU16");
		if (cell.type !== "SequenceU16") return;
		expect(cell.value.rows).toEqual([
			[
				{ type: "StringU8", value: "a" },
				{ type: "I32", value: 1 }
			],
			[
				{ type: "StringU8", value: "b" },
				{ type: "I32", value: 2 }
			]
		]);
		expect(cell.value.blob).toEqual(bytes);
	});

	it("encodes the count and the nested rows", () => {
		const definition: Definition = { version: 1, fields: [sequenceField] };
		const cell = decodeField(new ByteReader(sequenceBytes()), sequenceField);
		const writer = new ByteWriter();
		encodeRow(definition, [cell], writer);
		expect(writer.toBuffer()).toEqual(sequenceBytes());
	});
});

describe("decodeTable", () => {
	function truncatedTable(): Buffer {
		const writer = new ByteWriter();
		writer.u32(2);
		writer.sizedStringU8("a");
		writer.i32(1);
		writer.sizedStringU8("b");
		writer.u16(0);
		return writer.toBuffer();
	}

	it("reads the row count when none is given", () => {
		const writer = new ByteWriter();
		writer.u32(1);
		encodeTable(simpleDefinition, [[{ type: "StringU8", value: "z" }, { type: "I32", value: -4 }]], writer);
		const decoded = decodeTable(simpleDefinition, new ByteReader(writer.toBuffer()));
		expect(decoded.rows).toEqual([[{ type: "StringU8", value: "z" }, { type: "I32", value: -4 }]]);
		expect(decoded.incomplete).toBeUndefined();
	});

	it("reports row and column of a failing field", () => {
		const reader = new ByteReader(truncatedTable());
		expect(() => decodeTable(simpleDefinition, reader)).toThrow(
			"Error decoding Row 2, Cell 2 as I32: Read of 4 bytes at offset 14 exceeds buffer (2 bytes left)"
		);
	});

	it("returns the partial row in lenient mode", () => {
		const onWarning = vi.fn();
		const decoded = decodeTable(simpleDefinition, new ByteReader(truncatedTable()), undefined, {
			returnIncomplete: true,
			onWarning
		});
		expect(decoded.rows).toEqual([
			[
				{ type: "StringU8", value: "a" },
				{ type: "I32", value: 1 }
			],
			[{ type: "StringU8", value: "b" }]
		]);
		expect(decoded.incomplete).toBeInstanceOf(FieldDecodeError);
		expect(decoded.incomplete?.row).toBe(2);
		expect(decoded.incomplete?.column).toBe(2);
		expect(onWarning).toHaveBeenCalledTimes(1);
	});

	it("postprocesses the cells of a partial row", () => {
		const definition: Definition = {
			version: 0,
			fields: [field("flags", "I32", { isBitwise: 2 }), field("a", "I32")]
		};
		const writer = new ByteWriter();
		writer.i32(3);
		writer.u16(0);
		const decoded = decodeTable(definition, new ByteReader(writer.toBuffer()), 1, { returnIncomplete: true });
		expect(decoded.rows).toEqual([
			[
				{ type: "Boolean", value: true },
				{ type: "Boolean", value: true }
			]
		]);
	});

	it("stops a five field row at the third field", () => {
		const definition: Definition = {
			version: 0,
			fields: [
				field("key", "StringU8"),
				field("kind", "I32", { enumValues: { 0: "infantry", 1: "cavalry" } }),
				field("amount", "I32"),
				field("scale", "F32"),
				field("active", "Boolean")
			]
		};
		const writer = new ByteWriter();
		writer.sizedStringU8("k");
		writer.i32(1);
		writer.u8(9);
		const decoded = decodeTable(definition, new ByteReader(writer.toBuffer()), 1, { returnIncomplete: true });
		expect(decoded.rows).toEqual([
			[
				{ type: "StringU8", value: "k" },
				{ type: "StringU8", value: "cavalry" }
			]
		]);
		expect(decoded.incomplete?.column).toBe(3);
		expect(decoded.incomplete?.expectedType).toBe("I32");
	});
});
