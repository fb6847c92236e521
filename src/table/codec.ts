/**
 * Schema-driven record codec. Rows are decoded field by field in layout order, then
 * postprocessed into the column list of processedFields(); encoding inverts both steps.
 */

import type { ByteReader } from "../binary/reader.js";
import type { ByteWriter } from "../binary/writer.js";
import { FieldDecodeError, FieldTypeError, RowArityError } from "../errors.js";
import {
	colourChannel,
	isBitwiseField,
	isColourField,
	isEnumField,
	mergedColourName,
	processedFields
} from "../schema/definition.js";
import { type Definition, type Field, type PrimitiveFieldType, fieldTypeName, isSequenceType } from "../schema/types.js";
import { type DecodedData, dataToString, defaultCell, matchesFieldType, tryParseCell } from "./decoded-data.js";

export type Row = DecodedData[];
export type ReadonlyRow = readonly DecodedData[];

export interface TableDecodeOptions {
	/** Keep the partially decoded row instead of failing. */
	returnIncomplete?: boolean;
	onWarning?: (message: string) => void;
}

export interface DecodedRows {
	rows: Row[];
	/** Set when decoding stopped early in lenient mode; the last row is the partial one. */
	incomplete?: FieldDecodeError;
}

interface RowResult {
	row: Row;
	error?: FieldDecodeError;
}

// ---------------------------------------------------------------------------
// Decode
// ---------------------------------------------------------------------------

function escapeText(value: string): string {
	return value.replace(/\n/g, "\\n").replace(/\t/g, "\\t");
}

function unescapeText(value: string): string {
	return value.replace(/\\n/g, "\n").replace(/\\t/g, "\t");
}

function decodePrimitive(reader: ByteReader, fieldType: PrimitiveFieldType): DecodedData {
	switch (fieldType) {
		case "Boolean":
			return { type: fieldType, value: reader.bool() };
		case "F32":
			return { type: fieldType, value: reader.f32() };
		case "F64":
			return { type: fieldType, value: reader.f64() };
		case "I16":
			return { type: fieldType, value: reader.i16() };
		case "I32":
			return { type: fieldType, value: reader.i32() };
		case "I64":
			return { type: fieldType, value: reader.i64() };
		case "OptionalI16":
			return { type: fieldType, value: reader.optionalI16() };
		case "OptionalI32":
			return { type: fieldType, value: reader.optionalI32() };
		case "OptionalI64":
			return { type: fieldType, value: reader.optionalI64() };
		case "ColourRGB":
			return { type: fieldType, value: reader.colourRGB() };
		case "StringU8":
			return { type: fieldType, value: escapeText(reader.sizedStringU8()) };
		case "StringU16":
			return { type: fieldType, value: escapeText(reader.sizedStringU16()) };
		case "OptionalStringU8": {
			const value = reader.optionalStringU8();
			return { type: fieldType, value: value === null ? null : escapeText(value) };
		}
		case "OptionalStringU16": {
			const value = reader.optionalStringU16();
			return { type: fieldType, value: value === null ? null : escapeText(value) };
		}
	}
}

/** Decodes one raw (not yet postprocessed) cell. */
export function decodeField(reader: ByteReader, field: Field, options: TableDecodeOptions = {}): DecodedData {
	const fieldType = field.fieldType;
	if (!isSequenceType(fieldType)) return decodePrimitive(reader, fieldType);

	const start = reader.position;
	const count = fieldType.sequence === "U16" ? reader.u16() : reader.u32();
	const nested = decodeTable(fieldType.definition, reader, count, options);
	if (nested.incomplete) throw nested.incomplete;

	const end = reader.position;
	reader.seek(start);
	const blob = Buffer.from(reader.slice(end - start));
	const value = { rows: nested.rows, blob };
	return fieldType.sequence === "U16" ? { type: "SequenceU16", value } : { type: "SequenceU32", value };
}

function toColourByte(cell: DecodedData): number {
	switch (cell.type) {
		case "I16":
		case "I32":
			return cell.value & 0xff;
		case "I64":
			return Number(BigInt.asUintN(8, cell.value));
		case "F32":
		case "F64": {
			if (Number.isNaN(cell.value)) return 0;
			return Math.min(255, Math.max(0, Math.trunc(cell.value)));
		}
		default:
			return 0;
	}
}

function integerBits(cell: DecodedData): bigint | undefined {
	switch (cell.type) {
		case "I16":
			return BigInt.asUintN(16, BigInt(cell.value));
		case "I32":
			return BigInt.asUintN(32, BigInt(cell.value));
		case "I64":
			return BigInt.asUintN(64, cell.value);
		default:
			return undefined;
	}
}

function toHexByte(value: number): string {
	return value.toString(16).toUpperCase().padStart(2, "0");
}

interface ColourGroup {
	r: number;
	g: number;
	b: number;
}

function setChannel(group: ColourGroup, channel: string, value: number): void {
	if (channel === "r" || channel === "red") group.r = value;
	else if (channel === "g" || channel === "green") group.g = value;
	else if (channel === "b" || channel === "blue") group.b = value;
}

/**
 * Turns a raw row into its user-facing form: bitwise integers into booleans (least
 * significant bit first), enum integers into their names, split colour channels into
 * one hex cell per group, appended in ascending group order.
 */
export function postprocessRow(definition: Definition, raw: Row): Row {
	const row: Row = [];
	const colours = new Map<number, ColourGroup>();

	definition.fields.forEach((field, index) => {
		const cell = raw[index];
		if (cell === undefined) return;

		if (isBitwiseField(field)) {
			const bits = integerBits(cell) ?? 0n;
			for (let bit = 0; bit < field.isBitwise; bit++) {
				row.push({ type: "Boolean", value: ((bits >> BigInt(bit)) & 1n) === 1n });
			}
		} else if (isEnumField(field) && (cell.type === "I16" || cell.type === "I32" || cell.type === "I64")) {
			const key = Number(cell.value);
			row.push({ type: "StringU8", value: field.enumValues[key] ?? String(cell.value) });
		} else if (isColourField(field)) {
			const group = colours.get(field.isPartOfColour) ?? { r: 0, g: 0, b: 0 };
			setChannel(group, colourChannel(field.name), toColourByte(cell));
			colours.set(field.isPartOfColour, group);
		} else {
			row.push(cell);
		}
	});

	for (const id of [...colours.keys()].sort((a, b) => a - b)) {
		const group = colours.get(id);
		if (group) row.push({ type: "ColourRGB", value: `${toHexByte(group.r)}${toHexByte(group.g)}${toHexByte(group.b)}` });
	}
	return row;
}

/**
 * Decodes one row. In lenient mode a failing field ends the row: the cells read so far
 * come back postprocessed together with the error.
 */
function decodeRowInternal(definition: Definition, reader: ByteReader, rowIndex: number, options: TableDecodeOptions): RowResult {
	const raw: Row = [];
	for (const [column, field] of definition.fields.entries()) {
		try {
			raw.push(decodeField(reader, field, options));
		} catch (err) {
			const error = new FieldDecodeError(rowIndex + 1, column + 1, fieldTypeName(field.fieldType), err);
			if (!options.returnIncomplete) throw error;
			return { row: postprocessRow(definition, raw), error };
		}
	}
	return { row: postprocessRow(definition, raw) };
}

export function decodeRow(definition: Definition, reader: ByteReader, rowIndex = 0, options: TableDecodeOptions = {}): Row {
	const result = decodeRowInternal(definition, reader, rowIndex, options);
	if (result.error) options.onWarning?.(result.error.message);
	return result.row;
}

/** Decodes entryCount rows; without a count, a u32 row count is read first. */
export function decodeTable(
	definition: Definition,
	reader: ByteReader,
	entryCount?: number,
	options: TableDecodeOptions = {}
): DecodedRows {
	const count = entryCount ?? reader.u32();
	const rows: Row[] = [];
	for (let index = 0; index < count; index++) {
		const result = decodeRowInternal(definition, reader, index, options);
		rows.push(result.row);
		if (result.error) {
			options.onWarning?.(`Returning ${rows.length} rows, last one incomplete: ${result.error.message}`);
			return { rows, incomplete: result.error };
		}
	}
	return { rows };
}

// ---------------------------------------------------------------------------
// Encode
// ---------------------------------------------------------------------------

function writePrimitive(writer: ByteWriter, field: Field, fieldType: PrimitiveFieldType, cell: DecodedData): void {
	const fail = (): never => {
		throw new FieldTypeError(field.name, fieldType, cell.type);
	};
	switch (fieldType) {
		case "Boolean":
			return cell.type === "Boolean" ? writer.bool(cell.value) : fail();
		case "F32":
			return cell.type === "F32" ? writer.f32(cell.value) : fail();
		case "F64":
			return cell.type === "F64" ? writer.f64(cell.value) : fail();
		case "I16":
			return cell.type === "I16" ? writer.i16(cell.value) : fail();
		case "I32":
			return cell.type === "I32" ? writer.i32(cell.value) : fail();
		case "I64":
			return cell.type === "I64" ? writer.i64(cell.value) : fail();
		case "OptionalI16":
			return cell.type === "OptionalI16" ? writer.optionalI16(cell.value) : fail();
		case "OptionalI32":
			return cell.type === "OptionalI32" ? writer.optionalI32(cell.value) : fail();
		case "OptionalI64":
			return cell.type === "OptionalI64" ? writer.optionalI64(cell.value) : fail();
		case "ColourRGB":
			return cell.type === "ColourRGB" ? writer.colourRGB(cell.value) : fail();
		case "StringU8":
			return cell.type === "StringU8" ? writer.sizedStringU8(unescapeText(cell.value)) : fail();
		case "StringU16":
			return cell.type === "StringU16" ? writer.sizedStringU16(unescapeText(cell.value)) : fail();
		case "OptionalStringU8":
			return cell.type === "OptionalStringU8"
				? writer.optionalStringU8(cell.value === null ? null : unescapeText(cell.value))
				: fail();
		case "OptionalStringU16":
			return cell.type === "OptionalStringU16"
				? writer.optionalStringU16(cell.value === null ? null : unescapeText(cell.value))
				: fail();
	}
}

/** Brings a cell to the field's type: as is, by parsing its text form, or from the field default. */
function coerceCell(cell: DecodedData, field: Field): DecodedData {
	const fieldType = field.fieldType;
	if (matchesFieldType(cell, fieldType)) return cell;
	if (isSequenceType(fieldType)) throw new FieldTypeError(field.name, fieldTypeName(fieldType), cell.type);

	const parsed = tryParseCell(dataToString(cell), fieldType);
	if (parsed) return parsed;
	if (field.defaultValue !== undefined && tryParseCell(field.defaultValue, fieldType)) return defaultCell(field);
	throw new FieldTypeError(field.name, fieldType, `${cell.type} ${JSON.stringify(dataToString(cell))}`);
}

function writeCell(writer: ByteWriter, field: Field, cell: DecodedData): void {
	const fieldType = field.fieldType;
	if (!isSequenceType(fieldType)) {
		writePrimitive(writer, field, fieldType, coerceCell(cell, field));
		return;
	}
	if (cell.type !== "SequenceU16" && cell.type !== "SequenceU32") {
		throw new FieldTypeError(field.name, fieldTypeName(fieldType), cell.type);
	}
	const rows = cell.value.rows;
	if (fieldType.sequence === "U16") writer.u16(rows.length);
	else writer.u32(rows.length);
	encodeTable(fieldType.definition, rows, writer);
}

function integerCell(field: Field, bits: bigint): DecodedData {
	switch (field.fieldType) {
		case "I16":
			return { type: "I16", value: Number(BigInt.asIntN(16, bits)) };
		case "I32":
			return { type: "I32", value: Number(BigInt.asIntN(32, bits)) };
		default:
			return { type: "I64", value: BigInt.asIntN(64, bits) };
	}
}

function enumCell(field: Field, cell: DecodedData): DecodedData {
	if (cell.type === "StringU8" || cell.type === "StringU16") {
		const wanted = cell.value.toLowerCase();
		for (const [key, name] of Object.entries(field.enumValues)) {
			if (name.toLowerCase() === wanted) return integerCell(field, BigInt(key));
		}
	}
	return coerceCell(cell, field);
}

function channelCell(field: Field, hex: string): DecodedData {
	const value = parseInt(hex, 16);
	const channel = colourChannel(field.name);
	let byte = 0;
	if (channel === "r" || channel === "red") byte = (value >> 16) & 0xff;
	else if (channel === "g" || channel === "green") byte = (value >> 8) & 0xff;
	else if (channel === "b" || channel === "blue") byte = value & 0xff;

	switch (field.fieldType) {
		case "F32":
			return { type: "F32", value: byte };
		case "F64":
			return { type: "F64", value: byte };
		default:
			return integerCell(field, BigInt(byte));
	}
}

/** Writes one processed row in layout order. */
export function encodeRow(definition: Definition, row: ReadonlyRow, writer: ByteWriter): void {
	const columns = processedFields(definition);
	if (row.length !== columns.length) throw new RowArityError(columns.length, row.length);

	const groups = definition.fields.flatMap((f) =>
		!isBitwiseField(f) && !isEnumField(f) && isColourField(f) ? [f.isPartOfColour] : []
	);
	const groupCount = new Set(groups).size;
	const colourStart = columns.length - groupCount;
	let cursor = 0;

	const next = (): DecodedData => {
		const cell = row[cursor++];
		if (cell === undefined) throw new RowArityError(columns.length, cursor - 1);
		return cell;
	};

	for (const field of definition.fields) {
		if (isBitwiseField(field)) {
			let bits = 0n;
			for (let bit = 0; bit < field.isBitwise; bit++) {
				const flag = next();
				if (flag.type !== "Boolean") throw new FieldTypeError(`${field.name}_${bit + 1}`, "Boolean", flag.type);
				if (flag.value) bits |= 1n << BigInt(bit);
			}
			writeCell(writer, field, integerCell(field, bits));
		} else if (isEnumField(field)) {
			writeCell(writer, field, enumCell(field, next()));
		} else if (isColourField(field)) {
			const name = mergedColourName(field.name);
			const offset = columns.slice(colourStart).findIndex((c) => c.name === name);
			const hexCell = offset === -1 ? undefined : row[colourStart + offset];
			if (hexCell === undefined || hexCell.type !== "ColourRGB") {
				throw new FieldTypeError(name, "ColourRGB", hexCell?.type ?? "nothing");
			}
			writeCell(writer, field, channelCell(field, hexCell.value));
		} else {
			writeCell(writer, field, next());
		}
	}
}

/** Writes the rows only; row counts belong to the enclosing file or sequence. */
export function encodeTable(definition: Definition, rows: readonly ReadonlyRow[], writer: ByteWriter): void {
	for (const row of rows) encodeRow(definition, row, writer);
}
