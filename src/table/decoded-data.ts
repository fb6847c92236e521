/**
 * One decoded cell. Closed union over the field types; the tag is the field type name
 * ("SequenceU16"/"SequenceU32" for nested tables).
 */

import { FieldTypeError } from "../errors.js";
import { type Field, type FieldType, type PrimitiveFieldType, fieldTypeName, isSequenceType } from "../schema/types.js";

export interface SequenceValue {
	rows: DecodedData[][];
	/** Bytes consumed by the sequence, count prefix included. */
	blob: Buffer;
}

export type DecodedData =
	| { type: "Boolean"; value: boolean }
	| { type: "F32" | "F64"; value: number }
	| { type: "I16" | "I32"; value: number }
	| { type: "I64"; value: bigint }
	| { type: "OptionalI16" | "OptionalI32"; value: number | null }
	| { type: "OptionalI64"; value: bigint | null }
	| { type: "ColourRGB"; value: string }
	| { type: "StringU8" | "StringU16"; value: string }
	| { type: "OptionalStringU8" | "OptionalStringU16"; value: string | null }
	| { type: "SequenceU16" | "SequenceU32"; value: SequenceValue };

export type DecodedDataType = DecodedData["type"];

const FLOAT_TOLERANCE = 0.001;

export function dataType(fieldType: FieldType): DecodedDataType {
	return isSequenceType(fieldType) ? (fieldType.sequence === "U16" ? "SequenceU16" : "SequenceU32") : fieldType;
}

export function matchesFieldType(data: DecodedData, fieldType: FieldType): boolean {
	return data.type === dataType(fieldType);
}

function rowsEqual(a: DecodedData[][], b: DecodedData[][]): boolean {
	if (a.length !== b.length) return false;
	return a.every((row, i) => {
		const other = b[i];
		return other !== undefined && row.length === other.length && row.every((cell, j) => {
			const cellB = other[j];
			return cellB !== undefined && dataEquals(cell, cellB);
		});
	});
}

/** Floats compare with an absolute tolerance of 0.001, everything else exactly. */
export function dataEquals(a: DecodedData, b: DecodedData): boolean {
	if (a.type !== b.type) return false;
	switch (a.type) {
		case "F32":
		case "F64":
			return typeof b.value === "number" && Math.abs(a.value - b.value) < FLOAT_TOLERANCE;
		case "SequenceU16":
		case "SequenceU32":
			return typeof b.value === "object" && b.value !== null && rowsEqual(a.value.rows, b.value.rows);
		default:
			return a.value === b.value;
	}
}

export function dataToString(data: DecodedData): string {
	switch (data.type) {
		case "Boolean":
			return data.value ? "true" : "false";
		case "F32":
		case "F64":
			return String(data.value);
		case "SequenceU16":
		case "SequenceU32":
			return `${data.value.rows.length} rows`;
		default:
			return data.value === null ? "" : String(data.value);
	}
}

function parseBoolean(text: string): boolean | undefined {
	const lower = text.trim().toLowerCase();
	if (lower === "true" || lower === "1") return true;
	if (lower === "false" || lower === "0") return false;
	return undefined;
}

function parseInteger(text: string, bits: 16 | 32): number | undefined {
	const trimmed = text.trim();
	if (!/^-?\d+$/.test(trimmed)) return undefined;
	const value = Number(trimmed);
	const limit = 2 ** (bits - 1);
	return value >= -limit && value < limit ? value : undefined;
}

function parseBigInt(text: string): bigint | undefined {
	const trimmed = text.trim();
	if (!/^-?\d+$/.test(trimmed)) return undefined;
	const value = BigInt(trimmed);
	return value >= -(2n ** 63n) && value < 2n ** 63n ? value : undefined;
}

function parseFloatText(text: string): number | undefined {
	const trimmed = text.trim();
	if (trimmed === "") return undefined;
	const value = Number(trimmed);
	return Number.isNaN(value) ? undefined : value;
}

function parseColour(text: string): string | undefined {
	const trimmed = text.trim().replace(/^#/, "");
	return /^[0-9a-fA-F]{1,8}$/.test(trimmed) ? trimmed.toUpperCase().padStart(6, "0") : undefined;
}

/** Parses the text form of a primitive cell; undefined when the text does not fit the type. */
export function tryParseCell(text: string, fieldType: PrimitiveFieldType): DecodedData | undefined {
	switch (fieldType) {
		case "Boolean": {
			const value = parseBoolean(text);
			return value === undefined ? undefined : { type: fieldType, value };
		}
		case "F32":
		case "F64": {
			const value = parseFloatText(text);
			return value === undefined ? undefined : { type: fieldType, value };
		}
		case "I16":
		case "I32": {
			const value = parseInteger(text, fieldType === "I16" ? 16 : 32);
			return value === undefined ? undefined : { type: fieldType, value };
		}
		case "I64": {
			const value = parseBigInt(text);
			return value === undefined ? undefined : { type: fieldType, value };
		}
		case "OptionalI16":
		case "OptionalI32": {
			if (text.trim() === "") return { type: fieldType, value: null };
			const value = parseInteger(text, fieldType === "OptionalI16" ? 16 : 32);
			return value === undefined ? undefined : { type: fieldType, value };
		}
		case "OptionalI64": {
			if (text.trim() === "") return { type: fieldType, value: null };
			const value = parseBigInt(text);
			return value === undefined ? undefined : { type: fieldType, value };
		}
		case "ColourRGB": {
			const value = parseColour(text);
			return value === undefined ? undefined : { type: fieldType, value };
		}
		case "StringU8":
		case "StringU16":
		case "OptionalStringU8":
		case "OptionalStringU16":
			return { type: fieldType, value: text };
	}
}

function emptySequence(sequence: "U16" | "U32"): DecodedData {
	const blob = Buffer.alloc(sequence === "U16" ? 2 : 4);
	return sequence === "U16"
		? { type: "SequenceU16", value: { rows: [], blob } }
		: { type: "SequenceU32", value: { rows: [], blob } };
}

function zeroValue(fieldType: PrimitiveFieldType): DecodedData {
	switch (fieldType) {
		case "Boolean":
			return { type: fieldType, value: false };
		case "F32":
		case "F64":
		case "I16":
		case "I32":
			return { type: fieldType, value: 0 };
		case "I64":
			return { type: fieldType, value: 0n };
		case "OptionalI16":
		case "OptionalI32":
		case "OptionalI64":
		case "OptionalStringU8":
		case "OptionalStringU16":
			return { type: fieldType, value: null };
		case "ColourRGB":
			return { type: fieldType, value: "000000" };
		case "StringU8":
		case "StringU16":
			return { type: fieldType, value: "" };
	}
}

/** Default cell for a field: its schema default when that parses, the zero value otherwise. */
export function defaultCell(field: Field): DecodedData {
	const fieldType = field.fieldType;
	if (isSequenceType(fieldType)) return emptySequence(fieldType.sequence);
	if (field.defaultValue !== undefined) {
		const parsed = tryParseCell(field.defaultValue, fieldType);
		if (parsed) return parsed;
	}
	return zeroValue(fieldType);
}

/** The null cell of an optional type; undefined for types that always carry a value. */
export function absentCell(fieldType: PrimitiveFieldType): DecodedData | undefined {
	switch (fieldType) {
		case "OptionalI16":
		case "OptionalI32":
		case "OptionalI64":
		case "OptionalStringU8":
		case "OptionalStringU16":
			return { type: fieldType, value: null };
		default:
			return undefined;
	}
}

/** Parses text into a cell of the field's type, or throws FieldTypeError. */
export function parseCell(text: string, field: Field): DecodedData {
	const fieldType = field.fieldType;
	if (isSequenceType(fieldType)) {
		throw new FieldTypeError(field.name, fieldTypeName(fieldType), JSON.stringify(text));
	}
	const parsed = tryParseCell(text, fieldType);
	if (!parsed) throw new FieldTypeError(field.name, fieldType, JSON.stringify(text));
	return parsed;
}

/**
 * Converts a cell to another field's type. Goes through the text form; values that do
 * not survive the conversion become the target field's default.
 */
export function convertBetweenTypes(data: DecodedData, target: Field): DecodedData {
	if (matchesFieldType(data, target.fieldType)) return data;
	const fieldType = target.fieldType;
	if (isSequenceType(fieldType)) return defaultCell(target);

	if (fieldType === "I16" || fieldType === "I32" || fieldType === "OptionalI16" || fieldType === "OptionalI32") {
		if ((data.type === "F32" || data.type === "F64") && Number.isFinite(data.value)) {
			return tryParseCell(String(Math.trunc(data.value)), fieldType) ?? defaultCell(target);
		}
	}
	return tryParseCell(dataToString(data), fieldType) ?? defaultCell(target);
}
