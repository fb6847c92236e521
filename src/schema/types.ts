/**
 * Schema types. A Definition describes the byte layout of one version of a table:
 * field order is layout order, names are only metadata for tooling.
 */

export type PrimitiveFieldType =
	| "Boolean"
	| "F32"
	| "F64"
	| "I16"
	| "I32"
	| "I64"
	| "OptionalI16"
	| "OptionalI32"
	| "OptionalI64"
	| "ColourRGB"
	| "StringU8"
	| "StringU16"
	| "OptionalStringU8"
	| "OptionalStringU16";

export interface SequenceFieldType {
	/** Width of the row count prefix. */
	sequence: "U16" | "U32";
	definition: Definition;
}

export type FieldType = PrimitiveFieldType | SequenceFieldType;

export interface Field {
	name: string;
	fieldType: FieldType;
	isKey: boolean;
	defaultValue?: string;
	/** Number of packed booleans stored in this integer; 0 or 1 means a plain field. */
	isBitwise: number;
	/** Raw integer → display string. Only used for integer fields. */
	enumValues: Record<number, string>;
	/** Colour group id when this field is one channel of a split colour. */
	isPartOfColour?: number;
	description?: string;
}

export interface Definition {
	version: number;
	fields: Field[];
}

export const PRIMITIVE_FIELD_TYPES: readonly PrimitiveFieldType[] = [
	"Boolean",
	"F32",
	"F64",
	"I16",
	"I32",
	"I64",
	"OptionalI16",
	"OptionalI32",
	"OptionalI64",
	"ColourRGB",
	"StringU8",
	"StringU16",
	"OptionalStringU8",
	"OptionalStringU16"
];

export function isSequenceType(fieldType: FieldType): fieldType is SequenceFieldType {
	return typeof fieldType === "object";
}

export function fieldTypeName(fieldType: FieldType): string {
	return isSequenceType(fieldType) ? `Sequence${fieldType.sequence}` : fieldType;
}

export function isIntegerType(fieldType: FieldType): fieldType is "I16" | "I32" | "I64" {
	return fieldType === "I16" || fieldType === "I32" || fieldType === "I64";
}

export function isNumericType(fieldType: FieldType): fieldType is "I16" | "I32" | "I64" | "F32" | "F64" {
	return isIntegerType(fieldType) || fieldType === "F32" || fieldType === "F64";
}
