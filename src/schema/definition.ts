import { type Definition, type Field, isIntegerType, isNumericType } from "./types.js";

const MERGE_COLOUR_POST = "_hex";
const MERGE_COLOUR_NO_NAME = "merged_colour";

export function isBitwiseField(field: Field): boolean {
	return field.isBitwise > 1 && isIntegerType(field.fieldType);
}

export function isEnumField(field: Field): boolean {
	return Object.keys(field.enumValues).length > 0 && isIntegerType(field.fieldType);
}

export function isColourField(field: Field): field is Field & { isPartOfColour: number } {
	return field.isPartOfColour !== undefined && isNumericType(field.fieldType);
}

/** "tint_r" → "r", "colour_Green" → "green". */
export function colourChannel(fieldName: string): string {
	const cut = fieldName.lastIndexOf("_");
	return fieldName.slice(cut + 1).toLowerCase();
}

/** Name of the synthetic hex column a split colour channel is merged into. */
export function mergedColourName(fieldName: string): string {
	const cut = fieldName.lastIndexOf("_");
	return cut === -1 ? MERGE_COLOUR_NO_NAME : `${fieldName.slice(0, cut).toLowerCase()}${MERGE_COLOUR_POST}`;
}

/**
 * Column list as seen by users of decoded rows: bitwise integers become N booleans,
 * enum integers become strings, split colour channels disappear and one hex column
 * per colour group is appended, in ascending group order.
 */
export function processedFields(definition: Definition): Field[] {
	const colourColumns = new Map<number, Field>();
	const fields: Field[] = [];

	for (const field of definition.fields) {
		if (isBitwiseField(field)) {
			for (let bit = 0; bit < field.isBitwise; bit++) {
				fields.push({ ...field, name: `${field.name}_${bit + 1}`, fieldType: "Boolean", isBitwise: 0, enumValues: {} });
			}
		} else if (isEnumField(field)) {
			fields.push({ ...field, fieldType: "StringU8" });
		} else if (isColourField(field)) {
			if (!colourColumns.has(field.isPartOfColour)) {
				colourColumns.set(field.isPartOfColour, { ...field, name: mergedColourName(field.name), fieldType: "ColourRGB" });
			}
		} else {
			fields.push(field);
		}
	}

	const groups = [...colourColumns.keys()].sort((a, b) => a - b);
	for (const group of groups) {
		const column = colourColumns.get(group);
		if (column) fields.push(column);
	}
	return fields;
}

export function columnPosition(definition: Definition, name: string): number {
	return processedFields(definition).findIndex((field) => field.name === name);
}

export function keyColumns(definition: Definition): number[] {
	return processedFields(definition).flatMap((field, index) => (field.isKey ? [index] : []));
}
