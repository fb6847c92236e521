/**
 * Raw table XML, assembly kit style:
 * <dataroot export_version="N"><table_name><column>value</column>…</table_name>…</dataroot>
 * One element per row, one child element per processed column. Absent optional values are
 * left out.
 */

import { XMLParser } from "fast-xml-parser";
import { FieldTypeError, ImportFormatError } from "../errors.js";
import { processedFields } from "../schema/definition.js";
import { Schema } from "../schema/schema.js";
import { type Definition, type Field, fieldTypeName, isSequenceType } from "../schema/types.js";
import type { Row } from "./codec.js";
import { type DecodedData, absentCell, dataToString, parseCell } from "./decoded-data.js";
import { Table } from "./table.js";

const EOL = "\r\n";
const TABLES_SUFFIX = "_tables";

export function escapeXml(value: string): string {
	return value
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;")
		.replace(/'/g, "&apos;");
}

/** "units_tables" → "units"; the assembly kit names rows after the bare table. */
export function xmlRowName(tableName: string): string {
	return tableName.endsWith(TABLES_SUFFIX) ? tableName.slice(0, -TABLES_SUFFIX.length) : tableName;
}

function isAbsent(cell: DecodedData): boolean {
	return cell.value === null;
}

export function tableToXml(table: Table): string {
	const columns = table.columns;
	const sequence = columns.find((c) => isSequenceType(c.fieldType));
	if (sequence) {
		throw new FieldTypeError(sequence.name, "a primitive type", fieldTypeName(sequence.fieldType));
	}

	const rowName = escapeXml(xmlRowName(table.name));
	let xml = '<?xml version="1.0" encoding="utf-8"?>' + EOL;
	xml += `<dataroot export_version="${table.definition.version}">` + EOL;
	for (const row of table.rows) {
		xml += `\t<${rowName}>` + EOL;
		row.forEach((cell, i) => {
			const column = columns[i];
			if (!column || isAbsent(cell)) return;
			xml += `\t\t<${column.name}>${escapeXml(dataToString(cell))}</${column.name}>` + EOL;
		});
		xml += `\t</${rowName}>` + EOL;
	}
	xml += "</dataroot>" + EOL;
	return xml;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function textOf(value: unknown): string | undefined {
	if (typeof value === "string") return value;
	if (typeof value === "number" || typeof value === "boolean") return String(value);
	if (isRecord(value) && typeof value["#text"] === "string") return value["#text"];
	return undefined;
}

function rowFromElement(element: unknown, columns: readonly Field[], index: number): Row {
	const values = isRecord(element) ? element : {};
	return columns.map((column) => {
		const text = textOf(values[column.name]);
		if (text !== undefined) return parseCell(text, column);
		const absent = isSequenceType(column.fieldType) ? undefined : absentCell(column.fieldType);
		if (absent) return absent;
		throw new ImportFormatError(`Row ${index + 1} has no value for column "${column.name}"`);
	});
}

export interface XmlTable {
	version: number;
	rowName: string;
	elements: unknown[];
}

export function parseTableXml(xml: string): XmlTable {
	const parser = new XMLParser({
		ignoreAttributes: false,
		attributeNamePrefix: "@_",
		parseTagValue: false,
		parseAttributeValue: false,
		trimValues: false
	});
	const doc: unknown = parser.parse(xml);
	const root = isRecord(doc) ? doc.dataroot : undefined;
	if (!isRecord(root)) throw new ImportFormatError("Missing <dataroot> element");

	const versionText = root["@_export_version"];
	const version = typeof versionText === "string" ? Number(versionText) : NaN;
	if (!Number.isInteger(version)) throw new ImportFormatError("Missing or invalid export_version");

	const rowNames = Object.keys(root).filter((k) => !k.startsWith("@_") && k !== "#text");
	if (rowNames.length > 1) throw new ImportFormatError(`Mixed row elements: ${rowNames.join(", ")}`);
	const rowName = rowNames[0] ?? "";
	const raw = rowName ? root[rowName] : [];
	const elements = Array.isArray(raw) ? raw : [raw];
	return { version, rowName, elements };
}

/**
 * Imports a table. With a schema the definition is looked up by table name and the
 * exported version; a fixed definition must match that version.
 */
export function tableFromXml(xml: string, tableName: string, source: Schema | Definition): Table {
	const parsed = parseTableXml(xml);
	if (parsed.rowName && parsed.rowName !== tableName && parsed.rowName !== xmlRowName(tableName)) {
		throw new ImportFormatError(`Rows are <${parsed.rowName}>, expected <${xmlRowName(tableName)}>`);
	}
	const definition = source instanceof Schema
		? source.find(tableName, parsed.version)
		: source.version === parsed.version
			? source
			: undefined;
	if (!definition) {
		throw new ImportFormatError(`No definition for "${tableName}" at export_version ${parsed.version}`);
	}
	const columns = processedFields(definition);
	const rows = parsed.elements.map((element, index) => rowFromElement(element, columns, index));
	return new Table(tableName, definition, rows);
}
