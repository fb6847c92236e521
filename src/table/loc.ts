/**
 * Localisation files (.loc): FF FE, "LOC\0", i32 version, u32 rows, then (key, text, tooltip) rows.
 */

import { ByteReader, checkSizeMismatch } from "../binary/reader.js";
import { ByteWriter } from "../binary/writer.js";
import { FormatError, UnsupportedVersionError } from "../errors.js";
import type { Definition } from "../schema/types.js";
import type { Row, TableDecodeOptions } from "./codec.js";
import { Table } from "./table.js";

const BYTEORDER_MARK = Buffer.from([0xff, 0xfe]);
const LOC_SIGNATURE = Buffer.from("LOC\0", "latin1");
const LOC_VERSION = 1;

export const LOC_DEFINITION: Definition = {
	version: LOC_VERSION,
	fields: [
		{ name: "key", fieldType: "StringU16", isKey: true, isBitwise: 0, enumValues: {} },
		{ name: "text", fieldType: "StringU16", isKey: false, isBitwise: 0, enumValues: {} },
		{ name: "tooltip", fieldType: "Boolean", isKey: false, isBitwise: 0, enumValues: {} }
	]
};

export interface LocFile {
	kind: "Loc";
	table: Table;
}

export function decodeLoc(bytes: Buffer, options: TableDecodeOptions = {}): LocFile {
	const reader = new ByteReader(bytes);
	if (!reader.slice(2).equals(BYTEORDER_MARK) || !reader.slice(4).equals(LOC_SIGNATURE)) {
		throw new FormatError("Not a Loc file: bad signature");
	}
	const version = reader.i32();
	if (version !== LOC_VERSION) throw new UnsupportedVersionError("Loc", version);
	const count = reader.u32();

	const { table, incomplete } = Table.decode("loc", LOC_DEFINITION, reader, count, options);
	if (!incomplete) checkSizeMismatch(reader.position, reader.length);
	return { kind: "Loc", table };
}

export function encodeLoc(loc: LocFile): Buffer {
	const writer = new ByteWriter(1024);
	writer.bytes(BYTEORDER_MARK);
	writer.bytes(LOC_SIGNATURE);
	writer.i32(LOC_VERSION);
	writer.u32(loc.table.length);
	loc.table.encode(writer);
	return writer.toBuffer();
}

export function newLoc(rows: Row[] = []): LocFile {
	return { kind: "Loc", table: new Table("loc", LOC_DEFINITION, rows) };
}
