/**
 * DB table files (db/<table>/<file>).
 * Layout: [FD FE FC FF + GUID]? [FC FD FE FF + i32 version]? bool, u32 rows, rows.
 */

import { ByteReader, checkSizeMismatch } from "../binary/reader.js";
import { ByteWriter } from "../binary/writer.js";
import { FormatError, SchemaError } from "../errors.js";
import type { Schema } from "../schema/schema.js";
import type { Row, TableDecodeOptions } from "./codec.js";
import { Table } from "./table.js";

const GUID_MARKER = Buffer.from([0xfd, 0xfe, 0xfc, 0xff]);
const VERSION_MARKER = Buffer.from([0xfc, 0xfd, 0xfe, 0xff]);

export interface DbHeader {
	guid: string | null;
	version: number;
	/** Unknown flag byte before the row count, kept as read. */
	mysteriousByte: boolean;
	entryCount: number;
}

export interface DbFile {
	kind: "DB";
	tableName: string;
	guid: string | null;
	mysteriousByte: boolean;
	table: Table;
}

export interface DbDecodeOptions extends TableDecodeOptions {
	schema: Schema;
}

/** Table name from a db path: "db/units_tables/mod_units" → "units_tables". */
export function tableNameFromPath(path: string): string {
	const parts = path.split(/[\\/]/);
	if (parts.length !== 3 || parts[0]?.toLowerCase() !== "db" || !parts[1]) {
		throw new FormatError(`Not a DB table path: ${path}`);
	}
	return parts[1];
}

export function readDbHeader(reader: ByteReader): DbHeader {
	let guid: string | null = null;
	let version = 0;
	if (reader.remaining >= 4 && reader.peek(4).equals(GUID_MARKER)) {
		reader.slice(4);
		guid = reader.sizedStringU16();
	}
	if (reader.remaining >= 4 && reader.peek(4).equals(VERSION_MARKER)) {
		reader.slice(4);
		version = reader.i32();
	}
	const mysteriousByte = reader.bool();
	const entryCount = reader.u32();
	return { guid, version, mysteriousByte, entryCount };
}

export function decodeDb(bytes: Buffer, tableName: string, options: DbDecodeOptions): DbFile {
	const reader = new ByteReader(bytes);
	const header = readDbHeader(reader);
	const definition = options.schema.find(tableName, header.version);
	if (!definition) {
		throw new SchemaError(`No definition found for table "${tableName}", version ${header.version}`);
	}

	const { table, incomplete } = Table.decode(tableName, definition, reader, header.entryCount, options);
	if (!incomplete) checkSizeMismatch(reader.position, reader.length);
	return { kind: "DB", tableName, guid: header.guid, mysteriousByte: header.mysteriousByte, table };
}

export function encodeDb(db: DbFile): Buffer {
	const writer = new ByteWriter(1024);
	if (db.guid !== null) {
		writer.bytes(GUID_MARKER);
		writer.sizedStringU16(db.guid);
	}
	const version = db.table.definition.version;
	if (version > 0) {
		writer.bytes(VERSION_MARKER);
		writer.i32(version);
	}
	writer.bool(db.mysteriousByte);
	writer.u32(db.table.length);
	db.table.encode(writer);
	return writer.toBuffer();
}

export function newDb(tableName: string, schema: Schema, rows: Row[] = []): DbFile {
	const definition = schema.latest(tableName);
	if (!definition) throw new SchemaError(`No definition found for table "${tableName}"`);
	return { kind: "DB", tableName, guid: null, mysteriousByte: true, table: new Table(tableName, definition, rows) };
}
