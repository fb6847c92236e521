/**
 * Decoded entry contents, dispatched on the entry's file type.
 */

import { SchemaError } from "../errors.js";
import { type FastBinFile, decodeFastBin, encodeFastBin } from "../fastbin/fastbin.js";
import { FileType, fileTypeOf } from "../pack/file-type.js";
import type { Schema } from "../schema/schema.js";
import { type DbFile, decodeDb, encodeDb, tableNameFromPath } from "../table/db.js";
import { type LocFile, decodeLoc, encodeLoc } from "../table/loc.js";
import { type TextFile, decodeText, encodeText } from "./text.js";

export type DecodedFile = DbFile | LocFile | FastBinFile | TextFile;

export interface DecodeContext {
	/** Needed for DB tables. */
	schema?: Schema;
	/** Keep partially decoded rows instead of failing. */
	returnIncomplete?: boolean;
	onWarning?: (message: string) => void;
}

export function isDecodable(type: FileType): boolean {
	return type === FileType.DB || type === FileType.Loc || type === FileType.FastBin || type === FileType.Text;
}

/** Decodes an entry's plain bytes; undefined for types kept as raw bytes. */
export function decodeFile(path: string, bytes: Buffer, ctx: DecodeContext = {}): DecodedFile | undefined {
	switch (fileTypeOf(path)) {
		case FileType.DB: {
			if (!ctx.schema) throw new SchemaError(`A schema is needed to decode ${path}`);
			return decodeDb(bytes, tableNameFromPath(path), {
				schema: ctx.schema,
				returnIncomplete: ctx.returnIncomplete,
				onWarning: ctx.onWarning
			});
		}
		case FileType.Loc:
			return decodeLoc(bytes, { returnIncomplete: ctx.returnIncomplete, onWarning: ctx.onWarning });
		case FileType.FastBin:
			return decodeFastBin(bytes);
		case FileType.Text:
			return decodeText(bytes);
		default:
			return undefined;
	}
}

export function encodeFile(decoded: DecodedFile): Buffer {
	switch (decoded.kind) {
		case "DB":
			return encodeDb(decoded);
		case "Loc":
			return encodeLoc(decoded);
		case "FastBin":
			return encodeFastBin(decoded);
		case "Text":
			return encodeText(decoded);
	}
}
