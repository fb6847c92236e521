/**
 * Pack Tools
 *
 * Reads and writes PFH pack archives (PFH0–PFH6) and the schema-driven tables inside them.
 *
 * @example
 * ```ts
 * import { Pack, loadSchema, FileType } from "packfile-tools";
 *
 * const pack = await Pack.open("my_mod.pack");
 * const tables = await pack.decode({ types: [FileType.DB] }, { schema: loadSchema("schema.json") });
 * await pack.save("my_mod.pack", { compress: true });
 * await pack.close();
 * ```
 */

export * from "./errors.js";
export { ByteReader, checkSizeMismatch } from "./binary/reader.js";
export { ByteWriter } from "./binary/writer.js";
export { VersionedFormat, U16_TAG, U32_TAG } from "./binary/versioned.js";
export type { VersionRoutines, VersionTag } from "./binary/versioned.js";

export { Pack } from "./pack/pack.js";
export type { EntryFilter } from "./pack/pack.js";
export { PackEntry, normalizePath, diskPath } from "./pack/entry.js";
export { readPack } from "./pack/reader.js";
export type { ReadPackOptions, PackContents } from "./pack/reader.js";
export { writePack, compareEntryPaths } from "./pack/writer.js";
export type { WritePackOptions } from "./pack/writer.js";
export { packHeaderFormat, headerSize } from "./pack/header.js";
export { FileType, fileTypeOf, isTableType, parseFileTypes } from "./pack/file-type.js";
export { compressData, decompressData, detectCompressionFormat } from "./pack/compression.js";
export type { CompressionFormat } from "./pack/compression.js";
export { decryptData, decryptIndexPath, decryptIndexSize } from "./pack/crypto.js";
export { FileSource, LazyData, MemorySource, Mutex } from "./pack/source.js";
export type { ByteSource } from "./pack/source.js";
export { defaultSettings, parseSettings, serializeSettings } from "./pack/settings.js";
export type { PackSettings } from "./pack/settings.js";
export { PackFileType, PackFlags, PACK_VERSIONS, emptyHeader } from "./pack/types.js";
export type { PackHeader, PackVersion } from "./pack/types.js";

export { Schema, loadSchema, parseSchema, parseDefinition } from "./schema/schema.js";
export { processedFields, columnPosition, keyColumns } from "./schema/definition.js";
export type { Definition, Field, FieldType, PrimitiveFieldType, SequenceFieldType } from "./schema/types.js";

export { decodeTable, decodeRow, decodeField, encodeTable, encodeRow, postprocessRow } from "./table/codec.js";
export type { Row, ReadonlyRow, DecodedRows, TableDecodeOptions } from "./table/codec.js";
export { dataEquals, dataToString, defaultCell, parseCell, convertBetweenTypes } from "./table/decoded-data.js";
export type { DecodedData, SequenceValue } from "./table/decoded-data.js";
export { Table } from "./table/table.js";
export { decodeDb, encodeDb, newDb, tableNameFromPath } from "./table/db.js";
export type { DbFile } from "./table/db.js";
export { decodeLoc, encodeLoc, newLoc, LOC_DEFINITION } from "./table/loc.js";
export type { LocFile } from "./table/loc.js";
export { tableFromXml, tableToXml } from "./table/xml.js";

export { decodeFastBin, encodeFastBin, fastBinFormat } from "./fastbin/fastbin.js";
export type { FastBin, FastBinFile } from "./fastbin/fastbin.js";
export {
	captureLocationFormat,
	captureLocationSetFormat,
	playableAreaFormat,
	pointLightFormat,
	pointLightListFormat,
	propFlagsFormat
} from "./fastbin/blocks.js";
export type {
	CaptureLocation,
	CaptureLocationSet,
	PlayableArea,
	PointLight,
	PointLightList,
	PropFlags
} from "./fastbin/blocks.js";
export { decodeFile, encodeFile } from "./files/decoded.js";
export type { DecodedFile, DecodeContext } from "./files/decoded.js";
export { decodeText, encodeText } from "./files/text.js";
export type { TextFile } from "./files/text.js";

export { PackService } from "./service/pack-service.js";
export type { PackRequest, PackResponse, ResponseTo, EntryInfo } from "./service/pack-service.js";
