/**
 * Pack-Index lesen: Header, Abhängigkeiten, Einträge. Die Daten selbst bleiben in der
 * Quelle und werden erst bei Bedarf geladen.
 */

import { ByteReader } from "../binary/reader.js";
import { IndexError } from "../errors.js";
import { decryptIndexPath, decryptIndexSize } from "./crypto.js";
import { PackEntry, normalizePath } from "./entry.js";
import { type FileType, fileTypeOf } from "./file-type.js";
import { HEADER_PREFIX_SIZE, headerSize, packHeaderFormat, readHeaderPrefix } from "./header.js";
import { type PackSettings, defaultSettings, parseSettings, serializeSettings } from "./settings.js";
import { type ByteSource, LazyData } from "./source.js";
import {
	FOOTER_SIZE,
	type PackHeader,
	PackFlags,
	RESERVED_NOTES_PATH,
	RESERVED_SETTINGS_PATH,
	hasCompressionByte,
	hasFlag
} from "./types.js";

export interface ReadPackOptions {
	/** Only entries of these types are kept; the others are skipped. */
	typesToLoad?: FileType[];
	/** Default true. With false every entry is loaded during open. */
	lazy?: boolean;
	onWarning?: (message: string) => void;
}

/** A notes or settings entry as it was read, with the value it held at that point. */
export interface ReservedEntry {
	entry: PackEntry;
	snapshot: string;
}

export interface ReservedEntries {
	notes?: ReservedEntry;
	settings?: ReservedEntry;
}

export interface PackContents {
	header: PackHeader;
	dependencies: string[];
	entries: PackEntry[];
	notes: string | undefined;
	settings: PackSettings;
	reserved: ReservedEntries;
}

function pad8(value: number): number {
	const rest = value % 8;
	return rest === 0 ? value : value + 8 - rest;
}

export async function readPack(source: ByteSource, options: ReadPackOptions = {}): Promise<PackContents> {
	const fileLength = source.length;
	if (fileLength < HEADER_PREFIX_SIZE) {
		throw new IndexError(`Pack header not complete: file has ${fileLength} bytes`);
	}
	const prefix = readHeaderPrefix(await source.read(0, HEADER_PREFIX_SIZE));
	const size = headerSize(prefix.version, prefix.flags);
	if (fileLength < size) {
		throw new IndexError(`Pack header not complete: ${prefix.version} needs ${size} bytes, file has ${fileLength}`);
	}

	const record = packHeaderFormat.decode(new ByteReader(await source.read(0, size)));
	const { counts, ...header } = record;
	const indexesEnd = size + counts.dependencyIndexSize + counts.entryIndexSize;
	if (fileLength < indexesEnd) {
		throw new IndexError(`Pack indexes not complete: need ${indexesEnd} bytes, file has ${fileLength}`);
	}

	const extended = hasFlag(header.flags, PackFlags.HAS_EXTENDED_HEADER);
	const encryptedIndex = hasFlag(header.flags, PackFlags.HAS_ENCRYPTED_INDEX);
	const encryptedData = hasFlag(header.flags, PackFlags.HAS_ENCRYPTED_DATA);
	const withTimestamps = hasFlag(header.flags, PackFlags.HAS_INDEX_WITH_TIMESTAMPS);
	const wideTimestamps = header.version === "PFH2" || header.version === "PFH3";
	const compressionByte = hasCompressionByte(header);
	const padData = extended && encryptedData;

	const dependencyIndex = new ByteReader(await source.read(size, counts.dependencyIndexSize));
	const dependencies: string[] = [];
	for (let i = 0; i < counts.dependencyCount; i++) {
		dependencies.push(dependencyIndex.stringU8ZeroTerminated());
	}

	const index = new ByteReader(await source.read(size + counts.dependencyIndexSize, counts.entryIndexSize));
	let dataPosition = padData ? pad8(indexesEnd) : indexesEnd;
	const entries: PackEntry[] = [];
	let notesEntry: PackEntry | undefined;
	let settingsEntry: PackEntry | undefined;

	// Schlüssel laufen rückwärts: der erste Eintrag hat Position entryCount - 1.
	for (let position = counts.entryCount - 1; position >= 0; position--) {
		const rawSize = index.u32();
		const entrySize = encryptedIndex ? decryptIndexSize(rawSize, position) : rawSize;

		let timestamp: bigint | undefined;
		if (withTimestamps) {
			if (wideTimestamps) {
				timestamp = index.u64();
			} else {
				const rawTimestamp = index.u32();
				timestamp = BigInt(encryptedIndex ? decryptIndexSize(rawTimestamp, position) : rawTimestamp);
			}
		}

		const compressed = compressionByte ? index.bool() : false;

		let path: string;
		if (encryptedIndex) {
			const decrypted = decryptIndexPath(index.peek(index.remaining), entrySize & 0xff);
			index.slice(decrypted.consumed);
			path = normalizePath(decrypted.path);
		} else {
			path = normalizePath(index.stringU8ZeroTerminated());
		}

		const entry = PackEntry.lazy(path, new LazyData(source, dataPosition, entrySize), {
			compressed,
			encrypted: encryptedData,
			timestamp
		});

		if (path === RESERVED_NOTES_PATH) notesEntry = entry;
		else if (path === RESERVED_SETTINGS_PATH) settingsEntry = entry;
		else if (!options.typesToLoad || options.typesToLoad.includes(fileTypeOf(path))) entries.push(entry);

		dataPosition += padData ? pad8(entrySize) : entrySize;
	}

	const expectedEnd = extended ? fileLength - FOOTER_SIZE : fileLength;
	if (dataPosition !== expectedEnd) {
		throw new IndexError(`Pack size mismatch: index accounts for ${dataPosition} bytes, expected ${expectedEnd}`);
	}
	if (extended) header.footer = await source.read(expectedEnd, FOOTER_SIZE);

	const reserved: ReservedEntries = {};
	let notes: string | undefined;
	if (notesEntry) {
		notes = (await notesEntry.bytes()).toString("utf8");
		reserved.notes = { entry: notesEntry, snapshot: notes };
	}
	let settings = defaultSettings();
	if (settingsEntry) {
		settings = parseSettings(await settingsEntry.bytes(), options.onWarning);
		reserved.settings = { entry: settingsEntry, snapshot: serializeSettings(settings).toString("utf8") };
	}

	if (options.lazy === false) {
		await Promise.all(entries.map((entry) => entry.load()));
	}

	return { header, dependencies, entries, notes, settings, reserved };
}
