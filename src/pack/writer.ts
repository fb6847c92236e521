/**
 * Pack schreiben: Header, Abhängigkeitsindex, Eintragsindex, dann die Daten.
 * Alles wird im Speicher zusammengebaut; erst danach wird die Zieldatei geschrieben.
 */

import { ByteWriter } from "../binary/writer.js";
import type { CompressionFormat } from "./compression.js";
import { PackEntry, diskPath } from "./entry.js";
import { headerSize, packHeaderFormat } from "./header.js";
import type { ReservedEntries } from "./reader.js";
import { type PackSettings, defaultSettings, serializeSettings } from "./settings.js";
import {
	FOOTER_SIZE,
	type PackHeader,
	PackFlags,
	RESERVED_NOTES_PATH,
	RESERVED_SETTINGS_PATH,
	hasCompressionByte,
	hasFlag
} from "./types.js";

export interface WritePackOptions {
	/** Target compression for every entry; undefined keeps each entry's current state. */
	compress?: boolean;
	compressionFormat?: CompressionFormat;
	/** Header timestamp; the stored one is kept when omitted. */
	timestamp?: bigint;
	onWarning?: (message: string) => void;
}

export interface PackToWrite {
	header: PackHeader;
	dependencies: readonly string[];
	entries: readonly PackEntry[];
	notes: string | undefined;
	settings: PackSettings;
	/** Notes and settings entries of the opened archive; written back as they are while unchanged. */
	reserved?: ReservedEntries;
}

/** Lowercased on-disk path first, ordinal comparison of the path as tiebreak. */
export function compareEntryPaths(a: string, b: string): number {
	const lowerA = diskPath(a).toLowerCase();
	const lowerB = diskPath(b).toLowerCase();
	if (lowerA !== lowerB) return lowerA < lowerB ? -1 : 1;
	const diskA = diskPath(a);
	const diskB = diskPath(b);
	return diskA < diskB ? -1 : diskA > diskB ? 1 : 0;
}

/**
 * Virtuelle Einträge existieren nur in dieser Liste, nie im Pack selbst.
 * Settings werden nur geschrieben, wenn das Pack sie schon hatte oder sie vom Standard abweichen.
 */
function reservedEntries(pack: PackToWrite): PackEntry[] {
	const out: PackEntry[] = [];
	const notes = pack.reserved?.notes;
	if (pack.notes !== undefined) {
		out.push(
			notes?.snapshot === pack.notes
				? notes.entry
				: PackEntry.fromBytes(RESERVED_NOTES_PATH, Buffer.from(pack.notes, "utf8"), notes?.entry.timestamp)
		);
	}

	const settings = pack.reserved?.settings;
	const text = serializeSettings(pack.settings).toString("utf8");
	if (settings?.snapshot === text) {
		out.push(settings.entry);
	} else if (settings || text !== serializeSettings(defaultSettings()).toString("utf8")) {
		out.push(PackEntry.fromBytes(RESERVED_SETTINGS_PATH, Buffer.from(text, "utf8"), settings?.entry.timestamp));
	}
	return out;
}

export async function writePack(pack: PackToWrite, options: WritePackOptions = {}): Promise<Buffer> {
	const flags = pack.header.flags & ~(PackFlags.HAS_ENCRYPTED_INDEX | PackFlags.HAS_ENCRYPTED_DATA);
	const header: PackHeader = { ...pack.header, flags, timestamp: options.timestamp ?? pack.header.timestamp };
	const canCompress = hasCompressionByte(header);
	const withTimestamps = hasFlag(flags, PackFlags.HAS_INDEX_WITH_TIMESTAMPS);
	const wideTimestamps = header.version === "PFH2" || header.version === "PFH3";

	for (const entry of pack.entries) {
		if (entry.encrypted) options.onWarning?.(`${entry.path}: encrypted data is written decrypted`);
	}

	const entries = [...pack.entries, ...reservedEntries(pack)].sort((a, b) => compareEntryPaths(a.path, b.path));

	const payloads = await Promise.all(
		entries.map((entry) =>
			entry.prepareForSave({
				compress: options.compress,
				compressionFormat: options.compressionFormat,
				canCompress
			})
		)
	);

	const dependencyIndex = new ByteWriter();
	for (const dependency of pack.dependencies) dependencyIndex.stringU8ZeroTerminated(dependency);

	const entryIndex = new ByteWriter(entries.length * 64 + 16);
	entries.forEach((entry, i) => {
		entryIndex.u32(payloads[i]?.length ?? 0);
		if (withTimestamps) {
			const timestamp = entry.timestamp ?? 0n;
			if (wideTimestamps) entryIndex.u64(BigInt.asUintN(64, timestamp));
			else entryIndex.u32(Number(BigInt.asUintN(32, timestamp)));
		}
		if (canCompress) entryIndex.bool(entry.compressed);
		entryIndex.stringU8ZeroTerminated(diskPath(entry.path));
	});

	const headerWriter = new ByteWriter(headerSize(header.version, flags));
	packHeaderFormat.encode(headerWriter, {
		...header,
		counts: {
			dependencyCount: pack.dependencies.length,
			dependencyIndexSize: dependencyIndex.length,
			entryCount: entries.length,
			entryIndexSize: entryIndex.length
		}
	});

	const parts = [headerWriter.toBuffer(), dependencyIndex.toBuffer(), entryIndex.toBuffer(), ...payloads];
	if (hasFlag(flags, PackFlags.HAS_EXTENDED_HEADER)) {
		const footer = Buffer.alloc(FOOTER_SIZE);
		header.footer?.copy(footer, 0, 0, FOOTER_SIZE);
		parts.push(footer);
	}
	return Buffer.concat(parts);
}
