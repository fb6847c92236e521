#!/usr/bin/env node
/**
 * CLI für Pack-Archive
 * Verwendung:
 *   list <input.pack>                         - Einträge auflisten
 *   unpack <input.pack> [outputDir]           - alle Einträge extrahieren
 *   pack <inputDir> <output.pack>             - Verzeichnis zu Pack packen
 *   repack <input.pack> <output.pack>         - öffnen und neu schreiben
 *   export-table <input.pack> <path> [out.xml]
 *   import-table <input.pack> <path> <in.xml> [output.pack]
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { PackToolError } from "./errors.js";
import type { DecodedFile } from "./files/decoded.js";
import type { CompressionFormat } from "./pack/compression.js";
import { FileType, parseFileTypes } from "./pack/file-type.js";
import { Pack } from "./pack/pack.js";
import { PACK_VERSIONS, PackFileType, type PackVersion, isPackVersion } from "./pack/types.js";
import { type Schema, loadSchema } from "./schema/schema.js";
import type { DbFile } from "./table/db.js";
import { LOC_DEFINITION, type LocFile } from "./table/loc.js";
import { tableFromXml, tableToXml } from "./table/xml.js";

const HELP = `
Pack Tools - pack archives and their tables

Usage:
  list <input.pack>                                   - list entries
  unpack <input.pack> [outputDir]                     - extract entries
  pack <inputDir> <output.pack>                       - pack a folder
  repack <input.pack> <output.pack>                   - open and write again
  export-table <input.pack> <path> [output.xml]       - DB/Loc table → XML
  import-table <input.pack> <path> <input.xml> [output.pack]
                                                      - XML → DB/Loc table, saved into the pack

Options:
  --schema <file.json>        table definitions (needed for DB tables)
  --types db,loc,...          only these entry types (list, unpack)
  --compress lz4|zstd|none    compression on save (default: keep)
  --version PFH5              pack version for "pack" (${PACK_VERSIONS.join(", ")})
  --verbose                   print warnings

Examples:
  node dist/src/cli.js list data.pack --types db
  node dist/src/cli.js unpack my_mod.pack ./extracted
  node dist/src/cli.js pack ./extracted my_mod.pack --compress zstd
  node dist/src/cli.js export-table my_mod.pack db/units_tables/my_units --schema schema.json
`;

interface CliOptions {
	positional: string[];
	schema?: string;
	types?: FileType[];
	compress?: boolean;
	compressionFormat?: CompressionFormat;
	version: PackVersion;
	verbose: boolean;
}

function parseArgs(argv: string[]): CliOptions {
	const options: CliOptions = { positional: [], version: "PFH5", verbose: false };
	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i] ?? "";
		const value = (): string => {
			const next = argv[++i];
			if (next === undefined) throw new PackToolError(`Missing value for ${arg}`);
			return next;
		};
		switch (arg) {
			case "--schema":
				options.schema = value();
				break;
			case "--types":
				options.types = parseFileTypes(value());
				break;
			case "--compress": {
				const mode = value();
				if (mode === "none") options.compress = false;
				else if (mode === "lz4" || mode === "zstd") {
					options.compress = true;
					options.compressionFormat = mode;
				} else throw new PackToolError(`Unknown compression: ${mode}`);
				break;
			}
			case "--version": {
				const version = value().toUpperCase();
				if (!isPackVersion(version)) throw new PackToolError(`Unknown pack version: ${version}`);
				options.version = version;
				break;
			}
			case "--verbose":
				options.verbose = true;
				break;
			default:
				options.positional.push(arg);
		}
	}
	return options;
}

/** Verzeichnis rekursiv scannen, versteckte Dateien auslassen */
function scanDirectory(dir: string): string[] {
	const files: string[] = [];
	function walk(base: string) {
		for (const entry of readdirSync(join(dir, base), { withFileTypes: true })) {
			const rel = base ? `${base}/${entry.name}` : entry.name;
			if (entry.isDirectory()) {
				if (!entry.name.startsWith(".")) walk(rel);
			} else if (entry.isFile() && !entry.name.startsWith(".")) {
				files.push(rel);
			}
		}
	}
	walk("");
	return files.sort();
}

function requireArg(value: string | undefined, what: string): string {
	if (!value) throw new PackToolError(`Missing ${what}\n${HELP}`);
	return value;
}

function requireFile(path: string): void {
	if (!existsSync(path)) throw new PackToolError(`File not found: ${path}`);
}

function requireSchema(options: CliOptions): Schema | undefined {
	return options.schema ? loadSchema(options.schema) : undefined;
}

function tableOf(decoded: DecodedFile | undefined, path: string): DbFile | LocFile {
	if (!decoded || (decoded.kind !== "DB" && decoded.kind !== "Loc")) {
		throw new PackToolError(`${path} is not a table`);
	}
	return decoded;
}

async function main(): Promise<void> {
	const args = process.argv.slice(2);
	const command = args[0];
	if (!command || args.includes("--help") || args.includes("-h") || command === "help") {
		console.log(HELP);
		process.exitCode = command ? 0 : 1;
		return;
	}

	const options = parseArgs(args.slice(1));
	const [first, second, third, fourth] = options.positional;
	const onWarning = options.verbose ? (message: string) => console.error(`Warning: ${message}`) : undefined;
	const saveOptions = { compress: options.compress, compressionFormat: options.compressionFormat, onWarning };

	if (command === "list") {
		const input = requireArg(first, "input pack");
		requireFile(input);
		const pack = await Pack.open(input, { typesToLoad: options.types, onWarning });
		try {
			console.log(`${pack.header.version} ${PackFileType[pack.header.fileType]}, ${pack.size} entries`);
			if (pack.dependencies.length > 0) console.log(`Dependencies: ${pack.dependencies.join(", ")}`);
			for (const entry of pack.entries().sort((a, b) => (a.path < b.path ? -1 : 1))) {
				const flags = `${entry.compressed ? "C" : "-"}${entry.encrypted ? "E" : "-"}`;
				console.log(`  ${flags} ${String(entry.size).padStart(10)}  ${entry.path}`);
			}
		} finally {
			await pack.close();
		}
	} else if (command === "unpack") {
		const input = requireArg(first, "input pack");
		const outputDir = second ?? join(process.cwd(), "extracted");
		requireFile(input);
		mkdirSync(outputDir, { recursive: true });
		console.log(`Unpacking ${input} to ${outputDir}...`);
		const pack = await Pack.open(input, { typesToLoad: options.types, onWarning });
		try {
			const entries = pack.entries();
			const contents = await Promise.all(entries.map((entry) => entry.bytes()));
			entries.forEach((entry, i) => {
				const outPath = join(outputDir, entry.path);
				mkdirSync(dirname(outPath), { recursive: true });
				writeFileSync(outPath, contents[i] ?? Buffer.alloc(0), { flag: "w" });
				console.log(`  - ${outPath}`);
			});
			console.log(`Done: ${entries.length} files extracted`);
		} finally {
			await pack.close();
		}
	} else if (command === "pack") {
		const inputDir = requireArg(first, "input directory");
		const output = requireArg(second, "output pack");
		requireFile(inputDir);
		const pack = Pack.create(options.version, PackFileType.Mod);
		for (const rel of scanDirectory(inputDir)) {
			pack.insert(rel, readFileSync(join(inputDir, rel)));
		}
		console.log(`Packing ${inputDir} → ${output}...`);
		const bytes = await pack.save(output, saveOptions);
		console.log(`Done: ${pack.size} files, ${bytes} bytes written to ${output}`);
	} else if (command === "repack") {
		const input = requireArg(first, "input pack");
		const output = requireArg(second, "output pack");
		requireFile(input);
		const pack = await Pack.open(input, { lazy: false, onWarning });
		try {
			const bytes = await pack.save(output, saveOptions);
			console.log(`Done: ${pack.size} files, ${bytes} bytes written to ${output}`);
		} finally {
			await pack.close();
		}
	} else if (command === "export-table") {
		const input = requireArg(first, "input pack");
		const path = requireArg(second, "table path");
		requireFile(input);
		const schema = requireSchema(options);
		const pack = await Pack.open(input, { typesToLoad: [FileType.DB, FileType.Loc], onWarning });
		try {
			const entry = pack.get(path);
			if (!entry) throw new PackToolError(`No entry at ${path}`);
			const table = tableOf(await entry.decode({ schema, onWarning }), path).table;
			const output = third ?? `${path.split("/").pop() ?? "table"}.xml`;
			writeFileSync(output, tableToXml(table), "utf8");
			console.log(`Done: ${table.length} rows written to ${output}`);
		} finally {
			await pack.close();
		}
	} else if (command === "import-table") {
		const input = requireArg(first, "input pack");
		const path = requireArg(second, "table path");
		const xmlPath = requireArg(third, "input XML");
		requireFile(input);
		requireFile(xmlPath);
		const schema = requireSchema(options);
		const pack = await Pack.open(input, { lazy: false, onWarning });
		try {
			const entry = pack.get(path);
			if (!entry) throw new PackToolError(`No entry at ${path}`);
			const decoded = tableOf(await entry.decode({ schema, onWarning }), path);
			const xml = readFileSync(xmlPath, "utf8");
			if (decoded.kind === "DB") {
				if (!schema) throw new PackToolError("DB tables need --schema");
				pack.setDecoded(path, { ...decoded, table: tableFromXml(xml, decoded.tableName, schema) });
			} else {
				pack.setDecoded(path, { ...decoded, table: tableFromXml(xml, decoded.table.name, LOC_DEFINITION) });
			}
			const output = fourth ?? input;
			const bytes = await pack.save(output, saveOptions);
			console.log(`Done: ${path} imported, ${bytes} bytes written to ${output}`);
		} finally {
			await pack.close();
		}
	} else {
		throw new PackToolError(`Unknown command: ${command}`);
	}
}

main().catch((err: unknown) => {
	console.error("Error:", err instanceof Error ? err.message : err);
	process.exit(1);
});
