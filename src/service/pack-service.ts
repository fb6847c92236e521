/**
 * Request/response front end for one open pack. Requests run one at a time, in the
 * order they were submitted; each resolves with the response of its own type.
 */

import { PackToolError } from "../errors.js";
import type { DecodeContext, DecodedFile } from "../files/decoded.js";
import type { FileType } from "../pack/file-type.js";
import { type EntryFilter, Pack } from "../pack/pack.js";
import type { ReadPackOptions } from "../pack/reader.js";
import type { PackSettings } from "../pack/settings.js";
import { Mutex } from "../pack/source.js";
import type { PackFileType, PackHeader, PackVersion } from "../pack/types.js";
import type { WritePackOptions } from "../pack/writer.js";

export type PackRequest =
	| { type: "open"; path: string; options?: ReadPackOptions }
	| { type: "new"; version?: PackVersion; fileType?: PackFileType }
	| { type: "save"; path: string; options?: WritePackOptions }
	| { type: "list"; filter?: EntryFilter }
	| { type: "insert"; path: string; contents: Buffer | DecodedFile }
	| { type: "remove"; path: string }
	| { type: "rename"; from: string; to: string }
	| { type: "setDecoded"; path: string; decoded: DecodedFile }
	| { type: "setDependencies"; dependencies: string[] }
	| { type: "setNotes"; notes: string | undefined }
	| { type: "setSettings"; settings: PackSettings }
	| { type: "load"; filter?: EntryFilter }
	| { type: "decode"; filter?: EntryFilter; ctx?: DecodeContext }
	| { type: "close" };

export interface EntryInfo {
	path: string;
	type: FileType;
	size: number;
	compressed: boolean;
	encrypted: boolean;
	loaded: boolean;
}

export type PackResponse =
	| { type: "open"; header: PackHeader; entryCount: number }
	| { type: "new"; header: PackHeader }
	| { type: "save"; path: string; bytes: number }
	| { type: "list"; entries: EntryInfo[] }
	| { type: "insert"; path: string }
	| { type: "remove"; removed: boolean }
	| { type: "rename"; path: string }
	| { type: "setDecoded"; path: string }
	| { type: "setDependencies"; dependencies: string[] }
	| { type: "setNotes"; notes: string | undefined }
	| { type: "setSettings"; settings: PackSettings }
	| { type: "load"; loaded: number }
	| { type: "decode"; files: Map<string, DecodedFile> }
	| { type: "close"; closed: boolean };

export type ResponseTo<R extends PackRequest> = Extract<PackResponse, { type: R["type"] }>;

export class PackService {
	private readonly queue = new Mutex();
	private pack: Pack | undefined;

	get isOpen(): boolean {
		return this.pack !== undefined;
	}

	submit<R extends PackRequest>(request: R): Promise<ResponseTo<R>>;
	submit(request: PackRequest): Promise<PackResponse> {
		return this.queue.run(() => this.handle(request));
	}

	private current(): Pack {
		if (!this.pack) throw new PackToolError("No pack is open");
		return this.pack;
	}

	private async replace(next: Pack): Promise<void> {
		const previous = this.pack;
		this.pack = next;
		if (previous) await previous.close();
	}

	private async handle(request: PackRequest): Promise<PackResponse> {
		switch (request.type) {
			case "open": {
				const pack = await Pack.open(request.path, request.options);
				await this.replace(pack);
				return { type: "open", header: pack.header, entryCount: pack.size };
			}
			case "new": {
				const pack = Pack.create(request.version, request.fileType);
				await this.replace(pack);
				return { type: "new", header: pack.header };
			}
			case "save": {
				const bytes = await this.current().save(request.path, request.options);
				return { type: "save", path: request.path, bytes };
			}
			case "list":
				return {
					type: "list",
					entries: this.current()
						.entries(request.filter)
						.map((entry) => ({
							path: entry.path,
							type: entry.type,
							size: entry.size,
							compressed: entry.compressed,
							encrypted: entry.encrypted,
							loaded: entry.loaded
						}))
						.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
				};
			case "insert":
				return { type: "insert", path: this.current().insert(request.path, request.contents).path };
			case "remove":
				return { type: "remove", removed: this.current().remove(request.path) };
			case "rename":
				return { type: "rename", path: this.current().rename(request.from, request.to).path };
			case "setDecoded":
				return { type: "setDecoded", path: this.current().setDecoded(request.path, request.decoded).path };
			case "setDependencies": {
				const pack = this.current();
				pack.dependencies.splice(0, pack.dependencies.length, ...request.dependencies);
				return { type: "setDependencies", dependencies: [...pack.dependencies] };
			}
			case "setNotes": {
				this.current().notes = request.notes;
				return { type: "setNotes", notes: request.notes };
			}
			case "setSettings": {
				this.current().settings = request.settings;
				return { type: "setSettings", settings: request.settings };
			}
			case "load": {
				const pack = this.current();
				await pack.load(request.filter);
				return { type: "load", loaded: pack.entries(request.filter).length };
			}
			case "decode":
				return { type: "decode", files: await this.current().decode(request.filter, request.ctx) };
			case "close": {
				const pack = this.pack;
				this.pack = undefined;
				if (pack) await pack.close();
				return { type: "close", closed: pack !== undefined };
			}
		}
	}
}
