import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PackToolError } from "../../src/errors.js";
import { FileType } from "../../src/pack/file-type.js";
import { PackService } from "../../src/service/pack-service.js";
import { newLoc } from "../../src/table/loc.js";

describe("PackService", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "packfile-service-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("fails requests while no pack is open and keeps serving", async () => {
		const service = new PackService();
		await expect(service.submit({ type: "list" })).rejects.toThrow(new PackToolError("No pack is open"));
		const created = await service.submit({ type: "new", version: "PFH4" });
		expect(created.header.version).toBe("PFH4");
		expect(service.isOpen).toBe(true);
	});

	it("answers requests in submission order", async () => {
		const service = new PackService();
		const pending = [
			service.submit({ type: "new" }),
			service.submit({ type: "insert", path: "text\\b.txt", contents: Buffer.from("b") }),
			service.submit({ type: "insert", path: "text/a.txt", contents: Buffer.from("a") }),
			service.submit({ type: "list" }),
			service.submit({ type: "remove", path: "text/b.txt" }),
			service.submit({ type: "list", filter: { prefix: "text" } })
		] as const;
		const [, insertedB, , firstList, removed, secondList] = await Promise.all(pending);

		expect(insertedB.path).toBe("text/b.txt");
		expect(firstList.entries.map((e) => e.path)).toEqual(["text/a.txt", "text/b.txt"]);
		expect(removed.removed).toBe(true);
		expect(secondList.entries).toEqual([
			{ path: "text/a.txt", type: FileType.Text, size: 1, compressed: false, encrypted: false, loaded: true }
		]);
	});

	it("saves, reopens and decodes", async () => {
		const path = join(dir, "service.pack");
		const service = new PackService();
		await service.submit({ type: "new", version: "PFH5" });
		await service.submit({ type: "insert", path: "text/db/test.loc", contents: newLoc() });
		await service.submit({ type: "setDependencies", dependencies: ["base.pack"] });
		await service.submit({ type: "setNotes", notes: "service notes" });
		const saved = await service.submit({ type: "save", path });
		expect(saved.path).toBe(path);
		expect(saved.bytes).toBeGreaterThan(0);

		const opened = await service.submit({ type: "open", path });
		expect(opened.entryCount).toBe(1);

		const decoded = await service.submit({ type: "decode", filter: { types: [FileType.Loc] } });
		expect(decoded.files.get("text/db/test.loc")?.kind).toBe("Loc");

		expect((await service.submit({ type: "close" })).closed).toBe(true);
		expect((await service.submit({ type: "close" })).closed).toBe(false);
		expect(service.isOpen).toBe(false);
	});

	it("carries settings and loads entries", async () => {
		const path = join(dir, "settings.pack");
		const service = new PackService();
		await service.submit({ type: "new" });
		await service.submit({ type: "insert", path: "text/a.txt", contents: Buffer.from("a") });
		await service.submit({
			type: "setSettings",
			settings: { text: {}, strings: {}, bools: { diagnostics_ignored: true }, numbers: {} }
		});
		await service.submit({ type: "save", path });
		await service.submit({ type: "open", path });

		const before = await service.submit({ type: "list" });
		expect(before.entries.map((e) => e.loaded)).toEqual([false]);
		expect((await service.submit({ type: "load" })).loaded).toBe(1);
		const after = await service.submit({ type: "list" });
		expect(after.entries.map((e) => e.loaded)).toEqual([true]);
		await service.submit({ type: "close" });
	});

	it("renames entries", async () => {
		const service = new PackService();
		await service.submit({ type: "new" });
		await service.submit({ type: "insert", path: "old.txt", contents: Buffer.from("x") });
		const renamed = await service.submit({ type: "rename", from: "old.txt", to: "new/name.txt" });
		expect(renamed.path).toBe("new/name.txt");
		const listed = await service.submit({ type: "list" });
		expect(listed.entries.map((e) => e.path)).toEqual(["new/name.txt"]);
	});
});
