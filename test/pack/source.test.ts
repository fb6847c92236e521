import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NotLoadedError, OutOfBoundsError } from "../../src/errors.js";
import { Pack } from "../../src/pack/pack.js";
import { FileSource, LazyData, MemorySource, Mutex } from "../../src/pack/source.js";

describe("Mutex", () => {
	it("runs tasks in call order", async () => {
		const mutex = new Mutex();
		const order: string[] = [];
		const slow = mutex.run(async () => {
			await new Promise((resolve) => setTimeout(resolve, 10));
			order.push("slow");
		});
		const fast = mutex.run(async () => {
			order.push("fast");
		});
		await Promise.all([slow, fast]);
		expect(order).toEqual(["slow", "fast"]);
	});

	it("keeps going after a failed task", async () => {
		const mutex = new Mutex();
		await expect(mutex.run(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
		await expect(mutex.run(async () => 42)).resolves.toBe(42);
	});
});

describe("LazyData", () => {
	it("reads its window once and caches it", async () => {
		const data = new LazyData(new MemorySource(Buffer.from("0123456789")), 2, 3);
		expect(data.loaded).toBe(false);
		expect(() => data.cached()).toThrow(NotLoadedError);
		expect((await data.load()).toString()).toBe("234");
		expect(data.cached().toString()).toBe("234");
	});

	it("fails for windows outside the source", async () => {
		const data = new LazyData(new MemorySource(Buffer.alloc(4)), 2, 3);
		await expect(data.load()).rejects.toThrow(OutOfBoundsError);
		expect(data.loaded).toBe(false);
	});
});

describe("FileSource", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "packfile-tools-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("reads ranges until released", async () => {
		const path = join(dir, "data.bin");
		await writeFile(path, Buffer.from("abcdefgh"));
		const source = await FileSource.open(path);
		expect(source.length).toBe(8);
		expect((await source.read(3, 2)).toString()).toBe("de");

		source.retain();
		await source.release();
		expect(source.closed).toBe(false);
		await source.release();
		expect(source.closed).toBe(true);
		await expect(source.read(0, 1)).rejects.toThrow(NotLoadedError);
	});

	it("backs packs saved to and opened from disk", async () => {
		const path = join(dir, "test.pack");
		const pack = Pack.create("PFH5");
		pack.insert("text/a.txt", Buffer.from("first"));
		pack.insert("text/b.txt", Buffer.from("second"));
		const written = await pack.save(path, { compress: true, compressionFormat: "zstd" });

		const opened = await Pack.open(path);
		expect(opened.size).toBe(2);
		const [a, b] = await Promise.all([opened.get("text/a.txt")?.bytes(), opened.get("text/b.txt")?.bytes()]);
		expect(a?.toString()).toBe("first");
		expect(b?.toString()).toBe("second");
		expect(written).toBeGreaterThan(28);
		await opened.close();
		expect(() => opened.get("text/a.txt")?.cachedBytes()).not.toThrow();
	});
});
