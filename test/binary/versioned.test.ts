import { describe, expect, it } from "vitest";
import { ByteReader } from "../../src/binary/reader.js";
import { U16_TAG, U32_TAG, VersionedFormat } from "../../src/binary/versioned.js";
import { ByteWriter } from "../../src/binary/writer.js";
import { UnsupportedVersionError } from "../../src/errors.js";

type Marker = { version: 1; x: number } | { version: 2; x: number; label: string };

const markerFormat = new VersionedFormat<Marker>("Marker", U16_TAG)
	.register(1, {
		read: (reader) => ({ version: 1, x: reader.i32() }),
		write: (writer, value) => writer.i32(value.x)
	})
	.register(2, {
		read: (reader) => ({ version: 2, x: reader.i32(), label: reader.sizedStringU8() }),
		write: (writer, value) => {
			writer.i32(value.x);
			writer.sizedStringU8(value.version === 2 ? value.label : "");
		}
	});

describe("VersionedFormat", () => {
	it("dispatches on the leading tag", () => {
		const reader = new ByteReader(Buffer.from([2, 0, 5, 0, 0, 0, 1, 0, 0x61]));
		expect(markerFormat.decode(reader)).toEqual({ version: 2, x: 5, label: "a" });
	});

	it("writes the tag before the body", () => {
		const writer = new ByteWriter();
		markerFormat.encode(writer, { version: 1, x: -1 });
		expect(writer.toBuffer()).toEqual(Buffer.from([1, 0, 0xff, 0xff, 0xff, 0xff]));
	});

	it("names entity and version for unknown versions", () => {
		const reader = new ByteReader(Buffer.from([9, 0]));
		expect(() => markerFormat.decode(reader)).toThrow(UnsupportedVersionError);
		expect(() => markerFormat.decode(new ByteReader(Buffer.from([9, 0])))).toThrow("Unsupported Marker version: 9");
	});

	it("lists registered versions", () => {
		expect(markerFormat.versions()).toEqual([1, 2]);
		expect(markerFormat.supports(3)).toBe(false);
	});

	it("supports u32 tags", () => {
		const format = new VersionedFormat<{ version: number }>("Empty", U32_TAG).register(7, {
			read: () => ({ version: 7 }),
			write: () => undefined
		});
		const writer = new ByteWriter();
		format.encode(writer, { version: 7 });
		expect(writer.toBuffer()).toEqual(Buffer.from([7, 0, 0, 0]));
	});
});
