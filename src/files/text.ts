export type TextEncoding = "utf8" | "utf8-bom" | "utf16le";

export interface TextFile {
	kind: "Text";
	encoding: TextEncoding;
	contents: string;
}

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);
const UTF16LE_BOM = Buffer.from([0xff, 0xfe]);

export function decodeText(bytes: Buffer): TextFile {
	if (bytes.subarray(0, 2).equals(UTF16LE_BOM)) {
		return { kind: "Text", encoding: "utf16le", contents: bytes.subarray(2).toString("utf16le") };
	}
	if (bytes.subarray(0, 3).equals(UTF8_BOM)) {
		return { kind: "Text", encoding: "utf8-bom", contents: bytes.subarray(3).toString("utf8") };
	}
	return { kind: "Text", encoding: "utf8", contents: bytes.toString("utf8") };
}

export function encodeText(text: TextFile): Buffer {
	switch (text.encoding) {
		case "utf16le":
			return Buffer.concat([UTF16LE_BOM, Buffer.from(text.contents, "utf16le")]);
		case "utf8-bom":
			return Buffer.concat([UTF8_BOM, Buffer.from(text.contents, "utf8")]);
		case "utf8":
			return Buffer.from(text.contents, "utf8");
	}
}
