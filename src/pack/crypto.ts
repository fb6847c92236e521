/**
 * Entschlüsselung für verschlüsselte Pack-Indizes und -Daten.
 * Nur Lesen: beim Speichern wird alles unverschlüsselt geschrieben.
 */

const INDEX_KEY = 0xe10b73f4;
const INDEX_STRING_KEY = Buffer.from("#:AhppdV-!PEfz&}[]Nv?6w4guU%dF5.fq:n*-qGuhBJJBm&?2tPy!geW/+k#pG?", "latin1");
const DATA_KEY = 0x8feb2a6740a6920en;
const MASK64 = 0xffffffffffffffffn;

/** Size or timestamp field of an index entry; position counts down from entryCount - 1. */
export function decryptIndexSize(value: number, position: number): number {
	return (~position ^ value ^ INDEX_KEY) >>> 0;
}

/** Inverse of decryptIndexSize (the XOR is its own inverse). */
export function encryptIndexSize(value: number, position: number): number {
	return decryptIndexSize(value, position);
}

/**
 * Decrypts a zero-terminated path. The key is the entry's decrypted size truncated to u8.
 * Returns the path and the number of encrypted bytes consumed, terminator included.
 */
export function decryptIndexPath(bytes: Uint8Array, key: number): { path: string; consumed: number } {
	const out: number[] = [];
	const keyByte = ~key & 0xff;
	for (let i = 0; i < bytes.length; i++) {
		const plain = (bytes[i] ?? 0) ^ keyByte ^ (INDEX_STRING_KEY[i % INDEX_STRING_KEY.length] ?? 0);
		if (plain === 0) return { path: Buffer.from(out).toString("latin1"), consumed: i + 1 };
		out.push(plain);
	}
	return { path: Buffer.from(out).toString("latin1"), consumed: bytes.length };
}

/** Inverse of decryptIndexPath, terminator included. */
export function encryptIndexPath(path: string, key: number): Buffer {
	const plain = Buffer.concat([Buffer.from(path, "latin1"), Buffer.alloc(1)]);
	const keyByte = ~key & 0xff;
	return Buffer.from(plain.map((b, i) => b ^ keyByte ^ (INDEX_STRING_KEY[i % INDEX_STRING_KEY.length] ?? 0)));
}

/** XOR stream over 8-byte blocks; a trailing partial block stays as is. */
export function decryptData(bytes: Uint8Array): Buffer {
	const out = Buffer.from(bytes);
	const blocks = Math.floor(out.length / 8);
	for (let block = 0; block < blocks; block++) {
		const edi = BigInt(block * 8);
		const key = (DATA_KEY * (~edi & MASK64)) & MASK64;
		out.writeBigUInt64LE(out.readBigUInt64LE(block * 8) ^ key, block * 8);
	}
	return out;
}

/** The data cipher is a plain XOR, so encrypting is the same operation. */
export const encryptData = decryptData;
