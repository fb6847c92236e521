/**
 * Pack settings, stored as JSON in the reserved settings entry.
 */

export interface PackSettings {
	text: Record<string, string>;
	strings: Record<string, string>;
	bools: Record<string, boolean>;
	numbers: Record<string, number>;
}

export function defaultSettings(): PackSettings {
	return { text: {}, strings: {}, bools: {}, numbers: {} };
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pick<T>(raw: unknown, guard: (value: unknown) => value is T): Record<string, T> {
	const out: Record<string, T> = {};
	if (!isRecord(raw)) return out;
	for (const [key, value] of Object.entries(raw)) {
		if (guard(value)) out[key] = value;
	}
	return out;
}

const isString = (v: unknown): v is string => typeof v === "string";
const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";
const isNumber = (v: unknown): v is number => typeof v === "number";

/** Unparseable JSON yields the default settings and a warning. */
export function parseSettings(bytes: Buffer, onWarning?: (message: string) => void): PackSettings {
	let raw: unknown;
	try {
		raw = JSON.parse(bytes.toString("utf8"));
	} catch (err) {
		onWarning?.(`Ignoring unreadable pack settings: ${err instanceof Error ? err.message : String(err)}`);
		return defaultSettings();
	}
	if (!isRecord(raw)) return defaultSettings();
	return {
		text: pick(raw.text, isString),
		strings: pick(raw.strings, isString),
		bools: pick(raw.bools, isBoolean),
		numbers: pick(raw.numbers, isNumber)
	};
}

export function serializeSettings(settings: PackSettings): Buffer {
	return Buffer.from(JSON.stringify(settings, null, 2), "utf8");
}
