/**
 * FASTBIN sub-blocks. Each block starts with its own u16 serialise version and has its
 * own registry, so blocks evolve independently of the file version around them.
 * The capture location body (v1) is this project's own layout.
 */

import type { ByteReader } from "../binary/reader.js";
import { U16_TAG, VersionedFormat } from "../binary/versioned.js";
import type { ByteWriter } from "../binary/writer.js";

export interface Point2 {
	x: number;
	y: number;
}

export interface Point3 extends Point2 {
	z: number;
}

export interface Rectangle {
	minX: number;
	minY: number;
	maxX: number;
	maxY: number;
}

export interface ColourF {
	r: number;
	g: number;
	b: number;
}

export function readList<T>(reader: ByteReader, item: (reader: ByteReader) => T): T[] {
	const count = reader.u32();
	const items: T[] = [];
	for (let i = 0; i < count; i++) items.push(item(reader));
	return items;
}

export function writeList<T>(writer: ByteWriter, items: readonly T[], item: (writer: ByteWriter, value: T) => void): void {
	writer.u32(items.length);
	for (const value of items) item(writer, value);
}

const readPoint2 = (r: ByteReader): Point2 => ({ x: r.f32(), y: r.f32() });
const writePoint2 = (w: ByteWriter, p: Point2): void => {
	w.f32(p.x);
	w.f32(p.y);
};
const readPoint3 = (r: ByteReader): Point3 => ({ x: r.f32(), y: r.f32(), z: r.f32() });
const writePoint3 = (w: ByteWriter, p: Point3): void => {
	w.f32(p.x);
	w.f32(p.y);
	w.f32(p.z);
};

// --- PlayableArea (v2, v3) ---

export interface ValidLocationFlags {
	north: boolean;
	south: boolean;
	east: boolean;
	west: boolean;
}

export interface PlayableArea {
	version: number;
	area: Rectangle;
	hasBeenSet: boolean;
	/** Only stored from v3 on. */
	validLocationFlags: ValidLocationFlags;
}

function readPlayableAreaV2(r: ByteReader): PlayableArea {
	const area = { minX: r.f32(), minY: r.f32(), maxX: r.f32(), maxY: r.f32() };
	const hasBeenSet = r.bool();
	return { version: 2, area, hasBeenSet, validLocationFlags: { north: false, south: false, east: false, west: false } };
}

function writePlayableAreaV2(w: ByteWriter, value: PlayableArea): void {
	w.f32(value.area.minX);
	w.f32(value.area.minY);
	w.f32(value.area.maxX);
	w.f32(value.area.maxY);
	w.bool(value.hasBeenSet);
}

export const playableAreaFormat = new VersionedFormat<PlayableArea>("PlayableArea", U16_TAG)
	.register(2, { read: readPlayableAreaV2, write: writePlayableAreaV2 })
	.register(3, {
		read: (r) => {
			const v2 = readPlayableAreaV2(r);
			const validLocationFlags = { north: r.bool(), south: r.bool(), east: r.bool(), west: r.bool() };
			return { ...v2, version: 3, validLocationFlags };
		},
		write: (w, value) => {
			writePlayableAreaV2(w, value);
			const flags = value.validLocationFlags;
			w.bool(flags.north);
			w.bool(flags.south);
			w.bool(flags.east);
			w.bool(flags.west);
		}
	});

// --- Prop flags (v4) ---

export interface PropFlags {
	version: number;
	allowInOutfield: boolean;
	clampToWaterSurface: boolean;
	spring: boolean;
	summer: boolean;
	autumn: boolean;
	winter: boolean;
	visibleInTacticalView: boolean;
	visibleInTacticalViewOnly: boolean;
}

const PROP_FLAG_ORDER = [
	"allowInOutfield",
	"clampToWaterSurface",
	"spring",
	"summer",
	"autumn",
	"winter",
	"visibleInTacticalView",
	"visibleInTacticalViewOnly"
] as const;

export const propFlagsFormat = new VersionedFormat<PropFlags>("Flags", U16_TAG).register(4, {
	read: (r) => ({
		version: 4,
		allowInOutfield: r.bool(),
		clampToWaterSurface: r.bool(),
		spring: r.bool(),
		summer: r.bool(),
		autumn: r.bool(),
		winter: r.bool(),
		visibleInTacticalView: r.bool(),
		visibleInTacticalViewOnly: r.bool()
	}),
	write: (w, value) => {
		for (const key of PROP_FLAG_ORDER) w.bool(value[key]);
	}
});

// --- Point lights (list v1, light v7) ---

export interface PointLight {
	version: number;
	position: Point3;
	radius: number;
	colour: ColourF;
	colourScale: number;
	animationType: number;
	colourMin: number;
	randomOffset: number;
	params: Point2;
	falloffType: string;
	lfRelative: number;
	heightMode: string;
	lightProbesOnly: boolean;
	pdlcMask: bigint;
	flags: PropFlags;
}

export const pointLightFormat = new VersionedFormat<PointLight>("PointLight", U16_TAG).register(7, {
	read: (r) => ({
		version: 7,
		position: readPoint3(r),
		radius: r.f32(),
		colour: { r: r.f32(), g: r.f32(), b: r.f32() },
		colourScale: r.f32(),
		animationType: r.u8(),
		colourMin: r.f32(),
		randomOffset: r.f32(),
		params: readPoint2(r),
		falloffType: r.sizedStringU8(),
		lfRelative: r.u8(),
		heightMode: r.sizedStringU8(),
		lightProbesOnly: r.bool(),
		pdlcMask: r.u64(),
		flags: propFlagsFormat.decode(r)
	}),
	write: (w, light) => {
		writePoint3(w, light.position);
		w.f32(light.radius);
		w.f32(light.colour.r);
		w.f32(light.colour.g);
		w.f32(light.colour.b);
		w.f32(light.colourScale);
		w.u8(light.animationType);
		w.f32(light.colourMin);
		w.f32(light.randomOffset);
		writePoint2(w, light.params);
		w.sizedStringU8(light.falloffType);
		w.u8(light.lfRelative);
		w.sizedStringU8(light.heightMode);
		w.bool(light.lightProbesOnly);
		w.u64(light.pdlcMask);
		propFlagsFormat.encode(w, light.flags);
	}
});

export interface PointLightList {
	version: number;
	lights: PointLight[];
}

export const pointLightListFormat = new VersionedFormat<PointLightList>("PointLightList", U16_TAG).register(1, {
	read: (r) => ({ version: 1, lights: readList(r, (x) => pointLightFormat.decode(x)) }),
	write: (w, value) => writeList(w, value.lights, (x, light) => pointLightFormat.encode(x, light))
});

// --- Capture locations (set v11, location v1) ---

export interface CaptureLocation {
	version: number;
	location: Point2;
	radius: number;
	validForMinNumPlayers: number;
	validForMaxNumPlayers: number;
	capturePointType: string;
	locationPoints: Point2[];
	databaseKey: string;
}

export const captureLocationFormat = new VersionedFormat<CaptureLocation>("CaptureLocation", U16_TAG).register(1, {
	read: (r) => ({
		version: 1,
		location: readPoint2(r),
		radius: r.f32(),
		validForMinNumPlayers: r.u32(),
		validForMaxNumPlayers: r.u32(),
		capturePointType: r.sizedStringU8(),
		locationPoints: readList(r, readPoint2),
		databaseKey: r.sizedStringU8()
	}),
	write: (w, value) => {
		writePoint2(w, value.location);
		w.f32(value.radius);
		w.u32(value.validForMinNumPlayers);
		w.u32(value.validForMaxNumPlayers);
		w.sizedStringU8(value.capturePointType);
		writeList(w, value.locationPoints, writePoint2);
		w.sizedStringU8(value.databaseKey);
	}
});

export interface CaptureLocationSet {
	version: number;
	/** One list of capture locations per player-count variant. */
	sets: CaptureLocation[][];
}

export const captureLocationSetFormat = new VersionedFormat<CaptureLocationSet>("CaptureLocationSet", U16_TAG).register(11, {
	read: (r) => ({
		version: 11,
		sets: readList(r, (x) => readList(x, (y) => captureLocationFormat.decode(y)))
	}),
	write: (w, value) =>
		writeList(w, value.sets, (x, set) => writeList(x, set, (y, location) => captureLocationFormat.encode(y, location)))
});
