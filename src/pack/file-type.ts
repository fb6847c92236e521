import { PackToolError } from "../errors.js";

export enum FileType {
	DB = "DB",
	Loc = "Loc",
	FastBin = "FastBin",
	Text = "Text",
	Image = "Image",
	Video = "Video",
	Audio = "Audio",
	Unknown = "Unknown"
}

const TEXT_EXTENSIONS = [
	".txt",
	".xml",
	".lua",
	".json",
	".csv",
	".tsv",
	".md",
	".html",
	".css",
	".js",
	".htm",
	".inl",
	".battle_script",
	".environment",
	".variantmeshdefinition",
	".wsmodel",
	".material",
	".kfsl",
	".kfe",
	".yml",
	".yaml"
];
const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".dds", ".tga", ".gif"];
const VIDEO_EXTENSIONS = [".ca_vp8"];
const AUDIO_EXTENSIONS = [".wem", ".bnk"];

/** Classifies a normalized ("/"-separated) path. */
export function fileTypeOf(path: string): FileType {
	const lower = path.toLowerCase();
	const parts = lower.split("/");
	if (parts.length === 3 && parts[0] === "db") return FileType.DB;
	if (lower.endsWith(".loc")) return FileType.Loc;
	if (lower.endsWith(".bmd")) return FileType.FastBin;
	if (TEXT_EXTENSIONS.some((ext) => lower.endsWith(ext))) return FileType.Text;
	if (IMAGE_EXTENSIONS.some((ext) => lower.endsWith(ext))) return FileType.Image;
	if (VIDEO_EXTENSIONS.some((ext) => lower.endsWith(ext))) return FileType.Video;
	if (AUDIO_EXTENSIONS.some((ext) => lower.endsWith(ext))) return FileType.Audio;
	return FileType.Unknown;
}

/** Tables are stored uncompressed, whatever the pack asks for. */
export function isTableType(type: FileType): boolean {
	return type === FileType.DB || type === FileType.Loc;
}

export function parseFileTypes(list: string): FileType[] {
	const known = Object.values(FileType);
	return list
		.split(",")
		.map((s) => s.trim().toLowerCase())
		.filter((s) => s.length > 0)
		.map((s) => {
			const match = known.find((t) => t.toLowerCase() === s);
			if (!match) throw new PackToolError(`Unknown file type: ${s}`);
			return match;
		});
}
