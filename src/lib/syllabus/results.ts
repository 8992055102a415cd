// ---------------------------------------------------------------------------
// Syllabus result store — one JSON file per processed syllabus
// ---------------------------------------------------------------------------

import { mkdir, readFile, readdir, stat, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { type SyllabusTopicEntry, toTopicStructure } from "./roadmap";
import { type SyllabusResult, SyllabusResultSchema } from "./schemas";

export interface StoredSyllabusResult {
	filename: string;
	data: SyllabusResult;
}

const pad = (n: number) => String(n).padStart(2, "0");

/** Local time as YYYYMMDD_HHMMSS */
export function formatResultTimestamp(date: Date): string {
	return (
		`${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
		`${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
	);
}

export class SyllabusResultStore {
	constructor(
		private readonly resultsDir: string,
		private readonly now: () => Date = () => new Date(),
	) {}

	/**
	 * Write `<name>_<timestamp>.json` for the uploaded file and return its path.
	 */
	async save(result: SyllabusResult, uploadedFilename: string): Promise<string> {
		await mkdir(this.resultsDir, { recursive: true });
		const name = basename(uploadedFilename, extname(uploadedFilename));
		const savePath = join(this.resultsDir, `${name}_${formatResultTimestamp(this.now())}.json`);
		await writeFile(savePath, JSON.stringify(result, null, 4), "utf-8");
		return savePath;
	}

	/**
	 * The most recently modified result, or null when none has been saved
	 * (or the newest file can no longer be read or parsed).
	 */
	async latest(): Promise<StoredSyllabusResult | null> {
		let entries: string[];
		try {
			entries = await readdir(this.resultsDir);
		} catch {
			return null;
		}

		const candidates: Array<{ filename: string; mtimeMs: number }> = [];
		for (const filename of entries.filter((f) => f.endsWith(".json"))) {
			try {
				const stats = await stat(join(this.resultsDir, filename));
				if (stats.isFile()) candidates.push({ filename, mtimeMs: stats.mtimeMs });
			} catch {
				// removed between readdir and stat
			}
		}
		if (candidates.length === 0) return null;

		candidates.sort((a, b) => b.mtimeMs - a.mtimeMs || b.filename.localeCompare(a.filename));
		const newest = candidates[0];

		let json: unknown;
		try {
			json = JSON.parse(await readFile(join(this.resultsDir, newest.filename), "utf-8"));
		} catch {
			// removed since the listing, or not JSON
			return null;
		}
		const parsed = SyllabusResultSchema.safeParse(json);
		return parsed.success ? { filename: newest.filename, data: parsed.data } : null;
	}

	/** Day/topic skeleton of the latest roadmap, or null if none exists. */
	async latestTopicStructure(): Promise<SyllabusTopicEntry[] | null> {
		const latest = await this.latest();
		return latest ? toTopicStructure(latest.data.course_roadmap) : null;
	}
}
