// ---------------------------------------------------------------------------
// Contract Tests: Lecture upload
// POST /api/upload — 202 with lecture id, processing runs in background
// ---------------------------------------------------------------------------

import { readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { POST } from "@/app/api/upload/route";
import { loadConfig } from "@/lib/config";
import { closeDb, getDb } from "@/lib/db/client";
import { getLectureById } from "@/lib/db/lectures";
import { drainBackgroundTasks } from "@/lib/jobs/background";
import { afterAll, afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const UPLOAD_DIR = join(tmpdir(), "lecture-analytics-upload-contract");

const { processLectureFile } = vi.hoisted(() => ({
	processLectureFile: vi.fn(async (_id: number, _filePath: string) => "DONE"),
}));

vi.mock("@/lib/config", async () => {
	const { tmpdir } = await import("node:os");
	const { join } = await import("node:path");
	return {
		loadConfig: vi.fn().mockReturnValue({
			DATABASE_PATH: ":memory:",
			UPLOAD_DIR: join(tmpdir(), "lecture-analytics-upload-contract"),
		}),
	};
});

vi.mock("@/lib/processing/factory", () => ({
	createLectureProcessor: vi.fn(() => ({ processLectureFile })),
}));

function uploadRequest(form: FormData): Request {
	return new Request("http://localhost:3000/api/upload", { method: "POST", body: form });
}

beforeEach(() => {
	processLectureFile.mockClear();
});

afterEach(async () => {
	await drainBackgroundTasks();
	closeDb();
});

afterAll(async () => {
	await rm(UPLOAD_DIR, { recursive: true, force: true });
});

describe("POST /api/upload", () => {
	it("accepts the recording and schedules processing", async () => {
		const form = new FormData();
		form.append("file", new File(["RIFF audio"], "week1.wav", { type: "audio/wav" }));

		const res = await POST(uploadRequest(form));

		expect(res.status).toBe(202);
		const json = await res.json();
		expect(json.data).toEqual({ lecture_id: 1, status: "PROCESSING" });
		expect(getLectureById(getDb(), 1)?.status).toBe("PROCESSING");

		const savedTo = join(UPLOAD_DIR, "lecture_1", "week1.wav");
		expect(await readFile(savedTo, "utf-8")).toBe("RIFF audio");

		await drainBackgroundTasks();
		expect(processLectureFile).toHaveBeenCalledWith(1, savedTo);
	});

	it("returns 400 without a file and creates no lecture", async () => {
		const form = new FormData();
		form.append("title", "Week 1");

		const res = await POST(uploadRequest(form));

		expect(res.status).toBe(400);
		expect((await res.json()).error).toMatchObject({
			code: "VALIDATION_ERROR",
			message: "Multipart field 'file' is required",
		});
		expect(getLectureById(getDb(), 1)).toBeNull();
		expect(processLectureFile).not.toHaveBeenCalled();
	});

	it("still answers with the envelope when the lecture cannot be marked FAILED", async () => {
		getDb();
		vi.mocked(loadConfig).mockImplementationOnce(() => {
			closeDb();
			throw new Error("Environment configuration invalid");
		});
		const form = new FormData();
		form.append("file", new File(["RIFF audio"], "week2.wav", { type: "audio/wav" }));

		const res = await POST(uploadRequest(form));

		expect(res.status).toBe(500);
		expect((await res.json()).error).toMatchObject({
			code: "INTERNAL_ERROR",
			message: "Could not store the uploaded file",
		});
		expect(processLectureFile).not.toHaveBeenCalled();
	});

	it("returns a 500 envelope when the database cannot be opened", async () => {
		vi.mocked(loadConfig).mockImplementationOnce(() => {
			throw new Error("Environment configuration invalid");
		});
		const form = new FormData();
		form.append("file", new File(["RIFF audio"], "week3.wav", { type: "audio/wav" }));

		const res = await POST(uploadRequest(form));

		expect(res.status).toBe(500);
		expect((await res.json()).error.code).toBe("DATABASE_ERROR");
	});
});
