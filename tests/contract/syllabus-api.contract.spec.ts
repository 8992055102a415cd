// ---------------------------------------------------------------------------
// Contract Tests: Syllabus API
// POST /api/upload_syllabus, GET /api/syllabus_result, GET /api/syllabus/topics
// ---------------------------------------------------------------------------

import { rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { GET as getTopics } from "@/app/api/syllabus/topics/route";
import { GET as getResult } from "@/app/api/syllabus_result/route";
import { POST as uploadSyllabus } from "@/app/api/upload_syllabus/route";
import { createSyllabusResultStore } from "@/lib/syllabus/factory";
import { afterAll, beforeEach, describe, expect, it, vi } from "vitest";

const UPLOAD_DIR = join(tmpdir(), "lecture-analytics-syllabus-contract");

const coverageResult = {
	coverage_stats: {
		total_topics: 2,
		covered_topics: 1,
		coverage_percentage: 50,
		missing_topics: ["Genetics"],
		matched_topics: ["Enzymes"],
	},
	course_roadmap: [{ day: 1, main_topic: "Enzymes", subtopics: ["Genetics"] }],
};

const service = vi.hoisted(() => ({
	processSyllabusFile: vi.fn(),
}));

const store = vi.hoisted(() => ({
	latest: vi.fn(),
	latestTopicStructure: vi.fn(),
}));

vi.mock("@/lib/config", async () => {
	const { tmpdir } = await import("node:os");
	const { join } = await import("node:path");
	return {
		loadConfig: vi.fn().mockReturnValue({
			UPLOAD_DIR: join(tmpdir(), "lecture-analytics-syllabus-contract"),
		}),
	};
});

vi.mock("@/lib/syllabus/factory", () => ({
	createSyllabusService: vi.fn(() => service),
	createSyllabusResultStore: vi.fn(() => store),
}));

function uploadRequest(file?: File): Request {
	const form = new FormData();
	if (file) form.append("file", file);
	return new Request("http://localhost:3000/api/upload_syllabus", { method: "POST", body: form });
}

beforeEach(() => {
	service.processSyllabusFile.mockReset();
	store.latest.mockReset();
	store.latestTopicStructure.mockReset();
});

afterAll(async () => {
	await rm(UPLOAD_DIR, { recursive: true, force: true });
});

describe("POST /api/upload_syllabus", () => {
	it("returns the coverage result for a PDF", async () => {
		service.processSyllabusFile.mockResolvedValue(coverageResult);

		const res = await uploadSyllabus(uploadRequest(new File(["%PDF-1.4"], "Bio101.PDF")));

		expect(res.status).toBe(200);
		expect((await res.json()).data).toEqual({
			filename: "Bio101.PDF",
			coverage_result: coverageResult,
		});
		expect(service.processSyllabusFile).toHaveBeenCalledWith(
			join(UPLOAD_DIR, "syllabus", "Bio101.PDF"),
			"Bio101.PDF",
		);
	});

	it("rejects unsupported file types", async () => {
		const res = await uploadSyllabus(uploadRequest(new File(["plain"], "syllabus.txt")));

		expect(res.status).toBe(400);
		expect((await res.json()).error).toMatchObject({
			code: "UNSUPPORTED_FILE_TYPE",
			message: "Unsupported file type. Please upload PDF or DOCX.",
		});
		expect(service.processSyllabusFile).not.toHaveBeenCalled();
	});

	it("returns 400 without a file", async () => {
		const res = await uploadSyllabus(uploadRequest());

		expect(res.status).toBe(400);
		expect((await res.json()).error.code).toBe("VALIDATION_ERROR");
	});

	it("returns 500 when processing fails", async () => {
		service.processSyllabusFile.mockRejectedValue(new Error("document has no text"));

		const res = await uploadSyllabus(uploadRequest(new File(["PK"], "plan.docx")));

		expect(res.status).toBe(500);
		expect((await res.json()).error).toMatchObject({
			code: "SYLLABUS_PROCESSING_FAILED",
			message: "Syllabus processing failed: document has no text",
		});
	});
});

describe("GET /api/syllabus_result", () => {
	it("returns the latest saved result", async () => {
		store.latest.mockResolvedValue({
			filename: "Bio101_20250203_100000.json",
			data: coverageResult,
		});

		const res = await getResult(new Request("http://localhost:3000/api/syllabus_result"));

		expect(res.status).toBe(200);
		expect((await res.json()).data).toEqual({
			filename: "Bio101_20250203_100000.json",
			data: coverageResult,
		});
	});

	it("returns 404 before any upload", async () => {
		store.latest.mockResolvedValue(null);

		const res = await getResult(new Request("http://localhost:3000/api/syllabus_result"));

		expect(res.status).toBe(404);
		expect((await res.json()).error).toMatchObject({
			code: "NO_SYLLABUS_RESULT",
			message: "No syllabus result found yet.",
		});
	});

	it("returns a 500 envelope when the results cannot be read", async () => {
		store.latest.mockRejectedValue(new Error("EIO: i/o error, read"));

		const res = await getResult(new Request("http://localhost:3000/api/syllabus_result"));

		expect(res.status).toBe(500);
		const json = await res.json();
		expect(json.success).toBe(false);
		expect(json.error).toMatchObject({ code: "INTERNAL_ERROR", message: "EIO: i/o error, read" });
	});
});

describe("GET /api/syllabus/topics", () => {
	it("returns the day-by-day topics", async () => {
		const topics = [{ day: 1, date: null, main_topic: "Enzymes", subtopics: ["Genetics"] }];
		store.latestTopicStructure.mockResolvedValue(topics);

		const res = await getTopics(new Request("http://localhost:3000/api/syllabus/topics"));

		expect(res.status).toBe(200);
		expect((await res.json()).data).toEqual(topics);
	});

	it("returns 404 before any upload", async () => {
		store.latestTopicStructure.mockResolvedValue(null);

		const res = await getTopics(new Request("http://localhost:3000/api/syllabus/topics"));

		expect(res.status).toBe(404);
		expect((await res.json()).error).toMatchObject({
			code: "NO_SYLLABUS_RESULT",
			message: "No syllabus result found yet. Please upload one first.",
		});
	});

	it("returns a 500 envelope when configuration fails", async () => {
		vi.mocked(createSyllabusResultStore).mockImplementationOnce(() => {
			throw new Error("Environment configuration invalid");
		});

		const res = await getTopics(new Request("http://localhost:3000/api/syllabus/topics"));

		expect(res.status).toBe(500);
		expect((await res.json()).error).toMatchObject({
			code: "INTERNAL_ERROR",
			message: "Environment configuration invalid",
		});
	});
});
