// ---------------------------------------------------------------------------
// Contract Tests: Lecture API
// GET /api/lecture/[id] and GET /api/lecture/[id]/notes
// ---------------------------------------------------------------------------

import { GET as getNotes } from "@/app/api/lecture/[id]/notes/route";
import { GET as getLecture } from "@/app/api/lecture/[id]/route";
import { loadConfig } from "@/lib/config";
import { closeDb, getDb } from "@/lib/db/client";
import { afterEach, describe, expect, it, vi } from "vitest";
import { seedLecture } from "../helpers/lectures";

vi.mock("@/lib/config", () => ({
	loadConfig: vi.fn().mockReturnValue({ DATABASE_PATH: ":memory:" }),
}));

function request(path: string): Request {
	return new Request(`http://localhost:3000${path}`);
}

function params(id: string) {
	return { params: Promise.resolve({ id }) };
}

function failConfigOnce(): void {
	closeDb();
	vi.mocked(loadConfig).mockImplementationOnce(() => {
		throw new Error("Environment configuration invalid");
	});
}

afterEach(() => {
	closeDb();
});

describe("GET /api/lecture/[id]", () => {
	it("returns the public lecture fields", async () => {
		const id = seedLecture(getDb(), {
			status: "DONE",
			transcript: "Welcome to week one.",
			summary: '{"mainIdeas": []}',
			topicsJson: "[]",
			quizJson: '[{"question": "Ready?"}]',
			notesJson: "{}",
		});

		const res = await getLecture(request(`/api/lecture/${id}`), params(String(id)));

		expect(res.status).toBe(200);
		const json = await res.json();
		expect(json.success).toBe(true);
		expect(json.data).toEqual({
			id,
			status: "DONE",
			transcript: "Welcome to week one.",
			summary: '{"mainIdeas": []}',
			topics_json: "[]",
			quiz_json: '[{"question": "Ready?"}]',
		});
		expect(res.headers.get("X-Request-ID")).toBe(json.meta.requestId);
	});

	it("returns 404 for an unknown lecture", async () => {
		const res = await getLecture(request("/api/lecture/99"), params("99"));

		expect(res.status).toBe(404);
		const json = await res.json();
		expect(json.error).toMatchObject({ code: "NOT_FOUND", message: "Lecture not found" });
	});

	it("returns a 500 envelope when the database cannot be opened", async () => {
		failConfigOnce();

		const res = await getLecture(request("/api/lecture/1"), params("1"));

		expect(res.status).toBe(500);
		const json = await res.json();
		expect(json.success).toBe(false);
		expect(json.error).toMatchObject({
			code: "INTERNAL_ERROR",
			message: "Environment configuration invalid",
		});
	});

	it.each(["abc", "0", "-3", "1.5"])("returns 400 for id %s", async (raw) => {
		const res = await getLecture(request(`/api/lecture/${raw}`), params(raw));

		expect(res.status).toBe(400);
		expect((await res.json()).error.code).toBe("VALIDATION_ERROR");
	});
});

describe("GET /api/lecture/[id]/notes", () => {
	it("returns the stored notes object", async () => {
		const id = seedLecture(getDb(), {
			status: "DONE",
			notesJson: '{"main_topic": "Enzymes", "key_takeaways": ["Catalysts are reusable."]}',
		});

		const res = await getNotes(request(`/api/lecture/${id}/notes`), params(String(id)));

		expect(res.status).toBe(200);
		expect((await res.json()).data).toEqual({
			main_topic: "Enzymes",
			key_takeaways: ["Catalysts are reusable."],
		});
	});

	it("returns 400 while the lecture is processing", async () => {
		const id = seedLecture(getDb(), { status: "PROCESSING" });

		const res = await getNotes(request(`/api/lecture/${id}/notes`), params(String(id)));

		expect(res.status).toBe(400);
		expect((await res.json()).error).toMatchObject({
			code: "LECTURE_PROCESSING",
			message: "Lecture is still processing. Notes are not yet available.",
		});
	});

	it.each(["DONE", "FAILED"] as const)("returns 404 when a %s lecture has no notes", async (status) => {
		const id = seedLecture(getDb(), { status, notesJson: null });

		const res = await getNotes(request(`/api/lecture/${id}/notes`), params(String(id)));

		expect(res.status).toBe(404);
		expect((await res.json()).error).toMatchObject({
			code: "NOTES_UNAVAILABLE",
			message: "Notes were not found or could not be generated for this lecture.",
		});
	});

	it("returns 500 when the stored notes are corrupt", async () => {
		const id = seedLecture(getDb(), { status: "DONE", notesJson: '{"main_topic": ' });

		const res = await getNotes(request(`/api/lecture/${id}/notes`), params(String(id)));

		expect(res.status).toBe(500);
		expect((await res.json()).error).toMatchObject({
			code: "NOTES_CORRUPT",
			message: "Failed to parse the stored notes JSON.",
		});
	});

	it("returns 404 for an unknown lecture", async () => {
		const res = await getNotes(request("/api/lecture/5/notes"), params("5"));

		expect(res.status).toBe(404);
		expect((await res.json()).error.code).toBe("NOT_FOUND");
	});

	it("returns a 500 envelope when the database cannot be opened", async () => {
		failConfigOnce();

		const res = await getNotes(request("/api/lecture/1/notes"), params("1"));

		expect(res.status).toBe(500);
		expect((await res.json()).error).toMatchObject({
			code: "INTERNAL_ERROR",
			message: "Environment configuration invalid",
		});
	});
});
