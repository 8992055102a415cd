// ---------------------------------------------------------------------------
// Unit Tests: Roadmap flattening and syllabus coverage
// ---------------------------------------------------------------------------

import { RoadmapDaySchema } from "@/lib/ai/schemas";
import { type AppDatabase, createDatabase } from "@/lib/db/client";
import {
	calculateSyllabusCoverage,
	collectCoveredTopics,
	compareTopics,
	normalizeTopic,
} from "@/lib/syllabus/coverage";
import { flattenRoadmap, toTopicStructure } from "@/lib/syllabus/roadmap";
import { beforeEach, describe, expect, it } from "vitest";
import { seedLecture } from "../helpers/lectures";

const roadmap = [
	RoadmapDaySchema.parse({ day: 1, main_topic: "Intro", subtopics: ["History", "Scope"] }),
	RoadmapDaySchema.parse({ day: 2, date: "2025-02-04", main_topic: "History", subtopics: ["Methods"] }),
	RoadmapDaySchema.parse({ day: "Midterm", main_topic: null, subtopics: ["Scope"], objectives: ["x"] }),
];

describe("flattenRoadmap", () => {
	it("lists main topics then subtopics once, in first-seen order", () => {
		expect(flattenRoadmap(roadmap)).toEqual(["Intro", "History", "Scope", "Methods"]);
	});

	it("keeps case variants apart", () => {
		const days = [RoadmapDaySchema.parse({ main_topic: "Cells", subtopics: ["cells"] })];
		expect(flattenRoadmap(days)).toEqual(["Cells", "cells"]);
	});

	it("skips non-string subtopics but keeps their string siblings", () => {
		const days = [
			RoadmapDaySchema.parse({ main_topic: "Cells", subtopics: ["Membranes", { name: "Osmosis" }, "Diffusion"] }),
		];
		expect(flattenRoadmap(days)).toEqual(["Cells", "Membranes", "Diffusion"]);
	});

	it("returns nothing for an empty roadmap", () => {
		expect(flattenRoadmap([])).toEqual([]);
	});
});

describe("toTopicStructure", () => {
	it("keeps only day, date and topics", () => {
		expect(toTopicStructure(roadmap)).toEqual([
			{ day: 1, date: null, main_topic: "Intro", subtopics: ["History", "Scope"] },
			{ day: 2, date: "2025-02-04", main_topic: "History", subtopics: ["Methods"] },
			{ day: "Midterm", date: null, main_topic: null, subtopics: ["Scope"] },
		]);
	});
});

describe("compareTopics", () => {
	it("matches case- and whitespace-insensitively, keeping original spelling", () => {
		expect(compareTopics(["Enzymes", "Cell Membranes", "enzymes "], new Set(["enzymes"]))).toEqual({
			total_topics: 3,
			covered_topics: 2,
			coverage_percentage: 66.67,
			missing_topics: ["Cell Membranes"],
			matched_topics: ["Enzymes", "enzymes "],
		});
	});

	it("reports zero coverage for an empty syllabus", () => {
		expect(compareTopics([], new Set(["enzymes"]))).toEqual({
			total_topics: 0,
			covered_topics: 0,
			coverage_percentage: 0,
			missing_topics: [],
			matched_topics: [],
		});
	});
});

describe("coverage against stored lectures", () => {
	let db: AppDatabase;

	beforeEach(() => {
		db = createDatabase(":memory:");
		seedLecture(db, {
			status: "DONE",
			topicsJson: '[{"topic": " Enzymes ", "subtopics": ["Active Site"]}]',
		});
		seedLecture(db, {
			status: "FAILED",
			topicsJson: '[{"topic": "Genetics", "subtopics": []}]',
		});
		seedLecture(db, { status: "DONE", topicsJson: "broken" });
	});

	it("collects normalised topics of finished lectures only", () => {
		expect([...collectCoveredTopics(db)]).toEqual(["enzymes", "active site"]);
	});

	it("keeps string subtopics next to malformed ones", () => {
		seedLecture(db, {
			status: "DONE",
			topicsJson: '[{"topic": "Cells", "subtopics": ["Osmosis", 3]}, {"title": "Untitled"}]',
		});
		expect([...collectCoveredTopics(db)]).toEqual(["enzymes", "active site", "cells", "osmosis"]);
	});

	it("calculates coverage for syllabus topics", () => {
		expect(calculateSyllabusCoverage(db, ["Enzymes", "Active site", "Genetics"])).toEqual({
			total_topics: 3,
			covered_topics: 2,
			coverage_percentage: 66.67,
			missing_topics: ["Genetics"],
			matched_topics: ["Enzymes", "Active site"],
		});
	});

	it("normalises by trimming and lower-casing", () => {
		expect(normalizeTopic("  Cell Biology\n")).toBe("cell biology");
	});
});
