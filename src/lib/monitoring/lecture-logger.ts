// ---------------------------------------------------------------------------
// Pipeline Logging — Rollbar Integration
// Structured events for lecture and syllabus background jobs
// ---------------------------------------------------------------------------

import { isTelemetryConsentGranted } from "@/lib/monitoring/privacy";
import { serverInstance } from "@/lib/monitoring/rollbar-official";

export type PipelineStage =
	| "transcription"
	| "analysis"
	| "notes"
	| "topic-model"
	| "persist"
	| "cleanup"
	| "syllabus";

function lectureContext(lectureId: number, stage: PipelineStage, data?: Record<string, unknown>) {
	return {
		lectureId,
		stage,
		...data,
		timestamp: new Date().toISOString(),
	};
}

export function logLectureInfo(
	lectureId: number,
	stage: PipelineStage,
	message: string,
	data?: Record<string, unknown>,
): void {
	serverInstance.info(`Lecture ${lectureId}: ${message}`, lectureContext(lectureId, stage, data));
}

export function logLectureWarning(lectureId: number, stage: PipelineStage, message: string): void {
	serverInstance.warning(`Lecture ${lectureId}: ${message}`, lectureContext(lectureId, stage));
}

export function logLectureFailure(lectureId: number, stage: PipelineStage, error: unknown): void {
	const err = error instanceof Error ? error : new Error(String(error));
	serverInstance.error(
		`Lecture ${lectureId} failed: ${err.message}`,
		lectureContext(lectureId, stage, { stack: err.stack }),
	);
}

/**
 * Log a syllabus job event. The uploaded filename is redacted without
 * telemetry consent because it may carry a course or instructor name.
 */
export function logSyllabusEvent(filename: string, message: string, error?: unknown): void {
	const context = {
		stage: "syllabus" satisfies PipelineStage,
		filename: isTelemetryConsentGranted() ? filename : "[redacted]",
		error: error instanceof Error ? error.message : error === undefined ? undefined : String(error),
		timestamp: new Date().toISOString(),
	};
	if (error === undefined) {
		serverInstance.info(`Syllabus: ${message}`, context);
	} else {
		serverInstance.error(`Syllabus: ${message}`, context);
	}
}
