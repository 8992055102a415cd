// ---------------------------------------------------------------------------
// Test helper: in-process ModelGateway
// ---------------------------------------------------------------------------

import type { CompletionRequest, ModelGateway, TranscriptionRequest } from "@/lib/ai/gateway";

export interface FakeGateway extends ModelGateway {
	completions: CompletionRequest[];
	transcriptions: TranscriptionRequest[];
}

/** Replies with `replies` in order; the last reply repeats. */
export function createFakeGateway(replies: Array<string | null>, transcript = ""): FakeGateway {
	const completions: CompletionRequest[] = [];
	const transcriptions: TranscriptionRequest[] = [];
	return {
		completions,
		transcriptions,
		async complete(request) {
			completions.push(request);
			return replies[Math.min(completions.length - 1, replies.length - 1)] ?? null;
		},
		async transcribe(request) {
			transcriptions.push(request);
			return transcript;
		},
	};
}
