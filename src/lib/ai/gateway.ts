// ---------------------------------------------------------------------------
// Model Gateway — OpenAI-compatible hosted models
// ---------------------------------------------------------------------------

import { createReadStream } from "node:fs";
import OpenAI from "openai";

export type ChatMessage = { role: "system"; content: string } | { role: "user"; content: string };

export interface CompletionRequest {
	model: string;
	messages: ChatMessage[];
	/** Trace tags forwarded to the gateway (e.g. generation_name, trace_user_id) */
	metadata?: Record<string, string>;
}

export interface TranscriptionRequest {
	model: string;
	filePath: string;
	/** Sent as query parameters; the multipart body carries only the audio */
	metadata?: Record<string, string>;
}

/**
 * The two hosted-model calls the application makes. Kept narrow so tests can
 * substitute a fake without the SDK.
 */
export interface ModelGateway {
	complete(request: CompletionRequest): Promise<string | null>;
	transcribe(request: TranscriptionRequest): Promise<string>;
}

export interface OpenAiGatewayOptions {
	apiKey: string;
	/** Base URL of an OpenAI-compatible proxy; defaults to api.openai.com */
	baseURL?: string;
}

export function createOpenAiGateway(options: OpenAiGatewayOptions): ModelGateway {
	const openai = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });

	return {
		async complete(request) {
			const completion = await openai.chat.completions.create({
				model: request.model,
				messages: request.messages,
				metadata: request.metadata,
			});
			return completion.choices[0]?.message?.content ?? null;
		},

		async transcribe(request) {
			const transcription = await openai.audio.transcriptions.create(
				{ model: request.model, file: createReadStream(request.filePath) },
				{ query: request.metadata },
			);
			return transcription.text;
		},
	};
}
