// ---------------------------------------------------------------------------
// JSON extraction from model completions
// ---------------------------------------------------------------------------

import { LlmResponseParseError } from "./errors";

const CODE_FENCE = /```json\s*\n?|```/g;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
	try {
		return { ok: true, value: JSON.parse(text) };
	} catch {
		return { ok: false };
	}
}

/**
 * Return the outermost `[...]` or `{...}` span, whichever opens first.
 */
export function outermostJsonSpan(text: string): string | null {
	const firstBracket = text.indexOf("[");
	const firstBrace = text.indexOf("{");
	if (firstBracket === -1 && firstBrace === -1) return null;

	const useBracket = firstBrace === -1 || (firstBracket !== -1 && firstBracket < firstBrace);
	const start = useBracket ? firstBracket : firstBrace;
	const end = text.lastIndexOf(useBracket ? "]" : "}");
	if (end <= start) return null;
	return text.slice(start, end + 1);
}

/**
 * Parse a completion that is supposed to be pure JSON.
 *
 * Models regularly wrap output in Markdown fences or add a sentence of
 * preamble, so three readings are attempted in order: the raw content, the
 * content with fences removed, and the outermost bracketed span.
 *
 * @throws LlmResponseParseError when none of them parses
 */
export function extractJsonPayload(content: string | null | undefined): unknown {
	const raw = content?.trim() ?? "";
	if (!raw) {
		throw new LlmResponseParseError("Model returned an empty completion", "");
	}

	const direct = tryParse(raw);
	if (direct.ok) return direct.value;

	const unfenced = raw.replace(CODE_FENCE, "").trim();
	const cleaned = tryParse(unfenced);
	if (cleaned.ok) return cleaned.value;

	const span = outermostJsonSpan(unfenced);
	if (span) {
		const sliced = tryParse(span);
		if (sliced.ok) return sliced.value;
	}

	throw new LlmResponseParseError("Could not find valid JSON in model output", raw);
}
