// ---------------------------------------------------------------------------
// GET /api/analytics/transcripts — Approximate transcript word counts
// ---------------------------------------------------------------------------

import { AnalyticsService } from "@/lib/analytics/service";
import { getDb } from "@/lib/db/client";
import { respondWith } from "@/lib/utils/route-helpers";

export async function GET(request: Request): Promise<Response> {
	return respondWith(request, () => ({
		transcript_length: new AnalyticsService(getDb()).getTranscriptLength(),
	}));
}
