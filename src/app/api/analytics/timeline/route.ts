// ---------------------------------------------------------------------------
// GET /api/analytics/timeline — Lecture dates for charting class progression
// ---------------------------------------------------------------------------

import { AnalyticsService } from "@/lib/analytics/service";
import { getDb } from "@/lib/db/client";
import { respondWith } from "@/lib/utils/route-helpers";

export async function GET(request: Request): Promise<Response> {
	return respondWith(request, () => ({
		lecture_timeline: new AnalyticsService(getDb()).getLectureTimeline(),
	}));
}
