// ---------------------------------------------------------------------------
// GET /api/analytics/topics — Topic and subtopic counts per lecture
// ---------------------------------------------------------------------------

import { AnalyticsService } from "@/lib/analytics/service";
import { getDb } from "@/lib/db/client";
import { respondWith } from "@/lib/utils/route-helpers";

export async function GET(request: Request): Promise<Response> {
	return respondWith(request, () => ({
		topics_overview: new AnalyticsService(getDb()).getTopicsOverview(),
	}));
}
