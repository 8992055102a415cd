// ---------------------------------------------------------------------------
// GET /api/analytics/summary — Main-idea counts and key-takeaway presence per lecture
// ---------------------------------------------------------------------------

import { AnalyticsService } from "@/lib/analytics/service";
import { getDb } from "@/lib/db/client";
import { respondWith } from "@/lib/utils/route-helpers";

export async function GET(request: Request): Promise<Response> {
	return respondWith(request, () => ({
		summary_metrics: new AnalyticsService(getDb()).getSummaryMetrics(),
	}));
}
