// ---------------------------------------------------------------------------
// GET /api/analytics/dashboard — All dashboard metrics in one payload
// ---------------------------------------------------------------------------

import { AnalyticsService } from "@/lib/analytics/service";
import { getDb } from "@/lib/db/client";
import { respondWith } from "@/lib/utils/route-helpers";

export async function GET(request: Request): Promise<Response> {
	return respondWith(request, () => new AnalyticsService(getDb()).getDashboardMetrics());
}
