// ---------------------------------------------------------------------------
// GET /api/analytics/syllabus — Unique topics covered so far across lectures
// ---------------------------------------------------------------------------

import { AnalyticsService } from "@/lib/analytics/service";
import { getDb } from "@/lib/db/client";
import { respondWith } from "@/lib/utils/route-helpers";

export async function GET(request: Request): Promise<Response> {
	return respondWith(request, () => ({
		syllabus_coverage: new AnalyticsService(getDb()).getSyllabusCoverage(),
	}));
}
