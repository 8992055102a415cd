// ---------------------------------------------------------------------------
// GET /api/analytics/questions — Total number of questions asked in each lecture
// ---------------------------------------------------------------------------

import { AnalyticsService } from "@/lib/analytics/service";
import { getDb } from "@/lib/db/client";
import { respondWith } from "@/lib/utils/route-helpers";

export async function GET(request: Request): Promise<Response> {
	return respondWith(request, () => ({
		questions_per_class: new AnalyticsService(getDb()).getQuestionsPerClass(),
	}));
}
