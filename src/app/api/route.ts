// ---------------------------------------------------------------------------
// GET /api — Service greeting
// ---------------------------------------------------------------------------

import { respondWith } from "@/lib/utils/route-helpers";

export async function GET(request: Request): Promise<Response> {
	return respondWith(request, () => ({
		message: "Hello Professors! This API provides class analytics.",
	}));
}
