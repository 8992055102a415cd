// ---------------------------------------------------------------------------
// Background task dispatch
// Work runs after the response is sent; nothing awaits it.
// ---------------------------------------------------------------------------

import { reportError } from "@/lib/monitoring/rollbar-official";

const inFlight = new Set<Promise<void>>();

/**
 * Start `task` without awaiting it. A rejection is reported to Rollbar and
 * never reaches the request that dispatched it.
 */
export function dispatchBackground(name: string, task: () => Promise<void>): void {
	const run = Promise.resolve()
		.then(task)
		.catch((err: unknown) => {
			const error = err instanceof Error ? err : new Error(String(err));
			console.error(`Background task "${name}" failed:`, error.message);
			reportError(error, { additionalData: { task: name } });
		})
		.finally(() => {
			inFlight.delete(run);
		});
	inFlight.add(run);
}

/** Resolve once every dispatched task has settled (for tests and shutdown). */
export async function drainBackgroundTasks(): Promise<void> {
	while (inFlight.size > 0) {
		await Promise.allSettled([...inFlight]);
	}
}
