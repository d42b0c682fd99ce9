/** Plain mapping check: objects that are neither null nor arrays */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Message of a thrown value, whatever was thrown */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/** Format a duration in milliseconds to human-readable */
export function formatDuration(ms: number): string {
	if (ms < 1000) return `${ms}ms`;
	const seconds = Math.round(ms / 100) / 10;
	return `${seconds}s`;
}
