// CHANGE: Optional debug logger controlled by env CPDUMP_DEBUG
// WHY: Trace source advancing, charset choice and run totals without touching stdout
// PURITY: SHELL (stderr)
// INVARIANT: Nothing is printed unless CPDUMP_DEBUG === "1" at the time of the call
// COMPLEXITY: O(1)

const PREFIX = "[cpdump:debug]";

/**
 * Whether debug lines are enabled for this process.
 *
 * @pure false (reads process.env)
 */
export function isDebugEnabled(): boolean {
	const env: NodeJS.ProcessEnv & { CPDUMP_DEBUG?: string } = process.env;
	return env.CPDUMP_DEBUG === "1";
}

export function debugLog(message: string): void {
	if (isDebugEnabled()) {
		console.error(PREFIX, message);
	}
}
