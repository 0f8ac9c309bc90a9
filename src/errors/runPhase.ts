/**
 * Step of the run loop a failure escaped from
 */
export type RunPhase = "acquire" | "render" | "draw" | "read" | "dispatch" | "release";

// Keyed by the error object itself so `run` still rejects with the original value
const phases = new WeakMap<object, RunPhase>();

/**
 * Record where `error` was raised. The innermost tag wins; primitives are not tagged.
 */
export function tagRunPhase(error: unknown, phase: RunPhase): void {
	if (typeof error === "object" && error !== null && !phases.has(error)) {
		phases.set(error, phase);
	}
}

export function runPhaseOf(error: unknown): RunPhase | undefined {
	if (typeof error === "object" && error !== null) {
		return phases.get(error);
	}
	return undefined;
}
