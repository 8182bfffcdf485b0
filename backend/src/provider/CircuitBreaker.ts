import { getLog } from "../util/Logger";

const log = getLog(import.meta);

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerConfig {
	/** Consecutive failed calls that open the circuit. */
	failureThreshold: number;
	/** How long the circuit stays open before a single trial call is let through. */
	resetTimeout: number;
	now?: () => number;
}

/**
 * Tracks consecutive provider failures for one upstream and rejects calls while the upstream looks down.
 * After `resetTimeout` one trial call is allowed; its outcome closes or reopens the circuit.
 */
export interface CircuitBreaker {
	readonly name: string;

	getState(): CircuitState;

	/**
	 * Returns false while the circuit is open, or while a half-open trial call is still running.
	 */
	tryAcquire(): boolean;

	/** The upstream answered, even if it answered with an error. */
	recordSuccess(): void;

	recordFailure(): void;
}

export function createCircuitBreaker(name: string, config: CircuitBreakerConfig): CircuitBreaker {
	const now = config.now ?? Date.now;
	let state: CircuitState = "CLOSED";
	let failures = 0;
	let openedAt = 0;
	let trialRunning = false;

	return { name, getState, tryAcquire, recordSuccess, recordFailure };

	function getState(): CircuitState {
		if (state === "OPEN" && now() - openedAt >= config.resetTimeout) {
			state = "HALF_OPEN";
			trialRunning = false;
		}
		return state;
	}

	function tryAcquire(): boolean {
		switch (getState()) {
			case "CLOSED":
				return true;
			case "OPEN":
				return false;
			case "HALF_OPEN":
				if (trialRunning) {
					return false;
				}
				trialRunning = true;
				return true;
		}
	}

	function recordSuccess(): void {
		if (state !== "CLOSED") {
			log.info("Circuit %s closed", name);
		}
		state = "CLOSED";
		failures = 0;
		trialRunning = false;
	}

	function recordFailure(): void {
		failures++;
		trialRunning = false;
		if (state === "HALF_OPEN" || failures >= config.failureThreshold) {
			if (state !== "OPEN") {
				log.error("Circuit %s opened after %d consecutive failures", name, failures);
			}
			state = "OPEN";
			openedAt = now();
		}
	}
}
