export class TimeoutError extends Error {
	constructor(
		message: string,
		readonly timeoutMs: number,
	) {
		super(message);
		this.name = "TimeoutError";
	}
}

/**
 * Rejects with a TimeoutError if the promise does not settle within `timeoutMs`.
 * The underlying work is not cancelled.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, message = "Operation timed out"): Promise<T> {
	let timeoutId: ReturnType<typeof setTimeout> | undefined;

	const timeoutPromise = new Promise<never>((_resolve, reject) => {
		timeoutId = setTimeout(() => reject(new TimeoutError(message, timeoutMs)), timeoutMs);
	});

	return Promise.race([promise, timeoutPromise]).finally(() => {
		clearTimeout(timeoutId);
	});
}
