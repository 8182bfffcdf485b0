/**
 * In-process work queue that runs at most `concurrency` items at a time.
 */
export interface Queue<T> {
	add(item: T): void;
	/** Items waiting plus items running. */
	size(): number;
	/** Resolves once every queued and running item has finished. New items may still be added. */
	drain(): Promise<void>;
	/** Stops accepting items and drains. */
	close(): Promise<void>;
}

export class QueueClosedError extends Error {
	constructor() {
		super("Queue is closed");
		this.name = "QueueClosedError";
	}
}

/**
 * @param onError receives processor rejections; the queue keeps running
 */
export function createQueue<T>(
	concurrency: number,
	processor: (item: T) => Promise<void>,
	onError: (error: unknown, item: T) => void,
): Queue<T> {
	const promises = new Set<Promise<void>>();
	const queue: Array<T> = [];
	let closed = false;

	return { add, size, drain, close };

	function add(item: T): void {
		if (closed) {
			throw new QueueClosedError();
		}
		queue.push(item);
		process();
	}

	function size(): number {
		return queue.length + promises.size;
	}

	async function drain(): Promise<void> {
		while (queue.length > 0 || promises.size > 0) {
			if (promises.size > 0) {
				await Promise.race(promises);
			}
			process();
		}
	}

	async function close(): Promise<void> {
		closed = true;
		await drain();
	}

	function process(): void {
		while (queue.length > 0 && promises.size < concurrency) {
			const item = queue[0];
			queue.shift();

			const promise = processor(item)
				.catch(error => onError(error, item))
				.finally(() => {
					promises.delete(promise);
					process();
				});
			promises.add(promise);
		}
	}
}
