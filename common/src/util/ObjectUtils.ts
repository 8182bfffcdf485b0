/**
 * Returns a function that creates the value on first call and returns the same value afterwards.
 */
export function memoized<T>(create: () => T): () => T {
	let created: { value: T } | undefined;
	return () => {
		if (!created) {
			created = { value: create() };
		}
		return created.value;
	};
}
