// Small shared utilities

const IS_TEST = typeof process !== 'undefined' && (
	typeof process.env.VITEST_WORKER_ID === 'string' ||
	process.env.NODE_ENV === 'test'
);

/**
 * Compile-time exhaustiveness helper. At runtime it throws during unit tests (Vitest) or when
 * NODE_ENV==='test', and is a no-op otherwise.
 */
export function AssertNever(x: never, message?: string): never {
	if (IS_TEST) {
		throw new Error(message ?? `Unexpected value in AssertNever: ${String(x)}`);
	}
	return undefined as never;
}
