import { PduError } from '../src/utils/errors';

/**
 * Runs `fn` and returns the `PduError` it throws, failing the test otherwise.
 */
export function catchPduError(fn: () => unknown): PduError {
	try {
		fn();
	} catch (error) {
		if (error instanceof PduError) {
			return error;
		}

		throw error;
	}

	throw new Error('expected a PduError to be thrown');
}
