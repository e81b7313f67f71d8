import { PduError } from './errors';
import { Helper } from './Helper';

export const TRUNCATION_MARKER = '…';
export const TRUNCATION_WARNING = 'Truncated PDU: User data is shorter than specified by UDL.';

/**
 * Decoded text plus the warning raised when it had to be recovered from a
 * truncated PDU. Fatal problems are thrown as a `PduError` instead.
 */
export interface DecodedText {
	text: string;
	warning?: string;
}

export interface Ucs2Options {
	/**
	 * Number of bytes the user data length announced. Defaults to `bytes.length`.
	 */
	expectedLength?: number;

	/**
	 * Position of `bytes[0]` within the PDU, reported in errors.
	 */
	offset?: number;
}

/**
 * Decodes big-endian 16-bit code units. A missing trailing byte (odd length) or
 * fewer bytes than expected is recovered: the complete units are kept and
 * {@link TRUNCATION_MARKER} is appended.
 */
export function decodeUcs2(bytes: Uint8Array, options: Ucs2Options = {}): DecodedText {
	const expectedLength = options.expectedLength ?? bytes.length;

	if (!bytes.length) {
		if (expectedLength > 0) {
			throw new PduError('EmptyUserData', 'User data is empty!', {
				offset: options.offset ?? 0,
				expected: expectedLength,
				actual: 0
			});
		}

		return { text: '' };
	}

	let text = '';

	for (let i = 0; i + 1 < bytes.length; i += 2) {
		text += Helper.char((bytes[i] << 8) | bytes[i + 1]);
	}

	if (bytes.length % 2 === 0 && bytes.length >= expectedLength) {
		return { text };
	}

	return { text: text + TRUNCATION_MARKER, warning: TRUNCATION_WARNING };
}

export function encodeUcs2(text: string): Uint8Array {
	const bytes = new Uint8Array(text.length * 2);

	for (let i = 0; i < text.length; i++) {
		const unit = text.charCodeAt(i);

		bytes[2 * i] = unit >> 8;
		bytes[2 * i + 1] = unit & 0xff;
	}

	return bytes;
}
