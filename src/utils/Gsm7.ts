import { PduError } from './errors';
import gsm7 from './gsm7.json';

/*
 * GSM 7-bit default alphabet, 3GPP TS 23.038 section 6.2.1
 */

export const ESCAPE = 0x1b;

const SPACE = ' ';

const DEFAULT_TABLE: readonly string[] = gsm7.default;
const EXTENSION_TABLE = new Map<number, string>(Object.entries(gsm7.extension).map(([code, char]) => [Number(code), char]));

const DEFAULT_CODES = new Map<string, number>(DEFAULT_TABLE.map((char, code) => [char, code]));
const EXTENSION_CODES = new Map<string, number>(Array.from(EXTENSION_TABLE, ([code, char]) => [char, code]));

DEFAULT_CODES.delete(DEFAULT_TABLE[ESCAPE]);

/**
 * Bits carried over from one octet to the next while unpacking.
 * Bits are consumed from the least significant end.
 */
interface SeptetAccumulator {
	bits: number;
	bitCount: number;
}

export interface UnpackOptions {
	/**
	 * Bits to skip before the first septet, e.g. a user data header and its fill bits.
	 */
	bitOffset?: number;

	/**
	 * Position of `bytes[0]` within the PDU, reported in errors.
	 */
	offset?: number;
}

export function unpackSeptets(bytes: Uint8Array, septetCount: number, options: UnpackOptions = {}) {
	const bitOffset = options.bitOffset ?? 0;
	const requiredBits = bitOffset + septetCount * 7;

	if (requiredBits > bytes.length * 8) {
		throw new PduError('TruncatedAlphabetData', `${septetCount} septets need ${requiredBits} bits, got ${bytes.length * 8}!`, {
			offset: (options.offset ?? 0) + bytes.length,
			expected: Math.ceil(requiredBits / 8),
			actual: bytes.length
		});
	}

	const septets: number[] = [];
	const acc: SeptetAccumulator = { bits: 0, bitCount: 0 };
	let position = bitOffset >> 3;

	// If we have some leading alignment bits then skip them
	if (septetCount && bitOffset & 7) {
		acc.bits = bytes[position++] >> (bitOffset & 7);
		acc.bitCount = 8 - (bitOffset & 7);
	}

	while (septets.length < septetCount) {
		if (acc.bitCount < 7) {
			acc.bits |= bytes[position++] << acc.bitCount;
			acc.bitCount += 8;
		}

		septets.push(acc.bits & 0x7f);
		acc.bits >>= 7;
		acc.bitCount -= 7;
	}

	// Whatever is left in the accumulator is fill, not a character
	return septetsToText(septets);
}

function septetsToText(septets: number[]) {
	let text = '';
	let escaped = false;

	for (const septet of septets) {
		if (escaped) {
			text += EXTENSION_TABLE.get(septet) ?? SPACE;
			escaped = false;
		} else if (septet === ESCAPE) {
			escaped = true;
		} else {
			text += DEFAULT_TABLE[septet];
		}
	}

	// an escape with nothing after it
	if (escaped) {
		text += SPACE;
	}

	return text;
}

/**
 * Packs text into septets. Characters of neither table are packed as a space.
 *
 * @param alignBits Leading zero bits, used when a user data header precedes the text.
 */
export function packSeptets(text: string, alignBits = 0) {
	const result: number[] = [];
	let buf = 0;
	let bufLen = alignBits;
	let length = 0;

	const push = (septet: number) => {
		buf |= septet << bufLen;
		bufLen += 7;
		length++;

		while (bufLen >= 8) {
			result.push(buf & 0xff);
			buf >>= 8;
			bufLen -= 8;
		}
	};

	for (const char of text) {
		const code = DEFAULT_CODES.get(char);
		const extension = EXTENSION_CODES.get(char);

		if (code !== undefined) {
			push(code);
		} else if (extension !== undefined) {
			push(ESCAPE);
			push(extension);
		} else {
			push(DEFAULT_CODES.get(SPACE) ?? 0x20);
		}
	}

	if (bufLen) {
		result.push(buf);
	}

	return { length, result: Uint8Array.from(result) };
}

export function isGsm7Encodable(text: string) {
	for (const char of text) {
		if (!DEFAULT_CODES.has(char) && !EXTENSION_CODES.has(char)) {
			return false;
		}
	}

	return true;
}
