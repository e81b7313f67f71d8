import { PduError } from './errors';

/*
 * Semi-octet (swapped BCD) representation used by addresses and time stamps.
 * Each octet holds two digits, the low nibble first.
 */

export const FILL_NIBBLE = 0x0f;

// Address digits above 9, see 3GPP TS 23.040 section 9.1.2.3
const EXTENDED_DIGITS: Record<number, string> = {
	0x0a: '*',
	0x0b: '#',
	0x0c: 'a',
	0x0d: 'b',
	0x0e: 'c'
};

export interface SemiOctetOptions {
	/**
	 * Accept the nibbles `A`–`E` as `* # a b c` instead of rejecting them.
	 */
	extendedDigits?: boolean;

	/**
	 * Position of `bytes[0]` within the PDU, reported in errors.
	 */
	offset?: number;
}

export function decodeSemiOctets(bytes: Uint8Array, digitCount: number, options: SemiOctetOptions = {}) {
	const offset = options.offset ?? 0;
	const octets = Math.ceil(digitCount / 2);

	if (octets > bytes.length) {
		throw new PduError('UnexpectedEndOfData', `${digitCount} semi-octets need ${octets} bytes, got ${bytes.length}!`, {
			offset: offset + bytes.length,
			expected: octets,
			actual: bytes.length
		});
	}

	let digits = '';

	for (let i = 0; i < digitCount; i++) {
		const byte = bytes[i >> 1];
		const nibble = i & 1 ? byte >> 4 : byte & 0x0f;

		if (nibble < 10) {
			digits += nibble;
			continue;
		}

		const extended = options.extendedDigits ? EXTENDED_DIGITS[nibble] : undefined;

		if (extended === undefined) {
			throw new PduError('InvalidDigit', `Invalid semi-octet digit 0x${nibble.toString(16).toUpperCase()}!`, {
				offset: offset + (i >> 1),
				value: nibble
			});
		}

		digits += extended;
	}

	if (digitCount % 2) {
		const last = bytes[octets - 1];

		if (last >> 4 !== FILL_NIBBLE) {
			throw new PduError('InvalidPadding', `Expected fill nibble 0xF, got 0x${(last >> 4).toString(16).toUpperCase()}!`, {
				offset: offset + octets - 1,
				value: last >> 4
			});
		}
	}

	return digits;
}

export function encodeSemiOctets(digits: string): Uint8Array {
	const nibbles = digits
		.replace(/[^a-c0-9*#]/gi, '')
		.split('')
		.map((s) => {
			switch (s.toLowerCase()) {
				case '*':
					return 0x0a;
				case '#':
					return 0x0b;
				case 'a':
					return 0x0c;
				case 'b':
					return 0x0d;
				case 'c':
					return 0x0e;
				default:
					return Number(s);
			}
		});

	const bytes = new Uint8Array(Math.ceil(nibbles.length / 2));

	for (let i = 0; i < bytes.length; i++) {
		const low = nibbles[2 * i];
		const high = 2 * i + 1 < nibbles.length ? nibbles[2 * i + 1] : FILL_NIBBLE;

		bytes[i] = (high << 4) | low;
	}

	return bytes;
}
