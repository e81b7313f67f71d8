import { PduError } from './errors';

export class Helper {
	static char(order: number) {
		return String.fromCharCode(order);
	}

	/**
	 * Converts the hex representation a modem prints for `+CMGL`/`+CMGR` into bytes.
	 * Case does not matter, surrounding whitespace is ignored.
	 */
	static hexToBytes(hex: string): Uint8Array {
		const clean = hex.trim();
		const invalid = clean.search(/[^0-9a-f]/i);

		if (invalid !== -1) {
			throw new PduError('InvalidHex', `Invalid hex character '${clean.charAt(invalid)}'!`, {
				offset: Math.floor(invalid / 2)
			});
		}

		if (clean.length % 2) {
			throw new PduError('InvalidHex', 'Hex string has an odd number of digits!', {
				offset: Math.floor(clean.length / 2),
				expected: clean.length + 1,
				actual: clean.length
			});
		}

		return Buffer.from(clean, 'hex');
	}

	static bytesToHex(bytes: Uint8Array) {
		return Buffer.from(bytes).toString('hex').toUpperCase();
	}

	/**
	 * 8-bit data is mapped byte to char code, as most modems do.
	 */
	static decode8Bit(bytes: Uint8Array) {
		return Array.from(bytes, (byte) => Helper.char(byte)).join('');
	}
}
