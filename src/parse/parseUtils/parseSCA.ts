import type { Address, ParseOptions } from '../../types';
import { parseTypeOfAddress } from '../../utils/Address/AddressType';
import type { ByteCursor } from '../../utils/ByteCursor';
import { PduError } from '../../utils/errors';
import { unpackSeptets } from '../../utils/Gsm7';
import { FILL_NIBBLE, decodeSemiOctets } from '../../utils/SemiOctet';

/**
 * Reads the address payload once its size is known, failing before the read
 * when the declared length runs past the end of the PDU.
 */
function readPayload(cursor: ByteCursor, octets: number, start: number) {
	if (octets > cursor.remaining()) {
		throw new PduError('InvalidAddressLength', `Address needs ${octets} bytes, ${cursor.remaining()} left!`, {
			offset: start,
			expected: octets,
			actual: cursor.remaining()
		});
	}

	return { offset: cursor.offset, bytes: cursor.readBytes(octets) };
}

/**
 * Decodes TP-OA / TP-DA. The length octet counts semi-octets of the number,
 * the type-of-address octet excluded.
 */
export function parseAddress(cursor: ByteCursor, options: ParseOptions): Address {
	const start = cursor.offset;
	const size = cursor.readByte();
	const toa = parseTypeOfAddress(cursor.readByte());
	const { offset, bytes } = readPayload(cursor, Math.ceil(size / 2), start);

	const value =
		toa.type === 'alphanumeric'
			? unpackSeptets(bytes, Math.floor((size * 4) / 7), { offset }) // semi-octets to septets
			: decodeSemiOctets(bytes, size, { offset, extendedDigits: options.extendedAddressDigits });

	return { typeOfAddress: toa.type, numberingPlan: toa.plan, numberOfDigits: size, value };
}

/**
 * Decodes the SMSC information that precedes the TPDU. Its length octet
 * counts octets, the type-of-address octet included. Returns `null` when the
 * modem left the SMSC out (length 0).
 */
export default function parseSCA(cursor: ByteCursor, options: ParseOptions): Address | null {
	const start = cursor.offset;
	const size = cursor.readByte();

	if (!size) {
		return null;
	}

	const { offset, bytes: typeBytes } = readPayload(cursor, size, start);
	const toa = parseTypeOfAddress(typeBytes[0]);
	const bytes = typeBytes.subarray(1);

	if (toa.type === 'alphanumeric') {
		return {
			typeOfAddress: toa.type,
			numberingPlan: toa.plan,
			numberOfDigits: size,
			value: unpackSeptets(bytes, Math.floor((bytes.length * 8) / 7), { offset: offset + 1 })
		};
	}

	// Detect padding nibble
	let digits = bytes.length * 2;

	if (bytes.length && bytes[bytes.length - 1] >> 4 === FILL_NIBBLE) {
		digits--;
	}

	return {
		typeOfAddress: toa.type,
		numberingPlan: toa.plan,
		numberOfDigits: size,
		value: decodeSemiOctets(bytes, digits, { offset: offset + 1, extendedDigits: options.extendedAddressDigits })
	};
}
