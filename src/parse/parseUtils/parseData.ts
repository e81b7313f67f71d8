import type { Alphabet, Concatenation, DataCodingScheme, InformationElement, UserDataHeader } from '../../types';
import { ByteCursor } from '../../utils/ByteCursor';
import { PduError } from '../../utils/errors';
import { unpackSeptets } from '../../utils/Gsm7';
import { Helper } from '../../utils/Helper';
import { type DecodedText, decodeUcs2 } from '../../utils/Ucs2';

export const IE_CONCAT_8BIT_REF = 0x00;
export const IE_CONCAT_16BIT_REF = 0x08;

export interface UserDataContext {
	userDataHeader: boolean;
	dataCodingScheme: DataCodingScheme;
	userDataLength: number;
}

export interface UserData extends DecodedText {
	header: UserDataHeader | null;
}

function parseConcatenation(ie: InformationElement, data: Uint8Array): Concatenation | null {
	if (ie.identifier === IE_CONCAT_8BIT_REF && data.length === 3) {
		return { reference: data[0], partsCount: data[1], partNumber: data[2] };
	}

	if (ie.identifier === IE_CONCAT_16BIT_REF && data.length === 4) {
		return { reference: (data[0] << 8) | data[1], partsCount: data[2], partNumber: data[3] };
	}

	return null;
}

/**
 * Splits the user data header into its information elements (TLV). Only the
 * concatenation elements are interpreted, the others are kept as hex.
 */
export function parseHeader(cursor: ByteCursor): UserDataHeader {
	const udhl = cursor.readByte();
	const body = cursor.slice(udhl);
	const elements: InformationElement[] = [];
	let concatenation: Concatenation | null = null;

	while (body.remaining() > 0) {
		const identifier = body.readByte();
		const data = body.readBytes(body.readByte());
		const ie = { identifier, data: Helper.bytesToHex(data) };

		concatenation = parseConcatenation(ie, data) ?? concatenation;
		elements.push(ie);
	}

	return { length: udhl, elements, concatenation };
}

function emptyUserData(cursor: ByteCursor, expected: number) {
	return new PduError('EmptyUserData', 'User data is empty!', { offset: cursor.offset, expected, actual: 0 });
}

/**
 * In the 7-bit alphabet the header shares the packed stream with the text:
 * the user data length counts septets, the header included and padded to a
 * septet boundary.
 */
function parseSeptets(cursor: ByteCursor, context: UserDataContext): UserData {
	const octets = Math.ceil((context.userDataLength * 7) / 8); // Convert septets to octets
	const offset = cursor.offset;
	const bytes = cursor.readAtMost(octets);

	if (!bytes.length) {
		throw emptyUserData(cursor, octets);
	}

	let header: UserDataHeader | null = null;
	let headerSeptets = 0;

	if (context.userDataHeader) {
		header = parseHeader(new ByteCursor(bytes, offset));
		headerSeptets = Math.ceil(((header.length + 1) * 8) / 7); // Convert octets to septets
	}

	// The header takes up all of the announced septets
	if (context.userDataLength <= headerSeptets) {
		return { header, text: '' };
	}

	const text = unpackSeptets(bytes, context.userDataLength - headerSeptets, {
		bitOffset: headerSeptets * 7,
		offset
	});

	return { header, text };
}

function parseOctets(cursor: ByteCursor, context: UserDataContext, alphabet: Exclude<Alphabet, 'gsm7'>): UserData {
	if (!cursor.remaining()) {
		throw emptyUserData(cursor, context.userDataLength);
	}

	let header: UserDataHeader | null = null;
	let length = context.userDataLength; // Length already in octets

	if (context.userDataHeader) {
		header = parseHeader(cursor);
		length -= header.length + 1; // UDHL field length + UDH length
	}

	length = Math.max(length, 0);

	switch (alphabet) {
		case 'ucs2': {
			const offset = cursor.offset;
			return { header, ...decodeUcs2(cursor.readAtMost(length), { expectedLength: length, offset }) };
		}

		case 'data8bit':
			return { header, text: Helper.decode8Bit(cursor.readBytes(length)) };
	}
}

/**
 * Reads TP-UD. The caller has already read TP-UDL into `context.userDataLength`.
 */
export default function parseData(cursor: ByteCursor, context: UserDataContext): UserData {
	if (!context.userDataLength) {
		return { header: null, text: '' };
	}

	const alphabet = context.dataCodingScheme.alphabet;

	switch (alphabet) {
		case 'gsm7':
			return parseSeptets(cursor, context);
		case 'data8bit':
		case 'ucs2':
			return parseOctets(cursor, context, alphabet);
	}
}
