import type { Alphabet, DataCodingScheme, IndicationType, MessageClass, MessageWaiting } from '../types';

/*
 * Data Coding Scheme
 *
 * 3GPP TS 23.038 section 4. Reserved and non-conformant values never fail,
 * they decode as the GSM 7-bit default alphabet.
 */

const ALPHABET_8BIT = 0x01;
const ALPHABET_UCS2 = 0x02;

const GROUP_DISCARD_MESSAGE = 0x0c;
const GROUP_STORE_MESSAGE = 0x0d;
const GROUP_STORE_MESSAGE_UCS2 = 0x0e;
const GROUP_DATA_CODING_AND_CLASS = 0x0f;

const INDICATION_TYPES: readonly IndicationType[] = ['voicemail', 'fax', 'email', 'other'];

function toAlphabet(bits: number): Alphabet {
	switch (bits & 0x03) {
		case ALPHABET_8BIT:
			return 'data8bit';
		case ALPHABET_UCS2:
			return 'ucs2';
		default:
			return 'gsm7';
	}
}

function toClass(bits: number): MessageClass {
	switch (bits & 0x03) {
		case 1:
			return 1;
		case 2:
			return 2;
		case 3:
			return 3;
		default:
			return 0;
	}
}

function messageWaiting(byte: number, discard: boolean): MessageWaiting {
	return {
		active: !!(byte & (1 << 3)),
		type: INDICATION_TYPES[byte & 0x03],
		discard
	};
}

export function interpretDCS(byte: number): DataCodingScheme {
	const value = byte & 0xff;
	const encodeGroup = value >> 4;
	const dcs: DataCodingScheme = { value, alphabet: 'gsm7', messageClass: null, compressed: false, messageWaiting: null };

	// General data coding, 00xx
	if (encodeGroup <= 0x03) {
		dcs.alphabet = toAlphabet(value >> 2);
		dcs.compressed = !!(value & (1 << 5));
		dcs.messageClass = value & (1 << 4) ? toClass(value) : null;

		return dcs;
	}

	// Reserved coding groups, 01xx
	if (encodeGroup <= 0x07) {
		return dcs;
	}

	switch (encodeGroup) {
		case GROUP_DISCARD_MESSAGE:
			dcs.messageWaiting = messageWaiting(value, true);
			break;

		case GROUP_STORE_MESSAGE:
			dcs.messageWaiting = messageWaiting(value, false);
			break;

		case GROUP_STORE_MESSAGE_UCS2:
			dcs.alphabet = 'ucs2';
			dcs.messageWaiting = messageWaiting(value, false);
			break;

		case GROUP_DATA_CODING_AND_CLASS:
			dcs.alphabet = value & (1 << 2) ? 'data8bit' : 'gsm7';
			dcs.messageClass = toClass(value);
			break;

		default:
			dcs.alphabet = toAlphabet(value >> 2);
	}

	return dcs;
}
