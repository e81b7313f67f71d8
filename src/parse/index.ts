import type {
	Address,
	DecodedMessage,
	DeliverMessage,
	FirstOctet,
	ParseOptions,
	ParseResult,
	StatusReportMessage,
	SubmitMessage
} from '../types';
import { ByteCursor } from '../utils/ByteCursor';
import { interpretDCS } from '../utils/DCS';
import { isPduError } from '../utils/errors';
import { Helper } from '../utils/Helper';

// import the parser for the utils

import parseData from './parseUtils/parseData';
import parsePID from './parseUtils/parsePID';
import parseSCA, { parseAddress } from './parseUtils/parseSCA';
import parseSCTS from './parseUtils/parseSCTS';
import parseType from './parseUtils/parseType';
import parseVP from './parseUtils/parseVP';

const DEFAULT_OPTIONS: ParseOptions = {
	extendedAddressDigits: false
};

/**
 * Decodes one PDU as printed by a modem in PDU mode (`AT+CMGF=0`): the SMSC
 * information followed by an SMS-DELIVER, SMS-SUBMIT or SMS-STATUS-REPORT TPDU.
 *
 * @param input Hex string in any case, or the raw bytes.
 * @throws {PduError} when the PDU is malformed. A truncated UCS-2 text is not
 * an error, it is returned with `warning` set.
 */
export function parse(input: string | Uint8Array, options: Partial<ParseOptions> = {}): DecodedMessage {
	const opts: ParseOptions = { ...DEFAULT_OPTIONS, ...options };
	const cursor = new ByteCursor(typeof input === 'string' ? Helper.hexToBytes(input) : input);

	// The correct order of parsing is important!!!

	const smscAddress = parseSCA(cursor, opts);
	const type = parseType(cursor);

	switch (type.messageType) {
		case 'deliver':
			return parseDeliver(smscAddress, type, cursor, opts);
		case 'submit':
			return parseSubmit(smscAddress, type, cursor, opts);
		case 'status-report':
			return parseReport(smscAddress, type, cursor, opts);
	}
}

/**
 * Like {@link parse}, but returns decoding failures instead of throwing them.
 * Anything thrown that is not a `PduError` is a bug and is rethrown.
 */
export function tryParse(input: string | Uint8Array, options: Partial<ParseOptions> = {}): ParseResult {
	try {
		return { success: true, data: parse(input, options) };
	} catch (error) {
		if (isPduError(error)) {
			return { success: false, error };
		}

		throw error;
	}
}

function parseDeliver(smscAddress: Address | null, type: FirstOctet, cursor: ByteCursor, options: ParseOptions): DeliverMessage {
	// The correct order of parsing is important!

	const sender = parseAddress(cursor, options);
	const protocolIdentifier = parsePID(cursor);
	const dataCodingScheme = interpretDCS(cursor.readByte());
	const timestamp = parseSCTS(cursor);
	const userDataLength = cursor.readByte();
	const userData = parseData(cursor, { userDataHeader: type.userDataHeader, dataCodingScheme, userDataLength });

	const message: DeliverMessage = {
		messageType: 'deliver',
		smscAddress,
		firstOctet: type,
		sender,
		protocolIdentifier,
		dataCodingScheme,
		timestamp,
		userDataLength,
		userDataHeader: userData.header,
		text: userData.text
	};

	if (userData.warning !== undefined) {
		message.warning = userData.warning;
	}

	return message;
}

function parseSubmit(smscAddress: Address | null, type: FirstOctet, cursor: ByteCursor, options: ParseOptions): SubmitMessage {
	// The correct order of parsing is important!

	const messageReference = cursor.readByte();
	const recipient = parseAddress(cursor, options);
	const protocolIdentifier = parsePID(cursor);
	const dataCodingScheme = interpretDCS(cursor.readByte());
	const validityPeriod = parseVP(type, cursor);
	const userDataLength = cursor.readByte();
	const userData = parseData(cursor, { userDataHeader: type.userDataHeader, dataCodingScheme, userDataLength });

	const message: SubmitMessage = {
		messageType: 'submit',
		smscAddress,
		firstOctet: type,
		messageReference,
		recipient,
		protocolIdentifier,
		dataCodingScheme,
		validityPeriod,
		userDataLength,
		userDataHeader: userData.header,
		text: userData.text
	};

	if (userData.warning !== undefined) {
		message.warning = userData.warning;
	}

	return message;
}

function parseReport(smscAddress: Address | null, type: FirstOctet, cursor: ByteCursor, options: ParseOptions): StatusReportMessage {
	// The correct order of parsing is important!

	const messageReference = cursor.readByte();
	const recipient = parseAddress(cursor, options);
	const timestamp = parseSCTS(cursor);
	const dischargeTime = parseSCTS(cursor);
	const status = cursor.readByte();

	return {
		messageType: 'status-report',
		smscAddress,
		firstOctet: type,
		messageReference,
		recipient,
		timestamp,
		dischargeTime,
		status
	};
}
