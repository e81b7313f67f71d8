import type { PduError } from './utils/errors';

/*
 * Decoded PDU records. Everything here is plain data: no methods, no
 * references back to the input buffer.
 */

export type Alphabet = 'gsm7' | 'data8bit' | 'ucs2';

export type MessageClass = 0 | 1 | 2 | 3;

export type IndicationType = 'voicemail' | 'fax' | 'email' | 'other';

/**
 * Message waiting indication carried by the DCS groups `1100`–`1110`.
 */
export interface MessageWaiting {
	active: boolean;
	type: IndicationType;
	discard: boolean;
}

export interface DataCodingScheme {
	value: number;
	alphabet: Alphabet;
	messageClass: MessageClass | null;
	compressed: boolean;
	messageWaiting: MessageWaiting | null;
}

export type TypeOfNumber =
	| 'unknown'
	| 'international'
	| 'national'
	| 'network-specific'
	| 'subscriber'
	| 'alphanumeric'
	| 'abbreviated'
	| 'reserved';

export type NumberingPlan =
	| 'unknown'
	| 'isdn'
	| 'data'
	| 'telex'
	| 'service-centre-specific-1'
	| 'service-centre-specific-2'
	| 'national'
	| 'private'
	| 'ermes'
	| 'reserved';

export interface Address {
	typeOfAddress: TypeOfNumber;
	numberingPlan: NumberingPlan;
	/**
	 * The length field as transmitted: semi-octets for TP-OA/TP-DA, octets for the SMSC.
	 */
	numberOfDigits: number;
	value: string;
}

export interface Timestamp {
	year: number;
	month: number;
	day: number;
	hour: number;
	minute: number;
	second: number;
	timezoneQuarterHours: number;
	/**
	 * ISO 8601 rendering with the sender's UTC offset, `null` if the fields are not a valid date.
	 */
	isoString: string | null;
}

export type ValidityPeriod =
	| { format: 'relative'; value: number; seconds: number }
	| { format: 'absolute'; timestamp: Timestamp }
	| { format: 'enhanced'; raw: string };

export interface InformationElement {
	identifier: number;
	/**
	 * Element data as an upper-case hex string.
	 */
	data: string;
}

export interface Concatenation {
	reference: number;
	partsCount: number;
	partNumber: number;
}

export interface UserDataHeader {
	length: number;
	elements: InformationElement[];
	concatenation: Concatenation | null;
}

/**
 * TP-PID split into its fields, 3GPP TS 23.040 section 9.2.3.9.
 */
export interface ProtocolIdentifier {
	value: number;
	pid: number;
	indicates: number;
	type: number;
}

export type MessageType = 'deliver' | 'submit' | 'status-report';

/**
 * The TPDU's first octet. Bit 2 is TP-RD for SMS-SUBMIT and TP-MMS otherwise,
 * bits 4–3 are TP-VPF for SMS-SUBMIT and carry TP-LP (bit 3) otherwise.
 */
export interface FirstOctet {
	value: number;
	messageType: MessageType;
	messageTypeIndicator: number;
	replyPath: boolean;
	userDataHeader: boolean;
	statusReport: boolean;
	validityPeriodFormat: number;
	rejectDuplicates: boolean;
	moreMessagesToSend: boolean;
	loopPrevention: boolean;
}

interface UserDataFields {
	protocolIdentifier: ProtocolIdentifier;
	dataCodingScheme: DataCodingScheme;
	userDataLength: number;
	userDataHeader: UserDataHeader | null;
	text: string;
	/**
	 * Set when the text was recovered from a truncated PDU; the text then ends with `…`.
	 */
	warning?: string;
}

export interface DeliverMessage extends UserDataFields {
	messageType: 'deliver';
	smscAddress: Address | null;
	firstOctet: FirstOctet;
	sender: Address;
	timestamp: Timestamp;
}

export interface SubmitMessage extends UserDataFields {
	messageType: 'submit';
	smscAddress: Address | null;
	firstOctet: FirstOctet;
	messageReference: number;
	recipient: Address;
	validityPeriod: ValidityPeriod | null;
}

export interface StatusReportMessage {
	messageType: 'status-report';
	smscAddress: Address | null;
	firstOctet: FirstOctet;
	messageReference: number;
	recipient: Address;
	timestamp: Timestamp;
	dischargeTime: Timestamp;
	status: number;
}

export type DecodedMessage = DeliverMessage | SubmitMessage | StatusReportMessage;

/*
 * Options
 */

export interface ParseOptions {
	/**
	 * Decode the address nibbles `A`–`E` as `* # a b c` instead of failing with `InvalidDigit`.
	 */
	extendedAddressDigits: boolean;
}

/**
 * The subset of `console` the decoder writes to.
 */
export type DecoderLogger = Pick<Console, 'debug' | 'warn' | 'error'>;

export interface DecoderOptions extends ParseOptions {
	/**
	 * Log recovered truncations at warn level.
	 */
	logWarnings: boolean;
	logger: DecoderLogger;
}

export type ParseResult = ParseSuccess | ParseFailed;

export interface ParseSuccess {
	success: true;
	data: DecodedMessage;
}

export interface ParseFailed {
	success: false;
	error: PduError;
}

export type { EventTypes } from './utils/Events';
export type { PduErrorKind, PduErrorDetails } from './utils/errors';
