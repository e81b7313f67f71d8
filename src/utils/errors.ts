/**
 * Every way a PDU can fail to decode. UCS-2 truncation is not listed here:
 * it is recovered and reported through the message's `warning` field.
 */
export type PduErrorKind =
	| 'InvalidHex'
	| 'UnexpectedEndOfData'
	| 'InvalidDigit'
	| 'InvalidPadding'
	| 'InvalidAddressLength'
	| 'TruncatedAlphabetData'
	| 'EmptyUserData'
	| 'UnsupportedMessageType';

/**
 * Context attached to a {@link PduError}. `offset` is the position of the
 * offending byte within the whole PDU (SMSC information included).
 */
export interface PduErrorDetails {
	offset: number;
	expected?: number;
	actual?: number;
	value?: number;
}

/**
 * Custom error class for everything that aborts a decode call.
 * Extends the native JavaScript `Error` class.
 */
export class PduError extends Error {
	readonly kind: PduErrorKind;
	readonly details: PduErrorDetails;

	/**
	 * Creates an instance of PduError.
	 *
	 * @param kind The error kind, used by callers to branch on the failure.
	 * @param message The error message.
	 * @param details Byte offset and expected/actual counts.
	 */
	constructor(kind: PduErrorKind, message: string, details: PduErrorDetails) {
		super(`sms-pdu-decoder: ${message} (at byte ${details.offset})`);

		this.name = 'PduError';
		this.kind = kind;
		this.details = details;
	}
}

/**
 * Narrows an unknown thrown value to a {@link PduError}, optionally of a given kind.
 */
export function isPduError(error: unknown, kind?: PduErrorKind): error is PduError {
	return error instanceof PduError && (kind === undefined || error.kind === kind);
}
