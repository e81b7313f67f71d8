import { parse, tryParse } from './parse/index';
import type { DecodedMessage, DecoderOptions, ParseResult } from './types';
import { type EventTypes, Events } from './utils/Events';
import { Helper } from './utils/Helper';
import { logger } from './utils/logger';

export class PduDecoder {
	// options
	private readonly options: DecoderOptions;

	// system
	private readonly events = new Events();

	constructor(options: Partial<DecoderOptions> = {}) {
		this.options = {
			extendedAddressDigits: options.extendedAddressDigits ?? false,
			logWarnings: options.logWarnings ?? true,
			logger: options.logger ?? logger
		};
	}

	/*
	 * ================================================
	 *                Private functions
	 * ================================================
	 */

	private describe(input: string | Uint8Array) {
		return typeof input === 'string' ? input.trim() : Helper.bytesToHex(input);
	}

	private handleDecoded(input: string | Uint8Array, message: DecodedMessage) {
		this.options.logger.debug(`Decoded ${message.messageType} PDU ${this.describe(input)}`);

		if (message.messageType !== 'status-report' && message.warning !== undefined) {
			if (this.options.logWarnings) {
				this.options.logger.warn(`${message.warning} PDU: ${this.describe(input)}`);
			}

			this.events.emit('onWarning', { warning: message.warning, message });
		}

		this.events.emit('onDecoded', message);
	}

	/*
	 * ================================================
	 *                 Public functions
	 * ================================================
	 */

	/**
	 * Decodes a single PDU. Decoding failures are logged, emitted as
	 * `onDecodeFailed` and returned instead of thrown. An error thrown by an
	 * event listener is not caught and propagates to the caller.
	 *
	 * @param input Hex string as read from the modem, or the raw bytes.
	 * @returns The decoded message, or the `PduError` describing why it could not be decoded.
	 */
	decode(input: string | Uint8Array): ParseResult {
		const result = tryParse(input, { extendedAddressDigits: this.options.extendedAddressDigits });

		if (result.success) {
			this.handleDecoded(input, result.data);
		} else {
			this.options.logger.error(`${result.error.message} PDU: ${this.describe(input)}`);
			this.events.emit('onDecodeFailed', { input, error: result.error });
		}

		return result;
	}

	/**
	 * Decodes a batch of PDUs, e.g. the output of `AT+CMGL=4`. One bad PDU does not stop the others.
	 */
	decodeAll(inputs: Iterable<string | Uint8Array>): ParseResult[] {
		return Array.from(inputs, (input) => this.decode(input));
	}

	/**
	 * Decodes a single PDU and throws its `PduError` on failure. Events are emitted as for {@link decode}.
	 */
	decodeOrThrow(input: string | Uint8Array): DecodedMessage {
		const result = this.decode(input);

		if (!result.success) {
			throw result.error;
		}

		return result.data;
	}

	/**
	 * Decodes without events or logging, with this decoder's options.
	 */
	parse(input: string | Uint8Array): DecodedMessage {
		return parse(input, { extendedAddressDigits: this.options.extendedAddressDigits });
	}

	/*
	 * ================================================
	 *                     Events
	 * ================================================
	 */

	on<T extends keyof EventTypes>(eventName: T, listener: EventTypes[T]) {
		this.events.on(eventName, listener);
	}

	once<T extends keyof EventTypes>(eventName: T, listener: EventTypes[T]) {
		this.events.once(eventName, listener);
	}

	removeListener<T extends keyof EventTypes>(eventName: T, listener: EventTypes[T]) {
		this.events.removeListener(eventName, listener);
	}
}
