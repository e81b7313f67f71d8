import { EventEmitter } from 'events';
import type { DecodedMessage } from '../types';
import type { PduError } from './errors';

export class Events extends EventEmitter {
	constructor() {
		super();
		this.setMaxListeners(50);
	}

	emit<T extends keyof EventTypes>(event: T, ...parameters: Parameters<EventTypes[T]>) {
		return super.emit(event, ...parameters);
	}

	on<T extends keyof EventTypes>(event: T, listener: EventTypes[T]) {
		return super.on(event, listener);
	}

	once<T extends keyof EventTypes>(event: T, listener: EventTypes[T]) {
		return super.once(event, listener);
	}
}

export type EventTypes = {
	/**
	 * Event triggered when a PDU is decoded, warned or not.
	 * @param message The decoded message.
	 */
	onDecoded: (message: DecodedMessage) => void;

	/**
	 * Event triggered when a PDU decoded only partially (truncated UCS-2 text).
	 * @param data The warning and the message it belongs to.
	 */
	onWarning: (data: { warning: string; message: DecodedMessage }) => void;

	/**
	 * Event triggered when a PDU can not be decoded.
	 * @param data The input as given to the decoder and the error.
	 */
	onDecodeFailed: (data: { input: string | Uint8Array; error: PduError }) => void;
};
