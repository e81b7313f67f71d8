import { describe, expect, it, vi } from 'vitest';
import { PduDecoder } from '../src/Decoder';
import type { DecodedMessage } from '../src/types';
import { PduError } from '../src/utils/errors';
import { DELIVER_GSM7, DELIVER_UCS2_TRUNCATED, SUBMIT_NO_VP } from './parse/fixtures';

function stubLogger() {
	return { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('PduDecoder', () => {
	it('emits onDecoded and logs at debug level', () => {
		const logger = stubLogger();
		const decoder = new PduDecoder({ logger });
		const decoded: DecodedMessage[] = [];

		decoder.on('onDecoded', (message) => decoded.push(message));

		const result = decoder.decode(SUBMIT_NO_VP);

		expect(result.success).toBe(true);
		expect(decoded.map((message) => message.messageType)).toEqual(['submit']);
		expect(logger.debug).toHaveBeenCalledWith(`Decoded submit PDU ${SUBMIT_NO_VP}`);
		expect(logger.warn).not.toHaveBeenCalled();
	});

	it('emits onWarning and logs a recovered truncation', () => {
		const logger = stubLogger();
		const decoder = new PduDecoder({ logger });
		const onWarning = vi.fn();
		const onDecoded = vi.fn();

		decoder.on('onWarning', onWarning);
		decoder.on('onDecoded', onDecoded);
		decoder.decode(DELIVER_UCS2_TRUNCATED);

		expect(onWarning).toHaveBeenCalledTimes(1);
		expect(onWarning.mock.calls[0][0].warning).toBe('Truncated PDU: User data is shorter than specified by UDL.');
		expect(onDecoded).toHaveBeenCalledTimes(1);
		expect(logger.warn).toHaveBeenCalledWith(
			`Truncated PDU: User data is shorter than specified by UDL. PDU: ${DELIVER_UCS2_TRUNCATED}`
		);
	});

	it('does not log warnings when logWarnings is off', () => {
		const logger = stubLogger();
		const onWarning = vi.fn();
		const decoder = new PduDecoder({ logger, logWarnings: false });

		decoder.on('onWarning', onWarning);
		decoder.decode(DELIVER_UCS2_TRUNCATED);

		expect(onWarning).toHaveBeenCalledTimes(1);
		expect(logger.warn).not.toHaveBeenCalled();
	});

	it('reports failures through onDecodeFailed instead of throwing', () => {
		const logger = stubLogger();
		const decoder = new PduDecoder({ logger });
		const onDecodeFailed = vi.fn();

		decoder.once('onDecodeFailed', onDecodeFailed);

		const result = decoder.decode('0004149151');

		expect(result.success).toBe(false);
		expect(onDecodeFailed).toHaveBeenCalledTimes(1);
		expect(onDecodeFailed.mock.calls[0][0].input).toBe('0004149151');
		expect(onDecodeFailed.mock.calls[0][0].error.kind).toBe('InvalidAddressLength');
		expect(logger.error).toHaveBeenCalledTimes(1);
	});

	it('lets an error thrown by a listener reach the caller', () => {
		const decoder = new PduDecoder({ logger: stubLogger() });

		decoder.on('onDecoded', () => {
			throw new Error('listener failed');
		});

		expect(() => decoder.decode(DELIVER_GSM7)).toThrow('listener failed');
	});

	it('decodeAll keeps going after a bad PDU', () => {
		const decoder = new PduDecoder({ logger: stubLogger() });
		const results = decoder.decodeAll([DELIVER_GSM7, 'XYZ', SUBMIT_NO_VP]);

		expect(results.map((result) => result.success)).toEqual([true, false, true]);
	});

	it('decodeOrThrow throws the PduError', () => {
		const decoder = new PduDecoder({ logger: stubLogger() });

		expect(() => decoder.decodeOrThrow('0003')).toThrow(PduError);
		expect(decoder.decodeOrThrow(DELIVER_GSM7).messageType).toBe('deliver');
	});

	it('passes extendedAddressDigits to the parser', () => {
		const pdu = '00' + '01' + '00' + '05811A00FB' + '00' + '00' + '00';
		const decoder = new PduDecoder({ logger: stubLogger(), extendedAddressDigits: true });
		const message = decoder.parse(pdu);

		expect(message.messageType === 'submit' ? message.recipient.value : null).toBe('*100#');
	});

	it('removeListener stops the events', () => {
		const decoder = new PduDecoder({ logger: stubLogger() });
		const onDecoded = vi.fn();

		decoder.on('onDecoded', onDecoded);
		decoder.removeListener('onDecoded', onDecoded);
		decoder.decode(DELIVER_GSM7);

		expect(onDecoded).not.toHaveBeenCalled();
	});
});
