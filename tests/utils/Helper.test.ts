import { describe, expect, it } from 'vitest';
import { Helper } from '../../src/utils/Helper';
import { catchPduError } from '../helpers';

describe('Helper', () => {
	it('hexToBytes ignores case and surrounding whitespace', () => {
		expect(Array.from(Helper.hexToBytes(' 0aFf\r\n'))).toEqual([0x0a, 0xff]);
	});

	it('hexToBytes rejects non-hex characters', () => {
		const error = catchPduError(() => Helper.hexToBytes('00112G'));

		expect(error.kind).toBe('InvalidHex');
		expect(error.details).toEqual({ offset: 2 });
		expect(error.message).toBe("sms-pdu-decoder: Invalid hex character 'G'! (at byte 2)");
	});

	it('hexToBytes rejects an odd number of digits', () => {
		const error = catchPduError(() => Helper.hexToBytes('000'));

		expect(error.kind).toBe('InvalidHex');
		expect(error.details).toEqual({ offset: 1, expected: 4, actual: 3 });
	});

	it('bytesToHex prints upper case', () => {
		expect(Helper.bytesToHex(Uint8Array.of(0x0a, 0xff))).toBe('0AFF');
	});

	it('decode8Bit maps bytes to char codes', () => {
		expect(Helper.decode8Bit(Uint8Array.of(0x41, 0x42, 0xe9))).toBe('ABé');
	});
});
