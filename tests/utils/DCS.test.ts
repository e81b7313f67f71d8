import { describe, expect, it } from 'vitest';
import { interpretDCS } from '../../src/utils/DCS';

describe('interpretDCS', () => {
	it('0x00 is the GSM 7-bit default without class', () => {
		expect(interpretDCS(0x00)).toEqual({
			value: 0x00,
			alphabet: 'gsm7',
			messageClass: null,
			compressed: false,
			messageWaiting: null
		});
	});

	it('reads the alphabet from bits 3-2 in the general coding groups', () => {
		expect(interpretDCS(0x04).alphabet).toBe('data8bit');
		expect(interpretDCS(0x08).alphabet).toBe('ucs2');
		expect(interpretDCS(0x0c).alphabet).toBe('gsm7');
	});

	it('reads the class only when bit 4 is set', () => {
		expect(interpretDCS(0x10).messageClass).toBe(0);
		expect(interpretDCS(0x18)).toMatchObject({ alphabet: 'ucs2', messageClass: 0 });
		expect(interpretDCS(0x03).messageClass).toBeNull();
		expect(interpretDCS(0x13).messageClass).toBe(3);
	});

	it('reads compression from bit 5', () => {
		expect(interpretDCS(0x20).compressed).toBe(true);
		expect(interpretDCS(0x31)).toMatchObject({ compressed: true, messageClass: 1 });
	});

	it('falls back to GSM 7-bit for the reserved 01xx groups', () => {
		expect(interpretDCS(0x48)).toMatchObject({ alphabet: 'gsm7', messageClass: null, compressed: false });
	});

	it('decodes the data coding / message class group', () => {
		expect(interpretDCS(0xf0)).toMatchObject({ alphabet: 'gsm7', messageClass: 0 });
		expect(interpretDCS(0xf6)).toMatchObject({ alphabet: 'data8bit', messageClass: 2 });
	});

	it('decodes the message waiting groups', () => {
		expect(interpretDCS(0xc8)).toMatchObject({
			alphabet: 'gsm7',
			messageWaiting: { active: true, type: 'voicemail', discard: true }
		});
		expect(interpretDCS(0xd1).messageWaiting).toEqual({ active: false, type: 'fax', discard: false });
		expect(interpretDCS(0xea)).toMatchObject({ alphabet: 'ucs2', messageWaiting: { active: true, type: 'email' } });
	});

	it('never fails on reserved values', () => {
		expect(interpretDCS(0x8c).alphabet).toBe('gsm7');
		expect(interpretDCS(0x98).alphabet).toBe('ucs2');
	});
});
