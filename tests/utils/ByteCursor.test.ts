import { describe, expect, it } from 'vitest';
import { ByteCursor } from '../../src/utils/ByteCursor';
import { PduError } from '../../src/utils/errors';
import { catchPduError } from '../helpers';

describe('ByteCursor', () => {
	it('reads bytes in order and tracks the offset', () => {
		const cursor = new ByteCursor(Uint8Array.of(0x07, 0x91, 0x51, 0x55));

		expect(cursor.peekByte()).toBe(0x07);
		expect(cursor.readByte()).toBe(0x07);
		expect(cursor.offset).toBe(1);
		expect(Array.from(cursor.readBytes(2))).toEqual([0x91, 0x51]);
		expect(cursor.remaining()).toBe(1);
	});

	it('peekByte does not advance', () => {
		const cursor = new ByteCursor(Uint8Array.of(0xaa));

		cursor.peekByte();
		expect(cursor.remaining()).toBe(1);
	});

	it('fails with UnexpectedEndOfData instead of reading past the end', () => {
		const cursor = new ByteCursor(Uint8Array.of(0x01, 0x02));
		cursor.readByte();

		const error = catchPduError(() => cursor.readBytes(3));

		expect(error.kind).toBe('UnexpectedEndOfData');
		expect(error.details).toEqual({ offset: 1, expected: 3, actual: 1 });

		// a failed read leaves the cursor where it was
		expect(cursor.offset).toBe(1);
	});

	it('readByte on an exhausted cursor fails', () => {
		const cursor = new ByteCursor(new Uint8Array(0));

		expect(() => cursor.readByte()).toThrow(PduError);
		expect(() => cursor.peekByte()).toThrow('Not enough bytes! Requested 1, 0 available');
	});

	it('readAtMost stops at the end of the buffer', () => {
		const cursor = new ByteCursor(Uint8Array.of(1, 2, 3));

		expect(Array.from(cursor.readAtMost(2))).toEqual([1, 2]);
		expect(Array.from(cursor.readAtMost(5))).toEqual([3]);
		expect(cursor.readAtMost(1).length).toBe(0);
		expect(cursor.remaining()).toBe(0);
	});

	it('slice reports offsets relative to the parent buffer', () => {
		const cursor = new ByteCursor(Uint8Array.of(9, 9, 1, 2), 10);
		cursor.readBytes(2);

		const sub = cursor.slice(2);

		expect(sub.offset).toBe(12);
		expect(cursor.remaining()).toBe(0);
		sub.readBytes(2);
		expect(catchPduError(() => sub.readByte()).details).toEqual({ offset: 14, expected: 1, actual: 0 });
	});
});
