import { PduError } from './errors';

/**
 * Read-only cursor over a PDU byte buffer.
 *
 * All bounds checking of the decoder lives here: a read either returns the
 * requested bytes or throws `UnexpectedEndOfData`, the cursor never moves
 * past the end of its buffer.
 */
export class ByteCursor {
	private readonly data: Uint8Array;
	private readonly baseOffset: number;
	private _offset = 0;

	/**
	 * @param data The bytes to read. The cursor never writes to them.
	 * @param baseOffset Position of `data[0]` within the whole PDU, so that errors raised by a
	 * sub-cursor point at the right byte.
	 */
	constructor(data: Uint8Array, baseOffset = 0) {
		this.data = data;
		this.baseOffset = baseOffset;
	}

	/*
	 * getter
	 */

	/**
	 * Absolute position of the next byte to be read.
	 */
	get offset() {
		return this.baseOffset + this._offset;
	}

	get length() {
		return this.data.length;
	}

	/*
	 * public functions
	 */

	remaining() {
		return this.data.length - this._offset;
	}

	peekByte() {
		this.ensure(1);
		return this.data[this._offset];
	}

	readByte() {
		this.ensure(1);
		return this.data[this._offset++];
	}

	readBytes(length: number) {
		this.ensure(length);

		const bytes = this.data.subarray(this._offset, this._offset + length);
		this._offset += length;

		return bytes;
	}

	/**
	 * Reads up to `length` bytes, fewer when the buffer ends first. Used where
	 * a shortfall is reported by a more specific error or recovered from.
	 */
	readAtMost(length: number) {
		return this.readBytes(Math.min(Math.max(length, 0), this.remaining()));
	}

	/**
	 * Creates a cursor over the next `length` bytes and advances past them.
	 */
	slice(length: number) {
		const start = this.offset;
		return new ByteCursor(this.readBytes(length), start);
	}

	/*
	 * private functions
	 */

	private ensure(length: number) {
		const available = this.remaining();

		if (length > available) {
			throw new PduError('UnexpectedEndOfData', `Not enough bytes! Requested ${length}, ${available} available`, {
				offset: this.offset,
				expected: length,
				actual: available
			});
		}
	}
}
