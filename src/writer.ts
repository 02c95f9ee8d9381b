/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

/** Growable in-memory byte sink. The written bytes are obtained with `finalize()`. */
export class ByteWriter {
	private buffer: Uint8Array;
	private pos = 0;

	constructor(initialCapacity = 2 ** 10) {
		this.buffer = new Uint8Array(Math.max(initialCapacity, 1));
	}

	private ensureCapacity(size: number) {
		let newLength = this.buffer.length;
		while (newLength < size) {
			newLength *= 2;
		}

		if (newLength === this.buffer.length) {
			return;
		}

		const newBuffer = new Uint8Array(newLength);
		newBuffer.set(this.buffer.subarray(0, this.pos));
		this.buffer = newBuffer;
	}

	write(data: Uint8Array) {
		this.ensureCapacity(this.pos + data.byteLength);
		this.buffer.set(data, this.pos);
		this.pos += data.byteLength;
	}

	writeZeroes(count: number) {
		this.ensureCapacity(this.pos + count);
		this.buffer.fill(0, this.pos, this.pos + count);
		this.pos += count;
	}

	/** Returns a copy of everything written so far. */
	finalize() {
		return this.buffer.slice(0, this.pos);
	}
}
