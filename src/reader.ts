/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { toDataView } from './misc';

/** A cursor over an in-memory byte buffer. */
export class FileSlice {
	bufferPos = 0;

	constructor(
		public readonly bytes: Uint8Array,
		public readonly view: DataView,
	) {}

	static fromBytes(bytes: Uint8Array) {
		return new FileSlice(bytes, toDataView(bytes));
	}
}

export const readBytes = (slice: FileSlice, length: number) => {
	const bytes = slice.bytes.subarray(slice.bufferPos, slice.bufferPos + length);
	slice.bufferPos += length;

	return bytes;
};

export const readU8 = (slice: FileSlice) => slice.view.getUint8(slice.bufferPos++);

export const readU16Be = (slice: FileSlice) => {
	const value = slice.view.getUint16(slice.bufferPos, false);
	slice.bufferPos += 2;

	return value;
};

export const readU24Be = (slice: FileSlice) => {
	const high = readU16Be(slice);
	const low = readU8(slice);
	return high * 0x100 + low;
};

export const readAscii = (slice: FileSlice, length: number) => {
	if (slice.bufferPos + length > slice.bytes.length) {
		throw new RangeError('Reading past end of slice.');
	}

	let str = '';

	for (let i = 0; i < length; i++) {
		str += String.fromCharCode(slice.view.getUint8(slice.bufferPos++));
	}

	return str;
};
