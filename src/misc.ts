/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

export const assertNever = (x: never) => {
	// eslint-disable-next-line @typescript-eslint/restrict-template-expressions
	throw new Error(`Unexpected value: ${x}`);
};

export const toDataView = (bytes: Uint8Array) => {
	return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
};

export const isIso88591Compatible = (text: string) => {
	for (let i = 0; i < text.length; i++) {
		if (text.charCodeAt(i) > 0xff) {
			return false;
		}
	}

	return true;
};

export const concatBytes = (chunks: Uint8Array[]) => {
	let totalLength = 0;
	for (const chunk of chunks) {
		totalLength += chunk.byteLength;
	}

	const result = new Uint8Array(totalLength);
	let offset = 0;
	for (const chunk of chunks) {
		result.set(chunk, offset);
		offset += chunk.byteLength;
	}

	return result;
};

/** Checks whether `bytes` starts with the ASCII characters of `text`, beginning at `offset`. */
export const bytesStartWithAscii = (bytes: Uint8Array, text: string, offset = 0) => {
	if (offset + text.length > bytes.length) {
		return false;
	}

	for (let i = 0; i < text.length; i++) {
		if (bytes[offset + i] !== text.charCodeAt(i)) {
			return false;
		}
	}

	return true;
};
