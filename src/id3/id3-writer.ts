/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { assertNever } from '../misc';
import { ByteWriter } from '../writer';
import type { Id3Frame } from './id3-frames';
import { encodeBitPaddedInt, encodeTerminatedText, encodeText, ID3_HEADER_SIZE, Id3V2TextEncoding } from './id3-misc';
import type { Id3Tags } from './id3-tags';

const MAX_SYNCHSAFE_VALUE = 2 ** 28 - 1;

/** UTF-8 is not a legal text encoding before ID3v2.4; such frames are written as UTF-16 instead. */
export const getEncodingForVersion = (encoding: Id3V2TextEncoding, majorVersion: number) => {
	return majorVersion < 4 && encoding === Id3V2TextEncoding.UTF_8
		? Id3V2TextEncoding.UTF_16_WITH_BOM
		: encoding;
};

export class Id3Writer {
	private helper = new Uint8Array(8);
	private helperView = new DataView(this.helper.buffer);

	constructor(private writer: ByteWriter) {}

	writeU8(value: number) {
		this.helper[0] = value;
		this.writer.write(this.helper.subarray(0, 1));
	}

	writeU16(value: number) {
		this.helperView.setUint16(0, value, false);
		this.writer.write(this.helper.subarray(0, 2));
	}

	writeU32(value: number) {
		this.helperView.setUint32(0, value, false);
		this.writer.write(this.helper.subarray(0, 4));
	}

	writeAscii(text: string) {
		const bytes = new Uint8Array(text.length);
		for (let i = 0; i < text.length; i++) {
			bytes[i] = text.charCodeAt(i);
		}
		this.writer.write(bytes);
	}

	writeSynchsafeU32(value: number) {
		if (value > MAX_SYNCHSAFE_VALUE) {
			throw new RangeError(`${value} does not fit into a syncsafe integer.`);
		}

		this.writer.write(encodeBitPaddedInt(value, 4, 7));
	}

	writeText(text: string, encoding: Id3V2TextEncoding) {
		this.writer.write(encodeText(text, encoding));
	}

	writeTerminatedText(text: string, encoding: Id3V2TextEncoding) {
		this.writer.write(encodeTerminatedText(text, encoding));
	}

	writeTagHeader(majorVersion: 3 | 4, size: number) {
		this.writeAscii('ID3');
		this.writeU8(majorVersion);
		this.writeU8(0); // Revision
		this.writeU8(0); // Flags
		this.writeSynchsafeU32(size);
	}

	writeRawFrame(id: string, payload: Uint8Array, majorVersion: 3 | 4) {
		this.writeAscii(id);
		if (majorVersion === 4) {
			this.writeSynchsafeU32(payload.byteLength);
		} else {
			this.writeU32(payload.byteLength);
		}
		this.writeU16(0x0000);
		this.writer.write(payload);
	}

	writeFrame(frame: Id3Frame, majorVersion: 3 | 4) {
		this.writeRawFrame(frame.id, serializeFrameData(frame, majorVersion), majorVersion);
	}

	/** Writes a frame's payload, without the frame header. */
	writeFrameData(frame: Id3Frame, majorVersion: number) {
		switch (frame.type) {
			case 'text': {
				const encoding = getEncodingForVersion(frame.encoding, majorVersion);
				this.writeU8(encoding);
				this.writeText(frame.text.join('\0'), encoding);
			}; break;

			case 'userText': {
				const encoding = getEncodingForVersion(frame.encoding, majorVersion);
				this.writeU8(encoding);
				this.writeTerminatedText(frame.description, encoding);
				this.writeText(frame.text.join('\0'), encoding);
			}; break;

			case 'url': {
				this.writeText(frame.url, Id3V2TextEncoding.ISO_8859_1);
			}; break;

			case 'userUrl': {
				const encoding = getEncodingForVersion(frame.encoding, majorVersion);
				this.writeU8(encoding);
				this.writeTerminatedText(frame.description, encoding);
				this.writeText(frame.url, Id3V2TextEncoding.ISO_8859_1);
			}; break;

			case 'comment':
			case 'lyrics': {
				const encoding = getEncodingForVersion(frame.encoding, majorVersion);
				this.writeU8(encoding);
				this.writeAscii(frame.language.length === 3 ? frame.language : 'XXX');
				this.writeTerminatedText(frame.description, encoding);
				this.writeText(frame.text, encoding);
			}; break;

			case 'picture': {
				const encoding = getEncodingForVersion(frame.encoding, majorVersion);
				this.writeU8(encoding);
				this.writeTerminatedText(frame.mimeType, Id3V2TextEncoding.ISO_8859_1);
				this.writeU8(frame.pictureType);
				this.writeTerminatedText(frame.description, encoding);
				this.writer.write(frame.data);
			}; break;

			case 'popularimeter': {
				this.writeTerminatedText(frame.email, Id3V2TextEncoding.ISO_8859_1);
				this.writeU8(frame.rating);

				// Counter is as wide as it needs to be, and omitted when zero
				const countBytes: number[] = [];
				let count = frame.count;
				while (count > 0n) {
					countBytes.unshift(Number(count & 0xffn));
					count >>= 8n;
				}
				this.writer.write(new Uint8Array(countBytes));
			}; break;

			case 'binary': {
				this.writer.write(frame.data);
			}; break;

			case 'pairedText': {
				const encoding = getEncodingForVersion(frame.encoding, majorVersion);
				this.writeU8(encoding);
				this.writeText(frame.people.flat().join('\0'), encoding);
			}; break;

			default: assertNever(frame);
		}
	}
}

/** Serializes a frame's payload, without the frame header, for the given major version. */
export const serializeFrameData = (frame: Id3Frame, majorVersion: number) => {
	const byteWriter = new ByteWriter();
	new Id3Writer(byteWriter).writeFrameData(frame, majorVersion);

	return byteWriter.finalize();
};

/**
 * Renders a complete ID3v2 tag: header, frames and zero padding. No footer and no unsynchronisation are written.
 */
export const renderId3Tag = (tags: Id3Tags, majorVersion: 3 | 4, padding: number) => {
	const frames = tags.render(majorVersion);

	const byteWriter = new ByteWriter(ID3_HEADER_SIZE + frames.byteLength + padding);
	const writer = new Id3Writer(byteWriter);

	writer.writeTagHeader(majorVersion, frames.byteLength + padding);
	byteWriter.write(frames);
	byteWriter.writeZeroes(padding);

	return byteWriter.finalize();
};
