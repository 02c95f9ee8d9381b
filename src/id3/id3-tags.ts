/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { ByteWriter } from '../writer';
import { formatFrame, Id3Frame, parseFrame } from './id3-frames';
import {
	formatHashKey,
	getFrameHashKey,
	getHashKeyMapKey,
	HashKey,
	quickHashKey,
	toHashKey,
} from './id3-hash-key';
import { Id3Version } from './id3-header';
import { isValidFrameId } from './id3-misc';
import { Id3Writer } from './id3-writer';

/**
 * Owns the byte buffers that undecoded frames point into. Cells refer to a buffer by its numeric handle, so a cell
 * never keeps a buffer alive on its own.
 */
export class BufferRegistry {
	private buffers: Uint8Array[] = [];

	register(bytes: Uint8Array) {
		this.buffers.push(bytes);
		return this.buffers.length - 1;
	}

	resolve(handle: number, offset: number, length: number) {
		const buffer = this.buffers[handle];
		if (!buffer) {
			throw new RangeError(`Unknown buffer handle ${handle}.`);
		}
		if (offset < 0 || length < 0 || offset + length > buffer.length) {
			throw new RangeError(`Range ${offset}+${length} is outside of buffer ${handle}.`);
		}

		return buffer.subarray(offset, offset + length);
	}
}

type FrameCellState =
	| { type: 'decoded'; frame: Id3Frame }
	| { type: 'raw'; id: string; data: Uint8Array }
	| { type: 'slice'; id: string; buffer: number; offset: number; length: number };

export type FrameParser = (id: string, data: Uint8Array) => Id3Frame;

/** A frame that is decoded on first access. Until then it holds its payload, either owned or as a buffer range. */
export class LazyFrameCell {
	private constructor(private state: FrameCellState) {}

	static decoded(frame: Id3Frame) {
		return new LazyFrameCell({ type: 'decoded', frame });
	}

	static raw(id: string, data: Uint8Array) {
		return new LazyFrameCell({ type: 'raw', id, data });
	}

	static slice(id: string, buffer: number, offset: number, length: number) {
		return new LazyFrameCell({ type: 'slice', id, buffer, offset, length });
	}

	get id() {
		return this.state.type === 'decoded' ? this.state.frame.id : this.state.id;
	}

	get isDecoded() {
		return this.state.type === 'decoded';
	}

	/** The decoded frame, or null when the cell has not been decoded yet. */
	peek() {
		return this.state.type === 'decoded' ? this.state.frame : null;
	}

	/** The undecoded payload, or null when the cell is decoded. */
	getPayload(buffers: BufferRegistry) {
		switch (this.state.type) {
			case 'decoded': return null;
			case 'raw': return this.state.data;
			case 'slice': return buffers.resolve(this.state.buffer, this.state.offset, this.state.length);
		}
	}

	/** Decodes the cell in place. Later calls return the same frame without parsing again. */
	decode(buffers: BufferRegistry, parse: FrameParser = parseFrame) {
		if (this.state.type === 'decoded') {
			return this.state.frame;
		}

		const payload = this.getPayload(buffers);
		const frame = parse(this.id, payload ?? new Uint8Array(0));
		this.state = { type: 'decoded', frame };

		return frame;
	}
}

/** A frame kept opaquely, outside of keyed lookup. @public */
export type UnknownFrame = {
	id: string;
	data: Uint8Array;
};

type FrameBucket = {
	key: HashKey;
	cells: LazyFrameCell[];
};

const validateFrameId = (id: string) => {
	if (typeof id !== 'string' || id.length !== 4 || !/^[A-Z0-9]{4}$/.test(id)) {
		throw new TypeError(`Frame ID must be four uppercase ASCII letters or digits, got "${id}".`);
	}
};

const ENCODING_BEARING_FRAME_IDS = new Set(['IPLS', 'WXXX', 'COMM', 'USLT', 'APIC']);

const hasEncodingByte = (id: string) => id.startsWith('T') || ENCODING_BEARING_FRAME_IDS.has(id);

/**
 * The frames of an ID3v2 tag, grouped by {@link HashKey} in insertion order. Frames read from a file stay undecoded
 * until they are accessed.
 * @public
 */
export class Id3Tags {
	/** Version of the tag the frames were read from. */
	version: Id3Version;
	/** Frames that could not be interpreted (unmapped ID3v2.2 IDs, encrypted frames, failed decompression). */
	unknownFrames: UnknownFrame[] = [];

	/** @internal */
	_entries = new Map<string, FrameBucket>();
	/** @internal */
	_buffers = new BufferRegistry();

	constructor(version: Id3Version = { major: 4, revision: 0 }) {
		this.version = version;
	}

	/** @internal */
	_pushCell(key: HashKey, cell: LazyFrameCell) {
		const mapKey = getHashKeyMapKey(key);
		let bucket = this._entries.get(mapKey);
		if (!bucket) {
			bucket = { key, cells: [] };
			this._entries.set(mapKey, bucket);
		}

		bucket.cells.push(cell);
	}

	/** @internal */
	_addSlice(id: string, buffer: number, offset: number, length: number) {
		const data = this._buffers.resolve(buffer, offset, length);
		this._pushCell(quickHashKey(id, data), LazyFrameCell.slice(id, buffer, offset, length));
	}

	/** @internal */
	_decodeCell(cell: LazyFrameCell) {
		try {
			return cell.decode(this._buffers);
		} catch (error) {
			console.warn(`Could not decode ${cell.id} frame, leaving it undecoded.`, error);
			return null;
		}
	}

	/** Adds a frame to the bucket of its key. */
	add(frame: Id3Frame) {
		validateFrameId(frame.id);
		this._pushCell(getFrameHashKey(frame), LazyFrameCell.decoded(frame));
	}

	/** Adds an undecoded frame. The data is taken over by the container. */
	addRaw(id: string, data: Uint8Array) {
		validateFrameId(id);
		this._pushCell(quickHashKey(id, data), LazyFrameCell.raw(id, data));
	}

	/** Returns all frames stored under the key, decoding them as needed. Frames that fail to decode are skipped. */
	getAll(key: HashKey | string) {
		const bucket = this._entries.get(getHashKeyMapKey(toHashKey(key)));
		if (!bucket) {
			return [];
		}

		const frames: Id3Frame[] = [];
		for (const cell of bucket.cells) {
			const frame = this._decodeCell(cell);
			if (frame) {
				frames.push(frame);
			}
		}

		return frames;
	}

	/** Returns the first frame stored under the key, or null. */
	get(key: HashKey | string) {
		return this.getAll(key)[0] ?? null;
	}

	/** Like {@link Id3Tags.getAll}, but returns only frames that are already decoded and decodes nothing. */
	peekAll(key: HashKey | string) {
		const bucket = this._entries.get(getHashKeyMapKey(toHashKey(key)));
		if (!bucket) {
			return [];
		}

		return bucket.cells
			.map(cell => cell.peek())
			.filter((frame): frame is Id3Frame => frame !== null);
	}

	peek(key: HashKey | string) {
		return this.peekAll(key)[0] ?? null;
	}

	/** All frames that are already decoded, in insertion order. */
	peekValues() {
		const frames: Id3Frame[] = [];
		for (const bucket of this._entries.values()) {
			for (const cell of bucket.cells) {
				const frame = cell.peek();
				if (frame) {
					frames.push(frame);
				}
			}
		}

		return frames;
	}

	/** Replaces the bucket of the key. Every frame must belong to that key. An empty list removes the bucket. */
	setAll(key: HashKey | string, frames: Id3Frame[]) {
		const hashKey = toHashKey(key);
		const mapKey = getHashKeyMapKey(hashKey);

		for (const frame of frames) {
			validateFrameId(frame.id);
			if (getHashKeyMapKey(getFrameHashKey(frame)) !== mapKey) {
				throw new TypeError(
					`Frame with key ${formatHashKey(getFrameHashKey(frame))} cannot be stored under`
					+ ` ${formatHashKey(hashKey)}.`,
				);
			}
		}

		if (frames.length === 0) {
			this._entries.delete(mapKey);
			return;
		}

		this._entries.set(mapKey, { key: hashKey, cells: frames.map(frame => LazyFrameCell.decoded(frame)) });
	}

	/** Removes the bucket of the key. Returns whether it existed. */
	delAll(key: HashKey | string) {
		return this._entries.delete(getHashKeyMapKey(toHashKey(key)));
	}

	has(key: HashKey | string) {
		return this._entries.has(getHashKeyMapKey(toHashKey(key)));
	}

	/** The display forms of all keys, in insertion order. */
	keys() {
		return [...this._entries.values()].map(bucket => formatHashKey(bucket.key));
	}

	/** Number of keys. */
	get size() {
		return this._entries.size;
	}

	/** Decodes every frame and returns them in insertion order. Frames that fail to decode are skipped. */
	values() {
		const frames: Id3Frame[] = [];
		for (const bucket of this._entries.values()) {
			for (const cell of bucket.cells) {
				const frame = this._decodeCell(cell);
				if (frame) {
					frames.push(frame);
				}
			}
		}

		return frames;
	}

	decodeAll() {
		this.values();
	}

	/** One `key=value` line per frame. */
	pprint() {
		const lines: string[] = [];
		for (const bucket of this._entries.values()) {
			const key = formatHashKey(bucket.key);
			for (const cell of bucket.cells) {
				const frame = this._decodeCell(cell);
				if (frame) {
					lines.push(`${key}=${formatFrame(frame)}`);
				}
			}
		}

		return lines.join('\n');
	}

	/**
	 * Serializes all frames, without the tag header, for the given major version. Undecoded frames are written
	 * byte-for-byte, except UTF-8 text frames going into a pre-2.4 tag, which are re-encoded.
	 */
	render(majorVersion: 3 | 4) {
		const byteWriter = new ByteWriter();
		const writer = new Id3Writer(byteWriter);

		for (const bucket of this._entries.values()) {
			for (const cell of bucket.cells) {
				const frame = cell.peek();
				if (frame) {
					writer.writeFrame(frame, majorVersion);
					continue;
				}

				const payload = cell.getPayload(this._buffers);
				if (!payload) {
					continue;
				}

				if (majorVersion < 4 && payload[0] === 3 && hasEncodingByte(cell.id)) {
					const decoded = this._decodeCell(cell);
					if (decoded) {
						writer.writeFrame(decoded, majorVersion);
						continue;
					}
				}

				writer.writeRawFrame(cell.id, payload, majorVersion);
			}
		}

		return byteWriter.finalize();
	}
}
