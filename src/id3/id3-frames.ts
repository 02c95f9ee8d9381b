/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { isIso88591Compatible } from '../misc';
import { Id3Error } from './id3-error';
import {
	decodeText,
	decodeTextValues,
	Id3V2TextEncoding,
	parsePictureType,
	parseTextEncoding,
	PictureType,
	readEncodedText,
	readLatin1Text,
} from './id3-misc';
import V22_FRAME_IDS from './id3v22-frame-ids.json';

/** Plain text frame such as TIT2, TPE1 or TRCK. @public */
export type TextFrame = {
	type: 'text';
	id: string;
	encoding: Id3V2TextEncoding;
	text: string[];
};

/** TXXX. @public */
export type UserTextFrame = {
	type: 'userText';
	id: string;
	encoding: Id3V2TextEncoding;
	description: string;
	text: string[];
};

/** URL link frame such as WOAR. Always Latin-1. @public */
export type UrlFrame = {
	type: 'url';
	id: string;
	url: string;
};

/** WXXX. @public */
export type UserUrlFrame = {
	type: 'userUrl';
	id: string;
	encoding: Id3V2TextEncoding;
	description: string;
	url: string;
};

/** COMM. @public */
export type CommentFrame = {
	type: 'comment';
	id: string;
	encoding: Id3V2TextEncoding;
	/** ISO-639-2 code, three characters. */
	language: string;
	description: string;
	text: string;
};

/** USLT. @public */
export type LyricsFrame = {
	type: 'lyrics';
	id: string;
	encoding: Id3V2TextEncoding;
	language: string;
	description: string;
	text: string;
};

/** APIC, and PIC from ID3v2.2 tags. @public */
export type PictureFrame = {
	type: 'picture';
	id: string;
	encoding: Id3V2TextEncoding;
	mimeType: string;
	pictureType: PictureType;
	description: string;
	data: Uint8Array;
};

/** POPM. @public */
export type PopularimeterFrame = {
	type: 'popularimeter';
	id: string;
	email: string;
	/** 0-255. */
	rating: number;
	/** Play counter, 0 when the frame has none. */
	count: bigint;
};

/** Any frame this engine does not interpret. The payload is kept verbatim. @public */
export type BinaryFrame = {
	type: 'binary';
	id: string;
	data: Uint8Array;
};

/** TIPL, TMCL and IPLS: a list of (role, name) pairs. @public */
export type PairedTextFrame = {
	type: 'pairedText';
	id: string;
	encoding: Id3V2TextEncoding;
	people: [string, string][];
};

/** @public */
export type Id3Frame =
	| TextFrame
	| UserTextFrame
	| UrlFrame
	| UserUrlFrame
	| CommentFrame
	| LyricsFrame
	| PictureFrame
	| PopularimeterFrame
	| BinaryFrame
	| PairedTextFrame;

const PAIRED_TEXT_FRAME_IDS = new Set(['TIPL', 'TMCL', 'IPLS']);

export const parseTextFrame = (id: string, data: Uint8Array): TextFrame => {
	if (data.length === 0) {
		return { type: 'text', id, encoding: Id3V2TextEncoding.ISO_8859_1, text: [] };
	}

	const encoding = parseTextEncoding(data[0]!);
	return { type: 'text', id, encoding, text: decodeTextValues(data.subarray(1), encoding) };
};

export const parseUserTextFrame = (id: string, data: Uint8Array): UserTextFrame => {
	if (data.length === 0) {
		throw new Id3Error('malformed', `Empty ${id} frame.`);
	}

	const encoding = parseTextEncoding(data[0]!);
	const rest = data.subarray(1);
	const { text: description, consumed } = readEncodedText(rest, encoding);

	return {
		type: 'userText',
		id,
		encoding,
		description,
		text: decodeTextValues(rest.subarray(consumed), encoding),
	};
};

export const parseUrlFrame = (id: string, data: Uint8Array): UrlFrame => {
	return { type: 'url', id, url: readLatin1Text(data).text };
};

export const parseUserUrlFrame = (id: string, data: Uint8Array): UserUrlFrame => {
	if (data.length === 0) {
		throw new Id3Error('malformed', `Empty ${id} frame.`);
	}

	const encoding = parseTextEncoding(data[0]!);
	const rest = data.subarray(1);
	const { text: description, consumed } = readEncodedText(rest, encoding);

	return {
		type: 'userUrl',
		id,
		encoding,
		description,
		url: readLatin1Text(rest.subarray(consumed)).text,
	};
};

const parseLanguageTextFrame = (id: string, data: Uint8Array) => {
	if (data.length < 4) {
		throw new Id3Error('malformed', `${id} frame too short.`);
	}

	const encoding = parseTextEncoding(data[0]!);
	const language = decodeText(data.subarray(1, 4), Id3V2TextEncoding.ISO_8859_1);
	const rest = data.subarray(4);
	const { text: description, consumed } = readEncodedText(rest, encoding);
	const text = decodeText(rest.subarray(consumed), encoding).replace(/\0+$/, '');

	return { id, encoding, language, description, text };
};

export const parseCommentFrame = (id: string, data: Uint8Array): CommentFrame => {
	return { type: 'comment', ...parseLanguageTextFrame(id, data) };
};

export const parseLyricsFrame = (id: string, data: Uint8Array): LyricsFrame => {
	return { type: 'lyrics', ...parseLanguageTextFrame(id, data) };
};

export const parsePictureFrame = (id: string, data: Uint8Array): PictureFrame => {
	if (data.length === 0) {
		throw new Id3Error('malformed', `Empty ${id} frame.`);
	}

	const encoding = parseTextEncoding(data[0]!);
	let rest = data.subarray(1);

	const mime = readLatin1Text(rest);
	rest = rest.subarray(mime.consumed);
	if (rest.length === 0) {
		throw new Id3Error('malformed', `${id} frame too short.`);
	}

	const pictureType = parsePictureType(rest[0]!);
	rest = rest.subarray(1);
	const { text: description, consumed } = readEncodedText(rest, encoding);

	return {
		type: 'picture',
		id,
		encoding,
		mimeType: mime.text,
		pictureType,
		description,
		data: rest.slice(consumed),
	};
};

export const parsePopularimeterFrame = (id: string, data: Uint8Array): PopularimeterFrame => {
	const { text: email, consumed } = readLatin1Text(data);
	const rest = data.subarray(consumed);

	let count = 0n;
	for (let i = 1; i < rest.length; i++) {
		count = (count << 8n) | BigInt(rest[i]!);
	}

	return { type: 'popularimeter', id, email, rating: rest[0] ?? 0, count };
};

export const parsePairedTextFrame = (id: string, data: Uint8Array): PairedTextFrame => {
	if (data.length === 0) {
		return { type: 'pairedText', id, encoding: Id3V2TextEncoding.ISO_8859_1, people: [] };
	}

	const encoding = parseTextEncoding(data[0]!);
	const values = decodeTextValues(data.subarray(1), encoding);
	if (values.length % 2 === 1) {
		// The name of the last pair was empty and got dropped as a trailing empty value
		values.push('');
	}

	const people: [string, string][] = [];
	for (let i = 0; i + 1 < values.length; i += 2) {
		people.push([values[i]!, values[i + 1]!]);
	}

	return { type: 'pairedText', id, encoding, people };
};

/**
 * Parses the payload of an ID3v2.3/2.4 frame (the bytes after the frame header, with any frame-level transforms
 * already undone). Frame IDs without a dedicated layout become {@link BinaryFrame}s.
 */
export const parseFrame = (id: string, data: Uint8Array): Id3Frame => {
	if (PAIRED_TEXT_FRAME_IDS.has(id)) {
		return parsePairedTextFrame(id, data);
	}
	if (id === 'TXXX') {
		return parseUserTextFrame(id, data);
	}
	if (id.startsWith('T')) {
		return parseTextFrame(id, data);
	}
	if (id === 'WXXX') {
		return parseUserUrlFrame(id, data);
	}
	if (id.startsWith('W')) {
		return parseUrlFrame(id, data);
	}

	switch (id) {
		case 'COMM': return parseCommentFrame(id, data);
		case 'USLT': return parseLyricsFrame(id, data);
		case 'APIC': return parsePictureFrame(id, data);
		case 'POPM': return parsePopularimeterFrame(id, data);
		default: return { type: 'binary', id, data: data.slice() };
	}
};

const V22_FRAME_ID_MAP: ReadonlyMap<string, string> = new Map(Object.entries(V22_FRAME_IDS));

/** Maps an ID3v2.2 three-character frame ID to its ID3v2.3/2.4 equivalent, or null if there is none. */
export const convertV22FrameId = (id: string) => {
	return V22_FRAME_ID_MAP.get(id) ?? null;
};

export const getV22FrameIdTable = () => V22_FRAME_ID_MAP;

/** Parses an ID3v2.2 PIC frame, which names a three-character image format instead of a MIME type. */
export const parseV22PictureFrame = (data: Uint8Array): PictureFrame => {
	if (data.length < 5) {
		throw new Id3Error('malformed', 'PIC frame too short.');
	}

	const encoding = parseTextEncoding(data[0]!);
	const imageFormat = decodeText(data.subarray(1, 4), Id3V2TextEncoding.ISO_8859_1);
	let mimeType: string;
	switch (imageFormat.toUpperCase()) {
		case 'JPG': mimeType = 'image/jpeg'; break;
		case 'PNG': mimeType = 'image/png'; break;
		default: mimeType = `image/${imageFormat.toLowerCase()}`;
	}

	const pictureType = parsePictureType(data[4]!);
	const rest = data.subarray(5);
	const { text: description, consumed } = readEncodedText(rest, encoding);

	return {
		type: 'picture',
		id: 'APIC',
		encoding,
		mimeType,
		pictureType,
		description,
		data: rest.slice(consumed),
	};
};

/**
 * Creates a text frame, using ISO-8859-1 when every value can be represented in it and UTF-8 otherwise.
 * @public
 */
export const createTextFrame = (id: string, text: string | string[]): TextFrame => {
	const values = typeof text === 'string' ? [text] : text;
	const encoding = values.every(isIso88591Compatible)
		? Id3V2TextEncoding.ISO_8859_1
		: Id3V2TextEncoding.UTF_8;

	return { type: 'text', id, encoding, text: values };
};

/**
 * One-line human-readable rendering of a frame's value.
 * @public
 */
export const formatFrame = (frame: Id3Frame): string => {
	switch (frame.type) {
		case 'text': return frame.text.join('/');
		case 'userText': return `${frame.description}=${frame.text.join('/')}`;
		case 'url': return frame.url;
		case 'userUrl': return `${frame.description}=${frame.url}`;
		case 'comment':
		case 'lyrics': return frame.text;
		case 'picture': return `${frame.description} (${frame.mimeType}, ${frame.data.byteLength} bytes)`;
		case 'popularimeter': return `${frame.email}=${frame.rating}/${frame.count}`;
		case 'binary': return `[${frame.data.byteLength} bytes]`;
		case 'pairedText': return frame.people.map(([role, name]) => `${role}=${name}`).join('/');
	}
};

/**
 * The text values a frame carries. Frames without text yield their {@link formatFrame} rendering.
 * @public
 */
export const getFrameTextValues = (frame: Id3Frame): string[] => {
	switch (frame.type) {
		case 'text':
		case 'userText': return [...frame.text];
		case 'comment':
		case 'lyrics': return [frame.text];
		default: return [formatFrame(frame)];
	}
};
