/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

export {
	loadId3,
	loadId3FromBytes,
	saveId3,
	spliceId3,
	deleteId3,
	stripId3,
} from './id3/id3-file';
export type {
	Id3SaveOptions,
	Id3LoadResult,
} from './id3/id3-file';
export {
	Id3Tags,
	LazyFrameCell,
	BufferRegistry,
} from './id3/id3-tags';
export type {
	UnknownFrame,
	FrameParser,
} from './id3/id3-tags';
export {
	parseFrame,
	createTextFrame,
	formatFrame,
	getFrameTextValues,
	convertV22FrameId,
} from './id3/id3-frames';
export type {
	Id3Frame,
	TextFrame,
	UserTextFrame,
	UrlFrame,
	UserUrlFrame,
	CommentFrame,
	LyricsFrame,
	PictureFrame,
	PopularimeterFrame,
	BinaryFrame,
	PairedTextFrame,
} from './id3/id3-frames';
export {
	getFrameHashKey,
	formatHashKey,
	parseHashKey,
} from './id3/id3-hash-key';
export type {
	HashKey,
} from './id3/id3-hash-key';
export {
	parseId3Header,
	getId3TagFullSize,
} from './id3/id3-header';
export type {
	Id3Header,
	Id3HeaderFlags,
	Id3Version,
	Id3MajorVersion,
} from './id3/id3-header';
export {
	Id3V2TextEncoding,
	PictureType,
	decodeBitPaddedInt,
	encodeBitPaddedInt,
	decodeUnsynchronisation,
	encodeUnsynchronisation,
} from './id3/id3-misc';
export {
	Id3Error,
	isId3Error,
} from './id3/id3-error';
export type {
	Id3ErrorKind,
} from './id3/id3-error';
export {
	GENRES,
	parseGenre,
} from './id3/id3-genres';
export {
	findId3v1,
	parseId3v1,
	makeId3v1,
} from './id3/id3v1';
export {
	serializeFrameData,
	renderId3Tag,
} from './id3/id3-writer';
