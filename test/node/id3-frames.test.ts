import { expect, test } from 'vitest';
import {
	convertV22FrameId,
	createTextFrame,
	formatFrame,
	getFrameTextValues,
	getV22FrameIdTable,
	Id3Frame,
	parseFrame,
	parseV22PictureFrame,
	PopularimeterFrame,
} from '../../src/id3/id3-frames.js';
import { Id3Error } from '../../src/id3/id3-error.js';
import { Id3V2TextEncoding, PictureType } from '../../src/id3/id3-misc.js';
import { serializeFrameData } from '../../src/id3/id3-writer.js';
import { bytes } from './id3-test-utils.js';

test('Text frames', () => {
	expect(parseFrame('TIT2', bytes(3, 'Test Title'))).toEqual({
		type: 'text',
		id: 'TIT2',
		encoding: Id3V2TextEncoding.UTF_8,
		text: ['Test Title'],
	});

	expect(parseFrame('TPE1', bytes(0, 'A', 0, 'B', 0))).toEqual({
		type: 'text',
		id: 'TPE1',
		encoding: Id3V2TextEncoding.ISO_8859_1,
		text: ['A', 'B'],
	});

	expect(parseFrame('TIT3', new Uint8Array(0))).toEqual({
		type: 'text',
		id: 'TIT3',
		encoding: Id3V2TextEncoding.ISO_8859_1,
		text: [],
	});
});

test('Invalid encoding bytes are rejected', () => {
	expect(() => parseFrame('TIT2', bytes(7, 'Test'))).toThrow(Id3Error);
});

test('User-defined text and URL frames', () => {
	expect(parseFrame('TXXX', bytes(0, 'mood', 0, 'calm'))).toEqual({
		type: 'userText',
		id: 'TXXX',
		encoding: Id3V2TextEncoding.ISO_8859_1,
		description: 'mood',
		text: ['calm'],
	});

	expect(parseFrame('WXXX', bytes(0, 'home', 0, 'https://example.com'))).toEqual({
		type: 'userUrl',
		id: 'WXXX',
		encoding: Id3V2TextEncoding.ISO_8859_1,
		description: 'home',
		url: 'https://example.com',
	});

	expect(parseFrame('WOAR', bytes('https://example.com/artist'))).toEqual({
		type: 'url',
		id: 'WOAR',
		url: 'https://example.com/artist',
	});
});

test('Comment and lyrics frames', () => {
	expect(parseFrame('COMM', bytes(0, 'eng', 'd1', 0, 'hello'))).toEqual({
		type: 'comment',
		id: 'COMM',
		encoding: Id3V2TextEncoding.ISO_8859_1,
		language: 'eng',
		description: 'd1',
		text: 'hello',
	});

	const lyrics = bytes(1, 'eng', [0xff, 0xfe, 0x00, 0x00], [0xff, 0xfe, 0x6c, 0x00, 0x61, 0x00]);
	expect(parseFrame('USLT', lyrics)).toEqual({
		type: 'lyrics',
		id: 'USLT',
		encoding: Id3V2TextEncoding.UTF_16_WITH_BOM,
		language: 'eng',
		description: '',
		text: 'la',
	});

	expect(() => parseFrame('COMM', bytes(0, 'en'))).toThrow(Id3Error);
});

test('Picture frames', () => {
	const picture = parseFrame('APIC', bytes(0, 'image/png', 0, 3, 'cover', 0, [1, 2, 3]));

	expect(picture).toEqual({
		type: 'picture',
		id: 'APIC',
		encoding: Id3V2TextEncoding.ISO_8859_1,
		mimeType: 'image/png',
		pictureType: PictureType.CoverFront,
		description: 'cover',
		data: new Uint8Array([1, 2, 3]),
	});

	expect(() => parseFrame('APIC', bytes(0, 'image/png', 0))).toThrow(Id3Error);
});

test('Popularimeter frames', () => {
	expect(parseFrame('POPM', bytes('someone@example.com', 0, 196, [0x01, 0x00]))).toEqual({
		type: 'popularimeter',
		id: 'POPM',
		email: 'someone@example.com',
		rating: 196,
		count: 256n,
	});

	expect(parseFrame('POPM', bytes('someone@example.com', 0, 5))).toEqual({
		type: 'popularimeter',
		id: 'POPM',
		email: 'someone@example.com',
		rating: 5,
		count: 0n,
	});
});

test('Play counters wider than 53 bits are kept exactly', () => {
	const payload = bytes('a@b', 0, 10, [0x00, 0x20, 0x00, 0x00, 0x00, 0x00, 0x00, 0x01]);
	const frame = parseFrame('POPM', payload);

	expect(frame.type === 'popularimeter' && frame.count).toBe(2n ** 53n + 1n);
	expect([...serializeFrameData(frame, 4)]).toEqual([...bytes('a@b', 0, 10, [0x20, 0, 0, 0, 0, 0, 0x01])]);
	expect(parseFrame('POPM', serializeFrameData(frame, 4))).toEqual(frame);
});

test('Paired text frames', () => {
	expect(parseFrame('TIPL', bytes(0, 'producer', 0, 'Alice', 0, 'mixer', 0))).toEqual({
		type: 'pairedText',
		id: 'TIPL',
		encoding: Id3V2TextEncoding.ISO_8859_1,
		people: [['producer', 'Alice'], ['mixer', '']],
	});

	expect(parseFrame('IPLS', bytes(0, 'guitar', 0, 'Bob'))).toEqual({
		type: 'pairedText',
		id: 'IPLS',
		encoding: Id3V2TextEncoding.ISO_8859_1,
		people: [['guitar', 'Bob']],
	});
});

test('Unknown frames keep a copy of their payload', () => {
	const payload = bytes('owner', 0, [9, 8, 7]);
	const parsed = parseFrame('PRIV', payload);
	payload[0] = 0;

	expect(parsed).toEqual({ type: 'binary', id: 'PRIV', data: bytes('owner', 0, [9, 8, 7]) });
});

test('ID3v2.2 frame IDs', () => {
	expect(convertV22FrameId('TT2')).toBe('TIT2');
	expect(convertV22FrameId('TP1')).toBe('TPE1');
	expect(convertV22FrameId('COM')).toBe('COMM');
	expect(convertV22FrameId('ZZZ')).toBe(null);

	const table = getV22FrameIdTable();
	expect(table.size).toBe(60);

	const targets = [...table.values()];
	expect(new Set(targets).size).toBe(targets.length);
	for (const [source, target] of table) {
		expect(source).toMatch(/^[A-Z0-9]{3}$/);
		expect(target).toMatch(/^[A-Z0-9]{4}$/);
	}
});

test('ID3v2.2 picture frames', () => {
	expect(parseV22PictureFrame(bytes(0, 'JPG', 3, 'front', 0, [9, 9]))).toEqual({
		type: 'picture',
		id: 'APIC',
		encoding: Id3V2TextEncoding.ISO_8859_1,
		mimeType: 'image/jpeg',
		pictureType: PictureType.CoverFront,
		description: 'front',
		data: new Uint8Array([9, 9]),
	});

	const gif = parseV22PictureFrame(bytes(0, 'GIF', 0, 0, [1]));
	expect(gif.mimeType).toBe('image/gif');

	expect(() => parseV22PictureFrame(bytes(0, 'PN'))).toThrow(Id3Error);
});

test('UTF-8 text becomes UTF-16 in ID3v2.3', () => {
	const frame = createTextFrame('TIT2', '日本');
	expect(frame.encoding).toBe(Id3V2TextEncoding.UTF_8);

	expect([...serializeFrameData(frame, 4)]).toEqual([3, 0xe6, 0x97, 0xa5, 0xe6, 0x9c, 0xac]);
	expect([...serializeFrameData(frame, 3)]).toEqual([1, 0xff, 0xfe, 0xe5, 0x65, 0x2c, 0x67]);
});

test('Latin-1 compatible text stays Latin-1', () => {
	const frame = createTextFrame('TPE1', ['Héllo', 'B']);

	expect(frame).toEqual({
		type: 'text',
		id: 'TPE1',
		encoding: Id3V2TextEncoding.ISO_8859_1,
		text: ['Héllo', 'B'],
	});
	expect([...serializeFrameData(frame, 3)]).toEqual([0, 0x48, 0xe9, 0x6c, 0x6c, 0x6f, 0x00, 0x42]);
});

test('Serializing comments', () => {
	const comment: Id3Frame = {
		type: 'comment',
		id: 'COMM',
		encoding: Id3V2TextEncoding.ISO_8859_1,
		language: 'english',
		description: 'd',
		text: 'hi',
	};

	expect([...serializeFrameData(comment, 4)]).toEqual([...bytes(0, 'XXX', 'd', 0, 'hi')]);
});

test('Serializing popularimeters', () => {
	const popularimeter: PopularimeterFrame = {
		type: 'popularimeter',
		id: 'POPM',
		email: 'a@b',
		rating: 128,
		count: 256n,
	};

	expect([...serializeFrameData(popularimeter, 4)]).toEqual([...bytes('a@b', 0, 128, 1, 0)]);
	expect([...serializeFrameData({ ...popularimeter, count: 0n }, 4)]).toEqual([...bytes('a@b', 0, 128)]);
});

test('Serialized frames parse back to the same frame', () => {
	const frames: Id3Frame[] = [
		{
			type: 'picture',
			id: 'APIC',
			encoding: Id3V2TextEncoding.UTF_16_WITH_BOM,
			mimeType: 'image/png',
			pictureType: PictureType.CoverBack,
			description: 'Rückseite',
			data: new Uint8Array([0x89, 0x50, 0x4e, 0x47]),
		},
		{
			type: 'userText',
			id: 'TXXX',
			encoding: Id3V2TextEncoding.UTF_8,
			description: 'catalog',
			text: ['A-1', 'B-2'],
		},
		{
			type: 'pairedText',
			id: 'TMCL',
			encoding: Id3V2TextEncoding.ISO_8859_1,
			people: [['bass', 'Carol'], ['drums', 'Dan']],
		},
	];

	for (const frame of frames) {
		expect(parseFrame(frame.id, serializeFrameData(frame, 4))).toEqual(frame);
	}
});

test('Formatting frames', () => {
	expect(formatFrame(createTextFrame('TPE1', ['A', 'B']))).toBe('A/B');
	expect(formatFrame(parseFrame('TXXX', bytes(0, 'mood', 0, 'calm')))).toBe('mood=calm');
	expect(formatFrame(parseFrame('APIC', bytes(0, 'image/png', 0, 3, 'cover', 0, [1, 2, 3]))))
		.toBe('cover (image/png, 3 bytes)');
	expect(formatFrame(parseFrame('POPM', bytes('a@b', 0, 196, [0x01, 0x00])))).toBe('a@b=196/256');
	expect(formatFrame(parseFrame('PRIV', bytes(1, 2, 3)))).toBe('[3 bytes]');
	expect(formatFrame(parseFrame('TIPL', bytes(0, 'producer', 0, 'Alice')))).toBe('producer=Alice');
});

test('Text values of frames', () => {
	expect(getFrameTextValues(createTextFrame('TPE1', ['A', 'B']))).toEqual(['A', 'B']);
	expect(getFrameTextValues(parseFrame('COMM', bytes(0, 'eng', 0, 'note')))).toEqual(['note']);
	expect(getFrameTextValues(parseFrame('WOAR', bytes('https://example.com')))).toEqual(['https://example.com']);
});
