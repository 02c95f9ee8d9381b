import { afterEach, expect, test, vi } from 'vitest';
import { createTextFrame, Id3Frame, parseFrame } from '../../src/id3/id3-frames.js';
import { Id3V2TextEncoding } from '../../src/id3/id3-misc.js';
import { BufferRegistry, Id3Tags, LazyFrameCell } from '../../src/id3/id3-tags.js';
import { bytes } from './id3-test-utils.js';

afterEach(() => {
	vi.restoreAllMocks();
});

const comment = (description: string, text: string): Id3Frame => ({
	type: 'comment',
	id: 'COMM',
	encoding: Id3V2TextEncoding.ISO_8859_1,
	language: 'eng',
	description,
	text,
});

test('Decoding a cell happens once', () => {
	const parse = vi.fn(parseFrame);
	const cell = LazyFrameCell.raw('TIT2', bytes(0, 'Hello'));
	const buffers = new BufferRegistry();

	expect(cell.isDecoded).toBe(false);
	expect(cell.peek()).toBe(null);

	const first = cell.decode(buffers, parse);
	const second = cell.decode(buffers, parse);

	expect(second).toBe(first);
	expect(first).toEqual(createTextFrame('TIT2', 'Hello'));
	expect(parse).toHaveBeenCalledTimes(1);
	expect(cell.isDecoded).toBe(true);
	expect(cell.getPayload(buffers)).toBe(null);
});

test('Slice cells read from the registered buffer', () => {
	const buffers = new BufferRegistry();
	const handle = buffers.register(bytes('junk', 0, 'Hello', 'more'));
	const cell = LazyFrameCell.slice('TPE1', handle, 4, 6);

	expect(cell.id).toBe('TPE1');
	expect([...(cell.getPayload(buffers) ?? [])]).toEqual([...bytes(0, 'Hello')]);
	expect(cell.decode(buffers)).toEqual(createTextFrame('TPE1', 'Hello'));
});

test('Buffer registry rejects unknown handles and ranges', () => {
	const buffers = new BufferRegistry();
	const handle = buffers.register(new Uint8Array(4));

	expect(buffers.resolve(handle, 1, 3).length).toBe(3);
	expect(() => buffers.resolve(handle, 2, 3)).toThrow(RangeError);
	expect(() => buffers.resolve(handle + 1, 0, 0)).toThrow(RangeError);
});

test('Adding and looking up frames', () => {
	const tags = new Id3Tags();
	tags.add(createTextFrame('TIT2', 'Title'));
	tags.add(createTextFrame('TPE1', 'First'));
	tags.add(createTextFrame('TPE1', 'Second'));

	expect(tags.keys()).toEqual(['TIT2', 'TPE1']);
	expect(tags.size).toBe(2);
	expect(tags.getAll('TPE1').map(x => x.type === 'text' && x.text[0])).toEqual(['First', 'Second']);
	expect(tags.get('TIT2')).toEqual(createTextFrame('TIT2', 'Title'));
	expect(tags.get('TALB')).toBe(null);
	expect(tags.getAll('TALB')).toEqual([]);
	expect(tags.has({ type: 'simple', id: 'TIT2' })).toBe(true);
});

test('Frames that may repeat get their own keys', () => {
	const tags = new Id3Tags();
	tags.add(comment('d1', 'one'));
	tags.add(comment('d2', 'two'));

	expect(tags.keys()).toEqual(['COMM:d1:eng', 'COMM:d2:eng']);
	expect(tags.get('COMM:d2:eng')).toEqual(comment('d2', 'two'));
	expect(tags.getAll('COMM')).toEqual([]);
});

test('Frame IDs are validated', () => {
	const tags = new Id3Tags();

	expect(() => tags.add(createTextFrame('tit2', 'x'))).toThrow(TypeError);
	expect(() => tags.add(createTextFrame('TT2', 'x'))).toThrow(TypeError);
	expect(() => tags.addRaw('TIT', bytes(0, 'x'))).toThrow(TypeError);
});

test('Raw frames are decoded on access only', () => {
	const tags = new Id3Tags();
	tags.addRaw('TXXX', bytes(0, 'mood', 0, 'calm'));

	expect(tags.keys()).toEqual(['TXXX:mood']);
	expect(tags.peek('TXXX:mood')).toBe(null);
	expect(tags.peekValues()).toEqual([]);

	const frame = tags.get('TXXX:mood');
	expect(frame?.type === 'userText' && frame.text).toEqual(['calm']);
	expect(tags.peek('TXXX:mood')).toBe(frame);
	expect(tags.peekValues()).toEqual([frame]);
});

test('Peeking leaves undecoded frames alone until everything is decoded', () => {
	const tags = new Id3Tags();
	tags.addRaw('TPE1', bytes(0, 'A'));
	tags.add(createTextFrame('TPE1', 'B'));

	expect(tags.peekAll('TPE1')).toEqual([createTextFrame('TPE1', 'B')]);
	expect(tags.peekAll('TALB')).toEqual([]);

	tags.decodeAll();

	expect(tags.peekAll('TPE1')).toEqual([createTextFrame('TPE1', 'A'), createTextFrame('TPE1', 'B')]);
});

test('Frames that fail to decode are skipped and kept', () => {
	const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
	const tags = new Id3Tags();
	tags.addRaw('TIT2', bytes(9, 'A'));

	expect(tags.get('TIT2')).toBe(null);
	expect(tags.values()).toEqual([]);
	expect(tags.has('TIT2')).toBe(true);
	expect(warn).toHaveBeenCalled();

	expect([...tags.render(4)]).toEqual([...bytes('TIT2', [0, 0, 0, 2], [0, 0], 9, 'A')]);
});

test('Replacing and removing buckets', () => {
	const tags = new Id3Tags();
	tags.add(createTextFrame('TPE1', 'Old'));

	tags.setAll('TPE1', [createTextFrame('TPE1', 'A'), createTextFrame('TPE1', 'B')]);
	expect(tags.getAll('TPE1').length).toBe(2);

	expect(() => tags.setAll('TPE1', [createTextFrame('TPE2', 'C')])).toThrow(TypeError);
	expect(() => tags.setAll('COMM:d1:eng', [comment('d2', 'x')])).toThrow(TypeError);

	tags.setAll('COMM:d1:eng', [comment('d1', 'x')]);
	expect(tags.keys()).toEqual(['TPE1', 'COMM:d1:eng']);

	tags.setAll('TPE1', []);
	expect(tags.has('TPE1')).toBe(false);

	expect(tags.delAll('COMM:d1:eng')).toBe(true);
	expect(tags.delAll('COMM:d1:eng')).toBe(false);
	expect(tags.size).toBe(0);
});

test('Rendering decoded frames', () => {
	const tags = new Id3Tags();
	tags.add(createTextFrame('TIT2', 'Hi'));

	expect([...tags.render(4)]).toEqual([...bytes('TIT2', [0, 0, 0, 3], [0, 0], 0, 'Hi')]);
	expect([...tags.render(3)]).toEqual([...bytes('TIT2', [0, 0, 0, 3], [0, 0], 0, 'Hi')]);
});

test('Frame sizes are syncsafe in ID3v2.4 and plain in ID3v2.3', () => {
	const tags = new Id3Tags();
	tags.add({ type: 'binary', id: 'PRIV', data: new Uint8Array(200) });

	expect([...tags.render(4).subarray(4, 8)]).toEqual([0, 0, 1, 0x48]);
	expect([...tags.render(3).subarray(4, 8)]).toEqual([0, 0, 0, 200]);
});

test('Undecoded UTF-8 frames are re-encoded for ID3v2.3', () => {
	const tags = new Id3Tags();
	tags.addRaw('TIT2', bytes(3, 'Hi'));
	tags.addRaw('TPE1', bytes(0, 'Yo'));

	expect([...tags.render(3)]).toEqual([
		...bytes('TIT2', [0, 0, 0, 7], [0, 0], 1, [0xff, 0xfe, 0x48, 0x00, 0x69, 0x00]),
		...bytes('TPE1', [0, 0, 0, 3], [0, 0], 0, 'Yo'),
	]);
	expect(tags.peek('TPE1')).toBe(null);
});

test('Undecoded UTF-8 IPLS frames are re-encoded for ID3v2.3', () => {
	const tags = new Id3Tags();
	tags.addRaw('IPLS', bytes(3, 'gtr', 0, 'Bo'));

	expect([...tags.render(3)]).toEqual([
		...bytes(
			'IPLS',
			[0, 0, 0, 15],
			[0, 0],
			1,
			[0xff, 0xfe, 0x67, 0x00, 0x74, 0x00, 0x72, 0x00, 0x00, 0x00, 0x42, 0x00, 0x6f, 0x00],
		),
	]);
});

test('Undecoded frames are written back unchanged for ID3v2.4', () => {
	const tags = new Id3Tags();
	tags.addRaw('TIT2', bytes(3, 'Hi'));

	expect([...tags.render(4)]).toEqual([...bytes('TIT2', [0, 0, 0, 3], [0, 0], 3, 'Hi')]);
	expect(tags.peek('TIT2')).toBe(null);
});

test('Pretty printing', () => {
	const tags = new Id3Tags();
	tags.add(createTextFrame('TPE1', ['A', 'B']));
	tags.addRaw('COMM', bytes(0, 'eng', 'd', 0, 'note'));

	expect(tags.pprint()).toBe('TPE1=A/B\nCOMM:d:eng=note');
});
