import { describe, it, expect } from 'vitest';
import { formatVidPid, parseId, parseVidPid, toHex, toIdString, toTable } from '../src/utils';

describe('utils', () => {
	it('formats hex ids', () => {
		expect(toHex(0x1d6b, 4)).toBe('0x1D6B');
		expect(toHex(3)).toBe('0x03');
		expect(toIdString(3)).toBe('0003');
		expect(toIdString(0xa, 2)).toBe('0a');
		expect(formatVidPid(0x1d6b, 0x0003)).toBe('1d6b:0003');
	});

	describe('parseId', () => {
		it('accepts numbers within the width', () => {
			expect(parseId(0, 4)).toBe(0);
			expect(parseId(0xffff, 4)).toBe(0xffff);
			expect(parseId(0x10000, 4)).toBeNull();
			expect(parseId(-1, 4)).toBeNull();
			expect(parseId(2.5, 4)).toBeNull();
			expect(parseId(Number.NaN, 4)).toBeNull();
		});

		it('reads hex strings with or without a prefix', () => {
			expect(parseId('1d6b', 4)).toBe(0x1d6b);
			expect(parseId(' 0x1D6B ', 4)).toBe(0x1d6b);
			expect(parseId('3', 2)).toBe(3);
			expect(parseId('100', 2)).toBeNull();
			expect(parseId('0x', 4)).toBeNull();
			expect(parseId('12g4', 4)).toBeNull();
		});
	});

	it('splits vid:pid pairs', () => {
		expect(parseVidPid('1d6b:0003')).toEqual([0x1d6b, 0x0003]);
		expect(parseVidPid('1d6b')).toBeNull();
		expect(parseVidPid('1d6b:xyz')).toBeNull();
		expect(parseVidPid('1:2:3')).toBeNull();
	});

	it('renders a table padded to the widest cell', () => {
		expect(toTable(['A', 'Bb'], [['x', 'yyy']])).toBe(
			'| A | Bb  |\n' +
			'|---|-----|\n' +
			'| x | yyy |'
		);
	});
});
