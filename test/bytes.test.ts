import { describe, test, expect } from 'vitest';
import { Bytes } from '../src/utils/Bytes';

describe('Bytes utility class', () => {
	describe('fromHex', () => {
		test('should convert valid hex string to Uint8Array', () => {
			expect(Bytes.fromHex('deadbeef')).toEqual(new Uint8Array([0xde, 0xad, 0xbe, 0xef]));
		});

		test('should handle hex string with 0x prefix', () => {
			expect(Bytes.fromHex('0xdeadbeef')).toEqual(new Uint8Array([0xde, 0xad, 0xbe, 0xef]));
			expect(Bytes.fromHex('0XDeAdBeEf')).toEqual(new Uint8Array([0xde, 0xad, 0xbe, 0xef]));
		});

		test('should return empty array for empty input or a bare prefix', () => {
			expect(Bytes.fromHex('')).toEqual(new Uint8Array(0));
			expect(Bytes.fromHex('0x')).toEqual(new Uint8Array(0));
		});

		test('should reject odd length and non-hex characters', () => {
			expect(() => Bytes.fromHex('abc')).toThrow('Invalid hex string: odd length.');
			expect(() => Bytes.fromHex('zz')).toThrow('Invalid hex string: contains non-hex characters');
		});
	});

	describe('toHex / toPrefixedHex', () => {
		test('should pad single digit bytes', () => {
			const bytes = new Uint8Array([0x00, 0x0a, 0xff]);
			expect(Bytes.toHex(bytes)).toBe('000aff');
			expect(Bytes.toPrefixedHex(bytes)).toBe('0x000aff');
		});
	});

	describe('concat', () => {
		test('should join arrays in order', () => {
			const out = Bytes.concat(new Uint8Array([1, 2]), new Uint8Array(0), new Uint8Array([3]));
			expect(out).toEqual(new Uint8Array([1, 2, 3]));
		});
	});

	describe('uint32', () => {
		test('should write big-endian', () => {
			expect(Bytes.writeUint32BE(0x01020304)).toEqual(new Uint8Array([1, 2, 3, 4]));
			expect(Bytes.writeUint32BE(0xffffffff)).toEqual(new Uint8Array([0xff, 0xff, 0xff, 0xff]));
		});

		test('should read at an offset of a subarray', () => {
			const buf = new Uint8Array([9, 9, 0, 0, 1, 0]).subarray(1);
			expect(Bytes.readUint32BE(buf, 1)).toBe(256);
		});
	});

	describe('equals / compare', () => {
		test('should compare contents', () => {
			expect(Bytes.equals(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true);
			expect(Bytes.equals(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(false);
			expect(Bytes.equals(new Uint8Array([1]), new Uint8Array([1, 0]))).toBe(false);
		});

		test('should order lexicographically, shorter first on a shared prefix', () => {
			expect(Bytes.compare(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(-1);
			expect(Bytes.compare(new Uint8Array([2]), new Uint8Array([1, 9]))).toBe(1);
			expect(Bytes.compare(new Uint8Array([1]), new Uint8Array([1, 0]))).toBeLessThan(0);
			expect(Bytes.compare(new Uint8Array([4, 4]), new Uint8Array([4, 4]))).toBe(0);
		});
	});

	describe('strings', () => {
		test('should round trip utf-8', () => {
			const bytes = Bytes.fromString('p2_delegated_conditions/v1');
			expect(bytes.length).toBe(26);
			expect(Bytes.toString(bytes)).toBe('p2_delegated_conditions/v1');
		});
	});

	test('wipe zeroes in place', () => {
		const secret = new Uint8Array([5, 6, 7]);
		Bytes.wipe(secret);
		expect(secret).toEqual(new Uint8Array(3));
	});
});
