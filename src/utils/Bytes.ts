export class Bytes {
	static fromHex(hex: string): Uint8Array {
		hex = hex.trim();
		if (hex.startsWith('0x') || hex.startsWith('0X')) {
			hex = hex.slice(2);
		}
		if (hex.length === 0) {
			return new Uint8Array(0);
		}
		if (hex.length & 1) {
			throw new Error('Invalid hex string: odd length.');
		}
		if (!/^[0-9a-fA-F]*$/.test(hex)) {
			throw new Error('Invalid hex string: contains non-hex characters');
		}
		const out = new Uint8Array(hex.length / 2);
		for (let i = 0; i < out.length; i++) {
			out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
		}
		return out;
	}

	static toHex(bytes: Uint8Array): string {
		return Array.from(bytes, (byte) => byte.toString(16).padStart(2, '0')).join('');
	}

	/**
	 * Hex with a `0x` prefix, the form used by the exchange documents.
	 */
	static toPrefixedHex(bytes: Uint8Array): string {
		return `0x${Bytes.toHex(bytes)}`;
	}

	static fromString(str: string): Uint8Array {
		return new TextEncoder().encode(str);
	}

	static toString(bytes: Uint8Array): string {
		return new TextDecoder('utf-8').decode(bytes);
	}

	static concat(...arrays: Uint8Array[]): Uint8Array {
		const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
		const result = new Uint8Array(totalLength);
		let offset = 0;
		for (const arr of arrays) {
			result.set(arr, offset);
			offset += arr.length;
		}
		return result;
	}

	static writeUint32BE(value: number): Uint8Array {
		const buffer = new ArrayBuffer(4);
		new DataView(buffer).setUint32(0, value, false);
		return new Uint8Array(buffer);
	}

	static readUint32BE(bytes: Uint8Array, offset = 0): number {
		return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(offset, false);
	}

	static equals(a: Uint8Array, b: Uint8Array): boolean {
		if (a.length !== b.length) return false;
		let result = 0;
		for (let i = 0; i < a.length; i++) {
			result |= a[i] ^ b[i];
		}
		return result === 0;
	}

	static compare(a: Uint8Array, b: Uint8Array): number {
		const minLength = Math.min(a.length, b.length);
		for (let i = 0; i < minLength; i++) {
			if (a[i] < b[i]) return -1;
			if (a[i] > b[i]) return 1;
		}
		return a.length - b.length;
	}

	/**
	 * Overwrite a buffer with zeros in place.
	 */
	static wipe(bytes: Uint8Array): void {
		bytes.fill(0);
	}
}
