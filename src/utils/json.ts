import { BundleFormatError } from '../model/Errors';
import { Bytes } from './Bytes';

export type JsonObject = Record<string, unknown>;

export function isObj(v: unknown): v is JsonObject {
	return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function parseJsonObject(json: string, what: string): JsonObject {
	let data: unknown;
	try {
		data = JSON.parse(json);
	} catch (e) {
		throw new BundleFormatError(
			`Failed to parse ${what} JSON: ${e instanceof Error ? e.message : String(e)}`,
		);
	}
	return expectObject(data, what);
}

export function expectObject(value: unknown, what: string): JsonObject {
	if (!isObj(value)) throw new BundleFormatError(`${what} must be a JSON object`);
	return value;
}

export function expectArray(value: unknown, what: string): unknown[] {
	if (!Array.isArray(value)) throw new BundleFormatError(`${what} must be an array`);
	return value;
}

/**
 * `0x`-prefixed hex, optionally of a fixed byte length.
 */
export function expectHex(value: unknown, what: string, length?: number): Uint8Array {
	if (typeof value !== 'string' || !value.startsWith('0x')) {
		throw new BundleFormatError(`${what} must be a 0x-prefixed hex string`);
	}
	let bytes: Uint8Array;
	try {
		bytes = Bytes.fromHex(value);
	} catch (e) {
		throw new BundleFormatError(`${what}: ${e instanceof Error ? e.message : String(e)}`);
	}
	if (length !== undefined && bytes.length !== length) {
		throw new BundleFormatError(`${what} must be ${length} bytes, got ${bytes.length}`);
	}
	return bytes;
}

/**
 * Non-negative amount, written as a JSON number when it is a safe integer and as a decimal string
 * otherwise.
 */
export function expectAmount(value: unknown, what: string): bigint {
	if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
		return BigInt(value);
	}
	if (typeof value === 'string' && /^(0|[1-9]\d*)$/.test(value)) {
		return BigInt(value);
	}
	throw new BundleFormatError(`${what} must be a non-negative integer`);
}

export function amountToJson(amount: bigint): number | string {
	return amount <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(amount) : amount.toString();
}

/**
 * Integer in `[0, max]`.
 */
export function expectUint(value: unknown, what: string, max = 0xffffffff): number {
	if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > max) {
		throw new BundleFormatError(`${what} must be an integer in [0, ${max}]`);
	}
	return value;
}

export function expectString(value: unknown, what: string): string {
	if (typeof value !== 'string' || value.length === 0) {
		throw new BundleFormatError(`${what} must be a non-empty string`);
	}
	return value;
}
