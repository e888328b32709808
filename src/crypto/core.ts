import { bls12_381 } from '@noble/curves/bls12-381.js';
import { bytesToNumberBE, numberToBytesBE } from '@noble/curves/utils.js';
import { sha256 } from '@noble/hashes/sha2.js';
import { Bytes } from '../utils/Bytes';

export type G1Point = typeof bls12_381.G1.Point.BASE;
export type G2Point = typeof bls12_381.G2.Point.BASE;

/** Order of the BLS12-381 scalar field. */
export const CURVE_ORDER: bigint = bls12_381.fields.Fr.ORDER;

/** Domain separation tag of the augmented signature scheme (message is prefixed with the key). */
export const AUG_SCHEME_DST = Bytes.fromString('BLS_SIG_BLS12381G2_XMD:SHA-256_SSWU_RO_AUG_');

export const G1_LENGTH = 48;
export const G2_LENGTH = 96;

export function scalarFromBytes(bytes: Uint8Array): bigint {
	return bytesToNumberBE(bytes);
}

export function scalarToBytes(scalar: bigint): Uint8Array {
	return numberToBytesBE(scalar, 32);
}

export function g1FromBytes(bytes: Uint8Array): G1Point {
	if (bytes.length !== G1_LENGTH) {
		throw new Error(`Invalid G1 length ${bytes.length}, expected ${G1_LENGTH}`);
	}
	return bls12_381.G1.Point.fromHex(Bytes.toHex(bytes));
}

export function g2FromBytes(bytes: Uint8Array): G2Point {
	if (bytes.length !== G2_LENGTH) {
		throw new Error(`Invalid G2 length ${bytes.length}, expected ${G2_LENGTH}`);
	}
	return bls12_381.G2.Point.fromHex(Bytes.toHex(bytes));
}

export function g1ToBytes(point: G1Point): Uint8Array {
	return point.toBytes(true);
}

export function g2ToBytes(point: G2Point): Uint8Array {
	return point.toBytes(true);
}

export function publicKeyFromScalar(scalar: bigint): G1Point {
	return bls12_381.G1.Point.BASE.multiply(scalar);
}

/**
 * Hash `publicKey || message` onto G2 under the augmented scheme DST.
 */
export function hashAugmented(publicKey: Uint8Array, message: Uint8Array): G2Point {
	return bls12_381.longSignatures.hash(Bytes.concat(publicKey, message), AUG_SCHEME_DST);
}

/**
 * Augmented-scheme signature: `sk * H(pk || message)`.
 */
export function signAugmented(scalar: bigint, publicKey: Uint8Array, message: Uint8Array): G2Point {
	return hashAugmented(publicKey, message).multiply(scalar);
}

/**
 * First four bytes of sha256 over the compressed key, read as a big-endian uint32.
 */
export function keyFingerprint(publicKey: Uint8Array): number {
	return Bytes.readUint32BE(sha256(publicKey));
}
