import { expand, extract, hkdf } from '@noble/hashes/hkdf.js';
import { sha256 } from '@noble/hashes/sha2.js';
import { Bytes } from '../utils/Bytes';
import { CURVE_ORDER, scalarFromBytes, scalarToBytes } from './core';

// EIP-2333 key generation and hardened child derivation.

const KEYGEN_SALT = Bytes.fromString('BLS-SIG-KEYGEN-SALT-');
const OKM_LENGTH = 48;
const LAMPORT_CHUNKS = 255;
const LAMPORT_CHUNK_LENGTH = 32;

export const MIN_SEED_LENGTH = 32;

export function hkdfModR(ikm: Uint8Array, keyInfo: Uint8Array = new Uint8Array(0)): bigint {
	let salt = KEYGEN_SALT;
	let sk = 0n;
	while (sk === 0n) {
		salt = sha256(salt);
		const prk = extract(sha256, Bytes.concat(ikm, Uint8Array.of(0)), salt);
		const okm = expand(sha256, prk, Bytes.concat(keyInfo, Uint8Array.of(0, OKM_LENGTH)), OKM_LENGTH);
		sk = scalarFromBytes(okm) % CURVE_ORDER;
		Bytes.wipe(prk);
		Bytes.wipe(okm);
	}
	return sk;
}

function lamportPublicHashes(ikm: Uint8Array, salt: Uint8Array): Uint8Array[] {
	const okm = hkdf(sha256, ikm, salt, new Uint8Array(0), LAMPORT_CHUNKS * LAMPORT_CHUNK_LENGTH);
	const hashes: Uint8Array[] = [];
	for (let i = 0; i < LAMPORT_CHUNKS; i++) {
		hashes.push(sha256(okm.subarray(i * LAMPORT_CHUNK_LENGTH, (i + 1) * LAMPORT_CHUNK_LENGTH)));
	}
	Bytes.wipe(okm);
	return hashes;
}

function parentSkToLamportPk(parentSk: Uint8Array, index: number): Uint8Array {
	const salt = Bytes.writeUint32BE(index);
	const notIkm = parentSk.map((b) => b ^ 0xff);
	const lamport0 = lamportPublicHashes(parentSk, salt);
	const lamport1 = lamportPublicHashes(notIkm, salt);
	Bytes.wipe(notIkm);
	return sha256(Bytes.concat(...lamport0, ...lamport1));
}

/**
 * Master secret key from seed material.
 *
 * @throws Error if the seed is shorter than 32 bytes.
 */
export function keyGen(seed: Uint8Array): Uint8Array {
	if (seed.length < MIN_SEED_LENGTH) {
		throw new Error(`Seed must be at least ${MIN_SEED_LENGTH} bytes, got ${seed.length}`);
	}
	return scalarToBytes(hkdfModR(seed));
}

/**
 * Hardened child secret key. There is no public-key counterpart of this function.
 */
export function deriveChildSkHardened(parentSk: Uint8Array, index: number): Uint8Array {
	return scalarToBytes(hkdfModR(parentSkToLamportPk(parentSk, index)));
}
