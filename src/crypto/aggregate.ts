import { bls12_381 } from '@noble/curves/bls12-381.js';
import { type G2Point, g1FromBytes, hashAugmented } from './core';

export type PublicKeyMessagePair = {
	publicKey: Uint8Array;
	message: Uint8Array;
};

/**
 * Sum of G2 points. Point addition commutes, so the result does not depend on the order of
 * `signatures`; an empty list yields the identity (the "empty" signature).
 */
export function aggregateSignatures(signatures: readonly G2Point[]): G2Point {
	return signatures.reduce((acc, sig) => acc.add(sig), bls12_381.G2.Point.ZERO);
}

/**
 * Checks `e(G1, signature) == prod e(pk_i, H(pk_i || m_i))` for augmented-scheme signatures.
 *
 * @remarks
 * Malformed keys and the degenerate cases (no pairs, identity signature) are reported as `false`
 * rather than thrown, like the other verification helpers.
 */
export function verifyAggregate(
	signature: G2Point,
	pairs: readonly PublicKeyMessagePair[],
): boolean {
	if (pairs.length === 0 || signature.is0()) return false;
	const Fp12 = bls12_381.fields.Fp12;
	try {
		let expected = Fp12.ONE;
		for (const { publicKey, message } of pairs) {
			const pk = g1FromBytes(publicKey);
			if (pk.is0()) return false;
			expected = Fp12.mul(expected, bls12_381.pairing(pk, hashAugmented(publicKey, message)));
		}
		const actual = bls12_381.pairing(bls12_381.G1.Point.BASE, signature);
		return Fp12.eql(actual, expected);
	} catch {
		return false;
	}
}
