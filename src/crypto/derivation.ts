import { sha256 } from '@noble/hashes/sha2.js';
import {
	HardenedDerivationError,
	InvalidDerivationIndexError,
	KeyReleasedError,
} from '../model/Errors';
import { Bytes } from '../utils/Bytes';
import {
	CURVE_ORDER,
	type G1Point,
	type G2Point,
	g1FromBytes,
	g1ToBytes,
	keyFingerprint,
	publicKeyFromScalar,
	scalarFromBytes,
	scalarToBytes,
	signAugmented,
} from './core';
import { deriveChildSkHardened, keyGen } from './eip2333';

export type KeyPathStep = {
	index: number;
	hardened: boolean;
};

export type KeyPath = readonly KeyPathStep[];

/**
 * `observer`: hardened wallet root, unhardened leaves, so the online machine can derive addresses
 * from the root public key. `hardened`: every level hardened; the online machine needs an explicit
 * list of exported leaf keys.
 */
export type DerivationScheme = 'observer' | 'hardened';

const MAX_INDEX = 0xffffffff;

export function assertDerivationIndex(index: number): void {
	if (!Number.isInteger(index) || index < 0 || index > MAX_INDEX) {
		throw new InvalidDerivationIndexError(index);
	}
}

/**
 * Parse `m/12381'/8444'/2'/0`. A trailing `'` marks a hardened step. The leading `m` is optional,
 * paths without it are relative to whichever node they are applied to.
 */
export function parseKeyPath(path: string): KeyPath {
	const parts = path.trim().split('/');
	if (parts[0] === 'm') parts.shift();
	return parts
		.filter((p) => p.length > 0)
		.map((part) => {
			const hardened = part.endsWith("'");
			const digits = hardened ? part.slice(0, -1) : part;
			if (!/^\d+$/.test(digits)) throw new InvalidDerivationIndexError(part);
			const index = Number(digits);
			assertDerivationIndex(index);
			return { index, hardened };
		});
}

export function formatKeyPath(path: KeyPath): string {
	return ['m', ...path.map((s) => `${s.index}${s.hardened ? "'" : ''}`)].join('/');
}

/** Purpose/coin/chain levels above every wallet leaf key. Always hardened. */
export const WALLET_ROOT_PATH: KeyPath = parseKeyPath("m/12381'/8444'/2'");

export function walletKeyPath(index: number, scheme: DerivationScheme): KeyPath {
	assertDerivationIndex(index);
	return [...WALLET_ROOT_PATH, { index, hardened: scheme === 'hardened' }];
}

/**
 * Scalar added to the parent key in unhardened derivation:
 * sha256(compressed parent public key || uint32be(index)) mod r.
 */
function unhardenedTweak(parentPublicKey: Uint8Array, index: number): bigint {
	assertDerivationIndex(index);
	return (
		scalarFromBytes(sha256(Bytes.concat(parentPublicKey, Bytes.writeUint32BE(index)))) % CURVE_ORDER
	);
}

/**
 * Offset that turns a wallet key into the synthetic key its standard puzzle is locked to:
 * sha256(public key || hidden puzzle hash), read as a signed big-endian integer, mod r.
 */
export function syntheticOffset(publicKey: Uint8Array, hiddenPuzzleHash: Uint8Array): bigint {
	const digest = sha256(Bytes.concat(publicKey, hiddenPuzzleHash));
	let value = scalarFromBytes(digest);
	if (digest[0] & 0x80) value -= 1n << 256n;
	return ((value % CURVE_ORDER) + CURVE_ORDER) % CURVE_ORDER;
}

/**
 * `publicKey + offset·G1`, compressed.
 */
export function syntheticPublicKey(publicKey: Uint8Array, hiddenPuzzleHash: Uint8Array): Uint8Array {
	const offset = syntheticOffset(publicKey, hiddenPuzzleHash);
	const point = g1FromBytes(publicKey);
	return g1ToBytes(offset === 0n ? point : point.add(publicKeyFromScalar(offset)));
}

/**
 * A public key and its position in the tree. Has no field that could hold a secret, which is what
 * the online side works with.
 */
export class PublicKeyNode {
	private constructor(
		private readonly point: G1Point,
		readonly path: KeyPath,
	) {}

	static fromBytes(publicKey: Uint8Array, path: KeyPath = []): PublicKeyNode {
		return new PublicKeyNode(g1FromBytes(publicKey), path);
	}

	/** @internal */
	static fromPoint(point: G1Point, path: KeyPath): PublicKeyNode {
		return new PublicKeyNode(point, path);
	}

	get publicKey(): Uint8Array {
		return g1ToBytes(this.point);
	}

	get fingerprint(): number {
		return keyFingerprint(this.publicKey);
	}

	deriveUnhardened(index: number): PublicKeyNode {
		const tweak = unhardenedTweak(this.publicKey, index);
		const child = tweak === 0n ? this.point : this.point.add(publicKeyFromScalar(tweak));
		return new PublicKeyNode(child, [...this.path, { index, hardened: false }]);
	}

	/**
	 * Apply a relative path.
	 *
	 * @throws {HardenedDerivationError} On any hardened step.
	 */
	derivePath(path: KeyPath | string): PublicKeyNode {
		const steps = typeof path === 'string' ? parseKeyPath(path) : path;
		let node: PublicKeyNode = this;
		for (const step of steps) {
			if (step.hardened) throw new HardenedDerivationError(step.index);
			node = node.deriveUnhardened(step.index);
		}
		return node;
	}

	equals(other: PublicKeyNode): boolean {
		return this.point.equals(other.point);
	}
}

/**
 * A secret key in the tree. Only the offline signer creates these, and it releases each one as soon
 * as the coin it controls is signed; after {@link release} every accessor throws.
 */
export class PrivateKeyNode {
	private secret: Uint8Array;
	private released = false;
	private cachedPublic?: G1Point;

	private constructor(secret: Uint8Array, readonly path: KeyPath) {
		this.secret = secret;
	}

	/**
	 * Master key from seed material (at least 32 bytes).
	 */
	static fromSeed(seed: Uint8Array): PrivateKeyNode {
		return new PrivateKeyNode(keyGen(seed), []);
	}

	private scalar(): bigint {
		if (this.released) throw new KeyReleasedError();
		return scalarFromBytes(this.secret);
	}

	private point(): G1Point {
		if (this.released) throw new KeyReleasedError();
		if (!this.cachedPublic) this.cachedPublic = publicKeyFromScalar(this.scalar());
		return this.cachedPublic;
	}

	get publicKey(): Uint8Array {
		return g1ToBytes(this.point());
	}

	get fingerprint(): number {
		return keyFingerprint(this.publicKey);
	}

	get isReleased(): boolean {
		return this.released;
	}

	toPublic(): PublicKeyNode {
		return PublicKeyNode.fromPoint(this.point(), this.path);
	}

	deriveHardened(index: number): PrivateKeyNode {
		assertDerivationIndex(index);
		if (this.released) throw new KeyReleasedError();
		return new PrivateKeyNode(deriveChildSkHardened(this.secret, index), [
			...this.path,
			{ index, hardened: true },
		]);
	}

	deriveUnhardened(index: number): PrivateKeyNode {
		const tweak = unhardenedTweak(this.publicKey, index);
		const child = (this.scalar() + tweak) % CURVE_ORDER;
		if (child === 0n) throw new Error(`Unhardened child ${index} is the zero key`);
		return new PrivateKeyNode(scalarToBytes(child), [...this.path, { index, hardened: false }]);
	}

	/**
	 * Secret key of the synthetic public key, `(sk + offset) mod r`. Same path as this node.
	 */
	toSynthetic(hiddenPuzzleHash: Uint8Array): PrivateKeyNode {
		const offset = syntheticOffset(this.publicKey, hiddenPuzzleHash);
		const child = (this.scalar() + offset) % CURVE_ORDER;
		if (child === 0n) throw new Error('Synthetic key is the zero key');
		return new PrivateKeyNode(scalarToBytes(child), this.path);
	}

	/**
	 * Apply a relative path. Intermediate nodes are released before returning, or when a step throws.
	 */
	derivePath(path: KeyPath | string): PrivateKeyNode {
		const steps = typeof path === 'string' ? parseKeyPath(path) : path;
		let node: PrivateKeyNode = this;
		try {
			for (const step of steps) {
				const next = step.hardened
					? node.deriveHardened(step.index)
					: node.deriveUnhardened(step.index);
				if (node !== this) node.release();
				node = next;
			}
		} catch (e) {
			if (node !== this) node.release();
			throw e;
		}
		return node;
	}

	/**
	 * Augmented-scheme signature over `publicKey || message`.
	 */
	sign(message: Uint8Array): G2Point {
		return signAugmented(this.scalar(), this.publicKey, message);
	}

	/**
	 * Zero the secret. Idempotent.
	 */
	release(): void {
		Bytes.wipe(this.secret);
		this.released = true;
		this.cachedPublic = undefined;
	}
}

/**
 * Run `fn` with `node` and release the key afterwards, whether `fn` returns or throws.
 */
export function withPrivateKey<T>(node: PrivateKeyNode, fn: (node: PrivateKeyNode) => T): T {
	try {
		return fn(node);
	} finally {
		node.release();
	}
}
