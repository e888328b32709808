import { type DerivationScheme, PublicKeyNode, assertDerivationIndex } from '../crypto/derivation';
import { BundleFormatError, HardenedDerivationError } from '../model/Errors';

/**
 * Where the online machine gets wallet leaf public keys from. Neither implementation can hold a
 * private key.
 */
export interface PublicKeySource {
	readonly scheme: DerivationScheme;
	/**
	 * Fingerprint of the master public key, when known.
	 */
	readonly masterFingerprint?: number;
	/**
	 * Lowest leaf index available, `undefined` meaning 0.
	 */
	readonly minIndex?: number;
	/**
	 * Highest leaf index available, `undefined` when unbounded.
	 */
	readonly maxIndex?: number;
	publicKeyAt(index: number): PublicKeyNode;
}

/**
 * Derives unhardened leaves from the wallet root public key (`m/12381'/8444'/2'`).
 */
export class ObserverKeySource implements PublicKeySource {
	readonly scheme = 'observer';
	private cache = new Map<number, PublicKeyNode>();

	constructor(
		private readonly walletRoot: PublicKeyNode,
		readonly masterFingerprint?: number,
	) {}

	publicKeyAt(index: number): PublicKeyNode {
		let node = this.cache.get(index);
		if (!node) {
			node = this.walletRoot.deriveUnhardened(index);
			this.cache.set(index, node);
		}
		return node;
	}
}

/**
 * Hardened leaves exported by the offline machine, a contiguous index range. Indices outside the
 * export cannot be produced here.
 */
export class ExportedKeySource implements PublicKeySource {
	readonly scheme = 'hardened';
	readonly minIndex: number;
	readonly maxIndex: number;
	private readonly keys: ReadonlyMap<number, PublicKeyNode>;

	constructor(
		keys: ReadonlyArray<{ index: number; publicKey: PublicKeyNode }>,
		readonly masterFingerprint?: number,
	) {
		if (keys.length === 0) throw new BundleFormatError('Key export contains no keys');
		const sorted = [...keys].sort((a, b) => a.index - b.index);
		sorted.forEach((k, i) => {
			assertDerivationIndex(k.index);
			if (i > 0 && k.index !== sorted[i - 1].index + 1) {
				throw new BundleFormatError(`Key export is not contiguous at index ${k.index}`);
			}
		});
		this.keys = new Map(sorted.map((k) => [k.index, k.publicKey]));
		this.minIndex = sorted[0].index;
		this.maxIndex = sorted[sorted.length - 1].index;
	}

	publicKeyAt(index: number): PublicKeyNode {
		assertDerivationIndex(index);
		const node = this.keys.get(index);
		if (!node) throw new HardenedDerivationError(index);
		return node;
	}
}
