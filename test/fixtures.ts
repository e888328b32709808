import { type DerivationScheme } from '../src/crypto/derivation';
import { type SpendableCoin } from '../src/model/types/coin';
import { type PublicKeySource } from '../src/wallet/KeySource';
import { OfflineSigner } from '../src/wallet/OfflineSigner';
import { keySourceFromExport } from '../src/wallet/PublicKeyExport';
import { puzzleHashForPublicKey } from '../src/wallet/StandardPuzzle';
import { type SignerOptions } from '../src/wallet/types/config';

export const SEED = new Uint8Array(32).fill(7);
export const OTHER_SEED = new Uint8Array(32).fill(9);

/** Puzzle hash of somebody else's wallet. */
export const RECIPIENT = new Uint8Array(32).fill(0xab);

/**
 * An offline signer plus the key source the online machine would build from its export.
 */
export function walletPair(
	scheme: DerivationScheme = 'observer',
	options: SignerOptions = {},
	seed: Uint8Array = SEED,
): { signer: OfflineSigner; keys: PublicKeySource } {
	const signer = new OfflineSigner(seed, { ...options, scheme });
	const keys = keySourceFromExport(signer.exportPublicKeys({ scheme, count: 10 }));
	return { signer, keys };
}

/**
 * A coin locked to the wallet key at `index`. `parent` makes coins with equal amounts distinct.
 */
export function coinAt(
	keys: PublicKeySource,
	index: number,
	amount: bigint,
	timestamp?: number,
	parent = index + 1,
): SpendableCoin {
	const publicKey = keys.publicKeyAt(index).publicKey;
	return {
		coin: {
			parentCoinId: new Uint8Array(32).fill(parent),
			puzzleHash: puzzleHashForPublicKey(publicKey),
			amount,
		},
		derivationIndex: index,
		publicKey,
		...(timestamp !== undefined ? { timestamp } : {}),
	};
}
