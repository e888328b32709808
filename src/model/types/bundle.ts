import { type CoinSpend, type Coin } from './coin';

/**
 * What the builder recorded about one input so the signer can find its key.
 */
export type SpendManifestEntry = {
	coinId: Uint8Array;
	/**
	 * Leaf index of the controlling key. When absent the signer scans for it.
	 */
	derivationIndex?: number;
};

export type BundleMetadata = {
	/**
	 * Fee the bundle declares through its single RESERVE_FEE condition.
	 */
	fee: bigint;
	/**
	 * Address prefix of the network the bundle is meant for, e.g. `xch` or `txch`.
	 */
	network: string;
	/**
	 * Fingerprint of the master public key the bundle was built for.
	 */
	keyFingerprint?: number;
	spends: SpendManifestEntry[];
};

/**
 * The document exchanged between the online and the offline machine. Unsigned until the signer
 * attaches `aggregatedSignature`, after which it is not modified again.
 */
export type SpendBundleDocument = {
	coinSpends: CoinSpend[];
	/**
	 * Compressed G2 signature (96 bytes).
	 */
	aggregatedSignature?: Uint8Array;
	metadata: BundleMetadata;
};

/**
 * A message one key has to sign for one coin spend.
 */
export type SigningMessage = {
	coinId: Uint8Array;
	publicKey: Uint8Array;
	/**
	 * Full message: condition message || coin id || network additional data.
	 */
	message: Uint8Array;
};

export type UnsignedTransaction = {
	bundle: SpendBundleDocument;
	signingMessages: SigningMessage[];
	cost: number;
	/**
	 * Coins the bundle creates.
	 */
	additions: Coin[];
};
