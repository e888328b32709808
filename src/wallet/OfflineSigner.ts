import { type G2Point, g2ToBytes } from '../crypto/core';
import { aggregateSignatures } from '../crypto/aggregate';
import {
	type DerivationScheme,
	PrivateKeyNode,
	WALLET_ROOT_PATH,
	withPrivateKey,
} from '../crypto/derivation';
import { type Logger, fail, failIf, NULL_LOGGER, measureTime } from '../logger';
import { coinIdHex } from '../model/Coin';
import {
	AggregationDegenerateError,
	BundleFormatError,
	KeyPathMismatchError,
	KeyReleasedError,
	PartialBundleError,
} from '../model/Errors';
import { type SpendBundleDocument } from '../model/types/bundle';
import { deriveSeedFromMnemonic } from '../secrets';
import { Bytes } from '../utils/Bytes';
import { MAINNET } from './networks';
import {
	type PublicKeyExport,
	type PublicKeyExportOptions,
	createPublicKeyExport,
} from './PublicKeyExport';
import {
	type EvaluatedSpend,
	assertFeeAndBalance,
	assertManifestMatches,
	evaluateSpends,
	missingAnnouncements,
	signingMessagesFor,
} from './SpendEvaluation';
import { DEFAULT_HIDDEN_PUZZLE_HASH, puzzleHashForPublicKey } from './StandardPuzzle';
import { type NetworkConfig, type SignerOptions } from './types/config';

const DEFAULT_SCAN_LIMIT = 5000;

/**
 * Signs exchange documents on the air-gapped machine.
 *
 * Holds the seed only. Each coin's key is derived from it when that coin is signed and wiped
 * straight after, whether signing succeeds or not. Call {@link dispose} when done.
 *
 * @example
 *
 * ```ts
 * const signer = OfflineSigner.fromMnemonic(mnemonic, '', { network: TESTNET });
 * const signed = signer.sign(decodeSpendBundle(unsignedJson));
 * signer.dispose();
 * ```
 */
export class OfflineSigner {
	private readonly seed: Uint8Array;
	private disposed = false;
	private readonly logger: Logger;
	private readonly network: NetworkConfig;
	private readonly scheme: DerivationScheme;
	private readonly scanLimit: number;
	readonly masterFingerprint: number;

	constructor(
		seed: Uint8Array,
		private readonly options: SignerOptions = {},
	) {
		this.seed = seed.slice();
		this.logger = options.logger ?? NULL_LOGGER;
		this.network = options.network ?? MAINNET;
		this.scheme = options.scheme ?? 'observer';
		this.scanLimit = options.scanLimit ?? DEFAULT_SCAN_LIMIT;
		this.masterFingerprint = withPrivateKey(PrivateKeyNode.fromSeed(this.seed), (m) => m.fingerprint);
	}

	static fromMnemonic(mnemonic: string, passphrase = '', options: SignerOptions = {}): OfflineSigner {
		const seed = deriveSeedFromMnemonic(mnemonic, passphrase);
		try {
			return new OfflineSigner(seed, options);
		} finally {
			Bytes.wipe(seed);
		}
	}

	exportPublicKeys(options: Partial<PublicKeyExportOptions> = {}): PublicKeyExport {
		return this.withMaster((master) =>
			createPublicKeyExport(master, {
				scheme: options.scheme ?? this.scheme,
				count: options.count,
				start: options.start,
				network: options.network ?? this.network.prefix,
			}),
		);
	}

	/**
	 * Return `doc` with the aggregated signature attached.
	 *
	 * Everything about the bundle is checked before the first key is derived: the manifest, the
	 * puzzle reveals, the cost limit, the announcement chain, the fee and balance, and the key
	 * fingerprint.
	 *
	 * @throws {BundleFormatError} If `doc` is already signed, is for another network, or reserves a
	 *   fee other than the declared one.
	 * @throws {InsufficientFundsError} If the spends create more than they consume.
	 * @throws {PartialBundleError} If the manifest and the spends differ, or an asserted
	 *   announcement is not created by any spend.
	 * @throws {KeyPathMismatchError} If a coin is not locked by the key this seed derives for it.
	 * @throws {CostExceededError}
	 * @throws {InvalidPuzzleRevealError}
	 */
	sign(doc: SpendBundleDocument): SpendBundleDocument {
		const timer = measureTime();
		const logger = this.logger;
		failIf(
			doc.aggregatedSignature !== undefined,
			() => new BundleFormatError('Bundle is already signed'),
			logger,
		);
		failIf(
			doc.metadata.network !== this.network.prefix,
			() =>
				new BundleFormatError(
					`Bundle is for network "${doc.metadata.network}", signer is configured for "${this.network.prefix}"`,
				),
			logger,
		);
		assertManifestMatches(doc.coinSpends, doc.metadata.spends, logger);

		const evaluation = evaluateSpends(doc.coinSpends, { ...this.options, logger });
		const missing = missingAnnouncements(evaluation.spends);
		failIf(
			missing.length > 0,
			() =>
				new PartialBundleError(
					`Announcement ${Bytes.toPrefixedHex(missing[0])} is asserted but not created in this bundle`,
				),
			logger,
		);
		assertFeeAndBalance(evaluation.spends, doc.metadata.fee, logger);
		const expected = doc.metadata.keyFingerprint;
		failIf(
			expected !== undefined && expected !== this.masterFingerprint,
			() =>
				new KeyPathMismatchError(
					`Bundle was built for key ${expected}, this seed is ${this.masterFingerprint}`,
				),
			logger,
		);

		const signatures = this.withMaster((master) =>
			withPrivateKey(master.derivePath(WALLET_ROOT_PATH), (root) =>
				evaluation.spends.flatMap((spend, i) =>
					this.signSpend(root, spend, doc.metadata.spends[i].derivationIndex),
				),
			),
		);
		failIf(
			signatures.length === 0,
			() => new AggregationDegenerateError('Bundle requires no signatures'),
			logger,
		);
		const aggregatedSignature = g2ToBytes(aggregateSignatures(signatures));
		logger.info('Signed bundle with {spends} spends', {
			spends: doc.coinSpends.length,
			signatures: signatures.length,
			cost: evaluation.cost,
			ms: timer.elapsed(),
		});
		return { ...doc, aggregatedSignature };
	}

	/**
	 * Wipe the seed. The signer cannot be used afterwards.
	 */
	dispose(): void {
		Bytes.wipe(this.seed);
		this.disposed = true;
	}

	private withMaster<T>(fn: (master: PrivateKeyNode) => T): T {
		if (this.disposed) throw new KeyReleasedError();
		return withPrivateKey(PrivateKeyNode.fromSeed(this.seed), fn);
	}

	private signSpend(
		root: PrivateKeyNode,
		spend: EvaluatedSpend,
		derivationIndex: number | undefined,
	): G2Point[] {
		const coin = spend.spend.coin;
		const index = derivationIndex ?? this.scanForIndex(root, coin.puzzleHash);
		const messages = signingMessagesFor([spend], this.network.additionalData);
		return withPrivateKey(this.deriveLeaf(root, index), (leaf) => {
			if (!Bytes.equals(puzzleHashForPublicKey(leaf.publicKey), coin.puzzleHash)) {
				fail(
					new KeyPathMismatchError(
						`Coin ${coinIdHex(coin)} is not locked by the ${this.scheme} key at index ${index}`,
					),
					this.logger,
				);
			}
			return withPrivateKey(leaf.toSynthetic(DEFAULT_HIDDEN_PUZZLE_HASH), (synthetic) => {
				const publicKey = synthetic.publicKey;
				return messages.map((m) => {
					if (!Bytes.equals(m.publicKey, publicKey)) {
						fail(
							new KeyPathMismatchError(
								`Coin ${coinIdHex(coin)} requires a signature from ${Bytes.toPrefixedHex(m.publicKey)}`,
							),
							this.logger,
						);
					}
					return synthetic.sign(m.message);
				});
			});
		});
	}

	private deriveLeaf(root: PrivateKeyNode, index: number): PrivateKeyNode {
		return this.scheme === 'hardened' ? root.deriveHardened(index) : root.deriveUnhardened(index);
	}

	/**
	 * @throws {KeyPathMismatchError} If no index below the scan limit locks `puzzleHash`.
	 */
	private scanForIndex(root: PrivateKeyNode, puzzleHash: Uint8Array): number {
		const publicRoot = this.scheme === 'observer' ? root.toPublic() : undefined;
		for (let index = 0; index < this.scanLimit; index++) {
			const publicKey = publicRoot
				? publicRoot.deriveUnhardened(index).publicKey
				: withPrivateKey(root.deriveHardened(index), (leaf) => leaf.publicKey);
			if (Bytes.equals(puzzleHashForPublicKey(publicKey), puzzleHash)) {
				this.logger.debug('Found key for {puzzleHash} at index {index}', {
					puzzleHash: Bytes.toPrefixedHex(puzzleHash),
					index,
				});
				return index;
			}
		}
		fail(
			new KeyPathMismatchError(
				`No ${this.scheme} key below index ${this.scanLimit} locks puzzle hash ${Bytes.toPrefixedHex(puzzleHash)}`,
			),
			this.logger,
		);
	}
}
