import { type Logger, fail, failIf, NULL_LOGGER, measureTime } from '../logger';
import { coinId, coinIdHex, announcementId, sumAmounts } from '../model/Coin';
import {
	AggregationDegenerateError,
	BundleFormatError,
	DuplicateOutputError,
	InsufficientFundsError,
	InvalidAmountError,
	KeyPathMismatchError,
	PartialBundleError,
} from '../model/Errors';
import {
	type BundleMetadata,
	type UnsignedTransaction,
} from '../model/types/bundle';
import {
	type Coin,
	type CoinSpend,
	type PaymentOutput,
	type SpendableCoin,
} from '../model/types/coin';
import { type Condition } from '../model/types/condition';
import { Bytes } from '../utils/Bytes';
import {
	assertCoinAnnouncement,
	createCoin,
	createCoinAnnouncement,
	describeCondition,
	reserveFee,
} from './Conditions';
import { type PublicKeySource } from './KeySource';
import { MAINNET } from './networks';
import { selectCoinsOldestFirst } from './selectCoins';
import {
	assertFeeAndBalance,
	assertManifestMatches,
	bundleBindingMessage,
	evaluateSpends,
	missingAnnouncements,
	signingMessagesFor,
} from './SpendEvaluation';
import { puzzleForPublicKey, puzzleHashForPublicKey, solutionForConditions } from './StandardPuzzle';
import { type BuilderOptions, type EvaluationOptions } from './types/config';

export type PaymentRequest = {
	/**
	 * Candidate inputs, typically the result of coin discovery.
	 */
	coins: readonly SpendableCoin[];
	outputs: readonly PaymentOutput[];
	fee: bigint;
};

/**
 * Turn coin spends into an unsigned transaction: evaluate every spend, enforce the cost limit and
 * the declared fee, then list the messages the signer has to sign.
 *
 * @throws {AggregationDegenerateError} For zero spends, before anything else is computed.
 * @throws {PartialBundleError} If the manifest does not list exactly the spent coins, or an
 *   asserted announcement is created by no spend.
 * @throws {BundleFormatError} If the RESERVE_FEE total differs from `metadata.fee`.
 * @throws {InsufficientFundsError} If inputs are worth less than outputs plus fee.
 */
export function assembleSpendBundle(
	coinSpends: readonly CoinSpend[],
	metadata: BundleMetadata,
	options: EvaluationOptions = {},
): UnsignedTransaction {
	const logger = options.logger ?? NULL_LOGGER;
	const network = options.network ?? MAINNET;
	failIf(coinSpends.length === 0, () => new AggregationDegenerateError(), logger);
	failIf(
		metadata.network !== network.prefix,
		() =>
			new BundleFormatError(
				`Bundle network "${metadata.network}" does not match "${network.prefix}"`,
			),
		logger,
	);
	assertManifestMatches(coinSpends, metadata.spends, logger);

	const evaluation = evaluateSpends(coinSpends, options);

	const missing = missingAnnouncements(evaluation.spends);
	failIf(
		missing.length > 0,
		() =>
			new PartialBundleError(
				`Announcement ${Bytes.toPrefixedHex(missing[0])} is asserted but not created in this bundle`,
			),
		logger,
	);

	assertFeeAndBalance(evaluation.spends, metadata.fee, logger);

	const additions: Coin[] = evaluation.spends.flatMap((s) =>
		s.conditions.flatMap((c): Coin[] =>
			c.type === 'CREATE_COIN'
				? [{ parentCoinId: s.coinId, puzzleHash: c.puzzleHash, amount: c.amount }]
				: [],
		),
	);

	const signingMessages = signingMessagesFor(evaluation.spends, network.additionalData);
	logger.info('Assembled unsigned bundle with {spends} spends', {
		spends: coinSpends.length,
		cost: evaluation.cost,
		fee: metadata.fee.toString(),
		messages: signingMessages.length,
	});
	return {
		bundle: { coinSpends: [...coinSpends], metadata },
		signingMessages,
		cost: evaluation.cost,
		additions,
	};
}

/**
 * Builds unsigned payments from public key material only.
 *
 * The first selected coin carries every output, the fee reservation and an announcement of the
 * selected coin ids; the other coins only assert that announcement, so the bundle is valid only
 * with all its spends, in order.
 */
export class UnsignedBundleBuilder {
	private readonly logger: Logger;

	constructor(
		private readonly keys: PublicKeySource,
		private readonly options: BuilderOptions = {},
	) {
		this.logger = options.logger ?? NULL_LOGGER;
	}

	build(request: PaymentRequest): UnsignedTransaction {
		const timer = measureTime();
		const { outputs, fee } = request;
		this.validateOutputs(outputs, fee);

		const target = sumAmounts(outputs.map((o) => o.amount)) + fee;
		const select = this.options.selectCoins ?? selectCoinsOldestFirst;
		const selected = select(request.coins, target, this.logger);
		failIf(
			selected.length === 0,
			() => new AggregationDegenerateError('Coin selection returned no coins'),
			this.logger,
		);
		selected.forEach((c) => this.checkOwnership(c));

		const total = sumAmounts(selected.map((c) => c.coin.amount));
		failIf(total < target, () => new InsufficientFundsError(total, target), this.logger);
		const change = total - target;

		const created: Condition[] = outputs.map((o) => createCoin(o.puzzleHash, o.amount));
		let changeIndex: number | undefined;
		if (change > 0n) {
			changeIndex = this.changeIndexFor(request.coins);
			const changeKey = this.keys.publicKeyAt(changeIndex);
			created.push(createCoin(puzzleHashForPublicKey(changeKey.publicKey), change));
		}

		const ids = selected.map((c) => coinId(c.coin));
		const binding = bundleBindingMessage(ids);
		const primaryConditions: Condition[] = [
			...created,
			reserveFee(fee),
			createCoinAnnouncement(binding),
		];
		const assertion = assertCoinAnnouncement(announcementId(ids[0], binding));

		const coinSpends: CoinSpend[] = selected.map((c, i) => ({
			coin: c.coin,
			puzzleReveal: puzzleForPublicKey(c.publicKey),
			solution: solutionForConditions(i === 0 ? primaryConditions : [assertion]),
		}));
		const metadata: BundleMetadata = {
			fee,
			network: (this.options.network ?? MAINNET).prefix,
			...(this.keys.masterFingerprint !== undefined
				? { keyFingerprint: this.keys.masterFingerprint }
				: {}),
			spends: selected.map((c, i) => ({ coinId: ids[i], derivationIndex: c.derivationIndex })),
		};

		this.logger.debug('Primary spend conditions', {
			conditions: primaryConditions.map(describeCondition),
			changeIndex,
		});
		const tx = assembleSpendBundle(coinSpends, metadata, this.options);
		this.logger.debug('Built unsigned bundle', { ms: timer.elapsed() });
		return tx;
	}

	private validateOutputs(outputs: readonly PaymentOutput[], fee: bigint): void {
		failIf(fee < 0n, () => new InvalidAmountError(`Negative fee ${fee}`), this.logger);
		const seen = new Set<string>();
		for (const o of outputs) {
			const hex = Bytes.toPrefixedHex(o.puzzleHash);
			failIf(
				o.amount < 0n,
				() => new InvalidAmountError(`Negative amount ${o.amount} for output ${hex}`),
				this.logger,
			);
			failIf(
				o.puzzleHash.length !== 32,
				() => new BundleFormatError(`Invalid puzzle hash ${hex}, expected 32 bytes`),
				this.logger,
			);
			const key = `${hex}:${o.amount}`;
			failIf(seen.has(key), () => new DuplicateOutputError(hex, o.amount), this.logger);
			seen.add(key);
		}
	}

	private checkOwnership(c: SpendableCoin): void {
		if (!Bytes.equals(puzzleHashForPublicKey(c.publicKey), c.coin.puzzleHash)) {
			fail(
				new KeyPathMismatchError(
					`Coin ${coinIdHex(c.coin)} is not locked by the key recorded at index ${c.derivationIndex}`,
				),
				this.logger,
			);
		}
	}

	/**
	 * One past the highest candidate index, or, when that is beyond the key source, the lowest
	 * index in range that holds no candidate.
	 *
	 * @throws {BundleFormatError} If every index of the key source holds a candidate.
	 */
	private changeIndexFor(candidates: readonly SpendableCoin[]): number {
		if (this.options.changeIndex !== undefined) return this.options.changeIndex;
		const last = this.keys.maxIndex;
		const next = candidates.reduce((max, c) => Math.max(max, c.derivationIndex), -1) + 1;
		if (last === undefined || next <= last) return next;
		const used = new Set(candidates.map((c) => c.derivationIndex));
		for (let index = this.keys.minIndex ?? 0; index <= last; index++) {
			if (!used.has(index)) return index;
		}
		fail(new BundleFormatError('Key export exhausted, export more keys'), this.logger);
	}
}
