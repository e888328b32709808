import { sha256 } from '@noble/hashes/sha2.js';
import { type Logger, fail, failIf, NULL_LOGGER } from '../logger';
import { announcementId, coinId, coinIdHex, sumAmounts } from '../model/Coin';
import {
	AggregationDegenerateError,
	BundleFormatError,
	InsufficientFundsError,
	InvalidPuzzleRevealError,
	PartialBundleError,
} from '../model/Errors';
import { type SigningMessage, type SpendManifestEntry } from '../model/types/bundle';
import { type CoinSpend } from '../model/types/coin';
import { type Condition } from '../model/types/condition';
import { Bytes } from '../utils/Bytes';
import { parseConditions } from './Conditions';
import { DEFAULT_COST_MODEL, bundleCost, spendCost, validateCost } from './Cost';
import { MAINNET } from './networks';
import { standardPuzzleRunner } from './StandardPuzzle';
import { type EvaluationOptions } from './types/config';

export type EvaluatedSpend = {
	spend: CoinSpend;
	coinId: Uint8Array;
	conditions: Condition[];
	cost: number;
};

export type BundleEvaluation = {
	spends: EvaluatedSpend[];
	cost: number;
};

/**
 * @throws {InvalidPuzzleRevealError} If the reveal does not hash to the coin's puzzle hash.
 */
export function checkPuzzleReveal(spend: CoinSpend, logger: Logger = NULL_LOGGER): void {
	failIf(
		!Bytes.equals(spend.puzzleReveal.treeHash(), spend.coin.puzzleHash),
		() => new InvalidPuzzleRevealError(Bytes.toPrefixedHex(coinId(spend.coin))),
		logger,
	);
}

/**
 * Check reveals, run every puzzle and price the bundle. The cost limit is enforced here so that
 * nothing downstream (signing messages, signatures) is produced for a bundle the ledger would
 * reject.
 *
 * @throws {AggregationDegenerateError} For an empty bundle.
 * @throws {InvalidPuzzleRevealError}
 * @throws {CostExceededError}
 * @throws {BundleFormatError} If the same coin is spent twice or a puzzle fails to run.
 */
export function evaluateSpends(
	coinSpends: readonly CoinSpend[],
	options: EvaluationOptions = {},
): BundleEvaluation {
	const logger = options.logger ?? NULL_LOGGER;
	const runner = options.runner ?? standardPuzzleRunner;
	const model = options.costModel ?? DEFAULT_COST_MODEL;
	const network = options.network ?? MAINNET;

	failIf(coinSpends.length === 0, () => new AggregationDegenerateError(), logger);

	const seen = new Set<string>();
	const spends = coinSpends.map((spend): EvaluatedSpend => {
		const id = coinId(spend.coin);
		const idHex = Bytes.toPrefixedHex(id);
		failIf(seen.has(idHex), () => new BundleFormatError(`Coin ${idHex} is spent twice`), logger);
		seen.add(idHex);
		checkPuzzleReveal(spend, logger);
		let conditions: Condition[];
		try {
			conditions = parseConditions(runner.run(spend.puzzleReveal, spend.solution));
		} catch (e) {
			const reason = e instanceof Error ? e.message : String(e);
			fail(new BundleFormatError(`Spend of coin ${idHex} failed to run: ${reason}`), logger);
		}
		return { spend, coinId: id, conditions, cost: spendCost(spend, conditions, model) };
	});

	const cost = bundleCost(spends.map((s) => s.cost));
	validateCost(cost, network.maxBlockCost, logger);
	return { spends, cost };
}

/**
 * One message per AGG_SIG_ME condition: `message || coinId || additionalData`.
 */
export function signingMessagesFor(
	spends: readonly EvaluatedSpend[],
	additionalData: Uint8Array,
): SigningMessage[] {
	return spends.flatMap((s) =>
		s.conditions.flatMap((c): SigningMessage[] =>
			c.type === 'AGG_SIG_ME'
				? [
						{
							coinId: s.coinId,
							publicKey: c.publicKey,
							message: Bytes.concat(c.message, s.coinId, additionalData),
						},
					]
				: [],
		),
	);
}

/**
 * Message the primary spend announces: sha256 of the spent coin ids in bundle order.
 */
export function bundleBindingMessage(coinIds: readonly Uint8Array[]): Uint8Array {
	return sha256(Bytes.concat(...coinIds));
}

/**
 * Announcement ids asserted by some spend but created by none.
 */
export function missingAnnouncements(spends: readonly EvaluatedSpend[]): Uint8Array[] {
	const created = new Set<string>();
	for (const s of spends) {
		for (const c of s.conditions) {
			if (c.type === 'CREATE_COIN_ANNOUNCEMENT') {
				created.add(Bytes.toHex(announcementId(s.coinId, c.message)));
			}
		}
	}
	return spends.flatMap((s) =>
		s.conditions.flatMap((c) =>
			c.type === 'ASSERT_COIN_ANNOUNCEMENT' && !created.has(Bytes.toHex(c.announcementId))
				? [c.announcementId]
				: [],
		),
	);
}

export function conditionsOfType<T extends Condition['type']>(
	spends: readonly EvaluatedSpend[],
	type: T,
): Extract<Condition, { type: T }>[] {
	return spends.flatMap((s) =>
		s.conditions.filter((c): c is Extract<Condition, { type: T }> => c.type === type),
	);
}

/**
 * @throws {PartialBundleError} Unless `manifest` lists the spent coins, in order.
 */
export function assertManifestMatches(
	coinSpends: readonly CoinSpend[],
	manifest: readonly SpendManifestEntry[],
	logger: Logger = NULL_LOGGER,
): void {
	failIf(
		manifest.length !== coinSpends.length,
		() =>
			new PartialBundleError(
				`Manifest lists ${manifest.length} coins but the bundle spends ${coinSpends.length}`,
			),
		logger,
	);
	coinSpends.forEach((spend, i) => {
		failIf(
			!Bytes.equals(coinId(spend.coin), manifest[i].coinId),
			() =>
				new PartialBundleError(
					`Spend ${i} is coin ${coinIdHex(spend.coin)}, manifest expects ${Bytes.toPrefixedHex(manifest[i].coinId)}`,
				),
			logger,
		);
	});
}

/**
 * @throws {BundleFormatError} If the RESERVE_FEE total differs from `declaredFee`.
 * @throws {InsufficientFundsError} If inputs are worth less than created coins plus fee.
 */
export function assertFeeAndBalance(
	spends: readonly EvaluatedSpend[],
	declaredFee: bigint,
	logger: Logger = NULL_LOGGER,
): void {
	const reserved = sumAmounts(conditionsOfType(spends, 'RESERVE_FEE').map((c) => c.amount));
	failIf(
		reserved !== declaredFee,
		() => new BundleFormatError(`Reserved fee ${reserved} differs from declared fee ${declaredFee}`),
		logger,
	);
	const inputs = sumAmounts(spends.map((s) => s.spend.coin.amount));
	const outputs = sumAmounts(conditionsOfType(spends, 'CREATE_COIN').map((c) => c.amount));
	failIf(
		inputs < outputs + declaredFee,
		() => new InsufficientFundsError(inputs, outputs + declaredFee),
		logger,
	);
}
