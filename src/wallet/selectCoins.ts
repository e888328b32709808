import { type Logger, failIf, NULL_LOGGER, measureTime } from '../logger';
import { coinId, sumAmounts } from '../model/Coin';
import { InsufficientFundsError } from '../model/Errors';
import { type SpendableCoin } from '../model/types/coin';
import { Bytes } from '../utils/Bytes';

export type SelectCoins = (
	coins: readonly SpendableCoin[],
	target: bigint,
	logger?: Logger,
) => SpendableCoin[];

type Keyed = { coin: SpendableCoin; id: Uint8Array };

// Oldest first, coins without a timestamp last; then larger first; then coin id.
const compareCandidates = (a: Keyed, b: Keyed): number => {
	const ta = a.coin.timestamp ?? Infinity;
	const tb = b.coin.timestamp ?? Infinity;
	if (ta !== tb) return ta < tb ? -1 : 1;
	const amountA = a.coin.coin.amount;
	const amountB = b.coin.coin.amount;
	if (amountA !== amountB) return amountA > amountB ? -1 : 1;
	return Bytes.compare(a.id, b.id);
};

/**
 * Picks the inputs for a payment of `target`.
 *
 * A single coin worth exactly `target` is used alone. Otherwise coins are accumulated oldest first
 * until the sum reaches `target`, which keeps the result deterministic for a given coin set.
 * Coins listed twice are counted once.
 *
 * @throws {InsufficientFundsError} If all coins together are worth less than `target`.
 */
export const selectCoinsOldestFirst: SelectCoins = (
	coins: readonly SpendableCoin[],
	target: bigint,
	logger: Logger = NULL_LOGGER,
): SpendableCoin[] => {
	const timer = measureTime();
	const unique = new Map<string, Keyed>();
	for (const c of coins) {
		const id = coinId(c.coin);
		const key = Bytes.toHex(id);
		if (!unique.has(key)) unique.set(key, { coin: c, id });
	}
	const candidates = [...unique.values()].sort(compareCandidates);
	const available = sumAmounts(candidates.map((c) => c.coin.coin.amount));
	failIf(
		candidates.length === 0 || available < target,
		() => new InsufficientFundsError(available, target),
		logger,
		{ candidates: candidates.length },
	);

	const exact = candidates.find((c) => c.coin.coin.amount === target);
	if (exact) {
		logger.debug('Exact match for {target}', { target: target.toString(), ms: timer.elapsed() });
		return [exact.coin];
	}

	const selected: SpendableCoin[] = [];
	let total = 0n;
	for (const c of candidates) {
		if (total >= target && selected.length > 0) break;
		selected.push(c.coin);
		total += c.coin.coin.amount;
	}
	logger.debug('Selected {count} coins for {target}', {
		count: selected.length,
		target: target.toString(),
		total: total.toString(),
		ms: timer.elapsed(),
	});
	return selected;
};
