import { type Logger, NULL_LOGGER, failIf, measureTime } from '../logger';
import { NodeNotSyncedError } from '../model/Errors';
import { type SpendBundleDocument } from '../model/types/bundle';
import { type Coin, type SpendableCoin } from '../model/types/coin';
import { Bytes } from '../utils/Bytes';
import { type PublicKeySource } from './KeySource';
import { puzzleHashForPublicKey } from './StandardPuzzle';
import { type DiscoveryOptions } from './types/config';

/**
 * A coin as the full node reports it.
 */
export type CoinRecord = {
	coin: Coin;
	confirmedBlockIndex: number;
	spent: boolean;
	/**
	 * Unix seconds of the confirming block.
	 */
	timestamp: number;
};

/**
 * Read side of the full node. The transport (RPC, relay, fixture) is up to the caller.
 */
export interface FullNodeQuery {
	/**
	 * Whether the node has caught up with the chain tip.
	 */
	isSynced(): Promise<boolean>;
	getUnspentCoins(puzzleHash: Uint8Array): Promise<CoinRecord[]>;
}

export type PushTxResult = { status: 'accepted' } | { status: 'rejected'; reason: string };

/**
 * Write side of the full node. The ledger re-checks cost and signatures, so a bundle that passed
 * every local check can still be rejected here.
 */
export interface FullNodeBroadcast {
	pushTx(bundle: SpendBundleDocument): Promise<PushTxResult>;
}

const DEFAULT_BATCH_SIZE = 1000;
const DEFAULT_MAX_BATCHES = 1000;

/**
 * Collect the unspent coins locked by the wallet's standard puzzles.
 *
 * Indices are derived and queried in batches of `batchSize`; discovery stops after the first batch
 * in which no index holds a coin, or at the end of the key source's index range.
 *
 * @throws {NodeNotSyncedError} If the node is still syncing; nothing is queried then.
 */
export async function discoverCoins(
	keys: PublicKeySource,
	node: FullNodeQuery,
	options: DiscoveryOptions = {},
): Promise<SpendableCoin[]> {
	const logger: Logger = options.logger ?? NULL_LOGGER;
	const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
	const maxBatches = options.maxBatches ?? DEFAULT_MAX_BATCHES;
	if (!Number.isInteger(batchSize) || batchSize < 1) {
		throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
	}
	failIf(!(await node.isSynced()), () => new NodeNotSyncedError(), logger);
	const timer = measureTime();
	const first = keys.minIndex ?? 0;
	const last = keys.maxIndex;
	const found: SpendableCoin[] = [];

	for (let batch = 0; batch < maxBatches; batch++) {
		const start = first + batch * batchSize;
		if (last !== undefined && start > last) break;
		const end = last !== undefined ? Math.min(start + batchSize - 1, last) : start + batchSize - 1;

		let hits = 0;
		for (let index = start; index <= end; index++) {
			const publicKey = keys.publicKeyAt(index).publicKey;
			const records = await node.getUnspentCoins(puzzleHashForPublicKey(publicKey));
			const unspent = records.filter((r) => !r.spent);
			if (unspent.length > 0) hits++;
			for (const r of unspent) {
				found.push({
					coin: r.coin,
					derivationIndex: index,
					publicKey,
					timestamp: r.timestamp,
				});
			}
		}
		logger.debug('Scanned indices {start}..{end}', { start, end, hits });
		if (hits === 0) break;
	}

	logger.info('Discovered {count} coins', {
		count: found.length,
		puzzleHashes: new Set(found.map((c) => Bytes.toHex(c.coin.puzzleHash))).size,
		ms: timer.elapsed(),
	});
	return found;
}
