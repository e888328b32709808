import { sha256 } from '@noble/hashes/sha2.js';
import { Bytes } from '../utils/Bytes';
import { intToBytes } from './Program';
import { type Coin } from './types/coin';

export function coinId(coin: Coin): Uint8Array {
	return sha256(Bytes.concat(coin.parentCoinId, coin.puzzleHash, intToBytes(coin.amount)));
}

export function coinIdHex(coin: Coin): string {
	return Bytes.toPrefixedHex(coinId(coin));
}

/**
 * Id of an announcement made by `announcerId`, as referenced by ASSERT_COIN_ANNOUNCEMENT.
 */
export function announcementId(announcerId: Uint8Array, message: Uint8Array): Uint8Array {
	return sha256(Bytes.concat(announcerId, message));
}

export function sumAmounts(amounts: Iterable<bigint>): bigint {
	let total = 0n;
	for (const a of amounts) total += a;
	return total;
}
