import { type Program } from '../Program';

/**
 * An unspent (or spent) output of the ledger. Identity is
 * sha256(parentCoinId || puzzleHash || amount).
 */
export type Coin = {
	/**
	 * Id of the coin whose spend created this one (32 bytes).
	 */
	parentCoinId: Uint8Array;
	/**
	 * Tree hash of the puzzle that locks the coin (32 bytes).
	 */
	puzzleHash: Uint8Array;
	/**
	 * Amount in the ledger's smallest unit.
	 */
	amount: bigint;
};

/**
 * A coin together with the program that unlocks it and the arguments it is run with.
 */
export type CoinSpend = {
	coin: Coin;
	/**
	 * Must tree-hash to `coin.puzzleHash`.
	 */
	puzzleReveal: Program;
	solution: Program;
};

/**
 * A coin as reported by the full node, tagged with the wallet key that controls it.
 */
export type SpendableCoin = {
	coin: Coin;
	/**
	 * Leaf index of the wallet key whose standard puzzle locks the coin.
	 */
	derivationIndex: number;
	/**
	 * Compressed G1 public key at that index (48 bytes).
	 */
	publicKey: Uint8Array;
	/**
	 * Unix seconds of the block that confirmed the coin, used by coin selection.
	 */
	timestamp?: number;
};

/**
 * A requested payment: a new coin locked to `puzzleHash`.
 */
export type PaymentOutput = {
	puzzleHash: Uint8Array;
	amount: bigint;
};
