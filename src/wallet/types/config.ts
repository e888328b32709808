import { type Logger } from '../../logger';
import { type DerivationScheme } from '../../crypto/derivation';
import { type ConditionType } from '../../model/types/condition';
import { type PuzzleRunner } from '../StandardPuzzle';
import { type SelectCoins } from '../selectCoins';

/**
 * Parameters of one ledger network.
 */
export type NetworkConfig = {
	name: string;
	/**
	 * Human readable part of addresses on this network.
	 */
	prefix: string;
	/**
	 * Appended to every AGG_SIG_ME message so a signature is only valid on this network.
	 */
	additionalData: Uint8Array;
	/**
	 * Largest total cost of the spends in one block.
	 */
	maxBlockCost: number;
};

/**
 * Cost of a spend: `baseCost + costPerByte * (reveal + solution bytes) + sum(conditionCosts)`.
 */
export type CostModel = {
	baseCost: number;
	costPerByte: number;
	/**
	 * Per-opcode cost. Opcodes without an entry cost nothing.
	 */
	conditionCosts: Partial<Record<ConditionType, number>>;
};

/**
 * Options shared by everything that evaluates spends.
 */
export interface EvaluationOptions {
	/**
	 * @default MAINNET
	 */
	network?: NetworkConfig;
	/**
	 * @default DEFAULT_COST_MODEL
	 */
	costModel?: CostModel;
	/**
	 * Evaluates puzzle reveals; the default understands the standard puzzle only.
	 */
	runner?: PuzzleRunner;
	logger?: Logger;
}

export interface BuilderOptions extends EvaluationOptions {
	/**
	 * Leaf index that receives change.
	 *
	 * @default One past the highest derivation index among the candidate coins, or the lowest free
	 *   index of an exported key range that ends below that.
	 */
	changeIndex?: number;
	/**
	 * @default selectCoinsOldestFirst
	 */
	selectCoins?: SelectCoins;
}

export interface SignerOptions extends EvaluationOptions {
	/**
	 * Must match the scheme the online machine derived its addresses with.
	 *
	 * @default 'observer'
	 */
	scheme?: DerivationScheme;
	/**
	 * Leaf indices searched for coins whose manifest entry carries no derivation index.
	 *
	 * @default 5000
	 */
	scanLimit?: number;
}

export type DiscoveryOptions = {
	/**
	 * Puzzle hashes derived and queried per round.
	 *
	 * @default 1000
	 */
	batchSize?: number;
	/**
	 * Upper bound on rounds, whatever the node returns.
	 *
	 * @default 1000
	 */
	maxBatches?: number;
	logger?: Logger;
};
