import { type Logger, failIf, NULL_LOGGER } from '../logger';
import { CostExceededError } from '../model/Errors';
import { type CoinSpend } from '../model/types/coin';
import { type Condition } from '../model/types/condition';
import { type CostModel } from './types/config';

export const DEFAULT_COST_MODEL: CostModel = {
	baseCost: 500_000,
	costPerByte: 12_000,
	conditionCosts: {
		AGG_SIG_ME: 1_200_000,
		CREATE_COIN: 1_800_000,
	},
};

export function spendCost(
	spend: CoinSpend,
	conditions: readonly Condition[],
	model: CostModel = DEFAULT_COST_MODEL,
): number {
	const bytes = spend.puzzleReveal.serialize().length + spend.solution.serialize().length;
	const conditionCost = conditions.reduce(
		(sum, c) => sum + (c.type === 'UNKNOWN' ? 0 : (model.conditionCosts[c.type] ?? 0)),
		0,
	);
	return model.baseCost + bytes * model.costPerByte + conditionCost;
}

export function bundleCost(spendCosts: readonly number[]): number {
	return spendCosts.reduce((sum, c) => sum + c, 0);
}

/**
 * Reject a bundle whose cost is above the block limit. The ledger applies the same check again at
 * broadcast time.
 *
 * @throws {CostExceededError}
 */
export function validateCost(cost: number, maxCost: number, logger: Logger = NULL_LOGGER): void {
	failIf(cost > maxCost, () => new CostExceededError(cost, maxCost), logger);
}
