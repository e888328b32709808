import { describe, test, expect } from 'vitest';
import { syntheticPublicKey } from '../../src/crypto/derivation';
import { Bytes } from '../../src/utils/Bytes';
import { createCoin, parseConditions } from '../../src/wallet/Conditions';
import {
	DEFAULT_HIDDEN_PUZZLE,
	DEFAULT_HIDDEN_PUZZLE_HASH,
	publicKeyOfStandardPuzzle,
	puzzleForPublicKey,
	puzzleHashForPublicKey,
	solutionForConditions,
	standardPuzzleRunner,
} from '../../src/wallet/StandardPuzzle';
import { RECIPIENT, walletPair } from '../fixtures';

const { keys } = walletPair();
const publicKey = keys.publicKeyAt(0).publicKey;

describe('standard puzzle', () => {
	test('hidden puzzle is (=)', () => {
		expect(DEFAULT_HIDDEN_PUZZLE.toHex()).toBe('ff0980');
		expect(Bytes.toHex(DEFAULT_HIDDEN_PUZZLE_HASH)).toBe(
			'711d6c4e32c92e53179b199484cf8c897542bc57f2b22582799f9d657eec4699',
		);
	});

	test('is curried with the synthetic key', () => {
		const synthetic = syntheticPublicKey(publicKey, DEFAULT_HIDDEN_PUZZLE_HASH);
		expect(publicKeyOfStandardPuzzle(puzzleForPublicKey(publicKey))).toEqual(synthetic);
		expect(puzzleHashForPublicKey(publicKey)).not.toEqual(
			puzzleHashForPublicKey(publicKey, new Uint8Array(32)),
		);
	});

	test('asks the synthetic key to sign the solution', () => {
		const solution = solutionForConditions([createCoin(RECIPIENT, 5n)]);
		const conditions = parseConditions(
			standardPuzzleRunner.run(puzzleForPublicKey(publicKey), solution),
		);
		expect(conditions).toEqual([
			{
				type: 'AGG_SIG_ME',
				publicKey: syntheticPublicKey(publicKey, DEFAULT_HIDDEN_PUZZLE_HASH),
				message: solution.treeHash(),
			},
			{ type: 'CREATE_COIN', puzzleHash: RECIPIENT, amount: 5n },
		]);
	});
});
