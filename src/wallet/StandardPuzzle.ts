import { G1_LENGTH } from '../crypto/core';
import { syntheticPublicKey } from '../crypto/derivation';
import { Program, curry, uncurry } from '../model/Program';
import { type Condition } from '../model/types/condition';
import { Bytes } from '../utils/Bytes';
import { conditionFromProgram, conditionToProgram } from './Conditions';

/**
 * Module of the standard puzzle. Curried with a public key it locks a coin to that key: the
 * solution is a list of conditions, which the puzzle passes through after prepending
 * `AGG_SIG_ME(key, treeHash(solution))`, so the key signs exactly those conditions.
 */
export const STANDARD_PUZZLE_MOD: Program = Program.fromText('p2_delegated_conditions/v1');

/** `(=)`, the hidden puzzle wallet keys are offset by. */
export const DEFAULT_HIDDEN_PUZZLE: Program = Program.cons(
	Program.fromAtom(Uint8Array.of(0x09)),
	Program.NIL,
);

export const DEFAULT_HIDDEN_PUZZLE_HASH: Uint8Array = DEFAULT_HIDDEN_PUZZLE.treeHash();

/**
 * Evaluates a puzzle reveal against its solution and returns the condition list it outputs.
 * Program evaluation is supplied by the caller; {@link standardPuzzleRunner} covers coins locked
 * by the standard puzzle.
 */
export interface PuzzleRunner {
	run(puzzle: Program, solution: Program): Program;
}

/**
 * Standard puzzle for a wallet key. The puzzle is curried with the key's synthetic form, so the
 * coin is spent with signatures from the matching synthetic secret key.
 */
export function puzzleForPublicKey(
	publicKey: Uint8Array,
	hiddenPuzzleHash: Uint8Array = DEFAULT_HIDDEN_PUZZLE_HASH,
): Program {
	if (publicKey.length !== G1_LENGTH) {
		throw new Error(`Invalid public key length ${publicKey.length}, expected ${G1_LENGTH}`);
	}
	return curry(STANDARD_PUZZLE_MOD, [
		Program.fromAtom(syntheticPublicKey(publicKey, hiddenPuzzleHash)),
	]);
}

export function puzzleHashForPublicKey(
	publicKey: Uint8Array,
	hiddenPuzzleHash: Uint8Array = DEFAULT_HIDDEN_PUZZLE_HASH,
): Uint8Array {
	return puzzleForPublicKey(publicKey, hiddenPuzzleHash).treeHash();
}

/**
 * The synthetic key a standard puzzle is curried with, or `undefined` for any other program.
 */
export function publicKeyOfStandardPuzzle(puzzle: Program): Uint8Array | undefined {
	const curried = uncurry(puzzle);
	if (!curried || !curried.mod.equals(STANDARD_PUZZLE_MOD) || curried.args.length !== 1) {
		return undefined;
	}
	const [key] = curried.args;
	if (!key.isAtom || key.asAtom().length !== G1_LENGTH) return undefined;
	return key.asAtom();
}

export function solutionForConditions(conditions: Condition[]): Program {
	return Program.fromList(conditions.map(conditionToProgram));
}

export const standardPuzzleRunner: PuzzleRunner = {
	run(puzzle: Program, solution: Program): Program {
		const publicKey = publicKeyOfStandardPuzzle(puzzle);
		if (!publicKey) {
			throw new Error(`Unsupported puzzle ${Bytes.toPrefixedHex(puzzle.treeHash())}`);
		}
		// validates shape of every delegated condition
		solution.toList().forEach(conditionFromProgram);
		const signature = conditionToProgram({
			type: 'AGG_SIG_ME',
			publicKey,
			message: solution.treeHash(),
		});
		return Program.cons(signature, solution);
	},
};
