import { G1_LENGTH } from '../crypto/core';
import { Program } from '../model/Program';
import { type Condition, ConditionOpcode, type ConditionType } from '../model/types/condition';
import { Bytes } from '../utils/Bytes';

const HASH_LENGTH = 32;

const OPCODE_TO_TYPE = new Map<number, ConditionType>([
	[ConditionOpcode.AGG_SIG_ME, 'AGG_SIG_ME'],
	[ConditionOpcode.CREATE_COIN, 'CREATE_COIN'],
	[ConditionOpcode.RESERVE_FEE, 'RESERVE_FEE'],
	[ConditionOpcode.CREATE_COIN_ANNOUNCEMENT, 'CREATE_COIN_ANNOUNCEMENT'],
	[ConditionOpcode.ASSERT_COIN_ANNOUNCEMENT, 'ASSERT_COIN_ANNOUNCEMENT'],
]);

export function conditionToProgram(condition: Condition): Program {
	const op = (code: number) => Program.fromInt(code);
	switch (condition.type) {
		case 'AGG_SIG_ME':
			return Program.fromList([
				op(ConditionOpcode.AGG_SIG_ME),
				Program.fromAtom(condition.publicKey),
				Program.fromAtom(condition.message),
			]);
		case 'CREATE_COIN':
			return Program.fromList([
				op(ConditionOpcode.CREATE_COIN),
				Program.fromAtom(condition.puzzleHash),
				Program.fromInt(condition.amount),
			]);
		case 'RESERVE_FEE':
			return Program.fromList([op(ConditionOpcode.RESERVE_FEE), Program.fromInt(condition.amount)]);
		case 'CREATE_COIN_ANNOUNCEMENT':
			return Program.fromList([
				op(ConditionOpcode.CREATE_COIN_ANNOUNCEMENT),
				Program.fromAtom(condition.message),
			]);
		case 'ASSERT_COIN_ANNOUNCEMENT':
			return Program.fromList([
				op(ConditionOpcode.ASSERT_COIN_ANNOUNCEMENT),
				Program.fromAtom(condition.announcementId),
			]);
		case 'UNKNOWN':
			return Program.fromList([op(condition.opcode), ...condition.args]);
	}
}

function atomOfLength(p: Program | undefined, length: number, what: string): Uint8Array {
	if (!p) throw new Error(`Missing ${what}`);
	const atom = p.asAtom();
	if (atom.length !== length) {
		throw new Error(`Invalid ${what} length ${atom.length}, expected ${length}`);
	}
	return atom;
}

function amountOf(p: Program | undefined): bigint {
	if (!p) throw new Error('Missing amount');
	const amount = p.asInt();
	if (amount < 0n) throw new Error(`Negative amount ${amount}`);
	return amount;
}

/**
 * Decode one condition.
 *
 * @throws Error if a known opcode has malformed arguments.
 */
export function conditionFromProgram(program: Program): Condition {
	const [opAtom, ...args] = program.toList();
	if (!opAtom) throw new Error('Empty condition');
	const opcode = Number(opAtom.asInt());
	switch (OPCODE_TO_TYPE.get(opcode)) {
		case 'AGG_SIG_ME':
			return {
				type: 'AGG_SIG_ME',
				publicKey: atomOfLength(args[0], G1_LENGTH, 'public key'),
				message: (args[1] ?? Program.NIL).asAtom(),
			};
		case 'CREATE_COIN':
			return {
				type: 'CREATE_COIN',
				puzzleHash: atomOfLength(args[0], HASH_LENGTH, 'puzzle hash'),
				amount: amountOf(args[1]),
			};
		case 'RESERVE_FEE':
			return { type: 'RESERVE_FEE', amount: amountOf(args[0]) };
		case 'CREATE_COIN_ANNOUNCEMENT':
			return { type: 'CREATE_COIN_ANNOUNCEMENT', message: (args[0] ?? Program.NIL).asAtom() };
		case 'ASSERT_COIN_ANNOUNCEMENT':
			return {
				type: 'ASSERT_COIN_ANNOUNCEMENT',
				announcementId: atomOfLength(args[0], HASH_LENGTH, 'announcement id'),
			};
		default:
			return { type: 'UNKNOWN', opcode, args };
	}
}

export function parseConditions(list: Program): Condition[] {
	return list.toList().map(conditionFromProgram);
}

export const createCoin = (puzzleHash: Uint8Array, amount: bigint): Condition => ({
	type: 'CREATE_COIN',
	puzzleHash,
	amount,
});

export const reserveFee = (amount: bigint): Condition => ({ type: 'RESERVE_FEE', amount });

export const createCoinAnnouncement = (message: Uint8Array): Condition => ({
	type: 'CREATE_COIN_ANNOUNCEMENT',
	message,
});

export const assertCoinAnnouncement = (announcementId: Uint8Array): Condition => ({
	type: 'ASSERT_COIN_ANNOUNCEMENT',
	announcementId,
});

export function describeCondition(condition: Condition): string {
	switch (condition.type) {
		case 'CREATE_COIN':
			return `CREATE_COIN ${Bytes.toPrefixedHex(condition.puzzleHash)} ${condition.amount}`;
		case 'RESERVE_FEE':
			return `RESERVE_FEE ${condition.amount}`;
		case 'UNKNOWN':
			return `UNKNOWN(${condition.opcode})`;
		default:
			return condition.type;
	}
}
