import { type Program } from '../Program';

/**
 * Opcodes of the conditions this library emits or interprets.
 */
export const ConditionOpcode = {
	AGG_SIG_ME: 50,
	CREATE_COIN: 51,
	RESERVE_FEE: 52,
	CREATE_COIN_ANNOUNCEMENT: 60,
	ASSERT_COIN_ANNOUNCEMENT: 61,
} as const;

export type ConditionType = keyof typeof ConditionOpcode;

/**
 * Output of running a puzzle with its solution. Announcements are first-class variants since a
 * bundle's atomicity rests on them.
 */
export type Condition =
	| {
			type: 'AGG_SIG_ME';
			/**
			 * Compressed G1 key that must sign.
			 */
			publicKey: Uint8Array;
			/**
			 * Message prefix; the coin id and the network's additional data are appended.
			 */
			message: Uint8Array;
	  }
	| { type: 'CREATE_COIN'; puzzleHash: Uint8Array; amount: bigint }
	| { type: 'RESERVE_FEE'; amount: bigint }
	| { type: 'CREATE_COIN_ANNOUNCEMENT'; message: Uint8Array }
	| {
			type: 'ASSERT_COIN_ANNOUNCEMENT';
			/**
			 * sha256(announcing coin id || message).
			 */
			announcementId: Uint8Array;
	  }
	| { type: 'UNKNOWN'; opcode: number; args: Program[] };
