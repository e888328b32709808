/**
 * Stable identifiers for every failure the library reports. Callers can switch on `error.code`
 * instead of matching messages.
 */
export type SpendBundleErrorCode =
	| 'INSUFFICIENT_FUNDS'
	| 'COST_EXCEEDED'
	| 'INVALID_PUZZLE_REVEAL'
	| 'KEY_PATH_MISMATCH'
	| 'PARTIAL_BUNDLE'
	| 'INVALID_CHECKSUM'
	| 'UNKNOWN_PREFIX'
	| 'AGGREGATION_DEGENERATE'
	| 'INVALID_DERIVATION_INDEX'
	| 'HARDENED_DERIVATION'
	| 'BUNDLE_FORMAT'
	| 'INVALID_AMOUNT'
	| 'DUPLICATE_OUTPUT'
	| 'KEY_RELEASED'
	| 'NODE_NOT_SYNCED';

/** Base class of all errors thrown by this library. */
export class SpendBundleError extends Error {
	code: SpendBundleErrorCode;

	constructor(code: SpendBundleErrorCode, message: string) {
		super(message);
		this.code = code;
		this.name = 'SpendBundleError';
		Object.setPrototypeOf(this, SpendBundleError.prototype);
	}
}

/** This error is thrown when the candidate coins cannot cover the outputs plus fee. */
export class InsufficientFundsError extends SpendBundleError {
	available: bigint;
	required: bigint;

	constructor(available: bigint, required: bigint) {
		super(
			'INSUFFICIENT_FUNDS',
			`Not enough coins, total value ${available}, need ${required}`,
		);
		this.available = available;
		this.required = required;
		this.name = 'InsufficientFundsError';
		Object.setPrototypeOf(this, InsufficientFundsError.prototype);
	}
}

/** This error is thrown when a bundle costs more than the ledger accepts in one block. */
export class CostExceededError extends SpendBundleError {
	cost: number;
	maxCost: number;

	constructor(cost: number, maxCost: number) {
		super('COST_EXCEEDED', `Bundle cost ${cost} exceeds maximum block cost ${maxCost}`);
		this.cost = cost;
		this.maxCost = maxCost;
		this.name = 'CostExceededError';
		Object.setPrototypeOf(this, CostExceededError.prototype);
	}
}

/** This error is thrown when a puzzle reveal does not hash to its coin's puzzle hash. */
export class InvalidPuzzleRevealError extends SpendBundleError {
	coinId: string;

	constructor(coinId: string) {
		super('INVALID_PUZZLE_REVEAL', `Puzzle reveal does not match puzzle hash of coin ${coinId}`);
		this.coinId = coinId;
		this.name = 'InvalidPuzzleRevealError';
		Object.setPrototypeOf(this, InvalidPuzzleRevealError.prototype);
	}
}

/** This error is thrown when a coin is not controlled by the key at the path recorded for it. */
export class KeyPathMismatchError extends SpendBundleError {
	constructor(message: string) {
		super('KEY_PATH_MISMATCH', message);
		this.name = 'KeyPathMismatchError';
		Object.setPrototypeOf(this, KeyPathMismatchError.prototype);
	}
}

/** This error is thrown when a bundle references spend data it does not carry. */
export class PartialBundleError extends SpendBundleError {
	constructor(message: string) {
		super('PARTIAL_BUNDLE', message);
		this.name = 'PartialBundleError';
		Object.setPrototypeOf(this, PartialBundleError.prototype);
	}
}

export class InvalidChecksumError extends SpendBundleError {
	constructor(message: string) {
		super('INVALID_CHECKSUM', message);
		this.name = 'InvalidChecksumError';
		Object.setPrototypeOf(this, InvalidChecksumError.prototype);
	}
}

export class UnknownPrefixError extends SpendBundleError {
	prefix: string;

	constructor(prefix: string) {
		super('UNKNOWN_PREFIX', `Unknown address prefix "${prefix}"`);
		this.prefix = prefix;
		this.name = 'UnknownPrefixError';
		Object.setPrototypeOf(this, UnknownPrefixError.prototype);
	}
}

/** This error is thrown for a bundle, or a signature set, with nothing in it. */
export class AggregationDegenerateError extends SpendBundleError {
	constructor(message = 'Cannot build or aggregate a bundle with zero coin spends') {
		super('AGGREGATION_DEGENERATE', message);
		this.name = 'AggregationDegenerateError';
		Object.setPrototypeOf(this, AggregationDegenerateError.prototype);
	}
}

export class InvalidDerivationIndexError extends SpendBundleError {
	constructor(index: unknown) {
		super(
			'INVALID_DERIVATION_INDEX',
			`Invalid derivation index ${String(index)}, expected an integer in [0, 2^32 - 1]`,
		);
		this.name = 'InvalidDerivationIndexError';
		Object.setPrototypeOf(this, InvalidDerivationIndexError.prototype);
	}
}

/** This error is thrown when a hardened step is requested from a public-only key. */
export class HardenedDerivationError extends SpendBundleError {
	constructor(index: number) {
		super(
			'HARDENED_DERIVATION',
			`Hardened index ${index} cannot be derived without the parent private key`,
		);
		this.name = 'HardenedDerivationError';
		Object.setPrototypeOf(this, HardenedDerivationError.prototype);
	}
}

/** This error is thrown when an exchange document or export file cannot be decoded. */
export class BundleFormatError extends SpendBundleError {
	constructor(message: string) {
		super('BUNDLE_FORMAT', message);
		this.name = 'BundleFormatError';
		Object.setPrototypeOf(this, BundleFormatError.prototype);
	}
}

export class InvalidAmountError extends SpendBundleError {
	constructor(message: string) {
		super('INVALID_AMOUNT', message);
		this.name = 'InvalidAmountError';
		Object.setPrototypeOf(this, InvalidAmountError.prototype);
	}
}

/** Two outputs with the same puzzle hash and amount would create the same coin id. */
export class DuplicateOutputError extends SpendBundleError {
	constructor(puzzleHash: string, amount: bigint) {
		super('DUPLICATE_OUTPUT', `Output ${puzzleHash} with amount ${amount} appears more than once`);
		this.name = 'DuplicateOutputError';
		Object.setPrototypeOf(this, DuplicateOutputError.prototype);
	}
}

export class KeyReleasedError extends SpendBundleError {
	constructor() {
		super('KEY_RELEASED', 'Private key material has already been released');
		this.name = 'KeyReleasedError';
		Object.setPrototypeOf(this, KeyReleasedError.prototype);
	}
}

/** The full node is behind the chain tip, so the coins it reports may already be spent. */
export class NodeNotSyncedError extends SpendBundleError {
	constructor() {
		super('NODE_NOT_SYNCED', 'Full node is not synced, wait for it to catch up and try again');
		this.name = 'NodeNotSyncedError';
		Object.setPrototypeOf(this, NodeNotSyncedError.prototype);
	}
}
