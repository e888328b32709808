// ==========================
// Public API Surface
// ==========================

// Online machine: addresses, discovery, unsigned bundles
export {
	encodeAddress,
	decodeAddress,
	generateAddress,
	puzzleHashForPublicKey,
} from './wallet/AddressCodec';
export {
	discoverCoins,
	type CoinRecord,
	type FullNodeQuery,
	type FullNodeBroadcast,
	type PushTxResult,
} from './wallet/CoinSource';
export { ObserverKeySource, ExportedKeySource, type PublicKeySource } from './wallet/KeySource';
export { type SelectCoins, selectCoinsOldestFirst } from './wallet/selectCoins';
export {
	UnsignedBundleBuilder,
	assembleSpendBundle,
	type PaymentRequest,
} from './wallet/UnsignedBundleBuilder';

// Offline machine: signing and key export
export { OfflineSigner } from './wallet/OfflineSigner';
export {
	createPublicKeyExport,
	encodePublicKeyExport,
	decodePublicKeyExport,
	keySourceFromExport,
	type PublicKeyExport,
	type PublicKeyExportOptions,
} from './wallet/PublicKeyExport';

// Exchange format and verification
export { encodeSpendBundle, decodeSpendBundle } from './wallet/SpendBundleCodec';
export { verifySpendBundle, type VerificationResult } from './wallet/verifySpendBundle';

// Evaluation, cost and network parameters
export { DEFAULT_COST_MODEL, spendCost, bundleCost, validateCost } from './wallet/Cost';
export {
	evaluateSpends,
	checkPuzzleReveal,
	signingMessagesFor,
	bundleBindingMessage,
	missingAnnouncements,
	assertFeeAndBalance,
	type EvaluatedSpend,
	type BundleEvaluation,
} from './wallet/SpendEvaluation';
export {
	STANDARD_PUZZLE_MOD,
	DEFAULT_HIDDEN_PUZZLE,
	DEFAULT_HIDDEN_PUZZLE_HASH,
	puzzleForPublicKey,
	publicKeyOfStandardPuzzle,
	solutionForConditions,
	standardPuzzleRunner,
	type PuzzleRunner,
} from './wallet/StandardPuzzle';
export {
	conditionToProgram,
	conditionFromProgram,
	parseConditions,
	createCoin,
	reserveFee,
	createCoinAnnouncement,
	assertCoinAnnouncement,
} from './wallet/Conditions';
export { MAINNET, TESTNET, KNOWN_NETWORKS, MAX_BLOCK_COST, networkForPrefix } from './wallet/networks';
export type * from './wallet/types/config';

// Shared models & primitives
export { Program, curry, uncurry, intToBytes, bytesToInt } from './model/Program';
export { coinId, coinIdHex, announcementId } from './model/Coin';
export * from './model/Errors';
export type * from './model/types';
export { ConditionOpcode } from './model/types';

// Keys
export {
	PrivateKeyNode,
	PublicKeyNode,
	parseKeyPath,
	formatKeyPath,
	walletKeyPath,
	withPrivateKey,
	syntheticOffset,
	syntheticPublicKey,
	WALLET_ROOT_PATH,
	aggregateSignatures,
	verifyAggregate,
	keyFingerprint,
	type KeyPath,
	type KeyPathStep,
	type DerivationScheme,
	type PublicKeyMessagePair,
} from './crypto';
export { generateNewMnemonic, isValidMnemonic, deriveSeedFromMnemonic } from './secrets';

// Utils
export { Bytes } from './utils/Bytes';
export { ConsoleLogger, NULL_LOGGER, type Logger, type LogLevel } from './logger';
