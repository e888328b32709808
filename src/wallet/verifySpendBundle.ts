import { g2FromBytes } from '../crypto/core';
import { verifyAggregate } from '../crypto/aggregate';
import { NULL_LOGGER } from '../logger';
import { announcementId, sumAmounts } from '../model/Coin';
import { type SpendBundleDocument } from '../model/types/bundle';
import { Bytes } from '../utils/Bytes';
import { MAINNET } from './networks';
import {
	type BundleEvaluation,
	bundleBindingMessage,
	conditionsOfType,
	evaluateSpends,
	missingAnnouncements,
	signingMessagesFor,
} from './SpendEvaluation';
import { type EvaluationOptions } from './types/config';

export type VerificationResult =
	| { valid: true; cost: number; fee: bigint }
	| { valid: false; reason: string };

const invalid = (reason: string): VerificationResult => ({ valid: false, reason });

/**
 * Check a signed bundle the way the ledger would before broadcasting it.
 *
 * Besides the aggregate signature this checks the binding between the spends: the first spend
 * must announce the hash of all coin ids in order and every other spend must assert that
 * announcement. Dropping or reordering a spend therefore fails verification.
 *
 * Problems are reported in the result, never thrown.
 */
export function verifySpendBundle(
	doc: SpendBundleDocument,
	options: EvaluationOptions = {},
): VerificationResult {
	const logger = options.logger ?? NULL_LOGGER;
	const network = options.network ?? MAINNET;
	if (!doc.aggregatedSignature) return invalid('Bundle is not signed');
	if (doc.metadata.network !== network.prefix) {
		return invalid(`Bundle is for network "${doc.metadata.network}", expected "${network.prefix}"`);
	}

	let evaluation: BundleEvaluation;
	try {
		evaluation = evaluateSpends(doc.coinSpends, { ...options, logger: NULL_LOGGER });
	} catch (e) {
		return invalid(e instanceof Error ? e.message : String(e));
	}
	const spends = evaluation.spends;

	const missing = missingAnnouncements(spends);
	if (missing.length > 0) {
		return invalid(`Announcement ${Bytes.toPrefixedHex(missing[0])} is not created in this bundle`);
	}

	const [primary, ...others] = spends;
	const binding = bundleBindingMessage(spends.map((s) => s.coinId));
	const announces = primary.conditions.some(
		(c) => c.type === 'CREATE_COIN_ANNOUNCEMENT' && Bytes.equals(c.message, binding),
	);
	if (!announces) return invalid('First spend does not announce the bundle coin ids');
	const expected = announcementId(primary.coinId, binding);
	for (const s of others) {
		const asserts = s.conditions.some(
			(c) => c.type === 'ASSERT_COIN_ANNOUNCEMENT' && Bytes.equals(c.announcementId, expected),
		);
		if (!asserts) {
			return invalid(`Spend of ${Bytes.toPrefixedHex(s.coinId)} does not assert the bundle announcement`);
		}
	}

	const fee = sumAmounts(conditionsOfType(spends, 'RESERVE_FEE').map((c) => c.amount));
	if (fee !== doc.metadata.fee) {
		return invalid(`Reserved fee ${fee} differs from declared fee ${doc.metadata.fee}`);
	}
	const inputs = sumAmounts(spends.map((s) => s.spend.coin.amount));
	const outputs = sumAmounts(conditionsOfType(spends, 'CREATE_COIN').map((c) => c.amount));
	if (inputs < outputs + fee) {
		return invalid(`Outputs ${outputs} plus fee ${fee} exceed inputs ${inputs}`);
	}

	const pairs = signingMessagesFor(spends, network.additionalData).map((m) => ({
		publicKey: m.publicKey,
		message: m.message,
	}));
	let signatureValid: boolean;
	try {
		signatureValid = verifyAggregate(g2FromBytes(doc.aggregatedSignature), pairs);
	} catch (e) {
		return invalid(`Malformed signature: ${e instanceof Error ? e.message : String(e)}`);
	}
	if (!signatureValid) return invalid('Aggregated signature does not verify');

	logger.debug('Verified bundle', { spends: spends.length, cost: evaluation.cost });
	return { valid: true, cost: evaluation.cost, fee };
}
