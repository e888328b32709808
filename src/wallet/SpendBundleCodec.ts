import { G2_LENGTH } from '../crypto/core';
import { BundleFormatError } from '../model/Errors';
import { Program } from '../model/Program';
import {
	type BundleMetadata,
	type SpendBundleDocument,
	type SpendManifestEntry,
} from '../model/types/bundle';
import { type CoinSpend } from '../model/types/coin';
import { Bytes } from '../utils/Bytes';
import {
	amountToJson,
	expectAmount,
	expectArray,
	expectHex,
	expectObject,
	expectString,
	expectUint,
	parseJsonObject,
} from '../utils/json';

/*
 * Exchange document carried between the online and the offline machine:
 *
 * {
 *   "coin_spends": [{ "coin": { "parent_coin_info", "puzzle_hash", "amount" },
 *                     "puzzle_reveal", "solution" }],
 *   "aggregated_signature"?: "0x...",
 *   "metadata": { "fee", "network", "key_fingerprint"?, "spends": [{ "coin_id", "derivation_index"? }] }
 * }
 *
 * Byte strings are 0x-prefixed hex, programs in their serialized form.
 */

function encodeProgram(p: Program): string {
	return `0x${p.toHex()}`;
}

function decodeProgram(value: unknown, what: string): Program {
	const bytes = expectHex(value, what);
	try {
		return Program.deserialize(bytes);
	} catch (e) {
		throw new BundleFormatError(`${what}: ${e instanceof Error ? e.message : String(e)}`);
	}
}

function coinSpendToJson(spend: CoinSpend) {
	return {
		coin: {
			parent_coin_info: Bytes.toPrefixedHex(spend.coin.parentCoinId),
			puzzle_hash: Bytes.toPrefixedHex(spend.coin.puzzleHash),
			amount: amountToJson(spend.coin.amount),
		},
		puzzle_reveal: encodeProgram(spend.puzzleReveal),
		solution: encodeProgram(spend.solution),
	};
}

function metadataToJson(metadata: BundleMetadata) {
	return {
		fee: amountToJson(metadata.fee),
		network: metadata.network,
		...(metadata.keyFingerprint !== undefined ? { key_fingerprint: metadata.keyFingerprint } : {}),
		spends: metadata.spends.map((s) => ({
			coin_id: Bytes.toPrefixedHex(s.coinId),
			...(s.derivationIndex !== undefined ? { derivation_index: s.derivationIndex } : {}),
		})),
	};
}

export function encodeSpendBundle(doc: SpendBundleDocument): string {
	return JSON.stringify(
		{
			coin_spends: doc.coinSpends.map(coinSpendToJson),
			...(doc.aggregatedSignature
				? { aggregated_signature: Bytes.toPrefixedHex(doc.aggregatedSignature) }
				: {}),
			metadata: metadataToJson(doc.metadata),
		},
		null,
		2,
	);
}

function coinSpendFromJson(value: unknown, i: number): CoinSpend {
	const where = `coin_spends[${i}]`;
	const obj = expectObject(value, where);
	const coin = expectObject(obj.coin, `${where}.coin`);
	return {
		coin: {
			parentCoinId: expectHex(coin.parent_coin_info, `${where}.coin.parent_coin_info`, 32),
			puzzleHash: expectHex(coin.puzzle_hash, `${where}.coin.puzzle_hash`, 32),
			amount: expectAmount(coin.amount, `${where}.coin.amount`),
		},
		puzzleReveal: decodeProgram(obj.puzzle_reveal, `${where}.puzzle_reveal`),
		solution: decodeProgram(obj.solution, `${where}.solution`),
	};
}

function manifestEntryFromJson(value: unknown, i: number): SpendManifestEntry {
	const where = `metadata.spends[${i}]`;
	const obj = expectObject(value, where);
	const entry: SpendManifestEntry = { coinId: expectHex(obj.coin_id, `${where}.coin_id`, 32) };
	if (obj.derivation_index !== undefined) {
		entry.derivationIndex = expectUint(obj.derivation_index, `${where}.derivation_index`);
	}
	return entry;
}

function metadataFromJson(value: unknown): BundleMetadata {
	const obj = expectObject(value, 'metadata');
	const metadata: BundleMetadata = {
		fee: expectAmount(obj.fee, 'metadata.fee'),
		network: expectString(obj.network, 'metadata.network'),
		spends: [],
	};
	if (obj.key_fingerprint !== undefined) {
		metadata.keyFingerprint = expectUint(obj.key_fingerprint, 'metadata.key_fingerprint');
	}
	metadata.spends = expectArray(obj.spends, 'metadata.spends').map(manifestEntryFromJson);
	return metadata;
}

/**
 * Parse an exchange document.
 *
 * @throws {BundleFormatError} On malformed JSON, a missing field or a value of the wrong shape.
 */
export function decodeSpendBundle(json: string): SpendBundleDocument {
	const obj = parseJsonObject(json, 'spend bundle');
	const doc: SpendBundleDocument = {
		coinSpends: expectArray(obj.coin_spends, 'coin_spends').map(coinSpendFromJson),
		metadata: metadataFromJson(obj.metadata),
	};
	if (obj.aggregated_signature !== undefined) {
		doc.aggregatedSignature = expectHex(obj.aggregated_signature, 'aggregated_signature', G2_LENGTH);
	}
	return doc;
}
