import { describe, test, expect } from 'vitest';
import { BundleFormatError } from '../../src/model/Errors';
import { decodeSpendBundle, encodeSpendBundle } from '../../src/wallet/SpendBundleCodec';
import { UnsignedBundleBuilder } from '../../src/wallet/UnsignedBundleBuilder';
import { verifySpendBundle } from '../../src/wallet/verifySpendBundle';
import { RECIPIENT, coinAt, walletPair } from '../fixtures';

const { signer, keys } = walletPair();
const tx = new UnsignedBundleBuilder(keys).build({
	coins: [coinAt(keys, 0, 2n ** 60n, 1)],
	outputs: [{ puzzleHash: RECIPIENT, amount: 1000n }],
	fee: 10n,
});

describe('spend bundle exchange format', () => {
	test('unsigned bundle survives a round trip', () => {
		const json = encodeSpendBundle(tx.bundle);
		const decoded = decodeSpendBundle(json);
		expect(encodeSpendBundle(decoded)).toBe(json);
		expect(decoded.aggregatedSignature).toBeUndefined();
		expect(decoded.metadata).toEqual(tx.bundle.metadata);
		expect(decoded.coinSpends[0].coin).toEqual(tx.bundle.coinSpends[0].coin);
		expect(Object.keys(JSON.parse(json))).toEqual(['coin_spends', 'metadata']);
	});

	test('signed bundle decoded on the other side still verifies', () => {
		const signedJson = encodeSpendBundle(signer.sign(decodeSpendBundle(encodeSpendBundle(tx.bundle))));
		expect(Object.keys(JSON.parse(signedJson))).toEqual([
			'coin_spends',
			'aggregated_signature',
			'metadata',
		]);
		expect(verifySpendBundle(decodeSpendBundle(signedJson)).valid).toBe(true);
	});

	test('amounts beyond the safe integer range are strings', () => {
		const obj = JSON.parse(encodeSpendBundle(tx.bundle));
		expect(obj.coin_spends[0].coin.amount).toBe('1152921504606846976');
		expect(obj.metadata.fee).toBe(10);
		expect(obj.metadata.network).toBe('xch');
		expect(obj.metadata.spends).toEqual([
			{ coin_id: obj.metadata.spends[0].coin_id, derivation_index: 0 },
		]);
		expect(obj.coin_spends[0].puzzle_reveal).toMatch(/^0x[0-9a-f]+$/);
	});

	test('rejects malformed documents', () => {
		const obj = JSON.parse(encodeSpendBundle(tx.bundle));
		const withMetadata = (metadata: unknown) => JSON.stringify({ ...obj, metadata });

		expect(() => decodeSpendBundle('not json')).toThrow(BundleFormatError);
		expect(() => decodeSpendBundle('[]')).toThrow('spend bundle must be a JSON object');
		expect(() => decodeSpendBundle(withMetadata(undefined))).toThrow(
			'metadata must be a JSON object',
		);
		expect(() => decodeSpendBundle(withMetadata({ ...obj.metadata, fee: -1 }))).toThrow(
			'metadata.fee must be a non-negative integer',
		);
		expect(() =>
			decodeSpendBundle(JSON.stringify({ ...obj, aggregated_signature: '0x00' })),
		).toThrow('aggregated_signature must be 96 bytes, got 1');
	});

	test('rejects hex without a prefix and programs that do not parse', () => {
		const obj = JSON.parse(encodeSpendBundle(tx.bundle));
		const [spend] = obj.coin_spends;
		const withSpend = (patch: object) =>
			JSON.stringify({ ...obj, coin_spends: [{ ...spend, ...patch }] });

		expect(() =>
			decodeSpendBundle(
				withSpend({ coin: { ...spend.coin, puzzle_hash: spend.coin.puzzle_hash.slice(2) } }),
			),
		).toThrow('coin_spends[0].coin.puzzle_hash must be a 0x-prefixed hex string');
		expect(() => decodeSpendBundle(withSpend({ solution: '0xff' }))).toThrow(BundleFormatError);
	});
});
