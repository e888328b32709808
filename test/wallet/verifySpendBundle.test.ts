import { describe, test, expect } from 'vitest';
import { type SpendBundleDocument } from '../../src/model/types/bundle';
import { UnsignedBundleBuilder } from '../../src/wallet/UnsignedBundleBuilder';
import { verifySpendBundle } from '../../src/wallet/verifySpendBundle';
import { RECIPIENT, coinAt, walletPair } from '../fixtures';

const { signer, keys } = walletPair();

function signedPayment(amount = 50n): SpendBundleDocument {
	const tx = new UnsignedBundleBuilder(keys).build({
		coins: [coinAt(keys, 0, 10n, 1), coinAt(keys, 1, 20n, 2), coinAt(keys, 2, 30n, 3)],
		outputs: [{ puzzleHash: RECIPIENT, amount }],
		fee: 2n,
	});
	return signer.sign(tx.bundle);
}

const reasonOf = (doc: SpendBundleDocument) => {
	const result = verifySpendBundle(doc);
	return result.valid ? undefined : result.reason;
};

describe('verifySpendBundle', () => {
	const signed = signedPayment();

	test('accepts the signed bundle', () => {
		const result = verifySpendBundle(signed);
		expect(result.valid).toBe(true);
		expect(result).toMatchObject({ fee: 2n });
	});

	test('rejects an unsigned bundle', () => {
		const { aggregatedSignature: _signature, ...unsigned } = signed;
		expect(reasonOf(unsigned)).toBe('Bundle is not signed');
	});

	test('reordering spends breaks the binding', () => {
		const [a, b, c] = signed.coinSpends;
		expect(reasonOf({ ...signed, coinSpends: [a, c, b] })).toBe(
			'First spend does not announce the bundle coin ids',
		);
		expect(reasonOf({ ...signed, coinSpends: [b, a, c] })).toBe(
			'First spend does not announce the bundle coin ids',
		);
	});

	test('removing any spend breaks the binding', () => {
		const [a, b, c] = signed.coinSpends;
		expect(reasonOf({ ...signed, coinSpends: [a, b] })).toBe(
			'First spend does not announce the bundle coin ids',
		);
		expect(reasonOf({ ...signed, coinSpends: [b, c] })).toMatch(
			/^Announcement 0x[0-9a-f]{64} is not created in this bundle$/,
		);
	});

	test('a signature from another bundle does not verify', () => {
		const other = signedPayment(49n);
		expect(reasonOf({ ...signed, aggregatedSignature: other.aggregatedSignature })).toBe(
			'Aggregated signature does not verify',
		);
	});

	test('a malformed signature is reported', () => {
		const reason = reasonOf({ ...signed, aggregatedSignature: new Uint8Array(96) });
		expect(reason?.startsWith('Malformed signature: ')).toBe(true);
	});

	test('a declared fee that differs from the reservation is reported', () => {
		expect(reasonOf({ ...signed, metadata: { ...signed.metadata, fee: 3n } })).toBe(
			'Reserved fee 2 differs from declared fee 3',
		);
	});

	test('evaluation failures are reported, not thrown', () => {
		expect(reasonOf({ ...signed, coinSpends: [] })).toBe(
			'Cannot build or aggregate a bundle with zero coin spends',
		);
	});
});
