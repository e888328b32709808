import { describe, test, expect } from 'vitest';
import { aggregateSignatures } from '../../src/crypto/aggregate';
import { g2ToBytes } from '../../src/crypto/core';
import { PrivateKeyNode, syntheticPublicKey, walletKeyPath } from '../../src/crypto/derivation';
import {
	BundleFormatError,
	CostExceededError,
	InsufficientFundsError,
	InvalidPuzzleRevealError,
	KeyPathMismatchError,
	KeyReleasedError,
	PartialBundleError,
} from '../../src/model/Errors';
import { type SpendBundleDocument } from '../../src/model/types/bundle';
import { generateNewMnemonic } from '../../src/secrets';
import { MAINNET, TESTNET } from '../../src/wallet/networks';
import { OfflineSigner } from '../../src/wallet/OfflineSigner';
import { createCoin } from '../../src/wallet/Conditions';
import { evaluateSpends } from '../../src/wallet/SpendEvaluation';
import {
	DEFAULT_HIDDEN_PUZZLE_HASH,
	puzzleForPublicKey,
	solutionForConditions,
} from '../../src/wallet/StandardPuzzle';
import { UnsignedBundleBuilder } from '../../src/wallet/UnsignedBundleBuilder';
import { verifySpendBundle } from '../../src/wallet/verifySpendBundle';
import { type PublicKeySource } from '../../src/wallet/KeySource';
import { keySourceFromExport } from '../../src/wallet/PublicKeyExport';
import { OTHER_SEED, RECIPIENT, SEED, coinAt, walletPair } from '../fixtures';

function unsignedPayment(keys: PublicKeySource, network = MAINNET) {
	return new UnsignedBundleBuilder(keys, { network }).build({
		coins: [coinAt(keys, 0, 1000n, 100), coinAt(keys, 1, 500n, 200)],
		outputs: [{ puzzleHash: RECIPIENT, amount: 1200n }],
		fee: 100n,
	});
}

describe('OfflineSigner', () => {
	test('signs a bundle that verifies', () => {
		const { signer, keys } = walletPair();
		const tx = unsignedPayment(keys);
		const signed = signer.sign(tx.bundle);

		expect(signed.aggregatedSignature).toHaveLength(96);
		expect(signed.coinSpends).toBe(tx.bundle.coinSpends);
		expect(tx.bundle.aggregatedSignature).toBeUndefined();
		expect(verifySpendBundle(signed)).toEqual({ valid: true, cost: tx.cost, fee: 100n });
	});

	test('aggregate equals the sum of individual signatures', () => {
		const { signer, keys } = walletPair();
		const tx = unsignedPayment(keys);
		const signed = signer.sign(tx.bundle);

		const master = PrivateKeyNode.fromSeed(SEED);
		const individual = tx.signingMessages.map((m, i) => {
			const leaf = master.derivePath(walletKeyPath(i, 'observer'));
			const synthetic = leaf.toSynthetic(DEFAULT_HIDDEN_PUZZLE_HASH);
			expect(m.publicKey).toEqual(syntheticPublicKey(leaf.publicKey, DEFAULT_HIDDEN_PUZZLE_HASH));
			expect(m.publicKey).not.toEqual(leaf.publicKey);
			expect(synthetic.publicKey).toEqual(m.publicKey);
			return synthetic.sign(m.message);
		});
		expect(signed.aggregatedSignature).toEqual(g2ToBytes(aggregateSignatures(individual)));
	});

	test('signs with hardened leaves', () => {
		const { signer, keys } = walletPair('hardened');
		const tx = unsignedPayment(keys);
		expect(keys.maxIndex).toBe(9);
		expect(verifySpendBundle(signer.sign(tx.bundle)).valid).toBe(true);
	});

	test('finds keys for coins without a recorded index', () => {
		const { signer, keys } = walletPair();
		const tx = unsignedPayment(keys);
		const doc: SpendBundleDocument = {
			...tx.bundle,
			metadata: {
				...tx.bundle.metadata,
				spends: tx.bundle.metadata.spends.map((s) => ({ coinId: s.coinId })),
			},
		};
		expect(verifySpendBundle(signer.sign(doc)).valid).toBe(true);

		const narrow = new OfflineSigner(SEED, { scanLimit: 1 });
		expect(() => narrow.sign(doc)).toThrow(KeyPathMismatchError);
	});

	test('works from a mnemonic on testnet', () => {
		const mnemonic = generateNewMnemonic();
		const signer = OfflineSigner.fromMnemonic(mnemonic, 'test-secret', { network: TESTNET });
		const again = OfflineSigner.fromMnemonic(mnemonic, 'test-secret', { network: TESTNET });
		expect(again.masterFingerprint).toBe(signer.masterFingerprint);

		const exported = signer.exportPublicKeys();
		expect(exported.network).toBe('txch');
		expect(exported.scheme).toBe('observer');
		expect(exported.masterFingerprint).toBe(signer.masterFingerprint);

		const keys = keySourceFromExport(exported);
		const tx = unsignedPayment(keys, TESTNET);
		expect(tx.bundle.metadata.network).toBe('txch');
		const signed = signer.sign(tx.bundle);
		expect(verifySpendBundle(signed, { network: TESTNET }).valid).toBe(true);
		expect(verifySpendBundle(signed, { network: MAINNET }).valid).toBe(false);
	});

	test('refuses an already signed bundle', () => {
		const { signer, keys } = walletPair();
		const signed = signer.sign(unsignedPayment(keys).bundle);
		expect(() => signer.sign(signed)).toThrow(BundleFormatError);
		expect(() => signer.sign(signed)).toThrow('Bundle is already signed');
	});

	test('refuses a bundle for another network', () => {
		const { keys } = walletPair();
		const testnetSigner = new OfflineSigner(SEED, { network: TESTNET });
		expect(() => testnetSigner.sign(unsignedPayment(keys).bundle)).toThrow(
			'Bundle is for network "xch", signer is configured for "txch"',
		);
	});

	test('aborts when the manifest and the spends differ', () => {
		const { signer, keys } = walletPair();
		const { bundle } = unsignedPayment(keys);
		const partial: SpendBundleDocument = {
			...bundle,
			coinSpends: bundle.coinSpends.slice(0, 1),
		};
		expect(() => signer.sign(partial)).toThrow(PartialBundleError);
	});

	test('aborts when the announcing spend is missing', () => {
		const { signer, keys } = walletPair();
		const { bundle } = unsignedPayment(keys);
		const orphan: SpendBundleDocument = {
			...bundle,
			coinSpends: bundle.coinSpends.slice(1),
			metadata: { ...bundle.metadata, spends: bundle.metadata.spends.slice(1) },
		};
		expect(() => signer.sign(orphan)).toThrow(PartialBundleError);
	});

	test('rejects the wrong seed by fingerprint', () => {
		const { keys } = walletPair();
		const stranger = new OfflineSigner(OTHER_SEED);
		expect(() => stranger.sign(unsignedPayment(keys).bundle)).toThrow(
			`Bundle was built for key ${keys.masterFingerprint}, this seed is ${stranger.masterFingerprint}`,
		);
	});

	test('rejects the wrong seed by puzzle hash when no fingerprint is recorded', () => {
		const { keys } = walletPair();
		const { bundle } = unsignedPayment(keys);
		const { keyFingerprint: _omitted, ...metadata } = bundle.metadata;
		const stranger = new OfflineSigner(OTHER_SEED);
		expect(() => stranger.sign({ ...bundle, metadata })).toThrow(
			/^Coin 0x[0-9a-f]{64} is not locked by the observer key at index 0$/,
		);
	});

	test('rejects a recorded index that points at another key', () => {
		const { signer, keys } = walletPair();
		const { bundle } = unsignedPayment(keys);
		const swapped: SpendBundleDocument = {
			...bundle,
			metadata: {
				...bundle.metadata,
				spends: bundle.metadata.spends.map((s, i) => ({ ...s, derivationIndex: 1 - i })),
			},
		};
		expect(() => signer.sign(swapped)).toThrow(KeyPathMismatchError);
	});

	test('rejects a puzzle reveal that does not match the coin', () => {
		const { signer, keys } = walletPair();
		const { bundle } = unsignedPayment(keys);
		const [first, second] = bundle.coinSpends;
		const tampered: SpendBundleDocument = {
			...bundle,
			coinSpends: [
				first,
				{ ...second, puzzleReveal: puzzleForPublicKey(keys.publicKeyAt(5).publicKey) },
			],
		};
		expect(() => signer.sign(tampered)).toThrow(InvalidPuzzleRevealError);
	});

	test('refuses a declared fee that differs from the reservation', () => {
		const { signer, keys } = walletPair();
		const { bundle } = unsignedPayment(keys);
		const lowered: SpendBundleDocument = { ...bundle, metadata: { ...bundle.metadata, fee: 99n } };
		expect(() => signer.sign(lowered)).toThrow('Reserved fee 100 differs from declared fee 99');
	});

	test('refuses spends that create more than they consume', () => {
		const { signer, keys } = walletPair();
		const { bundle } = unsignedPayment(keys);
		const [primary, ...rest] = bundle.coinSpends;
		const inflated = evaluateSpends([primary])
			.spends[0].conditions.filter((c) => c.type !== 'AGG_SIG_ME')
			.map((c) => (c.type === 'CREATE_COIN' ? createCoin(c.puzzleHash, c.amount + 1000n) : c));
		const tampered: SpendBundleDocument = {
			...bundle,
			coinSpends: [{ ...primary, solution: solutionForConditions(inflated) }, ...rest],
		};
		expect(() => signer.sign(tampered)).toThrow(InsufficientFundsError);
		expect(() => signer.sign(tampered)).toThrow('Not enough coins, total value 1500, need 3500');
	});

	test('enforces the cost limit before signing', () => {
		const { keys } = walletPair();
		const { bundle } = unsignedPayment(keys);
		const strict = new OfflineSigner(SEED, { network: { ...MAINNET, maxBlockCost: 1_000_000 } });
		expect(() => strict.sign(bundle)).toThrow(CostExceededError);
	});

	test('cannot be used after dispose', () => {
		const { signer, keys } = walletPair();
		const { bundle } = unsignedPayment(keys);
		signer.dispose();
		expect(() => signer.sign(bundle)).toThrow(KeyReleasedError);
		expect(() => signer.exportPublicKeys()).toThrow(KeyReleasedError);
	});
});
