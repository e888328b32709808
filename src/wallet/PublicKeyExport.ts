import { G1_LENGTH } from '../crypto/core';
import {
	type DerivationScheme,
	type PrivateKeyNode,
	PublicKeyNode,
	WALLET_ROOT_PATH,
	assertDerivationIndex,
	walletKeyPath,
	withPrivateKey,
} from '../crypto/derivation';
import { BundleFormatError } from '../model/Errors';
import { Bytes } from '../utils/Bytes';
import {
	expectArray,
	expectHex,
	expectObject,
	expectString,
	expectUint,
	parseJsonObject,
} from '../utils/json';
import { ExportedKeySource, ObserverKeySource, type PublicKeySource } from './KeySource';
import { MAINNET } from './networks';

/**
 * Public material the offline machine hands to the online one. Under the `observer` scheme the
 * wallet root public key is enough to derive every leaf; under `hardened` each leaf is listed.
 */
export type PublicKeyExport =
	| {
			version: 1;
			scheme: 'observer';
			network: string;
			masterFingerprint: number;
			walletPublicKey: Uint8Array;
	  }
	| {
			version: 1;
			scheme: 'hardened';
			network: string;
			masterFingerprint: number;
			keys: Array<{ index: number; publicKey: Uint8Array }>;
	  };

export type PublicKeyExportOptions = {
	scheme: DerivationScheme;
	/**
	 * Number of hardened leaves to export. Ignored for `observer`.
	 *
	 * @default 100
	 */
	count?: number;
	/**
	 * First hardened leaf index. Ignored for `observer`.
	 *
	 * @default 0
	 */
	start?: number;
	/**
	 * @default MAINNET.prefix
	 */
	network?: string;
};

const DEFAULT_EXPORT_COUNT = 100;

/**
 * Build the export from the master private key. Every private node derived on the way is released
 * before returning; `master` itself is left to the caller.
 */
export function createPublicKeyExport(
	master: PrivateKeyNode,
	options: PublicKeyExportOptions,
): PublicKeyExport {
	const network = options.network ?? MAINNET.prefix;
	const masterFingerprint = master.fingerprint;
	return withPrivateKey(master.derivePath(WALLET_ROOT_PATH), (root): PublicKeyExport => {
		if (options.scheme === 'observer') {
			return {
				version: 1,
				scheme: 'observer',
				network,
				masterFingerprint,
				walletPublicKey: root.publicKey,
			};
		}
		const start = options.start ?? 0;
		const count = options.count ?? DEFAULT_EXPORT_COUNT;
		assertDerivationIndex(start);
		if (!Number.isInteger(count) || count < 1) {
			throw new RangeError(`Export count must be a positive integer, got ${count}`);
		}
		assertDerivationIndex(start + count - 1);
		const keys = Array.from({ length: count }, (_, i) => {
			const index = start + i;
			const publicKey = withPrivateKey(root.deriveHardened(index), (leaf) => leaf.publicKey);
			return { index, publicKey };
		});
		return { version: 1, scheme: 'hardened', network, masterFingerprint, keys };
	});
}

export function encodePublicKeyExport(exp: PublicKeyExport): string {
	const common = {
		version: exp.version,
		scheme: exp.scheme,
		network: exp.network,
		master_fingerprint: exp.masterFingerprint,
	};
	const body =
		exp.scheme === 'observer'
			? { ...common, wallet_public_key: Bytes.toPrefixedHex(exp.walletPublicKey) }
			: {
					...common,
					keys: exp.keys.map((k) => ({
						index: k.index,
						public_key: Bytes.toPrefixedHex(k.publicKey),
					})),
				};
	return JSON.stringify(body, null, 2);
}

/**
 * @throws {BundleFormatError} On malformed JSON, an unsupported version or scheme, or bad keys.
 */
export function decodePublicKeyExport(json: string): PublicKeyExport {
	const obj = parseJsonObject(json, 'public key export');
	if (obj.version !== 1) {
		throw new BundleFormatError(`Unsupported public key export version ${String(obj.version)}`);
	}
	const network = expectString(obj.network, 'network');
	const masterFingerprint = expectUint(obj.master_fingerprint, 'master_fingerprint');
	switch (obj.scheme) {
		case 'observer':
			return {
				version: 1,
				scheme: 'observer',
				network,
				masterFingerprint,
				walletPublicKey: expectHex(obj.wallet_public_key, 'wallet_public_key', G1_LENGTH),
			};
		case 'hardened':
			return {
				version: 1,
				scheme: 'hardened',
				network,
				masterFingerprint,
				keys: expectArray(obj.keys, 'keys').map((value, i) => {
					const k = expectObject(value, `keys[${i}]`);
					return {
						index: expectUint(k.index, `keys[${i}].index`),
						publicKey: expectHex(k.public_key, `keys[${i}].public_key`, G1_LENGTH),
					};
				}),
			};
		default:
			throw new BundleFormatError(`Unknown derivation scheme ${String(obj.scheme)}`);
	}
}

/**
 * @throws {BundleFormatError} If a public key is not a valid curve point.
 */
export function keySourceFromExport(exp: PublicKeyExport): PublicKeySource {
	const node = (publicKey: Uint8Array, index?: number) => {
		try {
			return PublicKeyNode.fromBytes(
				publicKey,
				index === undefined ? WALLET_ROOT_PATH : walletKeyPath(index, 'hardened'),
			);
		} catch (e) {
			throw new BundleFormatError(
				`Invalid public key ${Bytes.toPrefixedHex(publicKey)}: ${e instanceof Error ? e.message : String(e)}`,
			);
		}
	};
	if (exp.scheme === 'observer') {
		return new ObserverKeySource(node(exp.walletPublicKey), exp.masterFingerprint);
	}
	return new ExportedKeySource(
		exp.keys.map((k) => ({ index: k.index, publicKey: node(k.publicKey, k.index) })),
		exp.masterFingerprint,
	);
}
