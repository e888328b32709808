import { bech32m } from '@scure/base';
import { InvalidChecksumError, UnknownPrefixError } from '../model/Errors';
import { type PublicKeySource } from './KeySource';
import { KNOWN_PREFIXES } from './networks';
import { puzzleHashForPublicKey } from './StandardPuzzle';

export { puzzleHashForPublicKey };

type Bech32mString = `${string}1${string}`;

const PUZZLE_HASH_LENGTH = 32;

/** Addresses are far shorter than the bech32 default limit allows; reject anything longer. */
const LIMIT_LENGTH = 90;

/**
 * Per BIP-350 the last '1' in the string separates the prefix from the data.
 */
function assertBech32mFormat(str: string): asserts str is Bech32mString {
	const separatorIndex = str.lastIndexOf('1');
	if (separatorIndex < 1 || separatorIndex === str.length - 1) {
		throw new InvalidChecksumError('Invalid address: missing or misplaced separator');
	}
}

function assertKnownPrefix(prefix: string, prefixes: readonly string[]): void {
	if (!prefixes.includes(prefix)) throw new UnknownPrefixError(prefix);
}

/**
 * Encodes a puzzle hash as a bech32m address.
 *
 * @param puzzleHash - 32-byte puzzle hash.
 * @param prefix - Network prefix, e.g. `xch` or `txch`.
 * @param prefixes - Prefixes accepted; pass a longer list to support additional networks.
 * @throws {UnknownPrefixError} If `prefix` is not in `prefixes`.
 */
export function encodeAddress(
	puzzleHash: Uint8Array,
	prefix: string,
	prefixes: readonly string[] = KNOWN_PREFIXES,
): string {
	assertKnownPrefix(prefix, prefixes);
	if (puzzleHash.length !== PUZZLE_HASH_LENGTH) {
		throw new Error(`Invalid puzzle hash length ${puzzleHash.length}, expected ${PUZZLE_HASH_LENGTH}`);
	}
	return bech32m.encode(prefix, bech32m.toWords(puzzleHash), LIMIT_LENGTH);
}

/**
 * Decodes an address produced by {@link encodeAddress}.
 *
 * @throws {InvalidChecksumError} On a malformed string, bad checksum or wrong payload length.
 * @throws {UnknownPrefixError} If the checksum is good but the prefix is not in `prefixes`.
 */
export function decodeAddress(
	address: string,
	prefixes: readonly string[] = KNOWN_PREFIXES,
): { puzzleHash: Uint8Array; prefix: string } {
	assertBech32mFormat(address);
	let prefix: string;
	let puzzleHash: Uint8Array;
	try {
		const decoded = bech32m.decode(address, LIMIT_LENGTH);
		prefix = decoded.prefix;
		puzzleHash = bech32m.fromWords(decoded.words);
	} catch (e) {
		throw new InvalidChecksumError(
			`Invalid address: ${e instanceof Error ? e.message : String(e)}`,
		);
	}
	assertKnownPrefix(prefix, prefixes);
	if (puzzleHash.length !== PUZZLE_HASH_LENGTH) {
		throw new InvalidChecksumError(
			`Invalid address: payload is ${puzzleHash.length} bytes, expected ${PUZZLE_HASH_LENGTH}`,
		);
	}
	return { puzzleHash, prefix };
}

/**
 * Address of the wallet key at `index`, computed from public material only.
 */
export function generateAddress(
	keys: PublicKeySource,
	index: number,
	prefix: string,
	prefixes: readonly string[] = KNOWN_PREFIXES,
): string {
	const puzzleHash = puzzleHashForPublicKey(keys.publicKeyAt(index).publicKey);
	return encodeAddress(puzzleHash, prefix, prefixes);
}
