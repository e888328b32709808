import { generateMnemonic, mnemonicToSeedSync, validateMnemonic } from '@scure/bip39';
import { wordlist } from '@scure/bip39/wordlists/english.js';

/** Word count of wallet mnemonics: 256 bits of entropy. */
export const MNEMONIC_WORDS = 24;

export const generateNewMnemonic = (): string => {
	return generateMnemonic(wordlist, 256);
};

export const isValidMnemonic = (mnemonic: string): boolean => {
	const normalized = normalizeMnemonic(mnemonic);
	return normalized.split(' ').length === MNEMONIC_WORDS && validateMnemonic(normalized, wordlist);
};

/**
 * BIP-39 seed (PBKDF2-HMAC-SHA512) of a 24 word mnemonic.
 *
 * @throws Error if the mnemonic is not 24 valid English words with a correct checksum.
 */
export const deriveSeedFromMnemonic = (mnemonic: string, passphrase = ''): Uint8Array => {
	if (!isValidMnemonic(mnemonic)) {
		throw new Error(`Invalid mnemonic, expected ${MNEMONIC_WORDS} words with a valid checksum`);
	}
	return mnemonicToSeedSync(normalizeMnemonic(mnemonic), passphrase);
};

function normalizeMnemonic(mnemonic: string): string {
	return mnemonic.trim().toLowerCase().split(/\s+/).join(' ');
}
