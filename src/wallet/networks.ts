import { Bytes } from '../utils/Bytes';
import { type NetworkConfig } from './types/config';

export const MAX_BLOCK_COST = 11_000_000_000;

export const MAINNET: NetworkConfig = {
	name: 'mainnet',
	prefix: 'xch',
	additionalData: Bytes.fromHex('ccd5bb71183532bff220ba46c268991a3ff07eb358e8255a65c30a2dce0e5fbb'),
	maxBlockCost: MAX_BLOCK_COST,
};

export const TESTNET: NetworkConfig = {
	name: 'testnet',
	prefix: 'txch',
	additionalData: Bytes.fromHex('ae83525ba8d1dd3f09b277de18ca3e43fc0af20d20c4b3e92ef2a48bd291ccb2'),
	maxBlockCost: MAX_BLOCK_COST,
};

export const KNOWN_NETWORKS: readonly NetworkConfig[] = [MAINNET, TESTNET];

export const KNOWN_PREFIXES: readonly string[] = KNOWN_NETWORKS.map((n) => n.prefix);

export function networkForPrefix(prefix: string): NetworkConfig | undefined {
	return KNOWN_NETWORKS.find((n) => n.prefix === prefix);
}
