/**
 * Chains a transfer can come from or go to, as seen from the indexed node.
 */
export type Chain =
  | { readonly kind: 'PolkadotParachain'; readonly id: number }
  | { readonly kind: 'KusamaParachain'; readonly id: number }
  | { readonly kind: 'Evm'; readonly chainId: number }
  | { readonly kind: 'Polkadot' }
  | { readonly kind: 'Kusama' }
  | { readonly kind: 'Unsupported' };

export type ChainKind = Chain['kind'];

export type SupportedChain = Exclude<Chain, { kind: 'Unsupported' }>;

export const Chains = {
  evm: (chainId: number): Chain => Object.freeze({ chainId, kind: 'Evm' }),
  kusama: (): Chain => Object.freeze({ kind: 'Kusama' }),
  kusamaParachain: (id: number): Chain => Object.freeze({ id, kind: 'KusamaParachain' }),
  polkadot: (): Chain => Object.freeze({ kind: 'Polkadot' }),
  polkadotParachain: (id: number): Chain => Object.freeze({ id, kind: 'PolkadotParachain' }),
  unsupported: (): Chain => Object.freeze({ kind: 'Unsupported' }),
} as const;

export function isSupportedChain(chain: Chain): chain is SupportedChain {
  return chain.kind !== 'Unsupported';
}

export function chainEquals(a: Chain, b: Chain): boolean {
  switch (a.kind) {
    case 'PolkadotParachain':
    case 'KusamaParachain':
      return b.kind === a.kind && b.id === a.id;
    case 'Evm':
      return b.kind === 'Evm' && b.chainId === a.chainId;
    default:
      return a.kind === b.kind;
  }
}

/** Short human label, for logs. */
export function describeChain(chain: Chain): string {
  switch (chain.kind) {
    case 'PolkadotParachain':
    case 'KusamaParachain':
      return `${chain.kind}(${chain.id})`;
    case 'Evm':
      return `Evm(${chain.chainId})`;
    default:
      return chain.kind;
  }
}
