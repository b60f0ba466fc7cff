/**
 * 已知网络：chainId → 名称 / 区块浏览器
 *
 * Anything not listed here is reported as `Chain {id}` with no explorer link.
 */

export interface NetworkInfo {
  readonly name: string;
  readonly explorer: string;
}

export const NETWORKS: ReadonlyMap<number, NetworkInfo> = new Map([
  [1, { name: 'Ethereum Mainnet', explorer: 'https://etherscan.io' }],
  [10, { name: 'Optimism', explorer: 'https://optimistic.etherscan.io' }],
  [56, { name: 'BNB Smart Chain', explorer: 'https://bscscan.com' }],
  [137, { name: 'Polygon', explorer: 'https://polygonscan.com' }],
  [42161, { name: 'Arbitrum One', explorer: 'https://arbiscan.io' }],
  [8453, { name: 'Base', explorer: 'https://basescan.org' }],
]);

export function networkName(chainId: number): string {
  return NETWORKS.get(chainId)?.name ?? `Chain ${chainId}`;
}

export function explorerUrl(chainId: number, txHash: string): string {
  const base = NETWORKS.get(chainId)?.explorer;
  return base ? `${base}/tx/${txHash}` : 'N/A';
}
