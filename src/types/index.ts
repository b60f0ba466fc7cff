import { z } from 'zod';

/**
 * JSON-RPC 数量字段（十六进制字符串）→ bigint
 */
export const QuantitySchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]+$/, 'Expected a hex quantity')
  .transform((value) => BigInt(value));

/**
 * eth_getTransactionByHash
 */
export const RpcTransactionSchema = z.object({
  hash: z.string(),
  from: z.string(),
  to: z.string().nullish(),
  blockNumber: QuantitySchema.nullish(),
  gas: QuantitySchema.nullish(),
  gasPrice: QuantitySchema.nullish(),
});

export type RpcTransaction = z.infer<typeof RpcTransactionSchema>;

/**
 * eth_getTransactionReceipt
 */
export const RpcReceiptSchema = z.object({
  blockNumber: QuantitySchema,
  gasUsed: QuantitySchema,
  status: QuantitySchema
    .refine((value) => value === 0n || value === 1n, 'Expected status 0x0 or 0x1')
    .transform((value): TxStatus => (value === 1n ? 1 : 0)),
  // Fee-market receipts report the price actually paid; older nodes only echo gasPrice
  effectiveGasPrice: QuantitySchema.nullish(),
  gasPrice: QuantitySchema.nullish(),
});

export type RpcReceipt = z.infer<typeof RpcReceiptSchema>;

/**
 * eth_getBlockByNumber (header only, no full transactions)
 */
export const RpcBlockSchema = z.object({
  timestamp: QuantitySchema,
  baseFeePerGas: QuantitySchema.nullish(),
  miner: z.string().nullish(),
});

export type RpcBlock = z.infer<typeof RpcBlockSchema>;

export type TxStatus = 0 | 1;

/**
 * Derived view of one mined transaction. Field names are the JSON output keys.
 */
export interface TxSummary {
  readonly chainId: number;
  readonly network: string;
  readonly txHash: string;
  readonly fromAddr: string;
  readonly toAddr: string;
  readonly blockNumber: number;
  readonly timestamp: number;
  readonly confirmations: number;
  readonly status: TxStatus;
  readonly gasUsed: number;
  readonly gasLimit: number;
  readonly gasEfficiency: number;
  readonly gasPriceGwei: number;
  readonly totalFeeEth: number;
  readonly baseFeeGwei: number;
  readonly miner: string;
  readonly explorer: string;
}

export type InspectionResult =
  | { kind: 'pending'; txHash: string }
  | { kind: 'mined'; summary: TxSummary };

/**
 * 工具配置
 */
export interface Config {
  rpcUrl: string;
  rpcTimeoutMs: number;
}

export interface CliOptions {
  txHash?: string;
  /** Set only when --rpc was given; RPC_URL is the fallback. */
  rpcUrl?: string;
  json: boolean;
  help: boolean;
}
