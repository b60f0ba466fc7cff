import {
  createPublicClient,
  http,
  numberToHex,
  type Hash,
  type PublicClient,
  type Transport,
} from 'viem';
import type { z } from 'zod';
import {
  MissingFieldError,
  NotFoundError,
  RpcConnectionError,
  RpcDecodeError,
  RpcRequestError,
  formatPath,
} from '../errors/index.js';
import { DEFAULT_RPC_TIMEOUT_MS } from '../config/index.js';
import {
  QuantitySchema,
  RpcBlockSchema,
  RpcReceiptSchema,
  RpcTransactionSchema,
  type RpcBlock,
  type RpcReceipt,
  type RpcTransaction,
} from '../types/index.js';

export interface RpcClientOptions {
  timeoutMs?: number;
}

/**
 * 创建 Viem 客户端
 *
 * Accepts an endpoint URL (HTTP transport, fixed timeout, no retries) or a ready-made
 * transport, which is how tests plug in an in-process node.
 */
export function createRpcClient(
  target: string | Transport,
  options: RpcClientOptions = {}
): PublicClient<Transport, undefined, undefined, undefined, undefined> {
  const transport: Transport =
    typeof target === 'string'
      ? http(target, { timeout: options.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS, retryCount: 0 })
      : target;

  return createPublicClient({ transport });
}

export type RpcClient = ReturnType<typeof createRpcClient>;

export interface Connection {
  chainId: number;
  latencyMs: number;
}

/**
 * Connectivity probe. Any failure here, including a malformed answer, means the
 * endpoint is unusable and is reported as a connection error.
 */
export async function connect(client: RpcClient, rpcUrl: string): Promise<Connection> {
  const start = performance.now();
  try {
    const chainId = await getChainId(client);
    return { chainId, latencyMs: performance.now() - start };
  } catch (error) {
    throw new RpcConnectionError(rpcUrl, error);
  }
}

export async function getChainId(client: RpcClient): Promise<number> {
  const method = 'eth_chainId';
  const raw = await send(method, () => client.request({ method }));
  return Number(decode(method, QuantitySchema, raw));
}

export async function getBlockNumber(client: RpcClient): Promise<bigint> {
  const method = 'eth_blockNumber';
  const raw = await send(method, () => client.request({ method }));
  return decode(method, QuantitySchema, raw);
}

/**
 * 获取交易（pending 交易的 blockNumber 为 null）
 */
export async function getTransaction(client: RpcClient, hash: Hash): Promise<RpcTransaction> {
  const method = 'eth_getTransactionByHash';
  const raw = await send(method, () => client.request({ method, params: [hash] }));
  if (raw === null) {
    throw new NotFoundError('transaction', hash);
  }
  return decode(method, RpcTransactionSchema, raw);
}

export async function getTransactionReceipt(client: RpcClient, hash: Hash): Promise<RpcReceipt> {
  const method = 'eth_getTransactionReceipt';
  const raw = await send(method, () => client.request({ method, params: [hash] }));
  if (raw === null) {
    throw new NotFoundError('receipt', hash);
  }
  return decode(method, RpcReceiptSchema, raw);
}

export async function getBlock(client: RpcClient, blockNumber: bigint): Promise<RpcBlock> {
  const method = 'eth_getBlockByNumber';
  const raw = await send(method, () =>
    client.request({ method, params: [numberToHex(blockNumber), false] })
  );
  if (raw === null) {
    throw new NotFoundError('block', blockNumber.toString());
  }
  return decode(method, RpcBlockSchema, raw);
}

async function send<T>(method: string, request: () => Promise<T>): Promise<T> {
  try {
    return await request();
  } catch (error) {
    throw new RpcRequestError(method, error);
  }
}

function decode<T>(method: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const missing = result.error.issues.find(
    (issue) => issue.code === 'invalid_type' && issue.received === 'undefined'
  );
  if (missing) {
    throw new MissingFieldError(method, formatPath(missing.path));
  }
  throw new RpcDecodeError(method, result.error.issues);
}
