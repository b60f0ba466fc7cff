import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigValidationError } from '../errors/index.js';
import type { Config } from '../types/index.js';

dotenv.config();

export const DEFAULT_RPC_URL = 'https://mainnet.infura.io/v3/your_api_key';
export const DEFAULT_RPC_TIMEOUT_MS = 20_000;

const envSchema = z.object({
  RPC_URL: z.string().url().default(DEFAULT_RPC_URL),
  RPC_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_RPC_TIMEOUT_MS),
});

/**
 * 从环境变量构建配置，空字符串视为未设置
 *
 * An explicit `rpcUrl` (from --rpc) replaces RPC_URL, which is then neither read nor validated.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: { rpcUrl?: string } = {}
): Config {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([key, value]) => value !== undefined && value !== '' && !(key === 'RPC_URL' && overrides.rpcUrl !== undefined)
    )
  );
  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigValidationError(result.error.issues);
  }

  return {
    rpcUrl: overrides.rpcUrl ?? result.data.RPC_URL,
    rpcTimeoutMs: result.data.RPC_TIMEOUT_MS,
  };
}
