// src/config.ts

/**
 * Centralized configuration: environment variables plus the zod schema for a token configuration.
 */

import dotenv from 'dotenv'
import path from 'path'
import fs from 'fs'
import { getAddress, isAddress } from 'ethers'
import { z } from 'zod'
import { FeatureName, TokenVariant } from '@feegate/dto'
import { isUint256 } from '@feegate/math'
import { reject } from '@feegate/reasons'
import { BURN_ADDRESS } from './utils/address'

// Resolve package root for both ts-jest (src) and built (dist/...) layouts
const distMarker = `${path.sep}dist${path.sep}`
const distIdx = __dirname.lastIndexOf(distMarker)
const packageRoot = distIdx !== -1 ? __dirname.slice(0, distIdx) : path.resolve(__dirname, '..')

// Try to load .env.feegate from package root, with cwd fallback
const candidateEnvPaths = [
  path.join(packageRoot, '.env.feegate'),
  path.join(process.cwd(), '.env.feegate')
]
for (const p of candidateEnvPaths) {
  if (fs.existsSync(p)) {
    dotenv.config({ path: p })
    break
  }
}

export const ENV = {
  LOG_LEVEL: process.env.LOG_LEVEL || 'info'
}

const address = z
  .string()
  .refine((v) => isAddress(v), { message: 'not an address' })
  .transform((v) => getAddress(v))

const uint256 = z
  .union([z.bigint(), z.string().regex(/^\d+$/, 'expected a decimal integer'), z.number().int().nonnegative()])
  .transform((v, ctx) => {
    const n = BigInt(v)
    if (!isUint256(n)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'outside uint256 range' })
      return z.NEVER
    }
    return n
  })

const percent = z.number().int().min(0).max(255)

export const FeatureSetSchema = z.object({
  [FeatureName.REFLECTION]: z.boolean().default(false),
  [FeatureName.ANTI_WHALE]: z.boolean().default(false),
  [FeatureName.AUTO_LIQUIDITY]: z.boolean().default(false),
  [FeatureName.COOLDOWN]: z.boolean().default(false),
  [FeatureName.BLACKLIST]: z.boolean().default(false),
  [FeatureName.AUTO_BURN]: z.boolean().default(false)
})

export const FeeScheduleSchema = z.object({
  reflectionFee: percent.default(0),
  liquidityFee: percent,
  marketingFee: percent,
  burnFee: percent
})

export const LimitsSchema = z.object({
  maxTransactionAmount: uint256,
  maxWalletSize: uint256,
  cooldownTime: z.number().int().nonnegative()
})

export const BlacklistPolicySchema = z.object({
  enforcement: z.enum(['always', 'whenEnabled']).default('always'),
  mutation: z.enum(['appendOnce', 'featureGated']).default('appendOnce')
})

export const TokenConfigSchema = z.object({
  name: z.string().min(1),
  symbol: z.string().min(1),
  decimals: z.number().int().min(0).max(255).default(18),
  totalSupply: uint256,
  variant: z.nativeEnum(TokenVariant).default(TokenVariant.REFLECTION),
  owner: address,
  /** the token's own holding account; receives liquidity fees */
  tokenAddress: address,
  marketingWallet: address,
  burnAddress: address.default(BURN_ADDRESS),
  /** when set, reflection fees are parked here instead of spread over holders */
  reflectionPool: address.optional(),
  features: FeatureSetSchema.default({}),
  fees: FeeScheduleSchema,
  limits: LimitsSchema,
  blacklistPolicy: BlacklistPolicySchema.default({})
})

export type TokenConfigInput = z.input<typeof TokenConfigSchema>
export type TokenConfig = z.output<typeof TokenConfigSchema>

/** Validate a raw configuration; failures are reported as CONFIG_INVALID with the first offending path. */
export function parseTokenConfig(input: unknown): TokenConfig {
  const res = TokenConfigSchema.safeParse(input)
  if (res.success) return res.data
  const issue = res.error.issues[0]
  const where = issue?.path.join('.') || '(root)'
  return reject('CONFIG_INVALID', { message: `Invalid token config at ${where}: ${issue?.message ?? 'unknown error'}`, context: { path: where } })
}

function numberVar(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key]
  return raw === undefined || raw === '' ? undefined : Number(raw)
}

/**
 * tokenConfigFromEnv
 * TOKEN_FEATURES is a comma-separated list of enabled toggles, e.g. "antiWhale,cooldown,autoBurn".
 */
export function tokenConfigFromEnv(env: NodeJS.ProcessEnv = process.env): TokenConfig {
  const enabled = new Set((env.TOKEN_FEATURES ?? '').split(',').map((s) => s.trim()).filter(Boolean))
  const features = Object.fromEntries(Object.values(FeatureName).map((f) => [f, enabled.has(f)]))

  return parseTokenConfig({
    name: env.TOKEN_NAME,
    symbol: env.TOKEN_SYMBOL,
    decimals: numberVar(env, 'TOKEN_DECIMALS'),
    totalSupply: env.TOKEN_TOTAL_SUPPLY,
    variant: env.TOKEN_VARIANT || undefined,
    owner: env.TOKEN_OWNER,
    tokenAddress: env.TOKEN_ADDRESS,
    marketingWallet: env.MARKETING_WALLET,
    burnAddress: env.BURN_ADDRESS || undefined,
    reflectionPool: env.REFLECTION_POOL || undefined,
    features,
    fees: {
      reflectionFee: numberVar(env, 'FEE_REFLECTION'),
      liquidityFee: numberVar(env, 'FEE_LIQUIDITY'),
      marketingFee: numberVar(env, 'FEE_MARKETING'),
      burnFee: numberVar(env, 'FEE_BURN')
    },
    limits: {
      maxTransactionAmount: env.MAX_TX_AMOUNT,
      maxWalletSize: env.MAX_WALLET_SIZE,
      cooldownTime: numberVar(env, 'COOLDOWN_SECONDS')
    },
    blacklistPolicy: {
      enforcement: env.BLACKLIST_ENFORCEMENT || undefined,
      mutation: env.BLACKLIST_MUTATION || undefined
    }
  })
}
