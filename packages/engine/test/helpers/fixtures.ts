import { getAddress } from 'ethers'
import { FeatureName, TokenEvent, TokenVariant } from '@feegate/dto'
import { isRejection } from '@feegate/reasons'
import { TokenConfigInput } from '../../src/config'
import { EventSink } from '../../src/interfaces/EventSink'
import { createFeeToken, FeeTokenOverrides } from '../../src/token/createFeeToken'
import { ManualClock } from '../../src/utils/clock'

export const OWNER = getAddress('0x1111111111111111111111111111111111111111')
export const ALICE = getAddress('0xa1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1')
export const BOB = getAddress('0xb0b0b0b0b0b0b0b0b0b0b0b0b0b0b0b0b0b0b0b0')
export const CAROL = getAddress('0xc4c4c4c4c4c4c4c4c4c4c4c4c4c4c4c4c4c4c4c4')
export const DAVE = getAddress('0xd5d5d5d5d5d5d5d5d5d5d5d5d5d5d5d5d5d5d5d5')
export const MARKETING = getAddress('0xeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeee')
export const TOKEN = getAddress('0x7070707070707070707070707070707070707070')
export const POOL = getAddress('0x9090909090909090909090909090909090909090')

export const START = 1_700_000_000
export const SUPPLY = 1_000_000_000n

export function standardConfig(overrides: Partial<TokenConfigInput> = {}): TokenConfigInput {
  return {
    name: 'TestMeme',
    symbol: 'TMEME',
    totalSupply: SUPPLY,
    variant: TokenVariant.STANDARD,
    owner: OWNER,
    tokenAddress: TOKEN,
    marketingWallet: MARKETING,
    features: {
      [FeatureName.ANTI_WHALE]: true,
      [FeatureName.COOLDOWN]: true,
      [FeatureName.BLACKLIST]: true,
      [FeatureName.AUTO_BURN]: true
    },
    fees: { liquidityFee: 2, marketingFee: 2, burnFee: 1 },
    limits: { maxTransactionAmount: 1_000_000n, maxWalletSize: 2_000_000n, cooldownTime: 1800 },
    ...overrides
  }
}

export function reflectionConfig(overrides: Partial<TokenConfigInput> = {}): TokenConfigInput {
  return standardConfig({
    variant: TokenVariant.REFLECTION,
    features: {
      [FeatureName.REFLECTION]: true,
      [FeatureName.ANTI_WHALE]: true,
      [FeatureName.AUTO_LIQUIDITY]: true,
      [FeatureName.COOLDOWN]: true,
      [FeatureName.BLACKLIST]: true,
      [FeatureName.AUTO_BURN]: true
    },
    fees: { reflectionFee: 2, liquidityFee: 2, marketingFee: 2, burnFee: 1 },
    ...overrides
  })
}

export function makeToken(config: TokenConfigInput = standardConfig(), overrides: FeeTokenOverrides = {}) {
  const clock = new ManualClock(START)
  const bundle = createFeeToken(config, { clock, ...overrides })
  const events: TokenEvent[] = []
  bundle.token.events.onAny((e) => events.push(e))
  return { ...bundle, clock, events }
}

export class RecordingSink implements EventSink {
  readonly events: TokenEvent[] = []

  emit(event: TokenEvent): void {
    this.events.push(event)
  }
}

/** Runs `fn` and returns the rejection code it threw, or undefined when it returned. */
export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn()
  } catch (e) {
    if (isRejection(e)) return e.code
    throw e
  }
  return undefined
}
