import { FeatureName, TokenEvent } from '@feegate/dto'
import { BURN_ADDRESS } from '../../src/utils/address'
import {
  ALICE,
  BOB,
  CAROL,
  MARKETING,
  OWNER,
  START,
  SUPPLY,
  TOKEN,
  codeOf,
  makeToken,
  standardConfig
} from '../helpers/fixtures'

function launched() {
  const t = makeToken()
  t.token.enableTrading(OWNER)
  return t
}

function sumOfBalances(t: ReturnType<typeof makeToken>): bigint {
  return t.ledger.holders().reduce((sum, a) => sum + t.ledger.balanceOf(a), 0n)
}

describe('FeeToken transfers', () => {
  test('construction mints the supply to the owner and excludes the fee sinks', () => {
    const { token } = makeToken()
    expect(token.totalSupply()).toBe(SUPPLY)
    expect(token.balanceOf(OWNER)).toBe(SUPPLY)
    expect(token.decimals()).toBe(18)
    expect(token.isExcludedFromFees(OWNER)).toBe(true)
    expect(token.isExcludedFromFees(TOKEN)).toBe(true)
    expect(token.isExcludedFromFees(MARKETING)).toBe(true)
    expect(token.isExcludedFromFees(ALICE)).toBe(false)
  })

  test('5% standard schedule splits 2/2/1 between liquidity, marketing and burn', () => {
    const t = launched()
    t.token.transfer(OWNER, ALICE, 200_000n)
    t.events.length = 0

    const receipt = t.token.transfer(ALICE, BOB, 100_000n)

    expect(receipt.totalFee).toBe(5_000n)
    expect(receipt.netAmount).toBe(95_000n)
    expect(receipt.surchargePercent).toBe(0)
    expect(receipt.remainder).toBe(0n)
    expect(receipt.at).toBe(START)
    expect(t.token.balanceOf(ALICE)).toBe(100_000n)
    expect(t.token.balanceOf(BOB)).toBe(95_000n)
    expect(t.token.balanceOf(TOKEN)).toBe(2_000n)
    expect(t.token.balanceOf(MARKETING)).toBe(2_000n)
    expect(t.token.balanceOf(BURN_ADDRESS)).toBe(1_000n)
    expect(t.token.circulatingSupply()).toBe(SUPPLY - 1_000n)
    expect(sumOfBalances(t)).toBe(SUPPLY)

    const expected: TokenEvent[] = [
      { type: 'Transfer', from: ALICE, to: BOB, amount: 95_000n },
      { type: 'Transfer', from: ALICE, to: TOKEN, amount: 2_000n },
      { type: 'Transfer', from: ALICE, to: MARKETING, amount: 2_000n },
      { type: 'Transfer', from: ALICE, to: BURN_ADDRESS, amount: 1_000n },
      { type: 'TokensBurned', from: ALICE, amount: 1_000n }
    ]
    expect(t.events).toEqual(expected)
  })

  test('whale transfers pay the 3 point surcharge', () => {
    const t = launched()
    t.token.transfer(OWNER, ALICE, 600_000n)

    const receipt = t.token.transfer(ALICE, BOB, 500_001n)

    expect(receipt.surchargePercent).toBe(3)
    expect(receipt.totalFee).toBe(40_000n)
    expect(t.token.balanceOf(BOB)).toBe(460_001n)
    expect(t.token.balanceOf(TOKEN)).toBe(16_000n)
    expect(t.token.balanceOf(MARKETING)).toBe(16_000n)
    expect(t.token.balanceOf(BURN_ADDRESS)).toBe(8_000n)
    expect(sumOfBalances(t)).toBe(SUPPLY)
  })

  test('fee-excluded sender moves the full amount and skips whale pricing', () => {
    const t = launched()
    const receipt = t.token.transfer(OWNER, BOB, 500_001n)
    expect(receipt.totalFee).toBe(0n)
    expect(t.token.balanceOf(BOB)).toBe(500_001n)
    expect(t.token.balanceOf(BURN_ADDRESS)).toBe(0n)
  })

  test('fee-excluded recipient receives the full amount', () => {
    const t = launched()
    t.token.transfer(OWNER, ALICE, 50_000n)
    t.token.transfer(ALICE, MARKETING, 10_000n)
    expect(t.token.balanceOf(MARKETING)).toBe(10_000n)
    expect(t.token.balanceOf(ALICE)).toBe(40_000n)
  })

  test('auto-burn off leaves the burn share with the sender', () => {
    const t = launched()
    t.token.toggleFeature(OWNER, FeatureName.AUTO_BURN, false)
    t.token.transfer(OWNER, ALICE, 200_000n)

    const receipt = t.token.transfer(ALICE, BOB, 100_000n)

    expect(receipt.totalFee).toBe(4_000n)
    expect(t.token.balanceOf(BOB)).toBe(96_000n)
    expect(t.token.balanceOf(ALICE)).toBe(100_000n)
    expect(t.token.balanceOf(BURN_ADDRESS)).toBe(0n)
  })

  test('addresses are accepted in any case and zero or malformed ones are rejected', () => {
    const t = launched()
    t.token.transfer(OWNER.toLowerCase(), ALICE.toLowerCase(), 10n)
    expect(t.token.balanceOf(ALICE)).toBe(10n)
    expect(codeOf(() => t.token.transfer(OWNER, '0x0000000000000000000000000000000000000000', 1n))).toBe('GUARD_INVALID_ADDRESS')
    expect(codeOf(() => t.token.transfer(OWNER, 'not-an-address', 1n))).toBe('GUARD_INVALID_ADDRESS')
  })

  test('amounts outside uint256 are rejected before any check', () => {
    const t = launched()
    expect(codeOf(() => t.token.transfer(OWNER, ALICE, -1n))).toBe('LEDGER_INVALID_AMOUNT')
  })

  describe('guard ordering', () => {
    test('trading gate blocks non-excluded parties until launch', () => {
      const t = makeToken()
      t.token.transfer(OWNER, ALICE, 50_000n)
      expect(codeOf(() => t.token.transfer(ALICE, BOB, 1_000n))).toBe('GUARD_TRADING_NOT_ENABLED')
      // excluded recipient bypasses the gate
      t.token.transfer(ALICE, MARKETING, 1_000n)
      expect(t.token.balanceOf(MARKETING)).toBe(1_000n)
    })

    test('blacklist wins over fee exclusion and the trading state', () => {
      const t = launched()
      t.token.setBlacklisted(OWNER, OWNER, true)
      expect(codeOf(() => t.token.transfer(OWNER, ALICE, 1n))).toBe('GUARD_BLACKLISTED')
      t.token.setBlacklisted(OWNER, OWNER, false)
      t.token.transfer(OWNER, ALICE, 1n)
      expect(t.token.balanceOf(ALICE)).toBe(1n)
    })

    test('blacklisted recipient is rejected', () => {
      const t = launched()
      t.token.setBlacklisted(OWNER, BOB, true)
      expect(codeOf(() => t.token.transfer(OWNER, BOB, 1n))).toBe('GUARD_BLACKLISTED')
    })

    test('max transaction is checked before the balance', () => {
      const t = launched()
      expect(codeOf(() => t.token.transfer(ALICE, BOB, 1_000_001n))).toBe('GUARD_EXCEEDS_MAX_TRANSACTION')
    })

    test('max wallet uses the gross amount', () => {
      const t = launched()
      t.token.transfer(OWNER, CAROL, 975_000n)
      t.token.transfer(OWNER, CAROL, 975_000n)
      t.token.transfer(OWNER, ALICE, 100_000n)
      // 1_950_000 + 60_000 > 2_000_000 even though only 57_000 would arrive
      expect(codeOf(() => t.token.transfer(ALICE, CAROL, 60_000n))).toBe('GUARD_EXCEEDS_MAX_WALLET')
    })

    test('anti-whale off lifts both caps', () => {
      const t = launched()
      t.token.toggleFeature(OWNER, 'antiWhaleEnabled', false)
      t.token.transfer(OWNER, BOB, 3_000_000n)
      expect(t.token.balanceOf(BOB)).toBe(3_000_000n)
    })
  })

  describe('cooldown', () => {
    test('a second transfer inside the window fails and succeeds once it has elapsed', () => {
      const t = launched()
      t.token.transfer(OWNER, ALICE, 200_000n)
      t.token.transfer(ALICE, BOB, 10_000n)
      expect(t.token.lastTradeOf(ALICE)).toBe(START)

      t.clock.advance(1_799)
      expect(codeOf(() => t.token.transfer(ALICE, BOB, 10_000n))).toBe('GUARD_COOLDOWN_ACTIVE')

      t.clock.advance(1)
      t.token.transfer(ALICE, BOB, 10_000n)
      expect(t.token.lastTradeOf(ALICE)).toBe(START + 1_800)
    })

    test('excluded senders are never stamped', () => {
      const t = launched()
      t.token.transfer(OWNER, ALICE, 1n)
      t.token.transfer(OWNER, ALICE, 1n)
      expect(t.token.lastTradeOf(OWNER)).toBe(0)
    })

    test('a transfer rejected by a later check does not consume the window', () => {
      const t = launched()
      t.token.transfer(OWNER, CAROL, 975_000n)
      t.token.transfer(OWNER, CAROL, 975_000n)
      t.token.transfer(OWNER, ALICE, 100_000n)

      expect(codeOf(() => t.token.transfer(ALICE, CAROL, 60_000n))).toBe('GUARD_EXCEEDS_MAX_WALLET')
      expect(t.token.lastTradeOf(ALICE)).toBe(0)

      t.token.transfer(ALICE, BOB, 10_000n)
      expect(t.token.balanceOf(BOB)).toBe(9_500n)
    })

    test('a ledger failure after the guard passed rolls back every leg and the stamp', () => {
      const t = launched()
      t.token.transfer(OWNER, ALICE, 96_000n)
      t.events.length = 0

      // net leg fits, the liquidity leg no longer does
      expect(codeOf(() => t.token.transfer(ALICE, BOB, 100_000n))).toBe('LEDGER_INSUFFICIENT_BALANCE')

      expect(t.token.balanceOf(ALICE)).toBe(96_000n)
      expect(t.token.balanceOf(BOB)).toBe(0n)
      expect(t.token.balanceOf(TOKEN)).toBe(0n)
      expect(t.token.lastTradeOf(ALICE)).toBe(0)
      expect(t.events).toEqual([])
      expect(sumOfBalances(t)).toBe(SUPPLY)

      t.token.transfer(ALICE, BOB, 10_000n)
      expect(t.token.lastTradeOf(ALICE)).toBe(START)
    })
  })

  describe('transferFrom', () => {
    test('spends exactly the gross amount from the allowance', () => {
      const t = launched()
      t.token.transfer(OWNER, ALICE, 100_000n)
      t.token.approve(ALICE, CAROL, 50_000n)

      const receipt = t.token.transferFrom(CAROL, ALICE, BOB, 40_000n)

      expect(receipt.spender).toBe(CAROL)
      expect(t.token.balanceOf(BOB)).toBe(38_000n)
      expect(t.token.allowance(ALICE, CAROL)).toBe(10_000n)
    })

    test('insufficient allowance fails and changes nothing', () => {
      const t = launched()
      t.token.transfer(OWNER, ALICE, 100_000n)
      t.token.approve(ALICE, CAROL, 10_000n)

      expect(codeOf(() => t.token.transferFrom(CAROL, ALICE, BOB, 20_000n))).toBe('LEDGER_INSUFFICIENT_ALLOWANCE')
      expect(t.token.allowance(ALICE, CAROL)).toBe(10_000n)
      expect(t.token.balanceOf(ALICE)).toBe(100_000n)
      expect(t.token.lastTradeOf(ALICE)).toBe(0)
    })

    test('a guard rejection leaves the allowance untouched', () => {
      const t = launched()
      t.token.transfer(OWNER, ALICE, 100_000n)
      t.token.approve(ALICE, CAROL, 50_000n)
      t.token.setBlacklisted(OWNER, BOB, true)

      expect(codeOf(() => t.token.transferFrom(CAROL, ALICE, BOB, 20_000n))).toBe('GUARD_BLACKLISTED')
      expect(t.token.allowance(ALICE, CAROL)).toBe(50_000n)
    })

    test('allowance helpers adjust and announce the new value', () => {
      const t = launched()
      t.token.approve(ALICE, CAROL, 100n)
      t.token.increaseAllowance(ALICE, CAROL, 50n)
      t.token.decreaseAllowance(ALICE, CAROL, 30n)
      expect(t.token.allowance(ALICE, CAROL)).toBe(120n)
      expect(t.events.filter((e) => e.type === 'Approval').map((e) => (e.type === 'Approval' ? e.amount : 0n))).toEqual([100n, 150n, 120n])
      expect(codeOf(() => t.token.decreaseAllowance(ALICE, CAROL, 121n))).toBe('LEDGER_INSUFFICIENT_ALLOWANCE')
      expect(codeOf(() => t.token.approve(ALICE, '0x0000000000000000000000000000000000000000', 1n))).toBe('GUARD_INVALID_ADDRESS')
    })

    test('increaseAllowance refuses a negative increment', () => {
      const t = launched()
      t.token.approve(ALICE, CAROL, 100n)
      t.events.length = 0
      expect(codeOf(() => t.token.increaseAllowance(ALICE, CAROL, -60n))).toBe('LEDGER_INVALID_AMOUNT')
      expect(t.token.allowance(ALICE, CAROL)).toBe(100n)
      expect(t.events).toEqual([])
    })
  })

  test('standard config without anti-whale or cooldown still charges fees', () => {
    const t = makeToken(standardConfig({ features: { [FeatureName.AUTO_BURN]: true } }))
    t.token.enableTrading(OWNER)
    t.token.transfer(OWNER, ALICE, 10_000_000n)
    t.token.transfer(ALICE, BOB, 999n)
    t.token.transfer(ALICE, BOB, 999n)
    // 999 -> fee 49: legs 19/19/9 and 2 units of dust stay with alice, twice
    expect(t.token.balanceOf(BOB)).toBe(1_900n)
    expect(t.token.balanceOf(TOKEN)).toBe(38n)
    expect(t.token.balanceOf(MARKETING)).toBe(38n)
    expect(t.token.balanceOf(BURN_ADDRESS)).toBe(18n)
    expect(t.token.balanceOf(ALICE)).toBe(10_000_000n - 1_994n)
  })
})
