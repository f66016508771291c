// Valuation Tests
import { describe, expect, it } from 'vitest';
import { ValuationEngine } from './valuation';
import { PriceOracle } from './oracle';
import { AccountingStore } from './store';
import { MockV3Aggregator } from './feeds/mock-aggregator';
import { MockErc20 } from './token';
import { ONE, USER, address, createFixture, expectCode } from './test-utils';

const NOW = 1_700_000_000;

function setup(initialAnswer = 2000_00000000n) {
  const token = new MockErc20(address('e1'), 'WETH');
  const feed = new MockV3Aggregator(address('f1'), 8, initialAnswer, () => NOW);
  const store = new AccountingStore([token], [feed]);
  const valuation = new ValuationEngine(store, new PriceOracle({ clock: () => NOW }));
  return { token, feed, store, valuation };
}

describe('ValuationEngine', () => {
  describe('usdValue', () => {
    it('should value 15 WETH at $2000 as $30,000', () => {
      const { token, valuation } = setup();

      expect(valuation.usdValue(token.address, 15n * ONE)).toBe(30_000n * ONE);
    });

    it('should value fractional quantities', () => {
      const { token, valuation } = setup(1234_56000000n);

      expect(valuation.usdValue(token.address, ONE / 2n)).toBe(617_280_000_000_000_000_000n);
    });

    it('should treat a zero or negative price as worthless collateral', () => {
      const { token, feed, valuation } = setup();

      feed.updateAnswer(0n);
      expect(valuation.usdValue(token.address, 10n * ONE)).toBe(0n);

      feed.updateAnswer(-5_00000000n);
      expect(valuation.usdValue(token.address, 10n * ONE)).toBe(0n);
    });

    it('should reject an unregistered asset', () => {
      const { valuation } = setup();

      expectCode(() => valuation.usdValue(address('dead'), ONE), 'COLLATERAL_NOT_ALLOWED');
    });
  });

  describe('assetQuantityFromUsd', () => {
    it('should convert $100 into 0.05 WETH at $2000', () => {
      const { token, valuation } = setup();

      expect(valuation.assetQuantityFromUsd(token.address, 100n * ONE)).toBe(50_000_000_000_000_000n);
    });

    it('should truncate toward zero', () => {
      const { token, valuation } = setup(3_00000000n);

      expect(valuation.assetQuantityFromUsd(token.address, 10n * ONE)).toBe(3_333_333_333_333_333_333n);
    });

    it('should lose at most one base unit on a round trip', () => {
      const { token, valuation } = setup(3_00000000n);
      const quantities = [1n, 7n, ONE, 10n * ONE + 1n, 123_456_789_012_345_678_901n];

      for (const quantity of quantities) {
        const usd = valuation.usdValue(token.address, quantity);
        const back = valuation.assetQuantityFromUsd(token.address, usd);
        expect(back).toBeLessThanOrEqual(quantity);
        expect(quantity - back).toBeLessThanOrEqual(1n);
      }
    });

    it('should fail with DIVISION_BY_ZERO on a zero or negative price', () => {
      const { token, feed, valuation } = setup();

      feed.updateAnswer(0n);
      expectCode(() => valuation.assetQuantityFromUsd(token.address, ONE), 'DIVISION_BY_ZERO');

      feed.updateAnswer(-1n);
      expectCode(() => valuation.assetQuantityFromUsd(token.address, ONE), 'DIVISION_BY_ZERO');
    });
  });

  describe('totalCollateralValue', () => {
    it('should sum every registered asset', () => {
      const f = createFixture();
      f.fund(USER, 'WETH', 2n * ONE);
      f.fund(USER, 'WBTC', 3n * ONE);
      f.engine.depositCollateral(USER, f.weth, 2n * ONE);
      f.engine.depositCollateral(USER, f.wbtc, 3n * ONE);

      expect(f.engine.getAccountCollateralValue(USER)).toBe(7_000n * ONE);
      expect(f.engine.getAccountInformation(USER)).toEqual({
        totalDscMinted: 0n,
        collateralValueInUsd: 7_000n * ONE,
      });
    });

    it('should count an asset registered twice twice', () => {
      const token = new MockErc20(address('e1'), 'WETH');
      const feed = new MockV3Aggregator(address('f1'), 8, 2000_00000000n, () => NOW);
      const store = new AccountingStore([token, token], [feed, feed]);
      const valuation = new ValuationEngine(store, new PriceOracle({ clock: () => NOW }));
      store.recordDeposit(USER, token.address, ONE);

      expect(store.getCollateralTokens()).toEqual([token.address, token.address]);
      expect(valuation.totalCollateralValue(USER)).toBe(4_000n * ONE);
    });

    it('should be zero for an unknown user', () => {
      const { valuation } = setup();

      expect(valuation.totalCollateralValue(address('bee'))).toBe(0n);
    });
  });
});
