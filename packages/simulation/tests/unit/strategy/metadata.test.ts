import { describe, it, expect } from 'vitest';
import {
  assertSignalsMatchTargets,
  symbolTimeframes,
  validateStrategyMetadata,
} from '../../../src/strategy/metadata.js';

describe('strategy metadata', () => {
  it('accepts targets with optional anchors', () => {
    expect(validateStrategyMetadata({ targets: [{ symbol: 'LDO', timeframe: '1H' }] })).toEqual({
      targets: [{ symbol: 'LDO', timeframe: '1H' }],
      anchors: [],
    });
  });

  it('limits the number of targets', () => {
    const targets = ['A', 'B', 'C', 'D'].map((symbol) => ({ symbol, timeframe: '1H' }));

    expect(() => validateStrategyMetadata({ targets })).toThrow(
      'Invalid strategy metadata: targets: at most 3 targets are allowed'
    );
  });

  it('requires at least one target and upper-case symbols', () => {
    expect(() => validateStrategyMetadata({ targets: [] })).toThrow('at least one target is required');
    expect(() => validateStrategyMetadata({ targets: [{ symbol: 'ldo', timeframe: '1H' }] })).toThrow(
      'targets.0.symbol: symbol must be upper-case letters and digits'
    );
  });

  it('rejects unsupported timeframes and duplicate anchors', () => {
    let caught: unknown;
    try {
      validateStrategyMetadata({
        targets: [{ symbol: 'LDO', timeframe: '5M' }],
        anchors: [
          { symbol: 'BTC', timeframe: '4H' },
          { symbol: 'BTC', timeframe: '1D' },
        ],
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({ code: 'INVALID_STRATEGY_METADATA' });
    expect(String(caught)).toContain('targets.0.timeframe');
    expect(String(caught)).toContain('anchors: anchor symbols must be unique');
  });

  it('maps symbols to timeframes with targets taking precedence', () => {
    const metadata = validateStrategyMetadata({
      targets: [{ symbol: 'LDO', timeframe: '1H' }],
      anchors: [
        { symbol: 'BTC', timeframe: '4H' },
        { symbol: 'LDO', timeframe: '1D' },
      ],
    });

    expect(symbolTimeframes(metadata)).toEqual({ BTC: '4H', LDO: '1H' });
  });

  it('rejects signals on undeclared symbols', () => {
    const metadata = validateStrategyMetadata({ targets: [{ symbol: 'LDO', timeframe: '1H' }] });

    expect(() =>
      assertSignalsMatchTargets([{ timestamp: 0, symbol: 'LDO', signal: 'BUY', positionSize: 1 }], metadata)
    ).not.toThrow();
    expect(() =>
      assertSignalsMatchTargets(
        [
          { timestamp: 0, symbol: 'BTC', signal: 'HOLD', positionSize: 0 },
          { timestamp: 1, symbol: 'BTC', signal: 'BUY', positionSize: 1 },
        ],
        metadata
      )
    ).toThrow('Signals reference symbols that are not declared targets: BTC');
  });
});
