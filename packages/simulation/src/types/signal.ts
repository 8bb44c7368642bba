/**
 * Signal Types
 * ============
 */

export const SIGNAL_ACTIONS = ['BUY', 'SELL', 'HOLD'] as const;

export type SignalAction = (typeof SIGNAL_ACTIONS)[number];

/** Actions that reach the trade executor */
export type TradeAction = Exclude<SignalAction, 'HOLD'>;

interface SignalBase {
  /** Decision time, epoch milliseconds */
  timestamp: number;
  symbol: string;
  /** Fraction of cash (BUY) or held shares (SELL) to transact, 0..1 */
  positionSize: number;
}

export interface TradeSignal extends SignalBase {
  signal: TradeAction;
}

export interface HoldSignal extends SignalBase {
  signal: 'HOLD';
}

export type Signal = TradeSignal | HoldSignal;
