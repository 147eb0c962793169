import type { AccountState, LedgerEntry, Position } from '../types/trading';

export function utcDay(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

export function initialAccountState(initialEquity: number): AccountState {
  return {
    equity: initialEquity,
    availableMargin: initialEquity,
    usedMargin: 0,
    dailyRealizedPnl: 0,
    equityAtDayStart: initialEquity,
    tradingDay: '',
    consecutiveLosses: 0,
    openPositionIds: [],
    openPositions: [],
    lastSequence: 0
  };
}

export function rollToDay(state: AccountState, day: string): AccountState {
  if (state.tradingDay === day) return state;
  return { ...state, tradingDay: day, dailyRealizedPnl: 0, equityAtDayStart: state.equity };
}

function withPositions(state: AccountState, openPositions: Position[], equity: number): AccountState {
  const usedMargin = openPositions.reduce((sum, position) => sum + position.margin, 0);
  return {
    ...state,
    equity,
    usedMargin,
    availableMargin: equity - usedMargin,
    openPositions,
    openPositionIds: openPositions.map(position => position.id)
  };
}

/**
 * Folds one ledger entry into the account. Both the live account and ledger
 * replay go through this function, so they agree entry for entry.
 * Equity moves only on TRADE entries; a trade's realizedPnl is net of entry
 * and exit fees.
 */
export function applyEntry(state: AccountState, entry: LedgerEntry): AccountState {
  const next: AccountState = { ...state, lastSequence: entry.seq };

  switch (entry.kind) {
    case 'POSITION_OPENED':
      return withPositions(next, [...next.openPositions, { ...entry.position }], next.equity);

    case 'TRADE': {
      const { trade } = entry;
      const rolled = rollToDay(next, utcDay(trade.closedAt));
      const remaining = rolled.openPositions.filter(position => position.id !== trade.positionId);
      const updated = withPositions(rolled, remaining, rolled.equity + trade.realizedPnl);
      return {
        ...updated,
        dailyRealizedPnl: rolled.dailyRealizedPnl + trade.realizedPnl,
        consecutiveLosses: trade.realizedPnl < 0 ? rolled.consecutiveLosses + 1 : 0
      };
    }

    case 'BREAKER_RESET':
      return entry.scope === 'OPERATOR' ? { ...next, consecutiveLosses: 0 } : next;

    case 'REJECTION':
    case 'BREAKER_TRIPPED':
      return next;
  }
}

export function reduceEntries(initialEquity: number, entries: readonly LedgerEntry[], now: number): AccountState {
  const state = entries.reduce(applyEntry, initialAccountState(initialEquity));
  return rollToDay(state, utcDay(now));
}
