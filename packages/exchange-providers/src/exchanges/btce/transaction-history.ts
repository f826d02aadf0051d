import { createTrade, createTransaction, parseDecimal, quantize, type Trade, type Transaction } from '@ledgerline/core';
import { getLogger } from '@ledgerline/logger';
import { Decimal } from 'decimal.js';

import { ReconciliationError } from '../../core/errors.js';

import { fromEpochSeconds } from './btce-utils.js';
import type { BtceTradeHistoryEntry, BtceTransHistoryEntry } from './schemas.js';
import { parseTradeDescription } from './trade-description.js';

const logger = getLogger('BtceTransactionHistory');

const HISTORY_DEPOSIT = 1;
const HISTORY_WITHDRAWAL = 2;
const HISTORY_TRADE_TYPES = new Set([4, 5]);

const ADDRESS_MARKER = 'address ';

export interface ReconcileOptions {
  transactions: boolean;
  trades: boolean;
}

export interface ReconciliationResult {
  transactions: Transaction[];
  trades: Trade[];
  failures: ReconciliationError[];
}

export interface TradeIdMatch {
  candidateCount: number;
  tradeId: string | undefined;
}

/**
 * Text after the first `address ` marker, or '' when there is none. A marker at index 0 counts.
 */
export function extractWithdrawalAddress(description: string): string {
  const index = description.indexOf(ADDRESS_MARKER);
  return index === -1 ? '' : description.slice(index + ADDRESS_MARKER.length);
}

export function commonPrefixLength(a: string, b: string): number {
  const max = Math.min(a.length, b.length);
  let length = 0;
  while (length < max && a[length] === b[length]) {
    length++;
  }
  return length;
}

/**
 * Recover the trade id of a history entry from the trade feed.
 *
 * Candidates share the entry's timestamp and order id. With several, an exact amount-text
 * match wins, otherwise the first candidate with a strictly longer common amount prefix
 * (starting from 0, so a candidate sharing nothing never wins).
 */
export function matchTradeId(
  tradeHistory: Record<string, BtceTradeHistoryEntry>,
  target: { amount: string; orderId: string; timestamp: number }
): TradeIdMatch {
  const candidates = Object.entries(tradeHistory).filter(
    ([, trade]) => trade.timestamp === target.timestamp && trade.order_id === target.orderId
  );
  const candidateCount = candidates.length;

  if (candidateCount <= 1) {
    return { candidateCount, tradeId: candidates[0]?.[0] };
  }

  const exact = candidates.find(([, trade]) => trade.amount === target.amount);
  if (exact) {
    return { candidateCount, tradeId: exact[0] };
  }

  // Zero, not unset: a candidate sharing no leading character never wins (see DESIGN.md, fuzzy tie-break)
  let bestScore = 0;
  let tradeId: string | undefined;
  for (const [id, trade] of candidates) {
    const score = commonPrefixLength(trade.amount, target.amount);
    if (score > bestScore) {
      bestScore = score;
      tradeId = id;
    }
  }
  return { candidateCount, tradeId };
}

function reconcileTrade(
  historyId: string,
  entry: BtceTransHistoryEntry,
  tradeHistory: Record<string, BtceTradeHistoryEntry>
): Trade | ReconciliationError | undefined {
  const parsed = parseTradeDescription(entry.desc);
  if (parsed.kind === 'none') {
    logger.debug(`Skipping history entry ${historyId}: description is not a trade (${entry.desc})`);
    return undefined;
  }

  const { candidateCount, tradeId } = matchTradeId(tradeHistory, {
    amount: parsed.amount,
    orderId: parsed.orderId,
    timestamp: entry.timestamp,
  });

  const failure = (reason: string) =>
    new ReconciliationError(
      `History entry ${historyId}: ${reason}`,
      historyId,
      parsed.orderId,
      entry.timestamp,
      candidateCount
    );

  if (tradeId === undefined) {
    return failure(
      candidateCount === 0
        ? `no trade found for order ${parsed.orderId} at ${entry.timestamp}`
        : `none of ${candidateCount} trades for order ${parsed.orderId} matches amount ${parsed.amount}`
    );
  }

  const amount = parseDecimal(parsed.amount);
  const price = parseDecimal(parsed.price);
  const feePercent = new Decimal(parsed.feePercent);
  const fee =
    parsed.kind === 'buy'
      ? quantize(feePercent.times(amount).dividedBy(100))
      : quantize(feePercent.times(amount).times(price).dividedBy(100));

  const trade = createTrade({
    side: parsed.kind,
    tradeId,
    baseCurrency: parsed.baseCurrency,
    counterCurrency: parsed.counterCurrency,
    datetime: fromEpochSeconds(entry.timestamp),
    orderId: parsed.orderId,
    amount,
    price,
    fee,
  });

  return trade.isOk() ? trade.value : failure(trade.error.message);
}

function toTransaction(historyId: string, entry: BtceTransHistoryEntry): Transaction {
  const common = {
    transactionId: historyId,
    datetime: fromEpochSeconds(entry.timestamp),
    currency: entry.currency,
    amount: entry.amount,
  };

  if (entry.type === HISTORY_DEPOSIT) {
    return createTransaction({ ...common, kind: 'deposit', address: '', fee: new Decimal(0) });
  }
  return createTransaction({
    ...common,
    kind: 'withdrawal',
    address: extractWithdrawalAddress(entry.desc),
    fee: undefined,
  });
}

/**
 * Split the BTC-e history feed into deposits/withdrawals and trades.
 * Trade entries are matched against the trade feed; entries that cannot be matched are
 * reported in `failures` without aborting the batch. Output follows feed order.
 */
export function reconcileTransactionHistory(
  history: Record<string, BtceTransHistoryEntry>,
  tradeHistory: Record<string, BtceTradeHistoryEntry>,
  options: ReconcileOptions
): ReconciliationResult {
  const result: ReconciliationResult = { failures: [], trades: [], transactions: [] };

  for (const [historyId, entry] of Object.entries(history)) {
    if (entry.type === HISTORY_DEPOSIT || entry.type === HISTORY_WITHDRAWAL) {
      if (options.transactions) {
        result.transactions.push(toTransaction(historyId, entry));
      }
      continue;
    }

    if (!HISTORY_TRADE_TYPES.has(entry.type)) {
      logger.debug(`Skipping history entry ${historyId} of type ${entry.type}`);
      continue;
    }
    if (!options.trades) {
      continue;
    }

    const outcome = reconcileTrade(historyId, entry, tradeHistory);
    if (outcome instanceof ReconciliationError) {
      result.failures.push(outcome);
    } else if (outcome) {
      result.trades.push(outcome);
    }
  }

  return result;
}
