import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { UnsupportedOperationError } from '../errors/index.js';
import { formatQuantized, quantize } from '../utils/decimal-utils.js';

/**
 * generic covers movements that are neither deposit nor withdrawal (e.g. exchange reward points)
 */
export type TransactionKind = 'deposit' | 'withdrawal' | 'generic';

export interface Transaction {
  readonly kind: TransactionKind;
  readonly transactionId: string;
  readonly datetime: Date;
  readonly currency: string;
  readonly amount: Decimal;
  readonly address: string;
  readonly fee: Decimal | undefined;
}

export function createTransaction(input: Transaction): Transaction {
  return Object.freeze({ ...input, currency: input.currency.toUpperCase() });
}

/**
 * Amount that actually moved: a deposit nets out its fee, a withdrawal pays the fee on top.
 */
export function getNetAmount(transaction: Transaction): Result<Decimal, UnsupportedOperationError> {
  const { amount, fee } = transaction;

  switch (transaction.kind) {
    case 'deposit':
      return ok(fee && !fee.isZero() ? quantize(amount.minus(fee)) : amount);
    case 'withdrawal':
      return ok(fee && !fee.isZero() ? quantize(amount.plus(fee)) : amount);
    case 'generic':
      return err(
        new UnsupportedOperationError(`Net amount is not defined for generic transaction ${transaction.transactionId}`, {
          transactionId: transaction.transactionId,
        })
      );
  }
}

const KIND_LABELS: Record<TransactionKind, string> = {
  deposit: 'Deposit',
  generic: 'Transaction',
  withdrawal: 'Withdrawal',
};

export function describeTransaction(transaction: Transaction): string {
  return `${KIND_LABELS[transaction.kind]} transaction of ${formatQuantized(transaction.amount)} ${transaction.currency}`;
}
