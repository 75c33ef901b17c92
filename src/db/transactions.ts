import { randomUUID } from 'crypto';
import { Database as DatabaseType } from 'better-sqlite3';
import { Transaction, TransactionType, isTransactionType } from '../types';
import { AppError, ErrorType } from '../utils/errors';
import { isNegativeAmount, normalizeAmount } from '../utils/money';

interface TransactionRow {
  uid: string;
  account_uid: string;
  name: string;
  description: string;
  amount: string;
  type: string;
  timestamp: number;
  transfer_account_uid: string | null;
  exported: number;
}

export interface AddTransactionInput {
  uid?: string;
  accountUid: string;
  name: string;
  description?: string;
  amount: string;
  type?: TransactionType;
  timestamp?: number;
  transferAccountUid?: string;
}

export type TransactionChanges = Partial<
  Pick<Transaction, 'name' | 'description' | 'amount' | 'type' | 'timestamp' | 'transferAccountUid'>
>;

const COLUMNS = 'uid, account_uid, name, description, amount, type, timestamp, transfer_account_uid, exported';

function toTransaction(row: TransactionRow): Transaction {
  if (!isTransactionType(row.type)) {
    throw new AppError({
      type: ErrorType.STORE_ERROR,
      message: `Transaction ${row.uid} has unknown type: ${row.type}`,
      context: { transactionUid: row.uid },
    });
  }
  const transaction: Transaction = {
    uid: row.uid,
    accountUid: row.account_uid,
    name: row.name,
    description: row.description,
    amount: row.amount,
    type: row.type,
    timestamp: row.timestamp,
    exported: row.exported !== 0,
  };
  if (row.transfer_account_uid !== null) {
    transaction.transferAccountUid = row.transfer_account_uid;
  }
  return transaction;
}

export class TransactionsRepository {
  constructor(private readonly db: DatabaseType) {}

  /**
   * Transactions of an account, oldest first.
   * Unless exportAll is set, only those not exported yet.
   */
  getTransactions(accountUid: string, exportAll: boolean): Transaction[] {
    const filter = exportAll ? '' : 'AND exported = 0';
    return this.db
      .prepare<[string], TransactionRow>(
        `SELECT ${COLUMNS} FROM transactions WHERE account_uid = ? ${filter} ORDER BY timestamp ASC, rowid ASC`
      )
      .all(accountUid)
      .map(toTransaction);
  }

  getTransaction(uid: string): Transaction | null {
    const row = this.db
      .prepare<[string], TransactionRow>(`SELECT ${COLUMNS} FROM transactions WHERE uid = ?`)
      .get(uid);
    return row ? toTransaction(row) : null;
  }

  addTransaction(input: AddTransactionInput): Transaction {
    const amount = normalizeAmount(input.amount);
    const transaction: Transaction = {
      uid: input.uid ?? randomUUID(),
      accountUid: input.accountUid,
      name: input.name,
      description: input.description ?? '',
      amount,
      type: input.type ?? (isNegativeAmount(amount) ? TransactionType.DEBIT : TransactionType.CREDIT),
      timestamp: input.timestamp ?? Date.now(),
      exported: false,
    };
    if (input.transferAccountUid !== undefined) {
      transaction.transferAccountUid = input.transferAccountUid;
    }

    this.db
      .prepare(`
        INSERT INTO transactions (uid, account_uid, name, description, amount, type, timestamp, transfer_account_uid)
        VALUES (@uid, @accountUid, @name, @description, @amount, @type, @timestamp, @transferAccountUid)
      `)
      .run({
        uid: transaction.uid,
        accountUid: transaction.accountUid,
        name: transaction.name,
        description: transaction.description,
        amount: transaction.amount,
        type: transaction.type,
        timestamp: transaction.timestamp,
        transferAccountUid: transaction.transferAccountUid ?? null,
      });
    return transaction;
  }

  /**
   * Applies changes to a transaction. A modified transaction is exported again on the next default export.
   */
  updateTransaction(uid: string, changes: TransactionChanges): Transaction {
    const current = this.getTransaction(uid);
    if (!current) {
      throw new AppError({
        type: ErrorType.NOT_FOUND,
        message: `Transaction not found: ${uid}`,
        context: { transactionUid: uid },
      });
    }

    const updated: Transaction = {
      ...current,
      ...changes,
      amount: changes.amount !== undefined ? normalizeAmount(changes.amount) : current.amount,
      exported: false,
    };

    this.db
      .prepare(`
        UPDATE transactions
        SET name = @name,
            description = @description,
            amount = @amount,
            type = @type,
            timestamp = @timestamp,
            transfer_account_uid = @transferAccountUid,
            exported = 0
        WHERE uid = @uid
      `)
      .run({
        uid: updated.uid,
        name: updated.name,
        description: updated.description,
        amount: updated.amount,
        type: updated.type,
        timestamp: updated.timestamp,
        transferAccountUid: updated.transferAccountUid ?? null,
      });
    return updated;
  }

  markAsExported(accountUid: string): number {
    const info = this.db
      .prepare<[string]>('UPDATE transactions SET exported = 1 WHERE account_uid = ?')
      .run(accountUid);
    return info.changes;
  }

  getUnexportedCount(accountUid: string): number {
    const row = this.db
      .prepare<[string], { count: number }>(
        'SELECT COUNT(*) AS count FROM transactions WHERE account_uid = ? AND exported = 0'
      )
      .get(accountUid);
    return row?.count ?? 0;
  }
}
