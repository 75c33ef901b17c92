import { randomUUID } from 'crypto';
import { Database as DatabaseType } from 'better-sqlite3';
import { Account, AccountType, isAccountType } from '../types';
import { AppError, ErrorType } from '../utils/errors';
import { sumAmounts } from '../utils/money';

// ISO 4217 alphabetic code
const CURRENCY_CODE = /^[A-Z]{3}$/;

interface AccountRow {
  uid: string;
  name: string;
  type: string;
  currency: string;
}

export interface AddAccountInput {
  uid?: string;
  name: string;
  type: AccountType;
  currency: string;
}

function toAccount(row: AccountRow): Account {
  if (!isAccountType(row.type)) {
    throw new AppError({
      type: ErrorType.STORE_ERROR,
      message: `Account ${row.uid} has unknown type: ${row.type}`,
      context: { accountUid: row.uid },
    });
  }
  return { uid: row.uid, name: row.name, type: row.type, currency: row.currency };
}

export class AccountsRepository {
  constructor(private readonly db: DatabaseType) {}

  getAllAccounts(): Account[] {
    return this.db
      .prepare<[], AccountRow>('SELECT uid, name, type, currency FROM accounts ORDER BY rowid')
      .all()
      .map(toAccount);
  }

  /**
   * Accounts holding at least one transaction that has not been exported yet
   */
  getExportableAccounts(): Account[] {
    return this.db
      .prepare<[], AccountRow>(`
        SELECT uid, name, type, currency FROM accounts
        WHERE uid IN (SELECT DISTINCT account_uid FROM transactions WHERE exported = 0)
        ORDER BY rowid
      `)
      .all()
      .map(toAccount);
  }

  getAccount(uid: string): Account | null {
    const row = this.db
      .prepare<[string], AccountRow>('SELECT uid, name, type, currency FROM accounts WHERE uid = ?')
      .get(uid);
    return row ? toAccount(row) : null;
  }

  addAccount(input: AddAccountInput): Account {
    const currency = input.currency.trim().toUpperCase();
    if (!CURRENCY_CODE.test(currency)) {
      throw new AppError({
        type: ErrorType.VALIDATION_ERROR,
        message: `Invalid currency code: ${input.currency}`,
        context: { currency: input.currency },
      });
    }

    const account: Account = {
      uid: input.uid ?? randomUUID(),
      name: input.name,
      type: input.type,
      currency,
    };
    this.db
      .prepare<Account>('INSERT INTO accounts (uid, name, type, currency) VALUES (@uid, @name, @type, @currency)')
      .run(account);
    return account;
  }

  getBalance(uid: string): string {
    const amounts = this.db
      .prepare<[string], { amount: string }>('SELECT amount FROM transactions WHERE account_uid = ?')
      .all(uid)
      .map(row => row.amount);
    return sumAmounts(amounts);
  }

  getTransactionCount(uid: string): number {
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM transactions WHERE account_uid = ?')
      .get(uid);
    return row?.count ?? 0;
  }
}
