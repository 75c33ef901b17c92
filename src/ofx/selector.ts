import { Database as DatabaseType } from 'better-sqlite3';
import { AccountSelector, ZoneOptions } from '../types';
import { AccountsRepository } from '../db/accounts';
import { TransactionsRepository } from '../db/transactions';
import { OfxAccount } from './account';

export class ExportSelector implements AccountSelector {
  constructor(
    private readonly accounts: AccountsRepository,
    private readonly transactions: TransactionsRepository,
    private readonly zone: ZoneOptions = {}
  ) {}

  static fromDatabase(db: DatabaseType, zone: ZoneOptions = {}): ExportSelector {
    return new ExportSelector(new AccountsRepository(db), new TransactionsRepository(db), zone);
  }

  /**
   * Every account when exportAll is set, otherwise only those with transactions not exported yet
   */
  selectAccounts(exportAll: boolean): OfxAccount[] {
    const accounts = exportAll ? this.accounts.getAllAccounts() : this.accounts.getExportableAccounts();
    return accounts.map(account => new OfxAccount(account, this.accounts, this.transactions, this.zone));
  }

  markExported(accountUid: string): void {
    this.transactions.markAsExported(accountUid);
  }
}
