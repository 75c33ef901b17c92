export enum AccountType {
  CASH = 'CASH',
  BANK = 'BANK',
  CREDIT = 'CREDIT',
  ASSET = 'ASSET',
  LIABILITY = 'LIABILITY',
  INCOME = 'INCOME',
  EXPENSE = 'EXPENSE',
  PAYABLE = 'PAYABLE',
  RECEIVABLE = 'RECEIVABLE',
  EQUITY = 'EQUITY',
  CURRENCY = 'CURRENCY',
  STOCK = 'STOCK',
  MUTUAL_FUND = 'MUTUAL_FUND',
}

export enum TransactionType {
  DEBIT = 'DEBIT',
  CREDIT = 'CREDIT',
}

export interface Account {
  uid: string;
  name: string;
  type: AccountType;
  currency: string; // ISO 4217 code
}

export interface Transaction {
  uid: string;
  accountUid: string;
  name: string;
  description: string;
  amount: string; // exact decimal, e.g. "-12.50"
  type: TransactionType;
  timestamp: number; // epoch millis
  transferAccountUid?: string;
  exported: boolean;
}

export interface ZoneOptions {
  timeZone?: string; // IANA zone, e.g. 'America/Los_Angeles'
  locale?: string; // BCP 47 tag used for the zone abbreviation
}

/**
 * Something that can write its own transactions into an OFX transaction list
 */
export interface TransactionSource {
  appendTransactions(doc: Document, parent: Element, exportAll: boolean): void;
}

export interface ExportableAccount extends Account, TransactionSource {
  balance: string;
  transactionCount: number;
}

export interface AccountSelector {
  selectAccounts(exportAll: boolean): ExportableAccount[];
  markExported(accountUid: string): void;
}

export function isAccountType(value: string): value is AccountType {
  return Object.values(AccountType).some(type => type === value);
}

export function isTransactionType(value: string): value is TransactionType {
  return value === TransactionType.DEBIT || value === TransactionType.CREDIT;
}
