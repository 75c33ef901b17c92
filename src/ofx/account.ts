import { Account, ExportableAccount, Transaction, ZoneOptions } from '../types';
import { AccountsRepository } from '../db/accounts';
import { TransactionsRepository } from '../db/transactions';
import { formatTimestampWithOffset } from './time';
import { parentElement, textElement } from './xml';

/**
 * ID which will be used as the bank ID for OFX from this app
 */
export const APP_ID = 'org.gnucash.android';

export function bankAccountElement(doc: Document, name: string, account: Account): Element {
  return parentElement(doc, name, [
    textElement(doc, 'BANKID', APP_ID),
    textElement(doc, 'ACCTID', account.uid),
    textElement(doc, 'ACCTTYPE', account.type),
  ]);
}

/**
 * An account read from the store that writes its own transactions as STMTTRN elements
 */
export class OfxAccount implements ExportableAccount {
  readonly uid: string;
  readonly name: string;
  readonly type: Account['type'];
  readonly currency: string;
  readonly balance: string;
  readonly transactionCount: number;

  constructor(
    account: Account,
    private readonly accounts: AccountsRepository,
    private readonly transactions: TransactionsRepository,
    private readonly zone: ZoneOptions = {}
  ) {
    this.uid = account.uid;
    this.name = account.name;
    this.type = account.type;
    this.currency = account.currency;
    this.balance = accounts.getBalance(account.uid);
    this.transactionCount = accounts.getTransactionCount(account.uid);
  }

  appendTransactions(doc: Document, parent: Element, exportAll: boolean): void {
    for (const transaction of this.transactions.getTransactions(this.uid, exportAll)) {
      parent.appendChild(this.transactionToXml(doc, transaction));
    }
  }

  private transactionToXml(doc: Document, transaction: Transaction): Element {
    const posted = formatTimestampWithOffset(transaction.timestamp, this.zone);

    const children = [
      textElement(doc, 'TRNTYPE', transaction.type),
      textElement(doc, 'DTPOSTED', posted),
      textElement(doc, 'DTUSER', posted),
      textElement(doc, 'TRNAMT', transaction.amount),
      textElement(doc, 'FITID', transaction.uid),
      textElement(doc, 'NAME', transaction.name),
    ];

    if (transaction.description !== '') {
      children.push(textElement(doc, 'MEMO', transaction.description));
    }

    // double entry: the other side of the transfer
    if (transaction.transferAccountUid !== undefined) {
      const transferAccount = this.accounts.getAccount(transaction.transferAccountUid);
      if (transferAccount) {
        children.push(bankAccountElement(doc, 'BANKACCTTO', transferAccount));
      }
    }

    return parentElement(doc, 'STMTTRN', children);
  }
}
