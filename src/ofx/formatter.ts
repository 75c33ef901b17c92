import { AccountSelector, ExportableAccount, ZoneOptions } from '../types';
import { bankAccountElement } from './account';
import { now } from './time';
import { parentElement, textElement } from './xml';

/**
 * The Transaction ID is usually the client ID sent in a request.
 * Since the data exported is not as a result of a request, we use 0
 */
export const UNSOLICITED_TRANSACTION_ID = '0';

export interface OfxFormatterOptions {
  exportAll?: boolean;
  zone?: ZoneOptions;
  clock?: () => Date;
}

/**
 * Builds the bank statement part of an OFX document for the accounts in the store.
 * Intended for a single run: the account list is read once, at construction.
 */
export class OfxFormatter {
  private readonly accounts: ExportableAccount[];
  private readonly exportAll: boolean;
  private readonly zone: ZoneOptions;
  private readonly clock: () => Date;

  constructor(private readonly selector: AccountSelector, options: OfxFormatterOptions = {}) {
    this.exportAll = options.exportAll ?? false;
    this.zone = options.zone ?? {};
    this.clock = options.clock ?? (() => new Date());
    this.accounts = selector.selectAccounts(this.exportAll);
  }

  /**
   * Appends BANKMSGSRSV1 to parent, with one STMTRS per account that has transactions.
   * Each account is marked exported right after its statement is written; an error stops
   * the run and leaves accounts already marked as they are.
   */
  toXml(doc: Document, parent: Element): void {
    // unsolicited because the data exported is not as a result of a request
    const statementTransactionResponse = parentElement(doc, 'STMTTRNRS', [
      textElement(doc, 'TRNUID', UNSOLICITED_TRANSACTION_ID),
    ]);
    parent.appendChild(parentElement(doc, 'BANKMSGSRSV1', [statementTransactionResponse]));

    // one timestamp for the whole run
    const currentTime = now(this.zone, this.clock);

    for (const account of this.accounts) {
      if (account.transactionCount === 0) continue;

      const bankTransactionsList = parentElement(doc, 'BANKTRANLIST', [
        textElement(doc, 'DTSTART', currentTime),
        textElement(doc, 'DTEND', currentTime),
      ]);

      const ledgerBalance = parentElement(doc, 'LEDGERBAL', [
        textElement(doc, 'BALAMT', account.balance),
        textElement(doc, 'DTASOF', currentTime),
      ]);

      const statement = parentElement(doc, 'STMTRS', [
        textElement(doc, 'CURDEF', account.currency),
        bankAccountElement(doc, 'BANKACCTFROM', account),
        bankTransactionsList,
        ledgerBalance,
      ]);
      statementTransactionResponse.appendChild(statement);

      account.appendTransactions(doc, bankTransactionsList, this.exportAll);

      this.selector.markExported(account.uid);
    }
  }
}
