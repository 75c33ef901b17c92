/**
 * Tests for the OFX statement builder
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { OfxFormatter, UNSOLICITED_TRANSACTION_ID } from '../../src/ofx/formatter';
import { ExportSelector } from '../../src/ofx/selector';
import { APP_ID } from '../../src/ofx/account';
import { serializeOfx } from '../../src/ofx/document';
import { AccountSelector, AccountType, ExportableAccount } from '../../src/types';
import {
  FIXED_INSTANT,
  FIXED_NOW,
  UTC,
  child,
  childNames,
  createParent,
  createStore,
  elementsByTag,
  seedAccount,
  Store,
  textOf,
} from '../fixtures/store';

const fixedClock = () => FIXED_INSTANT;

// 2024-01-10 08:00:00 UTC
const POSTED = Date.UTC(2024, 0, 10, 8, 0, 0);

function build(selector: AccountSelector, exportAll: boolean, clock: () => Date = fixedClock) {
  const { doc, parent } = createParent();
  new OfxFormatter(selector, { exportAll, zone: UTC, clock }).toXml(doc, parent);
  return { doc, parent };
}

function fakeAccount(uid: string, overrides: Partial<ExportableAccount> = {}): ExportableAccount {
  return {
    uid,
    name: uid,
    type: AccountType.BANK,
    currency: 'USD',
    balance: '1.00',
    transactionCount: 1,
    appendTransactions: () => undefined,
    ...overrides,
  };
}

function fakeSelector(accounts: ExportableAccount[]) {
  return {
    selectAccounts: vi.fn((_exportAll: boolean) => accounts),
    markExported: vi.fn((_accountUid: string) => undefined),
  };
}

describe('OfxFormatter', () => {
  let store: Store;
  let selector: ExportSelector;

  beforeEach(() => {
    store = createStore();
    selector = ExportSelector.fromDatabase(store.db, UTC);
  });

  describe('envelope', () => {
    it('should write a single response envelope even with no accounts', () => {
      const { parent } = build(selector, true);

      expect(childNames(parent)).toEqual(['BANKMSGSRSV1']);
      const bankMessages = child(parent, 'BANKMSGSRSV1');
      expect(childNames(bankMessages)).toEqual(['STMTTRNRS']);
      const response = child(bankMessages, 'STMTTRNRS');
      expect(childNames(response)).toEqual(['TRNUID']);
      expect(textOf(response, 'TRNUID')).toBe(UNSOLICITED_TRANSACTION_ID);
      expect(UNSOLICITED_TRANSACTION_ID).toBe('0');
    });

    it('should put every statement under the one response', () => {
      seedAccount(store, 'A');
      seedAccount(store, 'B');
      store.transactions.addTransaction({ accountUid: 'A', name: 'a', amount: '1' });
      store.transactions.addTransaction({ accountUid: 'B', name: 'b', amount: '2' });

      const { doc } = build(selector, true);

      expect(elementsByTag(doc, 'BANKMSGSRSV1')).toHaveLength(1);
      expect(elementsByTag(doc, 'STMTTRNRS')).toHaveLength(1);
      expect(elementsByTag(doc, 'TRNUID')).toHaveLength(1);
      const response = elementsByTag(doc, 'STMTTRNRS')[0];
      expect(response && childNames(response)).toEqual(['TRNUID', 'STMTRS', 'STMTRS']);
    });
  });

  describe('statement', () => {
    beforeEach(() => {
      seedAccount(store, 'acct-1', AccountType.CREDIT, 'EUR');
      store.transactions.addTransaction({ uid: 't1', accountUid: 'acct-1', name: 'Salary', amount: '10.25', timestamp: POSTED });
      store.transactions.addTransaction({ uid: 't2', accountUid: 'acct-1', name: 'Bonus', amount: '2.25', timestamp: POSTED + 1000 });
    });

    it('should order the statement children', () => {
      const { doc } = build(selector, true);
      const [statement] = elementsByTag(doc, 'STMTRS');
      if (!statement) throw new Error('no STMTRS');

      expect(childNames(statement)).toEqual(['CURDEF', 'BANKACCTFROM', 'BANKTRANLIST', 'LEDGERBAL']);
      expect(textOf(statement, 'CURDEF')).toBe('EUR');
    });

    it('should identify the account', () => {
      const { doc } = build(selector, true);
      const [from] = elementsByTag(doc, 'BANKACCTFROM');
      if (!from) throw new Error('no BANKACCTFROM');

      expect(childNames(from)).toEqual(['BANKID', 'ACCTID', 'ACCTTYPE']);
      expect(textOf(from, 'BANKID')).toBe(APP_ID);
      expect(textOf(from, 'BANKID')).toBe('org.gnucash.android');
      expect(textOf(from, 'ACCTID')).toBe('acct-1');
      expect(textOf(from, 'ACCTTYPE')).toBe('CREDIT');
    });

    it('should render the ledger balance as an exact decimal', () => {
      const { doc } = build(selector, true);
      const [ledger] = elementsByTag(doc, 'LEDGERBAL');
      if (!ledger) throw new Error('no LEDGERBAL');

      expect(childNames(ledger)).toEqual(['BALAMT', 'DTASOF']);
      expect(textOf(ledger, 'BALAMT')).toBe('12.50');
      expect(textOf(ledger, 'DTASOF')).toBe(FIXED_NOW);
    });

    it('should open the transaction list with the date window and append the transactions', () => {
      const { doc } = build(selector, true);
      const [list] = elementsByTag(doc, 'BANKTRANLIST');
      if (!list) throw new Error('no BANKTRANLIST');

      expect(childNames(list)).toEqual(['DTSTART', 'DTEND', 'STMTTRN', 'STMTTRN']);
      expect(textOf(list, 'DTSTART')).toBe(FIXED_NOW);
      expect(textOf(list, 'DTEND')).toBe(FIXED_NOW);
    });
  });

  describe('transactions', () => {
    beforeEach(() => {
      seedAccount(store, 'checking');
      seedAccount(store, 'savings', AccountType.ASSET);
    });

    it('should write each transaction as STMTTRN', () => {
      store.transactions.addTransaction({
        uid: 'fit-1',
        accountUid: 'checking',
        name: 'Groceries',
        description: 'Weekly shop',
        amount: '-45.10',
        timestamp: POSTED,
      });

      const { doc } = build(selector, true);
      const [transaction] = elementsByTag(doc, 'STMTTRN');
      if (!transaction) throw new Error('no STMTTRN');

      expect(childNames(transaction)).toEqual(['TRNTYPE', 'DTPOSTED', 'DTUSER', 'TRNAMT', 'FITID', 'NAME', 'MEMO']);
      expect(textOf(transaction, 'TRNTYPE')).toBe('DEBIT');
      expect(textOf(transaction, 'DTPOSTED')).toBe('20240110080000[0:UTC]');
      expect(textOf(transaction, 'DTUSER')).toBe('20240110080000[0:UTC]');
      expect(textOf(transaction, 'TRNAMT')).toBe('-45.10');
      expect(textOf(transaction, 'FITID')).toBe('fit-1');
      expect(textOf(transaction, 'NAME')).toBe('Groceries');
      expect(textOf(transaction, 'MEMO')).toBe('Weekly shop');
    });

    it('should leave out MEMO when there is no description', () => {
      store.transactions.addTransaction({ accountUid: 'checking', name: 'Fee', amount: '-1', timestamp: POSTED });

      const { doc } = build(selector, true);
      const [transaction] = elementsByTag(doc, 'STMTTRN');
      if (!transaction) throw new Error('no STMTTRN');

      expect(childNames(transaction)).toEqual(['TRNTYPE', 'DTPOSTED', 'DTUSER', 'TRNAMT', 'FITID', 'NAME']);
    });

    it('should name the other account of a transfer', () => {
      store.transactions.addTransaction({
        accountUid: 'checking',
        name: 'To savings',
        amount: '-100',
        timestamp: POSTED,
        transferAccountUid: 'savings',
      });

      const { doc } = build(selector, true);
      const [to] = elementsByTag(doc, 'BANKACCTTO');
      if (!to) throw new Error('no BANKACCTTO');

      expect(childNames(to)).toEqual(['BANKID', 'ACCTID', 'ACCTTYPE']);
      expect(textOf(to, 'BANKID')).toBe('org.gnucash.android');
      expect(textOf(to, 'ACCTID')).toBe('savings');
      expect(textOf(to, 'ACCTTYPE')).toBe('ASSET');
    });

    it('should only write new transactions of an account by default', () => {
      store.transactions.addTransaction({ uid: 'old', accountUid: 'checking', name: 'Old', amount: '1', timestamp: POSTED });
      store.transactions.markAsExported('checking');
      store.transactions.addTransaction({ uid: 'new', accountUid: 'checking', name: 'New', amount: '2', timestamp: POSTED + 1 });

      const { doc } = build(selector, false);

      expect(elementsByTag(doc, 'FITID').map(e => e.textContent)).toEqual(['new']);
      // the balance still covers every transaction
      expect(elementsByTag(doc, 'BALAMT').map(e => e.textContent)).toEqual(['3']);
    });

    it('should write every transaction when exporting all', () => {
      store.transactions.addTransaction({ uid: 'old', accountUid: 'checking', name: 'Old', amount: '1', timestamp: POSTED });
      store.transactions.markAsExported('checking');
      store.transactions.addTransaction({ uid: 'new', accountUid: 'checking', name: 'New', amount: '2', timestamp: POSTED + 1 });

      const { doc } = build(selector, true);

      expect(elementsByTag(doc, 'FITID').map(e => e.textContent)).toEqual(['old', 'new']);
    });
  });

  describe('account selection', () => {
    it('should skip accounts without transactions', () => {
      seedAccount(store, 'A');
      seedAccount(store, 'B');
      store.transactions.addTransaction({ accountUid: 'B', name: 'b1', amount: '1' });
      store.transactions.addTransaction({ accountUid: 'B', name: 'b2', amount: '1' });
      const markExported = vi.spyOn(selector, 'markExported');

      const { doc } = build(selector, true);

      const statements = elementsByTag(doc, 'STMTRS');
      expect(statements).toHaveLength(1);
      expect(elementsByTag(doc, 'ACCTID').map(e => e.textContent)).toEqual(['B']);
      expect(markExported).toHaveBeenCalledTimes(1);
      expect(markExported).toHaveBeenCalledWith('B');
    });

    it('should ask the selector for exportable accounts only by default', () => {
      const fake = fakeSelector([]);
      new OfxFormatter(fake);
      expect(fake.selectAccounts).toHaveBeenCalledWith(false);
    });

    it('should take the account list once, at construction', () => {
      const fake = fakeSelector([fakeAccount('A')]);
      const formatter = new OfxFormatter(fake, { exportAll: true, zone: UTC, clock: fixedClock });
      const { doc, parent } = createParent();
      formatter.toXml(doc, parent);

      expect(fake.selectAccounts).toHaveBeenCalledTimes(1);
      expect(fake.selectAccounts).toHaveBeenCalledWith(true);
    });

    it('should mark accounts exported so the next default run is empty', () => {
      seedAccount(store, 'A');
      store.transactions.addTransaction({ accountUid: 'A', name: 'a', amount: '1' });

      expect(elementsByTag(build(selector, false).doc, 'STMTRS')).toHaveLength(1);
      expect(elementsByTag(build(selector, false).doc, 'STMTRS')).toHaveLength(0);
      expect(elementsByTag(build(selector, true).doc, 'STMTRS')).toHaveLength(1);
    });

    it('should pass the export-all flag to each account', () => {
      const appendTransactions = vi.fn();
      const fake = fakeSelector([fakeAccount('A', { appendTransactions })]);

      build(fake, true);

      expect(appendTransactions).toHaveBeenCalledTimes(1);
      const [, parent, exportAll] = appendTransactions.mock.calls[0] ?? [];
      expect(parent?.nodeName).toBe('BANKTRANLIST');
      expect(exportAll).toBe(true);
    });
  });

  describe('timestamps', () => {
    it('should sample the clock once per run', () => {
      seedAccount(store, 'A');
      seedAccount(store, 'B');
      store.transactions.addTransaction({ accountUid: 'A', name: 'a', amount: '1' });
      store.transactions.addTransaction({ accountUid: 'B', name: 'b', amount: '1' });

      let tick = 0;
      const clock = vi.fn(() => new Date(FIXED_INSTANT.getTime() + 1000 * tick++));
      const { doc } = build(selector, true, clock);

      const stamps = ['DTASOF', 'DTSTART', 'DTEND'].flatMap(tag => elementsByTag(doc, tag).map(e => e.textContent));
      expect(stamps).toHaveLength(6);
      expect(new Set(stamps)).toEqual(new Set([FIXED_NOW]));
      expect(clock).toHaveBeenCalledTimes(1);
    });

    it('should build identical documents from empty stores with a fixed clock', () => {
      const first = build(selector, false).doc;
      const second = build(ExportSelector.fromDatabase(createStore().db, UTC), false).doc;
      expect(serializeOfx(first)).toBe(serializeOfx(second));
    });
  });

  describe('failures', () => {
    it('should stop at the failing account without marking it or later accounts', () => {
      const fake = fakeSelector([
        fakeAccount('first'),
        fakeAccount('broken', {
          appendTransactions: () => {
            throw new Error('store unreadable');
          },
        }),
        fakeAccount('after'),
      ]);

      expect(() => build(fake, false)).toThrow('store unreadable');
      expect(fake.markExported.mock.calls).toEqual([['first']]);
    });

    it('should keep exported marks made before the failure', () => {
      seedAccount(store, 'A');
      store.transactions.addTransaction({ accountUid: 'A', name: 'a', amount: '1' });
      const [storeAccount] = selector.selectAccounts(false);
      if (!storeAccount) throw new Error('no account');

      const failing: AccountSelector = {
        selectAccounts: () => [
          storeAccount,
          fakeAccount('B', {
            appendTransactions: () => {
              throw new Error('boom');
            },
          }),
        ],
        markExported: uid => selector.markExported(uid),
      };

      expect(() => build(failing, false)).toThrow('boom');
      expect(store.transactions.getUnexportedCount('A')).toBe(0);
    });
  });
});
