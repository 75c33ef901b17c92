import path from 'path';
import { format } from 'date-fns';
import { Database as DatabaseType } from 'better-sqlite3';
import { initDB, AccountsRepository, TransactionsRepository } from '../db';
import { loadExportConfig, createConfigTemplate, ExportConfig } from '../config/export';
import { ExportSelector } from '../ofx/selector';
import { exportOfx, writeOfxFile } from '../ofx/document';
import { AccountType, TransactionType, isAccountType, isTransactionType } from '../types';
import { AppError, ErrorType, classifyError, formatError } from '../utils/errors';

function fail(action: string, error: unknown, context?: Record<string, unknown>): never {
  console.error(`${action}:`, formatError(classifyError(error, context)));
  process.exit(1);
}

function openStore(config: ExportConfig): DatabaseType {
  try {
    return initDB(config.databasePath);
  } catch (error: unknown) {
    throw classifyError(error, { databasePath: config.databasePath });
  }
}

export function exportCommand(options: { all?: boolean; output?: string } = {}) {
  try {
    const config = loadExportConfig();
    const db = openStore(config);
    const exportAll = options.all ?? false;

    try {
      const selector = ExportSelector.fromDatabase(db, config.zone);
      const { xml, statementCount } = exportOfx(selector, { exportAll, zone: config.zone });

      if (statementCount === 0) {
        console.log(exportAll ? 'No transactions to export.' : 'No new transactions to export since the last export.');
        return;
      }

      const outputPath = options.output
        ? path.resolve(options.output)
        : path.join(config.outputDir, `export-${format(new Date(), 'yyyyMMdd-HHmmss')}.ofx`);
      writeOfxFile(outputPath, xml);

      console.log(`Exported ${statementCount} account statement(s) to ${outputPath}`);
    } finally {
      db.close();
    }
  } catch (error: unknown) {
    fail('Export failed', error);
  }
}

export function listAccounts() {
  try {
    const config = loadExportConfig();
    const db = openStore(config);

    try {
      const accounts = new AccountsRepository(db);
      const transactions = new TransactionsRepository(db);
      const all = accounts.getAllAccounts();

      if (all.length === 0) {
        console.log('No accounts found. Run "ofx-export add-account <name>" to create one.');
        return;
      }

      console.log('\nAccounts:');
      console.log('─'.repeat(60));
      for (const account of all) {
        console.log(`ID: ${account.uid}`);
        console.log(`Name: ${account.name}`);
        console.log(`Type: ${account.type}`);
        console.log(`Balance: ${accounts.getBalance(account.uid)} ${account.currency}`);
        console.log(
          `Transactions: ${accounts.getTransactionCount(account.uid)} (${transactions.getUnexportedCount(account.uid)} not exported)`
        );
        console.log('─'.repeat(60));
      }
    } finally {
      db.close();
    }
  } catch (error: unknown) {
    fail('Failed to list accounts', error);
  }
}

export function addAccount(name: string, options: { type?: string; currency?: string; uid?: string }) {
  try {
    const type = (options.type ?? AccountType.CASH).toUpperCase();
    if (!isAccountType(type)) {
      throw new AppError({
        type: ErrorType.VALIDATION_ERROR,
        message: `Unknown account type: ${type}. Expected one of ${Object.values(AccountType).join(', ')}`,
      });
    }

    const config = loadExportConfig();
    const db = openStore(config);
    try {
      const account = new AccountsRepository(db).addAccount({
        uid: options.uid,
        name,
        type,
        currency: options.currency ?? 'USD',
      });
      console.log(`Created account ${account.name} (${account.type}, ${account.currency})`);
      console.log(`  ID: ${account.uid}`);
    } finally {
      db.close();
    }
  } catch (error: unknown) {
    fail('Failed to add account', error, { name });
  }
}

export function addTransaction(
  accountUid: string,
  amount: string,
  options: { name?: string; description?: string; type?: string; date?: string; transfer?: string }
) {
  try {
    const type = options.type?.toUpperCase();
    if (type !== undefined && !isTransactionType(type)) {
      throw new AppError({
        type: ErrorType.VALIDATION_ERROR,
        message: `Unknown transaction type: ${type}. Expected ${TransactionType.DEBIT} or ${TransactionType.CREDIT}`,
      });
    }

    let timestamp: number | undefined;
    if (options.date !== undefined) {
      timestamp = new Date(options.date).getTime();
      if (Number.isNaN(timestamp)) {
        throw new AppError({
          type: ErrorType.VALIDATION_ERROR,
          message: `Invalid date: ${options.date}`,
        });
      }
    }

    const config = loadExportConfig();
    const db = openStore(config);
    try {
      const accounts = new AccountsRepository(db);
      for (const uid of [accountUid, options.transfer]) {
        if (uid !== undefined && !accounts.getAccount(uid)) {
          throw new AppError({
            type: ErrorType.NOT_FOUND,
            message: `Account not found: ${uid}`,
            context: { accountUid: uid },
          });
        }
      }

      const transaction = new TransactionsRepository(db).addTransaction({
        accountUid,
        amount,
        name: options.name ?? 'Transaction',
        description: options.description,
        type,
        timestamp,
        transferAccountUid: options.transfer,
      });
      console.log(`Created ${transaction.type} transaction ${transaction.name}: ${transaction.amount}`);
      console.log(`  ID: ${transaction.uid}`);
    } finally {
      db.close();
    }
  } catch (error: unknown) {
    fail('Failed to add transaction', error, { accountUid, amount });
  }
}

export function setupConfig() {
  try {
    const configPath = createConfigTemplate();
    console.log(`Created template config at ${configPath}`);
    console.log('Update timeZone and locale to match how your importer expects timestamps.');
  } catch (error: unknown) {
    fail('Failed to create config', error);
  }
}
