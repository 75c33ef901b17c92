#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import {
  exportCommand,
  listAccounts,
  addAccount,
  addTransaction,
  setupConfig
} from './commands';

const program = new Command();

program
  .name('ofx-export')
  .description('Export accounts and transactions from the local store as an OFX document')
  .version('1.0.0');

program.command('export')
  .description('Write an OFX document with the transactions not exported yet')
  .option('-a, --all', 'Export all transactions, including those exported before')
  .option('-o, --output <file>', 'Output file (defaults to <outputDir>/export-<timestamp>.ofx)')
  .action((options: { all?: boolean; output?: string }) => {
    exportCommand(options);
  });

program.command('list-accounts')
  .description('List accounts with their balance and export state')
  .action(() => {
    listAccounts();
  });

program.command('add-account')
  .description('Create an account in the local store')
  .argument('<name>', 'Account name')
  .option('-t, --type <type>', 'Account type (CASH, BANK, CREDIT, ...)', 'CASH')
  .option('-c, --currency <code>', 'ISO 4217 currency code', 'USD')
  .option('--uid <uid>', 'Account ID (generated when omitted)')
  .action((name: string, options: { type?: string; currency?: string; uid?: string }) => {
    addAccount(name, options);
  });

program.command('add-transaction')
  .description('Record a transaction on an account')
  .argument('<accountUid>', 'Account ID')
  .argument('<amount>', 'Signed decimal amount; put -- before a negative one, e.g. -- -12.50')
  .option('-n, --name <name>', 'Transaction name', 'Transaction')
  .option('-d, --description <text>', 'Memo')
  .option('--type <type>', 'DEBIT or CREDIT (derived from the amount sign when omitted)')
  .option('--date <date>', 'Date and time of the transaction (defaults to now)')
  .option('--transfer <accountUid>', 'Account on the other side of a transfer')
  .action((accountUid: string, amount: string, options: { name?: string; description?: string; type?: string; date?: string; transfer?: string }) => {
    addTransaction(accountUid, amount, options);
  });

program.command('setup')
  .description('Create an ofx-export.json configuration template')
  .action(() => {
    setupConfig();
  });

program.parse(process.argv);
