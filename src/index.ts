#!/usr/bin/env tsx
import { Command } from 'commander';
import { installCommand } from './commands/install.ts';
import { statusCommand } from './commands/status.ts';

const program = new Command();

program
  .name('theos-bootstrap')
  .description('Install Theos and its iOS toolchain and SDKs on Linux')
  .version('1.0.0');

program
  .command('install', { isDefault: true })
  .description('Install or update Theos, the toolchain and the SDKs')
  .option('--ci', 'never prompt; decline optional components')
  .action(installCommand);

program
  .command('status')
  .description('Show which components are already installed')
  .action(statusCommand);

await program.parseAsync();
