#!/usr/bin/env node

import { Command } from 'commander';
import { registerRunCommand } from './commands/run.js';
import { registerVendorCommands } from './commands/vendors.js';

const program = new Command();

program
  .name('recon')
  .description('Unshipped order reconciliation against the vendor master sheets')
  .version('1.0.0');

registerRunCommand(program);
registerVendorCommands(program);

// Filter out bare '--' that npm injects when forwarding args
const args = process.argv.filter((a) => a !== '--');
await program.parseAsync(args);
