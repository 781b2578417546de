#!/usr/bin/env node
/**
 * Command-line interface for resolving resource ids against resources.arsc files.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { infoCommand, keysCommand, packagesCommand, resolveCommand, typesCommand } from './commands.js';

const program = new Command();

const version = '0.1.0';

function fail(error: unknown): never {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
}

program
  .name('arsc-resolve')
  .description('Resolve Android resource ids to package.R.type.key names')
  .version(version);

program
  .command('resolve')
  .description('Resolve a resource id to its fully-qualified name')
  .argument('<arsc-file>', 'Path to the resources.arsc table')
  .argument('<resource-id>', 'Resource id, e.g. 0x7f010000')
  .argument('[format]', 'Output format: fqdn, xmlid or json', 'fqdn')
  .option('--strict', 'Reject package id 0 and type id 0')
  .action(async (arscFile: string, resourceId: string, format: string, options: { strict?: boolean }) => {
    try {
      console.log(await resolveCommand({ filePath: resolve(arscFile), resourceId, format, strict: options.strict === true }));
    } catch (error) {
      fail(error);
    }
  });

program
  .command('packages')
  .description('List the packages of a table')
  .argument('<arsc-file>', 'Path to the resources.arsc table')
  .action(async (arscFile: string) => {
    try {
      for (const line of await packagesCommand({ filePath: resolve(arscFile) })) {
        console.log(line);
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('types')
  .description('List the resource types of a package')
  .argument('<arsc-file>', 'Path to the resources.arsc table')
  .argument('<package-id>', 'Package id, e.g. 0x7f')
  .action(async (arscFile: string, packageId: string) => {
    try {
      for (const line of await typesCommand({ filePath: resolve(arscFile), packageId })) {
        console.log(line);
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('keys')
  .description('List the keys of one resource type with their ids')
  .argument('<arsc-file>', 'Path to the resources.arsc table')
  .argument('<package-id>', 'Package id, e.g. 0x7f')
  .argument('<type-id>', 'Type id, starting at 1')
  .action(async (arscFile: string, packageId: string, typeId: string) => {
    try {
      for (const line of await keysCommand({ filePath: resolve(arscFile), packageId, typeId })) {
        console.log(line);
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('info')
  .description('Show a summary of a table file')
  .argument('<arsc-file>', 'Path to the resources.arsc table')
  .action(async (arscFile: string) => {
    try {
      for (const line of await infoCommand({ filePath: resolve(arscFile) })) {
        console.log(line);
      }
    } catch (error) {
      fail(error);
    }
  });

await program.parseAsync();
