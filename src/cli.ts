#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { VariantInspector } from './variant-inspector';
import { CONFIG_FILE } from './constants';
import { errorMessage } from './errors';

export const program = new Command();

program
  .name('variant-resolver')
  .description('Resolve the effective configuration and library order of build variants')
  .version('1.0.0')
  .option('-c, --config <path>', 'project configuration file', CONFIG_FILE);

function configPath(): string {
  return program.opts<{ config: string }>().config;
}

program
  .command('list')
  .description('List the variants of the project')
  .action(async () => {
    const inspector = new VariantInspector(configPath());
    await inspector.init();
    inspector.listVariants();
  });

program
  .command('show [variant]')
  .description('Show the resolved configuration of a variant or select one interactively')
  .action(async (variant?: string) => {
    const inspector = new VariantInspector(configPath());
    await inspector.init();

    if (variant) {
      await inspector.showVariant(variant);
    } else {
      await inspector.interactiveShow();
    }
  });

program
  .command('validate')
  .description('Resolve every variant and report failures')
  .action(async () => {
    const inspector = new VariantInspector(configPath());
    await inspector.init();
    await inspector.validate();
  });

program
  .command('init')
  .description('Create a sample project in the current directory')
  .action(async () => {
    await VariantInspector.initProject();
  });

export async function run(argv: string[]): Promise<void> {
  try {
    await program.parseAsync(argv);
  } catch (error) {
    console.error(chalk.red('Error:'), errorMessage(error));
    process.exit(1);
  }
}

if (require.main === module) {
  void run(process.argv);
}
