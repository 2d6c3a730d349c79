#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Command, InvalidArgumentError } from 'commander';
import { AppModule } from './app.module';
import { BuildOptions, NodeIndexCommand } from './command/node-index.command';

const logger = new Logger('ContentSearchIndexer');

async function run(action: (command: NodeIndexCommand) => Promise<number>): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  });

  try {
    process.exitCode = await action(app.get(NodeIndexCommand));
  } finally {
    await app.close();
  }
}

function parseLimit(value: string): number {
  const limit = parseInt(value, 10);
  if (Number.isNaN(limit) || limit < 1) {
    throw new InvalidArgumentError('Not a positive number.');
  }
  return limit;
}

const program = new Command();

program
  .name('content-search-indexer')
  .description('Builds and maintains the search indices of a content repository');

program
  .command('mapping')
  .description('Show the mapping which would be sent to the search engine')
  .action(() => run(command => command.showMapping()));

program
  .command('index-node')
  .description('Index a single node by the given identifier and workspace name')
  .argument('<identifier>', 'node identifier')
  .option('--workspace <name>', 'workspace to index the node in')
  .action((identifier: string, options: { workspace?: string }) =>
    run(command => command.indexNode(identifier, options.workspace)),
  );

program
  .command('build')
  .description('Index all nodes into new indices and switch the aliases when done')
  .option('--limit <count>', 'amount of nodes to index at maximum', parseLimit)
  .option('--update', 'keep the current index, for development only', false)
  .option('--workspace <name>', 'name of the workspace to index')
  .option('--postfix <postfix>', 'index name postfix, an index with the same postfix is deleted')
  .action((options: BuildOptions) => run(command => command.build(options)));

program
  .command('cleanup')
  .description('Remove old indices, i.e. all but the ones the aliases point at')
  .action(() => run(command => command.cleanup()));

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
  process.exitCode = 1;
});
