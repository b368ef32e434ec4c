#!/usr/bin/env node
/**
 * Lazarus CLI - command-line client for the keep-alive monitor API
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { HealthStatus } from '@lazarus/core';
import { registerConfigCommands } from './commands/config.js';
import { registerTargetCommands } from './commands/target.js';
import { createContext, runAction } from './lib/context.js';
import { error, getStatusBadge, printJson, success } from './utils/format.js';

const program = new Command();

program
  .name('lazarus')
  .description('Keep-alive monitor - probe hosted services and redeploy them when they go down')
  .version('0.1.0')
  .option('--endpoint <url>', 'Monitor API endpoint (overrides config)')
  .option('--api-key <key>', 'Admin API key (overrides config)')
  .option('--json', 'Print JSON output');

const context = createContext(program);

// Target commands
registerTargetCommands(program, context);

// Config commands
registerConfigCommands(program);

// System status command
program
  .command('status')
  .description('Show monitor status and a health summary')
  .action(runAction(async () => {
    const client = context.client();
    const health = await client.health();
    const views = await client.listTargets();

    const counts = new Map<HealthStatus, number>();
    for (const { health: state } of views) {
      counts.set(state.status, (counts.get(state.status) ?? 0) + 1);
    }

    if (context.format() === 'json') {
      printJson({ monitor: health, statuses: Object.fromEntries(counts) });
      return;
    }

    console.log(`\n${chalk.bold('Lazarus Monitor Status')}\n`);
    if (health.running) {
      success(`Scheduler running, ${health.targets} target(s)`);
    } else {
      error('Scheduler not running');
    }

    console.log(`\n${chalk.cyan('Targets:')}`);
    const statuses: HealthStatus[] = ['HEALTHY', 'DEGRADED', 'DOWN', 'REDEPLOYING', 'UNKNOWN'];
    for (const status of statuses) {
      console.log(`  ${getStatusBadge(status)}${' '.repeat(12 - status.length)} ${counts.get(status) ?? 0}`);
    }
    console.log('');
  }));

program.parseAsync().catch((err: unknown) => {
  error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
