/**
 * CLI utilities
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { HealthStatus } from '@lazarus/core';

export function formatTable(headers: string[], rows: string[][]): void {
  const table = new Table({
    head: headers.map((h) => chalk.cyan(h)),
    style: {
      head: [],
      border: ['grey'],
    },
  });

  for (const row of rows) {
    table.push(row);
  }

  console.log(table.toString());
}

export function getStatusBadge(status: HealthStatus): string {
  switch (status) {
    case 'HEALTHY':
      return chalk.green(status);
    case 'DEGRADED':
      return chalk.yellow(status);
    case 'DOWN':
      return chalk.red(status);
    case 'REDEPLOYING':
      return chalk.magenta(status);
    case 'UNKNOWN':
      return chalk.gray(status);
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function success(message: string): void {
  console.log(chalk.green(`✓ ${message}`));
}

export function error(message: string): void {
  console.error(chalk.red(`✗ ${message}`));
}

export function info(message: string): void {
  console.log(chalk.blue(`ℹ ${message}`));
}

export function warn(message: string): void {
  console.warn(chalk.yellow(`⚠ ${message}`));
}
