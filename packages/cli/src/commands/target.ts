/**
 * Target commands
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import {
  CreateTargetSchema,
  InvalidConfigError,
  UpdateTargetSchema,
  describeProbeOutcome,
  describeRedeployOutcome,
  toInvalidConfigError,
} from '@lazarus/core';
import type { TargetDetailRecord, TargetViewRecord } from '../lib/api-client.js';
import { runAction, type CliContext } from '../lib/context.js';
import { formatTable, getStatusBadge, info, printJson, success, warn } from '../utils/format.js';

export interface AddTargetOptions {
  url: string;
  provider: string;
  interval?: number;
  threshold?: number;
  cooldown?: number;
  timeout?: number;
  serviceId?: string;
  deployHook?: string;
  providerKey?: string;
  hookUrl?: string;
  hookMethod?: string;
  header: string[];
  disabled?: boolean;
  autoRedeploy: boolean;
  manualRedeploy: boolean;
  description?: string;
}

export interface UpdateTargetOptions {
  url?: string;
  interval?: number;
  threshold?: number;
  cooldown?: number;
  timeout?: number;
  clearTimeout?: boolean;
  enable?: boolean;
  disable?: boolean;
  autoRedeploy?: boolean;
  manualRedeploy?: boolean;
  description?: string;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse repeated `Name: value` flags
 * @throws {InvalidConfigError} When a flag has no name or no colon
 */
export function parseHeaders(raw: string[]): Record<string, string> | undefined {
  if (raw.length === 0) {
    return undefined;
  }
  const headers: Record<string, string> = {};
  for (const entry of raw) {
    const separator = entry.indexOf(':');
    const name = separator > 0 ? entry.slice(0, separator).trim() : '';
    if (!name) {
      throw new InvalidConfigError(`Invalid header '${entry}', expected 'Name: value'`);
    }
    headers[name] = entry.slice(separator + 1).trim();
  }
  return headers;
}

function compact(fields: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined));
}

function buildDeployConfig(provider: string, options: AddTargetOptions): Record<string, unknown> {
  switch (provider) {
    case 'RENDER':
      return compact({ deployHookUrl: options.deployHook, serviceId: options.serviceId, apiKey: options.providerKey });
    case 'KOYEB':
      return compact({ serviceId: options.serviceId, apiToken: options.providerKey });
    case 'WEBHOOK':
      return compact({
        url: options.hookUrl,
        method: options.hookMethod?.toUpperCase(),
        headers: parseHeaders(options.header),
      });
    default:
      return {};
  }
}

/**
 * Turn `target add` flags into a target definition, validated before it is sent
 * @throws {InvalidConfigError} When the definition does not validate
 */
export function buildTargetDefinition(id: string, options: AddTargetOptions): Record<string, unknown> {
  const provider = options.provider.toUpperCase();
  const definition = compact({
    id,
    url: options.url,
    provider,
    deploy: buildDeployConfig(provider, options),
    intervalSeconds: options.interval,
    failureThreshold: options.threshold,
    cooldownSeconds: options.cooldown,
    timeoutMs: options.timeout,
    enabled: options.disabled ? false : undefined,
    autoRedeploy: options.autoRedeploy,
    allowManualRedeploy: options.manualRedeploy,
    description: options.description,
  });

  const parsed = CreateTargetSchema.safeParse(definition);
  if (!parsed.success) {
    throw toInvalidConfigError(parsed.error, 'Invalid target');
  }
  return definition;
}

/**
 * Turn `target update` flags into a partial update; an empty description clears it
 * @throws {InvalidConfigError} When nothing is set or a field does not validate
 */
export function buildTargetUpdate(options: UpdateTargetOptions): Record<string, unknown> {
  if (options.enable && options.disable) {
    throw new InvalidConfigError('Use either --enable or --disable');
  }
  const fields = compact({
    url: options.url,
    intervalSeconds: options.interval,
    failureThreshold: options.threshold,
    cooldownSeconds: options.cooldown,
    timeoutMs: options.clearTimeout ? null : options.timeout,
    enabled: options.enable ? true : options.disable ? false : undefined,
    autoRedeploy: options.autoRedeploy,
    allowManualRedeploy: options.manualRedeploy,
    description: options.description === undefined ? undefined : options.description || null,
  });

  if (Object.keys(fields).length === 0) {
    throw new InvalidConfigError('Nothing to update');
  }
  const parsed = UpdateTargetSchema.safeParse(fields);
  if (!parsed.success) {
    throw toInvalidConfigError(parsed.error, 'Invalid update');
  }
  return fields;
}

function printTargetList(views: TargetViewRecord[]): void {
  formatTable(
    ['ID', 'Status', 'Failures', 'Provider', 'URL', 'Last Probe'],
    views.map(({ target, health }) => [
      target.enabled ? target.id : chalk.dim(`${target.id} (disabled)`),
      getStatusBadge(health.status),
      String(health.consecutiveFailures),
      target.provider,
      target.url,
      health.lastProbe ? describeProbeOutcome(health.lastProbe.outcome) : chalk.dim('never'),
    ])
  );
}

function printTargetDetail({ target, health, history }: TargetDetailRecord): void {
  console.log(`\n${chalk.bold(target.id)} (${target.provider})`);
  console.log(`  URL:        ${target.url}`);
  console.log(`  Status:     ${getStatusBadge(health.status)}`);
  console.log(`  Failures:   ${health.consecutiveFailures} / ${target.failureThreshold}`);
  console.log(`  Interval:   ${target.intervalSeconds}s`);
  console.log(`  Cooldown:   ${target.cooldownSeconds}s`);
  console.log(`  Enabled:    ${target.enabled ? 'yes' : 'no'}`);
  console.log(`  Redeploy:   ${target.autoRedeploy ? 'automatic' : 'manual only'}${target.allowManualRedeploy ? '' : ', manual disabled'}`);
  if (target.description) {
    console.log(`  Desc:       ${target.description}`);
  }
  if (health.lastProbe) {
    const { outcome, latencyMs, timestamp } = health.lastProbe;
    console.log(`  Last probe: ${describeProbeOutcome(outcome)} in ${latencyMs}ms at ${timestamp}`);
  }
  if (health.lastRedeployAt) {
    console.log(`  Redeployed: ${health.lastRedeployAt}`);
  }

  if (history.length > 0) {
    console.log(`\n  ${chalk.cyan('Redeploy History:')}`);
    for (const attempt of history.slice().reverse()) {
      console.log(`    ${chalk.dim(attempt.requestedAt)} ${attempt.trigger.toLowerCase()} ${describeRedeployOutcome(attempt.outcome)}`);
    }
  } else {
    console.log(`\n  ${chalk.dim('No redeploys recorded')}`);
  }

  console.log(''); // Empty line for spacing
}

export function registerTargetCommands(program: Command, context: CliContext): void {
  const targetCmd = program.command('target').description('Manage monitored targets');

  // List targets
  targetCmd
    .command('list')
    .description('List targets with their health')
    .action(runAction(async () => {
      const views = await context.client().listTargets();
      switch (context.format()) {
        case 'json':
          printJson(views);
          return;
        case 'plain':
          for (const { target, health } of views) {
            console.log(`${target.id}\t${health.status}\t${target.url}`);
          }
          return;
        case 'table':
          if (views.length === 0) {
            info('No targets found. Add one with "lazarus target add"');
            return;
          }
          printTargetList(views);
      }
    }));

  // Target details
  targetCmd
    .command('info <id>')
    .description('Show a target, its health and redeploy history')
    .action(runAction(async (id: string) => {
      const detail = await context.client().getTarget(id);
      if (context.format() === 'json') {
        printJson(detail);
        return;
      }
      printTargetDetail(detail);
    }));

  // Add target
  targetCmd
    .command('add <id>')
    .description('Register a target')
    .requiredOption('--url <url>', 'URL to probe')
    .requiredOption('-p, --provider <provider>', 'Hosting provider (RENDER, KOYEB, WEBHOOK)')
    .option('--interval <seconds>', 'Probe interval in seconds', parseNumber)
    .option('--threshold <count>', 'Consecutive failures before DOWN', parseNumber)
    .option('--cooldown <seconds>', 'Minimum seconds between redeploys', parseNumber)
    .option('--timeout <ms>', 'Probe timeout in milliseconds', parseNumber)
    .option('--service-id <id>', 'Provider service id (RENDER, KOYEB)')
    .option('--deploy-hook <url>', 'Render deploy hook URL')
    .option('--provider-key <key>', 'Per-target Render API key or Koyeb token')
    .option('--hook-url <url>', 'Deploy hook URL (WEBHOOK)')
    .option('--hook-method <method>', 'Deploy hook method, GET or POST (WEBHOOK)')
    .option('--header <header>', 'Deploy hook header "Name: value", repeatable (WEBHOOK)', collect, [])
    .option('--disabled', 'Register without probing')
    .option('--no-auto-redeploy', 'Never redeploy automatically')
    .option('--no-manual-redeploy', 'Refuse manual redeploys')
    .option('--description <text>', 'Target description')
    .action(runAction(async (id: string, options: AddTargetOptions) => {
      const definition = buildTargetDefinition(id, options);
      const target = await context.client().addTarget(definition);
      if (context.format() === 'json') {
        printJson(target);
        return;
      }
      success(`Target added: ${target.id} (${target.provider}, every ${target.intervalSeconds}s)`);
    }));

  // Update target
  targetCmd
    .command('update <id>')
    .description('Change a target; unspecified fields keep their value')
    .option('--url <url>', 'URL to probe')
    .option('--interval <seconds>', 'Probe interval in seconds', parseNumber)
    .option('--threshold <count>', 'Consecutive failures before DOWN', parseNumber)
    .option('--cooldown <seconds>', 'Minimum seconds between redeploys', parseNumber)
    .option('--timeout <ms>', 'Probe timeout in milliseconds', parseNumber)
    .option('--clear-timeout', 'Use the default probe timeout')
    .option('--enable', 'Resume probing')
    .option('--disable', 'Stop probing')
    .option('--auto-redeploy', 'Redeploy automatically when DOWN')
    .option('--no-auto-redeploy', 'Never redeploy automatically')
    .option('--manual-redeploy', 'Allow manual redeploys')
    .option('--no-manual-redeploy', 'Refuse manual redeploys')
    .option('--description <text>', 'Target description (empty to clear)')
    .action(runAction(async (id: string, options: UpdateTargetOptions) => {
      const fields = buildTargetUpdate(options);
      const target = await context.client().updateTarget(id, fields);
      if (context.format() === 'json') {
        printJson(target);
        return;
      }
      success(`Target updated: ${target.id}`);
    }));

  // Remove target
  targetCmd
    .command('remove <id>')
    .alias('rm')
    .description('Stop monitoring a target')
    .action(runAction(async (id: string) => {
      const target = await context.client().removeTarget(id);
      success(`Target removed: ${target.id}`);
    }));

  // Probe now
  targetCmd
    .command('probe <id>')
    .description('Probe a target now')
    .action(runAction(async (id: string) => {
      const { result, health } = await context.client().probe(id);
      if (context.format() === 'json') {
        printJson({ result, health });
        return;
      }
      const line = `${id}: ${describeProbeOutcome(result.outcome)} in ${result.latencyMs}ms, now ${getStatusBadge(health.status)}`;
      if (result.outcome.kind === 'SUCCESS') {
        success(line);
      } else {
        warn(line);
      }
    }));

  // Redeploy now
  targetCmd
    .command('redeploy <id>')
    .description('Redeploy a target through its provider now')
    .action(runAction(async (id: string) => {
      const attempt = await context.client().redeploy(id);
      if (context.format() === 'json') {
        printJson(attempt);
        return;
      }
      const line = `Redeploy of ${id} ${describeRedeployOutcome(attempt.outcome)}`;
      if (attempt.outcome.kind === 'SUCCEEDED') {
        success(line);
      } else {
        warn(line);
      }
      if (attempt.outcome.kind === 'FAILED') {
        process.exitCode = 1;
      }
    }));
}
