/**
 * Sync command - create the settings tree on disk, then clone and pull
 */

import * as clack from '@clack/prompts';
import pc from 'picocolors';
import { ConfigManager } from '../config/manager.js';
import { createDirectories, type DirectoryReport } from '../fs/directories.js';
import { defaultGitOps } from '../git/interface.js';
import { RepoTreeErrors } from '../errors.js';
import { loadSettings } from '../settings/loader.js';
import { SettingsTreeVisualizer } from '../settings/visualizer.js';
import type { ParsedSettings } from '../settings/types.js';
import { RepositorySync, summarizeOutcomes } from '../sync/manager.js';
import type { RepositoryTarget, SyncOutcome } from '../sync/types.js';

export interface SyncOptions {
  settingsFile?: string;
  clone?: boolean;
  pull?: boolean;
  overwrite?: boolean;
  discardChanges?: boolean;
  dryRun?: boolean;
  tabWidth?: number;
  strict?: boolean;
}

export async function syncCommand(options: SyncOptions = {}): Promise<void> {
  const spinner = clack.spinner();

  clack.intro(pc.bold('repotree'));

  const config = await new ConfigManager(process.cwd(), (message) => clack.log.warn(message)).load({
    settingsFile: options.settingsFile,
    tabWidth: options.tabWidth,
    indentMode: options.strict ? 'strict' : undefined,
  });

  const parsed = await loadSettings(config.settingsFile, {
    tabWidth: config.tabWidth,
    indentMode: config.indentMode,
  });
  if (parsed.isErr()) {
    clack.cancel(parsed.error.format());
    process.exit(1);
  }

  const settings = parsed.value;
  const sync = new RepositorySync();
  const targets = settings.repositories.map((descriptor) => sync.resolveTarget(descriptor));
  const clone = options.clone ?? true;
  const pull = options.pull || options.discardChanges || false;

  if (options.dryRun) {
    showPlan(settings, targets, { clone, pull });
    clack.outro('Dry run complete, nothing was changed');
    return;
  }

  const gitVersion = await defaultGitOps.isAvailable();
  if (gitVersion.isErr()) {
    clack.cancel(RepoTreeErrors.gitNotFound(gitVersion.error.message).error.format());
    process.exit(1);
  }

  const reports = await createDirectories(settings.directories);
  for (const report of reports) {
    reportDirectory(report);
  }

  const outcomes: SyncOutcome[] = [];

  if (clone) {
    for (const target of targets) {
      spinner.start(`Cloning ${target.name}...`);
      const result = await sync.clone(target, { overwrite: options.overwrite });
      spinner.stop(pc.dim(target.gitUrl));
      reportOutcome(result);
      outcomes.push(result);
    }
  }

  if (pull) {
    for (const target of targets) {
      spinner.start(`Pulling ${target.name}...`);
      const result = await sync.pull(target, { discardChanges: options.discardChanges });
      spinner.stop(pc.dim(target.localPath));
      reportOutcome(result);
      outcomes.push(result);
    }
  }

  clack.outro(formatSummary(reports, outcomes));
}

function reportDirectory(report: DirectoryReport): void {
  switch (report.status) {
    case 'created':
      clack.log.success(`Created directory ${report.path}`);
      break;
    case 'exists':
      clack.log.info(pc.dim(`Directory ${report.path} already exists`));
      break;
    case 'failed':
      clack.log.error(report.error?.message ?? `Error creating directory ${report.path}`);
      break;
  }
}

function reportOutcome(outcome: SyncOutcome): void {
  switch (outcome.status) {
    case 'cloned':
    case 'replaced':
    case 'pulled':
      clack.log.success(outcome.message);
      break;
    case 'present':
      clack.log.info(outcome.message);
      break;
    case 'skipped':
      clack.log.warn(outcome.message);
      break;
    case 'failed':
      clack.log.error(outcome.message);
      break;
  }
}

function showPlan(
  settings: ParsedSettings,
  targets: readonly RepositoryTarget[],
  phases: { clone: boolean; pull: boolean }
): void {
  const visualizer = new SettingsTreeVisualizer();

  // URLs are listed with the planned actions below

  console.log('');
  for (const line of visualizer.visualize(settings.entries, { showUrls: false })) {
    console.log('  ' + line);
  }
  console.log('');

  clack.log.info(
    `${settings.directories.size} director${settings.directories.size === 1 ? 'y' : 'ies'}, ` +
      `${targets.length} repositor${targets.length === 1 ? 'y' : 'ies'}`
  );

  const actions = [phases.clone && 'clone', phases.pull && 'pull'].filter(Boolean).join(' + ');
  for (const target of targets) {
    console.log(`  ${pc.cyan(actions || 'none')} ${target.localPath} ${pc.dim(target.gitUrl)}`);
  }
}

export function formatSummary(
  reports: readonly DirectoryReport[],
  outcomes: readonly SyncOutcome[]
): string {
  const created = reports.filter((r) => r.status === 'created').length;
  const dirFailures = reports.filter((r) => r.status === 'failed').length;
  const counts = summarizeOutcomes(outcomes);

  const parts = [
    `${created} created`,
    `${counts.cloned + counts.replaced} cloned`,
    `${counts.pulled} pulled`,
    `${counts.present + counts.skipped} skipped`,
  ];
  const failures = counts.failed + dirFailures;
  if (failures > 0) {
    parts.push(pc.red(`${failures} failed`));
  }
  return `✓ Done: ${parts.join(', ')}`;
}
