#!/usr/bin/env node

/**
 * Tracker Merge CLI
 *
 * Merge ZenHub workspaces into a single GitHub project
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { ActionReviewer } from './lib/action-reviewer';
import {
  loadEnv,
  parseConcurrency,
  parseExclusion,
  parseTimeout,
  resolveGitHubToken,
  resolveZenHubToken,
  workspaceExcluded,
} from './lib/config';
import { errorMessage } from './lib/errors';
import { GitHubProjectClient, parseProjectUrl } from './lib/github-client';
import { SourceRegistry } from './lib/sources/registry';
import { ZenHubClient, ZenHubSource, createZenHubTransport, selectWorkspaces } from './lib/sources/zenhub-source';
import { SyncEngine, SyncEngineOptions } from './lib/sync-engine';
import { Action, Notice, SyncPlan, SyncResult } from './lib/types';

loadEnv();

interface CliOptions {
  workspace: string[];
  exclude: string[];
  field: string[];
  disableRemove?: boolean;
  timeout?: string;
  concurrency?: string;
  interactive?: boolean;
  githubToken?: string;
  zenhubToken?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function fail(message: string, hints: string[] = []): never {
  console.error(chalk.red(`Error: ${message}`));
  hints.forEach((hint) => console.error(chalk.gray(hint)));
  process.exit(1);
}

/**
 * Resolve tokens and workspaces, then wire the engine
 */
async function initializeSync(projectUrl: string, options: CliOptions, review?: SyncEngineOptions['review']): Promise<SyncEngine> {
  const githubToken = resolveGitHubToken(options.githubToken);
  if (!githubToken) {
    fail('No GitHub authentication found', [
      'Either run:',
      '  gh auth login',
      'Or set GITHUB_TOKEN (or pass --github-token)',
    ]);
  }

  const zenhubToken = resolveZenHubToken(options.zenhubToken);
  if (!zenhubToken) {
    fail('No ZenHub token found', ['Set ZENHUB_TOKEN in .env.local or pass --zenhub-token']);
  }

  const locator = parseProjectUrl(projectUrl);
  const exclusions = options.exclude.map(parseExclusion);
  const timeoutMs = parseTimeout(options.timeout);

  const zenhub = new ZenHubClient(createZenHubTransport(zenhubToken, timeoutMs));
  const workspaces = selectWorkspaces(await zenhub.listWorkspaces(), options.workspace, workspaceExcluded(exclusions));

  const registry = new SourceRegistry();
  for (const workspace of workspaces) {
    registry.register(new ZenHubSource(zenhub, workspace));
  }
  console.log(chalk.gray(`Workspaces (highest priority first): ${registry.getIds().join(', ')}`));

  const target = new GitHubProjectClient(githubToken, locator, { timeoutMs });

  return new SyncEngine(registry, target, {
    targetOrg: locator.owner,
    mapping: options.field,
    exclusions,
    removeEnabled: !options.disableRemove,
    concurrency: parseConcurrency(options.concurrency),
    review,
  });
}

function describeAction(action: Action): string {
  switch (action.type) {
    case 'create':
      return chalk.green(`+ ${action.key} ${action.title}`);
    case 'remove':
      return chalk.red(`- ${action.key} ${action.title}`);
    case 'update': {
      const parts = action.fields.map((diff) => `${diff.field}: ${diff.from ?? '(empty)'} → ${diff.to ?? '(empty)'}`);
      if (action.body) parts.push('body');
      if (action.position) parts.push(`move after ${action.position.after ?? '(top)'}`);
      if (action.prLinkDirectives) parts.push('linked issues');
      return chalk.yellow(`~ ${action.key} ${parts.join(', ')}`);
    }
  }
}

function printNotices(notices: Notice[]): void {
  if (notices.length === 0) return;
  console.log(chalk.yellow(`\n⚠ ${notices.length} notice(s):`));
  for (const notice of notices) {
    console.log(chalk.gray(`  [${notice.kind}] ${notice.message}`));
  }
}

function printTranslations(translations: SyncPlan['translations']): void {
  const fields = Object.keys(translations);
  if (fields.length === 0) return;
  console.log(chalk.bold('\nValue translations:'));
  for (const field of fields) {
    console.log(chalk.cyan(`  ${field}`));
    for (const [label, count] of Object.entries(translations[field])) {
      console.log(chalk.gray(`    ${label} (${count})`));
    }
  }
}

function printPlan(plan: SyncPlan): void {
  console.log(chalk.bold('\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
  console.log(chalk.bold.cyan('Planned Changes'));
  console.log(chalk.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n'));

  if (plan.actions.length === 0) {
    console.log(chalk.green('✓ Project is up to date'));
  }
  plan.actions.forEach((action) => console.log(describeAction(action)));

  printNotices(plan.notices);
  printTranslations(plan.translations);
  console.log();
}

/**
 * Print sync result summary
 */
function printSyncResult(result: SyncResult): void {
  console.log(chalk.bold('\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
  console.log(chalk.bold.cyan('Sync Results'));
  console.log(chalk.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n'));

  if (result.created.length > 0) {
    console.log(chalk.green(`✓ Added to project: ${result.created.length} item(s)`));
    console.log(chalk.gray(`  ${result.created.join(', ')}`));
  }

  if (result.updated.length > 0) {
    console.log(chalk.blue(`✓ Updated: ${result.updated.length} item(s)`));
    console.log(chalk.gray(`  ${result.updated.join(', ')}`));
  }

  if (result.moved.length > 0) {
    console.log(chalk.blue(`✓ Moved: ${result.moved.length} item(s)`));
  }

  if (result.linkedPRs.length > 0) {
    console.log(chalk.blue(`✓ Linked pull requests: ${result.linkedPRs.length}`));
  }

  if (result.removed.length > 0) {
    console.log(chalk.red(`✗ Removed: ${result.removed.length} item(s)`));
    console.log(chalk.gray(`  ${result.removed.join(', ')}`));
  }

  if (result.skipped.length > 0) {
    console.log(chalk.gray(`⊘ Skipped: ${result.skipped.length} change(s)`));
  }

  if (result.failed.length > 0) {
    console.log(chalk.red(`✗ Errors: ${result.failed.length} action(s)`));
    for (const failure of result.failed) {
      console.log(chalk.red(`  ${failure.action.key} (${failure.step}, ${failure.attempts} attempt(s)): ${failure.error}`));
    }
  }

  printNotices([...result.plan.notices, ...result.notices]);
  printTranslations(result.plan.translations);
  console.log();
}

// Create CLI
const program = new Command();

program
  .name('tracker-merge')
  .description('Merge ZenHub workspaces into a single GitHub project')
  .version('1.0.0');

function withSharedOptions(command: Command): Command {
  return command
    .argument('<project-url>', 'GitHub project, e.g. https://github.com/orgs/ORG/projects/1')
    .option('-w, --workspace <name>', 'ZenHub workspace to read, highest priority first (default: all recent)', collect, [])
    .option('-e, --exclude <field:pattern>', 'Skip issues whose field matches the glob, e.g. "Pipeline:Done"', collect, [])
    .option('-f, --field <src:dst[:strategy]>', 'Field mapping rule; "SRC:" disables a default', collect, [])
    .option('--disable-remove', 'Keep project items not found in any workspace')
    .option('--timeout <seconds>', 'Network timeout per request')
    .option('--concurrency <n>', 'Issues processed in parallel')
    .option('--github-token <token>', 'GitHub token (default: GITHUB_TOKEN or gh auth token)')
    .option('--zenhub-token <token>', 'ZenHub API token (default: ZENHUB_TOKEN)');
}

// Sync command (default)
withSharedOptions(program.command('sync', { isDefault: true }))
  .description('Merge workspaces into the project')
  .option('-i, --interactive', 'Confirm removals and body rewrites')
  .action(async (projectUrl: string, options: CliOptions) => {
    const spinner = ora('Reading workspaces...').start();

    try {
      const reviewer = new ActionReviewer();
      const review = options.interactive
        ? async (actions: Action[]) => {
            // prompts can't share the terminal with the spinner
            spinner.stop();
            const outcome = await reviewer.review(actions);
            spinner.start('Applying changes...');
            return outcome;
          }
        : undefined;
      const engine = await initializeSync(projectUrl, options, review);
      const result = await engine.sync();
      spinner.stop();

      printSyncResult(result);
      if (result.failed.length > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      spinner.fail('Sync failed');
      console.error(chalk.red(`\nError: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

// Plan command
withSharedOptions(program.command('plan'))
  .description('Show what sync would change without writing anything')
  .action(async (projectUrl: string, options: CliOptions) => {
    const spinner = ora('Reading workspaces...').start();

    try {
      const engine = await initializeSync(projectUrl, options);
      const plan = await engine.plan();
      spinner.succeed('Plan complete');

      printPlan(plan);
    } catch (error) {
      spinner.fail('Plan failed');
      console.error(chalk.red(`\nError: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

// Parse and execute
program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`\nError: ${errorMessage(error)}`));
  process.exit(1);
});
