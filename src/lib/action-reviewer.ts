/**
 * Interactive review of destructive actions with diff display
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import { diffLines } from 'diff';
import { Action, BodyDiff, IssueKey, RemoveAction, UpdateAction } from './types';

type ReviewChoice = 'apply' | 'skip' | 'apply-all' | 'skip-all';

export interface ReviewResult {
  actions: Action[];
  /** Keys whose removal or body rewrite was declined */
  skipped: IssueKey[];
}

function needsReview(action: Action): action is RemoveAction | (UpdateAction & { body: BodyDiff }) {
  return action.type === 'remove' || (action.type === 'update' && action.body !== undefined);
}

export class ActionReviewer {
  /**
   * Ask about every removal and body rewrite. Declining a body rewrite keeps the
   * action's other changes.
   */
  async review(actions: Action[]): Promise<ReviewResult> {
    const pending = actions.filter(needsReview);
    if (pending.length === 0) {
      return { actions, skipped: [] };
    }

    console.log(chalk.yellow(`\n⚠️  ${pending.length} change(s) need confirmation\n`));

    const declined = new Set<Action>();
    let decideAll: 'apply' | 'skip' | null = null;

    for (let i = 0; i < pending.length; i++) {
      const action = pending[i];
      let choice: ReviewChoice = decideAll ?? (await this.ask(action, i + 1, pending.length));
      if (choice === 'apply-all' || choice === 'skip-all') {
        decideAll = choice === 'apply-all' ? 'apply' : 'skip';
        choice = decideAll;
      }
      if (choice === 'skip') {
        declined.add(action);
      }
    }

    const skipped: IssueKey[] = [];
    const kept: Action[] = [];
    for (const action of actions) {
      if (!declined.has(action)) {
        kept.push(action);
        continue;
      }
      skipped.push(action.key);
      if (action.type === 'update') {
        const rest: UpdateAction = { type: 'update', key: action.key, title: action.title, fields: action.fields };
        if (action.position) rest.position = action.position;
        if (action.prLinkDirectives) rest.prLinkDirectives = action.prLinkDirectives;
        if (rest.fields.length > 0 || rest.position || rest.prLinkDirectives) {
          kept.push(rest);
        }
      }
    }

    return { actions: kept, skipped };
  }

  private async ask(action: RemoveAction | (UpdateAction & { body: BodyDiff }), index: number, total: number): Promise<ReviewChoice> {
    console.log(chalk.bold(`\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━`));
    console.log(chalk.bold.cyan(`Change ${index}/${total}: ${action.key}`));
    console.log(chalk.bold(`━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n`));
    console.log(chalk.gray(`Title: ${action.title}`));
    console.log();

    if (action.type === 'remove') {
      console.log(chalk.red('  Item is no longer in any workspace and will be removed from the project'));
      console.log();
    } else {
      this.showBodyDiff(action.body);
    }

    const choices = [
      { name: chalk.green(action.type === 'remove' ? 'Remove item' : 'Rewrite body'), value: 'apply' },
      { name: chalk.yellow('Skip this change'), value: 'skip' },
    ];

    if (total > 1 && index < total) {
      choices.push(
        { name: chalk.gray('Apply all remaining changes'), value: 'apply-all' },
        { name: chalk.gray('Skip all remaining changes'), value: 'skip-all' }
      );
    }

    const answer = await inquirer.prompt<{ action: ReviewChoice }>([
      {
        type: 'list',
        name: 'action',
        message: 'Apply this change?',
        choices,
      },
    ]);

    return answer.action;
  }

  /**
   * Show body diff with a little context around each change
   */
  private showBodyDiff(body: BodyDiff): void {
    console.log(chalk.bold('Body:'));

    const diff = diffLines(body.from, body.to);
    const CONTEXT_LINES = 2;

    for (let i = 0; i < diff.length; i++) {
      const part = diff[i];
      if (!part.added && !part.removed) continue;

      if (i > 0 && !diff[i - 1].added && !diff[i - 1].removed) {
        const lines = diff[i - 1].value.split('\n').slice(-CONTEXT_LINES - 1, -1);
        lines.forEach((line) => console.log(chalk.gray('    ' + line)));
      }

      const marker = part.added ? chalk.green : chalk.red;
      const prefix = part.added ? '  + ' : '  - ';
      part.value
        .split('\n')
        .filter((line) => line)
        .forEach((line) => console.log(marker(prefix + line)));

      if (i < diff.length - 1 && !diff[i + 1].added && !diff[i + 1].removed) {
        const lines = diff[i + 1].value.split('\n').slice(0, CONTEXT_LINES);
        lines.forEach((line) => line && console.log(chalk.gray('    ' + line)));
      }
    }
    console.log();
  }
}
