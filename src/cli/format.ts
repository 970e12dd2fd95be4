/**
 * Human-readable output for CLI commands.
 */
import chalk from 'chalk';
import type { QuestionNode } from '../core/tree/types.js';
import type { KbMatch } from '../core/kb/types.js';
import type { SyncReport } from '../core/sync/synchronizer.js';
import type { SuggestedQuestion } from '../core/service/question-service.js';
import type { LLMProvider, QaPair } from '../llm/types.js';
import type { ProviderStatus } from '../llm/providers/factory.js';

export function formatQuestion(node: QuestionNode): string {
  const mark = node.answer === null ? chalk.yellow('[ ]') : chalk.green('[x]');
  const parent = node.parentId === null ? '' : chalk.dim(` (parent ${node.parentId})`);
  const answer = node.answer === null ? '' : ` ${chalk.dim('→')} ${node.answer}`;
  return `${mark} ${node.id}. ${node.question}${parent}${answer}`;
}

export function formatSuggestion(suggestion: SuggestedQuestion): string {
  return `${chalk.bold(`${suggestion.id}.`)} ${suggestion.question} ${chalk.dim(`(priority ${suggestion.priority.toFixed(2)})`)}`;
}

export function formatMatch(match: KbMatch): string {
  const answer = match.answer ?? chalk.dim('(unanswered)');
  return `${chalk.cyan(match.similarity.toFixed(3))}  ${match.question} ${chalk.dim('→')} ${answer}`;
}

export function formatSyncReport(report: SyncReport): string {
  const failed = report.failures.length > 0
    ? chalk.red(`failed ${report.failures.length}`)
    : `failed ${report.failures.length}`;
  return `${report.direction}: scanned ${report.scanned}, updated ${report.updated.length}, ${failed}`;
}

export function formatQaPair(pair: QaPair, index: number): string {
  return `Q${index + 1}: ${pair.q}\nA${index + 1}: ${pair.a}`;
}

/**
 * One provider per line; the default provider is starred.
 */
export function formatProvider(provider: ProviderStatus, defaultProvider: LLMProvider): string {
  const star = provider.name === defaultProvider ? '*' : ' ';
  const status = provider.available ? chalk.green('ready') : chalk.yellow('no API key');
  return `${star} ${provider.name}  ${provider.model}  ${chalk.dim(provider.baseUrl)}  ${status}`;
}
