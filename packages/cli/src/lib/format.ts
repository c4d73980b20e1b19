import chalk from 'chalk';
import { table } from 'table';

export function formatAccess(accessible: boolean): string {
  return accessible ? chalk.green('accessible') : chalk.red('forbidden');
}

export function accessRows(entities: readonly string[], accessible: readonly string[]): string[][] {
  const allowed = new Set(accessible);
  return entities.map(name => [
    name.includes('.') ? name : chalk.bold(name),
    name.includes('.') ? chalk.dim('nested') : 'root',
    formatAccess(allowed.has(name))
  ]);
}

export function formatAccessSummary(accessibleCount: number, total: number): string {
  const counts = `${accessibleCount} of ${total}`;
  const colored = accessibleCount === 0 ? chalk.red(counts) : chalk.green(counts);
  return `${colored} endpoints accessible`;
}

export function formatAccessTable(entities: readonly string[], accessible: readonly string[]): string {
  if (entities.length === 0) {
    return chalk.dim('No entities declared');
  }

  const data = [
    ['Entity', 'Kind', 'Access'].map(h => chalk.bold(h)),
    ...accessRows(entities, accessible)
  ];

  return table(data, {
    border: {
      topBody: '',
      topJoin: '',
      topLeft: '',
      topRight: '',
      bottomBody: '',
      bottomJoin: '',
      bottomLeft: '',
      bottomRight: '',
      bodyLeft: '',
      bodyRight: '',
      bodyJoin: chalk.dim('│'),
      joinBody: '',
      joinLeft: '',
      joinRight: '',
      joinJoin: ''
    }
  });
}
