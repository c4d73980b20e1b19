import chalk from 'chalk';
import { accessRows, formatAccessSummary } from './format';

describe('format', () => {
  const level = chalk.level;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  it('builds one row per entity with its kind and access', () => {
    expect(accessRows(['jobs', 'offers', 'jobs.openings'], ['jobs', 'jobs.openings'])).toEqual([
      ['jobs', 'root', 'accessible'],
      ['offers', 'root', 'forbidden'],
      ['jobs.openings', 'nested', 'accessible']
    ]);
  });

  it('summarizes access counts', () => {
    expect(formatAccessSummary(3, 25)).toBe('3 of 25 endpoints accessible');
  });
});
