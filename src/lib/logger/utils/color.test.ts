import chalk from 'chalk';
import { describe, expect, test } from 'vitest';
import { colorize } from './color';

describe('colorize', () => {
  test('uses one chalk style per log type', () => {
    expect(colorize('error', 'Error message')).toBe(chalk.red('Error message'));
    expect(colorize('warn', 'Warning message')).toBe(chalk.yellow('Warning message'));
    expect(colorize('success', 'Done')).toBe(chalk.green('Done'));
    expect(colorize('notice', 'Heads up')).toBe(chalk.blue('Heads up'));
    expect(colorize('debug', 'Starting pool...')).toBe(chalk.gray('Starting pool...'));
    expect(colorize('info', 'Info message')).toBe(chalk.white('Info message'));
  });

  test('keeps the text when colors are disabled', () => {
    const previous = chalk.level;
    chalk.level = 0;

    try {
      expect(colorize('error', 'plain')).toBe('plain');
    } finally {
      chalk.level = previous;
    }
  });
});
