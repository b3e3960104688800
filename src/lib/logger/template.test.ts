import { describe, expect, test } from 'vitest';
import { renderTemplate } from './template';

describe('renderTemplate', () => {
  test('should replace placeholders', () => {
    expect(renderTemplate('{{a}} and {{ b }}', { a: 1, b: 'two' })).toBe(
      '1 and two',
    );
  });

  test('should resolve dotted keys', () => {
    expect(
      renderTemplate('Namespace {{ns.name}}', { ns: { name: 'worker' } }),
    ).toBe('Namespace worker');
  });

  test('should join arrays', () => {
    expect(
      renderTemplate('New boot order: {{{order}}}', {
        order: ['timer', 'pool', 'consumer'],
      }),
    ).toBe('New boot order: {timer, pool, consumer}');
  });

  test('should render missing and null values as the fallback', () => {
    expect(renderTemplate('{{missing}}/{{nothing}}', { nothing: null })).toBe(
      '(null)/(null)',
    );
  });
});
