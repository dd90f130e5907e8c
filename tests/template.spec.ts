import { test, expect } from 'vitest';
import { parseTemplate, parseToken, templateToString } from '../src/lib/template';
import { formatDirective, isValidDirective } from '../src/lib/strftime';

// Monday, 15 January 2024, 14:30:25.123 local time
const at = new Date(2024, 0, 15, 14, 30, 25, 123);

test('parseTemplate classifies each comma-separated key', () => {
  const tokens = parseTemplate('sampler_name, 5.seed, %Y-%m-%d, ./sub, ../up, , ');

  expect(tokens.map(t => t.kind)).toEqual(['literal', 'node', 'date', 'path', 'path']);
  expect(tokens[1]).toEqual({ kind: 'node', raw: '5.seed', nodeId: '5', param: 'seed' });
  expect(tokens[3]).toEqual({ kind: 'path', raw: './sub', segment: 'sub' });
  expect(tokens[4]).toEqual({ kind: 'path', raw: '../up', segment: 'up' });
  expect(Object.isFrozen(tokens)).toBe(true);
});

test('parseToken keeps dotted keys that are not node references as literals', () => {
  expect(parseToken('5.seed.extra').kind).toBe('literal');
  expect(parseToken('a.b').kind).toBe('literal');
  expect(parseToken('5.').kind).toBe('literal');
  expect(parseToken('12.cfg_scale')).toEqual({ kind: 'node', raw: '12.cfg_scale', nodeId: '12', param: 'cfg_scale' });
});

test('templateToString joins raw keys', () => {
  expect(templateToString(parseTemplate(' a ,b,,%Y '))).toBe('a, b, %Y');
  expect(parseTemplate('')).toEqual([]);
});

test('formatDirective expands date and time conversions', () => {
  const cases: Array<[string, string]> = [
    ['%Y-%m-%d', '2024-01-15'],
    ['%H-%M-%S', '14-30-25'],
    ['%F %T', '2024-01-15 14:30:25'],
    ['%y%m%d', '240115'],
    ['%I %p', '02 PM'],
    ['%j', '015'],
    ['%a %A', 'Mon Monday'],
    ['%b %B', 'Jan January'],
    ['%w', '1'],
    ['%f', '123000'],
    ['%D %R', '01/15/24 14:30'],
    ['100%%', '100%'],
  ];

  for (const [pattern, expected] of cases) {
    expect(formatDirective(pattern, at)).toEqual({ ok: true, value: expected });
  }
});

test('formatDirective rejects unknown or dangling conversions', () => {
  expect(formatDirective('%Q', at).ok).toBe(false);
  expect(formatDirective('%Y%', at).ok).toBe(false);
  expect(formatDirective('%Y', new Date(Number.NaN))).toEqual({ ok: false, error: 'Invalid timestamp' });
  expect(isValidDirective('%Y-%m-%d')).toBe(true);
  expect(isValidDirective('%Y-%k')).toBe(false);
});
