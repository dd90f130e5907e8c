import { test, expect } from 'vitest';
import { sanitizeSegment, stripModelExtension, trimEdges, isReservedName } from '../src/utils/sanitize';

test('sanitizeSegment replaces forbidden characters with underscores', () => {
  expect(sanitizeSegment('a<b>c:d"e|f?g*h\\i')).toBe('a_b_c_d_e_f_g_h_i');
  expect(sanitizeSegment('models/sdxl')).toBe('models_sdxl');
  expect(sanitizeSegment('tab\there')).toBe('tab_here');
});

test('sanitizeSegment strips leading and trailing dots and whitespace', () => {
  expect(sanitizeSegment('  ..name.. ')).toBe('name');
  expect(sanitizeSegment('...')).toBe('');
  expect(sanitizeSegment('a. b')).toBe('a. b');
});

test('sanitizeSegment prefixes reserved device names', () => {
  expect(sanitizeSegment('CON')).toBe('_CON');
  expect(sanitizeSegment('con')).toBe('_con');
  expect(sanitizeSegment('COM1')).toBe('_COM1');
  expect(sanitizeSegment('lpt9 ')).toBe('_lpt9');
  expect(sanitizeSegment('CONSOLE')).toBe('CONSOLE');
  expect(isReservedName('nul')).toBe(true);
});

test('sanitizeSegment truncates to 200 characters', () => {
  expect(sanitizeSegment('a'.repeat(250))).toHaveLength(200);

  // a dot exposed by the cut is stripped as well
  const cutAtDot = 'a'.repeat(199) + '.' + 'b'.repeat(10);
  expect(sanitizeSegment(cutAtDot)).toBe('a'.repeat(199));
});

test('sanitizeSegment counts length in code points', () => {
  const name = sanitizeSegment('a'.repeat(199) + '🎨tail');
  expect(name).toBe('a'.repeat(199) + '🎨');
  expect(Array.from(name)).toHaveLength(200);

  expect(sanitizeSegment('🎨'.repeat(250))).toBe('🎨'.repeat(200));
});

test('sanitizeSegment replaces unpaired surrogates', () => {
  expect(sanitizeSegment('x\uD83Cy')).toBe('x_y');
  expect(sanitizeSegment('x\uDFA8y')).toBe('x_y');
  expect(sanitizeSegment('x🎨y')).toBe('x🎨y');
});

test('sanitizeSegment is idempotent', () => {
  const samples = [
    'CON', ' con. ', 'a<b>', '...x...', 'x'.repeat(199) + ' .y', 'nul.txt',
    'plain', '', '  ', 'a/b\\c', '_CON', 'prn', '\u0000ctrl', 'émoji 🎨',
    'a'.repeat(199) + '🎨tail', '\uD83C' + 'b'.repeat(205)
  ];
  for (const sample of samples) {
    const once = sanitizeSegment(sample);
    expect(sanitizeSegment(once)).toBe(once);
  }
});

test('stripModelExtension removes one model file extension', () => {
  expect(stripModelExtension('sd_xl_base.safetensors')).toBe('sd_xl_base');
  expect(stripModelExtension('model.CKPT')).toBe('model');
  expect(stripModelExtension('a.ckpt.ckpt')).toBe('a.ckpt');
  expect(stripModelExtension('photo.png')).toBe('photo.png');
});

test('trimEdges removes runs of delimiter, dot and separator', () => {
  expect(trimEdges('--a--', ['-'])).toBe('a');
  expect(trimEdges('_._a/_', ['_', '.', '/'])).toBe('a');
  expect(trimEdges('::a::b::', ['::'])).toBe('a::b');
  expect(trimEdges('---', ['-'])).toBe('');
  expect(trimEdges('a', [''])).toBe('a');
});
