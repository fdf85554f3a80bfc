import { describe, expect, test } from 'vitest';
import { errorDiag, warningDiag } from '../src/core/errorBuilder.js';
import { groupErrors, textReport, toJsonResult } from '../src/core/format.js';
import type { LayoutResult } from '../src/input/result.js';

const result: LayoutResult = {
  width: 75,
  height: 350,
  nodes: [
    { id: 'a', width: 50, height: 100, x: 37.5, y: 50, rank: 0, order: 0 },
    { id: 'bb', width: 0, height: 0, x: 1 / 3 },
  ],
  edges: [
    {
      v: 'a',
      w: 'bb',
      name: 'e1',
      points: [
        { x: 37.5, y: 100 },
        { x: 37.5, y: 150 },
      ],
    },
  ],
};

describe('textReport', () => {
  test('prints errors before warnings with their location and hint', () => {
    const diagnostics = [
      warningDiag('GRAPH-DUPLICATE-EDGE', 'Edge a -> b is defined more than once; the last definition wins.', {
        path: 'edges[1]',
      }),
      errorDiag('GRAPH-SCHEMA', 'edges[0].v: Required', { path: 'edges[0].v', hint: 'first\nsecond' }),
    ];
    expect(textReport('g.json', undefined, diagnostics).split('\n')).toEqual([
      '\x1b[31merror\x1b[0m[GRAPH-SCHEMA]: edges[0].v: Required',
      'at g.json#edges[0].v',
      'hint: first',
      '  second',
      '',
      '\x1b[33mwarning\x1b[0m[GRAPH-DUPLICATE-EDGE]: Edge a -> b is defined more than once; the last definition wins.',
      'at g.json#edges[1]',
      '',
    ]);
  });

  test('prints the drawing size, nodes and edge points', () => {
    expect(textReport('g.json', result, []).split('\n')).toEqual([
      'g.json: 75 x 350',
      '  a   x=37.5 y=50 rank=0 order=0',
      '  bb  x=0.33 y=- rank=- order=-',
      '  a -> bb (e1): 37.5,100 37.5,150',
    ]);
  });
});

describe('toJsonResult', () => {
  test('counts errors and warnings and marks the file invalid on errors', () => {
    const err = errorDiag('GRAPH-JSON', 'Invalid JSON');
    const warn = warningDiag('LAYOUT-FALLBACK', 'fallback');
    expect(toJsonResult('g.json', undefined, [err, warn])).toEqual({
      file: 'g.json',
      valid: false,
      errorCount: 1,
      warningCount: 1,
      errors: [err],
      warnings: [warn],
      layout: null,
    });
  });

  test('includes the layout of a valid file', () => {
    const json = toJsonResult('g.json', result, []);
    expect(json.valid).toBe(true);
    expect(json.layout).toBe(result);
  });
});

describe('groupErrors', () => {
  test('splits diagnostics by severity', () => {
    const err = errorDiag('A', 'a');
    const warn = warningDiag('B', 'b');
    expect(groupErrors([warn, err])).toEqual({ errs: [err], warns: [warn] });
  });
});
