import type { LayoutResult } from '../input/result.js';
import type { Diagnostic } from './types.js';

export type OutputFormat = 'text' | 'json';

export function groupErrors(diagnostics: Diagnostic[]) {
  const errs = diagnostics.filter(e => e.severity === 'error');
  const warns = diagnostics.filter(e => e.severity === 'warning');
  return { errs, warns };
}

const fmt = (n: number | undefined): string => (n === undefined ? '-' : String(Math.round(n * 100) / 100));

export function textReport(filename: string, result: LayoutResult | undefined, diagnostics: Diagnostic[]): string {
  const { errs, warns } = groupErrors(diagnostics);
  const lines: string[] = [];

  const printBlock = (kind: 'error' | 'warning', e: Diagnostic) => {
    const kindColor = kind === 'error' ? '\x1b[31merror\x1b[0m' : '\x1b[33mwarning\x1b[0m';
    lines.push(`${kindColor}[${e.code}]: ${e.message}`);
    lines.push(`at ${filename}${e.path ? `#${e.path}` : ''}`);
    if (e.hint) {
      const hintLines = String(e.hint).split(/\r?\n/);
      lines.push(`hint: ${hintLines[0]}`);
      for (let i = 1; i < hintLines.length; i++) {
        lines.push(`  ${hintLines[i]}`);
      }
    }
    lines.push('');
  };

  for (const e of errs) printBlock('error', e);
  for (const w of warns) printBlock('warning', w);

  if (result) {
    lines.push(`${filename}: ${fmt(result.width)} x ${fmt(result.height)}`);
    const idWidth = Math.max(0, ...result.nodes.map(n => n.id.length));
    for (const node of result.nodes) {
      lines.push(`  ${node.id.padEnd(idWidth, ' ')}  x=${fmt(node.x)} y=${fmt(node.y)} rank=${node.rank ?? '-'} order=${node.order ?? '-'}`);
    }
    for (const edge of result.edges) {
      const name = edge.name !== undefined ? ` (${edge.name})` : '';
      const pts = edge.points.map(p => `${fmt(p.x)},${fmt(p.y)}`).join(' ');
      lines.push(`  ${edge.v} -> ${edge.w}${name}: ${pts}`);
    }
  }

  return lines.join('\n');
}

export function toJsonResult(filename: string, result: LayoutResult | undefined, diagnostics: Diagnostic[]) {
  const { errs, warns } = groupErrors(diagnostics);
  return {
    file: filename,
    valid: errs.length === 0,
    errorCount: errs.length,
    warningCount: warns.length,
    errors: errs,
    warnings: warns,
    layout: result ?? null,
  };
}
