#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globby } from 'globby';
import { errorDiag } from './core/errorBuilder.js';
import { textReport, toJsonResult } from './core/format.js';
import type { Diagnostic, Engine } from './core/types.js';
import { layoutInput } from './input/index.js';
import type { LayoutResult } from './input/result.js';
import { RankDirSchema } from './input/schema.js';
import type { RankDir } from './layout/types.js';

function printUsage() {
    console.log('Usage: layerwise <file.json>');
    console.log('       cat graph.json | layerwise -');
    console.log('       layerwise <directory>');
    console.log('  - Lays out graph descriptions (JSON: options, nodes, edges)');
    console.log('  - When a directory is given, scans recursively for .json files');
    console.log('Options:');
    console.log('  --engine, -e    Layout engine: dagreish|conservative (default: dagreish)');
    console.log('  --rankdir, -r   Override direction: TB|BT|LR|RL');
    console.log('  --include, -I   Glob(s) to include (repeatable or comma-separated)');
    console.log('  --exclude, -E   Glob(s) to exclude (repeatable or comma-separated)');
    console.log('  --format, -f    Output format: text|json (default: text)');
    console.log('  --out, -o       Write each layout to <dir>/<name>.layout.json');
    console.log('  --timing        Print per-stage layout timings');
}

function readInput(arg: string): { content: string; filename: string } {
    if (arg === '-') {
        return { content: fs.readFileSync(0, 'utf8'), filename: '<stdin>' };
    }
    if (!fs.existsSync(arg)) {
        console.error(`File not found: ${arg}`);
        process.exit(1);
    }
    return { content: fs.readFileSync(arg, 'utf8'), filename: arg };
}

function isDirectory(p: string) {
    try { return fs.statSync(p).isDirectory(); } catch { return false; }
}

const DEFAULT_INCLUDE_GLOBS = ['**/*.json'];

const DEFAULT_IGNORE_DIRS = [
  '**/.git/**',
  '**/node_modules/**',
  '**/dist/**',
  '**/coverage/**',
  '**/*.layout.json',
  '**/package.json',
  '**/package-lock.json',
  '**/tsconfig*.json',
];

async function listCandidateFiles(root: string, includes: string[], excludes: string[]): Promise<string[]> {
    const patterns = includes.length > 0 ? includes : DEFAULT_INCLUDE_GLOBS;
    const cwdAbs = path.resolve(root);
    const files = await globby(patterns, {
      cwd: cwdAbs,
      absolute: true,
      dot: false,
      gitignore: true,
      ignore: [...excludes, ...DEFAULT_IGNORE_DIRS],
      followSymbolicLinks: false,
    });
    return files.sort();
}

type RunOptions = { engine: Engine; rankdir?: RankDir; debugTiming: boolean };
type FileResult = { file: string; result?: LayoutResult; diagnostics: Diagnostic[] };

function runFile(filename: string, content: string, opts: RunOptions): FileResult {
    let input: unknown;
    try {
        input = JSON.parse(content);
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        return { file: filename, diagnostics: [errorDiag('GRAPH-JSON', `Invalid JSON: ${message}`)] };
    }
    const { result, diagnostics } = layoutInput(input, {
        engine: opts.engine,
        overrides: opts.rankdir ? { rankdir: opts.rankdir } : undefined,
        debugTiming: opts.debugTiming,
    });
    return { file: filename, result, diagnostics };
}

function writeOut(outDir: string, r: FileResult) {
    if (!r.result) return;
    const base = r.file === '<stdin>' ? 'stdin' : path.basename(r.file, path.extname(r.file));
    fs.mkdirSync(outDir, { recursive: true });
    fs.writeFileSync(path.join(outDir, `${base}.layout.json`), JSON.stringify(r.result, null, 2) + '\n', 'utf8');
}

const errorCountOf = (r: FileResult) => r.diagnostics.filter(d => d.severity === 'error').length;

async function main() {
    const args = process.argv.slice(2);

    if (args.length === 0 || args[0] === '-h' || args[0] === '--help') {
        printUsage();
        process.exit(args.length === 0 ? 1 : 0);
    }

    // simple arg parsing: flags with a value consume the next argument;
    // anything not starting with '-' (or a lone '-') is a positional
    let format: 'text' | 'json' = 'text';
    let engine: Engine = 'dagreish';
    let rankdir: RankDir | undefined;
    let outDir: string | null = null;
    let debugTiming = false;
    const includeGlobs: string[] = [];
    const excludeGlobs: string[] = [];
    const positionals: string[] = [];
    for (let i = 0; i < args.length; i++) {
        const a = args[i];
        if (a === '--format' || a === '-f') {
            const v = (args[i + 1] || '').toLowerCase();
            if (v === 'json' || v === 'text') { format = v; i++; continue; }
        }
        if (a === '--engine' || a === '-e') {
            const v = (args[i + 1] || '').toLowerCase();
            if (v === 'dagreish' || v === 'conservative') { engine = v; i++; continue; }
            console.error(`Unknown engine: ${args[i + 1] ?? ''} (expected dagreish|conservative)`);
            process.exit(1);
        }
        if (a === '--rankdir' || a === '-r') {
            const parsed = RankDirSchema.safeParse(args[i + 1]);
            if (parsed.success) { rankdir = parsed.data; i++; continue; }
            console.error(`Unknown rankdir: ${args[i + 1] ?? ''} (expected TB|BT|LR|RL)`);
            process.exit(1);
        }
        if (a === '--out' || a === '-o') {
            const v = args[i + 1];
            if (v) { outDir = v; i++; continue; }
        }
        if (a === '--timing') { debugTiming = true; continue; }
        if (a === '--include' || a === '-I') {
            const v = args[i + 1];
            if (v) {
                includeGlobs.push(...v.split(',').map(s => s.trim()).filter(Boolean));
                i++; continue;
            }
        }
        if (a === '--exclude' || a === '-E') {
            const v = args[i + 1];
            if (v) {
                excludeGlobs.push(...v.split(',').map(s => s.trim()).filter(Boolean));
                i++; continue;
            }
        }
        if (a === '-' || !a.startsWith('-')) positionals.push(a);
    }
    const target = positionals[0] || args[0];
    const opts: RunOptions = { engine, rankdir, debugTiming };

    let results: FileResult[];
    if (isDirectory(target)) {
        const files = await listCandidateFiles(target, includeGlobs, excludeGlobs);
        results = files.map(file => runFile(file, fs.readFileSync(file, 'utf8'), opts));
        if (results.length === 0 && format === 'text') {
            console.log('No graph files found.');
            process.exit(0);
        }
    } else {
        const { content, filename } = readInput(target);
        results = [runFile(filename, content, opts)];
    }

    if (outDir) {
        for (const r of results) writeOut(outDir, r);
    }

    const totalErrors = results.reduce((n, r) => n + errorCountOf(r), 0);

    if (format === 'json') {
        const jsonFiles = results.map(r => toJsonResult(r.file, outDir ? undefined : r.result, r.diagnostics));
        if (jsonFiles.length === 1) {
            console.log(JSON.stringify(jsonFiles[0], null, 2));
        } else {
            const totalWarnings = jsonFiles.reduce((n, jf) => n + jf.warningCount, 0);
            const payload = { valid: totalErrors === 0, files: jsonFiles, errorCount: totalErrors, warningCount: totalWarnings };
            console.log(JSON.stringify(payload, null, 2));
        }
    } else {
        for (const r of results) {
            const report = textReport(r.file, outDir ? undefined : r.result, r.diagnostics);
            if (!report) continue;
            if (errorCountOf(r) > 0) console.error(report.trimEnd()); else console.log(report.trimEnd());
        }
        if (outDir) {
            const written = results.filter(r => r.result).length;
            console.log(`Wrote ${written} layout(s) to ${outDir}`);
        }
    }
    process.exit(totalErrors > 0 ? 1 : 0);
}

main().catch((err) => {
    console.error(err instanceof Error && err.stack ? err.stack : String(err));
    process.exit(1);
});
