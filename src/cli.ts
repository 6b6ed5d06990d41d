#!/usr/bin/env node

import * as fs from 'node:fs';
import { ZodError } from 'zod';
import { buildFixModes, fixModesForFiles, fixSafetySchema, rulesConfigSchema } from './core/config.js';
import { Fixer } from './core/fixer.js';
import { textReport, toJsonResult, type OutputFormat } from './core/format.js';
import { parseViolationReport } from './core/schema.js';
import type { FixSafety, Violation } from './core/types.js';

function printUsage() {
    console.log('Usage: dockfix <report.json>');
    console.log('       cat report.json | dockfix -');
    console.log('  - Applies the suggested fixes found in a lint report to the Dockerfiles it names');
    console.log('Options:');
    console.log('  --safety <level>      Highest fix safety to apply: safe|suggestion|unsafe (default: safe)');
    console.log('  --fix-unsafe          Shorthand for --safety unsafe');
    console.log('  --fix-rule <codes>    Only apply fixes of these rules (repeatable or comma-separated)');
    console.log('  --config <file>       Rules config (JSON) carrying per-rule fix modes');
    console.log('  --concurrency <n>     Files resolved in parallel (default: 4)');
    console.log('  --format, -f          Output format: text|json (default: text)');
    console.log('  --dry-run, -n         Do not write files');
    console.log('  --print-fixed         Print fixed content when the report names a single file');
}

interface CliOptions {
    report: string;
    safety: FixSafety;
    fixRules: string[];
    configPath?: string;
    concurrency?: number;
    format: OutputFormat;
    dryRun: boolean;
    printFixed: boolean;
}

function fail(message: string): never {
    console.error(message);
    process.exit(1);
}

function issuesText(err: ZodError): string {
    return err.issues.map(i => `  ${i.path.join('.') || '<root>'}: ${i.message}`).join('\n');
}

function parseArgs(args: string[]): CliOptions {
    const opts: CliOptions = { report: '', safety: 'safe', fixRules: [], format: 'text', dryRun: false, printFixed: false };
    const positionals: string[] = [];
    for (let i = 0; i < args.length; i++) {
        const a = args[i] ?? '';
        if (a === '--safety') {
            const parsed = fixSafetySchema.safeParse((args[i + 1] || '').toLowerCase());
            if (!parsed.success) fail(`Invalid --safety value: ${args[i + 1] ?? ''}`);
            opts.safety = parsed.data;
            i++; continue;
        }
        if (a === '--fix-unsafe') { opts.safety = 'unsafe'; continue; }
        if (a === '--fix-rule') {
            const v = args[i + 1];
            if (v) {
                opts.fixRules.push(...v.split(',').map(s => s.trim()).filter(Boolean));
                i++; continue;
            }
        }
        if (a === '--config') {
            const v = args[i + 1];
            if (v) { opts.configPath = v; i++; continue; }
        }
        if (a === '--concurrency') {
            const n = Number(args[i + 1]);
            if (!Number.isInteger(n) || n < 1) fail(`Invalid --concurrency value: ${args[i + 1] ?? ''}`);
            opts.concurrency = n;
            i++; continue;
        }
        if (a === '--format' || a === '-f') {
            const v = (args[i + 1] || '').toLowerCase();
            if (v === 'json' || v === 'text') { opts.format = v; i++; continue; }
        }
        if (a === '--dry-run' || a === '-n') { opts.dryRun = true; continue; }
        if (a === '--print-fixed') { opts.printFixed = true; continue; }
        if (a === '-' || !a.startsWith('-')) positionals.push(a);
    }
    const report = positionals[0];
    if (!report) fail('Error: No report specified');
    opts.report = report;
    return opts;
}

function readJson(arg: string): unknown {
    let raw: string;
    if (arg === '-') raw = fs.readFileSync(0, 'utf8');
    else if (!fs.existsSync(arg)) fail(`File not found: ${arg}`);
    else raw = fs.readFileSync(arg, 'utf8');
    try {
        return JSON.parse(raw);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return fail(`Invalid JSON in ${arg === '-' ? '<stdin>' : arg}: ${message}`);
    }
}

function loadReport(arg: string): Violation[] {
    try {
        return parseViolationReport(readJson(arg));
    } catch (error) {
        if (error instanceof ZodError) fail(`Invalid report:\n${issuesText(error)}`);
        throw error;
    }
}

function loadFixModes(configPath: string | undefined, files: string[]): Record<string, Record<string, string>> {
    if (!configPath) return {};
    try {
        const config = rulesConfigSchema.parse(readJson(configPath));
        return fixModesForFiles(files, buildFixModes(config));
    } catch (error) {
        if (error instanceof ZodError) fail(`Invalid config:\n${issuesText(error)}`);
        throw error;
    }
}

function loadSources(violations: Violation[]): Map<string, string> {
    const sources = new Map<string, string>();
    for (const v of violations) {
        const file = v.location.file;
        if (sources.has(file)) continue;
        try {
            sources.set(file, fs.readFileSync(file, 'utf8'));
        } catch {
            console.error(`Skipping ${file}: file not readable`);
        }
    }
    return sources;
}

async function main() {
    const args = process.argv.slice(2);
    if (args.length === 0 || args[0] === '-h' || args[0] === '--help') {
        printUsage();
        process.exit(args.length === 0 ? 1 : 0);
    }

    const opts = parseArgs(args);
    const violations = loadReport(opts.report);
    const sources = loadSources(violations);
    const fixModes = loadFixModes(opts.configPath, [...sources.keys()]);

    const fixer = new Fixer({
        safetyThreshold: opts.safety,
        fixRules: opts.fixRules,
        fixModes,
        concurrency: opts.concurrency,
    });
    const result = await fixer.apply(violations, sources);

    if (!opts.dryRun) {
        for (const fc of result.modifiedFiles()) fs.writeFileSync(fc.path, fc.content, 'utf8');
    }

    if (opts.printFixed) {
        if (result.changes.size !== 1) fail('--print-fixed needs a report naming exactly one file');
        for (const fc of result.changes.values()) process.stdout.write(fc.content);
        return;
    }

    if (opts.format === 'json') {
        console.log(JSON.stringify({ dryRun: opts.dryRun, ...toJsonResult(result) }, null, 2));
    } else {
        console.log(textReport(result));
    }
}

main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
});
