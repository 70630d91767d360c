#!/usr/bin/env node
/**
 * CLI entry point.
 *
 * Usage:
 *   manifest-healer ./manifests
 *   manifest-healer ./manifests --fix
 *   manifest-healer deploy.yaml --fix --force --diff
 */

import { Command, InvalidArgumentError } from 'commander';
import { basename, dirname, resolve } from 'node:path';

import { loadConfig } from './config/index.js';
import { HealingPipeline } from './pipeline/healing-pipeline.js';
import { formatResults, formatSummary } from './reporting/console-formatter.js';
import { formatDiffUnified } from './reporting/healing-report.js';
import { describeError } from './utils/errors.js';
import { createLogger } from './utils/logger.js';
import { NodeFileSystem } from './workspace/adapters/node-fs.js';
import { WorkspaceAuditor, type AuditReport } from './workspace/workspace-auditor.js';

const VERSION = '0.1.0';

interface CliOptions {
    fix: boolean;
    force: boolean;
    diff: boolean;
    ext: string;
    depth: number;
    maxSizeMb?: number;
    timeout?: number;
}

function parseNumber(value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
        throw new InvalidArgumentError(`'${value}' is not a number.`);
    }
    return parsed;
}

async function main(): Promise<void> {
    const program = new Command()
        .name('manifest-healer')
        .description('Repair indentation, line-ending and document-boundary defects in YAML manifests')
        .version(VERSION)
        .argument('<path>', 'Directory or file to audit')
        .option('--fix', 'Write repaired files back (a backup is made first)', false)
        .option('--force', 'Also write partial heals', false)
        .option('--diff', 'Print a diff for every changed file', false)
        .option('--ext <extension>', 'File extension to scan', '.yaml')
        .option('--depth <n>', 'Maximum directory depth', parseNumber, 10)
        .option('--max-size-mb <n>', 'Reject manifests larger than this', parseNumber)
        .option('--timeout <seconds>', 'Processing time budget for a directory scan', parseNumber)
        .parse(process.argv);

    const target = resolve(program.args[0]);
    const opts = program.opts<CliOptions>();

    const config = loadConfig({ maxSizeMb: opts.maxSizeMb, timeoutS: opts.timeout });
    const logger = createLogger({ level: config.logLevel });
    const fileSystem = new NodeFileSystem();

    if (!(await fileSystem.exists(target))) {
        console.error(`Error: path '${target}' does not exist.`);
        process.exitCode = 1;
        return;
    }

    const isFile = (await fileSystem.stat(target)).isFile;
    const workspace = isFile ? dirname(target) : target;
    const pipeline = new HealingPipeline({
        maxSizeMb: config.maxSizeMb,
        timeoutS: config.timeoutS,
        fileSystem,
        logger
    });
    const auditor = new WorkspaceAuditor(workspace, { fileSystem, pipeline, logger });

    console.log(`manifest-healer v${VERSION}`);
    console.log(`Scanning: ${target}`);
    console.log(`Mode: ${opts.fix ? 'FIX (with backup)' : 'DRY-RUN (read-only)'}`);
    console.log('');

    const auditOptions = { dryRun: !opts.fix, forceWrite: opts.force };
    let reports: AuditReport[];
    if (isFile) {
        reports = [await auditor.auditFile(basename(target), auditOptions)];
    } else {
        reports = await auditor.scanDirectory({
            ...auditOptions,
            extension: opts.ext,
            maxDepth: opts.depth,
            onProgress: (processed, total) => {
                process.stderr.write(`\rProcessing manifests... ${processed}/${total}`);
                if (processed === total) process.stderr.write('\n');
            }
        });
    }

    if (reports.length === 0) {
        console.log(`No files found with extension '${opts.ext}'. Try --ext .yml or check the path.`);
        return;
    }

    console.log(formatResults(reports));

    if (opts.diff) {
        for (const report of reports) {
            if (report.result && report.linesChanged > 0) {
                const original = await fileSystem.readFile(resolve(workspace, report.backupCreated ?? report.filePath));
                console.log('');
                console.log(formatDiffUnified(original, report.result.content, report.filePath));
            }
        }
    }

    console.log('');
    console.log(formatSummary(auditor.generateSummary(reports), { target: program.args[0], fix: opts.fix }));
}

main().catch((error: unknown) => {
    console.error(`manifest-healer failed: ${describeError(error)}`);
    process.exitCode = 1;
});
