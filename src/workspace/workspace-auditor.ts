/**
 * Workspace Auditor
 *
 * Heals manifests inside a workspace directory: pre-flight checks, healing,
 * backup and atomic write-back, directory scans and a run summary.
 * Dry runs never touch the disk.
 */

import { dirname, join, relative, resolve } from 'node:path';

import type { HealingStatus } from '../healing/types.js';
import { HealingPipeline, type HealingResult } from '../pipeline/healing-pipeline.js';
import { describeError } from '../utils/errors.js';
import { getDefaultLogger, type Logger } from '../utils/logger.js';
import { NodeFileSystem } from './adapters/node-fs.js';
import { BACKUP_SUFFIX, createBackupPath, writeAtomically } from './backup.js';
import type { FileSystem } from './ports/filesystem.js';

// ==========================================
// TYPES
// ==========================================

export type PreflightStatus =
    | 'FILE_NOT_FOUND'
    | 'NOT_A_FILE'
    | 'PERMISSION_DENIED'
    | 'NO_WRITE_PERMISSION';

export type AuditStatus = HealingStatus | PreflightStatus | 'TIMEOUT_SKIPPED';

export interface AuditOptions {
    /** Report only, never write (default true) */
    dryRun: boolean;
    /** Also write partial heals (default false) */
    forceWrite: boolean;
}

export interface ScanOptions extends AuditOptions {
    extension: string;
    maxDepth: number;
    onProgress?: (processed: number, total: number) => void;
}

export interface AuditReport {
    /** Path relative to the workspace */
    filePath: string;
    status: AuditStatus;
    success: boolean;
    partialHeal: boolean;
    linesChanged: number;
    result: HealingResult | null;
    error?: string;
    backupCreated?: string;
    backupWarning?: string;
    written: boolean;
    writeError?: string;
    fileSizeBytes: number;
}

export interface WorkspaceSummary {
    totalFiles: number;
    successRate: number;
    successful: number;
    partialHeal: number;
    failedLogic: number;
    systemErrors: number;
    timedOut: number;
    backupsCreated: number;
    writtenToDisk: number;
    recommendForceWrite: boolean;
    generatedAt: string;
}

export interface AuditorOptions {
    fileSystem: FileSystem;
    pipeline: HealingPipeline;
    logger: Logger;
    /** Clock used for the time budget and backup ages */
    now: () => number;
}

// ==========================================
// CONSTANTS
// ==========================================

const SYSTEM_ERROR_STATUSES: ReadonlySet<AuditStatus> = new Set<AuditStatus>([
    'FILE_NOT_FOUND',
    'NOT_A_FILE',
    'PERMISSION_DENIED',
    'NO_WRITE_PERMISSION',
    'FILE_READ_ERROR'
]);

/** Below this share of partial heals, suggest re-running with force */
const FORCE_WRITE_HINT_RATIO = 0.1;

const DEFAULT_AUDIT_OPTIONS: AuditOptions = {
    dryRun: true,
    forceWrite: false
};

const DEFAULT_SCAN_OPTIONS: ScanOptions = {
    ...DEFAULT_AUDIT_OPTIONS,
    extension: '.yaml',
    maxDepth: 10
};

// ==========================================
// WORKSPACE AUDITOR CLASS
// ==========================================

export class WorkspaceAuditor {
    readonly workspace: string;
    private fs: FileSystem;
    private pipeline: HealingPipeline;
    private logger: Logger;
    private now: () => number;

    constructor(workspace: string, options: Partial<AuditorOptions> = {}) {
        this.workspace = resolve(workspace);
        this.fs = options.fileSystem ?? new NodeFileSystem();
        this.logger = options.logger ?? getDefaultLogger();
        this.pipeline = options.pipeline ?? new HealingPipeline({ fileSystem: this.fs, logger: this.logger });
        this.now = options.now ?? Date.now;
    }

    /**
     * Validate, heal, back up and write one file
     */
    async auditFile(relativePath: string, options: Partial<AuditOptions> = {}): Promise<AuditReport> {
        const { dryRun, forceWrite } = { ...DEFAULT_AUDIT_OPTIONS, ...options };
        const fullPath = resolve(this.workspace, relativePath);

        // --- Pre-flight ---
        if (!(await this.fs.exists(fullPath))) {
            return this.preflightError(relativePath, 'FILE_NOT_FOUND', `File not found: ${fullPath}`);
        }
        const stat = await this.fs.stat(fullPath);
        if (!stat.isFile) {
            return this.preflightError(relativePath, 'NOT_A_FILE', `Not a regular file: ${fullPath}`);
        }
        if (!(await this.fs.canAccess(fullPath, 'read'))) {
            return this.preflightError(relativePath, 'PERMISSION_DENIED', `Read access denied: ${fullPath}`);
        }
        if (!dryRun) {
            const writable = await this.fs.canAccess(fullPath, 'write') &&
                await this.fs.canAccess(dirname(fullPath), 'write');
            if (!writable) {
                return this.preflightError(relativePath, 'NO_WRITE_PERMISSION', 'Write access denied');
            }
        }

        // --- Healing ---
        const result = await this.pipeline.healManifest({ filePath: fullPath });
        const report: AuditReport = {
            filePath: relativePath,
            status: result.status,
            success: result.success,
            partialHeal: result.partialHeal,
            linesChanged: result.report.linesChanged,
            result,
            written: false,
            fileSizeBytes: stat.size
        };
        if (result.report.error !== undefined) {
            report.error = result.report.error;
        }

        // --- Backup & atomic write ---
        const shouldWrite = !dryRun && (result.success || (result.partialHeal && forceWrite));
        if (shouldWrite) {
            await this.writeBack(fullPath, result.content, report);
        }

        try {
            report.fileSizeBytes = (await this.fs.stat(fullPath)).size;
        } catch (error) {
            this.logger.debug({ filePath: relativePath, err: describeError(error) }, 'could not stat file after healing');
        }

        return report;
    }

    /**
     * Heal every matching file under the workspace, depth-limited, symlinks
     * skipped. Files left when the time budget runs out are reported as
     * TIMEOUT_SKIPPED.
     */
    async scanDirectory(options: Partial<ScanOptions> = {}): Promise<AuditReport[]> {
        const { extension, maxDepth, onProgress, dryRun, forceWrite } = { ...DEFAULT_SCAN_OPTIONS, ...options };
        const suffixes = [extension.toLowerCase(), extension.toUpperCase()];

        const files = (await this.collectFiles(this.workspace, 1, maxDepth))
            .filter(path => suffixes.some(suffix => path.endsWith(suffix)));

        const budgetMs = this.pipeline.timeoutS * 1000;
        const startedAt = this.now();
        const reports: AuditReport[] = [];

        for (const fullPath of files) {
            const relativePath = relative(this.workspace, fullPath);
            if (this.now() - startedAt > budgetMs) {
                reports.push(this.preflightError(relativePath, 'TIMEOUT_SKIPPED', `Time budget of ${this.pipeline.timeoutS}s exhausted`));
            } else {
                reports.push(await this.auditFile(relativePath, { dryRun, forceWrite }));
            }
            onProgress?.(reports.length, files.length);
        }

        return reports;
    }

    generateSummary(reports: readonly AuditReport[]): WorkspaceSummary {
        const generatedAt = new Date(this.now()).toISOString();
        const total = reports.length;

        const successful = reports.filter(r => r.success).length;
        const partialHeal = reports.filter(r => r.partialHeal).length;
        const systemErrors = reports.filter(r => SYSTEM_ERROR_STATUSES.has(r.status)).length;
        const timedOut = reports.filter(r => r.status === 'TIMEOUT_SKIPPED').length;

        return {
            totalFiles: total,
            successRate: total > 0 ? successful / total : 0,
            successful,
            partialHeal,
            failedLogic: total - successful - partialHeal - systemErrors - timedOut,
            systemErrors,
            timedOut,
            backupsCreated: reports.filter(r => r.backupCreated !== undefined).length,
            writtenToDisk: reports.filter(r => r.written).length,
            recommendForceWrite: partialHeal > 0 && partialHeal < total * FORCE_WRITE_HINT_RATIO,
            generatedAt
        };
    }

    /**
     * Delete backups older than `maxAgeHours`; returns how many were removed
     */
    async cleanupBackups(maxAgeHours: number = 24): Promise<number> {
        const cutoff = this.now() - maxAgeHours * 3600 * 1000;
        const backups = (await this.collectFiles(this.workspace, 1, Number.POSITIVE_INFINITY))
            .filter(path => path.endsWith(BACKUP_SUFFIX));

        let removed = 0;
        for (const backup of backups) {
            const stat = await this.fs.stat(backup);
            if (stat.mtimeMs < cutoff) {
                await this.fs.remove(backup);
                removed++;
            }
        }
        return removed;
    }

    // ==========================================
    // HELPERS
    // ==========================================

    private async writeBack(fullPath: string, content: string, report: AuditReport): Promise<void> {
        const backupPath = await createBackupPath(this.fs, fullPath);
        try {
            await this.fs.copyFile(fullPath, backupPath);
            report.backupCreated = relative(this.workspace, backupPath);
        } catch (error) {
            report.backupWarning = `Backup failed: ${describeError(error)}`;
            this.logger.warn({ filePath: report.filePath, err: describeError(error) }, 'backup failed');
        }

        try {
            await writeAtomically(this.fs, fullPath, `${content}\n`);
            report.written = true;
        } catch (error) {
            report.writeError = describeError(error);
            report.success = false;
            this.logger.error({ filePath: report.filePath, err: report.writeError }, 'write-back failed');
        }
    }

    /**
     * Regular files under `dir`, sorted, at most `maxDepth` path segments
     * below the workspace
     */
    private async collectFiles(dir: string, depth: number, maxDepth: number): Promise<string[]> {
        if (depth > maxDepth) return [];

        const files: string[] = [];
        for (const name of await this.fs.readDir(dir)) {
            const path = join(dir, name);
            const stat = await this.fs.stat(path);
            if (stat.isSymbolicLink) continue;
            if (stat.isDirectory) {
                files.push(...await this.collectFiles(path, depth + 1, maxDepth));
            } else if (stat.isFile) {
                files.push(path);
            }
        }
        return files.sort();
    }

    private preflightError(filePath: string, status: AuditStatus, error: string): AuditReport {
        return {
            filePath,
            status,
            success: false,
            partialHeal: false,
            linesChanged: 0,
            result: null,
            error,
            written: false,
            fileSizeBytes: 0
        };
    }
}
