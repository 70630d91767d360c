/**
 * Plain-text rendering of audit results for the terminal
 */

import type { AuditReport, WorkspaceSummary } from '../workspace/workspace-auditor.js';

export interface SummaryContext {
    /** Path the user passed on the command line */
    target: string;
    fix: boolean;
}

function outcomeLabel(report: AuditReport): string {
    if (report.success) return 'OK';
    if (report.partialHeal) return 'PARTIAL';
    return 'FAILED';
}

/**
 * One row per file: path, status, outcome, changed lines
 */
export function formatResults(reports: readonly AuditReport[]): string {
    const header = ['File Path', 'Status', 'Result', 'Changes'];
    const rows = reports.map(report => [
        report.filePath,
        report.status,
        outcomeLabel(report),
        String(report.linesChanged)
    ]);

    const widths = header.map((title, column) =>
        Math.max(title.length, ...rows.map(row => row[column].length))
    );
    const render = (cells: string[]): string =>
        cells.map((cell, column) => cell.padEnd(widths[column])).join('  ').trimEnd();

    const lines = [render(header), widths.map(width => '─'.repeat(width)).join('  ')];
    for (const row of rows) {
        lines.push(render(row));
    }
    return lines.join('\n');
}

export function formatSummary(summary: WorkspaceSummary, context: SummaryContext): string {
    const lines: string[] = [
        'Final Summary:',
        ` • Total Files Scanned: ${summary.totalFiles}`,
        ` • Success Rate: ${(summary.successRate * 100).toFixed(1)}%`,
        ` • Partial Heals: ${summary.partialHeal}`,
        ` • Backups Created: ${summary.backupsCreated}`
    ];

    if (summary.timedOut > 0) {
        lines.push(` • Skipped (time budget): ${summary.timedOut}`);
    }

    if (summary.recommendForceWrite) {
        lines.push('');
        lines.push('Partial heals detected: best-effort fixes are available for files that still fail to parse.');
        lines.push(`Next: manifest-healer ${context.target} --fix --force`);
    }

    if (!context.fix) {
        lines.push('');
        lines.push('Note: no files were changed. To apply these repairs, run:');
        lines.push(`Next: manifest-healer ${context.target} --fix`);
    }

    return lines.join('\n');
}
