/**
 * Healing Report
 *
 * Positional comparison of the text a caller handed in with the text the
 * pipeline produced, plus a unified-diff rendering for terminals.
 */

import { splitLines } from '../healing/lexical-normalizer.js';
import { indentWidth } from '../healing/line-predicates.js';
import { describeError } from '../utils/errors.js';

// ==========================================
// TYPES
// ==========================================

export interface LineChange {
    /** 1-based line number */
    line: number;
    original: string;
    fixed: string;
    indentOriginal: number;
    indentFixed: number;
}

export interface HealingReport {
    totalLines: number;
    linesChanged: number;
    changes: LineChange[];
    error?: string;
    filePath?: string;
}

export interface ReportContext {
    error?: string;
    filePath?: string;
}

export interface DiffLine {
    type: 'unchanged' | 'removed' | 'added' | 'modified';
    lineNumber: number;
    content: string;
    originalContent?: string;
}

export interface DiffView {
    lines: DiffLine[];
    changedLineCount: number;
    addedLineCount: number;
    removedLineCount: number;
}

// ==========================================
// REPORT BUILDING
// ==========================================

/**
 * Compare line i of the original with line i of the result. Lines past the
 * end of the shorter text are not compared.
 */
export function buildHealingReport(original: string, final: string, context: ReportContext = {}): HealingReport {
    try {
        const originalLines = splitLines(original);
        const finalLines = splitLines(final);
        const changes: LineChange[] = [];

        const shared = Math.min(originalLines.length, finalLines.length);
        for (let i = 0; i < shared; i++) {
            const before = originalLines[i];
            const after = finalLines[i];
            if (before !== after) {
                changes.push({
                    line: i + 1,
                    original: before,
                    fixed: after,
                    indentOriginal: indentWidth(before),
                    indentFixed: indentWidth(after)
                });
            }
        }

        return withContext({ totalLines: originalLines.length, linesChanged: changes.length, changes }, context);
    } catch (error) {
        return withContext(
            { totalLines: 0, linesChanged: 0, changes: [] },
            { ...context, error: `report failed: ${describeError(error)}` }
        );
    }
}

/**
 * Report for inputs that never reached the repair engine
 */
export function emptyReport(content: string, context: ReportContext = {}): HealingReport {
    return withContext({ totalLines: splitLines(content).length, linesChanged: 0, changes: [] }, context);
}

function withContext(report: HealingReport, context: ReportContext): HealingReport {
    if (context.error !== undefined) report.error = context.error;
    if (context.filePath !== undefined) report.filePath = context.filePath;
    return report;
}

// ==========================================
// DIFF
// ==========================================

export function generateDiff(original: string, fixed: string): DiffView {
    const originalLines = splitLines(original);
    const fixedLines = splitLines(fixed);
    const lines: DiffLine[] = [];

    let addedCount = 0;
    let removedCount = 0;
    let changedCount = 0;

    const maxLines = Math.max(originalLines.length, fixedLines.length);

    for (let i = 0; i < maxLines; i++) {
        const before = i < originalLines.length ? originalLines[i] : undefined;
        const after = i < fixedLines.length ? fixedLines[i] : undefined;

        if (before === undefined && after !== undefined) {
            lines.push({ type: 'added', lineNumber: i + 1, content: after });
            addedCount++;
        } else if (before !== undefined && after === undefined) {
            lines.push({ type: 'removed', lineNumber: i + 1, content: before });
            removedCount++;
        } else if (before !== undefined && after !== undefined) {
            if (before !== after) {
                lines.push({ type: 'modified', lineNumber: i + 1, content: after, originalContent: before });
                changedCount++;
            } else {
                lines.push({ type: 'unchanged', lineNumber: i + 1, content: before });
            }
        }
    }

    return {
        lines,
        changedLineCount: changedCount,
        addedLineCount: addedCount,
        removedLineCount: removedCount
    };
}

/**
 * Format diff as unified diff text
 */
export function formatDiffUnified(original: string, fixed: string, label: string = 'manifest'): string {
    const diff = generateDiff(original, fixed);
    const out: string[] = [`--- ${label} (original)`, `+++ ${label} (healed)`];

    for (const line of diff.lines) {
        switch (line.type) {
            case 'unchanged':
                out.push(` ${line.content}`);
                break;
            case 'removed':
                out.push(`-${line.content}`);
                break;
            case 'added':
                out.push(`+${line.content}`);
                break;
            case 'modified':
                out.push(`-${line.originalContent ?? ''}`);
                out.push(`+${line.content}`);
                break;
        }
    }

    return out.join('\n');
}
