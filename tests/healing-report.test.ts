import { describe, it, expect } from 'vitest';
import {
    buildHealingReport,
    emptyReport,
    formatDiffUnified,
    generateDiff
} from '../src/reporting/healing-report.js';

describe('Healing Report', () => {
    describe('buildHealingReport', () => {
        it('should record each changed line with its indents', () => {
            const report = buildHealingReport('a: 1\nb:   2\n', 'a: 1\n  b: 2');

            expect(report).toEqual({
                totalLines: 2,
                linesChanged: 1,
                changes: [{ line: 2, original: 'b:   2', fixed: '  b: 2', indentOriginal: 0, indentFixed: 2 }]
            });
        });

        it('should only compare lines both texts have', () => {
            const report = buildHealingReport('a: 1\nb: 2\nc: 3', 'a: 1');

            expect(report.totalLines).toBe(3);
            expect(report.linesChanged).toBe(0);
        });

        it('should treat CRLF and LF lines as equal', () => {
            expect(buildHealingReport('a: 1\r\nb: 2\r\n', 'a: 1\nb: 2').linesChanged).toBe(0);
        });

        it('should carry error and file path', () => {
            const report = buildHealingReport('a: 1', 'a: 1', { error: 'still broken', filePath: 'svc.yaml' });

            expect(report.error).toBe('still broken');
            expect(report.filePath).toBe('svc.yaml');
        });

        it('should leave optional fields out when absent', () => {
            const report = buildHealingReport('a: 1', 'a: 1');

            expect('error' in report).toBe(false);
            expect('filePath' in report).toBe(false);
        });
    });

    describe('emptyReport', () => {
        it('should count lines without changes', () => {
            expect(emptyReport('a\nb\n', { error: 'rejected' })).toEqual({
                totalLines: 2,
                linesChanged: 0,
                changes: [],
                error: 'rejected'
            });
        });
    });

    describe('Diff', () => {
        it('should classify lines', () => {
            const diff = generateDiff('a: 1\nb: 2\nc: 3', 'a: 1\nb: 9');

            expect(diff.lines.map(line => line.type)).toEqual(['unchanged', 'modified', 'removed']);
            expect(diff.changedLineCount).toBe(1);
            expect(diff.removedLineCount).toBe(1);
            expect(diff.addedLineCount).toBe(0);
        });

        it('should render a unified diff', () => {
            const text = formatDiffUnified('a: 1\nb: 2', 'a: 1\nb: 3\nc: 4', 'svc.yaml');

            expect(text.split('\n')).toEqual([
                '--- svc.yaml (original)',
                '+++ svc.yaml (healed)',
                ' a: 1',
                '-b: 2',
                '+b: 3',
                '+c: 4'
            ]);
        });
    });
});
