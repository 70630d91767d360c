/**
 * Structural Repair Engine
 *
 * Makes manifest text loadable by js-yaml with as few line rewrites as
 * possible. Each document goes through a small state machine:
 *
 *   Unvalidated -> Success
 *   Unvalidated -> Iterating(1) -> ... -> Iterating(3) -> Fail
 *   Iterating(n) -> Success | ProtectedSkip | Fail
 *
 * Every iteration takes the parse failure of the previous one, re-indents the
 * failing line under its nearest parent key and validates again. Multi-document
 * streams are split at `---` boundaries and each fragment runs on its own.
 */

import { INDENT_UNIT, MAX_REPAIR_ATTEMPTS } from '../config/index.js';
import { getDefaultLogger, type Logger } from '../utils/logger.js';
import {
    expandLeadingTabs,
    indentWidth,
    isBlank,
    isCommentOnly,
    isParentKey,
    isProtectedStructure
} from './line-predicates.js';
import type {
    DocumentRepair,
    DocumentStatus,
    FixedStatus,
    FixOutcome,
    ParseFailure,
    RepairAttempt,
    RepairOutcome
} from './types.js';
import { CANONICAL_STYLE, validateYaml, type CanonicalStyle } from './yaml-validator.js';

// ==========================================
// TYPES
// ==========================================

export interface RepairerOptions {
    indentUnit: number;
    style: CanonicalStyle;
    logger: Logger;
}

type RepairState =
    | { readonly phase: 'unvalidated'; readonly text: string }
    | {
        readonly phase: 'iterating';
        readonly attempt: number;
        readonly text: string;
        readonly failure: ParseFailure;
        readonly attempts: readonly RepairAttempt[];
    }
    | { readonly phase: 'done'; readonly result: DocumentRepair };

// ==========================================
// CONSTANTS
// ==========================================

const FIXED_STATUSES: readonly FixedStatus[] = ['STRUCTURE_FIXED_1', 'STRUCTURE_FIXED_2', 'STRUCTURE_FIXED_3'];

// A boundary only counts at the start of a line
const DOCUMENT_SPLIT = /\n(?=---)/;

const DOCUMENT_JOIN = '\n---\n';

// ==========================================
// LINE-LEVEL OPERATIONS
// ==========================================

/**
 * CRLF and lone CR become LF; trailing blank lines are dropped
 */
export function normalizeLineEndings(text: string): string {
    return text.replace(/\r\n/g, '\n').replace(/\r/g, '\n').trimEnd();
}

/**
 * Indent of the nearest mapping key above `failingLine`, or 0 at top level.
 * Blank, comment-only and protected lines are skipped.
 */
export function findParentIndent(lines: readonly string[], failingLine: number): number {
    for (let i = Math.min(failingLine, lines.length) - 1; i >= 0; i--) {
        const line = lines[i];
        if (isBlank(line) || isCommentOnly(line) || isProtectedStructure(line)) {
            continue;
        }
        if (isParentKey(line)) {
            return indentWidth(line);
        }
    }
    return 0;
}

/**
 * Re-indent the line a parse failure points at to one unit below its parent.
 * Mapping entries and sequence items follow the same rule.
 */
export function applyIndentFix(text: string, failure: ParseFailure, indentUnit: number = INDENT_UNIT): FixOutcome {
    if (failure.kind === 'unlocalized') {
        return { kind: 'skipped', reason: `no location for: ${failure.message}` };
    }

    const lines = text.split('\n');
    if (failure.line >= lines.length) {
        return { kind: 'skipped', reason: `line ${failure.line + 1} is past the end of the document` };
    }

    const original = lines[failure.line];
    const line = expandLeadingTabs(original, indentUnit);

    if (isProtectedStructure(line)) {
        return { kind: 'protected', line: failure.line, content: original };
    }

    const currentIndent = indentWidth(line);
    const parentIndent = findParentIndent(lines, failure.line);
    const targetIndent = parentIndent + indentUnit;

    const needsRewrite = currentIndent !== targetIndent ||
        line.includes('\t') ||
        currentIndent % indentUnit !== 0;

    if (!needsRewrite) {
        return { kind: 'skipped', reason: `line ${failure.line + 1} already sits at indent ${targetIndent}` };
    }

    const fixed = (' '.repeat(targetIndent) + line.trimStart()).trimEnd();
    lines[failure.line] = fixed;

    return {
        kind: 'rewritten',
        text: lines.join('\n'),
        fix: { line: failure.line, original, fixed, parentIndent, targetIndent }
    };
}

// ==========================================
// STRUCTURE REPAIRER CLASS
// ==========================================

export class StructureRepairer {
    private options: RepairerOptions;

    constructor(options: Partial<RepairerOptions> = {}) {
        this.options = {
            indentUnit: options.indentUnit ?? INDENT_UNIT,
            style: options.style ?? CANONICAL_STYLE,
            logger: options.logger ?? getDefaultLogger()
        };
    }

    /**
     * Entry point: single document or `---`-led stream
     */
    repair(text: string): RepairOutcome {
        const baseline = normalizeLineEndings(text);

        if (baseline.trimStart().startsWith('---')) {
            return this.repairStream(baseline);
        }

        const document = this.repairDocument(baseline);
        return { content: document.content, status: document.status, baseline, documents: [document] };
    }

    /**
     * Split at document boundaries, repair each fragment on its own, rejoin
     */
    repairStream(text: string): RepairOutcome {
        const baseline = normalizeLineEndings(text);
        // A bare `---` leaves nothing behind once its boundary is dropped
        const fragments = baseline.trim()
            .split(DOCUMENT_SPLIT)
            .map(dropLeadingBoundary)
            .filter(fragment => !isBlank(fragment));

        const documents = fragments.map((fragment, index) => {
            const document = this.repairDocument(normalizeLineEndings(fragment));
            if (document.status === 'STRUCTURE_FAIL' || document.status === 'STRUCTURE_PROTECTED_SKIP') {
                this.options.logger.warn(
                    { document: index + 1, status: document.status, failure: document.failure?.message },
                    'document in stream could not be repaired'
                );
            }
            return document;
        });

        return {
            content: documents.map(document => document.content).join(DOCUMENT_JOIN),
            status: 'MULTI_DOC_HANDLED',
            baseline,
            documents
        };
    }

    /**
     * Run one document through the state machine until it reaches a terminal state
     */
    repairDocument(text: string): DocumentRepair {
        let state: RepairState = { phase: 'unvalidated', text };
        while (state.phase !== 'done') {
            state = this.step(state);
        }
        return state.result;
    }

    // ==========================================
    // STATE MACHINE
    // ==========================================

    private step(state: Exclude<RepairState, { phase: 'done' }>): RepairState {
        if (state.phase === 'unvalidated') {
            const validation = validateYaml(state.text, this.options.style);
            if (validation.ok) {
                return this.finish(validation.canonical, 'STRUCTURE_OK', [], null);
            }
            return { phase: 'iterating', attempt: 1, text: state.text, failure: validation.failure, attempts: [] };
        }

        const { attempt, text, failure, attempts } = state;
        if (attempt > MAX_REPAIR_ATTEMPTS) {
            return this.finish(text, 'STRUCTURE_FAIL', attempts, failure);
        }

        const outcome = applyIndentFix(text, failure, this.options.indentUnit);

        if (outcome.kind === 'protected') {
            this.options.logger.warn(
                { line: outcome.line + 1, content: outcome.content.trim() },
                'fix target is a protected line, leaving document as is'
            );
            const record: RepairAttempt = { attempt, fix: null, failure };
            return this.finish(text, 'STRUCTURE_PROTECTED_SKIP', [...attempts, record], failure);
        }

        if (outcome.kind === 'skipped') {
            // Nothing changed, so validating again cannot get further
            this.options.logger.debug({ attempt, reason: outcome.reason }, 'no fix applicable');
            const record: RepairAttempt = { attempt, fix: null, failure };
            return this.finish(text, 'STRUCTURE_FAIL', [...attempts, record], failure);
        }

        this.options.logger.debug(
            { attempt, line: outcome.fix.line + 1, from: indentWidth(outcome.fix.original), to: outcome.fix.targetIndent },
            're-indented line'
        );

        const validation = validateYaml(outcome.text, this.options.style);
        if (validation.ok) {
            const record: RepairAttempt = { attempt, fix: outcome.fix, failure: null };
            return this.finish(validation.canonical, FIXED_STATUSES[attempt - 1], [...attempts, record], null);
        }

        const record: RepairAttempt = { attempt, fix: outcome.fix, failure: validation.failure };
        return {
            phase: 'iterating',
            attempt: attempt + 1,
            text: outcome.text,
            failure: validation.failure,
            attempts: [...attempts, record]
        };
    }

    private finish(
        content: string,
        status: DocumentStatus,
        attempts: readonly RepairAttempt[],
        failure: ParseFailure | null
    ): RepairState {
        return { phase: 'done', result: { content, status, attempts, failure } };
    }
}

// ==========================================
// HELPERS
// ==========================================

function dropLeadingBoundary(fragment: string): string {
    const newline = fragment.indexOf('\n');
    const firstLine = newline === -1 ? fragment : fragment.slice(0, newline);
    if (firstLine.trimEnd() !== '---') return fragment;
    return newline === -1 ? '' : fragment.slice(newline + 1);
}

// ==========================================
// EXPORTS
// ==========================================

/**
 * Convenience function to repair manifest text with default options
 */
export function repairStructure(text: string, options?: Partial<RepairerOptions>): RepairOutcome {
    return new StructureRepairer(options).repair(text);
}
