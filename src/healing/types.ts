/**
 * Healing Types
 *
 * Status vocabulary and the immutable records passed between the
 * normalizer, the repair engine and the pipeline.
 */

// ==========================================
// STATUSES
// ==========================================

export const SUCCESS_STATUSES = [
    'STRUCTURE_OK',
    'STRUCTURE_FIXED_1',
    'STRUCTURE_FIXED_2',
    'STRUCTURE_FIXED_3',
    'MULTI_DOC_HANDLED'
] as const;

export type SuccessStatus = typeof SUCCESS_STATUSES[number];

export type FixedStatus = 'STRUCTURE_FIXED_1' | 'STRUCTURE_FIXED_2' | 'STRUCTURE_FIXED_3';

/** Terminal statuses a single document can reach */
export type DocumentStatus =
    | 'STRUCTURE_OK'
    | FixedStatus
    | 'STRUCTURE_PROTECTED_SKIP'
    | 'STRUCTURE_FAIL';

export type RepairStatus = DocumentStatus | 'MULTI_DOC_HANDLED';

export type GuardStatus =
    | 'MISSING_INPUT'
    | 'FILE_READ_ERROR'
    | 'FILE_TOO_LARGE'
    | 'EMPTY_INPUT';

export type HealingStatus = RepairStatus | GuardStatus | 'PIPELINE_ERROR';

export function isSuccessStatus(status: string): status is SuccessStatus {
    return (SUCCESS_STATUSES as readonly string[]).includes(status);
}

// ==========================================
// PARSE FAILURES
// ==========================================

export interface LocatedFailure {
    readonly kind: 'located';
    /** 0-based line of the failure */
    readonly line: number;
    /** 0-based column of the failure */
    readonly column: number;
    readonly message: string;
}

export interface UnlocalizedFailure {
    readonly kind: 'unlocalized';
    readonly message: string;
}

export type ParseFailure = LocatedFailure | UnlocalizedFailure;

export type ValidationResult =
    | { readonly ok: true; readonly canonical: string }
    | { readonly ok: false; readonly failure: ParseFailure };

// ==========================================
// REPAIR RECORDS
// ==========================================

export interface LineFix {
    /** 0-based line that was rewritten */
    readonly line: number;
    readonly original: string;
    readonly fixed: string;
    readonly parentIndent: number;
    readonly targetIndent: number;
}

export type FixOutcome =
    | { readonly kind: 'rewritten'; readonly text: string; readonly fix: LineFix }
    | { readonly kind: 'protected'; readonly line: number; readonly content: string }
    | { readonly kind: 'skipped'; readonly reason: string };

export interface RepairAttempt {
    /** 1-based attempt index */
    readonly attempt: number;
    readonly fix: LineFix | null;
    /** Failure left after this attempt, null once the text validates */
    readonly failure: ParseFailure | null;
}

export interface DocumentRepair {
    readonly content: string;
    readonly status: DocumentStatus;
    readonly attempts: readonly RepairAttempt[];
    /** Failure that stopped the repair, when it did not succeed */
    readonly failure: ParseFailure | null;
}

export interface RepairOutcome {
    readonly content: string;
    readonly status: RepairStatus;
    /** Line-ending-normalized text the engine started from */
    readonly baseline: string;
    /** One entry per processed document, in source order */
    readonly documents: readonly DocumentRepair[];
}
