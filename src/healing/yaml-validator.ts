/**
 * Validate-and-canonicalize.
 *
 * js-yaml decides validity and locates failures: its marks point at the line
 * that broke the structure, which is the line the repair engine rewrites.
 * Valid text is then re-emitted through the `yaml` document model, which keeps
 * comments, anchor names, aliases, merge keys and quote style, so only layout
 * changes.
 *
 * Parse errors come back as values. Anything js-yaml throws that is not a
 * YAMLException is a fault in the healer itself and is left to propagate.
 */

import * as jsYaml from 'js-yaml';
import { parseDocument } from 'yaml';

import { isProtectedStructure } from './line-predicates.js';
import type { ParseFailure, ValidationResult } from './types.js';

/**
 * Output layout for re-serialized manifests: two-space mappings, sequences
 * indented under their key with the dash two spaces in.
 */
export interface CanonicalStyle {
    readonly indent: number;
    readonly indentSeq: boolean;
    /** 0 disables folding of long scalars */
    readonly lineWidth: number;
}

export const CANONICAL_STYLE: CanonicalStyle = Object.freeze({
    indent: 2,
    indentSeq: true,
    lineWidth: 0
});

export function validateYaml(text: string, style: CanonicalStyle = CANONICAL_STYLE): ValidationResult {
    let data: unknown;
    try {
        data = jsYaml.load(text);
    } catch (error) {
        if (error instanceof jsYaml.YAMLException) {
            return { ok: false, failure: toParseFailure(error) };
        }
        throw error;
    }

    // Comment-only or empty documents: emitting would invent a `null`
    if (data === null || data === undefined) {
        return { ok: true, canonical: text.trimEnd() };
    }

    return { ok: true, canonical: canonicalize(text, style) };
}

export function isValidYaml(text: string): boolean {
    return validateYaml(text).ok;
}

/**
 * Re-emit `text` in canonical layout. Falls back to the text itself when the
 * document model rejects it or when re-emission would move a protected line.
 */
export function canonicalize(text: string, style: CanonicalStyle = CANONICAL_STYLE): string {
    const source = text.trimEnd();
    const doc = parseDocument(source);
    if (doc.errors.length > 0) {
        return source;
    }

    const canonical = doc.toString({
        indent: style.indent,
        indentSeq: style.indentSeq,
        lineWidth: style.lineWidth
    }).trimEnd();

    return keepsProtectedLines(source, canonical) ? canonical : source;
}

function keepsProtectedLines(source: string, canonical: string): boolean {
    const emitted = new Set(canonical.split('\n'));
    return source.split('\n')
        .filter(line => isProtectedStructure(line))
        .every(line => emitted.has(line));
}

function toParseFailure(error: jsYaml.YAMLException): ParseFailure {
    const mark = error.mark;
    if (mark && Number.isInteger(mark.line) && mark.line >= 0) {
        return {
            kind: 'located',
            line: mark.line,
            column: mark.column,
            message: `${error.reason} at line ${mark.line + 1}, column ${mark.column + 1}`
        };
    }
    return { kind: 'unlocalized', message: error.reason || error.message };
}
