/**
 * Lexical Normalizer
 *
 * Whitespace hygiene before any structural reasoning:
 * - tabs used as indentation or as separators become spaces
 * - trailing whitespace is removed
 * - block-scalar bodies are left exactly as written
 * - unpaired UTF-16 surrogates are rejected
 *
 * Line separators are kept as found, so the output has the same lines in the
 * same order as the input. The repair engine locates parse errors by line
 * index and depends on that.
 */

import { INDENT_UNIT } from '../config/index.js';
import { MalformedEncodingError } from '../utils/errors.js';
import { indentWidth } from './line-predicates.js';

// ==========================================
// TYPES
// ==========================================

export interface LexicalOptions {
    /** Spaces written for each tab */
    tabWidth: number;
}

export interface LexicalResult {
    text: string;
    /** 0-based lines where at least one tab was expanded */
    tabLines: number[];
    /** 0-based lines that lost trailing whitespace */
    trimmedLines: number[];
    /** 0-based lines inside block scalars, left untouched */
    blockScalarLines: number[];
}

// ==========================================
// CONSTANTS
// ==========================================

const DEFAULT_OPTIONS: LexicalOptions = {
    tabWidth: INDENT_UNIT
};

// `key: |`, `- >-`, `--- |` and friends, with an optional trailing comment
const BLOCK_SCALAR_HEADER = /(?:^\s*-|:|^---)\s+[|>][-+1-9]{0,2}\s*(?:#.*)?$/;

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const LINE_SEPARATOR = /(\r\n|\r|\n)/;

// ==========================================
// NORMALIZER
// ==========================================

export function normalizeLexical(text: string, options: Partial<LexicalOptions> = {}): LexicalResult {
    const { tabWidth } = { ...DEFAULT_OPTIONS, ...options };
    const tab = ' '.repeat(tabWidth);

    // Odd indices hold the separators
    const parts = text.split(LINE_SEPARATOR);
    const tabLines: number[] = [];
    const trimmedLines: number[] = [];
    const blockScalarLines: number[] = [];

    let blockHeaderIndent: number | null = null;

    for (let p = 0; p < parts.length; p += 2) {
        const lineIndex = p / 2;
        const line = parts[p];

        assertWellFormed(line, lineIndex);

        if (blockHeaderIndent !== null) {
            if (line.trim() === '' || indentWidth(line) > blockHeaderIndent) {
                blockScalarLines.push(lineIndex);
                continue;
            }
            blockHeaderIndent = null;
        }

        let normalized = expandWhitespaceTabs(line, tab);
        if (normalized !== line) {
            tabLines.push(lineIndex);
        }

        const trimmed = normalized.replace(/[ \t]+$/, '');
        if (trimmed !== normalized) {
            trimmedLines.push(lineIndex);
            normalized = trimmed;
        }

        if (BLOCK_SCALAR_HEADER.test(normalized)) {
            blockHeaderIndent = indentWidth(normalized);
        }

        parts[p] = normalized;
    }

    return { text: parts.join(''), tabLines, trimmedLines, blockScalarLines };
}

/**
 * Number of lines, not counting the empty remainder after a final newline
 */
export function countLines(text: string): number {
    return splitLines(text).length;
}

export function splitLines(text: string): string[] {
    if (text === '') return [];
    const lines = text.split(/\r\n|\r|\n/);
    if (lines[lines.length - 1] === '') {
        lines.pop();
    }
    return lines;
}

// ==========================================
// HELPERS
// ==========================================

/**
 * Expand tabs that act as whitespace: the indentation run, the gap after a
 * sequence dash and the gap after a plain mapping key. Tabs inside values
 * are content.
 */
function expandWhitespaceTabs(line: string, tab: string): string {
    if (!line.includes('\t')) return line;

    const lead = line.match(/^[ \t]*/)?.[0] ?? '';
    let head = lead.replace(/\t/g, tab);
    let rest = line.slice(lead.length);

    const dash = rest.match(/^-[ \t]+/);
    if (dash) {
        head += dash[0].replace(/\t/g, tab);
        rest = rest.slice(dash[0].length);
    }

    const key = rest.match(/^([^'"#\s][^'"#]*?:)([ \t]+)(?=\S)/);
    if (key) {
        head += key[1] + key[2].replace(/\t/g, tab);
        rest = rest.slice(key[0].length);
    }

    return head + rest;
}

// Invalid UTF-8 never gets this far: the file system adapter decodes strictly
function assertWellFormed(line: string, lineIndex: number): void {
    if (LONE_SURROGATE.test(line)) {
        throw new MalformedEncodingError(lineIndex, 'unpaired UTF-16 surrogate');
    }
}
