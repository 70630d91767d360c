/**
 * Line classification helpers
 *
 * Every predicate works on a single line of text. Callers hand in the raw
 * line; comment stripping and trimming happen here so the rules stay in one
 * place.
 */

const INLINE_COMMENT = /\s+#/;
const ANCHOR_OR_ALIAS = /^[&*][a-zA-Z0-9_-]+/;
const PROTECTED_PREFIXES = ['%YAML', '%TAG', '---', '...', '|', '>'] as const;

/**
 * Drop an inline trailing comment (`value  # note`) and trailing whitespace.
 * A `#` glued to the previous character is part of the value and stays.
 */
export function stripInlineComment(line: string): string {
    return line.split(INLINE_COMMENT)[0].trimEnd();
}

/**
 * Width of the leading whitespace run
 */
export function indentWidth(line: string): number {
    const match = line.match(/^\s*/);
    return match ? match[0].length : 0;
}

export function isBlank(line: string): boolean {
    return line.trim() === '';
}

/**
 * True when nothing but a comment is left on the line
 */
export function isCommentOnly(line: string): boolean {
    const content = stripInlineComment(line).trim();
    return content === '' ? !isBlank(line) : content.startsWith('#');
}

export function isAnchorOrAlias(line: string): boolean {
    return ANCHOR_OR_ALIAS.test(stripInlineComment(line).trim());
}

/**
 * Lines the repair engine must never re-indent: directives, document
 * boundaries, anchors and aliases, block-scalar headers.
 */
export function isProtectedStructure(line: string): boolean {
    const content = stripInlineComment(line).trim();
    if (content === '') return false;
    return PROTECTED_PREFIXES.some(prefix => content.startsWith(prefix)) || isAnchorOrAlias(content);
}

/**
 * A mapping key that opens a nested block (`containers:`), not a list item
 */
export function isParentKey(line: string): boolean {
    const content = stripInlineComment(line);
    const trimmed = content.trimStart();
    return content.endsWith(':') && !trimmed.startsWith('- ');
}

/**
 * Replace tabs in the leading whitespace with `width` spaces each
 */
export function expandLeadingTabs(line: string, width: number): string {
    const lead = line.match(/^[ \t]*/)?.[0] ?? '';
    if (!lead.includes('\t')) return line;
    return lead.replace(/\t/g, ' '.repeat(width)) + line.slice(lead.length);
}
