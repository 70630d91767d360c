/**
 * Healing Pipeline
 *
 * Raw text -> Lexical Normalizer -> Structural Repair Engine -> report.
 *
 * Guards reject missing, unreadable, oversized and blank input before any
 * repair runs. The outcome is classified as success, partial heal (improved
 * but still invalid) or failure. Nothing thrown during repair escapes: it is
 * reported as PIPELINE_ERROR.
 */

import { BYTES_PER_MB, INDENT_UNIT, loadConfig } from '../config/index.js';
import { normalizeLexical } from '../healing/lexical-normalizer.js';
import { StructureRepairer } from '../healing/structure-repairer.js';
import { isSuccessStatus, type HealingStatus, type RepairOutcome } from '../healing/types.js';
import { buildHealingReport, emptyReport, type HealingReport } from '../reporting/healing-report.js';
import { describeError, truncateMessage } from '../utils/errors.js';
import { getDefaultLogger, type Logger } from '../utils/logger.js';
import { NodeFileSystem } from '../workspace/adapters/node-fs.js';
import type { FileSystem } from '../workspace/ports/filesystem.js';

// ==========================================
// TYPES
// ==========================================

export interface PipelineOptions {
    /** Reject input larger than this many MiB */
    maxSizeMb: number;
    /** Advisory budget per run, enforced by callers between files */
    timeoutS: number;
    fileSystem: FileSystem;
    logger: Logger;
}

export type InputType = 'string' | 'file';

export interface HealingResult {
    content: string;
    status: HealingStatus;
    report: HealingReport;
    /** Fully valid YAML */
    success: boolean;
    /** Improved, but still fails validation */
    partialHeal: boolean;
    /** False only when a guard rejected the input before repair ran */
    phase1Complete: boolean;
    inputType: InputType;
    inputSizeBytes: number;
}

export interface ManifestSource {
    content?: string | null;
    filePath?: string | null;
}

export interface BatchSummary {
    successRate: number;
    total: number;
    successful: number;
    partialHeal: number;
    failed: number;
}

// ==========================================
// CONSTANTS
// ==========================================

const BYTE_ORDER_MARK = '\uFEFF';

/** Characters of oversized input echoed back in the result */
const OVERSIZE_PREVIEW = 1000;

const FAULT_MESSAGE_LIMIT = 100;

// ==========================================
// HEALING PIPELINE CLASS
// ==========================================

export class HealingPipeline {
    readonly maxSizeMb: number;
    readonly timeoutS: number;
    private fileSystem: FileSystem;
    private logger: Logger;
    private repairer: StructureRepairer;

    constructor(options: Partial<PipelineOptions> = {}) {
        const config = loadConfig({ maxSizeMb: options.maxSizeMb, timeoutS: options.timeoutS }, {});
        this.maxSizeMb = config.maxSizeMb;
        this.timeoutS = config.timeoutS;
        this.fileSystem = options.fileSystem ?? new NodeFileSystem();
        this.logger = options.logger ?? getDefaultLogger();
        this.repairer = new StructureRepairer({ indentUnit: INDENT_UNIT, logger: this.logger });
    }

    /**
     * Heal a manifest given as text or as a file path. A file path wins when
     * both are present.
     */
    async healManifest(source: ManifestSource): Promise<HealingResult> {
        const { content, filePath } = source;

        if ((content === undefined || content === null) && !filePath) {
            return this.errorResult('', 'MISSING_INPUT', 'No content or file provided', 'string');
        }

        if (!filePath) {
            return this.healContent(content);
        }

        let text: string;
        try {
            text = stripByteOrderMark(await this.fileSystem.readFile(filePath));
        } catch (error) {
            this.logger.warn({ filePath, err: describeError(error) }, 'manifest could not be read');
            return this.errorResult('', 'FILE_READ_ERROR', describeError(error), 'file', filePath);
        }

        return this.heal(text, 'file', filePath);
    }

    /**
     * Heal manifest text directly
     */
    healContent(content: string | null | undefined): HealingResult {
        if (content === undefined || content === null) {
            return this.errorResult('', 'MISSING_INPUT', 'No content or file provided', 'string');
        }
        return this.heal(content, 'string');
    }

    /**
     * Heal several manifests in order; blank entries are dropped
     */
    healManifests(contents: ReadonlyArray<string | null | undefined>): HealingResult[] {
        const results: HealingResult[] = [];
        for (const content of contents) {
            if (content && content.trim() !== '') {
                results.push(this.healContent(content));
            }
        }
        return results;
    }

    /**
     * Heal files one after another, keeping their order
     */
    async healFiles(filePaths: readonly string[]): Promise<HealingResult[]> {
        const results: HealingResult[] = [];
        for (const filePath of filePaths) {
            results.push(await this.healManifest({ filePath }));
        }
        return results;
    }

    batchSuccessRate(results: readonly HealingResult[]): BatchSummary {
        if (results.length === 0) {
            return { successRate: 0, total: 0, successful: 0, partialHeal: 0, failed: 0 };
        }

        const successful = results.filter(r => r.success).length;
        const partialHeal = results.filter(r => r.partialHeal).length;
        const total = results.length;

        return {
            successRate: successful / total,
            total,
            successful,
            partialHeal,
            failed: total - successful - partialHeal
        };
    }

    /**
     * Whether the result can be handed to a consumer that loads it as is
     */
    isApplyReady(result: HealingResult): boolean {
        return result.success;
    }

    // ==========================================
    // CORE PATH
    // ==========================================

    private heal(raw: string, inputType: InputType, filePath?: string): HealingResult {
        const inputSizeBytes = Buffer.byteLength(raw, 'utf8');
        const limitBytes = this.maxSizeMb * BYTES_PER_MB;

        if (inputSizeBytes > limitBytes) {
            const sizeMb = (inputSizeBytes / BYTES_PER_MB).toFixed(1);
            return this.errorResult(
                raw.slice(0, OVERSIZE_PREVIEW),
                'FILE_TOO_LARGE',
                `File exceeds ${this.maxSizeMb}MB limit (${sizeMb}MB)`,
                inputType,
                filePath,
                inputSizeBytes
            );
        }

        if (raw.trim() === '') {
            return this.errorResult('', 'EMPTY_INPUT', 'No input provided', inputType, filePath, inputSizeBytes);
        }

        try {
            const lexical = normalizeLexical(raw, { tabWidth: INDENT_UNIT });
            this.logger.debug({
                filePath,
                tabLines: lexical.tabLines.length,
                trimmedLines: lexical.trimmedLines.length,
                blockScalarLines: lexical.blockScalarLines.length
            }, 'lexical pass');

            const outcome = this.repairer.repair(lexical.text);
            const success = isSuccessStatus(outcome.status);
            const partialHeal = !success &&
                outcome.status === 'STRUCTURE_FAIL' &&
                outcome.content !== outcome.baseline &&
                outcome.content.trim() !== '';

            const report = buildHealingReport(raw, outcome.content, {
                error: remainingFailures(outcome),
                filePath
            });

            this.logger.info({
                filePath,
                status: outcome.status,
                linesChanged: report.linesChanged,
                partialHeal
            }, 'manifest healed');

            return {
                content: outcome.content,
                status: outcome.status,
                report,
                success,
                partialHeal,
                phase1Complete: true,
                inputType,
                inputSizeBytes
            };
        } catch (error) {
            const message = describeError(error);
            this.logger.error({ filePath, err: message }, 'healing pipeline fault');
            return this.errorResult(raw, 'PIPELINE_ERROR', truncateMessage(message, FAULT_MESSAGE_LIMIT), inputType, filePath);
        }
    }

    private errorResult(
        content: string,
        status: HealingStatus,
        error: string,
        inputType: InputType,
        filePath?: string,
        inputSizeBytes: number = Buffer.byteLength(content, 'utf8')
    ): HealingResult {
        return {
            content,
            status,
            report: emptyReport(content, { error, filePath }),
            success: false,
            partialHeal: false,
            phase1Complete: false,
            inputType,
            inputSizeBytes
        };
    }
}

// ==========================================
// HELPERS
// ==========================================

function stripByteOrderMark(text: string): string {
    return text.startsWith(BYTE_ORDER_MARK) ? text.slice(BYTE_ORDER_MARK.length) : text;
}

/**
 * Parse failures left in any document, joined for the report
 */
function remainingFailures(outcome: RepairOutcome): string | undefined {
    const messages = outcome.documents
        .map((document, index) => {
            if (document.failure === null) return null;
            return outcome.documents.length > 1
                ? `document ${index + 1}: ${document.failure.message}`
                : document.failure.message;
        })
        .filter((message): message is string => message !== null);

    return messages.length > 0 ? messages.join('; ') : undefined;
}

// ==========================================
// EXPORTS
// ==========================================

/**
 * Convenience function to heal manifest text with default options
 */
export function healManifestText(content: string, options?: Partial<PipelineOptions>): HealingResult {
    return new HealingPipeline(options).healContent(content);
}
