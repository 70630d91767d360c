/**
 * Manifest Healer exports
 */

export { HealingPipeline, healManifestText } from './pipeline/healing-pipeline.js';
export { StructureRepairer, repairStructure, normalizeLineEndings, findParentIndent, applyIndentFix } from './healing/structure-repairer.js';
export { normalizeLexical, countLines, splitLines } from './healing/lexical-normalizer.js';
export { validateYaml, isValidYaml, canonicalize, CANONICAL_STYLE } from './healing/yaml-validator.js';
export { isProtectedStructure, isParentKey, isAnchorOrAlias, stripInlineComment } from './healing/line-predicates.js';
export { buildHealingReport, generateDiff, formatDiffUnified } from './reporting/healing-report.js';
export { WorkspaceAuditor } from './workspace/workspace-auditor.js';
export { createBackupPath, writeAtomically } from './workspace/backup.js';
export { NodeFileSystem, decodeUtf8 } from './workspace/adapters/node-fs.js';
export { loadConfig, HealerConfigSchema, INDENT_UNIT, MAX_REPAIR_ATTEMPTS } from './config/index.js';
export { createLogger } from './utils/logger.js';
export { HealerError, MalformedEncodingError, ConfigValidationError, AtomicWriteError } from './utils/errors.js';

export type { HealingResult, ManifestSource, BatchSummary, PipelineOptions, InputType } from './pipeline/healing-pipeline.js';
export type {
    HealingStatus,
    RepairStatus,
    DocumentStatus,
    ParseFailure,
    RepairAttempt,
    DocumentRepair,
    RepairOutcome,
    LineFix
} from './healing/types.js';
export type { HealingReport, LineChange, DiffView } from './reporting/healing-report.js';
export type { AuditReport, AuditStatus, WorkspaceSummary } from './workspace/workspace-auditor.js';
export type { FileSystem, FileStat } from './workspace/ports/filesystem.js';
export type { HealerConfig } from './config/index.js';
