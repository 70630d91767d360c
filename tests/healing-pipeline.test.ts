import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as yaml from 'js-yaml';
import { HealingPipeline, healManifestText } from '../src/pipeline/healing-pipeline.js';
import { StructureRepairer } from '../src/healing/structure-repairer.js';
import { InMemoryFileSystem } from '../src/workspace/adapters/in-memory-fs.js';
import { createLogger } from '../src/utils/logger.js';

const silent = createLogger({ level: 'silent' });

const OVER_INDENTED = 'spec:\n  containers:\n  - name: a\n      image: x\n';

const UNFIXABLE = [
    'spec:',
    '  containers:',
    '  - name: a',
    '      image: x',
    '      ports: y',
    '      tag: z',
    '      pull: w'
].join('\n');

describe('HealingPipeline', () => {
    let fs: InMemoryFileSystem;
    let pipeline: HealingPipeline;

    beforeEach(() => {
        fs = new InMemoryFileSystem();
        pipeline = new HealingPipeline({ fileSystem: fs, logger: silent });
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    // ==========================================
    // STRUCTURAL HEALING
    // ==========================================

    describe('Structural Healing', () => {
        it('should fix a mis-indented container list in one attempt', () => {
            const result = pipeline.healContent(OVER_INDENTED);

            expect(result.status).toBe('STRUCTURE_FIXED_1');
            expect(result.success).toBe(true);
            expect(result.partialHeal).toBe(false);
            expect(result.phase1Complete).toBe(true);
            expect(result.inputType).toBe('string');
            expect(result.inputSizeBytes).toBe(47);
            expect(result.content).toBe('spec:\n  containers:\n    - name: a\n      image: x');

            expect(result.report.totalLines).toBe(4);
            expect(result.report.linesChanged).toBe(1);
            expect(result.report.changes).toEqual([
                { line: 3, original: '  - name: a', fixed: '    - name: a', indentOriginal: 2, indentFixed: 4 }
            ]);
            expect(result.report.error).toBeUndefined();
        });

        it('should pass valid CRLF manifests through with LF endings', () => {
            const result = pipeline.healContent('apiVersion: v1\r\nkind: Pod\r\n');

            expect(result.status).toBe('STRUCTURE_OK');
            expect(result.content).toBe('apiVersion: v1\nkind: Pod');
            expect(result.report.linesChanged).toBe(0);
            expect(result.report.totalLines).toBe(2);
        });

        it('should handle multi-document streams', () => {
            const result = pipeline.healContent('---\na: 1\n---\nb: 2\n');

            expect(result.status).toBe('MULTI_DOC_HANDLED');
            expect(result.success).toBe(true);
            expect(result.content).toBe('a: 1\n---\nb: 2');
        });

        it('should leave documents alone when the fix target is protected', () => {
            const input = 'key: value\n  &anchor other: 1';
            const result = pipeline.healContent(input);

            expect(result.status).toBe('STRUCTURE_PROTECTED_SKIP');
            expect(result.success).toBe(false);
            expect(result.partialHeal).toBe(false);
            expect(result.content).toBe(input);
        });

        it('should leave an anchor line whose body parses as a scalar unchanged', () => {
            const input = '&anchor:\n    bad indent';
            const result = pipeline.healContent(input);

            expect(result.status).toBe('STRUCTURE_OK');
            expect(result.content).toBe(input);
            expect(result.report.linesChanged).toBe(0);
        });

        it('should expand tab indentation before repair', () => {
            const result = pipeline.healContent('spec:\n\treplicas: 3\n');

            expect(result.status).toBe('STRUCTURE_OK');
            expect(result.content).toBe('spec:\n  replicas: 3');
        });
    });

    // ==========================================
    // CANONICAL OUTPUT
    // ==========================================

    describe('Canonical Output', () => {
        const DEPLOYMENT = [
            'apiVersion: apps/v1',
            'kind: Deployment',
            'metadata:',
            '  name: web',
            '  labels:',
            '    app: "web"',
            '    # team owning the rollout',
            "    team: 'platform'",
            'spec:',
            '  replicas: 3 # scaled by the autoscaler',
            '  template:',
            '    spec:',
            '      containers:',
            '        - name: app',
            '          image: nginx',
            '          resources: &limits',
            '            cpu: 500m',
            '            memory: 128Mi',
            '        - name: sidecar',
            '          image: envoy',
            '          resources: *limits',
            '          args:',
            '            - |',
            '              echo start',
            '              exec envoy',
            ''
        ].join('\n');

        it('should return a canonical manifest unchanged', () => {
            const result = pipeline.healContent(DEPLOYMENT);

            expect(result.status).toBe('STRUCTURE_OK');
            expect(result.content).toBe(DEPLOYMENT.trimEnd());
            expect(result.report.linesChanged).toBe(0);
        });

        it('should keep anchors, comments and quotes while fixing indentation', () => {
            const input = [
                'defaults: &defaults',
                '  cpu: 1 # per replica',
                'worker:',
                '  <<: *defaults',
                '     memory: "2Gi"'
            ].join('\n');
            const result = pipeline.healContent(input);

            expect(result.status).toBe('STRUCTURE_FIXED_1');
            expect(result.content).toBe([
                'defaults: &defaults',
                '  cpu: 1 # per replica',
                'worker:',
                '  <<: *defaults',
                '  memory: "2Gi"'
            ].join('\n'));
        });
    });

    // ==========================================
    // CLASSIFICATION
    // ==========================================

    describe('Classification', () => {
        it('should flag improved but still invalid output as a partial heal', () => {
            const result = pipeline.healContent(UNFIXABLE);

            expect(result.status).toBe('STRUCTURE_FAIL');
            expect(result.success).toBe(false);
            expect(result.partialHeal).toBe(true);
            expect(result.report.error).toContain('bad indentation of a mapping entry');
        });

        it('should not call an unchanged failure a partial heal', () => {
            const result = pipeline.healContent('a: 1\n---\nb: 2');

            expect(result.status).toBe('STRUCTURE_FAIL');
            expect(result.partialHeal).toBe(false);
            expect(result.report.error).toBe('expected a single document in the stream, but found more');
        });

        it('should never mark a result both successful and partial', () => {
            const inputs = [OVER_INDENTED, UNFIXABLE, 'a: 1', '', 'key: value\n  &anchor other: 1'];
            for (const input of inputs) {
                const result = pipeline.healContent(input);
                expect(result.success && result.partialHeal).toBe(false);
            }
        });

        it('should return loadable content for every success', () => {
            const inputs = [OVER_INDENTED, 'a: 1\r\n', '---\na: 1\n---\nb:\n  - x\n', 'items:\n- a\n- b'];
            for (const input of inputs) {
                const result = pipeline.healContent(input);
                expect(result.success).toBe(true);
                expect(() => yaml.loadAll(result.content)).not.toThrow();
            }
        });
    });

    // ==========================================
    // GUARDS
    // ==========================================

    describe('Guards', () => {
        it('should reject whitespace-only input', () => {
            const result = pipeline.healContent('  \n \t\n');

            expect(result.status).toBe('EMPTY_INPUT');
            expect(result.content).toBe('');
            expect(result.inputSizeBytes).toBe(6);
            expect(result.phase1Complete).toBe(false);
        });

        it('should reject oversized input without running repair', () => {
            const repair = vi.spyOn(StructureRepairer.prototype, 'repair');
            const result = pipeline.healContent('a'.repeat(12 * 1024 * 1024));

            expect(result.status).toBe('FILE_TOO_LARGE');
            expect(result.content).toHaveLength(1000);
            expect(result.inputSizeBytes).toBe(12582912);
            expect(result.report.error).toBe('File exceeds 10MB limit (12.0MB)');
            expect(repair).not.toHaveBeenCalled();
        });

        it('should honour a custom size limit', () => {
            const small = new HealingPipeline({ maxSizeMb: 0.001, fileSystem: fs, logger: silent });
            const result = small.healContent(`note: ${'x'.repeat(2000)}`);

            expect(result.status).toBe('FILE_TOO_LARGE');
            expect(result.report.error).toBe('File exceeds 0.001MB limit (0.0MB)');
        });

        it('should report missing input', async () => {
            const result = await pipeline.healManifest({});

            expect(result.status).toBe('MISSING_INPUT');
            expect(result.success).toBe(false);
            expect(result.report.error).toBe('No content or file provided');
        });

        it('should report null content as missing', () => {
            expect(pipeline.healContent(null).status).toBe('MISSING_INPUT');
        });
    });

    // ==========================================
    // FILE INPUT
    // ==========================================

    describe('File Input', () => {
        it('should read files and strip a byte order mark', async () => {
            fs.setFile('/ws/a.yaml', '\uFEFFa: 1\n');
            const result = await pipeline.healManifest({ filePath: '/ws/a.yaml' });

            expect(result.status).toBe('STRUCTURE_OK');
            expect(result.content).toBe('a: 1');
            expect(result.inputType).toBe('file');
            expect(result.inputSizeBytes).toBe(5);
            expect(result.report.filePath).toBe('/ws/a.yaml');
        });

        it('should prefer the file when both sources are given', async () => {
            fs.setFile('/ws/b.yaml', 'from: file\n');
            const result = await pipeline.healManifest({ content: 'from: text', filePath: '/ws/b.yaml' });

            expect(result.content).toBe('from: file');
        });

        it('should report unreadable files', async () => {
            const result = await pipeline.healManifest({ filePath: '/ws/missing.yaml' });

            expect(result.status).toBe('FILE_READ_ERROR');
            expect(result.content).toBe('');
            expect(result.report.error).toContain('ENOENT');
            expect(result.report.filePath).toBe('/ws/missing.yaml');
        });

        it('should heal files in order', async () => {
            fs.setFile('/ws/1.yaml', 'a: 1\n');
            fs.setFile('/ws/2.yaml', OVER_INDENTED);
            const results = await pipeline.healFiles(['/ws/1.yaml', '/ws/2.yaml', '/ws/3.yaml']);

            expect(results.map(r => r.status)).toEqual(['STRUCTURE_OK', 'STRUCTURE_FIXED_1', 'FILE_READ_ERROR']);
        });
    });

    // ==========================================
    // FAULTS
    // ==========================================

    describe('Faults', () => {
        it('should turn unpaired surrogates into PIPELINE_ERROR', () => {
            const input = 'name: \uD800';
            const result = pipeline.healContent(input);

            expect(result.status).toBe('PIPELINE_ERROR');
            expect(result.content).toBe(input);
            expect(result.success).toBe(false);
            expect(result.report.error).toBe('Malformed encoding on line 1: unpaired UTF-16 surrogate');
        });

        it('should heal text that contains a replacement character', () => {
            const result = pipeline.healContent('note: "\uFFFD marker"\n');

            expect(result.status).toBe('STRUCTURE_OK');
            expect(result.content).toBe('note: "\uFFFD marker"');
        });

        it('should truncate fault messages', () => {
            vi.spyOn(StructureRepairer.prototype, 'repair').mockImplementation(() => {
                throw new Error('x'.repeat(150));
            });
            const result = pipeline.healContent('a: 1');

            expect(result.status).toBe('PIPELINE_ERROR');
            expect(result.report.error).toBe('x'.repeat(100));
        });
    });

    // ==========================================
    // BATCH
    // ==========================================

    describe('Batch', () => {
        it('should drop blank entries', () => {
            const results = pipeline.healManifests(['a: 1', '', '   ', null, OVER_INDENTED]);
            expect(results).toHaveLength(2);
        });

        it('should summarize success and partial heals', () => {
            const results = pipeline.healManifests(['a: 1', OVER_INDENTED, UNFIXABLE, 'a: 1\n---\nb: 2']);
            expect(pipeline.batchSuccessRate(results)).toEqual({
                successRate: 0.5,
                total: 4,
                successful: 2,
                partialHeal: 1,
                failed: 1
            });
        });

        it('should summarize an empty batch as zero', () => {
            expect(pipeline.batchSuccessRate([])).toEqual({
                successRate: 0, total: 0, successful: 0, partialHeal: 0, failed: 0
            });
        });

        it('should treat only successes as apply-ready', () => {
            expect(pipeline.isApplyReady(pipeline.healContent(OVER_INDENTED))).toBe(true);
            expect(pipeline.isApplyReady(pipeline.healContent(UNFIXABLE))).toBe(false);
        });
    });
});

describe('healManifestText', () => {
    it('should heal with default options', () => {
        const result = healManifestText('items:\n- a\n- b', { logger: silent });
        expect(result.content).toBe('items:\n  - a\n  - b');
    });
});
