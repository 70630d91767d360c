import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config/index.js';
import { ConfigValidationError } from '../src/utils/errors.js';

describe('Configuration', () => {
    it('should fall back to defaults', () => {
        expect(loadConfig({}, {})).toEqual({ maxSizeMb: 10, timeoutS: 30, logLevel: 'warn' });
    });

    it('should read and coerce environment variables', () => {
        const config = loadConfig({}, {
            HEALER_MAX_SIZE_MB: '5',
            HEALER_TIMEOUT_S: '2.5',
            HEALER_LOG_LEVEL: 'debug'
        });

        expect(config).toEqual({ maxSizeMb: 5, timeoutS: 2.5, logLevel: 'debug' });
    });

    it('should let explicit overrides win', () => {
        const config = loadConfig({ maxSizeMb: 1, timeoutS: undefined }, { HEALER_MAX_SIZE_MB: '5', HEALER_TIMEOUT_S: '7' });

        expect(config.maxSizeMb).toBe(1);
        expect(config.timeoutS).toBe(7);
    });

    it('should reject a non-positive size limit', () => {
        expect(() => loadConfig({ maxSizeMb: -1 }, {})).toThrow(ConfigValidationError);
        expect(() => loadConfig({ maxSizeMb: -1 }, {})).toThrow('Invalid healer configuration: maxSizeMb:');
    });

    it('should reject unknown log levels and non-numeric values', () => {
        try {
            loadConfig({}, { HEALER_LOG_LEVEL: 'loud', HEALER_TIMEOUT_S: 'soon' });
            expect.unreachable('loadConfig should have thrown');
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigValidationError);
            if (error instanceof ConfigValidationError) {
                expect(error.code).toBe('INVALID_CONFIG');
                expect(error.issues.map(issue => issue.split(':')[0]).sort()).toEqual(['logLevel', 'timeoutS']);
            }
        }
    });
});
