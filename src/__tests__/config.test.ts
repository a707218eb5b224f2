import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadEnvVars, pickConfig, resolveConfig } from '../utils/config.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('config', () => {
    describe('pickConfig', () => {
        it('should keep recognised keys of the right type', () => {
            expect(pickConfig({
                categories: ['cs.IR', 'cs.LG'],
                maxPapersPerDay: 50,
                includeUpdates: true,
                logLevel: 'debug',
                unknown: 'dropped',
            })).toEqual({
                categories: ['cs.IR', 'cs.LG'],
                maxPapersPerDay: 50,
                includeUpdates: true,
                logLevel: 'debug',
            });
        });

        it('should drop values of the wrong type', () => {
            expect(pickConfig({ nbDays: '7', categories: [1, 2], logLevel: 'verbose' })).toEqual({});
        });

        it.each([0, -1, 10.5])('should drop count and size value %s', (value) => {
            expect(pickConfig({
                nbDays: value,
                maxPapersPerDay: value,
                serviceMaxResults: value,
                pageSize: value,
            })).toEqual({});
        });

        it.each([0, -5, Infinity])('should drop duration value %s', (value) => {
            expect(pickConfig({ delaySeconds: value, timeoutMs: value })).toEqual({});
        });

        it('should keep fractional durations', () => {
            expect(pickConfig({ delaySeconds: 0.5, timeoutMs: 1500 })).toEqual({ delaySeconds: 0.5, timeoutMs: 1500 });
        });

        it('should ignore non-object input', () => {
            expect(pickConfig(null)).toEqual({});
            expect(pickConfig([1, 2])).toEqual({});
        });
    });

    describe('loadEnvVars', () => {
        it('should read the per-day cap and log level', () => {
            expect(loadEnvVars({
                ARXIV_DIGEST_MAX_PAPERS_PER_DAY: '75',
                ARXIV_DIGEST_LOG_LEVEL: 'warn',
            })).toEqual({ maxPapersPerDay: 75, logLevel: 'warn' });
        });

        it('should ignore invalid values', () => {
            expect(loadEnvVars({
                ARXIV_DIGEST_MAX_PAPERS_PER_DAY: 'many',
                ARXIV_DIGEST_LOG_LEVEL: 'loud',
            })).toEqual({});
        });
    });

    describe('resolveConfig', () => {
        let dir: string;

        beforeEach(() => {
            dir = mkdtempSync(join(tmpdir(), 'arxiv-digest-config-'));
        });

        afterEach(() => {
            rmSync(dir, { recursive: true, force: true });
        });

        it('should fall back to defaults without a config file', async () => {
            const config = await resolveConfig({ out: 'report.md' }, { searchFrom: dir, env: {} });
            expect(config).toEqual({ ...DEFAULT_CONFIG, out: 'report.md' });
        });

        it('should apply CLI flags over env over file', async () => {
            writeFileSync(join(dir, 'arxivdigest.config.json'), JSON.stringify({
                nbDays: 14,
                maxPapersPerDay: 50,
                serviceMaxResults: 1000,
                logLevel: 'debug',
            }));

            const config = await resolveConfig(
                { out: 'report.md', nbDays: 3 },
                { searchFrom: dir, env: { ARXIV_DIGEST_MAX_PAPERS_PER_DAY: '75' } }
            );

            expect(config.nbDays).toBe(3);
            expect(config.maxPapersPerDay).toBe(75);
            expect(config.serviceMaxResults).toBe(1000);
            expect(config.logLevel).toBe('debug');
            expect(config.categories).toEqual(['cs.CL']);
            expect(config.out).toBe('report.md');
        });

        it('should keep the default cap when the file sets a zero per-day cap', async () => {
            writeFileSync(join(dir, 'arxivdigest.config.json'), JSON.stringify({ maxPapersPerDay: 0, pageSize: 0 }));

            const config = await resolveConfig({ out: 'report.md' }, { searchFrom: dir, env: {} });

            expect(config.maxPapersPerDay).toBe(200);
            expect(config.pageSize).toBe(100);
        });
    });
});
