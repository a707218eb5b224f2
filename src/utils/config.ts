import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type LogLevel, type ReportConfig } from '../types/index.js';
import { getLogger } from './logger.js';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/** Counts and sizes: positive integers */
const INTEGER_KEYS = [
    'nbDays',
    'maxPapersPerDay',
    'serviceMaxResults',
    'pageSize',
] as const;

/** Durations: positive numbers */
const DURATION_KEYS = [
    'delaySeconds',
    'timeoutMs',
] as const;

function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Keep the recognised, well-typed keys of a parsed config file.
 * Unknown keys are dropped; numbers that are not positive (or not whole, for
 * counts and sizes) are dropped with a warning.
 */
export function pickConfig(raw: unknown): Partial<ReportConfig> {
    const picked: Partial<ReportConfig> = {};
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        return picked;
    }

    const entries = new Map<string, unknown>(Object.entries(raw));

    for (const key of INTEGER_KEYS) {
        const value = entries.get(key);
        if (value === undefined) continue;
        if (typeof value === 'number' && Number.isInteger(value) && value > 0) {
            picked[key] = value;
        } else {
            getLogger().warn({ key, value }, 'Ignoring config value, expected a positive integer');
        }
    }

    for (const key of DURATION_KEYS) {
        const value = entries.get(key);
        if (value === undefined) continue;
        if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
            picked[key] = value;
        } else {
            getLogger().warn({ key, value }, 'Ignoring config value, expected a positive number');
        }
    }

    const categories = entries.get('categories');
    if (Array.isArray(categories) && categories.every((c): c is string => typeof c === 'string')) {
        picked.categories = categories;
    }

    const includeUpdates = entries.get('includeUpdates');
    if (typeof includeUpdates === 'boolean') picked.includeUpdates = includeUpdates;

    const jsonLogs = entries.get('jsonLogs');
    if (typeof jsonLogs === 'boolean') picked.jsonLogs = jsonLogs;

    const logLevel = entries.get('logLevel');
    if (isLogLevel(logLevel)) picked.logLevel = logLevel;

    return picked;
}

/**
 * Load configuration from arxivdigest.config.json using cosmiconfig.
 * Returns null if no config file is found (which is fine — defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<ReportConfig> | null> {
    const explorer = cosmiconfig('arxivdigest', {
        searchPlaces: ['arxivdigest.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return pickConfig(result.config);
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): Partial<ReportConfig> {
    const config: Partial<ReportConfig> = {};

    const perDay = env['ARXIV_DIGEST_MAX_PAPERS_PER_DAY'];
    if (perDay) {
        const parsed = parseInt(perDay, 10);
        if (!isNaN(parsed) && parsed > 0) {
            config.maxPapersPerDay = parsed;
        }
    }

    const logLevel = env['ARXIV_DIGEST_LOG_LEVEL'];
    if (isLogLevel(logLevel)) {
        config.logLevel = logLevel;
    }

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<ReportConfig> & { out: string },
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<ReportConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
    };
}
