/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface ReportConfig {
    // Input
    categories: string[];
    nbDays: number;
    includeUpdates: boolean;

    // Output
    out: string;

    // Result caps
    /** Expected ceiling on papers per day; caps the request at `maxPapersPerDay × nbDays` */
    maxPapersPerDay: number;
    /** Hard limit the arXiv API puts on a single query */
    serviceMaxResults: number;

    // arXiv client
    pageSize: number;
    delaySeconds: number;
    timeoutMs: number;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Omit<ReportConfig, 'out'> = {
    categories: ['cs.CL'],
    nbDays: 7,
    includeUpdates: false,
    maxPapersPerDay: 200,
    serviceMaxResults: 300000,
    pageSize: 100,
    delaySeconds: 3,
    timeoutMs: 30000,
    logLevel: 'info',
    jsonLogs: false,
};
