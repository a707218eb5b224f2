import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger } from '../utils/logger.js';
import { createHttpClient, delayRateLimit } from '../utils/http-client.js';
import { ArxivSource } from '../sources/arxiv.js';
import { generateReport } from '../report/generator.js';
import { DEFAULT_CONFIG, type LogLevel, type ReportConfig } from '../types/index.js';

const VERSION = '1.0.0';

interface CliOptions {
    categories?: string[];
    nb_days?: number;
    include_updates?: boolean;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
}

function parseLogLevel(value: string): LogLevel {
    switch (value) {
        case 'error':
        case 'warn':
        case 'info':
        case 'debug':
            return value;
        default:
            throw new InvalidArgumentError('Expected one of: debug | info | warn | error.');
    }
}

const program = new Command();

program
    .name('arxiv-digest')
    .description('Write a report of the latest arXiv papers in the given categories.')
    .version(VERSION)
    .argument('<path_output>', 'Report file to create (must not exist)')
    .option(
        '-c, --categories <categories...>',
        `space-separated arXiv categories to query (e.g. cs.CL, cs.IR, cs.LG) (default: ${DEFAULT_CONFIG.categories.join(' ')})`
    )
    .option('-n, --nb_days <n>', `Nb of days to go back to (default: ${DEFAULT_CONFIG.nbDays})`, parseInteger)
    .option(
        '-i, --include_updates',
        'Include papers that were updated (but not originally submitted) in this period'
    )
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (pathOutput: string, opts: CliOptions) => {
        const cliConfig: Partial<ReportConfig> & { out: string } = { out: pathOutput };
        if (opts.categories) cliConfig.categories = opts.categories;
        if (opts.nb_days !== undefined) cliConfig.nbDays = opts.nb_days;
        if (opts.include_updates) cliConfig.includeUpdates = true;
        if (opts.logLevel) cliConfig.logLevel = opts.logLevel;
        if (opts.jsonLogs) cliConfig.jsonLogs = true;

        const config = await resolveConfig(cliConfig);
        const logger = initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

        logger.debug({ categories: config.categories, nbDays: config.nbDays }, 'Starting report');

        try {
            const httpClient = createHttpClient({
                timeout: config.timeoutMs,
                version: VERSION,
                rateLimits: { arxiv: delayRateLimit(config.delaySeconds) },
            });
            const source = new ArxivSource({ httpClient, pageSize: config.pageSize });

            await generateReport(config, { source, logger });
        } catch (error) {
            logger.error({ err: error }, 'Report failed');
            process.exitCode = 1;
        }
    });

await program.parseAsync();
