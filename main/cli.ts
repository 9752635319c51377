import { parseArgs } from 'util';
import { loadReportConfig, type PartialReportConfig } from './config_manager';
import { ConfigError, ReportIOError } from './errors';
import { createReportService } from './features/report/report.service';
import type { RunSummary } from './features/report/types';
import { logger, parseLogLevel } from './utils/logger';

const USAGE = `Usage: screenshot-digest [options]

  --config <file>      Config file (default: ./report_config.json if present)
  --input <dir>        Folder of Screenshot_YYYY-MM-DD-HH-MM-SS-xxx images
  --output <dir>       Folder to write reports to
  --identity <name>    Name used as the report filename prefix
  --per-page <n>       Images per page (default 3)
  --model <id>         LLM model identifier (default mistral:latest)
  --per-date           Write one report per date instead of one per run
  -h, --help           Show this help`;

export function parseCliArgs(argv: string[]): { configPath?: string; overrides: PartialReportConfig; help: boolean } {
    const { values } = parseArgs({
        args: argv,
        options: {
            config: { type: 'string' },
            input: { type: 'string' },
            output: { type: 'string' },
            identity: { type: 'string' },
            'per-page': { type: 'string' },
            model: { type: 'string' },
            'per-date': { type: 'boolean' },
            help: { type: 'boolean', short: 'h' }
        },
        strict: true
    });

    const overrides: PartialReportConfig = {};
    if (values.input) overrides.inputDir = values.input;
    if (values.output) overrides.outputDir = values.output;
    if (values.identity) overrides.identity = values.identity;
    if (values['per-page'] !== undefined) overrides.imagesPerPage = Number(values['per-page']);
    if (values.model) overrides.llm = { model: values.model };
    if (values['per-date']) overrides.reportMode = 'per-date';

    return { configPath: values.config, overrides, help: values.help ?? false };
}

export function formatRunSummary(summary: RunSummary): string {
    const lines = [
        `Processed ${summary.totalImages} screenshot(s)`,
        `  skipped (unrecognized names): ${summary.skippedFiles.length}`,
        `  OCR fallbacks: ${summary.extractionFallbacks}`,
        `  analysis fallbacks: ${summary.analysisFallbacks}`,
        `  layout fallbacks: ${summary.layoutFallbacks}`,
        ...summary.reports.map(r => `Report: ${r}`)
    ];
    return lines.join('\n');
}

export async function main(argv: string[]): Promise<number> {
    let cli: ReturnType<typeof parseCliArgs>;
    try {
        cli = parseCliArgs(argv);
    } catch (err) {
        console.error(`[ERROR] ${err instanceof Error ? err.message : String(err)}`);
        console.error(USAGE);
        return 2;
    }

    if (cli.help) {
        console.log(USAGE);
        return 0;
    }

    try {
        const config = loadReportConfig({ configPath: cli.configPath, overrides: cli.overrides });
        logger.setLevel(parseLogLevel(config.logLevel) ?? logger.getLevel());

        const summary = await createReportService(config).generate(config);
        console.log(formatRunSummary(summary));
        return 0;
    } catch (err) {
        if (err instanceof ReportIOError || err instanceof ConfigError) {
            console.error(`[ERROR] ${err.message}`);
            return 1;
        }
        throw err;
    }
}
