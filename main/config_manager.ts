import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';

// --- Types ---

export type LLMProviderKind = 'ollama' | 'openai';
export type ReportMode = 'single' | 'per-date';

export interface LLMSettings {
    provider: LLMProviderKind;
    model: string;
    baseUrl: string;
    /** Env var holding the API key (OpenAI-compatible endpoints only) */
    apiKeyEnv?: string;
    /** Request timeout in ms */
    timeoutMs: number;
    temperature: number;
}

export interface OCRSettings {
    /** Tesseract language code(s), e.g. 'eng' or 'eng+fil' */
    language: string;
    /** Hard per-image timeout in ms */
    timeoutMs: number;
    /** Folder of gzipped `.traineddata` files; defaults to the bundled English model */
    langPath?: string;
}

export interface NoiseRuleConfig {
    name: string;
    pattern: string;
    flags?: string;
    replacement?: string;
}

export interface ReportConfig {
    /** Identity string used as the report filename prefix */
    identity: string;
    inputDir: string;
    outputDir: string;
    imagesPerPage: number;
    reportMode: ReportMode;
    /** date-fns format pattern for dates in report filenames */
    dateFormat: string;
    llm: LLMSettings;
    ocr: OCRSettings;
    /** Replaces the built-in noise rules when present */
    noiseRules?: NoiseRuleConfig[];
    logLevel: 'debug' | 'info' | 'warn' | 'error' | 'none';
}

export const CONFIG_FILENAME = 'report_config.json';

export const DEFAULT_CONFIG: ReportConfig = {
    identity: 'Screenshots',
    inputDir: 'screenshots',
    outputDir: '.',
    imagesPerPage: 3,
    reportMode: 'single',
    dateFormat: 'MMMM dd',
    llm: {
        provider: 'ollama',
        model: 'mistral:latest',
        baseUrl: 'http://localhost:11434',
        timeoutMs: 60000,
        temperature: 0.2
    },
    ocr: {
        language: 'eng',
        timeoutMs: 15000
    },
    logLevel: 'info'
};

// --- Validation Schemas ---

const LLMSettingsSchema = z.object({
    provider: z.enum(['ollama', 'openai']),
    model: z.string().min(1),
    baseUrl: z.string().url(),
    apiKeyEnv: z.string().optional(),
    timeoutMs: z.number().int().positive(),
    temperature: z.number().min(0).max(2)
});

const OCRSettingsSchema = z.object({
    language: z.string().min(1),
    timeoutMs: z.number().int().positive(),
    langPath: z.string().min(1).optional()
});

const NoiseRuleSchema = z.object({
    name: z.string().min(1),
    pattern: z.string().min(1),
    flags: z.string().optional(),
    replacement: z.string().optional()
});

const ReportConfigSchema = z.object({
    identity: z.string().min(1),
    inputDir: z.string().min(1),
    outputDir: z.string().min(1),
    imagesPerPage: z.number().int().min(1),
    reportMode: z.enum(['single', 'per-date']),
    dateFormat: z.string().min(1),
    llm: LLMSettingsSchema,
    ocr: OCRSettingsSchema,
    noiseRules: z.array(NoiseRuleSchema).optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'none'])
});

// Config files may specify any subset; missing keys come from defaults
const PartialConfigSchema = ReportConfigSchema.extend({
    llm: LLMSettingsSchema.partial(),
    ocr: OCRSettingsSchema.partial()
}).partial();

export type PartialReportConfig = z.infer<typeof PartialConfigSchema>;

function formatIssues(error: z.ZodError): string {
    return error.issues.map(iss => `${iss.path.join('.')}: ${iss.message}`).join('; ');
}

/**
 * Validates raw config file content. Returns the partial config it describes.
 */
export function validateReportConfig(content: string): { success: boolean, error?: string, data?: PartialReportConfig } {
    let json: unknown;
    try {
        json = JSON.parse(content);
    } catch (e) {
        const detail = e instanceof Error ? e.message : String(e);
        return { success: false, error: `Unexpected token: ${detail}` };
    }

    const result = PartialConfigSchema.safeParse(json);
    if (!result.success) {
        return { success: false, error: formatIssues(result.error) };
    }

    for (const rule of result.data.noiseRules ?? []) {
        try {
            new RegExp(rule.pattern, rule.flags);
        } catch {
            return { success: false, error: `noiseRules.${rule.name}: invalid pattern` };
        }
    }

    return { success: true, data: result.data };
}

export function mergeConfig(base: ReportConfig, override: PartialReportConfig): ReportConfig {
    return {
        ...base,
        ...override,
        llm: { ...base.llm, ...override.llm },
        ocr: { ...base.ocr, ...override.ocr }
    };
}

function readConfigFile(explicitPath?: string): PartialReportConfig {
    const candidate = explicitPath ?? path.join(process.cwd(), CONFIG_FILENAME);

    if (!fs.existsSync(candidate)) {
        if (explicitPath) {
            throw new ConfigError(`Config file not found: ${explicitPath}`);
        }
        return {};
    }

    const validation = validateReportConfig(fs.readFileSync(candidate, 'utf-8'));
    if (!validation.success || !validation.data) {
        throw new ConfigError(`Invalid config ${candidate}: ${validation.error}`);
    }
    return validation.data;
}

function parseInteger(value: string | undefined): number | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
}

/**
 * Maps DIGEST_* environment variables onto a partial config.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): PartialReportConfig {
    const partial: Record<string, unknown> = {};
    const llm: Record<string, unknown> = {};

    if (env.DIGEST_IDENTITY) partial.identity = env.DIGEST_IDENTITY;
    if (env.DIGEST_INPUT_DIR) partial.inputDir = env.DIGEST_INPUT_DIR;
    if (env.DIGEST_OUTPUT_DIR) partial.outputDir = env.DIGEST_OUTPUT_DIR;
    const perPage = parseInteger(env.DIGEST_IMAGES_PER_PAGE);
    if (perPage !== undefined) partial.imagesPerPage = perPage;
    if (env.DIGEST_LOG_LEVEL) partial.logLevel = env.DIGEST_LOG_LEVEL.toLowerCase();

    if (env.DIGEST_LLM_MODEL) llm.model = env.DIGEST_LLM_MODEL;
    if (env.DIGEST_LLM_BASE_URL) llm.baseUrl = env.DIGEST_LLM_BASE_URL;
    if (env.DIGEST_LLM_PROVIDER) llm.provider = env.DIGEST_LLM_PROVIDER.toLowerCase();
    if (Object.keys(llm).length > 0) partial.llm = llm;

    const result = PartialConfigSchema.safeParse(partial);
    if (!result.success) {
        throw new ConfigError(`Invalid environment configuration: ${formatIssues(result.error)}`);
    }
    return result.data;
}

export interface LoadConfigOptions {
    configPath?: string;
    env?: NodeJS.ProcessEnv;
    overrides?: PartialReportConfig;
}

/**
 * Resolves the run configuration: defaults, then config file, then env, then CLI overrides.
 */
export function loadReportConfig(options: LoadConfigOptions = {}): ReportConfig {
    let config = mergeConfig(DEFAULT_CONFIG, readConfigFile(options.configPath));
    config = mergeConfig(config, configFromEnv(options.env ?? process.env));
    if (options.overrides) {
        config = mergeConfig(config, options.overrides);
    }

    const result = ReportConfigSchema.safeParse(config);
    if (!result.success) {
        throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
    }
    return result.data;
}
