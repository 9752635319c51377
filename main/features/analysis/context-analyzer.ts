/**
 * Context Analyzer - Identifies who posted a screenshot's content and summarizes it
 *
 * Analysis runs through an ordered list of strategies; the first one that
 * yields a well-formed context wins. The last tier is a fixed placeholder, so
 * `analyze()` always resolves with a usable PageContext and never rejects.
 */

import { completePrompt, type LLMFailure, type LLMProvider } from '../../llm/providers';
import { isRecord, safeParseJSON } from '../../utils/json';
import { logger } from '../../utils/logger';
import { buildPrimaryPrompt, buildSimplifiedPrompt } from './prompts';
import { ensureSummaryPrefix, limitSentences, toPdfSafeText } from './sanitize';

const log = logger.child('ContextAnalyzer');

// --- Types ---

export interface PageContext {
    sourceLabel: string;
    /** At most three sentences */
    summary: string;
}

export type AnalysisTier = 'primary' | 'simplified' | 'fallback';

export type AnalysisFailure = LLMFailure | 'unparseable' | 'no-text';

export interface AnalysisOutcome {
    context: PageContext;
    tier: AnalysisTier;
    /** Failures of the tiers tried before the one that succeeded */
    failures: { tier: AnalysisTier; failure: AnalysisFailure; detail?: string }[];
}

export type StrategyResult =
    | { ok: true; context: PageContext }
    | { ok: false; failure: AnalysisFailure; detail?: string };

export interface AnalysisStrategy {
    tier: AnalysisTier;
    attempt(text: string): Promise<StrategyResult>;
}

export const UNKNOWN_SOURCE = 'Unknown Source';
export const UNAVAILABLE_SUMMARY = 'This post is not available because its content could not be analyzed.';
export const MAX_SUMMARY_SENTENCES = 3;
export const MAX_SOURCE_LABEL_LENGTH = 80;

export const FALLBACK_CONTEXT: PageContext = Object.freeze({
    sourceLabel: UNKNOWN_SOURCE,
    summary: UNAVAILABLE_SUMMARY
});

// --- Response parsing ---

const SOURCE_LINE_REGEX = /^\s*\**\s*(?:source|page(?:_name)?)\s*\**\s*:\s*(.+)$/im;
const SUMMARY_LINE_REGEX = /^\s*\**\s*summary\s*\**\s*:\s*([\s\S]+)$/im;

function firstString(record: Record<string, unknown>, keys: string[]): string | undefined {
    for (const key of keys) {
        const value = record[key];
        if (typeof value === 'string') return value;
    }
    return undefined;
}

/**
 * Parses a model answer into its raw (unsanitized) two parts: either a JSON
 * object with `page_name` and `summary`, or `SOURCE:` / `SUMMARY:` lines.
 */
export function parseContextResponse(raw: string): PageContext | null {
    const parsed = safeParseJSON(raw);
    if (isRecord(parsed)) {
        const summary = firstString(parsed, ['summary']);
        if (summary !== undefined && summary.trim()) {
            // A null or missing poster still leaves a usable summary
            return { sourceLabel: firstString(parsed, ['page_name', 'pageName', 'source']) ?? '', summary };
        }
    }

    const source = SOURCE_LINE_REGEX.exec(raw);
    const summary = SUMMARY_LINE_REGEX.exec(raw);
    if (source && summary && summary[1].trim()) {
        return { sourceLabel: source[1], summary: summary[1] };
    }

    return null;
}

/**
 * Brings a parsed context into the shape the report can render.
 */
export function normalizeContext(context: PageContext): PageContext {
    let sourceLabel = toPdfSafeText(context.sourceLabel)
        .replace(/\s*\n\s*/g, ' ')
        .replace(/^["']|["']$/g, '')
        .trim();
    if (!sourceLabel || /^unknown$/i.test(sourceLabel)) {
        sourceLabel = UNKNOWN_SOURCE;
    }
    if (sourceLabel.length > MAX_SOURCE_LABEL_LENGTH) {
        sourceLabel = `${sourceLabel.slice(0, MAX_SOURCE_LABEL_LENGTH - 3).trimEnd()}...`;
    }

    const flatSummary = toPdfSafeText(context.summary).replace(/\s*\n\s*/g, ' ');
    const summary = limitSentences(ensureSummaryPrefix(flatSummary), MAX_SUMMARY_SENTENCES);

    return { sourceLabel, summary };
}

// --- Strategies ---

export function promptStrategy(tier: AnalysisTier, provider: LLMProvider, buildPrompt: (text: string) => string): AnalysisStrategy {
    return {
        tier,
        async attempt(text: string): Promise<StrategyResult> {
            const result = await completePrompt(provider, buildPrompt(text));
            if (!result.ok) {
                return { ok: false, failure: result.failure, detail: result.detail };
            }

            const context = parseContextResponse(result.text);
            if (!context) {
                return { ok: false, failure: 'unparseable', detail: result.text.slice(0, 200) };
            }
            return { ok: true, context: normalizeContext(context) };
        }
    };
}

export function defaultStrategies(provider: LLMProvider): AnalysisStrategy[] {
    return [
        promptStrategy('primary', provider, buildPrimaryPrompt),
        promptStrategy('simplified', provider, buildSimplifiedPrompt)
    ];
}

// --- Analyzer ---

export class ContextAnalyzer {
    private readonly strategies: AnalysisStrategy[];

    constructor(providerOrStrategies: LLMProvider | AnalysisStrategy[]) {
        this.strategies = Array.isArray(providerOrStrategies)
            ? providerOrStrategies
            : defaultStrategies(providerOrStrategies);
    }

    async analyze(text: string): Promise<AnalysisOutcome> {
        const failures: AnalysisOutcome['failures'] = [];

        if (!text.trim()) {
            failures.push({ tier: 'primary', failure: 'no-text' });
            return { context: { ...FALLBACK_CONTEXT }, tier: 'fallback', failures };
        }

        for (const strategy of this.strategies) {
            let result: StrategyResult;
            try {
                result = await strategy.attempt(text);
            } catch (err) {
                result = { ok: false, failure: 'unreachable', detail: err instanceof Error ? err.message : String(err) };
            }

            if (result.ok) {
                return { context: result.context, tier: strategy.tier, failures };
            }

            log.warn(`${strategy.tier} analysis failed (${result.failure})${result.detail ? `: ${result.detail}` : ''}`);
            failures.push({ tier: strategy.tier, failure: result.failure, detail: result.detail });
        }

        return { context: { ...FALLBACK_CONTEXT }, tier: 'fallback', failures };
    }
}
