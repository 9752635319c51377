/**
 * Noise Filter - Strips social-feed UI chrome from raw OCR text
 *
 * Screenshots of Facebook posts carry a lot of text that says nothing about
 * the post itself: relative timestamps, action bars, "Sponsored" labels and
 * reaction/comment counters. The rules below remove it before the text is
 * sent to the language model.
 *
 * Rules are plain data so the list can be replaced from configuration.
 */

import type { NoiseRuleConfig } from '../../config_manager';

export interface NoiseRule {
    name: string;
    pattern: RegExp;
    /** Defaults to '' */
    replacement?: string;
}

export const DEFAULT_NOISE_RULES: NoiseRuleConfig[] = [
    {
        // "2h", "5 mins", "3 days ago", "Just now", "Yesterday at 3:15 PM" on a line of their own
        name: 'relative-time',
        pattern: '^\\s*(?:\\d+\\s*(?:s|m|h|d|w|y|mins?|minutes?|hrs?|hours?|days?|weeks?)(?:\\s+ago)?|just now|yesterday(?:\\s+at\\s+\\d{1,2}:\\d{2}\\s*(?:am|pm)?)?)\\s*[·•]?\\s*$',
        flags: 'gim'
    },
    {
        name: 'clock-time',
        pattern: '\\b\\d{1,2}:\\d{2}(?:\\s*[ap]m)?\\b',
        flags: 'gi'
    },
    {
        name: 'action-bar',
        pattern: '^\\s*(?:(?:like|comment|share|reply|follow|send|message)\\s*)+$',
        flags: 'gim'
    },
    {
        name: 'sponsored',
        pattern: '\\bsponsored\\b\\s*[·•]?',
        flags: 'gi'
    },
    {
        name: 'engagement-count',
        pattern: '\\b[\\d.,]+\\s*[km]?\\s+(?:comments?|shares?|reactions?|likes?|views?|replies)\\b',
        flags: 'gi'
    },
    {
        name: 'reaction-summary',
        pattern: '\\b(?:you|[a-z][\\w.]*)\\s+and\\s+[\\d.,]+\\s*[km]?\\s+others\\b',
        flags: 'gi'
    },
    {
        // A line holding nothing but a counter, e.g. "1.2K"
        name: 'bare-count',
        pattern: '^\\s*[\\d.,]+\\s*[km]?\\s*$',
        flags: 'gim'
    },
    {
        name: 'see-more',
        pattern: '\\b(?:see more|see translation|view more comments|view \\d+ more repl(?:y|ies)|write a comment\\.*)',
        flags: 'gi'
    }
];

// Lines left holding only separators after rule removal
const SEPARATOR_ONLY_LINE = /^[\s·•|\-–—]*$/;

export function compileNoiseRules(configs: readonly NoiseRuleConfig[]): NoiseRule[] {
    return configs.map(cfg => ({
        name: cfg.name,
        pattern: new RegExp(cfg.pattern, cfg.flags ?? 'g'),
        replacement: cfg.replacement
    }));
}

export class NoiseFilter {
    private rules: NoiseRule[];

    constructor(rules: NoiseRule[] = compileNoiseRules(DEFAULT_NOISE_RULES)) {
        this.rules = rules;
    }

    setRules(rules: NoiseRule[]): void {
        this.rules = rules;
    }

    getRules(): NoiseRule[] {
        return [...this.rules];
    }

    clean(raw: string): string {
        let text = raw.replace(/\r\n?/g, '\n');

        for (const rule of this.rules) {
            text = text.replace(rule.pattern, rule.replacement ?? '');
        }

        return text
            .split('\n')
            .map(line => line.replace(/[ \t]{2,}/g, ' ').trim())
            .filter(line => !SEPARATOR_ONLY_LINE.test(line))
            .join('\n');
    }
}
