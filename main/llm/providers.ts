import { z } from 'zod';
import type { LLMSettings } from '../config_manager';
import { logger } from '../utils/logger';

export interface LLMRequest {
    prompt: string;
}

export interface LLMProvider {
    readonly name: string;
    generateContent(request: LLMRequest): Promise<string>;
}

export type LLMFailure = 'timeout' | 'unreachable' | 'empty';

/**
 * Outcome of one prompt/completion exchange. Failures are values, not exceptions.
 */
export type LLMResult =
    | { ok: true; text: string }
    | { ok: false; failure: LLMFailure; detail: string };

export class LLMTimeoutError extends Error {
    constructor(providerName: string, timeoutMs: number) {
        super(`${providerName} request timed out after ${timeoutMs}ms`);
        this.name = 'LLMTimeoutError';
    }
}

const OllamaChatResponseSchema = z.object({
    message: z.object({ content: z.string() })
});

const OpenAIChatResponseSchema = z.object({
    choices: z.array(z.object({
        message: z.object({ content: z.string().nullable() })
    })).min(1)
});

/**
 * POSTs JSON with an abort-based timeout and returns the parsed body.
 */
async function postJSON(url: string, body: unknown, headers: Record<string, string>, timeoutMs: number, providerName: string): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
        const response = await fetch(url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', ...headers },
            body: JSON.stringify(body),
            signal: controller.signal
        });

        if (!response.ok) {
            const errText = await response.text();
            throw new Error(`${providerName} API Error ${response.status}: ${errText}`);
        }

        return await response.json();
    } catch (err) {
        if (controller.signal.aborted) {
            throw new LLMTimeoutError(providerName, timeoutMs);
        }
        throw err;
    } finally {
        clearTimeout(timeoutId);
    }
}

/**
 * Local models served by Ollama (`/api/chat`).
 */
export class OllamaProvider implements LLMProvider {
    readonly name = 'Ollama';
    private readonly baseUrl: string;

    constructor(private readonly settings: LLMSettings) {
        this.baseUrl = settings.baseUrl.replace(/\/$/, '');
    }

    async generateContent(request: LLMRequest): Promise<string> {
        const data = await postJSON(`${this.baseUrl}/api/chat`, {
            model: this.settings.model,
            messages: [{ role: 'user', content: request.prompt }],
            stream: false,
            options: { temperature: this.settings.temperature }
        }, {}, this.settings.timeoutMs, this.name);

        return OllamaChatResponseSchema.parse(data).message.content;
    }
}

/**
 * Any OpenAI-compatible chat completions endpoint.
 */
export class OpenAIProvider implements LLMProvider {
    readonly name = 'OpenAI';
    private readonly baseUrl: string;

    constructor(private readonly settings: LLMSettings, private readonly apiKey: string) {
        this.baseUrl = settings.baseUrl.replace(/\/$/, '');
    }

    async generateContent(request: LLMRequest): Promise<string> {
        const headers: Record<string, string> = this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {};
        const data = await postJSON(`${this.baseUrl}/chat/completions`, {
            model: this.settings.model,
            messages: [{ role: 'user', content: request.prompt }],
            temperature: this.settings.temperature
        }, headers, this.settings.timeoutMs, this.name);

        return OpenAIChatResponseSchema.parse(data).choices[0].message.content ?? '';
    }
}

export function createLLMProvider(settings: LLMSettings, env: NodeJS.ProcessEnv = process.env): LLMProvider {
    if (settings.provider === 'openai') {
        const apiKey = settings.apiKeyEnv ? env[settings.apiKeyEnv] ?? '' : '';
        if (!apiKey) {
            logger.warn(`[LLM] No API key found${settings.apiKeyEnv ? ` in ${settings.apiKeyEnv}` : ''}; sending unauthenticated requests.`);
        }
        return new OpenAIProvider(settings, apiKey);
    }
    return new OllamaProvider(settings);
}

/**
 * Runs one prompt through the provider and classifies the outcome.
 */
export async function completePrompt(provider: LLMProvider, prompt: string): Promise<LLMResult> {
    try {
        const text = (await provider.generateContent({ prompt })).trim();
        if (!text) {
            return { ok: false, failure: 'empty', detail: `${provider.name} returned an empty completion` };
        }
        return { ok: true, text };
    } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        if (err instanceof LLMTimeoutError) {
            return { ok: false, failure: 'timeout', detail };
        }
        return { ok: false, failure: 'unreachable', detail };
    }
}
