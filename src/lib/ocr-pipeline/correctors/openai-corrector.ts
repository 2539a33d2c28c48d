import OpenAI from "openai";
import { CorrectionFailure, getErrorMessage } from "../errors";
import type {
    ChatCompletionBackend,
    ChatMessage,
    CorrectedPage,
    PageText,
    TextCorrector,
} from "../types";

interface OpenAiCorrectorOptions {
    client?: ChatCompletionBackend;
    apiKey?: string;
    model?: string;
    maxTokens?: number;
}

export const CORRECTION_SYSTEM_PROMPT =
    "You are a helpful assistant that fixes errors in OCR outputs and provides correct data in the same JSON format.";

export function buildCorrectionMessages(pageText: string): ChatMessage[] {
    return [
        { role: "system", content: CORRECTION_SYSTEM_PROMPT },
        {
            role: "user",
            content: `Fix the errors and get correct data in same JSON format:\n${pageText}`,
        },
    ];
}

/**
 * Sends every page to a chat model on its own (no cross-page context).
 * Pages are corrected concurrently; the first failure fails the whole batch.
 */
export class OpenAiCorrector implements TextCorrector {
    readonly name = "OpenAiCorrector";

    private readonly client: ChatCompletionBackend;
    private readonly model: string;
    private readonly maxTokens: number;

    constructor(options: OpenAiCorrectorOptions = {}) {
        this.model = options.model ?? "gpt-3.5-turbo";
        this.maxTokens = options.maxTokens ?? 1500;

        if (options.client) {
            this.client = options.client;
            return;
        }

        if (!options.apiKey) {
            throw new Error(
                "[OpenAiCorrector] Missing OPENAI_API_KEY. Pass it via options or environment variable."
            );
        }

        this.client = new OpenAI({ apiKey: options.apiKey });
    }

    async correct(pages: PageText[]): Promise<CorrectedPage[]> {
        if (pages.length === 0) {
            return [];
        }

        // Promise.all keeps input order whatever order the calls settle in
        return Promise.all(
            pages.map(async (page): Promise<CorrectedPage> => ({
                index: page.index,
                text: await this.correctPage(page),
            }))
        );
    }

    private async correctPage(page: PageText): Promise<string> {
        let content: string | null | undefined;

        try {
            const completion = await this.client.chat.completions.create({
                model: this.model,
                messages: buildCorrectionMessages(page.text),
                max_tokens: this.maxTokens,
            });
            content = completion.choices[0]?.message?.content;
        } catch (error) {
            const message = getErrorMessage(error);
            console.error(`[OpenAiCorrector] Page ${page.index} failed: ${message}`);
            throw new CorrectionFailure(`Correction failed for page ${page.index}: ${message}`, error);
        }

        if (typeof content !== "string") {
            throw new CorrectionFailure(`Correction failed for page ${page.index}: empty completion`);
        }

        return content.trim();
    }
}
