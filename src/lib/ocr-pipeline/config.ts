/**
 * OCR Pipeline: Configuration
 *
 * All settings come from environment variables (Next.js loads `.env*` files
 * into `process.env`).  Service keys are optional here; the components that
 * need them throw on construction when they are missing.
 */

import os from "node:os";

/** 50 MB in bytes */
const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

export interface PipelineConfig {
    azure: {
        endpoint?: string;
        apiKey?: string;
        modelId: string;
    };
    openai: {
        apiKey?: string;
        model: string;
        maxTokens: number;
    };
    upload: {
        /** Parent directory of the per-request temp directories */
        tmpDir: string;
        maxBytes: number;
    };
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
    const value = env[key]?.trim();
    return value ? value : undefined;
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
    const raw = readString(env, key);
    if (raw === undefined) {
        return fallback;
    }

    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        console.warn(`[Config] Ignoring invalid ${key}="${raw}", using ${fallback}`);
        return fallback;
    }

    return parsed;
}

export function loadConfig(env: Env = process.env): PipelineConfig {
    return {
        azure: {
            endpoint: readString(env, "AZURE_OCR_ENDPOINT"),
            apiKey: readString(env, "AZURE_OCR_KEY"),
            modelId: readString(env, "AZURE_OCR_MODEL") ?? "prebuilt-document",
        },
        openai: {
            apiKey: readString(env, "OPENAI_API_KEY"),
            model: readString(env, "OPENAI_MODEL_NAME") ?? "gpt-3.5-turbo",
            maxTokens: readPositiveInt(env, "OPENAI_MAX_TOKENS", 1500),
        },
        upload: {
            tmpDir: readString(env, "UPLOAD_TMP_DIR") ?? os.tmpdir(),
            maxBytes: readPositiveInt(env, "MAX_UPLOAD_BYTES", DEFAULT_MAX_UPLOAD_BYTES),
        },
    };
}
