import process from "node:process";
import { z } from "zod";

import type { ProcessEnv } from "../nodePrimitives.js";
import { readBool, readEnum, readInt, readNumber, readOptionalString, readString } from "./env.js";

/** Similarity above which a request is admitted without further checks. */
const DEFAULT_HIGH_CONFIDENCE = 0.87;
/** Lead of the out-of-domain similarity over the in-domain one that rejects. */
const DEFAULT_MARGIN = 0.03;
/** Requests shorter than this (trimmed) skip the embedding layer. */
const DEFAULT_GATE_MIN_CHARS = 5;
const DEFAULT_TOP_K = 5;
/** Follow-ups shorter than this are candidates for rewriting. */
const DEFAULT_REWRITE_MAX_CHARS = 15;
/** Number of prior messages (two exchanges) handed to the rewriter. */
const DEFAULT_REWRITE_CONTEXT = 4;
const DEFAULT_MAX_ITERATIONS = 6;
const DEFAULT_TURN_DEADLINE_MS = 60_000;
/** Conversation messages retained per session by the management server. */
const DEFAULT_MAX_HISTORY = 40;
const DEFAULT_HASHING_DIMENSIONS = 512;

const embeddingProviders = ["hashing", "http"] as const;

const settingsSchema = z.object({
  catalogDir: z.string().min(1),
  dataDir: z.string().min(1),
  overridesFile: z.string().min(1).nullable(),
  logFile: z.string().min(1).nullable(),
  gate: z.object({
    highConfidence: z.number().gt(0).lte(1),
    margin: z.number().min(0).lte(2),
    minChars: z.number().int().min(0),
  }),
  router: z.object({
    topK: z.number().int().min(1).max(50),
    minScore: z.number().min(-1).max(1),
  }),
  rewrite: z.object({
    maxChars: z.number().int().min(1),
    contextMessages: z.number().int().min(1).max(20),
  }),
  pipeline: z.object({
    maxIterations: z.number().int().min(1).max(50),
    turnDeadlineMs: z.number().int().min(100),
    maxHistoryMessages: z.number().int().min(2),
  }),
  embedding: z
    .object({
      provider: z.enum(embeddingProviders),
      dimensions: z.number().int().min(8).max(8192),
      baseUrl: z.string().url().nullable(),
      model: z.string().min(1).nullable(),
      apiKey: z.string().min(1).nullable(),
      cacheSize: z.number().int().min(0),
      /** `null` lets the embedder decide from the model name. */
      rolePrefixes: z.boolean().nullable(),
    })
    .superRefine((value, ctx) => {
      if (value.provider === "http" && (value.baseUrl === null || value.model === null)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "the http embedding provider requires a base URL and a model",
          path: ["baseUrl"],
        });
      }
    }),
  llm: z
    .object({
      baseUrl: z.string().url(),
      model: z.string().min(1),
      apiKey: z.string().min(1).nullable(),
      temperature: z.number().min(0).max(2),
    })
    .nullable(),
  http: z.object({
    timeoutMs: z.number().int().min(100),
    maxRetries: z.number().int().min(0).max(5),
  }),
});

/** Fully validated runtime settings. */
export type ToolgateSettings = z.infer<typeof settingsSchema>;

/**
 * Builds the settings from environment variables (prefix `TOOLGATE_`) and
 * validates the result. Throws a `ZodError` listing every offending field.
 */
export function loadSettings(env: ProcessEnv = process.env): ToolgateSettings {
  const llmBaseUrl = readOptionalString(env, "TOOLGATE_LLM_BASE_URL");
  const llmModel = readOptionalString(env, "TOOLGATE_LLM_MODEL");

  return settingsSchema.parse({
    catalogDir: readString(env, "TOOLGATE_CATALOG_DIR", "config/actions"),
    dataDir: readString(env, "TOOLGATE_DATA_DIR", "config"),
    overridesFile: readOptionalString(env, "TOOLGATE_OVERRIDES_FILE") ?? null,
    logFile: readOptionalString(env, "TOOLGATE_LOG_FILE") ?? null,
    gate: {
      highConfidence: readNumber(env, "TOOLGATE_GATE_HIGH_CONFIDENCE", DEFAULT_HIGH_CONFIDENCE),
      margin: readNumber(env, "TOOLGATE_GATE_MARGIN", DEFAULT_MARGIN),
      minChars: readInt(env, "TOOLGATE_GATE_MIN_CHARS", DEFAULT_GATE_MIN_CHARS, { min: 0 }),
    },
    router: {
      topK: readInt(env, "TOOLGATE_ROUTER_TOP_K", DEFAULT_TOP_K, { min: 1 }),
      minScore: readNumber(env, "TOOLGATE_ROUTER_MIN_SCORE", 0),
    },
    rewrite: {
      maxChars: readInt(env, "TOOLGATE_REWRITE_MAX_CHARS", DEFAULT_REWRITE_MAX_CHARS, { min: 1 }),
      contextMessages: readInt(env, "TOOLGATE_REWRITE_CONTEXT_MESSAGES", DEFAULT_REWRITE_CONTEXT, { min: 1 }),
    },
    pipeline: {
      maxIterations: readInt(env, "TOOLGATE_MAX_ITERATIONS", DEFAULT_MAX_ITERATIONS, { min: 1 }),
      turnDeadlineMs: readInt(env, "TOOLGATE_TURN_DEADLINE_MS", DEFAULT_TURN_DEADLINE_MS, { min: 100 }),
      maxHistoryMessages: readInt(env, "TOOLGATE_MAX_HISTORY_MESSAGES", DEFAULT_MAX_HISTORY, { min: 2 }),
    },
    embedding: {
      provider: readEnum(env, "TOOLGATE_EMBEDDING_PROVIDER", embeddingProviders, "hashing"),
      dimensions: readInt(env, "TOOLGATE_EMBEDDING_DIMENSIONS", DEFAULT_HASHING_DIMENSIONS),
      baseUrl: readOptionalString(env, "TOOLGATE_EMBEDDING_BASE_URL") ?? null,
      model: readOptionalString(env, "TOOLGATE_EMBEDDING_MODEL") ?? null,
      apiKey: readOptionalString(env, "TOOLGATE_EMBEDDING_API_KEY") ?? null,
      cacheSize: readInt(env, "TOOLGATE_EMBEDDING_CACHE_SIZE", 2_048, { min: 0 }),
      rolePrefixes:
        readOptionalString(env, "TOOLGATE_EMBEDDING_ROLE_PREFIXES") === undefined
          ? null
          : readBool(env, "TOOLGATE_EMBEDDING_ROLE_PREFIXES", false),
    },
    llm:
      llmBaseUrl && llmModel
        ? {
            baseUrl: llmBaseUrl,
            model: llmModel,
            apiKey: readOptionalString(env, "TOOLGATE_LLM_API_KEY") ?? null,
            temperature: readNumber(env, "TOOLGATE_LLM_TEMPERATURE", 0),
          }
        : null,
    http: {
      timeoutMs: readInt(env, "TOOLGATE_HTTP_TIMEOUT_MS", 30_000, { min: 100 }),
      maxRetries: readInt(env, "TOOLGATE_HTTP_MAX_RETRIES", 2, { min: 0, max: 5 }),
    },
  });
}
