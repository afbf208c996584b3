import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { LabbookConfig } from "./types.js";

const apiKeyEnvAuthSchema = z
  .object({
    method: z.literal("api-key-env"),
    apiKeyEnv: z.string().min(1)
  })
  .strict();

const commandAuthSchema = z
  .object({
    method: z.literal("command"),
    command: z.string().min(1),
    cacheKey: z.string().min(1).optional(),
    cacheTtlSeconds: z.number().positive().optional(),
    tokenStorePath: z.string().min(1).optional()
  })
  .strict();

const modelAuthSchema = z.discriminatedUnion("method", [apiKeyEnvAuthSchema, commandAuthSchema]);

const modelSchema = z
  .object({
    provider: z.string().min(1),
    model: z.string().min(1),
    apiKeyEnv: z.string().min(1).optional(),
    auth: modelAuthSchema.optional(),
    api: z.string().min(1).optional(),
    baseUrl: z.string().min(1).optional(),
    temperature: z.number().optional(),
    maxTokens: z.number().int().positive().optional(),
    headers: z.record(z.string(), z.string()).optional()
  })
  .strict();

const userSchema = z
  .object({
    id: z.string().min(1),
    role: z.enum(["user", "admin"]).default("user")
  })
  .strict();

const reasoningSchema = z
  .object({
    model: modelSchema,
    timeoutMs: z.number().int().positive().default(60_000),
    maxToolSteps: z.number().int().min(0).default(6)
  })
  .strict();

const contextSchema = z
  .object({
    historyTurns: z.number().int().min(0).default(6),
    siblingLimit: z.number().int().min(0).default(12),
    memoryMaxChars: z.number().int().positive().default(24_000)
  })
  .strict();

const memorySchema = z
  .object({
    writeRetries: z.number().int().min(0).default(2)
  })
  .strict();

const literatureSchema = z
  .object({
    provider: z.literal("exa").default("exa"),
    apiKeyEnv: z.string().min(1).default("EXA_API_KEY"),
    numResults: z.number().int().min(1).max(20).default(5),
    timeoutMs: z.number().int().positive().default(20_000)
  })
  .strict();

const conversionSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()).default(["{input}"]),
    timeoutMs: z.number().int().positive().default(120_000)
  })
  .strict();

const labbookConfigSchema = z
  .object({
    storage: z
      .object({
        dataRoot: z.string().min(1)
      })
      .strict(),
    users: z.array(userSchema).min(1),
    reasoning: reasoningSchema,
    context: contextSchema.default({}),
    memory: memorySchema.default({}),
    literature: literatureSchema.optional(),
    conversion: conversionSchema.optional()
  })
  .strict();

function assertConsistency(config: LabbookConfig): void {
  const ids = config.users.map((user) => user.id);
  const duplicates = ids.filter((id, index) => ids.indexOf(id) !== index);
  if (duplicates.length > 0) {
    throw new Error(`Config validation error: duplicate user ids: ${[...new Set(duplicates)].join(", ")}`);
  }

  const model = config.reasoning.model;
  if (!model.auth && !model.apiKeyEnv) {
    throw new Error("Config validation error: reasoning.model needs auth or apiKeyEnv");
  }
  if (config.conversion && !config.conversion.args.some((arg) => arg.includes("{input}"))) {
    throw new Error("Config validation error: conversion.args must contain an {input} placeholder");
  }
}

export function parseConfig(json: unknown, source = "<inline>"): LabbookConfig {
  const parsed = labbookConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const pathText = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${pathText}: ${issue.message}`;
    });
    throw new Error(`Config validation error (${source}):\n- ${issues.join("\n- ")}`);
  }

  const config: LabbookConfig = parsed.data;
  assertConsistency(config);
  return config;
}

export async function loadConfig(configPath: string): Promise<LabbookConfig> {
  const absolute = path.resolve(configPath);
  const raw = await readFile(absolute, "utf8");

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Config validation error: invalid JSON in ${absolute}: ${message}`);
  }

  const config = parseConfig(json, absolute);
  return {
    ...config,
    storage: {
      dataRoot: path.resolve(path.dirname(absolute), config.storage.dataRoot)
    }
  };
}
