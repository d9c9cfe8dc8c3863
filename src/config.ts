/**
 * Runtime configuration
 *
 * Defaults come from config.json; a handful of values can be overridden
 * through the environment at startup. The merged result is validated once
 * so the rest of the server can trust its shape.
 */

import * as z from "zod";
import rawConfig from "@/config.json";

const positiveInt = z.coerce.number().int().positive();

export const inaturalistConfigSchema = z.object({
  baseUrl: z.string().url(),
  siteUrl: z.string().url(),
  userAgent: z.string().min(1),
  maxRequestsPerMinute: positiveInt,
  windowMs: positiveInt,
  maxRetries: z.coerce.number().int().min(0),
  retryDelaysMs: z.array(z.number().int().min(0)).min(1),
  timeoutMs: positiveInt,
});

export const mcpConfigSchema = z.object({
  enabled: z.boolean(),
  port: positiveInt.max(65535),
  host: z.string().min(1),
});

export const appConfigSchema = z.object({
  inaturalist: inaturalistConfigSchema,
  mcp: mcpConfigSchema,
});

export type INaturalistConfig = z.infer<typeof inaturalistConfigSchema>;
export type McpConfig = z.infer<typeof mcpConfigSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

type Env = Record<string, string | undefined>;

/**
 * Merge config.json with environment overrides and validate the result.
 *
 * Throws a descriptive Error listing every invalid field.
 */
export function loadConfig(env: Env = process.env, base: unknown = rawConfig): AppConfig {
  const parsedBase = appConfigSchema.safeParse(base);
  if (!parsedBase.success) {
    throw new Error(`Invalid config.json: ${formatIssues(parsedBase.error)}`);
  }

  const { inaturalist, mcp } = parsedBase.data;
  const merged = {
    inaturalist: {
      ...inaturalist,
      baseUrl: env.INAT_BASE_URL ?? inaturalist.baseUrl,
      maxRequestsPerMinute: env.INAT_MAX_REQUESTS_PER_MINUTE ?? inaturalist.maxRequestsPerMinute,
      timeoutMs: env.INAT_TIMEOUT_MS ?? inaturalist.timeoutMs,
    },
    mcp: {
      ...mcp,
      port: env.MCP_HTTP_PORT ?? mcp.port,
    },
  };

  const parsed = appConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new Error(`Invalid configuration override: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
