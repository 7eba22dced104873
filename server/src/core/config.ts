import fs from "node:fs";
import path from "node:path";
import { isRecord, type ExtraArgumentPolicy } from "relay-agent-backend";
import type { ProviderConfig } from "../providers/index.js";
import { DEFAULT_SYSTEM_PROMPT, type ConductorServiceConfig } from "./conductorService.js";
import { logger } from "./logger.js";

export interface ServiceConfig {
  port: number;
  provider: ProviderConfig;
  conductor: ConductorServiceConfig;
  maxEventBytes: number;
  toolSettingsPath: string;
  extraArguments: ExtraArgumentPolicy;
  /** Register send_email in this process instead of reaching it over the bridge. */
  localEmailTool: boolean;
  emailDelivery: "ses" | "http";
  emailApiUrl?: string;
}

export interface ToolEndpoint {
  name: string;
  url: string;
  description?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const awsRegion = env.AWS_REGION ?? "us-east-1";
  const inputCost = parseCost(env.INPUT_COST_PER_MTOK);
  const outputCost = parseCost(env.OUTPUT_COST_PER_MTOK);

  return {
    port: parseInteger(env.PORT, 8080),
    provider: {
      modelProvider: (env.MODEL_PROVIDER ?? "anthropic").toLowerCase() === "bedrock" ? "bedrock" : "anthropic",
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      anthropicModel: env.ANTHROPIC_MODEL ?? "claude-sonnet-4-20250514",
      maxTokens: parseInteger(env.ANTHROPIC_MAX_TOKENS, 1024),
      bedrockModelId: env.BEDROCK_MODEL_ID ?? "amazon.nova-lite-v1:0",
      awsRegion,
      pricing: inputCost !== undefined && outputCost !== undefined
        ? { inputPerMTok: inputCost, outputPerMTok: outputCost }
        : undefined,
    },
    conductor: {
      defaultMaxTurns: parseInteger(env.DEFAULT_MAX_TURNS, 10),
      maxTurnsLimit: parseInteger(env.MAX_TURNS_LIMIT, 50),
      sessionTimeoutMs: parseInteger(env.SESSION_TIMEOUT_MS, 120_000),
      systemPrompt: env.SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
    },
    maxEventBytes: parseInteger(env.MAX_EVENT_BYTES, 65_536),
    toolSettingsPath: path.resolve(env.TOOL_SETTINGS_PATH ?? ".claude/settings.json"),
    extraArguments: (env.EXTRA_ARGUMENTS ?? "").toLowerCase() === "ignore" ? "ignore" : "reject",
    localEmailTool: parseFlag(env.LOCAL_EMAIL_TOOL),
    emailDelivery: (env.EMAIL_DELIVERY ?? "").toLowerCase() === "http" ? "http" : "ses",
    emailApiUrl: env.EMAIL_API_URL || undefined,
  };
}

/**
 * Reads `{ "mcpServers": { name: { "httpUrl" | "url", "enabled", "description" } } }`.
 * A missing file means no remote tools; an unreadable one is a start-up error.
 */
export function loadToolEndpoints(settingsPath: string): ToolEndpoint[] {
  if (!fs.existsSync(settingsPath)) {
    logger.info(`no tool settings at ${settingsPath}; remote tools disabled`);
    return [];
  }

  const raw: unknown = JSON.parse(fs.readFileSync(settingsPath, "utf8"));
  if (!isRecord(raw) || !isRecord(raw.mcpServers)) {
    logger.warn(`tool settings at ${settingsPath} have no mcpServers section`);
    return [];
  }

  const endpoints: ToolEndpoint[] = [];
  for (const [name, entry] of Object.entries(raw.mcpServers)) {
    if (!isRecord(entry) || entry.enabled === false) {
      continue;
    }

    const url = typeof entry.httpUrl === "string" ? entry.httpUrl : entry.url;
    if (typeof url !== "string" || !url) {
      logger.warn(`tool endpoint ${name} has no httpUrl or url; skipped`);
      continue;
    }

    endpoints.push({
      name,
      url,
      description: typeof entry.description === "string" ? entry.description : undefined,
    });
  }
  return endpoints;
}

export function parseInteger(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }

  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value) || value <= 0) {
    return fallback;
  }
  return value;
}

function parseCost(raw: string | undefined): number | undefined {
  if (!raw) {
    return undefined;
  }
  const value = Number.parseFloat(raw);
  return Number.isFinite(value) && value >= 0 ? value : undefined;
}

function parseFlag(raw: string | undefined): boolean {
  return ["1", "true", "yes", "on"].includes((raw ?? "").trim().toLowerCase());
}
