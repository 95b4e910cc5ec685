import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { ConfigError, ValidationError } from "../../domain/common/errors";
import { AppConfigSchema, type AppConfig } from "./schema";

type UnknownRecord = Record<string, unknown>;

export type LoadConfigArgs = {
  configPath?: string;
  /** Highest-precedence values, typically from CLI flags. */
  overrides?: UnknownRecord;
};

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: UnknownRecord, next: UnknownRecord): UnknownRecord {
  const out: UnknownRecord = { ...base };
  for (const [key, value] of Object.entries(next)) {
    const prior = out[key];
    if (isRecord(prior) && isRecord(value)) {
      out[key] = deepMerge(prior, value);
    } else if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

function envString(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim().length > 0 ? v : undefined;
}

function envInt(name: string): number | undefined {
  const raw = envString(name);
  if (!raw) return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? Math.trunc(n) : undefined;
}

function configFromEnv(): UnknownRecord {
  return {
    logLevel: envString("LOG_LEVEL"),
    providers: {
      deepseek: {
        apiKey: envString("DEEPSEEK_API_KEY"),
        timeoutMs: envInt("DEEPSEEK_TIMEOUT_MS"),
        maxRetries: envInt("DEEPSEEK_MAX_RETRIES"),
      },
    },
  };
}

async function readConfigFile(configPath: string): Promise<UnknownRecord> {
  const abs = path.isAbsolute(configPath)
    ? configPath
    : path.join(process.cwd(), configPath);
  let raw: string;
  try {
    raw = await readFile(abs, "utf8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${abs}`, error);
  }

  const ext = path.extname(abs).toLowerCase();
  try {
    if (ext === ".yaml" || ext === ".yml") {
      const parsed: unknown = YAML.parse(raw);
      return isRecord(parsed) ? parsed : {};
    }
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${abs}`, error);
  }
}

export async function loadConfig(
  args: LoadConfigArgs = {},
): Promise<AppConfig> {
  const fileConfig = args.configPath
    ? await readConfigFile(args.configPath)
    : {};
  const envConfig = configFromEnv();
  const merged = deepMerge(
    deepMerge(fileConfig, envConfig),
    args.overrides ?? {},
  );

  const parsed = AppConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw new ValidationError(
      `Invalid configuration:\n${issues}`,
      parsed.error,
    );
  }
  return parsed.data;
}
