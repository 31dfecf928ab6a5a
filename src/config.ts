import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "yaml";
import { z } from "zod";
import { HashSchema } from "./audit/schema";
import { ConfigurationError } from "./errors";
import { LOG_LEVELS } from "./types";

const DiagnosticsLevel = z.enum([
  "error",
  "warn",
  "info",
  "verbose",
  "debug",
  "silly",
]);

const CollectorSchema = z.object({
  url: z.string().url().optional(),
  apiKey: z.string().min(1).optional(),
  batchSize: z.number().int().positive().default(50),
  flushIntervalMs: z.number().int().positive().default(2_000),
  bufferCapacity: z.number().int().min(2).default(1_000),
  retries: z.number().int().min(0).max(10).default(3),
});

export const AuditCoreConfigSchema = z.object({
  serviceName: z.string().min(1).default("audit-core"),
  logLevel: z.enum(LOG_LEVELS).default("INFO"),
  diagnosticsLevel: DiagnosticsLevel.default("warn"),
  hashAlgo: z.enum(["sha256", "blake3"]).default("sha256"),
  auditStorePath: z.string().min(1).optional(),
  logFilePath: z.string().min(1).optional(),
  collector: CollectorSchema.default({}),
  shutdownDeadlineMs: z.number().int().positive().default(5_000),
  /** Longest a single audit store append may take before it counts as failed */
  storeTimeoutMs: z.number().int().positive().default(5_000),
  /** `previousHash` of the first stored entry; overrides the store's own anchor */
  anchorHash: HashSchema.optional(),
});

export type AuditCoreConfig = z.infer<typeof AuditCoreConfigSchema>;
export type AuditCoreInit = z.input<typeof AuditCoreConfigSchema>;
export type DiagnosticsLevel = z.infer<typeof DiagnosticsLevel>;

type Env = Record<string, string | undefined>;

function readYaml(filePath: string): Record<string, unknown> {
  const abs = path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(abs)) return {};

  const parsed: unknown = yaml.parse(fs.readFileSync(abs, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigurationError(`${filePath}: expected a YAML mapping`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function num(raw: string | undefined): number | undefined {
  return raw === undefined || raw === "" ? undefined : Number(raw);
}

/** Drops keys whose value is undefined so they don't shadow lower layers. */
function compact(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, value]) => value !== undefined)
  );
}

function fromEnv(env: Env): Record<string, unknown> {
  return compact({
    serviceName: env["AUDIT_CORE_SERVICE_NAME"],
    logLevel: env["AUDIT_CORE_LOG_LEVEL"],
    diagnosticsLevel: env["AUDIT_CORE_DIAGNOSTICS_LEVEL"],
    hashAlgo: env["AUDIT_CORE_HASH_ALGO"],
    auditStorePath: env["AUDIT_CORE_STORE_PATH"],
    logFilePath: env["AUDIT_CORE_LOG_FILE"],
    shutdownDeadlineMs: num(env["AUDIT_CORE_SHUTDOWN_DEADLINE_MS"]),
    storeTimeoutMs: num(env["AUDIT_CORE_STORE_TIMEOUT_MS"]),
    anchorHash: env["AUDIT_CORE_ANCHOR_HASH"],
    collector: compact({
      url: env["AUDIT_CORE_COLLECTOR_URL"],
      apiKey: env["AUDIT_CORE_COLLECTOR_API_KEY"],
      batchSize: num(env["AUDIT_CORE_BATCH_SIZE"]),
      flushIntervalMs: num(env["AUDIT_CORE_FLUSH_INTERVAL_MS"]),
      bufferCapacity: num(env["AUDIT_CORE_BUFFER_CAPACITY"]),
    }),
  });
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

/**
 * Layered config: defaults < YAML file (`AUDIT_CORE_RC`) < env < overrides.
 * The nested `collector` block is merged key by key.
 */
export function resolveConfig(
  overrides: AuditCoreInit = {},
  env: Env = process.env
): AuditCoreConfig {
  const fileCfg = env["AUDIT_CORE_RC"] ? readYaml(env["AUDIT_CORE_RC"]) : {};
  const envCfg = fromEnv(env);

  const merged = {
    ...fileCfg,
    ...envCfg,
    ...overrides,
    collector: {
      ...asRecord(fileCfg["collector"]),
      ...asRecord(envCfg["collector"]),
      ...overrides.collector,
    },
  };

  const result = AuditCoreConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError(
      `audit-core: invalid configuration: ${result.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ")}`
    );
  }
  return result.data;
}

class ConfigManagerClass {
  private _cfg?: AuditCoreConfig;

  load(overrides: AuditCoreInit = {}): AuditCoreConfig {
    this._cfg = resolveConfig(overrides);
    return this._cfg;
  }

  /** Falls back to defaults + environment when nothing was loaded yet. */
  get cfg(): Readonly<AuditCoreConfig> {
    if (!this._cfg) this._cfg = resolveConfig();
    return this._cfg;
  }

  reset(): void {
    this._cfg = undefined;
  }
}

export const ConfigManager = new ConfigManagerClass();
