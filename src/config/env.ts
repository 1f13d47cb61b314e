import "dotenv/config";
import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../errors";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = "json" | "pretty";
export type MqttQos = 0 | 1 | 2;

// Accepts the level names older .env files were written with.
const LOG_LEVEL_ALIASES: Record<string, LogLevel> = {
  warning: "warn",
  critical: "fatal"
};

function normalizePath(value: string): string {
  return path.normalize(value.replace(/\\/g, "/"));
}

function splitCommand(value: string): string[] {
  return value
    .trim()
    .split(/\s+/)
    .filter((part) => part.length > 0);
}

const requiredPath = z.string().trim().min(1).transform(normalizePath);

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : undefined;
  });

const envSchema = z
  .object({
    SNAPSHOT_FILE: requiredPath,
    CORE_CONFIG_FILE: requiredPath,
    BACKUP_FILE: requiredPath,
    LOCAL_CORE_CONFIG_FILE: requiredPath,
    LOG_FILE: requiredPath,
    LOG_LEVEL: z
      .string()
      .transform((value) => {
        const normalized = value.trim().toLowerCase();
        return LOG_LEVEL_ALIASES[normalized] ?? normalized;
      })
      .pipe(z.enum(LOG_LEVELS)),
    LOG_FORMAT: z
      .string()
      .transform((value) => value.trim().toLowerCase())
      .pipe(z.enum(["json", "pretty"])),
    MQTT_BROKER: z.string().trim().min(1),
    MQTT_PORT: z.coerce.number().int().min(1).max(65535),
    MQTT_TOPIC: z.string().trim().min(1),
    MQTT_USERNAME: optionalString,
    MQTT_PASSWORD: optionalString,
    MQTT_PROTOCOL: z.enum(["mqtt", "mqtts"]).default("mqtt"),
    MQTT_CLIENT_ID: optionalString,
    MQTT_PAYLOAD: z.string().default("reboot"),
    MQTT_QOS: z
      .enum(["0", "1", "2"])
      .default("0")
      .transform((value): MqttQos => (value === "2" ? 2 : value === "1" ? 1 : 0)),
    MQTT_RETAIN: z
      .string()
      .optional()
      .default("false")
      .transform((value) => value === "true"),
    MQTT_CONNECT_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120000).default(30000),
    MQTT_CA_FILE: optionalString.transform((value) => (value ? normalizePath(value) : undefined)),
    MQTT_REJECT_UNAUTHORIZED: z
      .string()
      .optional()
      .default("true")
      .transform((value) => value !== "false"),
    SCAN_COMMAND: z
      .string()
      .default("tinytuya scan")
      .transform(splitCommand)
      .refine((parts) => parts.length > 0, "SCAN_COMMAND must name a program"),
    SCAN_WORKING_DIR: optionalString.transform((value) => (value ? normalizePath(value) : undefined)),
    SCAN_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
    SNAPSHOT_STRICT_DUPLICATES: z
      .string()
      .optional()
      .default("false")
      .transform((value) => value === "true"),
    BACKUP_RETENTION_COUNT: z.coerce.number().int().min(0).max(365).default(0)
  })
  .superRefine((value, ctx) => {
    const live = path.resolve(value.CORE_CONFIG_FILE);
    const backup = path.resolve(value.BACKUP_FILE);
    const working = path.resolve(value.LOCAL_CORE_CONFIG_FILE);
    if (backup === live) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["BACKUP_FILE"],
        message: "must differ from CORE_CONFIG_FILE"
      });
    }
    if (working === live) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["LOCAL_CORE_CONFIG_FILE"],
        message: "must differ from CORE_CONFIG_FILE"
      });
    }
    if (working === backup) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["LOCAL_CORE_CONFIG_FILE"],
        message: "must differ from BACKUP_FILE"
      });
    }
  });

export type AppConfig = {
  paths: {
    snapshotFile: string;
    liveConfigFile: string;
    backupFile: string;
    workingConfigFile: string;
    logFile: string;
  };
  scan: {
    command: string;
    args: string[];
    cwd: string;
    timeoutMs: number | null;
    strictDuplicates: boolean;
  };
  backup: {
    retentionCount: number;
  };
  mqtt: {
    protocol: "mqtt" | "mqtts";
    host: string;
    port: number;
    username?: string;
    password?: string;
    clientId?: string;
    topic: string;
    payload: string;
    qos: MqttQos;
    retain: boolean;
    connectTimeoutMs: number;
    caFile?: string;
    rejectUnauthorized: boolean;
  };
  log: {
    level: LogLevel;
    format: LogFormat;
  };
};

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      setting: issue.path.join(".") || "(root)",
      message: issue.message
    }));
    throw new ConfigurationError(
      "config_invalid",
      `Invalid configuration: ${issues.map((issue) => `${issue.setting}: ${issue.message}`).join("; ")}`,
      issues
    );
  }

  const env = parsed.data;
  const [command, ...args] = env.SCAN_COMMAND;
  return {
    paths: {
      snapshotFile: env.SNAPSHOT_FILE,
      liveConfigFile: env.CORE_CONFIG_FILE,
      backupFile: env.BACKUP_FILE,
      workingConfigFile: env.LOCAL_CORE_CONFIG_FILE,
      logFile: env.LOG_FILE
    },
    scan: {
      command,
      args,
      cwd: env.SCAN_WORKING_DIR ?? path.dirname(env.SNAPSHOT_FILE),
      timeoutMs: env.SCAN_TIMEOUT_MS ?? null,
      strictDuplicates: env.SNAPSHOT_STRICT_DUPLICATES
    },
    backup: {
      retentionCount: env.BACKUP_RETENTION_COUNT
    },
    mqtt: {
      protocol: env.MQTT_PROTOCOL,
      host: env.MQTT_BROKER,
      port: env.MQTT_PORT,
      username: env.MQTT_USERNAME,
      password: env.MQTT_PASSWORD,
      clientId: env.MQTT_CLIENT_ID,
      topic: env.MQTT_TOPIC,
      payload: env.MQTT_PAYLOAD,
      qos: env.MQTT_QOS,
      retain: env.MQTT_RETAIN,
      connectTimeoutMs: env.MQTT_CONNECT_TIMEOUT_MS,
      caFile: env.MQTT_CA_FILE,
      rejectUnauthorized: env.MQTT_REJECT_UNAUTHORIZED
    },
    log: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT
    }
  };
}
