import Ajv from "ajv";
import schema from "../../config/schema.json";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface StorageConfig {
  url: string;
  port: number;
  readypath: string;
  caCert: string;
}

export interface BrokerConfig {
  host: string;
  port: number;
}

export interface ServerTlsConfig {
  cert: string;
  key: string;
}

/**
 * The subset of the service configuration the healthchecker reads.
 */
export interface ServiceConfig {
  storage: StorageConfig;
  broker: BrokerConfig;
  server: ServerTlsConfig;
}

export interface AppConfig extends ServiceConfig {
  nodeEnv: string;
  healthPort: number;
  dbUrl?: string;
  dbHealthQuery: string;
  logLevel: LogLevel;
  logPretty: boolean;
}

const ajv = new Ajv({ allErrors: true, useDefaults: true });

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cfg = {
    nodeEnv: env.NODE_ENV || "local",
    healthPort: parseInt(env.HEALTH_PORT || "8080", 10),
    storage: {
      url: env.STORAGE_URL || "",
      port: parseInt(env.STORAGE_PORT || "0", 10),
      readypath: env.STORAGE_READYPATH || "",
      caCert: env.STORAGE_CACERT || ""
    },
    broker: {
      host: env.BROKER_HOST || "",
      port: parseInt(env.BROKER_PORT || "5672", 10)
    },
    server: {
      cert: env.SERVER_CERT || "",
      key: env.SERVER_KEY || ""
    },
    dbUrl: env.DATABASE_URL || env.DB_URL,
    dbHealthQuery: env.DB_HEALTH_QUERY || "SELECT 1",
    logLevel: env.LOG_LEVEL || "info",
    logPretty: env.LOG_PRETTY === "true"
  };

  const validate = ajv.compile<AppConfig>(schema);
  if (!validate(cfg)) {
    const msgs = (validate.errors || []).map(e => `${e.instancePath} ${e.message}`).join("; ");
    throw new Error(`Invalid configuration: ${msgs}`);
  }
  return cfg;
}
