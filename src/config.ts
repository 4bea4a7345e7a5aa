/**
 * Configuration loading
 *
 * Reads the YAML job configuration, validates it against a TypeBox schema and
 * applies environment overrides for the object store connection.
 */

import { readFileSync } from "node:fs";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { load as parseYaml } from "js-yaml";

import { ConfigurationError, describeError } from "./errors.js";
import { logger } from "./logger.js";

// ============================================================================
// Schema
// ============================================================================

const NonEmptyString = Type.String({ minLength: 1 });

export const RawConfigSchema = Type.Object({
  object_store: Type.Object({
    endpoint: Type.Optional(NonEmptyString),
    access_key: Type.Optional(Type.String()),
    secret_key: Type.Optional(Type.String()),
    region: Type.Optional(NonEmptyString),
    secure: Type.Optional(Type.Boolean()),
  }),
  bucket_name: NonEmptyString,
  parent_folder: NonEmptyString,
  agencies: Type.Array(NonEmptyString, { minItems: 1 }),
  register: Type.Optional(
    Type.Object({
      base_url: Type.Optional(NonEmptyString),
      per_page: Type.Optional(Type.Integer({ minimum: 1, maximum: 1000 })),
      rate_limit_ms: Type.Optional(Type.Integer({ minimum: 0 })),
      timeout_ms: Type.Optional(Type.Integer({ minimum: 1 })),
      max_retries: Type.Optional(Type.Integer({ minimum: 0, maximum: 10 })),
    })
  ),
  checkpoint: Type.Optional(
    Type.Union([Type.Literal("agency"), Type.Literal("run")])
  ),
});

export type RawConfig = Static<typeof RawConfigSchema>;

// ============================================================================
// Resolved Configuration
// ============================================================================

export type CheckpointPolicy = "agency" | "run";

export interface ObjectStoreConfig {
  /** Full URL including scheme, e.g. http://localhost:9000 */
  endpoint?: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
}

export interface RegisterConfig {
  baseUrl: string;
  perPage: number;
  rateLimitMs: number;
  timeoutMs: number;
  maxRetries: number;
}

export interface AppConfig {
  objectStore: ObjectStoreConfig;
  bucket: string;
  parentFolder: string;
  agencies: string[];
  register: RegisterConfig;
  checkpoint: CheckpointPolicy;
}

export const DEFAULT_CONFIG_PATH = "config.yaml";

export const REGISTER_DEFAULTS: RegisterConfig = {
  baseUrl: "https://www.federalregister.gov/api/v1",
  perPage: 20,
  rateLimitMs: 500,
  timeoutMs: 30_000,
  maxRetries: 2,
};

type Env = Record<string, string | undefined>;

function envValue(env: Env, name: string): string | undefined {
  const value = env[name];
  return value !== undefined && value !== "" ? value : undefined;
}

/**
 * Prefix a bare host:port with a scheme. Endpoints that already carry one are
 * kept as they are.
 */
export function normalizeEndpoint(endpoint: string, secure: boolean): string {
  if (/^https?:\/\//i.test(endpoint)) {
    return endpoint.replace(/\/+$/, "");
  }
  return `${secure ? "https" : "http"}://${endpoint.replace(/\/+$/, "")}`;
}

/**
 * Trim a folder name of surrounding slashes so keys never contain "//".
 */
function normalizeFolder(folder: string): string {
  return folder.replace(/^\/+|\/+$/g, "");
}

/**
 * Validate a parsed configuration document and resolve it against the
 * environment.
 */
export function parseConfig(raw: unknown, env: Env = process.env): AppConfig {
  if (!Value.Check(RawConfigSchema, raw)) {
    const problems = [...Value.Errors(RawConfigSchema, raw)].map(
      (error) => `${error.path === "" ? "/" : error.path}: ${error.message}`
    );
    throw new ConfigurationError(
      `Invalid configuration: ${problems.slice(0, 5).join("; ")}`,
      { problems }
    );
  }

  const store = raw.object_store;
  const accessKeyId =
    envValue(env, "OBJECT_STORE_ACCESS_KEY") ?? store.access_key ?? "";
  const secretAccessKey =
    envValue(env, "OBJECT_STORE_SECRET_KEY") ?? store.secret_key ?? "";

  if (accessKeyId === "" || secretAccessKey === "") {
    throw new ConfigurationError(
      "Missing object store credentials (object_store.access_key / object_store.secret_key or OBJECT_STORE_ACCESS_KEY / OBJECT_STORE_SECRET_KEY)"
    );
  }

  const endpoint = envValue(env, "OBJECT_STORE_ENDPOINT") ?? store.endpoint;
  const parentFolder = normalizeFolder(raw.parent_folder);
  if (parentFolder === "") {
    throw new ConfigurationError("parent_folder must not be only slashes");
  }

  const agencies: string[] = [];
  for (const agency of raw.agencies.map((a) => a.trim())) {
    if (agency === "") {
      throw new ConfigurationError("Agency identifiers must not be blank");
    }
    if (agencies.includes(agency)) {
      logger.warn({ agency }, "Duplicate agency in configuration ignored");
      continue;
    }
    agencies.push(agency);
  }

  const register = raw.register ?? {};

  return {
    objectStore: {
      endpoint:
        endpoint !== undefined
          ? normalizeEndpoint(endpoint, store.secure ?? false)
          : undefined,
      region: envValue(env, "OBJECT_STORE_REGION") ?? store.region ?? "us-east-1",
      accessKeyId,
      secretAccessKey,
    },
    bucket: raw.bucket_name,
    parentFolder,
    agencies,
    register: {
      baseUrl: (register.base_url ?? REGISTER_DEFAULTS.baseUrl).replace(
        /\/+$/,
        ""
      ),
      perPage: register.per_page ?? REGISTER_DEFAULTS.perPage,
      rateLimitMs: register.rate_limit_ms ?? REGISTER_DEFAULTS.rateLimitMs,
      timeoutMs: register.timeout_ms ?? REGISTER_DEFAULTS.timeoutMs,
      maxRetries: register.max_retries ?? REGISTER_DEFAULTS.maxRetries,
    },
    checkpoint: raw.checkpoint ?? "agency",
  };
}

/**
 * Read and resolve the configuration file.
 */
export function loadConfig(path?: string, env: Env = process.env): AppConfig {
  const configPath = path ?? envValue(env, "CONFIG_PATH") ?? DEFAULT_CONFIG_PATH;

  let text: string;
  try {
    text = readFileSync(configPath, "utf8");
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read configuration file ${configPath}: ${describeError(error)}`,
      { path: configPath }
    );
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new ConfigurationError(
      `Configuration file ${configPath} is not valid YAML: ${describeError(error)}`,
      { path: configPath }
    );
  }

  const config = parseConfig(raw, env);
  logger.debug(
    {
      path: configPath,
      bucket: config.bucket,
      parentFolder: config.parentFolder,
      agencies: config.agencies,
    },
    "Configuration loaded"
  );
  return config;
}
