/**
 * Configuration
 *
 * Everything is read from environment variables (the CLI loads `.env` first).
 * Empty values count as unset.
 */

import { join, resolve } from "path";
import { pathToFileURL } from "url";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./logging.js";
import type { SessionOptions } from "./session.js";
import type { ElicitationPolicy, Root } from "./types.js";

const booleanFlag = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((value) => value === "true" || value === "1" || value === "yes");

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  AWS_REGION: z.string().default("us-west-2"),
  BEDROCK_MODEL: z.string().default("anthropic.claude-3-haiku-20240307-v1:0"),
  ARXIV_SERVER_PATH: z.string({ required_error: "is required" }),
  ARXIV_SERVER_COMMAND: z.string().default("python"),
  ARXIV_SERVER_SCRIPT: z.string().default("server.py"),
  DOWNLOAD_PATH: z.string().optional(),
  SSL_VERIFY: booleanFlag.default("false"),
  ELICITATION_POLICY: z.enum(["queue", "reject"]).default("queue"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("warn"),
  MCP_HANDSHAKE_TIMEOUT_MS: positiveInt.default(30000),
  MCP_REQUEST_TIMEOUT_MS: positiveInt.default(300000),
  MODEL_TIMEOUT_MS: positiveInt.default(60000),
  MODEL_MAX_TOKENS: positiveInt.default(512),
  MODEL_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.1),
});

export interface ModelConfig {
  region: string;
  modelId: string;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
}

export interface ServerConfig {
  /** Directory containing the tool server */
  path: string;
  /** Interpreter or executable used to start it */
  command: string;
  /** Entry script, relative to `path` */
  script: string;
  /** Where the server saves downloaded articles */
  downloadPath: string;
  sslVerify: boolean;
}

export interface ClientConfig {
  model: ModelConfig;
  server: ServerConfig;
  elicitationPolicy: ElicitationPolicy;
  logLevel: LogLevel;
  handshakeTimeoutMs: number;
  requestTimeoutMs: number;
}

/**
 * Validate and normalize configuration from an environment.
 *
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): ClientConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  const vars = parsed.data;
  return {
    model: {
      region: vars.AWS_REGION,
      modelId: vars.BEDROCK_MODEL,
      timeoutMs: vars.MODEL_TIMEOUT_MS,
      maxTokens: vars.MODEL_MAX_TOKENS,
      temperature: vars.MODEL_TEMPERATURE,
    },
    server: {
      path: resolve(cwd, vars.ARXIV_SERVER_PATH),
      command: vars.ARXIV_SERVER_COMMAND,
      script: vars.ARXIV_SERVER_SCRIPT,
      downloadPath: resolve(cwd, vars.DOWNLOAD_PATH ?? "downloads"),
      sslVerify: vars.SSL_VERIFY,
    },
    elicitationPolicy: vars.ELICITATION_POLICY,
    logLevel: vars.LOG_LEVEL,
    handshakeTimeoutMs: vars.MCP_HANDSHAKE_TIMEOUT_MS,
    requestTimeoutMs: vars.MCP_REQUEST_TIMEOUT_MS,
  };
}

/**
 * Roots declared to the article server: the project and its downloads.
 */
export function defaultRoots(config: ClientConfig, cwd: string = process.cwd()): Root[] {
  return [
    { uri: pathToFileURL(cwd).href, name: "Current Project Directory" },
    { uri: pathToFileURL(config.server.downloadPath).href, name: "Downloads Directory" },
  ];
}

/**
 * Session launch settings for the article server.
 */
export function buildLaunchOptions(
  config: ClientConfig,
  cwd: string = process.cwd()
): Pick<
  SessionOptions,
  "command" | "args" | "env" | "roots" | "requiredPaths" | "handshakeTimeoutMs" | "requestTimeoutMs" | "elicitationPolicy"
> {
  const script = join(config.server.path, config.server.script);
  return {
    command: config.server.command,
    args: [script],
    env: {
      DOWNLOAD_PATH: config.server.downloadPath,
      PYTHONPATH: config.server.path,
      SSL_VERIFY: String(config.server.sslVerify),
    },
    roots: defaultRoots(config, cwd),
    requiredPaths: [script],
    handshakeTimeoutMs: config.handshakeTimeoutMs,
    requestTimeoutMs: config.requestTimeoutMs,
    elicitationPolicy: config.elicitationPolicy,
  };
}
