import { readFile } from "fs/promises";
import { existsSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";
import { z } from "zod";
import { DEFAULT_API_ENDPOINT, DEFAULT_TIMEOUT_MS } from "./engines/llm-client.js";
import { DEFAULT_MODEL } from "./engines/models.js";
import { DEFAULT_SYSTEM_PROMPT } from "./engines/prompt.js";
import { ConfigError, type ConfigIssue } from "./errors.js";

export const RC_FILE = ".draftcommitrc";
export const IGNORE_FILE = ".draftcommitignore";
export const PACKAGE_FIELD = "draftcommit";
export const DEFAULT_API_KEY_ENV_VAR = "OPENAI_API_KEY";

const ConfigSchema = z.object({
  model: z.string().min(1).default(DEFAULT_MODEL),
  apiEndpoint: z.string().url().default(DEFAULT_API_ENDPOINT),
  apiKeyEnvVar: z.string().min(1).default(DEFAULT_API_KEY_ENV_VAR),
  apiKey: z.string().default(""),
  choices: z.coerce.number().int().min(1).max(9).default(3),
  reasoningEffort: z.enum(["none", "low", "medium", "high"]).default("low"),
  verbosity: z.enum(["low", "medium", "high"]).default("medium"),
  stream: z.boolean().default(true),
  autoCommit: z.boolean().default(false),
  amend: z.boolean().default(false),
  dryRun: z.boolean().default(false),
  selectFiles: z.boolean().default(false),
  revision: z.string().min(1).optional(),
  rewrite: z.boolean().default(false),
  systemPrompt: z.string().min(1).default(DEFAULT_SYSTEM_PROMPT),
  systemPromptFile: z.string().min(1).optional(),
  ignoredFiles: z.array(z.string()).default([]),
  debug: z.boolean().default(false),
  debugFile: z.string().min(1).optional(),
  debugContext: z.boolean().default(false),
  disableUpdateCheck: z.boolean().default(false),
  timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

export type Config = z.infer<typeof ConfigSchema>;

/** What an rc file or the package.json field may set. */
const FileConfigSchema = ConfigSchema.partial().strict();

type FileConfig = z.infer<typeof FileConfigSchema>;

/** Flags as commander hands them over; numbers arrive as strings. */
export interface CliOptions {
  config?: string;
  model?: string;
  choices?: string;
  reasoningEffort?: string;
  verbosity?: string;
  printOnce?: boolean;
  autoCommit?: boolean;
  amend?: boolean;
  dryRun?: boolean;
  apiEndpoint?: string;
  apiKey?: string;
  systemPromptFile?: string;
  selectFiles?: boolean;
  revision?: string;
  rewrite?: boolean;
  debug?: boolean;
  debugFile?: string;
  debugContext?: boolean;
  disableUpdateCheck?: boolean;
}

export interface LoadConfigOptions {
  cwd?: string;
  home?: string;
  env?: NodeJS.ProcessEnv;
}

function toIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message,
  }));
}

async function readJson(path: string): Promise<unknown> {
  const content = await readFile(path, "utf-8");
  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError([{ field: "(file)", message: `invalid JSON: ${reason}` }], path);
  }
}

function parseLayer(value: unknown, source: string): FileConfig {
  const parsed = FileConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(toIssues(parsed.error), source);
  }
  return parsed.data;
}

async function loadRcFile(path: string): Promise<FileConfig> {
  if (!existsSync(path)) return {};
  return parseLayer(await readJson(path), path);
}

async function loadPackageField(cwd: string): Promise<FileConfig> {
  const pkgPath = join(cwd, "package.json");
  if (!existsSync(pkgPath)) return {};

  const pkg = z.object({ [PACKAGE_FIELD]: z.unknown().optional() }).passthrough().safeParse(await readJson(pkgPath));
  if (!pkg.success || pkg.data[PACKAGE_FIELD] === undefined) return {};
  return parseLayer(pkg.data[PACKAGE_FIELD], `${pkgPath}#${PACKAGE_FIELD}`);
}

/** Patterns from the ignore file: one glob per line, `#` starts a comment. */
export async function loadIgnorePatterns(cwd: string): Promise<string[]> {
  const ignorePath = join(cwd, IGNORE_FILE);
  if (!existsSync(ignorePath)) return [];

  const content = await readFile(ignorePath, "utf-8");
  return content
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l && !l.startsWith("#"));
}

function fromEnv(env: NodeJS.ProcessEnv, apiKeyEnvVar: string): FileConfig {
  const layer: FileConfig = {};
  if (env.DRAFTCOMMIT_MODEL) layer.model = env.DRAFTCOMMIT_MODEL;
  if (env.DRAFTCOMMIT_API_ENDPOINT) layer.apiEndpoint = env.DRAFTCOMMIT_API_ENDPOINT;
  const apiKey = env[apiKeyEnvVar];
  if (apiKey) layer.apiKey = apiKey;
  return layer;
}

function fromCli(cli: CliOptions): Record<string, unknown> {
  const layer: Record<string, unknown> = {
    model: cli.model,
    choices: cli.choices,
    reasoningEffort: cli.reasoningEffort,
    verbosity: cli.verbosity,
    stream: cli.printOnce ? false : undefined,
    autoCommit: cli.autoCommit,
    amend: cli.amend,
    dryRun: cli.dryRun,
    apiEndpoint: cli.apiEndpoint,
    apiKey: cli.apiKey,
    systemPromptFile: cli.systemPromptFile,
    selectFiles: cli.selectFiles,
    revision: cli.revision,
    rewrite: cli.rewrite,
    debug: cli.debug,
    debugFile: cli.debugFile,
    debugContext: cli.debugContext,
    disableUpdateCheck: cli.disableUpdateCheck,
  };
  return Object.fromEntries(Object.entries(layer).filter(([, value]) => value !== undefined));
}

/**
 * Merges, lowest to highest: defaults < user rc file (or `--config`) <
 * project rc file < package.json field < environment < CLI flags.
 */
export async function loadConfig(cli: CliOptions, options: LoadConfigOptions = {}): Promise<Config> {
  const cwd = options.cwd ?? process.cwd();
  const home = options.home ?? homedir();
  const env = options.env ?? process.env;

  const userRc = cli.config ? resolve(cwd, cli.config) : join(home, RC_FILE);
  if (cli.config && !existsSync(userRc)) {
    throw new ConfigError([{ field: "config", message: `file not found: ${userRc}` }]);
  }

  const files: FileConfig = {
    ...(await loadRcFile(userRc)),
    ...(await loadRcFile(join(cwd, RC_FILE))),
    ...(await loadPackageField(cwd)),
  };

  const merged = {
    ...files,
    ...fromEnv(env, files.apiKeyEnvVar ?? DEFAULT_API_KEY_ENV_VAR),
    ...fromCli(cli),
  };

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(toIssues(parsed.error));
  }

  const config = parsed.data;
  config.ignoredFiles = [...config.ignoredFiles, ...(await loadIgnorePatterns(cwd))];

  if (config.systemPromptFile) {
    config.systemPrompt = await readSystemPrompt(resolve(cwd, config.systemPromptFile));
  }

  if (config.autoCommit) {
    config.choices = 1;
  }

  return config;
}

async function readSystemPrompt(path: string): Promise<string> {
  if (!existsSync(path)) {
    throw new ConfigError([{ field: "systemPromptFile", message: `file not found: ${path}` }]);
  }
  const prompt = (await readFile(path, "utf-8")).trim();
  if (!prompt) {
    throw new ConfigError([{ field: "systemPromptFile", message: `file is empty: ${path}` }]);
  }
  return prompt;
}
