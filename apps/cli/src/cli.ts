import { access, constants, readFile } from "node:fs/promises";
import { resolve } from "node:path";
import {
  type AuthConfig,
  authConfigFromEnvironment,
  ClientConfigError,
  type ClientConfig,
  createAuthMiddleware,
  createFetchTransport,
  HttpClient,
  type HttpTransport,
  LoggingMiddleware,
  type Middleware,
  mergeEnvironment,
  parseClientConfig,
  parseEnvText,
  stderrLogger,
  validateClientConfig,
} from "@layerhttp/core";

interface ParsedArgs {
  command: string;
  positionals: string[];
  options: Record<string, string | boolean>;
}

const DEFAULT_ENV_FILE = ".env";

function parseArgs(argv: string[]): ParsedArgs {
  const [command = "help", ...rest] = argv;
  const positionals: string[] = [];
  const options: Record<string, string | boolean> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const token = rest[index];
    if (token === undefined) {
      continue;
    }

    if (token.startsWith("--")) {
      const key = token.slice(2);
      const value = rest[index + 1];
      if (!value || value.startsWith("--")) {
        options[key] = true;
      } else {
        options[key] = value;
        index += 1;
      }
      continue;
    }

    positionals.push(token);
  }

  return {
    command,
    positionals,
    options,
  };
}

function printHelp(): void {
  console.log(
    `layerhttp commands:\n  layerhttp get <url> [--api-key <key>] [--user <name>] [--password <secret>]\n                [--config <file>] [--env-file <file>] [--timeout <ms>] [--verbose]`,
  );
}

function stringOption(options: ParsedArgs["options"], key: string): string | undefined {
  const value = options[key];
  if (typeof value === "boolean") {
    throw new ClientConfigError(`Option --${key} requires a value.`);
  }
  return value;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

async function readEnvironment(
  cwd: string,
  envFile: string | undefined,
  processEnv: Record<string, string | undefined>,
): Promise<Record<string, string>> {
  const path = resolve(cwd, envFile ?? DEFAULT_ENV_FILE);
  let fileEnv: Record<string, string> = {};

  if (await exists(path)) {
    fileEnv = parseEnvText(await readFile(path, "utf8"));
  } else if (envFile) {
    throw new ClientConfigError(`Env file not found: ${envFile}`);
  }

  const definedEnv: Record<string, string> = {};
  for (const [key, value] of Object.entries(processEnv)) {
    if (value !== undefined) {
      definedEnv[key] = value;
    }
  }

  return mergeEnvironment(fileEnv, definedEnv);
}

function authFromFlags(options: ParsedArgs["options"]): AuthConfig | undefined {
  const apiKey = stringOption(options, "api-key");
  const user = stringOption(options, "user");
  const password = stringOption(options, "password");

  if (apiKey !== undefined && user !== undefined) {
    throw new ClientConfigError("Use either --api-key or --user, not both.");
  }

  if (apiKey !== undefined) {
    return { type: "bearer", apiKey };
  }

  if (user !== undefined) {
    return { type: "basic", username: user, password: password ?? "" };
  }

  if (password !== undefined) {
    throw new ClientConfigError("--password requires --user.");
  }

  return undefined;
}

function parseTimeout(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }

  const timeoutMs = Number(raw);
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new ClientConfigError(`Invalid --timeout value: ${raw}`);
  }
  return timeoutMs;
}

async function resolveClientConfig(
  parsed: ParsedArgs,
  cwd: string,
  processEnv: Record<string, string | undefined>,
): Promise<ClientConfig> {
  const configPath = stringOption(parsed.options, "config");
  const fileConfig = configPath
    ? parseClientConfig(await readFile(resolve(cwd, configPath), "utf8"))
    : null;

  const environment = await readEnvironment(
    cwd,
    stringOption(parsed.options, "env-file"),
    processEnv,
  );

  const auth =
    authFromFlags(parsed.options) ?? authConfigFromEnvironment(environment) ?? fileConfig?.auth;

  return validateClientConfig({
    auth,
    timeoutMs: parseTimeout(stringOption(parsed.options, "timeout")) ?? fileConfig?.timeoutMs,
  });
}

async function handleGet(
  parsed: ParsedArgs,
  url: string,
  transport: HttpTransport,
  cwd: string,
  processEnv: Record<string, string | undefined>,
): Promise<void> {
  const config = await resolveClientConfig(parsed, cwd, processEnv);
  const logger = stderrLogger();

  const middlewares: Middleware[] = [];
  if (config.auth) {
    middlewares.push(createAuthMiddleware(config.auth));
  }
  if (parsed.options.verbose === true) {
    middlewares.push(new LoggingMiddleware(logger));
  }

  const client = new HttpClient(transport, middlewares, { logger });
  const signal = config.timeoutMs ? AbortSignal.timeout(config.timeoutMs) : undefined;
  const body = await client.get(url, { signal });

  console.log(body.toString("utf8"));
}

export interface CliRuntimeOptions {
  cwd?: string;
  env?: Record<string, string | undefined>;
  transport?: HttpTransport;
}

export async function runCli(argv: string[], options: CliRuntimeOptions = {}): Promise<void> {
  const parsed = parseArgs(argv);
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const transport = options.transport ?? createFetchTransport();

  switch (parsed.command) {
    case "get": {
      const url = parsed.positionals[0];
      if (!url) {
        throw new Error("Usage: layerhttp get <url> [--api-key <key>] [--user <name>]");
      }
      await handleGet(parsed, url, transport, cwd, env);
      return;
    }
    default:
      printHelp();
  }
}
