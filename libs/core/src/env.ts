import { ClientConfigError } from "./errors";
import type { AuthConfig } from "./schemas";

export const API_KEY_ENV = "LAYERHTTP_API_KEY";
export const USERNAME_ENV = "LAYERHTTP_USERNAME";
export const PASSWORD_ENV = "LAYERHTTP_PASSWORD";

export function parseEnvText(text: string): Record<string, string> {
  const result: Record<string, string> = {};
  const normalized = text.replace(/\r\n/g, "\n");

  for (const rawLine of normalized.split("\n")) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) {
      continue;
    }

    const equalsIndex = line.indexOf("=");
    if (equalsIndex <= 0) {
      continue;
    }

    const key = line.slice(0, equalsIndex).trim();
    let value = line.slice(equalsIndex + 1).trim();

    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}

export function mergeEnvironment(
  baseEnv: Record<string, string>,
  overrideEnv: Record<string, string>,
): Record<string, string> {
  return {
    ...baseEnv,
    ...overrideEnv,
  };
}

export function authConfigFromEnvironment(
  environment: Record<string, string>,
): AuthConfig | undefined {
  const apiKey = environment[API_KEY_ENV];
  const username = environment[USERNAME_ENV];

  if (apiKey && username) {
    throw new ClientConfigError(`Set either ${API_KEY_ENV} or ${USERNAME_ENV}, not both.`);
  }

  if (apiKey) {
    return { type: "bearer", apiKey };
  }

  if (username) {
    return { type: "basic", username, password: environment[PASSWORD_ENV] ?? "" };
  }

  return undefined;
}
