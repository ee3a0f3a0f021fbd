import { ClientConfigError, describeError } from "./errors";
import { ApiKeyAuthMiddleware, BasicAuthMiddleware, type Middleware } from "./middleware";
import { type AuthConfig, type ClientConfig, ClientConfigSchema } from "./schemas";

export function parseClientConfig(rawText: string | undefined): ClientConfig | null {
  if (!rawText?.trim()) {
    return null;
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(rawText);
  } catch (error) {
    throw new ClientConfigError(`Invalid client config format: ${describeError(error)}`, error);
  }

  return validateClientConfig(parsedJson);
}

export function validateClientConfig(value: unknown): ClientConfig {
  const parsed = ClientConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw new ClientConfigError(parsed.error.issues.map((issue) => issue.message).join("; "));
  }

  return parsed.data;
}

export function createAuthMiddleware(auth: AuthConfig): Middleware {
  switch (auth.type) {
    case "basic":
      return new BasicAuthMiddleware(auth.username, auth.password);
    case "bearer":
      return new ApiKeyAuthMiddleware(auth.apiKey);
  }
}
