import { z } from "zod";

export const HttpMethodSchema = z
  .string()
  .trim()
  .min(1, "Method is required")
  .regex(/^[A-Z]+$/, "Method must be upper-case letters");

export const RequestUrlSchema = z
  .string()
  .min(1, "URL is required")
  .regex(/^\S*$/, "URL must not contain whitespace")
  .url("Invalid URL");

export const BasicAuthCredentialsSchema = z.object({
  username: z.string().refine((value) => !value.includes(":"), {
    message: "Basic auth username must not contain ':'",
  }),
  password: z.string(),
});

export const ApiKeySchema = z
  .string()
  .min(1, "API key is required")
  .regex(/^[\x21-\x7E]*$/, "API key must contain only visible ASCII characters");

export const BasicAuthConfigSchema = BasicAuthCredentialsSchema.extend({
  type: z.literal("basic"),
});

export const BearerAuthConfigSchema = z.object({
  type: z.literal("bearer"),
  apiKey: ApiKeySchema,
});

export const AuthConfigSchema = z.discriminatedUnion("type", [
  BasicAuthConfigSchema,
  BearerAuthConfigSchema,
]);

export const ClientConfigSchema = z
  .object({
    auth: AuthConfigSchema.optional(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict();

export type BasicAuthCredentials = z.infer<typeof BasicAuthCredentialsSchema>;
export type AuthConfig = z.infer<typeof AuthConfigSchema>;
export type ClientConfig = z.infer<typeof ClientConfigSchema>;
