/**
 * Zod schemas for wire shapes, configuration and input validation.
 *
 * Wire schemas are lenient about optional members (peers may send `null`
 * for absent fields); normalization into the read-only types happens in
 * descriptor.ts and protocol.ts.
 */

import { InvalidArgumentsError } from "@switchboard/errors";
import { z } from "zod";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export const AgentAuthConfigSchema = z.object({
  type: z.enum(["apiKey", "bearer"]),
  credentials: z.string().min(1),
  headerName: z.string().min(1).optional(),
});

export const ConnectorOptionsSchema = z.object({
  timeoutMs: z.number().int().min(100).max(600_000).optional(),
  auth: AgentAuthConfigSchema.optional(),
});

export const DiscoveryOptionsSchema = z.object({
  timeoutMs: z.number().int().min(100).max(60_000).optional(),
});

// ---------------------------------------------------------------------------
// Agent Card
// ---------------------------------------------------------------------------

export const RawSkillSchema = z.object({
  id: z.string().nullish(),
  name: z.string().nullish(),
  description: z.string().nullish(),
  tags: z.array(z.string()).nullish(),
  examples: z.array(z.string()).nullish(),
});

export const RawAgentCardSchema = z.object({
  name: z.string().min(1),
  description: z.string().nullish(),
  /** Misspelled key emitted by some peers */
  desciption: z.string().nullish(),
  url: z.string().nullish(),
  version: z.string().nullish(),
  defaultInputModes: z.array(z.string()).nullish(),
  defaultOutputModes: z.array(z.string()).nullish(),
  capabilities: z
    .object({
      streaming: z.boolean().nullish(),
      pushNotifications: z.boolean().nullish(),
    })
    .nullish(),
  skills: z.array(RawSkillSchema).nullish(),
});

export type RawAgentCard = z.infer<typeof RawAgentCardSchema>;

// ---------------------------------------------------------------------------
// Messages and tasks
// ---------------------------------------------------------------------------

/** Parts without text (files, data) are accepted and dropped on normalization */
export const RawPartSchema = z.object({
  type: z.string().nullish(),
  text: z.string().nullish(),
});

export const RawMessageSchema = z.object({
  role: z.enum(["user", "agent"]),
  parts: z.array(RawPartSchema),
});

export type RawMessage = z.infer<typeof RawMessageSchema>;

export const RawTaskSchema = z.object({
  id: z.string().min(1),
  sessionId: z.string().nullish(),
  status: z.object({
    state: z.string().min(1),
    message: RawMessageSchema.nullish(),
    timestamp: z.string().nullish(),
  }),
  history: z.array(RawMessageSchema).nullish(),
});

export type RawTask = z.infer<typeof RawTaskSchema>;

// ---------------------------------------------------------------------------
// JSON-RPC envelopes
// ---------------------------------------------------------------------------

export const JsonRpcIdSchema = z.union([z.string(), z.number(), z.null()]);

export const JsonRpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const JsonRpcResponseSchema = z.union([
  z.object({
    jsonrpc: z.literal("2.0"),
    id: JsonRpcIdSchema,
    error: JsonRpcErrorSchema,
  }),
  z.object({
    jsonrpc: z.literal("2.0"),
    id: JsonRpcIdSchema,
    result: z.unknown(),
  }),
]);

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Validate and normalize an agent URL.
 * Ensures it starts with http:// or https:// and strips trailing slashes.
 */
export function normalizeAgentUrl(url: unknown): string {
  if (typeof url !== "string" || url.trim().length === 0) {
    return "";
  }
  let normalized = url.trim();
  // Strip trailing slashes
  while (normalized.endsWith("/")) {
    normalized = normalized.slice(0, -1);
  }
  // Enforce http/https scheme
  if (!normalized.startsWith("http://") && !normalized.startsWith("https://")) {
    return "";
  }
  return normalized;
}

/**
 * Validate that a message string is non-empty after trimming.
 */
export function validateMessage(message: unknown): string {
  if (typeof message !== "string" || message.trim().length === 0) {
    return "";
  }
  return message.trim();
}

/**
 * Flatten zod issues into `path: message` strings.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

/** Validate constructor options; every issue is reported at once */
export function validateOptions(schema: z.ZodTypeAny, options: unknown, label: string): void {
  const result = schema.safeParse(options ?? {});
  if (!result.success) {
    throw new InvalidArgumentsError(
      `Invalid ${label} options: ${formatIssues(result.error)}`,
      result.error.issues.map((i) => ({ field: i.path.join("."), message: i.message })),
    );
  }
}
