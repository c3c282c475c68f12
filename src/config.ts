/**
 * config.ts - Environment configuration for the vector engine
 *
 * Reads the provider, connection URL and embedding settings from environment
 * variables and validates them with zod, so a typo in EMBEDDING_DIMENSIONS
 * fails at startup instead of at the first FT.CREATE.
 *
 * | Variable              | Default                  |
 * |-----------------------|--------------------------|
 * | VECTOR_DB_PROVIDER    | valkey                   |
 * | VECTOR_DB_URL         | valkey://localhost:6379  |
 * | VECTOR_DB_TLS         | false                    |
 * | VOYAGE_API_KEY        | (none)                   |
 * | EMBEDDING_MODEL       | voyage-4                 |
 * | EMBEDDING_DIMENSIONS  | 1024                     |
 */

import { z } from "zod";
import { isValidConnectionUrl } from "./vectorstore/connection";
import { VectorEngineInitializationError } from "./vectorstore/errors";

export const DEFAULT_VECTOR_DB_URL = "valkey://localhost:6379";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

export const EnvConfigSchema = z.object({
  VECTOR_DB_PROVIDER: z.string().min(1).default("valkey"),
  VECTOR_DB_URL: z
    .string()
    .default(DEFAULT_VECTOR_DB_URL)
    .refine(isValidConnectionUrl, {
      message: "must be a URL like valkey://host:port",
    }),
  VECTOR_DB_TLS: booleanFlag,
  VOYAGE_API_KEY: z.string().min(1).optional(),
  EMBEDDING_MODEL: z.string().min(1).default("voyage-4"),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1024),
});

/**
 * Validated configuration in the shape the engine factories take.
 */
export interface EngineConfig {
  provider: string;
  url: string;
  useTls: boolean;
  embedding: {
    apiKey?: string;
    model: string;
    dimensions: number;
  };
}

/**
 * Loads and validates configuration from the environment.
 *
 * @param env - Variables to read (defaults to process.env)
 * @throws VectorEngineInitializationError listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): EngineConfig {
  const parsed = EnvConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new VectorEngineInitializationError(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    provider: values.VECTOR_DB_PROVIDER,
    url: values.VECTOR_DB_URL,
    useTls: values.VECTOR_DB_TLS,
    embedding: {
      apiKey: values.VOYAGE_API_KEY,
      model: values.EMBEDDING_MODEL,
      dimensions: values.EMBEDDING_DIMENSIONS,
    },
  };
}
