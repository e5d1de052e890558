import { z } from "zod";

export { createLogger, type Logger, type LogSink } from "./logger";

const booleanFlag = z
  .union([z.literal("true"), z.literal("false"), z.literal("1"), z.literal("0")])
  .transform((value) => value === "true" || value === "1");

export const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    LISTING_BUCKET: z.string().trim().optional(),
    S3_REGION: z.string().trim().min(1).default("us-east-1"),
    S3_ENDPOINT: z.string().trim().optional(),
    S3_ACCESS_KEY: z.string().min(1).optional(),
    S3_SECRET_KEY: z.string().min(1).optional(),
    LISTING_INDEX_FILE: z.string().trim().min(1).default("index.html"),
    LISTING_MAX_BYTES: z.coerce.number().int().positive().default(1_000_000),
    LISTING_TRAILING_SLASH: booleanFlag.default("true"),
    LISTING_VERBOSE: booleanFlag.default("false"),
    PREVIEW_PORT: z.coerce.number().int().min(1).max(65535).default(3300),
  })
  .refine((env) => Boolean(env.S3_ACCESS_KEY) === Boolean(env.S3_SECRET_KEY), {
    message: "S3_ACCESS_KEY and S3_SECRET_KEY must be set together",
    path: ["S3_ACCESS_KEY"],
  });

export type AppEnv = z.infer<typeof envSchema>;

export type S3Config = {
  /** Unset on the edge, where the bucket comes from the request's S3 origin. */
  bucket?: string;
  region: string;
  endpoint?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
};

export type ListingConfig = {
  s3: S3Config;
  indexFile: string;
  maxBytes: number;
  trailingSlash: boolean;
  verbose: boolean;
};

export function loadEnv(raw: NodeJS.ProcessEnv = process.env): AppEnv {
  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid environment variables: ${message}`);
  }
  return parsed.data;
}

export function resolveListingConfig(env: AppEnv): ListingConfig {
  const credentials =
    env.S3_ACCESS_KEY && env.S3_SECRET_KEY
      ? { accessKeyId: env.S3_ACCESS_KEY, secretAccessKey: env.S3_SECRET_KEY }
      : undefined;
  return {
    s3: {
      bucket: env.LISTING_BUCKET || undefined,
      region: env.S3_REGION,
      endpoint: env.S3_ENDPOINT || undefined,
      credentials,
    },
    indexFile: env.LISTING_INDEX_FILE,
    maxBytes: env.LISTING_MAX_BYTES,
    trailingSlash: env.LISTING_TRAILING_SLASH,
    verbose: env.LISTING_VERBOSE,
  };
}
