import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const toNumber = (fallback: number) => (value: unknown) => {
  if (value === undefined || value === null || value === "") {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const toBoolean = (value: unknown) => value === true || value === "true";

const emptyToUndefined = (value: unknown) => (value === "" ? undefined : value);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.preprocess(toNumber(3005), z.number().int().min(1).max(65535)),
  DEV_MODE: z.preprocess(toBoolean, z.boolean()).default(false),
  TRUST_PROXY: z.preprocess(toBoolean, z.boolean()).default(false),
  SERVICE_BIND_ADDRESS: z.string().optional(),
  BODY_LIMIT_BYTES: z.preprocess(toNumber(64 * 1024), z.number().int().min(1024)),
  RATE_LIMIT_MAX_PER_MINUTE: z.preprocess(toNumber(120), z.number().int().min(1).max(10_000)),
  SERVICE_JWT_SECRET_SOCIAL: z.preprocess(emptyToUndefined, z.string().min(32).optional()),
  SERVICE_JWT_AUDIENCE_SOCIAL: z.string().default("perch.service.social"),
  ALLOW_INSECURE_DEV_AUTH: z.preprocess(toBoolean, z.boolean()).default(false),
  REWARD_TOKEN_DECIMALS: z.preprocess(toNumber(18), z.number().int().min(0).max(36)),
  LIKE_REWARD_TOKENS: z.preprocess(toNumber(10), z.number().int().min(1).max(1_000_000)),
  USERNAME_MAX_LENGTH: z.preprocess(toNumber(64), z.number().int().min(1).max(256)),
  BIO_MAX_LENGTH: z.preprocess(toNumber(300), z.number().int().min(0).max(4000)),
  POST_MAX_LENGTH: z.preprocess(toNumber(4000), z.number().int().min(1).max(65_536)),
  COMMENT_MAX_LENGTH: z.preprocess(toNumber(2000), z.number().int().min(1).max(65_536))
});

export type SocialServiceConfig = z.infer<typeof envSchema> & { SERVICE_BIND_ADDRESS: string };

export const parseConfig = (env: Record<string, string | undefined>): SocialServiceConfig => {
  const parsed = envSchema.parse(env);
  if (parsed.NODE_ENV === "production" && parsed.ALLOW_INSECURE_DEV_AUTH) {
    throw new Error("insecure_dev_auth_not_allowed_in_production");
  }
  if (parsed.NODE_ENV === "production" && !parsed.SERVICE_JWT_SECRET_SOCIAL) {
    throw new Error("service_jwt_secret_required_in_production");
  }
  const serviceBindAddress =
    parsed.SERVICE_BIND_ADDRESS ?? (parsed.NODE_ENV === "production" ? "127.0.0.1" : "0.0.0.0");
  return { ...parsed, SERVICE_BIND_ADDRESS: serviceBindAddress };
};

export const config = parseConfig(process.env);
