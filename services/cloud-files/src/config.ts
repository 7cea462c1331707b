import { z } from "zod";
import { LOG_LEVELS } from "./logger.js";
import type { CreateCloudFilesManagerInput } from "./storage/factory.js";

const baseSchema = z.object({
  CLOUD_FILES_FILE_NAME: z.string().min(1).default("cloud-files.bin"),
  OAUTH_REDIRECT_PORT: z.coerce.number().int().min(0).max(65535).default(8789),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info")
});

const envSchema = z.discriminatedUnion("CLOUD_FILES_PROVIDER", [
  baseSchema.extend({
    CLOUD_FILES_PROVIDER: z.literal("drive"),
    GOOGLE_API_KEY: z.string().min(1),
    GOOGLE_CLIENT_ID: z.string().min(1),
    GOOGLE_CLIENT_SECRET: z.string().min(1).optional()
  }),
  baseSchema.extend({
    CLOUD_FILES_PROVIDER: z.literal("dropbox"),
    DROPBOX_APP_KEY: z.string().min(1)
  })
]);

export type Env = z.infer<typeof envSchema>;

// Blank entries, as left by a copied .env.example, count as unset.
export function parseEnv(input: NodeJS.ProcessEnv): Env {
  const present = Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined && value !== ""));
  return envSchema.parse({
    ...present,
    CLOUD_FILES_PROVIDER: present.CLOUD_FILES_PROVIDER ?? "drive"
  });
}

export function toManagerInput(env: Env): CreateCloudFilesManagerInput {
  if (env.CLOUD_FILES_PROVIDER === "drive") {
    return {
      provider: "drive",
      apiKey: env.GOOGLE_API_KEY,
      clientId: env.GOOGLE_CLIENT_ID,
      clientSecret: env.GOOGLE_CLIENT_SECRET,
      fileName: env.CLOUD_FILES_FILE_NAME
    };
  }
  return {
    provider: "dropbox",
    clientId: env.DROPBOX_APP_KEY,
    fileName: env.CLOUD_FILES_FILE_NAME
  };
}
