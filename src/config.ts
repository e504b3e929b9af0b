import path from 'path';
import { z } from 'zod';

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((value) => (typeof value === 'boolean' ? value : ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase())));

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  OVERPASS_ENDPOINT: z.string().url().default('https://overpass-api.de/api/interpreter'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  POSTAL_CODE_PATTERN: z
    .string()
    .default('^\\d{5}$')
    .refine((pattern) => {
      try {
        new RegExp(pattern);
        return true;
      } catch {
        return false;
      }
    }, 'POSTAL_CODE_PATTERN must be a valid regular expression'),
  ADDRESS_CACHE_TTL_SECONDS: z.coerce.number().min(0).default(600),
  MAP_ZOOM: z.coerce.number().int().min(1).max(20).default(17),
  MAP_SIZE: z
    .string()
    .regex(/^\d+x\d+$/, 'MAP_SIZE must look like 400x400')
    .default('400x400'),
  GOOGLE_MAPS_API_KEY: optionalString,
  CREDENTIAL_FILE: z.string().default(path.join('.civiceye', 'api_key')),
  IMAGE_EMBEDDING_MODEL: z.string().min(1).default('Xenova/clip-vit-base-patch32'),
  TRANSFORMERS_CACHE_DIR: optionalString,
  LOCAL_MODEL_PATH: optionalString,
  ALLOW_REMOTE_MODELS: booleanFlag.default(true),
  PRELOAD_MODEL: booleanFlag.default(false),
  USER_AGENT: z.string().default('CivicEye/0.1 (address verification)'),
});

export interface AppConfig {
  port: number;
  requestTimeoutMs: number;
  userAgent: string;
  addressQuery: {
    endpoint: string;
    postalCodePattern: RegExp;
    cacheTtlMs: number;
  };
  maps: {
    zoom: number;
    size: string;
    apiKey?: string;
    credentialFile: string;
  };
  embedding: {
    modelId: string;
    cacheDir?: string;
    localModelPath?: string;
    allowRemoteModels: boolean;
    preload: boolean;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    userAgent: values.USER_AGENT,
    addressQuery: {
      endpoint: values.OVERPASS_ENDPOINT,
      postalCodePattern: new RegExp(values.POSTAL_CODE_PATTERN),
      cacheTtlMs: values.ADDRESS_CACHE_TTL_SECONDS * 1000,
    },
    maps: {
      zoom: values.MAP_ZOOM,
      size: values.MAP_SIZE,
      apiKey: values.GOOGLE_MAPS_API_KEY,
      credentialFile: values.CREDENTIAL_FILE,
    },
    embedding: {
      modelId: values.IMAGE_EMBEDDING_MODEL,
      cacheDir: values.TRANSFORMERS_CACHE_DIR,
      localModelPath: values.LOCAL_MODEL_PATH,
      allowRemoteModels: values.ALLOW_REMOTE_MODELS,
      preload: values.PRELOAD_MODEL,
    },
  };
}
