import dotenv from 'dotenv';
import os from 'os';
import { z } from 'zod';
import type { LoaderOptions } from '@mbox-search/mbox-core';

// Load environment variables
dotenv.config();

const optionalInt = z
  .string()
  .regex(/^\d+$/, 'must be a whole number')
  .transform((v) => parseInt(v, 10))
  .optional();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().regex(/^\d+$/).default('3001'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // File Upload
  UPLOAD_DIR: z.string().default(os.tmpdir()),
  MAX_UPLOAD_SIZE: z.string().regex(/^\d+$/).default('2147483648'), // 2 GB

  // CORS
  CORS_ORIGIN: z.string().default('*'),

  // Loader tuning; unset means the mbox-core default
  MBOX_CHUNK_SIZE: optionalInt,
  MBOX_PROGRESS_INTERVAL_BYTES: optionalInt,
  MBOX_PROGRESS_INTERVAL_MESSAGES: optionalInt,
  MBOX_MAX_HEADER_BYTES: optionalInt,
  MBOX_STRICT_BOUNDARIES: z.enum(['true', 'false']).optional(),
});

export interface ServerConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  logLevel: 'error' | 'warn' | 'info' | 'debug';
  upload: {
    directory: string;
    maxFileSize: number;
  };
  corsOrigin: string;
  loader: Partial<LoaderOptions>;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): ServerConfig {
  const env = envSchema.parse(source);

  const loader: Partial<LoaderOptions> = {};
  if (env.MBOX_CHUNK_SIZE !== undefined) loader.chunkSize = env.MBOX_CHUNK_SIZE;
  if (env.MBOX_PROGRESS_INTERVAL_BYTES !== undefined) {
    loader.progressIntervalBytes = env.MBOX_PROGRESS_INTERVAL_BYTES;
  }
  if (env.MBOX_PROGRESS_INTERVAL_MESSAGES !== undefined) {
    loader.progressIntervalMessages = env.MBOX_PROGRESS_INTERVAL_MESSAGES;
  }
  if (env.MBOX_MAX_HEADER_BYTES !== undefined) loader.maxHeaderBytes = env.MBOX_MAX_HEADER_BYTES;
  if (env.MBOX_STRICT_BOUNDARIES !== undefined) {
    loader.strictBoundaries = env.MBOX_STRICT_BOUNDARIES === 'true';
  }

  return {
    env: env.NODE_ENV,
    port: parseInt(env.PORT, 10),
    logLevel: env.LOG_LEVEL,
    upload: {
      directory: env.UPLOAD_DIR,
      maxFileSize: parseInt(env.MAX_UPLOAD_SIZE, 10),
    },
    corsOrigin: env.CORS_ORIGIN,
    loader,
  };
}

export const config = loadConfig();
