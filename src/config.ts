// src/config.ts
import dotenv from "dotenv";
import { z } from "zod";
import {
  DEFAULT_HISTOGRAM_BUCKETS,
  DEFAULT_MAX_INPUT_LENGTH,
  MAX_HISTOGRAM_BUCKETS,
} from "./constants.js";

// Load env vars from .env file
dotenv.config();

// Define schema
export const configSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
  BASE_URL: z.optional(z.string()).default("/"),
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().min(1024).default(8080),
  HISTOGRAM_BUCKETS: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_HISTOGRAM_BUCKETS)
    .default(DEFAULT_HISTOGRAM_BUCKETS),
  MAX_INPUT_LENGTH: z.coerce
    .number()
    .int()
    .min(1)
    .default(DEFAULT_MAX_INPUT_LENGTH),
});

export type Config = z.infer<typeof configSchema>;

// Validate and parse
const config = configSchema.parse(process.env);

export default config;
