import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { CSV_ENCODING_NAMES, csvFormatOptionsSchema } from '@csvgrid/shared';

// Get directory of this file for reliable path resolution
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Config path relative to this file: services/ -> src/ -> api/ -> apps/ -> project root
const DEFAULT_CONFIG_PATH = path.resolve(__dirname, '../../../../config/default.json');

const csvConfigSchema = csvFormatOptionsSchema.extend({
  encoding: z.enum(CSV_ENCODING_NAMES),
  /** Largest number of rows one export request may carry */
  maxRows: z.number().int().positive(),
});

const serverConfigSchema = z.object({
  port: z.number().int().positive(),
  allowedOrigins: z.array(z.string()),
});

const loggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']),
});

const appConfigSchema = z.object({
  csv: csvConfigSchema,
  server: serverConfigSchema,
  logging: loggingConfigSchema,
});

export type CsvConfig = z.infer<typeof csvConfigSchema>;
export type ServerConfig = z.infer<typeof serverConfigSchema>;
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

let cachedConfig: AppConfig | null = null;

function resolveConfigPath(rawPath: string): string {
  const candidates: string[] = [];
  if (path.isAbsolute(rawPath)) {
    candidates.push(rawPath);
  } else {
    candidates.push(path.resolve(process.cwd(), rawPath));
    // Also resolve relative to repository root for workspace cwd drift.
    candidates.push(path.resolve(__dirname, '../../../../', rawPath));
    candidates.push(rawPath);
  }

  for (const candidate of candidates) {
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
  }

  return candidates[0] || rawPath;
}

function section(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null ? { ...value } : {};
}

/**
 * Apply environment variable overrides on top of the parsed file
 */
function applyEnvOverrides(raw: unknown): unknown {
  if (typeof raw !== 'object' || raw === null) {
    return raw;
  }

  const env = process.env;
  const source = section(raw);
  const csv = section(source.csv);
  const server = section(source.server);
  const logging = section(source.logging);

  if (env.CSV_DELIMITER) {
    csv.delimiter = env.CSV_DELIMITER;
  }
  if (env.CSV_ENCODING) {
    csv.encoding = env.CSV_ENCODING;
  }
  if (env.CSV_NEWLINE) {
    csv.newline = env.CSV_NEWLINE === 'lf' ? '\n' : env.CSV_NEWLINE === 'crlf' ? '\r\n' : env.CSV_NEWLINE;
  }
  if (env.PORT) {
    server.port = Number(env.PORT);
  }
  if (env.LOG_LEVEL) {
    logging.level = env.LOG_LEVEL;
  }

  return { ...source, csv, server, logging };
}

/**
 * Load application configuration from JSON file with environment overrides
 */
export function loadConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const requestedPath = process.env.CONFIG_PATH || DEFAULT_CONFIG_PATH;
  const configPath = resolveConfigPath(requestedPath);

  let raw: unknown;

  try {
    const configFile = fs.readFileSync(configPath, 'utf-8');
    raw = JSON.parse(configFile);
  } catch (error) {
    console.error(`Failed to load config from ${configPath} (requested: ${requestedPath}):`, error);
    throw new Error(`Configuration file not found or invalid: ${requestedPath}`);
  }

  const parsed = appConfigSchema.safeParse(applyEnvOverrides(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Configuration in ${configPath} is invalid: ${issues.join('; ')}`);
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

/**
 * Get the loaded config (must call loadConfig first)
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    return loadConfig();
  }
  return cachedConfig;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
