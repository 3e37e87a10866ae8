import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

export const DATABASE_TYPES = ['mysql', 'postgresql', 'sqlite'] as const;
export type DatabaseType = (typeof DATABASE_TYPES)[number];

const configSchema = z.object({
  // Camera: base URL of an endpoint that serves `/shot.jpg` (e.g. the IP Webcam app)
  cameraUrl: z.string().url().optional(),
  captureDir: z.string().min(1).default('captured_images'),
  captureTimeoutMs: z.coerce.number().int().positive().default(10000),

  // Shelf location stamped on every record captured by this process
  bookLocation: z.string().optional(),

  // Database
  dbType: z
    .string()
    .default('mysql')
    .transform((value) => value.toLowerCase())
    .pipe(
      z.enum(DATABASE_TYPES, {
        errorMap: () => ({ message: `Unsupported database type; expected one of ${DATABASE_TYPES.join(', ')}` }),
      })
    ),
  dbHost: z.string().default('localhost'),
  dbPort: z.coerce.number().int().positive().optional(), // backend default when unset
  dbUser: z.string().default('root'),
  dbPassword: z.string().default(''),
  dbName: z.string().min(1).default('booklog'),
  dbPath: z.string().optional(), // SQLite only: overrides `<dbName>.db`

  // Anthropic
  anthropicApiKey: z.string().min(1).optional(),
  llmTextModel: z.string().optional(),
  llmVisionModel: z.string().optional(),
  llmTemperature: z.coerce.number().min(0).max(1).default(0.2),
  llmMaxTokens: z.coerce.number().int().positive().default(800),

  // App
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    cameraUrl: env('CAMERA_URL'),
    captureDir: env('CAPTURE_DIR'),
    captureTimeoutMs: env('CAPTURE_TIMEOUT_MS'),
    bookLocation: env('BOOK_LOCATION'),
    dbType: env('DB_TYPE'),
    dbHost: env('DB_HOST'),
    dbPort: env('DB_PORT'),
    dbUser: env('DB_USER'),
    dbPassword: env('DB_PASSWORD'),
    dbName: env('DB_NAME'),
    dbPath: env('DB_PATH'),
    anthropicApiKey: env('ANTHROPIC_API_KEY'),
    llmTextModel: env('LLM_TEXT_MODEL'),
    llmVisionModel: env('LLM_VISION_MODEL'),
    llmTemperature: env('LLM_TEMPERATURE'),
    llmMaxTokens: env('LLM_MAX_TOKENS'),
    logLevel: env('LOG_LEVEL'),
  };

  try {
    return configSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { cause: error });
    }
    throw error;
  }
}
