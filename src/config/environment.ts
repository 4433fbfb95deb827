import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
config();

const booleanFlag = (defaultValue: 'true' | 'false') =>
  z
    .string()
    .default(defaultValue)
    .transform((val) => val === 'true');

// Define environment variable schema with Zod for type-safe validation
const envSchema = z
  .object({
    // Node environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Server configuration
    PORT: z.string().default('5000').transform(Number),

    // Item store
    STORE_DRIVER: z.enum(['sqlite', 'supabase']).default('sqlite'),
    SQLITE_PATH: z.string().min(1).default('data/labels.db'),
    SUPABASE_URL: z.string().url('Invalid Supabase URL').optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),

    // Lease configuration
    LEASE_DURATION_SECONDS: z
      .string()
      .default('300')
      .transform(Number)
      .pipe(z.number().int().positive('Lease duration must be positive')),

    // Collaborators
    TAXONOMY_PATH: z.string().min(1).default('config.json'),
    IMAGE_DIRECTORY: z.string().min(1).optional(),
    SYNC_ON_NEXT: booleanFlag('true'),
    STRICT_LABELS: booleanFlag('false'),
    RELEASE_ON_STARTUP: booleanFlag('true'),

    // Logging configuration
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

    // CORS configuration
    ALLOWED_ORIGINS: z.string().default('*'),
  })
  .superRefine((val, ctx) => {
    if (val.STORE_DRIVER !== 'supabase') return;
    if (!val.SUPABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_URL'],
        message: 'SUPABASE_URL is required when STORE_DRIVER=supabase',
      });
    }
    if (!val.SUPABASE_SERVICE_ROLE_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_SERVICE_ROLE_KEY'],
        message: 'SUPABASE_SERVICE_ROLE_KEY is required when STORE_DRIVER=supabase',
      });
    }
  });

export type Environment = z.infer<typeof envSchema>;

// Parse and validate environment variables
const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const errorMessage = `❌ Invalid environment variables: ${JSON.stringify(parsed.error.format(), null, 2)}`;
  console.error(errorMessage);
  throw new Error(errorMessage);
}

// Export validated environment variables
export const env = parsed.data;

// Default lease duration in milliseconds (config.json may override it)
export const LEASE_DURATION_MS = env.LEASE_DURATION_SECONDS * 1000;

/**
 * Allowed CORS origins; `true` reflects any origin
 */
export const corsOrigins = (): string[] | true => {
  if (env.ALLOWED_ORIGINS.trim() === '*') return true;
  return env.ALLOWED_ORIGINS.split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
};

// Log environment on startup
if (env.NODE_ENV !== 'test') {
  console.log('✅ Environment variables validated successfully');
  console.log(`📝 Environment: ${env.NODE_ENV}`);
  console.log(`🚀 Port: ${env.PORT}`);
  console.log(`🗄️  Store: ${env.STORE_DRIVER}`);
  console.log(`⏱️  Lease duration: ${env.LEASE_DURATION_SECONDS} seconds`);
}
