import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
config();

// Define environment variable schema with Zod for type-safe validation
const envSchema = z
  .object({
    // Node environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Server configuration
    PORT: z.string().default('3000').transform(Number),

    // Storage backend
    DATA_STORE: z.enum(['supabase', 'memory']).default('supabase'),
    SUPABASE_URL: z.string().url('Invalid Supabase URL').optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, 'Supabase service role key is required').optional(),
    STORAGE_TIMEOUT_MS: z.string().default('5000').transform(Number),

    // Authentication
    JWT_SECRET: z.string().min(1, 'JWT secret is required'),
    JWT_EXPIRES_IN_SECONDS: z
      .string()
      .default(String(60 * 60 * 24 * 30))
      .transform(Number),
    BCRYPT_ROUNDS: z.string().default('12').transform(Number),

    // First quartermaster account, created when the users table is empty
    DEFAULT_QUARTERMASTER_USERNAME: z.string().min(1).default('admin'),
    DEFAULT_QUARTERMASTER_PASSWORD: z.string().min(8).optional(),

    // Logging configuration
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

    // CORS configuration
    ALLOWED_ORIGINS: z.string().default('*'),
  })
  .superRefine((value, ctx) => {
    if (value.DATA_STORE === 'supabase' && (!value.SUPABASE_URL || !value.SUPABASE_SERVICE_ROLE_KEY)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_URL'],
        message: 'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required when DATA_STORE=supabase',
      });
    }

    // Production must not run with a short or placeholder secret
    if (value.NODE_ENV === 'production' && value.JWT_SECRET.trim().length < 32) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['JWT_SECRET'],
        message: 'JWT_SECRET must be at least 32 characters in production',
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

// Log environment on startup
if (env.NODE_ENV !== 'test') {
  console.log('✅ Environment variables validated successfully');
  console.log(`📝 Environment: ${env.NODE_ENV}`);
  console.log(`🚀 Port: ${env.PORT}`);
  console.log(`🗄️  Data store: ${env.DATA_STORE}`);
}
