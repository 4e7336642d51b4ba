import { z } from 'zod';
import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';

// Load .env from the secrets mount first, then the app root
const possiblePaths = [
  '/etc/secrets/.env',
  resolve(process.cwd(), '.env'),
  resolve(__dirname, '../../.env'),
];

let envLoaded = false;
for (const envPath of possiblePaths) {
  if (existsSync(envPath)) {
    const result = dotenv.config({ path: envPath });
    if (result.error) {
      console.log(`Failed to load ${envPath}:`, result.error.message);
    } else {
      console.log(`✓ Loaded environment from: ${envPath}`);
      envLoaded = true;
      break;
    }
  }
}

if (!envLoaded) {
  console.log('No .env file found - using process environment variables only');
  dotenv.config();
}

const numeric = (fallback: string) => z.string().regex(/^\d+(\.\d+)?$/).default(fallback).transform(Number);

const envSchema = z.object({
  // Database
  DATABASE_URL: z.string().url(),

  // Selection & locking
  COOLDOWN_DAYS: numeric('7'),
  ASSIGNMENT_EXPIRY_DAYS: numeric('7'),
  EXPLORATION_RATE: numeric('0.2'),
  CONFIDENCE_LEVEL: numeric('0.95'),
  TRIGGER_WEEKLY_CAPS: z.string().optional(),
  PRICE_BASE_TABLE: z.string().optional(),

  // Feedback loop
  DECAY_HALF_LIFE_DAYS: numeric('14'),
  FEEDBACK_UPDATES_PER_DAY: numeric('4'),
  FEEDBACK_LOOKBACK_HOURS: numeric('168'),
  STAT_COUNT_CAP: numeric('100'),

  // Runtime
  RUN_MODE: z.enum(['web', 'worker']).default('web'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: numeric('3000'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
}).refine(
  (data) => data.EXPLORATION_RATE >= 0 && data.EXPLORATION_RATE <= 1,
  {
    message: 'EXPLORATION_RATE must be between 0 and 1',
    path: ['EXPLORATION_RATE'],
  }
);

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

export function validateEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  try {
    cachedEnv = envSchema.parse(process.env);
    console.log('✓ Environment validation successful');
    return cachedEnv;
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n❌ Environment validation failed:');
      error.errors.forEach((err) => {
        const varName = err.path.join('.');
        console.error(`  - ${varName}: ${err.message}`);
      });
      console.error('\nExpected configuration:');
      console.error('    - DATABASE_URL');
      console.error('    - RUN_MODE=web|worker');
      console.error('    - optional bandit tunables (see .env.example)');
      process.exit(1);
    }
    throw error;
  }
}

export const env = validateEnv();
