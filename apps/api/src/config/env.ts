import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

// Reads .env from the working directory; variables already set win
loadDotenv();

const environmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).or(z.literal('local')).default('development'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().max(65535).default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  // Window CPU busy time is measured over; scrapes never sample less than a second
  CPU_SAMPLE_WINDOW_MS: z.coerce.number().int().min(1000).default(1000),
});

export type Environment = z.infer<typeof environmentSchema>;

export const parseEnvironment = (source: NodeJS.ProcessEnv): Environment => {
  const parsed = environmentSchema.safeParse(source);

  if (!parsed.success) {
    console.error('❌ Invalid environment configuration', parsed.error.format());
    throw new Error('Invalid environment configuration');
  }

  return parsed.data;
};

export const env = parseEnvironment(process.env);
