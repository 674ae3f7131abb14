import path from 'node:path';
import { z } from 'zod';

const envSchema = z.object({
  POSTGRES_HOST: z.string().min(1).default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_USER: z.string().min(1).default('audit'),
  POSTGRES_PASSWORD: z.string().default('auditpass'),
  POSTGRES_DB: z.string().min(1).default('auditdb'),
  EXTRACT_PATH: z.string().min(1).default('extracts'),
  EXTRACT_PATTERN: z.string().min(1).default('StudentChronicleOverview*'),
  REPORT_PATH: z.string().min(1).default('reports'),
  EXTRACT_FORMAT_PATH: z.string().min(1).default('backend/config/extract-format.yaml'),
  AUDIT_LOCK_KEY: z.coerce.number().int().default(4_127_001),
});

export type DbConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
};

export type AppConfig = {
  db: DbConfig;
  extractDir: string;
  extractPattern: string;
  reportDir: string;
  extractFormatPath: string;
  lockKey: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    db: {
      host: parsed.POSTGRES_HOST,
      port: parsed.POSTGRES_PORT,
      user: parsed.POSTGRES_USER,
      password: parsed.POSTGRES_PASSWORD,
      database: parsed.POSTGRES_DB,
    },
    extractDir: path.resolve(process.cwd(), parsed.EXTRACT_PATH),
    extractPattern: parsed.EXTRACT_PATTERN,
    reportDir: path.resolve(process.cwd(), parsed.REPORT_PATH),
    extractFormatPath: path.resolve(process.cwd(), parsed.EXTRACT_FORMAT_PATH),
    lockKey: parsed.AUDIT_LOCK_KEY,
  };
}
