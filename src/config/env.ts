import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  PIPELINE_CONFIG: z.string().min(1).default('config.yaml'),
  OUTPUT_DIR: z.string().min(1).default('output'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info')
});

export type AppConfig = z.infer<typeof envSchema> & {
  resolvedConfigPath: string;
  resolvedOutputDir: string;
};

export function loadConfig(
  overrides: { configPath?: string; outputDir?: string } = {},
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const parsed = envSchema.parse({
    PIPELINE_CONFIG: nonBlank(env.PIPELINE_CONFIG),
    OUTPUT_DIR: nonBlank(env.OUTPUT_DIR),
    LOG_LEVEL: nonBlank(env.LOG_LEVEL)?.toLowerCase()
  });
  const PIPELINE_CONFIG = overrides.configPath ?? parsed.PIPELINE_CONFIG;
  const OUTPUT_DIR = overrides.outputDir ?? parsed.OUTPUT_DIR;

  return {
    ...parsed,
    PIPELINE_CONFIG,
    OUTPUT_DIR,
    resolvedConfigPath: path.resolve(PIPELINE_CONFIG),
    resolvedOutputDir: path.resolve(OUTPUT_DIR)
  };
}

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim() ?? '';
  return trimmed.length > 0 ? trimmed : undefined;
}
