import fs from 'node:fs/promises';
import path from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';
import { DEFAULT_TIMEOUT_SECONDS } from './lookup/query.js';

export const CONFIG_FILE = '.updeto.yml';

const configSchema = z
  .object({
    bundleId: z.string(),
    installedVersion: z.string(),
    country: z.string(),
    timeout: z.number().positive().finite(),
    retryCount: z.number().int().nonnegative(),
    retryDelayMs: z.number().int().nonnegative(),
    retryMissingResponse: z.boolean(),
  })
  .partial()
  .strict();

export interface Config {
  bundleId?: string;
  installedVersion?: string;
  country?: string;
  timeout: number;
  retryCount: number;
  retryDelayMs: number;
  retryMissingResponse: boolean;
}

export const defaultConfig: Config = {
  timeout: DEFAULT_TIMEOUT_SECONDS,
  retryCount: 0,
  retryDelayMs: 0,
  retryMissingResponse: false,
};

export function configPath(root: string): string {
  return path.join(root, CONFIG_FILE);
}

export async function readConfig(root: string): Promise<Config> {
  const p = configPath(root);
  let raw: string;
  try {
    raw = await fs.readFile(p, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return { ...defaultConfig };
    throw err;
  }
  return { ...defaultConfig, ...parseConfig(raw, p) };
}

export function parseConfig(raw: string, source = CONFIG_FILE): Partial<Config> {
  const parsed = configSchema.safeParse(yaml.parse(raw) ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join('.') || '(root)';
    throw new Error(
      `Invalid ${source}: ${key}: ${issue?.message ?? 'invalid value'}`,
    );
  }
  return parsed.data;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
