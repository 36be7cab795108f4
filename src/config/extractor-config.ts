// src/config/extractor-config.ts
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError, describeError } from '../types/errors';
import { FileHelpers } from '../utils/file-helpers';

const ExtractorConfigSchema = z.object({
  outputDir: z.string().min(1).optional(),
  datasets: z.array(z.string().min(1)).optional(),
  separator: z.string().min(1).optional(),
}).strict();

export type ExtractorConfig = z.infer<typeof ExtractorConfigSchema>;

/**
 * Load and validate an extractor JSON config file
 */
export function loadExtractorConfig(configPath: string): ExtractorConfig {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigurationError(`Config file not found: ${resolved}`);
  }

  let raw: unknown;
  try {
    raw = FileHelpers.readJsonFile(resolved);
  } catch (error) {
    throw new ConfigurationError(`Could not read config ${resolved}: ${describeError(error)}`);
  }

  const result = ExtractorConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid extractor config ${resolved}: ${issues}`);
  }

  return result.data;
}

/**
 * "a, b,,c" -> ["a", "b", "c"]
 */
export function parseList(value: string): string[] {
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}
