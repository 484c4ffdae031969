import fs from 'fs';
import path from 'path';

import yaml from 'js-yaml';
import { z } from 'zod';

import { ConfigError } from './errors';

// Define schema for the job configuration file
const JobConfigSchema = z.object({
  seed: z.number({ invalid_type_error: "The 'seed' must be a number" }).int(),
  window: z
    .number({ invalid_type_error: "The 'window' must be a number" })
    .int()
    .min(1, "The 'window' must be at least 1"),
  version: z.string({ invalid_type_error: "The 'version' must be text" }),
});

// Type for the validated config
export type JobConfig = z.infer<typeof JobConfigSchema>;

export const DEFAULT_CONFIG_FILE = 'config.yaml';

/**
 * Configuration written by the `init` command
 */
export const DEFAULT_CONFIG: JobConfig = {
  seed: 42,
  window: 5,
  version: 'v1',
};

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map(issue => {
    const issuePath = issue.path.join('.');
    return issuePath ? `${issuePath}: ${issue.message}` : issue.message;
  });

/**
 * Validate an already-parsed configuration document
 */
export const parseJobConfig = (configData: unknown): JobConfig => {
  if (typeof configData !== 'object' || configData === null || Array.isArray(configData)) {
    throw new ConfigError('The config file must contain a mapping of settings (key: value pairs).');
  }

  const result = JobConfigSchema.safeParse(configData);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid configuration file:\n- ${issues.join('\n- ')}`, issues);
  }
  return result.data;
};

/**
 * Load configuration from a YAML file
 *
 * @param configPath - Path to the configuration file
 * @returns Validated configuration object
 */
export const loadJobConfig = (configPath: string): JobConfig => {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  let configData: unknown;
  try {
    configData = yaml.load(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigError(
      `Error loading config file: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseJobConfig(configData);
};

/**
 * Creates a default configuration file if none exists
 *
 * @returns true when a file was written
 */
export const createDefaultConfigFile = (configPath: string = DEFAULT_CONFIG_FILE): boolean => {
  const resolvedPath = path.resolve(configPath);
  if (fs.existsSync(resolvedPath)) {
    return false;
  }

  const yamlContent = yaml.dump(DEFAULT_CONFIG, {
    indent: 2,
    lineWidth: 100,
    quotingType: '"',
  });

  fs.writeFileSync(resolvedPath, yamlContent, 'utf8');
  return true;
};
