import * as path from 'node:path';
import { ConfigSchema, ConfigFileSchema, type Config } from './schema.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

const DEFAULT_CONFIG_PATH = '.layerguard/config.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the default file doesn't exist; an empty file
 * also yields defaults. An explicitly given path must exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = configPath ? path.resolve(projectRoot, configPath) : getConfigPath(projectRoot);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigFileSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Get the expected config file path for a project.
 */
export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}
