/**
 * @arch patternloom.core.domain
 */
import { ConfigFileSchema, ConfigSchema, type Config } from './schema.js';
import { fileExists, formatZodError, loadYamlWithSchema, resolvePath } from '../../utils/index.js';
import { ConfigError, ErrorCodes, getErrorMessage } from '../../utils/errors.js';

const DEFAULT_CONFIG_PATH = '.loom/config.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = resolvePath(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigFileSchema);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.MALFORMED_FILE,
      `Failed to load config from ${fullPath}: ${getErrorMessage(error)}`,
      { path: fullPath, originalError: getErrorMessage(error) }
    );
  }
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: unknown): Config {
  const result = ConfigSchema.safeParse(partial);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.MALFORMED_FILE,
      `Invalid configuration: ${formatZodError(result.error)}`
    );
  }
  return result.data;
}

/**
 * Get the expected config file path for a project.
 */
export function getConfigPath(projectRoot: string): string {
  return resolvePath(projectRoot, DEFAULT_CONFIG_PATH);
}
