/**
 * Config module - configuration resolution and artifacts
 */

export {
  ConfigError,
  PROJECT_DIR_NAME,
  resolveConfig,
  resolveCredentials,
  loadConfigFile,
  repoConfigPath,
  userConfigPath,
  generateRunId,
  setRunDirectory,
} from './resolve-config';
export type { CliFlags, Credentials, ResolveConfigOptions } from './resolve-config';
export { configFileSchema, characterProfileSchema } from './config-file.schema';
export type { ConfigFile } from './config-file.schema';
export {
  EFFECTIVE_CONFIG_FILE,
  writeEffectiveConfigArtifact,
  formatEffectiveConfigForDisplay,
} from './write-effective-config';
