/**
 * @fileoverview Public exports for configuration.
 * @module config
 */

export { loadConfig, parseConfig, resolveConfigPath, DEFAULT_CONFIG_FILE, CONFIG_ENV } from './loadConfig';
export type { Environment, LoadedConfig } from './loadConfig';
export {
    ConfigSchema,
    SettingsSchema,
    TimeTableSourceSchema,
    PlaybackBackendSchema,
    EnabledFlagsSchema,
} from './schema';
export type { AppConfig, ConfigInput } from './schema';
