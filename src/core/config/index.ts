export { ConfigLevel, ConfigEntry, CONFIG_LEVEL_ORDER } from './config-level';
export { ConfigParser } from './config-parser';
export { ConfigStore } from './config-store';
export { GitConfigManager, type ConfigLocations } from './config-manager';
