export { ConfigManager, expandEnvironmentVariables, parseConfig } from './ConfigManager';
