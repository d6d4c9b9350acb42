/**
 * Configuration & Environment Management
 *
 * Application settings from config files and environment variables.
 */

export {
  Config,
  cachePolicyFrom,
  loadConfig,
  type ConfigOptions,
  type ViewOptions,
} from './config.ts';
