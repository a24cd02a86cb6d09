/**
 * Configuration exports
 * @module config
 */

export {
  DEFAULT_GAUGE_CONFIG,
  DEFAULT_PREPROCESS_CONFIG,
  ENV_VARS,
  EXIT_CODES,
  CONFIRMATION_LINE_COLOR,
} from './defaults';

export { resolveRunConfig, wantsHelp, USAGE, CLI_OPTIONS } from './run-config';
