// Re-export core functionality
export * from './core/index.js';

// Export CLI utilities
export {
  formatValue,
  formatSelector,
  formatOutline,
  formatTokens,
  formatParseIssue,
  formatFileReport,
  formatReport,
  formatCheckResult,
} from './formatter.js';
export {
  CONFIG_FILES,
  findConfig,
  loadConfigFile,
  validateConfig,
  generateDefaultConfig,
  writeConfigFile,
  parseSimpleYaml,
} from './config.js';
export { createLogger, type LoggerOptions } from './logger.js';
