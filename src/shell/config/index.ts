// CHANGE: Central export file for config module
// WHY: Provides a single import point for CLI parsing and configuration loading

export { HELP, parseCLIArgs } from "./cli.js";
export { loadCoverageConfig, validateConfigDocument } from "./loader.js";
