/**
 * CLI module exports
 */

export {
  checkContracts,
  contractNameOf,
  handleCheckCommand,
  type CheckContractsOptions,
  type ContractReport,
} from "./check.js";
export { formatError, locate, type SourceFile } from "./error-formatter.js";
export { formatJson, formatSummary, summarize } from "./formatters.js";
export { commonOptions, formatUsage, parseCostLimit } from "./options.js";
export { displayErrors, writeOutput, exitWithError } from "./output.js";
