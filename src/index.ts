export {
  HostRegistry,
  dedupeRecords,
  renderHostTable,
  sameRecord,
  type AddResult,
  type HostFile,
  type HostListRow,
  type HostLookup,
  type HostRecord,
} from "./host-registry.js";
export {
  SshSession,
  connectSession,
  dialSsh2,
  withSession,
  type ChannelOutput,
  type ConnectOptions,
  type Dialer,
  type RemoteSession,
  type SessionConnector,
} from "./session.js";
export {
  CommandDispatcher,
  buildRunCommand,
  hasWildcard,
  planLocalRun,
  resolveLocalScripts,
  type LocalRunPlan,
} from "./dispatcher.js";
export {
  TransferDriver,
  type TransferPlan,
  type TransferSummary,
} from "./transfer.js";
export {
  generateJobs,
  parseMapping,
  parseTable,
  renderJob,
  validateBatch,
  writeExamples,
  writeTemplate,
  type MappingEntry,
  type PbsBatch,
} from "./pbs.js";
export {
  JobSubmitter,
  checkJobs,
  deploy,
  listRemoteJobs,
  submitRemote,
  type SubmitReport,
} from "./submitter.js";
export { defaultCommandRunner, type CommandResult, type CommandRunner } from "./exec.js";
export { resolveSettings, getConfigHome, type Settings } from "./settings.js";
export {
  ConsoleLogger,
  MemoryLogger,
  NullLogger,
  StructuredLogger,
  type Logger,
  type LogLevel,
} from "./logger.js";
export * from "./errors.js";
export { buildProgram } from "./cli.js";
