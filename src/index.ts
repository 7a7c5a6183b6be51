export {
  parseMessage,
  serializeMessage,
  buildMessage,
  messageArgs,
  lastArg,
  parseSource,
  sourceNick,
  ircLower,
  ircEquals,
  isNumeric,
  MAX_LINE_BYTES,
  MAX_MIDDLE_PARAMS,
  type IRCMessage,
  type InboundMessage,
  type MessageSource,
} from './protocol/message.js';

export {
  NUMERICS,
  REGISTRATION_FAILURES,
  JOIN_REJECTIONS,
  numericName,
  type NumericName,
  type NumericCode,
} from './protocol/numerics.js';

export { Connection, type ConnectionState, type ConnectOptions } from './client/connection.js';

export {
  ClientSession,
  type RegistrationState,
  type Endpoint,
  type SessionIdentity,
  type SessionOptions,
  type ExpectOptions,
  type ProtocolViolation,
} from './client/session.js';

export * from './client/matchers.js';
export * from './client/assertions.js';

export { Orchestrator, type OrchestratorOptions } from './orchestrator/orchestrator.js';
export { BarrierSet } from './orchestrator/barrier.js';
export type {
  Verdict,
  ScenarioResult,
  SessionRequest,
  ScenarioContext,
  ScenarioBody,
  Scenario,
  Suite,
} from './orchestrator/types.js';

export {
  ALL_SUITES,
  runAllSuites,
  runSuites,
  singleUserSuite,
  multiUserSuite,
  defineSuite,
  scenario,
  joinChannel,
  expectJoinRejected,
  sendAndExpectNumeric,
  setChannelMode,
  type RunOptions,
} from './suites/index.js';

export {
  ConformanceError,
  ParseError,
  ConnectError,
  ConnectionClosedError,
  RegistrationError,
  TimeoutError,
  ScenarioError,
  ScenarioTimeoutError,
  SuiteAbortError,
  describeFailure,
} from './errors.js';

export { loadConfig, DEFAULT_TIMEOUTS, type ConformanceConfig } from './config.js';
export { createLogger, isDebugEnabled, type Logger } from './log.js';
export { formatReport, printReport, summarize, type ReportOptions, type ReportSummary } from './reporters/readable-report.js';
