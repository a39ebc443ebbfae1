// ─── Daemon Module Exports ───────────────────────────────────────────────────

export { ControlDaemon, DaemonState } from './server';
export type { DaemonExit, SyncRunner, ControlDaemonOptions } from './server';
export { Supervisor } from './supervisor';
export type { SupervisorOptions, WorkerLauncher, WorkerProcess } from './supervisor';
export { createAgent, createLogger, runWorker, EXIT_OK, EXIT_FATAL, EXIT_RESTART } from './worker';
export type { Agent } from './worker';
export { loadConfig, validateRaw, ensureDirectories, parseTOML } from './config';
export type { AgentConfig } from './config';
export { Logger } from './log';
export type { LogLevel, LogEntry } from './log';
export { Reconciler } from './reconciler';
export type { SyncReport, ReconcilerDeps } from './reconciler';
export { ControlServer } from './controlServer';
export { dispatchCommand, parseCommand, CONTROL_COMMANDS } from './commands';
export type { ControlCommand, CommandTarget } from './commands';
