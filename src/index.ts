/**
 * Main entry point - exports all public APIs
 */

export { AuditTrail, SCHEMA_VERSION, SIGNATURE_COLUMNS, skipped, succeeded } from './audit_trail';
export type {
    AuditTrailOptions,
    FinishRunOptions,
    RunRecord,
    RunSignatures,
    RunStatus,
    SignatureKind,
    StartRunOptions,
    StepHandle,
    StepRecord,
    StepResult,
    TerminalStatus
} from './audit_trail';
export { runCommand, runCommandOrThrow } from './command_runner';
export type { CommandOptions, CommandResult } from './command_runner';
export { runComposite } from './composite';
export type { CompositeDefinition, CompositeReport } from './composite';
export { loadKernelConfig, loadRuntimeSettings, parseKernelConfig, substituteCommand } from './config';
export type { FsyncMode, JobConfig, KernelConfig, RuntimeSettings } from './config';
export { Outcome, decide, describeOutcome, explainDecision, requiresRebuild } from './decision_engine';
export type { Decision, DecisionInput } from './decision_engine';
export { ERRORS, KernelError, isKernelError } from './errors';
export type { ErrorCode, Severity } from './errors';
export {
    canonicalize,
    combineSignatures,
    compileExcludes,
    contentHash,
    fileExists,
    hashDocument,
    quickSignature,
    sha256Hex,
    signaturesEqual
} from './fingerprint';
export type { ExcludeMatcher, Signature } from './fingerprint';
export { commandBuild, jobFromConfig, newRunId, runIdempotentJob } from './job_runner';
export type { BuildContext, JobDefinition, JobDeps, JobReport, RunJobOptions } from './job_runner';
export { createLogger, silentLogger } from './logger';
export type { LogLevel, LogSink, Logger, LoggerOptions } from './logger';
export * from './publish';
export { SchemaValidator } from './schema_validator';
export type { JsonSchema, ValidationResult } from './schema_validator';
export { loadState, newStateRecord, parseStateDocument, readPriorState, saveState, serializeStateRecord } from './state_store';
export type { PriorState, StateRecord } from './state_store';
