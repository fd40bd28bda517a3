/**
 * Main entry point - exports all public APIs
 */

export { ConversationStore } from './conversation_store';
export type { StoredMessage, ConversationSnapshot, ConversationStoreOptions } from './conversation_store';
export { extract, extractCodeBlocks, extractQuestions } from './response_parser';
export type { ParsedResponse } from './response_parser';
export { extractFirstJsonObject } from './json_extract';
export { Verifier, parseVerdict } from './verifier';
export type { Verdict, VerifierOptions } from './verifier';
export { RefinementLoop, NO_FEEDBACK } from './refinement';
export { ArtifactAcceptor } from './artifact_acceptance';
export { ArtifactWriter, sanitizeBranchName } from './artifact_writer';
export type { ArtifactStage } from './artifact_writer';
export { CommandChecker, expandCommand, runCommand } from './artifact_checker';
export type { ArtifactChecks, CommandResult, CommandRunner } from './artifact_checker';
export { ArtifactLedger } from './artifact_ledger';
export type { ArtifactRecord, ArtifactStatus, LedgerSummary, NewArtifactRecord } from './artifact_ledger';
export { ModelRouter, ConcurrencyLimiter, backoffDelayMs } from './model_router';
export type {
    ChatBackend,
    BackendResult,
    GenerateOptions,
    GenerationCapability,
    ModelMessage,
    ModelRole,
    ModelRouterConfig
} from './model_router';
export { OpenAICompatibleBackend, TritonBackend, createChatBackend } from './chat_backends';
export { ModelRegistry } from './model_registry';
export { AutoAnswerInput, ConsoleHumanInput } from './human_input';
export type { HumanInput } from './human_input';
export { RecursiveOrchestrator, countArtifacts } from './recursive_orchestrator';
export type { RunReport, RunRequest, TurnOutcome, TurnStatus } from './recursive_orchestrator';
export { DEFAULT_CONFIG, DEFAULT_CONFIG_FILE, loadConfig, parseConfig, writeDefaultConfig } from './config';
export type { BuilderConfig, ModelSource } from './config';
export { configureLogging, createLogger } from './logger';
export type { Logger, LogLevel } from './logger';
export {
    BuilderError,
    ConfigError,
    GenerationError,
    StoreWriteError,
    ArtifactWriteError,
    ValidationError,
    ErrorFactory
} from './structured_error';
export type { ErrorCode, StructuredError } from './structured_error';
