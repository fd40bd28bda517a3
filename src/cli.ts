#!/usr/bin/env node
/**
 * CLI Entry Point for the recursive builder
 */

import * as fs from 'fs';
import { ArtifactAcceptor } from './artifact_acceptance';
import { CommandChecker } from './artifact_checker';
import { ArtifactLedger } from './artifact_ledger';
import { ArtifactWriter } from './artifact_writer';
import { createChatBackend } from './chat_backends';
import { BuilderConfig, DEFAULT_CONFIG_FILE, loadConfig, writeDefaultConfig } from './config';
import { ConversationStore } from './conversation_store';
import { AutoAnswerInput, ConsoleHumanInput, HumanInput } from './human_input';
import { configureLogging } from './logger';
import { ModelRouter } from './model_router';
import { DEFAULT_ROOT_PROMPT, DEFAULT_SYSTEM_MESSAGE } from './prompts';
import { RecursiveOrchestrator, TurnOutcome, countArtifacts } from './recursive_orchestrator';
import { RefinementLoop } from './refinement';
import { BuilderError, ValidationError, describeError } from './structured_error';
import { Verifier } from './verifier';

const DEFAULT_BRANCH = 'root';

interface RunArgs {
    configPath: string;
    branch: string;
    prompt: string | null;
    promptFile: string | null;
    autoAnswer: boolean;
}

/** `--flag value` lookup; null when absent, throws when the value is missing. */
function optionValue(args: string[], flag: string): string | null {
    const i = args.indexOf(flag);
    if (i === -1) return null;
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
        throw new ValidationError(`${flag} requires a value`);
    }
    return value;
}

class RecursiveBuilderCLI {
    async run(argv: string[]): Promise<void> {
        const command = argv[2] || 'help';
        const args = argv.slice(3);

        switch (command) {
            case 'init':
                this.runInit(args);
                break;
            case 'run':
                await this.runBuild(args);
                break;
            case 'branches':
                this.runBranches(args);
                break;
            case 'show':
                this.runShow(args);
                break;
            case 'reset':
                this.runReset(args);
                break;
            case 'status':
                this.runStatus(args);
                break;
            case 'help':
            case '--help':
            case '-h':
                this.showHelp();
                break;
            default:
                console.error(`Unknown command: ${command}\n`);
                this.showHelp();
                process.exitCode = 1;
        }
    }

    private loadConfig(configPath: string | null): BuilderConfig {
        const config = loadConfig(configPath ?? DEFAULT_CONFIG_FILE);
        configureLogging(config.logging);
        return config;
    }

    private openStore(config: BuilderConfig): ConversationStore {
        return new ConversationStore({ filePath: config.conversationFile, maxLength: config.maxConversationLength });
    }

    private runInit(args: string[]): void {
        const configPath = optionValue(args, '--config') ?? DEFAULT_CONFIG_FILE;
        writeDefaultConfig(configPath);
        console.log('Created config file:', configPath);
        console.log('\nNext steps:');
        console.log('   1. Export DEEPSEEK_API_KEY or OPENAI_API_KEY (or set model_source to "local")');
        console.log('   2. Run: recursive-builder run --prompt "Describe the application"');
    }

    private parseRunArgs(args: string[]): RunArgs {
        return {
            configPath: optionValue(args, '--config') ?? DEFAULT_CONFIG_FILE,
            branch: optionValue(args, '--branch') ?? DEFAULT_BRANCH,
            prompt: optionValue(args, '--prompt'),
            promptFile: optionValue(args, '--prompt-file'),
            autoAnswer: args.includes('--auto-answer'),
        };
    }

    private async runBuild(args: string[]): Promise<void> {
        const opts = this.parseRunArgs(args);
        if (opts.prompt !== null && opts.promptFile !== null) {
            console.error('Error: use either --prompt or --prompt-file, not both');
            process.exitCode = 1;
            return;
        }

        let prompt = opts.prompt ?? DEFAULT_ROOT_PROMPT;
        if (opts.promptFile !== null) {
            if (!fs.existsSync(opts.promptFile)) {
                console.error(`Error: File not found: ${opts.promptFile}`);
                process.exitCode = 1;
                return;
            }
            prompt = fs.readFileSync(opts.promptFile, 'utf-8');
        }
        if (prompt.trim().length === 0) {
            console.error('Error: prompt is empty');
            process.exitCode = 1;
            return;
        }

        const config = this.loadConfig(opts.configPath);
        const generator = new ModelRouter(createChatBackend(config), {
            maxRetries: config.maxRetries,
            retryBaseMs: config.retryBaseMs,
            retryMaxMs: config.retryMaxMs,
            maxBatchSize: config.maxBatchSize,
        });
        const store = this.openStore(config);
        const verifier = new Verifier(generator, {
            language: config.codeLanguage,
            cacheSize: config.verificationCacheSize,
        });

        // Check commands run inside the output directory.
        fs.mkdirSync(config.outputDir, { recursive: true });
        const ledger = new ArtifactLedger(config.ledgerPath);

        try {
            const acceptor = new ArtifactAcceptor({
                writer: new ArtifactWriter(config.outputDir, config.artifactExtension),
                checker: new CommandChecker({
                    lintCommand: config.checks.lintCommand,
                    testCommand: config.checks.testCommand,
                    timeoutMs: config.checks.timeoutMs,
                    cwd: config.outputDir,
                }),
                ledger,
            });
            const refinement = new RefinementLoop({
                store,
                generator,
                verifier,
                acceptor,
                language: config.codeLanguage,
            });
            const human: HumanInput = opts.autoAnswer ? new AutoAnswerInput() : new ConsoleHumanInput();

            const orchestrator = new RecursiveOrchestrator(
                { store, generator, verifier, refinement, acceptor, human },
                { maxDepth: config.maxDepth }
            );

            console.log(`Starting build on branch "${opts.branch}" (${generator.backendName}, max depth ${config.maxDepth})`);
            const report = await orchestrator.run({
                branch: opts.branch,
                prompt,
                systemMessage: DEFAULT_SYSTEM_MESSAGE,
            });

            if (!report.ok || !report.outcome) {
                console.error(`\nRun ${report.runId} failed: ${report.error?.message ?? 'unknown error'}`);
                process.exitCode = 1;
                return;
            }

            console.log(`\nRun ${report.runId} finished`);
            this.printOutcome(report.outcome, '   ');
            console.log(`   Artifacts recorded: ${countArtifacts(report.outcome)}`);
        } finally {
            ledger.close();
        }
    }

    private printOutcome(outcome: TurnOutcome, indent: string): void {
        console.log(`${indent}depth ${outcome.depth}: ${outcome.status} (${outcome.questions.length} question(s))`);
        for (const a of outcome.artifacts) {
            console.log(`${indent}  - ${a.stage} ${a.index}: ${a.status}${a.path ? ` -> ${a.path}` : ''}`);
        }
        for (const f of outcome.followUps) {
            this.printOutcome(f, indent + '  ');
        }
    }

    private runBranches(args: string[]): void {
        const store = this.openStore(this.loadConfig(optionValue(args, '--config')));
        const branches = [...store.list()].sort();
        if (branches.length === 0) {
            console.log('No branches.');
            return;
        }
        for (const b of branches) {
            console.log(`${b}\t${store.get(b).length} message(s)\t${store.size(b)} chars`);
        }
    }

    private runShow(args: string[]): void {
        const branch = args[0];
        if (!branch || branch.startsWith('--')) {
            console.error('Usage: recursive-builder show <branch> [--config <path>]');
            process.exitCode = 1;
            return;
        }
        const store = this.openStore(this.loadConfig(optionValue(args, '--config')));
        const messages = store.get(branch);
        if (messages.length === 0) {
            console.error(`Branch not found: ${branch}`);
            process.exitCode = 1;
            return;
        }
        for (const m of messages) {
            console.log(`--- #${m.id} ${m.role} @ ${m.timestamp}`);
            console.log(m.content);
        }
    }

    private runReset(args: string[]): void {
        const branch = args[0];
        if (!branch || branch.startsWith('--')) {
            console.error('Usage: recursive-builder reset <branch> [--config <path>]');
            process.exitCode = 1;
            return;
        }
        const store = this.openStore(this.loadConfig(optionValue(args, '--config')));
        if (store.delete(branch)) {
            console.log(`Deleted branch: ${branch}`);
        } else {
            console.log(`Branch not found: ${branch}`);
        }
    }

    private runStatus(args: string[]): void {
        const config = this.loadConfig(optionValue(args, '--config'));
        if (!fs.existsSync(config.ledgerPath)) {
            console.log(`No ledger at ${config.ledgerPath}; nothing has been built yet.`);
            return;
        }
        const ledger = new ArtifactLedger(config.ledgerPath);
        try {
            const summary = ledger.summary();
            console.log(`Artifacts: ${summary.total}`);
            for (const [status, n] of Object.entries(summary.byStatus)) {
                console.log(`   ${status.padEnd(13)}${n}`);
            }
            const records = ledger.list();
            if (records.length > 0) console.log('');
            for (const r of records) {
                const checks = r.lintOk === null ? '' : ` lint=${r.lintOk ? 'ok' : 'fail'} tests=${r.testsOk ? 'ok' : 'fail'}`;
                console.log(`${r.createdAt}  ${r.branch} ${r.stage} ${r.index}  ${r.status}${checks}${r.path ? `  ${r.path}` : ''}`);
            }
        } finally {
            ledger.close();
        }
    }

    private showHelp(): void {
        console.log(`recursive-builder - conversation-driven code generation

Usage: recursive-builder <command> [options]

Commands:
  init       [--config <path>]                 Write the default configuration file
  run        [--config <path>] [--branch <name>]
             [--prompt <text> | --prompt-file <path>] [--auto-answer]
                                               Run the build loop on a branch
  branches   [--config <path>]                 List stored conversation branches
  show       <branch> [--config <path>]        Print a branch's messages
  reset      <branch> [--config <path>]        Delete a branch
  status     [--config <path>]                 Summarise recorded artifacts
  help                                         Show this message

Environment:
  OPENAI_API_KEY, DEEPSEEK_API_KEY             Backend credentials
  RCB_MODEL_SOURCE, RCB_MAX_DEPTH, RCB_MAX_CONVERSATION_LENGTH,
  RCB_CONVERSATION_FILE, RCB_OUTPUT_DIR        Configuration overrides
  RCB_LOG_LEVEL, RCB_LOG_JSON, RCB_LOG_FILE    Logging`);
    }
}

// Run CLI
if (require.main === module) {
    const cli = new RecursiveBuilderCLI();
    cli.run(process.argv).catch((err: unknown) => {
        if (err instanceof BuilderError) {
            console.error(`Error [${err.code}]: ${err.message}`);
        } else {
            console.error('Fatal error:', describeError(err));
        }
        process.exit(1);
    });
}

export { RecursiveBuilderCLI };
