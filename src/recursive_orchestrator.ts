/**
 * Recursive Orchestrator
 *
 * One invocation per (branch, depth):
 *
 *   PROMPTING -> GENERATING -> PARSING -> VERIFYING -> QUESTIONING -> DONE
 *
 * - depth > maxDepth stops before anything is appended or generated.
 * - A blank reply stops after a warning.
 * - Code blocks of one reply are verified concurrently; their outcomes are
 *   handled in block order.
 * - Clarifying questions are answered one at a time on the same branch, each
 *   answer recursing at depth + 1.
 *
 * Only this class (and the refinement loop it awaits) appends to the store;
 * verification tasks return verdicts and never touch it.
 */

import crypto from 'crypto';
import type { ArtifactAcceptor } from './artifact_acceptance';
import type { ArtifactRecord } from './artifact_ledger';
import type { ConversationStore } from './conversation_store';
import type { HumanInput } from './human_input';
import { clearCorrelation, createLogger, setCorrelation } from './logger';
import type { GenerationCapability } from './model_router';
import { formatAnswerPrompt } from './prompts';
import { NO_FEEDBACK, RefinementLoop } from './refinement';
import { extract } from './response_parser';
import {
    BuilderError,
    ErrorFactory,
    StructuredError,
    logStructuredError,
} from './structured_error';
import type { Verdict, Verifier } from './verifier';

const log = createLogger('orchestrator');

export type TurnStatus = 'depth_exceeded' | 'empty_reply' | 'completed';

export interface TurnOutcome {
    branch: string;
    depth: number;
    status: TurnStatus;
    questions: string[];
    /** Ledger entries produced by this turn (parts and refinements), in block order. */
    artifacts: ArtifactRecord[];
    /** One outcome per answered question, in question order. */
    followUps: TurnOutcome[];
}

export interface RunRequest {
    branch: string;
    prompt: string;
    /** Seeded into the branch when it has no messages yet. */
    systemMessage?: string;
}

export interface RunReport {
    runId: string;
    ok: boolean;
    outcome?: TurnOutcome;
    error?: StructuredError;
}

export interface OrchestratorDeps {
    store: ConversationStore;
    generator: GenerationCapability;
    verifier: Verifier;
    refinement: RefinementLoop;
    acceptor: ArtifactAcceptor;
    human: HumanInput;
}

export interface OrchestratorOptions {
    maxDepth: number;
}

export class RecursiveOrchestrator {
    constructor(private readonly deps: OrchestratorDeps, private readonly opts: OrchestratorOptions) { }

    /**
     * Top-level entry. Generation exhaustion and store write failures end the
     * run and are reported in the returned RunReport; anything else propagates.
     */
    async run(request: RunRequest): Promise<RunReport> {
        const runId = crypto.randomUUID();
        setCorrelation({ runId, branch: request.branch, depth: 0 });
        this.deps.acceptor.setRunId(runId);

        try {
            if (request.systemMessage && this.deps.store.get(request.branch).length === 0) {
                this.deps.store.append(request.branch, 'system', request.systemMessage);
            }
            log.info('Run started', { branch: request.branch, max_depth: this.opts.maxDepth });

            const outcome = await this.recursivePrompt(request.branch, request.prompt, 0);
            log.info('Run finished', { branch: request.branch, artifacts: countArtifacts(outcome) });
            return { runId, ok: true, outcome };
        } catch (e) {
            if (!(e instanceof BuilderError)) throw e;
            const error = e.toStructured({ branch: request.branch });
            logStructuredError(log, error);
            return { runId, ok: false, error };
        } finally {
            clearCorrelation();
        }
    }

    async recursivePrompt(
        branch: string,
        prompt: string,
        depth: number,
        maxDepth: number = this.opts.maxDepth
    ): Promise<TurnOutcome> {
        setCorrelation({ branch, depth });
        const outcome: TurnOutcome = { branch, depth, status: 'completed', questions: [], artifacts: [], followUps: [] };

        if (depth > maxDepth) {
            logStructuredError(log, ErrorFactory.depthExceeded(branch, depth, maxDepth));
            return { ...outcome, status: 'depth_exceeded' };
        }

        const { store, generator, verifier } = this.deps;

        // PROMPTING
        store.append(branch, 'user', prompt);

        // GENERATING
        const reply = (await generator.generate(store.messages(branch))).trim();
        if (!reply) {
            logStructuredError(log, ErrorFactory.emptyReply(branch, depth));
            return { ...outcome, status: 'empty_reply' };
        }
        store.append(branch, 'assistant', reply);
        log.info(`[BRANCH=${branch}] model replied`, { chars: reply.length });
        log.debug(reply);

        // PARSING
        const { questions, codeBlocks } = extract(reply);
        outcome.questions = questions;
        log.info('Parsed reply', { questions: questions.length, code_blocks: codeBlocks.length });

        // VERIFYING: dispatched together, handled in block order
        const verdicts = await Promise.all(codeBlocks.map(code => verifier.verify(code)));
        for (let i = 0; i < codeBlocks.length; i++) {
            outcome.artifacts.push(...await this.handleCodeBlock(branch, i, codeBlocks[i], verdicts[i]));
        }

        // QUESTIONING
        for (let i = 0; i < questions.length; i++) {
            const question = questions[i];
            if (depth + 1 > maxDepth) {
                const remaining = questions.length - i;
                logStructuredError(log, ErrorFactory.questionSkipped(
                    branch,
                    question,
                    `max depth ${maxDepth} reached, ${remaining} question(s) left unanswered`
                ));
                break;
            }

            setCorrelation({ branch, depth });
            const answer = (await this.deps.human.ask(question)).trim();
            if (!answer) {
                logStructuredError(log, ErrorFactory.questionSkipped(branch, question, 'empty answer'));
                continue;
            }
            outcome.followUps.push(await this.recursivePrompt(branch, formatAnswerPrompt(question, answer), depth + 1, maxDepth));
        }

        return outcome;
    }

    private async handleCodeBlock(
        branch: string,
        index: number,
        code: string,
        verdict: Verdict | undefined
    ): Promise<ArtifactRecord[]> {
        const { acceptor, refinement } = this.deps;

        if (verdict?.complete === true) {
            return [await acceptor.accept(branch, index, 'part', code, verdict.feedback)];
        }

        const feedback = verdict?.feedback || NO_FEEDBACK;
        logStructuredError(
            log,
            verdict
                ? ErrorFactory.verificationRejected(branch, index, feedback)
                : ErrorFactory.verificationAbsent(branch, index)
        );
        const rejected = acceptor.reject(branch, index, 'part', code, verdict?.feedback ?? '');
        const refined = await refinement.refine(branch, feedback, code, index);
        return [rejected, refined];
    }
}

export function countArtifacts(outcome: TurnOutcome): number {
    return outcome.artifacts.length + outcome.followUps.reduce((n, f) => n + countArtifacts(f), 0);
}
