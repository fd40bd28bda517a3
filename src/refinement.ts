/**
 * Refinement Loop - one improvement round for a rejected snippet.
 *
 * The request goes into the branch itself, so the model sees the conversation
 * that produced the snippet. The improved snippet is verified exactly once;
 * a second rejection is reported and left alone.
 */

import type { ArtifactAcceptor } from './artifact_acceptance';
import type { ArtifactRecord } from './artifact_ledger';
import type { ConversationStore } from './conversation_store';
import { createLogger } from './logger';
import type { GenerationCapability } from './model_router';
import { getRefinementPrompt } from './prompts';
import { extractCodeBlocks } from './response_parser';
import { ErrorFactory, logStructuredError } from './structured_error';
import type { Verifier } from './verifier';

const log = createLogger('refinement');

export const NO_FEEDBACK = 'No feedback provided.';

export interface RefinementDeps {
    store: ConversationStore;
    generator: GenerationCapability;
    verifier: Verifier;
    acceptor: ArtifactAcceptor;
    language: string;
}

export class RefinementLoop {
    constructor(private readonly deps: RefinementDeps) { }

    /**
     * Ask for an improved version of `code` on `branch`.
     * Throws GenerationError when the backend is exhausted.
     */
    async refine(branch: string, feedback: string, code: string, index: number): Promise<ArtifactRecord> {
        const { store, generator, verifier, acceptor } = this.deps;
        log.info(`Refining ${branch} part ${index} based on verifier feedback`);

        store.append(branch, 'user', getRefinementPrompt(feedback || NO_FEEDBACK, code, this.deps.language));

        const reply = await generator.generate(store.messages(branch));
        if (reply.trim().length === 0) {
            logStructuredError(log, ErrorFactory.refinementNoCode(branch, index));
            return acceptor.noCode(branch, index);
        }
        store.append(branch, 'assistant', reply);

        const blocks = extractCodeBlocks(reply);
        if (blocks.length === 0) {
            logStructuredError(log, ErrorFactory.refinementNoCode(branch, index));
            return acceptor.noCode(branch, index);
        }
        const improved = blocks[0];

        const verdict = await verifier.verify(improved);
        if (verdict?.complete === true) {
            return acceptor.accept(branch, index, 'refined', improved, verdict.feedback);
        }

        const reason = verdict ? verdict.feedback || NO_FEEDBACK : 'no verdict returned';
        logStructuredError(log, ErrorFactory.refinementRejected(branch, index, reason));
        return acceptor.reject(branch, index, 'refined', improved, verdict?.feedback ?? '');
    }
}
