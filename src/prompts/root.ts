/**
 * Default opening of a build session.
 */

export const DEFAULT_SYSTEM_MESSAGE =
    'You are a senior software engineer. You will interact with the user to clarify requirements ' +
    'and progressively produce a large software application in small pieces.';

export const DEFAULT_ROOT_PROMPT =
    'I want to build a complex software application. ' +
    'Please ask clarifying questions until you have all the details necessary ' +
    'to produce the code in segments. Each time you have enough details for a ' +
    'part of the application, produce the code for that part. Then we will verify ' +
    'it in a separate conversation to ensure completeness. If verified as complete, ' +
    'that part is finalized. Otherwise, we will refine it further.\n\n' +
    'Remember to keep the conversation focused, as we are limiting conversation length. ' +
    'If you need previous context, let me know.';

/** User message carrying a human answer back into the branch. */
export function formatAnswerPrompt(question: string, answer: string): string {
    return `Regarding "${question}": ${answer}`;
}
