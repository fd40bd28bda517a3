/**
 * Verification-mode prompts. The verifier runs in its own two-message
 * conversation, separate from any branch.
 */

export const VERIFICATION_SYSTEM_PROMPT =
    'You are a code reviewer in verification mode. ' +
    'You will review the submitted code snippet for completeness, correctness, ' +
    'and whether it meets typical best practices. ' +
    'Respond only with a valid JSON object of the form {"complete": boolean, "feedback": string}.';

export const DEFAULT_VERIFICATION_PROMPT =
    'Please verify the following code snippet. ' +
    "Respond in JSON with fields 'complete' (boolean) and 'feedback' (string).";

export function getVerificationUserPrompt(prompt: string, code: string, language: string): string {
    return `${prompt}\n\n\`\`\`${language}\n${code}\n\`\`\``;
}
