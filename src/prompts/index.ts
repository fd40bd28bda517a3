/**
 * Prompt texts for the build loop.
 */

export { DEFAULT_ROOT_PROMPT, DEFAULT_SYSTEM_MESSAGE, formatAnswerPrompt } from './root';
export { DEFAULT_VERIFICATION_PROMPT, VERIFICATION_SYSTEM_PROMPT, getVerificationUserPrompt } from './verification';
export { getRefinementPrompt } from './refinement';
