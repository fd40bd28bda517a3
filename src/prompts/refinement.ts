/**
 * Refinement request appended to the branch after a snippet is rejected.
 */

export function getRefinementPrompt(feedback: string, code: string, language: string): string {
    return `We received the following feedback from a verification step:

'${feedback}'

Please refine the following code snippet to address these issues. Only provide the refined snippet in triple backticks:

\`\`\`${language}
${code}
\`\`\``;
}
