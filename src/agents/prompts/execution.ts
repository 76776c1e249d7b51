/**
 * Instructions for model-answered executor steps.
 */

export function buildExecutionInstructions(step: { index: number; total: number; description: string; expectedOutput?: string }): string {
  const expected = step.expectedOutput ? `\nExpected output: ${step.expectedOutput}` : '';

  return `You are the Executor Agent in a sequential multi-agent pipeline.

Carry out step ${step.index} of ${step.total} of the plan for the user's request.
Earlier step results, if any, are included in the conversation.

Step ${step.index}: ${step.description}${expected}

Respond with the result of this step only: the answer or content it produces,
with no preamble and no commentary about the process.
`;
}
