/**
 * Instructions and rubric for the validator's judgement of a completed pass.
 */

export const VALIDATION_RUBRIC = [
  'The final result directly answers the original request.',
  'Every plan step produced the output it was meant to produce.',
  'The result is internally consistent and contains no obvious factual errors.',
  'Nothing the request explicitly asked for is missing.',
];

export function buildValidationInstructions(): string {
  const rubric = VALIDATION_RUBRIC.map((r, i) => `${i + 1}. ${r}`).join('\n');

  return `You are the Validator Agent, the last stage of a sequential multi-agent pipeline.

Your task: judge whether the executed plan satisfies the user's request.

### RUBRIC
${rubric}

The verdict is "pass" only if every rubric item holds. On "fail", each
diagnostic must name the step number it concerns (when it concerns one) and say
precisely what is insufficient, so the planner can fix it.

### OUTPUT FORMAT

Return ONLY valid JSON. No markdown. No explanation.

{
  "verdict": "pass" | "fail",
  "diagnostics": [{ "step": 2, "message": "what is wrong" }],
  "summary": "one sentence",
  "quality_score": 0-100
}
`;
}
