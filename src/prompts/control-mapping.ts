/**
 * Prompt for assessing how well a regulation article covers a control objective.
 * The model must wrap its answer in <json></json> tags.
 */
export function controlAssessmentPrompt(originalObjective: string, matchedObjective: string): string {
  return `You are a compliance analyst mapping internal controls to regulatory requirements.

Original control objective:
${originalObjective}

Matched regulatory text:
${matchedObjective}

Assess whether the regulatory text is addressed by the control objective. Respond with a single JSON object wrapped in <json></json> tags, with these keys:
- "Mapping Status": one of "Fully Mapped", "Partially Mapped", "Not Mapped"
- "Similarity Score": a number between 0 and 1
- "Rationale": one or two sentences explaining the assessment
- "Gaps": the requirements in the regulatory text the control does not address, or an empty string

Example:
<json>{"Mapping Status": "Partially Mapped", "Similarity Score": 0.6, "Rationale": "...", "Gaps": "..."}</json>`;
}
