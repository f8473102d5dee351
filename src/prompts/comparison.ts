/**
 * Prompt templates for comparing two versions of a regulation
 */

const ANALYSIS_GUIDANCE = `Provide a concise analysis of the regulatory changes that have a tangible impact on implementation, compliance, interpretation or operational execution. Organise it under clear headings in continuous prose, without bullet points. Ignore structural, formatting or wording adjustments unless they change meaning or obligations.`;

export function identifySubThemePrompt(
  newSubTheme: string,
  oldSubThemes: readonly string[]
): string {
  return `You are given a list of sub-themes from an old document and a sub-theme from the latest document.
Return the sub-theme from the list that matches most closely. If none match, return 'None'.

Sub-themes from the old document:
${oldSubThemes.map((s) => `- ${s}`).join('\n')}

Sub-theme from the latest document:
${newSubTheme}

Output only the sub-theme name or 'None'.`;
}

export function subThemeAnalysisPrompt(oldContent: string, newContent: string): string {
  return `You are an expert in financial regulation.
Compare two versions (old and new) of the same section and:
1. Identify the major changes between the old and the new version
2. Analyse the impact of the identified changes
3. Note any change in legal interpretation or regulatory impact

Old content:
${oldContent}

New content:
${newContent}

${ANALYSIS_GUIDANCE} Keep the response within 200 words.`;
}

export function themeSummaryPrompt(
  theme: string,
  analyses: ReadonlyArray<{ subTheme: string; analysis: string }>
): string {
  const body = analyses
    .map((a) => `Sub-theme: ${a.subTheme}\nAnalysis: ${a.analysis}`)
    .join('\n\n');

  return `You are an expert in financial regulation.
Summarise the following sub-theme analyses for the theme "${theme}":
1. The major changes between the old and the new version
2. The impact of those changes
3. Any change in legal interpretation or regulatory impact

${body}

${ANALYSIS_GUIDANCE} Keep the response within 200 words.`;
}

export function documentSummaryPrompt(
  themes: ReadonlyArray<{ name: string; summary: string }>
): string {
  const body = themes.map((t) => `Theme: ${t.name}\nSummary: ${t.summary}`).join('\n\n');

  return `You are an expert in analysing financial regulations.
Write a document-level summary of the enacted regulation compared with its previous version, with these sections:

Overview of the Enacted Regulation: scope, objectives and key themes.
Major Changes and Regulatory Priorities: the most significant modifications to requirements, obligations and enforcement.
Impact Analysis: the effect on compliance, enforcement and operations.

Theme summaries:
${body}

${ANALYSIS_GUIDANCE} Keep the response within 500 words.`;
}
