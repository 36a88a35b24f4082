/**
 * Extraction Template Types
 */

/**
 * Prompt template for the generative extraction tier.
 */
export interface ExtractionTemplate {
  /** Template identifier, logged with every request */
  name: string;

  /** Bumped whenever the prompt wording changes */
  version: string;

  /** Human-readable description of what this template extracts */
  description: string;

  /** System prompt with the extraction rules */
  systemPrompt: string;

  /**
   * User prompt template with placeholders:
   * - {{page_text}}: The extracted (and truncated) document text
   */
  userPromptTemplate: string;
}

/**
 * Fill the user prompt placeholders. The text is inserted verbatim.
 */
export function renderUserPrompt(template: ExtractionTemplate, pageText: string): string {
  return template.userPromptTemplate.replace('{{page_text}}', () => pageText);
}
