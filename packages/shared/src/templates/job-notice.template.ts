/**
 * Government Job Notification Extraction Template
 *
 * Document semantics:
 * - Text comes from PDF-to-text conversion and may be poorly formatted
 * - One notice may advertise several posts; job_title lists them all
 * - Age limits and qualifications live in separate numbered sections but
 *   are reported together as eligibility
 */

import { NOT_SPECIFIED } from '../types';
import type { ExtractionTemplate } from './types';

export const JOB_NOTICE_TEMPLATE: ExtractionTemplate = {
  name: 'job_notice',
  version: '1.0.0',
  description: 'Government recruitment notice - extracts the seven job posting fields',

  systemPrompt: `You are an expert data extraction AI for government job notification PDFs.
The text you receive was produced by PDF-to-text conversion and may be poorly formatted.
Find the requested information and return it as a clean JSON object.

JSON keys to extract:
- "job_title": The official name of the post(s).
- "department": The name of the ministry or department conducting the recruitment.
- "vacancies": The total number of vacancies. Extract a number if possible.
- "eligibility": A combined summary of the required age limits AND educational qualifications. Search for sections like "Age Limit" and "Educational Qualifications".
- "salary": A summary of the pay scale, including level and initial pay. Actively look for keywords like "Pay Level", "Scale of Pay", "Rs.", "₹" or "Pay Matrix".
- "application_deadline": The closing date for applications. Format as YYYY-MM-DD if possible, otherwise keep the original text.
- "application_url": The official website for applications. Look for text like "Candidates must apply online through" or website domains ending in ".gov.in" or ".nic.in".

RULES:
1. Every key above MUST be present and MUST be a string.
2. If a field is genuinely not found after a thorough search, use the string "${NOT_SPECIFIED}". Never use null and never omit a key.
3. The output MUST be a single valid JSON object with exactly these keys. Do not output any other text or explanations.`,

  userPromptTemplate: `Extract the job posting fields from this government job notification.

--- PDF TEXT START ---
{{page_text}}
--- PDF TEXT END ---

Return only the JSON object.`,
};
