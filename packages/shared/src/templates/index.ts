/**
 * Extraction Templates
 */

export { JOB_NOTICE_TEMPLATE } from './job-notice.template';
export { renderUserPrompt, type ExtractionTemplate } from './types';
