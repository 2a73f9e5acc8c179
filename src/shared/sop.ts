/**
 * The document contract between the prompt and everything that consumes the
 * model's output: the timestamp tag the annotator looks for, the fenced
 * block language the renderers draw as a diagram, and the section order.
 */

/** Literal form of the tag the model is told to emit for visual steps. */
export const TIMESTAMP_TAG_FORMAT = '[TIMESTAMP: MM:SS]';

/**
 * Source of the timestamp tag grammar. Captures the time as written
 * (`MM:SS` or `HH:MM:SS`). Build a fresh RegExp from it for each pass so no
 * `lastIndex` state leaks between callers.
 */
export const TIMESTAMP_TAG_SOURCE = String.raw`\[TIMESTAMP:\s*(\d{1,2}:\d{2}(?::\d{2})?)\]`;

export function createTimestampTagPattern(): RegExp {
  return new RegExp(TIMESTAMP_TAG_SOURCE, 'g');
}

/** Fenced code block language rendered as the process-flow diagram. */
export const FLOW_DIAGRAM_LANGUAGE = 'mermaid';

export const SOP_SECTIONS = [
  'Title & Objective',
  'Safety Warnings',
  'Tools & Materials',
  'Step-by-Step Instructions',
  'Troubleshooting/Diagnostics',
  'Tribal Knowledge/Tips',
  'Process Flow',
] as const;

export type SopSection = (typeof SOP_SECTIONS)[number];

/** Title used for the HTML page and the PDF header. */
export const SOP_DOCUMENT_TITLE = 'Maintenance SOP';
