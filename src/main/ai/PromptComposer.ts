/**
 * PromptComposer - Build the ordered prompt for SOP generation
 *
 * The instruction block is the contract the annotator and renderers rely on:
 * the timestamp tag grammar, the mermaid flow diagram, and the seven
 * sections in order. Surfaces do not let callers change it.
 */

import type { Part } from '@google/genai';
import {
  FLOW_DIAGRAM_LANGUAGE,
  SOP_SECTIONS,
  TIMESTAMP_TAG_FORMAT,
} from '../../shared/sop.js';
import type { Asset, GenerationPart, GenerationRequest } from './types.js';

// =============================================================================
// Fixed instruction block
// =============================================================================

const SECTION_GUIDANCE: Record<(typeof SOP_SECTIONS)[number], string> = {
  'Title & Objective': 'Clear title and the goal of the procedure.',
  'Safety Warnings':
    'Critical safety precautions mentioned or observed (e.g., PPE, lock-out tag-out).',
  'Tools & Materials': 'List of tools and parts seen or mentioned.',
  'Step-by-Step Instructions': `Chronological steps with detailed descriptions. REMEMBER to include \`${TIMESTAMP_TAG_FORMAT}\` for key visual steps.`,
  'Troubleshooting/Diagnostics':
    'If the video covers diagnostics, detail the symptoms and the logic for the fix.',
  'Tribal Knowledge/Tips':
    "Specific expert tips or 'gotchas' mentioned by the technician that aren't in standard manuals.",
  'Process Flow': `A ${FLOW_DIAGRAM_LANGUAGE} diagram of the procedure.`,
};

export const SOP_INSTRUCTIONS: readonly string[] = Object.freeze([
  'You are an expert technical writer and engineer with decades of experience in verifying and documenting maintenance procedures.',
  "Your task is to analyze the provided video content (visuals and audio) along with the technician's observations to create a comprehensive Standard Operating Procedure (SOP) and Maintenance/Diagnostics Documentation.",
  'The documentation should be clear, concise, and easy to follow for new technicians.',
  'Please extract tribal knowledge demonstrated or spoken in the video.',
  `**Visuals**: For every critical step where a specific visual action is performed (e.g., removing a specific part, checking a gauge), you MUST include a timestamp tag in the exact format \`${TIMESTAMP_TAG_FORMAT}\`. Place this tag immediately after the step description.`,
  `**Diagrams**: At the end of the SOP, include a Mermaid.js flowchart (using \`\`\`${FLOW_DIAGRAM_LANGUAGE} ... \`\`\` block) validating the troubleshooting logic or the process flow.`,
  'Structure the output in Markdown with the following sections:',
  ...SOP_SECTIONS.map((section, i) => `${i + 1}.  **${section}**: ${SECTION_GUIDANCE[section]}`),
]);

const VIDEO_LEAD_IN = '\nHere is the video of the procedure:';
const OBSERVATIONS_HEADING = "\nTechnician's Observations:";
const IMAGE_LEAD_IN = '\nAdditional Visual Context:';
const CLOSING_DIRECTIVE = '\nGenerate the SOP now.';

// =============================================================================
// Composition
// =============================================================================

export interface ComposePromptInput {
  video: Asset;
  /** Free-text notes from the technician. Blank notes are left out. */
  observationText?: string;
  observationImage?: Asset;
  /** Override for tests and tooling; surfaces always use SOP_INSTRUCTIONS. */
  instructions?: readonly string[];
}

const text = (value: string): GenerationPart => ({ kind: 'text', text: value });
const asset = (value: Asset): GenerationPart => ({ kind: 'asset', asset: value });

/**
 * Instructions -> video -> notes -> image -> closing directive.
 */
export function composePrompt(input: ComposePromptInput): GenerationRequest {
  const instructions = input.instructions ?? SOP_INSTRUCTIONS;
  const parts: GenerationPart[] = [
    ...instructions.map(text),
    text(VIDEO_LEAD_IN),
    asset(input.video),
  ];

  const notes = input.observationText?.trim();
  if (notes) {
    parts.push(text(`${OBSERVATIONS_HEADING}\n${notes}`));
  }

  if (input.observationImage) {
    parts.push(text(IMAGE_LEAD_IN), asset(input.observationImage));
  }

  parts.push(text(CLOSING_DIRECTIVE));

  return Object.freeze({ parts: Object.freeze(parts) });
}

/**
 * Convert a request into provider content parts.
 */
export function toContents(request: GenerationRequest): Part[] {
  return request.parts.map((part): Part =>
    part.kind === 'text'
      ? { text: part.text }
      : { fileData: { fileUri: part.asset.uri, mimeType: part.asset.mimeType } },
  );
}
