/**
 * FrameAnnotator - Replace timestamp tags with inline video snapshots
 *
 * One left-to-right pass over the generated document. Each
 * `[TIMESTAMP: MM:SS]` / `[TIMESTAMP: HH:MM:SS]` tag becomes a markdown image
 * whose source is a self-contained JPEG data URI. A tag whose frame cannot
 * be produced is left exactly as written; it never aborts the pass.
 */

import { createTimestampTagPattern } from '../../shared/sop.js';
import { createLogger } from '../utils/logger.js';
import { FrameExtractor, type FrameSource } from './FrameExtractor.js';
import { timeStringToSeconds } from './timestamps.js';

export interface AnnotationResult {
  text: string;
  /** Tags found in the input */
  markers: number;
  /** Tags replaced with a snapshot */
  embedded: number;
  /** Tags left verbatim, as written */
  unresolved: string[];
}

/**
 * Markdown emitted in place of a resolved tag. Own line so renderers treat
 * it as a block image.
 */
export function snapshotMarkdown(time: string, dataUri: string): string {
  return `\n![Snapshot at ${time}](${dataUri})\n`;
}

export class FrameAnnotator {
  private readonly frames: FrameSource;
  private log = createLogger('FrameAnnotator');

  constructor(frames: FrameSource = new FrameExtractor()) {
    this.frames = frames;
  }

  async annotate(documentText: string, videoPath: string): Promise<string> {
    const result = await this.annotateDetailed(documentText, videoPath);
    return result.text;
  }

  async annotateDetailed(documentText: string, videoPath: string): Promise<AnnotationResult> {
    const pattern = createTimestampTagPattern();
    const unresolved: string[] = [];
    let output = '';
    let cursor = 0;
    let markers = 0;
    let embedded = 0;

    for (const match of documentText.matchAll(pattern)) {
      const [tag, time] = match;
      const start = match.index ?? cursor;
      markers++;

      output += documentText.slice(cursor, start);
      cursor = start + tag.length;

      const seconds = timeStringToSeconds(time);
      const dataUri = await this.frames.extractFrame(videoPath, seconds);

      if (dataUri) {
        output += snapshotMarkdown(time, dataUri);
        embedded++;
      } else {
        output += tag;
        unresolved.push(tag);
      }
    }

    if (markers === 0) {
      return { text: documentText, markers, embedded, unresolved };
    }

    output += documentText.slice(cursor);
    this.log.info(`Embedded ${embedded}/${markers} snapshot(s)`);
    return { text: output, markers, embedded, unresolved };
  }
}
