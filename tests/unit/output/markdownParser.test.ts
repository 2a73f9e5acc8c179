/**
 * MarkdownParser Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { parseInline, parseMarkdown, plainText } from '../../../src/main/output/MarkdownParser.js';

describe('parseInline', () => {
  it('parses bold and italic runs', () => {
    expect(parseInline('**Bold** and *italic*')).toEqual([
      { type: 'bold', children: [{ type: 'text', text: 'Bold' }] },
      { type: 'text', text: ' and ' },
      { type: 'italic', children: [{ type: 'text', text: 'italic' }] },
    ]);
  });

  it('keeps an unmatched asterisk as literal text', () => {
    expect(parseInline('2 * 3')).toEqual([{ type: 'text', text: '2 * 3' }]);
  });

  it('parses inline images between text', () => {
    expect(parseInline('See ![Valve](data:image/jpeg;base64,QUJD) here')).toEqual([
      { type: 'text', text: 'See ' },
      { type: 'image', alt: 'Valve', src: 'data:image/jpeg;base64,QUJD' },
      { type: 'text', text: ' here' },
    ]);
  });

  it('keeps an exclamation mark that does not open an image', () => {
    expect(parseInline('Stop! Isolate power')).toEqual([{ type: 'text', text: 'Stop! Isolate power' }]);
  });

  it('parses triple asterisks as bold italic', () => {
    expect(parseInline('***Never*** bypass')).toEqual([
      { type: 'bold', children: [{ type: 'italic', children: [{ type: 'text', text: 'Never' }] }] },
      { type: 'text', text: ' bypass' },
    ]);
  });

  it('nests italic inside bold', () => {
    expect(parseInline('**Do *not* skip**')).toEqual([
      {
        type: 'bold',
        children: [
          { type: 'text', text: 'Do ' },
          { type: 'italic', children: [{ type: 'text', text: 'not' }] },
          { type: 'text', text: ' skip' },
        ],
      },
    ]);
  });
});

describe('plainText', () => {
  it('drops markup and uses image alt text', () => {
    expect(plainText(parseInline('**Lock** the ![breaker](x.png) *now*'))).toBe('Lock the breaker now');
  });
});

describe('parseMarkdown', () => {
  it('splits a document into blocks', () => {
    const markdown = [
      '# Pump Seal Replacement',
      '',
      '## Steps',
      '1. Isolate the pump',
      '2. Drain the casing',
      '',
      '- Torque wrench',
      '- Seal kit',
      '',
      'First line',
      'second line',
      '',
      '```mermaid',
      'graph TD',
      '  A-->B',
      '```',
      '#### Notes',
    ].join('\n');

    const { blocks } = parseMarkdown(markdown);

    expect(blocks.map((block) => block.type)).toEqual([
      'heading',
      'heading',
      'list',
      'list',
      'paragraph',
      'diagram',
      'heading',
    ]);
    expect(blocks[0]).toEqual({
      type: 'heading',
      level: 1,
      content: [{ type: 'text', text: 'Pump Seal Replacement' }],
    });
    expect(blocks[2]).toEqual({
      type: 'list',
      ordered: true,
      start: 1,
      items: [[{ type: 'text', text: 'Isolate the pump' }], [{ type: 'text', text: 'Drain the casing' }]],
    });
    expect(blocks[3]).toMatchObject({ type: 'list', ordered: false });
    expect(blocks[4]).toEqual({
      type: 'paragraph',
      lines: [[{ type: 'text', text: 'First line' }], [{ type: 'text', text: 'second line' }]],
    });
    expect(blocks[5]).toEqual({ type: 'diagram', source: 'graph TD\n  A-->B' });
    expect(blocks[6]).toMatchObject({ type: 'heading', level: 3 });
  });

  it('keeps the starting number of an ordered list', () => {
    const { blocks } = parseMarkdown('3. x\n4. y');

    expect(blocks).toEqual([
      {
        type: 'list',
        ordered: true,
        start: 3,
        items: [[{ type: 'text', text: 'x' }], [{ type: 'text', text: 'y' }]],
      },
    ]);
  });

  it('treats a line holding only an image as an image block', () => {
    const { blocks } = parseMarkdown('![Snapshot at 00:05](data:image/jpeg;base64,QUJD)');

    expect(blocks).toEqual([{ type: 'image', alt: 'Snapshot at 00:05', src: 'data:image/jpeg;base64,QUJD' }]);
  });

  it('parses other fenced blocks as code with their language', () => {
    const { blocks } = parseMarkdown('```Bash\nsystemctl stop pump\n```');

    expect(blocks).toEqual([{ type: 'code', language: 'bash', code: 'systemctl stop pump' }]);
  });

  it('folds an indented continuation line into the list item above', () => {
    const { blocks } = parseMarkdown('1. Close valve V-12\n   until it stops');

    expect(blocks).toEqual([
      {
        type: 'list',
        ordered: true,
        start: 1,
        items: [[{ type: 'text', text: 'Close valve V-12' }, { type: 'text', text: ' ' }, { type: 'text', text: 'until it stops' }]],
      },
    ]);
  });

  it('normalizes CRLF line endings', () => {
    const { blocks } = parseMarkdown('# Title\r\nBody');

    expect(blocks).toEqual([
      { type: 'heading', level: 1, content: [{ type: 'text', text: 'Title' }] },
      { type: 'paragraph', lines: [[{ type: 'text', text: 'Body' }]] },
    ]);
  });
});
