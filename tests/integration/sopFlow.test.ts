/**
 * SOP Flow Integration Test
 *
 * Runs the whole pipeline in process against a temporary directory:
 * the Gemini SDK and the ffmpeg/ffprobe binaries are stand-ins, while
 * sharp, pdfkit and the filesystem are real.
 *
 * 1. Upload -> wait -> generate with a mocked provider
 * 2. Timestamp tags replaced with real JPEG snapshots (or left as text)
 * 3. Markdown, HTML and PDF written side by side
 */

import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import sharp from 'sharp';

// =============================================================================
// Hoisted mocks
// =============================================================================

type ExecCallback = (error: Error | null, result?: { stdout: string | Buffer; stderr: string | Buffer }) => void;

const { mockExecFile, mockUpload, mockGet, mockList, mockGenerateContent, frame } = vi.hoisted(() => ({
  mockExecFile: vi.fn(),
  mockUpload: vi.fn(),
  mockGet: vi.fn(),
  mockList: vi.fn(),
  mockGenerateContent: vi.fn(),
  frame: { png: Buffer.alloc(0) },
}));

vi.mock('child_process', () => ({
  execFile: mockExecFile,
}));

vi.mock('@google/genai', () => ({
  GoogleGenAI: vi.fn().mockImplementation(() => ({
    files: { upload: mockUpload, get: mockGet },
    models: { list: mockList, generateContent: mockGenerateContent },
  })),
}));

import { SOPPipeline } from '../../src/cli/SOPPipeline.js';

// =============================================================================
// Fixtures
// =============================================================================

const VIDEO_DURATION_SECONDS = '30.0';

const GENERATED_SOP = [
  '# Pump Seal Replacement',
  '',
  '## Step-by-Step Instructions',
  '1. Remove the coupling guard [TIMESTAMP: 00:05]',
  '2. Inspect the seal face [TIMESTAMP: 00:45]',
  '',
  '## Process Flow',
  '```mermaid',
  'graph TD',
  '  A[Isolate] --> B[Replace seal]',
  '```',
  '',
].join('\n');

async function* modelPager() {
  yield { name: 'models/gemini-1.5-flash', supportedActions: ['generateContent'] };
  yield { name: 'models/gemini-1.5-pro-latest', supportedActions: ['generateContent'] };
}

describe('SOP flow (integration)', () => {
  let dir: string;
  let videoPath: string;

  beforeAll(async () => {
    frame.png = await sharp({
      create: { width: 800, height: 400, channels: 3, background: '#336699' },
    })
      .png()
      .toBuffer();
  });

  beforeEach(async () => {
    vi.clearAllMocks();

    dir = await mkdtemp(join(tmpdir(), 'sop-flow-'));
    videoPath = join(dir, 'pump_seal.mp4');
    await writeFile(videoPath, Buffer.from('not really a video'));

    mockExecFile.mockImplementation((_command: string, args: string[], _options: unknown, cb: ExecCallback) => {
      if (args[0] === '-version') {
        cb(null, { stdout: 'ffmpeg version 6.1.1', stderr: '' });
      } else if (args.includes('-show_entries')) {
        cb(null, { stdout: `${VIDEO_DURATION_SECONDS}\n`, stderr: '' });
      } else {
        cb(null, { stdout: frame.png, stderr: Buffer.alloc(0) });
      }
    });

    mockUpload.mockResolvedValue({
      name: 'files/pump-seal',
      uri: 'https://files.example/pump-seal',
      mimeType: 'video/mp4',
      state: 'PROCESSING',
    });
    mockGet
      .mockResolvedValueOnce({ name: 'files/pump-seal', uri: 'https://files.example/pump-seal', state: 'PROCESSING' })
      .mockResolvedValue({ name: 'files/pump-seal', uri: 'https://files.example/pump-seal', state: 'ACTIVE' });
    mockList.mockImplementation(() => Promise.resolve(modelPager()));
    mockGenerateContent.mockResolvedValue({ text: GENERATED_SOP });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes an annotated SOP with HTML and PDF exports', async () => {
    const pipeline = new SOPPipeline(
      {
        videoPath,
        outputDir: join(dir, 'out'),
        observationText: 'Seal was weeping at the shaft',
        formats: ['markdown', 'html', 'pdf'],
        skipFrames: false,
        verbose: false,
        apiKey: 'test-secret',
        pollPolicy: { intervalMs: 1 },
      },
      () => {},
    );

    const result = await pipeline.run();

    expect(result.model).toBe('models/gemini-1.5-pro-latest');
    expect(result.markers).toBe(2);
    expect(result.snapshots).toBe(1);
    expect(result.unresolvedMarkers).toEqual(['[TIMESTAMP: 00:45]']);
    expect(result.document.rawText).toBe(GENERATED_SOP);

    const markdown = await readFile(result.outputPath, 'utf-8');
    expect(markdown).toContain('1. Remove the coupling guard \n![Snapshot at 00:05](data:image/jpeg;base64,');
    expect(markdown).toContain('2. Inspect the seal face [TIMESTAMP: 00:45]');
    expect(markdown).not.toContain('[TIMESTAMP: 00:05]');

    expect(result.exports.map((e) => [e.format, e.success])).toEqual([
      ['html', true],
      ['pdf', true],
    ]);

    const html = await readFile(result.outputPath.replace(/\.md$/, '.html'), 'utf-8');
    expect(html).toContain('<img src="data:image/jpeg;base64,');
    expect(html).toContain('alt="Snapshot at 00:05" width="300">');
    expect(html).toContain('<pre class="mermaid">graph TD\n  A[Isolate] --&gt; B[Replace seal]</pre>');

    const pdf = await readFile(result.outputPath.replace(/\.md$/, '.pdf'));
    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });

  it('downscales snapshots to the configured width', async () => {
    const pipeline = new SOPPipeline(
      {
        videoPath,
        outputDir: join(dir, 'out'),
        formats: [],
        skipFrames: false,
        verbose: false,
        apiKey: 'test-secret',
        pollPolicy: { intervalMs: 1 },
        snapshotMaxWidth: 200,
      },
      () => {},
    );

    const result = await pipeline.run();

    const match = /!\[Snapshot at 00:05\]\(data:image\/jpeg;base64,([A-Za-z0-9+/=]+)\)/.exec(
      result.document.annotatedText,
    );
    expect(match).not.toBeNull();
    const jpeg = Buffer.from(match?.[1] ?? '', 'base64');
    const metadata = await sharp(jpeg).metadata();
    expect(metadata.format).toBe('jpeg');
    expect(metadata.width).toBe(200);
    expect(metadata.height).toBe(100);
  });

  it('sends the prompt with the uploaded video and the notes', async () => {
    const pipeline = new SOPPipeline(
      {
        videoPath,
        outputDir: join(dir, 'out'),
        model: 'models/gemini-1.5-flash',
        observationText: 'Seal was weeping at the shaft',
        formats: [],
        skipFrames: true,
        verbose: false,
        apiKey: 'test-secret',
        pollPolicy: { intervalMs: 1 },
      },
      () => {},
    );

    await pipeline.run();

    expect(mockList).not.toHaveBeenCalled();
    const [request] = mockGenerateContent.mock.calls[0];
    expect(request.model).toBe('models/gemini-1.5-flash');
    expect(request.contents).toContainEqual({
      fileData: { fileUri: 'https://files.example/pump-seal', mimeType: 'video/mp4' },
    });
    expect(request.contents).toContainEqual({ text: "\nTechnician's Observations:\nSeal was weeping at the shaft" });
    expect(request.contents[request.contents.length - 1]).toEqual({ text: '\nGenerate the SOP now.' });
  });
});
