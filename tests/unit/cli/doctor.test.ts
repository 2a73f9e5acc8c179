/**
 * Doctor Unit Tests
 *
 * child_process is mocked; no real binaries are run.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

type ExecCallback = (error: Error | null, stdout?: string, stderr?: string) => void;

const { mockExecFile } = vi.hoisted(() => ({
  mockExecFile: vi.fn(),
}));

vi.mock('child_process', () => ({
  execFile: mockExecFile,
}));

import { checkApiKey, checkNodeVersion, runDoctorChecks } from '../../../src/cli/doctor.js';

const DF_OUTPUT = [
  'Filesystem     1K-blocks     Used Available Use% Mounted on',
  '/dev/sda1      104857600 52428800   2097152  50% /',
].join('\n');

function fakeTools(missing: string[] = []) {
  mockExecFile.mockImplementation((command: string, _args: string[], _options: unknown, cb: ExecCallback) => {
    if (missing.includes(command)) {
      cb(new Error(`spawn ${command} ENOENT`));
    } else if (command === 'df') {
      cb(null, DF_OUTPUT, '');
    } else {
      cb(null, `${command} version 6.1.1 Copyright (c) the FFmpeg developers`, '');
    }
  });
}

describe('checkNodeVersion', () => {
  it('passes on Node.js 20', async () => {
    await expect(checkNodeVersion('v20.11.0')).resolves.toEqual({
      name: 'Node.js',
      status: 'pass',
      message: 'v20.11.0 (>= 20.0.0)',
    });
  });

  it('fails on older releases', async () => {
    const check = await checkNodeVersion('v18.19.0');

    expect(check.status).toBe('fail');
    expect(check.message).toBe('v18.19.0 is too old');
  });

  it('warns on an unparseable version', async () => {
    const check = await checkNodeVersion('weird');

    expect(check.status).toBe('warn');
    expect(check.message).toBe('Unknown version: weird');
  });
});

describe('checkApiKey', () => {
  it('fails without a key', async () => {
    const check = await checkApiKey({ GOOGLE_API_KEY: '  ' });

    expect(check.status).toBe('fail');
    expect(check.message).toBe('GOOGLE_API_KEY not set');
  });

  it('accepts the GEMINI_API_KEY alias', async () => {
    const check = await checkApiKey({ GEMINI_API_KEY: 'test-secret' });

    expect(check.status).toBe('pass');
    expect(check.message).toBe('GEMINI_API_KEY is set');
  });

  it('reports GOOGLE_API_KEY first', async () => {
    const check = await checkApiKey({ GOOGLE_API_KEY: 'test-secret', GEMINI_API_KEY: 'test-secret' });

    expect(check.message).toBe('GOOGLE_API_KEY is set');
  });
});

describe('runDoctorChecks', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('runs every check in order', async () => {
    fakeTools();

    const result = await runDoctorChecks({ env: { GOOGLE_API_KEY: 'test-secret' } });

    expect(result.checks.map((check) => check.name)).toEqual([
      'Node.js',
      'ffmpeg',
      'ffprobe',
      'Google AI API key',
      'Disk space',
    ]);
    expect(result.checks[1].message).toBe('Installed (6.1.1)');
    expect(result.checks[4].message).toBe('2.0 GB available');
  });

  it('warns when ffprobe is missing and fails without a key', async () => {
    fakeTools(['ffprobe']);

    const result = await runDoctorChecks({ env: {} });

    expect(result.passed).toBe(3);
    expect(result.warned).toBe(1);
    expect(result.failed).toBe(1);
    expect(result.checks[2]).toMatchObject({ status: 'warn', message: 'ffprobe not found' });
  });

  it('checks the configured binary paths', async () => {
    fakeTools(['/opt/ffmpeg/bin/ffmpeg']);

    const result = await runDoctorChecks({
      ffmpegPath: '/opt/ffmpeg/bin/ffmpeg',
      env: { GOOGLE_API_KEY: 'test-secret' },
    });

    expect(result.checks[1]).toMatchObject({ status: 'warn', message: '/opt/ffmpeg/bin/ffmpeg not found' });
  });
});
