/**
 * doctor.ts - Environment health check for the sopgen CLI
 *
 * Checks that everything SOP generation needs is available:
 * - Node.js version compatibility
 * - ffmpeg / ffprobe (snapshots degrade to plain tags without them)
 * - Google AI API key (required)
 * - Disk space (for output)
 */

import { stat } from 'fs/promises';
import { execFile as execFileCb } from 'child_process';
import { platform } from 'os';

// ============================================================================
// Types
// ============================================================================

export interface DoctorCheck {
  name: string;
  status: 'pass' | 'fail' | 'warn';
  message: string;
  hint?: string;
}

export interface DoctorOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  env?: NodeJS.ProcessEnv;
}

export interface DoctorResult {
  checks: DoctorCheck[];
  passed: number;
  warned: number;
  failed: number;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Safe child environment -- only expose PATH and essential vars.
 */
const SAFE_CHILD_ENV = {
  PATH: process.env.PATH,
  HOME: process.env.HOME || process.env.USERPROFILE,
  USERPROFILE: process.env.USERPROFILE,
  LANG: process.env.LANG,
};

/**
 * Execute a command and return stdout, or null on failure.
 */
function execQuiet(command: string, args: string[]): Promise<string | null> {
  return new Promise((resolve) => {
    execFileCb(command, args, { env: SAFE_CHILD_ENV }, (error, stdout) => {
      if (error) {
        resolve(null);
      } else {
        resolve(stdout?.toString().trim() ?? '');
      }
    });
  });
}

const MIN_NODE_MAJOR = 20;

/**
 * Parse a semver string into [major, minor, patch].
 */
function parseSemver(version: string): [number, number, number] | null {
  const match = version.match(/(\d+)\.(\d+)\.(\d+)/);
  if (!match) return null;
  return [parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10)];
}

// ============================================================================
// Check functions
// ============================================================================

export async function checkNodeVersion(version: string = process.version): Promise<DoctorCheck> {
  const parsed = parseSemver(version);

  if (!parsed) {
    return {
      name: 'Node.js',
      status: 'warn',
      message: `Unknown version: ${version}`,
      hint: 'sopgen requires Node.js >= 20.0.0',
    };
  }

  const [major] = parsed;

  if (major >= MIN_NODE_MAJOR) {
    return {
      name: 'Node.js',
      status: 'pass',
      message: `${version} (>= 20.0.0)`,
    };
  }

  return {
    name: 'Node.js',
    status: 'fail',
    message: `${version} is too old`,
    hint: 'sopgen requires Node.js >= 20.0.0. Upgrade at https://nodejs.org',
  };
}

async function checkFfmpeg(ffmpegPath: string): Promise<DoctorCheck> {
  const stdout = await execQuiet(ffmpegPath, ['-version']);

  if (stdout === null) {
    const os = platform();
    const installHint =
      os === 'darwin'
        ? 'brew install ffmpeg'
        : os === 'win32'
          ? 'winget install ffmpeg (or download from https://ffmpeg.org)'
          : 'apt install ffmpeg (or your package manager)';

    return {
      name: 'ffmpeg',
      status: 'warn',
      message: `${ffmpegPath} not found`,
      hint: `Without ffmpeg, timestamp tags are left as text. Install via: ${installHint}`,
    };
  }

  // Extract version from first line, e.g. "ffmpeg version 6.1.1 ..."
  const versionMatch = stdout.match(/ffmpeg version (\S+)/);
  const version = versionMatch ? versionMatch[1] : 'unknown';

  return {
    name: 'ffmpeg',
    status: 'pass',
    message: `Installed (${version})`,
  };
}

async function checkFfprobe(ffprobePath: string): Promise<DoctorCheck> {
  const stdout = await execQuiet(ffprobePath, ['-version']);

  if (stdout === null) {
    return {
      name: 'ffprobe',
      status: 'warn',
      message: `${ffprobePath} not found`,
      hint: 'ffprobe is usually installed alongside ffmpeg; without it snapshot offsets are not checked against the video length',
    };
  }

  const versionMatch = stdout.match(/ffprobe version (\S+)/);
  const version = versionMatch ? versionMatch[1] : 'unknown';

  return {
    name: 'ffprobe',
    status: 'pass',
    message: `Installed (${version})`,
  };
}

export async function checkApiKey(env: NodeJS.ProcessEnv = process.env): Promise<DoctorCheck> {
  const variable = env.GOOGLE_API_KEY?.trim()
    ? 'GOOGLE_API_KEY'
    : env.GEMINI_API_KEY?.trim()
      ? 'GEMINI_API_KEY'
      : null;

  if (!variable) {
    return {
      name: 'Google AI API key',
      status: 'fail',
      message: 'GOOGLE_API_KEY not set',
      hint: 'Required. Set GOOGLE_API_KEY in your environment or .env file. Get a key at https://aistudio.google.com',
    };
  }

  return {
    name: 'Google AI API key',
    status: 'pass',
    message: `${variable} is set`,
  };
}

async function checkDiskSpace(): Promise<DoctorCheck> {
  // Free space in the working directory, where output goes by default
  const targetDir = process.cwd();

  try {
    // On most systems we cannot determine free space from stat alone.
    // Use `df` on POSIX systems for a real check.
    if (platform() !== 'win32') {
      const dfOutput = await execQuiet('df', ['-k', targetDir]);
      if (dfOutput) {
        // Parse df output: Filesystem 1K-blocks Used Available Use% Mounted
        const lines = dfOutput.split('\n');
        if (lines.length >= 2) {
          const parts = lines[1].split(/\s+/);
          if (parts.length >= 4) {
            const availableKB = parseInt(parts[3], 10);
            if (!isNaN(availableKB)) {
              const availableGB = availableKB / (1024 * 1024);
              if (availableGB < 1) {
                return {
                  name: 'Disk space',
                  status: 'warn',
                  message: `${availableGB.toFixed(1)} GB available (low)`,
                  hint: 'PDF and HTML exports embed every snapshot; free up some space for long procedures',
                };
              }
              return {
                name: 'Disk space',
                status: 'pass',
                message: `${availableGB.toFixed(1)} GB available`,
              };
            }
          }
        }
      }
    }

    // Fallback: just confirm the directory is reachable
    await stat(targetDir);
    return {
      name: 'Disk space',
      status: 'pass',
      message: 'Output directory accessible',
    };
  } catch {
    return {
      name: 'Disk space',
      status: 'warn',
      message: 'Could not determine available disk space',
    };
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Run all doctor checks and return the result.
 */
export async function runDoctorChecks(options: DoctorOptions = {}): Promise<DoctorResult> {
  const { ffmpegPath = 'ffmpeg', ffprobePath = 'ffprobe', env = process.env } = options;

  const checks = await Promise.all([
    checkNodeVersion(),
    checkFfmpeg(ffmpegPath),
    checkFfprobe(ffprobePath),
    checkApiKey(env),
    checkDiskSpace(),
  ]);

  const passed = checks.filter((c) => c.status === 'pass').length;
  const warned = checks.filter((c) => c.status === 'warn').length;
  const failed = checks.filter((c) => c.status === 'fail').length;

  return { checks, passed, warned, failed };
}
