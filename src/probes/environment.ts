import fs from 'node:fs';
import path from 'node:path';
import type { ToolCheck } from '../doctor/types.js';

export interface ExecutableLookupEnv {
  platform: NodeJS.Platform;
  /** Raw PATH value */
  searchPath: string;
  /** Raw PATHEXT value (Windows only) */
  pathExt?: string;
}

export type ExecutableFinder = (name: string) => string | null;

function isExecutable(file: string, platform: NodeJS.Platform): boolean {
  try {
    const stat = fs.statSync(file);
    if (!stat.isFile()) return false;
    if (platform === 'win32') return true;
    fs.accessSync(file, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locate `name` on the search path. Names containing a path separator are
 * checked as given.
 */
export function findExecutable(name: string, env: ExecutableLookupEnv): string | null {
  const isWindows = env.platform === 'win32';
  const delimiter = isWindows ? ';' : ':';
  const extensions = isWindows
    ? ['', ...(env.pathExt ?? '.COM;.EXE;.BAT;.CMD').split(';').filter(Boolean)]
    : [''];

  if (name.includes('/') || (isWindows && name.includes('\\'))) {
    return extensions.map((ext) => name + ext).find((candidate) => isExecutable(candidate, env.platform)) ?? null;
  }

  for (const dir of env.searchPath.split(delimiter)) {
    if (!dir) continue;
    for (const ext of extensions) {
      const candidate = path.join(dir, name + ext);
      if (isExecutable(candidate, env.platform)) {
        return candidate;
      }
    }
  }
  return null;
}

export function systemExecutableFinder(): ExecutableFinder {
  return (name) =>
    findExecutable(name, {
      platform: process.platform,
      searchPath: process.env.PATH ?? '',
      pathExt: process.env.PATHEXT
    });
}

/**
 * Remediation text for a missing tunnel helper, per OS.
 */
export function missingWgMessage(bin: string, platform: NodeJS.Platform): string {
  const base = `\`${bin}\` command not found.`;
  switch (platform) {
    case 'linux':
      return `${base} Install wireguard-tools with your package manager (e.g. \`sudo apt install wireguard-tools\` or \`sudo dnf install wireguard-tools\`).`;
    case 'darwin':
      return `${base} Install it with Homebrew: \`brew install wireguard-tools\`.`;
    case 'win32':
      return `${base} Install WireGuard for Windows and add its install folder (usually C:\\Program Files\\WireGuard) to your PATH.`;
    default:
      return `${base} Is WireGuard installed and in your PATH?`;
  }
}

/**
 * Remediation text for a missing echo probe, per OS.
 */
export function missingPingMessage(bin: string, platform: NodeJS.Platform): string {
  const base = `\`${bin}\` command not found. This is highly unusual.`;
  switch (platform) {
    case 'linux':
      return `${base} Install it with your package manager (e.g. \`sudo apt install iputils-ping\`).`;
    case 'darwin':
      return `${base} It ships with macOS at /sbin/ping; check that /sbin is on your PATH.`;
    case 'win32':
      return `${base} It ships with Windows at C:\\Windows\\System32\\ping.exe; check that System32 is on your PATH.`;
    default:
      return `${base} Install a ping utility and make sure it is on your PATH.`;
  }
}

export interface ToolCheckInput {
  wgBin: string;
  pingBin: string;
  platform: NodeJS.Platform;
  find: ExecutableFinder;
}

export function checkTools(input: ToolCheckInput): ToolCheck {
  const description = 'Verifying tool availability';
  const missing: string[] = [];

  if (input.find(input.wgBin) === null) {
    missing.push(input.wgBin);
    return {
      ok: false,
      missing,
      outcome: { description, succeeded: false, message: missingWgMessage(input.wgBin, input.platform) }
    };
  }

  if (input.find(input.pingBin) === null) {
    missing.push(input.pingBin);
    return {
      ok: false,
      missing,
      outcome: { description, succeeded: false, message: missingPingMessage(input.pingBin, input.platform) }
    };
  }

  return {
    ok: true,
    missing,
    outcome: { description, succeeded: true, message: 'Required tools are available.' }
  };
}
