/**
 * Render module - terminal formatting for doctor output.
 */

import type { GuidanceBlock } from '../doctor/types.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  red: '\x1b[31m',
};

/**
 * Check if stdout supports colors.
 */
export function supportsColor(): boolean {
  if (process.env.NO_COLOR) return false;
  if (process.env.FORCE_COLOR) return true;
  return process.stdout.isTTY ?? false;
}

export type Paint = (text: string, ...codes: (keyof typeof colors)[]) => string;

export function createPaint(enabled: boolean): Paint {
  return (text, ...codes) => {
    if (!enabled || codes.length === 0) return text;
    return `${codes.map((code) => colors[code]).join('')}${text}${colors.reset}`;
  };
}

export function formatBanner(paint: Paint): string {
  const title = 'tunnel-doctor: your tunnel troubleshooting assistant';
  const rule = '='.repeat(title.length);
  return [paint(rule, 'green'), paint(title, 'bold', 'magenta'), paint(rule, 'green'), ''].join('\n');
}

export function formatStep(paint: Paint, succeeded: boolean, message: string): string {
  const mark = succeeded ? paint('✔', 'bold', 'green') : paint('✖', 'bold', 'red');
  return `${mark} ${message || (succeeded ? 'Done' : 'Failed')}`;
}

export function formatInfo(paint: Paint, message: string): string {
  return `${paint('ℹ', 'cyan')} ${message}`;
}

export function formatWarning(paint: Paint, message: string): string {
  return `${paint('Warning:', 'bold', 'yellow')} ${message}`;
}

export function formatError(paint: Paint, message: string): string {
  return `${paint('Error:', 'bold', 'red')} ${message}`;
}

export function formatSection(paint: Paint, title: string): string {
  return `\n${paint(`--- ${title} ---`, 'bold', 'yellow')}`;
}

const TONE_COLOR: Record<GuidanceBlock['tone'], keyof typeof colors> = {
  info: 'cyan',
  success: 'green',
  warning: 'magenta',
  error: 'red',
};

/**
 * Title line, blank line, body.
 */
export function formatGuidance(paint: Paint, block: GuidanceBlock): string {
  return ['', paint(block.title, 'bold', TONE_COLOR[block.tone]), '', ...block.lines].join('\n');
}

export function formatDebug(paint: Paint, message: string): string {
  return paint(message, 'dim');
}
