import fs from 'node:fs';
import path from 'node:path';
import { DoctorSettings, doctorSettingsSchema } from './schema.js';

export const SETTINGS_FILENAME = 'tunnel-doctor.config.json';

/**
 * Explicit path wins; otherwise look for the default file in `cwd`.
 * Returns null when no settings file applies.
 */
export function resolveSettingsPath(cwd: string, settingsPath?: string): string | null {
  if (settingsPath) {
    return path.resolve(settingsPath);
  }
  const candidate = path.resolve(cwd, SETTINGS_FILENAME);
  return fs.existsSync(candidate) ? candidate : null;
}

export function loadSettings(settingsPath: string | null): DoctorSettings {
  if (settingsPath === null) {
    return doctorSettingsSchema.parse({});
  }
  if (!fs.existsSync(settingsPath)) {
    throw new Error(`Settings not found: ${settingsPath}`);
  }
  const raw = fs.readFileSync(settingsPath, 'utf-8');
  const parsed = JSON.parse(raw) as unknown;
  return doctorSettingsSchema.parse(parsed);
}
