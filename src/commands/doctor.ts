import path from 'node:path';
import { loadSettings, resolveSettingsPath } from '../config/load.js';
import type { DoctorSettings } from '../config/schema.js';
import { loadTunnelConfig } from '../config/wg-conf.js';
import { runDiagnosis } from '../doctor/orchestrator.js';
import type { DiagnosisReport } from '../doctor/types.js';
import { PromptCancelledError } from '../errors.js';
import { runCommand, withCommandLog } from '../exec/run-command.js';
import { createSystemProbes } from '../probes/system.js';
import { ConsolePresenter } from '../ux/presenter.js';
import { createPaint, formatBanner, supportsColor } from '../ux/render.js';

export interface DoctorOptions {
  configPath: string;
  interfaceName?: string;
  lookupInterface?: boolean;
  settings?: string;
  nonInteractive?: boolean;
  verbose?: boolean;
}

/**
 * Warning shown when the tunnel state queries will likely be refused.
 * Returns null on Windows, as root, or under sudo.
 */
export function privilegeWarning(
  platform: NodeJS.Platform,
  uid: number | undefined,
  env: NodeJS.ProcessEnv
): string | null {
  if (platform === 'win32' || uid === undefined || uid === 0 || env.SUDO_UID) {
    return null;
  }
  return 'Tunnel state queries usually need root privileges. If checks fail, re-run with sudo.';
}

/**
 * Process exit code for a finished diagnosis.
 */
export function exitCodeFor(report: DiagnosisReport): number {
  return report.status === 'completed' ? 0 : 1;
}

/**
 * SIGINT listener for the automated checks: Ctrl-C outside a prompt ends
 * the run the same way a cancelled prompt does.
 */
export function interruptHandler(
  presenter: Pick<ConsolePresenter, 'print'>,
  exit: (code: number) => void
): () => void {
  return () => {
    presenter.print('\nExiting.');
    exit(0);
  };
}

export async function doctorCommand(options: DoctorOptions): Promise<void> {
  const color = supportsColor();
  const presenter = new ConsolePresenter({
    interactive: !options.nonInteractive && process.stdin.isTTY === true,
    verbose: options.verbose ?? false,
    color
  });

  presenter.print(formatBanner(createPaint(color)));

  const warning = privilegeWarning(process.platform, process.getuid?.(), process.env);
  if (warning) {
    presenter.reportInfo(warning);
  }

  let settings: DoctorSettings;
  try {
    const settingsPath = resolveSettingsPath(process.cwd(), options.settings);
    settings = loadSettings(settingsPath);
    if (settingsPath) {
      presenter.reportDebug(`Settings: ${settingsPath}`);
    }
  } catch (err) {
    presenter.reportError(`Settings: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
    return;
  }

  const runner = options.verbose
    ? withCommandLog(runCommand, (line) => presenter.reportDebug(line))
    : runCommand;

  const onInterrupt = interruptHandler(presenter, (code) => process.exit(code));
  process.once('SIGINT', onInterrupt);
  try {
    const report = await runDiagnosis(
      {
        configPath: path.resolve(options.configPath),
        interfaceName: options.interfaceName,
        lookupInterface: options.lookupInterface
      },
      {
        probes: createSystemProbes(settings, { runner }),
        presenter,
        loadConfig: loadTunnelConfig
      }
    );
    process.exitCode = exitCodeFor(report);
  } catch (err) {
    if (err instanceof PromptCancelledError) {
      presenter.print('\nExiting.');
      process.exitCode = 0;
      return;
    }
    presenter.reportError(`An unexpected error occurred: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}
