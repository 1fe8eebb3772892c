/**
 * Diagnostic orchestrator.
 *
 * One strictly sequential pass:
 *   environment_check -> parse_config -> lint -> derive_key -> sanity_check
 *   -> reachability_check -> handshake_check -> guide -> end
 *
 * Only a missing tool, an unparsable config or a failed key derivation ends
 * the run early. Every other step is advisory, and exactly one guidance
 * tree runs before the end.
 */

import path from 'node:path';
import type { TunnelConfig } from '../config/schema.js';
import { DoctorError, isFatalError } from '../errors.js';
import { runGuide } from '../guidance/run-guide.js';
import { NO_HANDSHAKE_TREE, POST_HANDSHAKE_TREE } from '../guidance/trees.js';
import type { GuideTrace } from '../guidance/types.js';
import { lintConfig } from '../lint/config-lint.js';
import { classify, describeVerdict } from '../probes/handshake.js';
import type {
  Classification,
  DiagnosisReport,
  DiagnosisRequest,
  DoctorProbes,
  Presenter,
  StepOutcome
} from './types.js';

export type DiagnosisPhase =
  | 'environment_check'
  | 'parse_config'
  | 'lint'
  | 'derive_key'
  | 'sanity_check'
  | 'reachability_check'
  | 'handshake_check'
  | 'guide'
  | 'end';

export interface DoctorDeps {
  probes: DoctorProbes;
  presenter: Presenter;
  /** Config collaborator; throws DoctorError('config_parse_failure') */
  loadConfig: (configPath: string) => TunnelConfig;
  /** Observes phase transitions */
  onPhase?: (phase: DiagnosisPhase) => void;
}

export const SELF_PAIRED_KEY_MESSAGE =
  "Configuration Error: Your client PrivateKey and the peer's PublicKey are a matching pair. " +
  "The peer's PublicKey should be the *server's* public key.";

/**
 * `/etc/wireguard/wg0.conf` -> `wg0`
 */
export function interfaceNameFromConfigPath(configPath: string): string {
  return path.parse(configPath).name;
}

async function resolveInterfaceName(
  request: DiagnosisRequest,
  config: TunnelConfig,
  deps: DoctorDeps
): Promise<string> {
  if (request.interfaceName) {
    return request.interfaceName;
  }
  const fromPath = interfaceNameFromConfigPath(request.configPath);
  if (!request.lookupInterface) {
    return fromPath;
  }
  const failures: DoctorError[] = [];
  const found = await deps.probes.findInterfaceForPeer(config.serverPublicKey, (error) => {
    failures.push(error);
  });
  if (found === null) {
    const reason =
      failures.length > 0
        ? failures.map((error) => error.message).join(' ')
        : `No active interface has peer ${config.serverPublicKey}.`;
    deps.presenter.reportWarning(`${reason} Falling back to '${fromPath}'.`);
    return fromPath;
  }
  deps.presenter.reportInfo(`Found peer on active interface '${found}'.`);
  return found;
}

export async function runDiagnosis(request: DiagnosisRequest, deps: DoctorDeps): Promise<DiagnosisReport> {
  const { probes, presenter } = deps;
  const steps: StepOutcome[] = [];
  const enter = (phase: DiagnosisPhase): void => deps.onPhase?.(phase);
  const record = (outcome: StepOutcome): void => {
    steps.push(outcome);
    presenter.reportStep(outcome.description, outcome.succeeded, outcome.message);
  };
  const abort = (error: DoctorError): DiagnosisReport => {
    enter('end');
    return { status: 'aborted', error, steps };
  };

  enter('environment_check');
  presenter.reportInfo('Checking for required tools...');
  const tools = await probes.checkTools();
  record(tools.outcome);
  if (!tools.ok) {
    return abort(new DoctorError('missing_tool', tools.outcome.message));
  }

  enter('parse_config');
  let config: TunnelConfig;
  try {
    config = deps.loadConfig(request.configPath);
  } catch (err) {
    if (err instanceof DoctorError && isFatalError(err)) {
      presenter.reportError(err.message);
      return abort(err);
    }
    throw err;
  }

  enter('lint');
  const warnings = lintConfig(config).map((warning) => warning.message);
  for (const warning of warnings) {
    presenter.reportWarning(warning);
  }

  enter('derive_key');
  const derived = await probes.derivePublicKey(config.clientPrivateKey);
  record(derived.outcome);
  if (!derived.ok) {
    return abort(derived.error);
  }

  enter('sanity_check');
  if (derived.publicKey === config.serverPublicKey) {
    presenter.reportError(SELF_PAIRED_KEY_MESSAGE);
  }

  enter('reachability_check');
  const reachability = await probes.pingHost(config.endpointHost);
  record(reachability.outcome);
  for (const note of reachability.notes) {
    presenter.reportInfo(note);
  }

  enter('handshake_check');
  const interfaceName = await resolveInterfaceName(request, config, deps);
  const handshake = await probes.checkHandshake(interfaceName);
  record(handshake.outcome);
  const classification: Classification = classify(handshake.verdict);

  enter('guide');
  const ctx = { presenter, probes, config, onStep: (outcome: StepOutcome) => steps.push(outcome) };
  let guide: GuideTrace;
  if (classification === 'no_handshake') {
    presenter.reportError('No recent handshake detected. This is the primary issue to solve.');
    presenter.reportInfo(`Details: ${describeVerdict(handshake.verdict)}`);
    guide = await runGuide(NO_HANDSHAKE_TREE, ctx);
  } else {
    presenter.reportInfo('A recent handshake was detected! The tunnel itself is likely working.');
    guide = await runGuide(POST_HANDSHAKE_TREE, ctx);
  }

  enter('end');
  presenter.reportInfo('Diagnosis complete.');
  return {
    status: 'completed',
    interfaceName,
    verdict: handshake.verdict,
    classification,
    steps,
    warnings,
    guide
  };
}
