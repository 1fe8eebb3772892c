/**
 * Shared types for a diagnostic run.
 */

import type { DoctorError, DoctorErrorCode } from '../errors.js';
import type { GuideTrace } from '../guidance/types.js';

/**
 * Atomic result reported by every probe.
 */
export interface StepOutcome {
  description: string;
  succeeded: boolean;
  message: string;
}

/**
 * Most recent handshake of the first peer on an interface.
 */
export interface HandshakeRecord {
  peerPublicKey: string;
  timestampUnixSeconds: number;
}

/**
 * Freshness judgement of the latest handshake.
 */
export type HandshakeVerdict =
  | { kind: 'fresh'; secondsAgo: number }
  | { kind: 'stale'; minutesAgo: number }
  | { kind: 'absent' }
  | { kind: 'unavailable'; code: HandshakeFailureCode; reason: string };

export type HandshakeFailureCode = Extract<
  DoctorErrorCode,
  'missing_tool' | 'tool_invocation_failure' | 'timeout' | 'malformed_tool_output'
>;

/**
 * The single branch decision of a run.
 */
export type Classification = 'has_handshake' | 'no_handshake';

export interface ToolCheck {
  ok: boolean;
  /** Executables that could not be found */
  missing: string[];
  outcome: StepOutcome;
}

export type KeyDerivation =
  | { ok: true; publicKey: string; outcome: StepOutcome }
  | { ok: false; error: DoctorError; outcome: StepOutcome };

export interface ReachabilityResult {
  reachable: boolean;
  /** Why the endpoint counts as unreachable; null when it answered */
  failure: Extract<DoctorErrorCode, 'network_unreachable' | 'timeout' | 'missing_tool'> | null;
  outcome: StepOutcome;
  /** Extra notes shown after a failed probe */
  notes: string[];
}

export interface HandshakeCheck {
  verdict: HandshakeVerdict;
  /** Parsed record when the output carried one */
  record: HandshakeRecord | null;
  outcome: StepOutcome;
}

export type DnsCheck =
  | { ok: true; outcome: StepOutcome }
  | { ok: false; failure: Extract<DoctorErrorCode, 'resolution_failure'>; outcome: StepOutcome };

/**
 * Everything the orchestrator needs from the host. Implemented by
 * createSystemProbes(); tests substitute canned values.
 */
export interface DoctorProbes {
  checkTools(): Promise<ToolCheck>;
  derivePublicKey(privateKey: string): Promise<KeyDerivation>;
  /** Null on a miss; `onFailure` also hears when the lookup itself failed */
  findInterfaceForPeer(serverPublicKey: string, onFailure?: (error: DoctorError) => void): Promise<string | null>;
  pingHost(host: string): Promise<ReachabilityResult>;
  checkHandshake(interfaceName: string): Promise<HandshakeCheck>;
  checkDNS(): Promise<DnsCheck>;
}

/**
 * A block of remediation instructions.
 */
export interface GuidanceBlock {
  title: string;
  /** Tone of the title when rendered */
  tone: 'info' | 'success' | 'warning' | 'error';
  lines: string[];
}

/**
 * Output and input surface of the doctor. The core never writes to the
 * terminal directly.
 */
export interface Presenter {
  reportStep(description: string, succeeded: boolean, message: string): void;
  reportInfo(message: string): void;
  reportWarning(message: string): void;
  reportError(message: string): void;
  reportSection(title: string): void;
  reportGuidance(block: GuidanceBlock): void;
  reportDebug(message: string): void;
  askChoice(prompt: string, choices: readonly string[], defaultChoice: string): Promise<string>;
  askYesNo(prompt: string, defaultAnswer: boolean): Promise<boolean>;
}

export interface DiagnosisRequest {
  configPath: string;
  /** Use this interface name instead of deriving one */
  interfaceName?: string;
  /** Look the interface up from live state by the peer's public key */
  lookupInterface?: boolean;
}

export type DiagnosisReport =
  | {
      status: 'completed';
      interfaceName: string;
      verdict: HandshakeVerdict;
      classification: Classification;
      steps: StepOutcome[];
      warnings: string[];
      guide: GuideTrace;
    }
  | {
      status: 'aborted';
      error: DoctorError;
      steps: StepOutcome[];
    };
