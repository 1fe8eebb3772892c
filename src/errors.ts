/**
 * Error taxonomy for a diagnostic run.
 *
 * Probes report tool failures as tagged results that carry one of these
 * codes; a DoctorError object is only built where a step hands a failure
 * back to its caller (config parsing, key derivation, interface lookup).
 */

export type DoctorErrorCode =
  | 'missing_tool'
  | 'config_parse_failure'
  | 'tool_invocation_failure'
  | 'timeout'
  | 'malformed_tool_output'
  | 'network_unreachable'
  | 'resolution_failure';

/**
 * Codes that end the run with a non-zero exit.
 * Key derivation failures are also fatal, but only at that step, so they
 * are decided by the orchestrator rather than by code.
 */
const FATAL_CODES = new Set<DoctorErrorCode>(['missing_tool', 'config_parse_failure']);

export class DoctorError extends Error {
  readonly code: DoctorErrorCode;

  constructor(code: DoctorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DoctorError';
    this.code = code;
  }
}

export function isFatalError(error: DoctorError): boolean {
  return FATAL_CODES.has(error.code);
}

/**
 * Raised by the presenter when the user dismisses a prompt (Ctrl-C / Esc).
 */
export class PromptCancelledError extends Error {
  constructor() {
    super('Prompt cancelled');
    this.name = 'PromptCancelledError';
  }
}
