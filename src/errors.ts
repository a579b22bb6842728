// Voice Command Relay - Error taxonomy
// Only the session controller surfaces errors to callers; matcher, differ and
// detector are total and degrade to "no match" instead.

export type RelayErrorCode =
  | "PERMISSION_UNAVAILABLE"
  | "ENGINE_UNAVAILABLE"
  | "SESSION_START_FAILED"
  | "INVALID_TRIGGER_CONFIG";

export abstract class RelayError extends Error {
  abstract readonly code: RelayErrorCode;
  /** Whether the controller may retry the operation once on its own. */
  abstract readonly transient: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The engine lacks authorization (microphone, speech, API key). Fatal until resolved externally. */
export class PermissionUnavailableError extends RelayError {
  readonly code = "PERMISSION_UNAVAILABLE";
  readonly transient = false;
}

/** The engine is temporarily unreachable. Retried once after a fixed backoff. */
export class EngineUnavailableError extends RelayError {
  readonly code = "ENGINE_UNAVAILABLE";
  readonly transient = true;
}

export class SessionStartFailedError extends RelayError {
  readonly code = "SESSION_START_FAILED";
  readonly transient = false;
}

/** A malformed trigger phrase. Reported as a warning; never fatal to the detector. */
export class InvalidTriggerConfigError extends RelayError {
  readonly code = "INVALID_TRIGGER_CONFIG";
  readonly transient = false;

  constructor(
    message: string,
    readonly phrase: string,
  ) {
    super(message);
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
