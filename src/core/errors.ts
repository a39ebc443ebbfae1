// ─── Error Taxonomy ──────────────────────────────────────────────────────────

/**
 * Base class for every error raised by the agent. `code` is stable and safe
 * to match on; `message` is meant for humans.
 */
export class EdgeSyncError extends Error {
	constructor(readonly code: string, message: string) {
		super(message);
		this.name = new.target.name;
	}
}

// ─── Client-level (fatal to the daemon) ──────────────────────────────────────

/**
 * Unrecoverable client-level failure. The poll loop lets these escape and the
 * daemon terminates.
 */
export class ClientError extends EdgeSyncError {
	constructor(message: string, code = 'CLIENT_ERROR') {
		super(code, message);
	}
}

export class ConfigError extends ClientError {
	constructor(readonly problems: readonly string[]) {
		super(`Configuration validation failed:\n${problems.join('\n')}`, 'CONFIG_INVALID');
	}
}

// ─── Cycle-level ─────────────────────────────────────────────────────────────

/** Aborts the current reconciliation cycle; the next cycle retries. */
export class CycleAbortedError extends EdgeSyncError {}

export class AuthRejected extends CycleAbortedError {
	constructor(detail: string) {
		super('AUTH_REJECTED', `Authentication rejected: ${detail}`);
	}
}

export class CredentialRequired extends CycleAbortedError {
	constructor() {
		super(
			'CREDENTIAL_REQUIRED',
			"sync failed -- no auth token, has this device been registered?",
		);
	}
}

// ─── Batch client ────────────────────────────────────────────────────────────

export class CallFailed extends EdgeSyncError {
	constructor(readonly callId: string, readonly detail: string, code = 'CALL_FAILED') {
		super(code, `Call '${callId}' failed: ${detail}`);
	}
}

/** The whole round trip failed; every queued call reports this. */
export class TransportFailure extends CallFailed {
	constructor(callId: string, detail: string) {
		super(callId, detail, 'TRANSPORT_FAILURE');
	}
}

export class UnknownCallId extends EdgeSyncError {
	constructor(readonly callId: string) {
		super('UNKNOWN_CALL_ID', `No call with id '${callId}' was queued in this batch`);
	}
}

export class DuplicateCallId extends EdgeSyncError {
	constructor(readonly callId: string) {
		super('DUPLICATE_CALL_ID', `Call id '${callId}' is already queued in this batch`);
	}
}

export class BatchAlreadySent extends EdgeSyncError {
	constructor() {
		super('BATCH_ALREADY_SENT', 'Batch has already been sent');
	}
}

// ─── Timeline ────────────────────────────────────────────────────────────────

export class UnknownEventKind extends EdgeSyncError {
	constructor(readonly eventType: string) {
		super('UNKNOWN_EVENT_KIND', `No event type '${eventType}'`);
	}
}

export class InvalidEventPayload extends EdgeSyncError {
	constructor(readonly eventType: string, detail: string) {
		super('INVALID_EVENT_PAYLOAD', `Invalid payload for event type '${eventType}': ${detail}`);
	}
}

export class TimelineFull extends EdgeSyncError {
	constructor(readonly timeline: string, readonly maxEvents: number) {
		super('TIMELINE_FULL', `Timeline '${timeline}' has reached its maximum size (${maxEvents})`);
	}
}

export class UnknownTimeline extends EdgeSyncError {
	constructor(readonly timeline: string) {
		super('UNKNOWN_TIMELINE', `No timeline called '${timeline}' exists`);
	}
}

export class EventAlreadySettled extends EdgeSyncError {
	constructor(readonly eventId: string) {
		super('EVENT_SETTLED', `Event '${eventId}' was already committed or abandoned`);
	}
}

// ─── Control channel ─────────────────────────────────────────────────────────

export class BadLocalCommand extends EdgeSyncError {
	constructor(readonly command: string) {
		super('BAD_COMMAND', `Unrecognised command '${command}'`);
	}
}

export class DaemonNotRunning extends EdgeSyncError {
	constructor(readonly state: string) {
		super('DAEMON_NOT_RUNNING', `daemon is ${state}`);
	}
}

/**
 * Render any thrown value as a single line of text.
 */
export function describeError(error: unknown): string {
	if (error instanceof Error) {
		return error.message.replace(/\s*\n\s*/g, '; ');
	}
	return String(error);
}
