// ─── Timeline (durable event log) ────────────────────────────────────────────

import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import { ZodError } from 'zod';
import {
	EventAlreadySettled,
	InvalidEventPayload,
	TimelineFull,
	UnknownEventKind,
} from '../core/errors';
import { isNotFound, readFileIfExists, removeIfExists, writeFileAtomic } from '../core/files';
import { Logger } from '../daemon/log';
import {
	Attachment,
	EventType,
	StoredEvent,
	StoredEventSchema,
	TimelineEventBody,
	isEventType,
	parseEventBody,
	serializeEvent,
} from './events';

const EVENT_FILE_SUFFIX = '.json';
const EVENT_ID_PATTERN = /^[A-Za-z0-9_.-]+$/;

export interface CreateEventOptions {
	/** Milliseconds since the epoch; defaults to now */
	timestamp?: number;
}

/**
 * An event that has been assigned an id but not yet written. Commit it to
 * persist, or abandon it to drop it; either can only happen once.
 */
export class PendingEvent {
	private readonly attachments: Attachment[] = [];
	private settled = false;

	constructor(
		private readonly timeline: Timeline,
		readonly eventId: string,
		readonly timestamp: number,
		readonly body: TimelineEventBody,
	) {}

	get eventType(): EventType {
		return this.body.eventType;
	}

	get isSettled(): boolean {
		return this.settled;
	}

	/**
	 * Attach supplementary data, stored base64-encoded with the event.
	 */
	attach(name: string, data: Buffer | string): this {
		this.assertOpen();
		const buffer = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
		this.attachments.push({ name, data: buffer.toString('base64') });
		return this;
	}

	toRecord(): StoredEvent {
		return serializeEvent(this.eventId, this.timestamp, this.body, this.attachments);
	}

	commit(): StoredEvent {
		this.assertOpen();
		const record = this.toRecord();
		this.timeline.writeRecord(record);
		this.settled = true;
		return record;
	}

	abandon(): void {
		this.assertOpen();
		this.settled = true;
	}

	private assertOpen(): void {
		if (this.settled) {
			throw new EventAlreadySettled(this.eventId);
		}
	}
}

/**
 * Timeline - A named directory of events, one JSON file per event.
 *
 * Files are unordered on disk; listEvents sorts on read. Events are only
 * removed through clear/clearAll.
 */
export class Timeline {
	constructor(
		readonly name: string,
		readonly dir: string,
		readonly maxEvents: number | undefined,
		private readonly logger: Logger,
	) {
		fs.mkdirSync(dir, { recursive: true });
	}

	/**
	 * Create an event of the given type. Nothing is written until commit().
	 */
	createEvent(eventType: string, payload: unknown = {}, options: CreateEventOptions = {}): PendingEvent {
		if (!isEventType(eventType)) {
			throw new UnknownEventKind(eventType);
		}

		if (this.maxEvents !== undefined && this.count() >= this.maxEvents) {
			throw new TimelineFull(this.name, this.maxEvents);
		}

		let body: TimelineEventBody;
		try {
			body = parseEventBody(eventType, payload);
		} catch (error) {
			if (error instanceof ZodError) {
				throw new InvalidEventPayload(
					eventType,
					error.issues.map((i) => `${i.path.join('.') || '(root)'} ${i.message}`).join(', '),
				);
			}
			throw error;
		}

		const timestamp = options.timestamp ?? Date.now();
		const token = crypto.randomInt(0, 2 ** 31);
		const eventId = `${eventType}_${timestamp}_${token}`;

		this.logger.debug('timeline', `new event ${eventId}`, { timeline: this.name });
		return new PendingEvent(this, eventId, timestamp, body);
	}

	/**
	 * Create and immediately commit an event.
	 */
	addEvent(eventType: string, payload: unknown = {}, options: CreateEventOptions = {}): StoredEvent {
		return this.createEvent(eventType, payload, options).commit();
	}

	/**
	 * Scoped acquisition: create an event, hand it to `build`, commit when
	 * `build` completes, abandon if it throws (the error is rethrown).
	 */
	async record(
		eventType: string,
		payload: unknown,
		build: (event: PendingEvent) => void | Promise<void>,
		options: CreateEventOptions = {},
	): Promise<StoredEvent> {
		const event = this.createEvent(eventType, payload, options);
		try {
			await build(event);
		} catch (error) {
			if (!event.isSettled) {
				event.abandon();
			}
			throw error;
		}
		return event.commit();
	}

	/**
	 * Read every persisted event. When sorted, events come back by ascending
	 * timestamp, ties broken by id.
	 */
	listEvents(sorted = true): StoredEvent[] {
		const events: StoredEvent[] = [];
		for (const filename of this.eventFiles()) {
			const content = readFileIfExists(path.join(this.dir, filename));
			if (content === null) {
				// cleared between listing and reading
				continue;
			}
			const event = this.parseRecord(filename, content);
			if (event) {
				events.push(event);
			}
		}

		if (sorted) {
			events.sort(compareEvents);
		}
		return events;
	}

	count(): number {
		return this.eventFiles().length;
	}

	/**
	 * Delete the named events. Unknown ids are ignored. Returns the number of
	 * files actually removed.
	 */
	clear(eventIds: Iterable<string>): number {
		let removed = 0;
		for (const eventId of eventIds) {
			if (!EVENT_ID_PATTERN.test(eventId) || eventId.startsWith('.')) {
				this.logger.warn('timeline', 'Ignoring malformed event id', {
					timeline: this.name,
					eventId,
				});
				continue;
			}
			if (removeIfExists(this.eventPath(eventId))) {
				removed++;
			}
		}
		return removed;
	}

	/**
	 * Delete every event in the timeline. Maintenance only.
	 */
	clearAll(): number {
		let removed = 0;
		for (const filename of this.eventFiles()) {
			if (removeIfExists(path.join(this.dir, filename))) {
				removed++;
			}
		}
		return removed;
	}

	/** @internal called by PendingEvent.commit */
	writeRecord(record: StoredEvent): void {
		writeFileAtomic(this.eventPath(record._id), JSON.stringify(record));
	}

	private eventPath(eventId: string): string {
		return path.join(this.dir, `${eventId}${EVENT_FILE_SUFFIX}`);
	}

	private eventFiles(): string[] {
		let names: string[];
		try {
			names = fs.readdirSync(this.dir);
		} catch (error) {
			if (isNotFound(error)) {
				return [];
			}
			throw error;
		}
		return names.filter((n) => n.endsWith(EVENT_FILE_SUFFIX) && !n.startsWith('.'));
	}

	private parseRecord(filename: string, content: string): StoredEvent | null {
		try {
			const parsed = StoredEventSchema.parse(JSON.parse(content));
			return { ...parsed, _id: filename.slice(0, -EVENT_FILE_SUFFIX.length) };
		} catch (error) {
			this.logger.warn('timeline', 'Skipping unreadable event file', {
				timeline: this.name,
				file: filename,
				error: String(error),
			});
			return null;
		}
	}
}

function compareEvents(a: StoredEvent, b: StoredEvent): number {
	if (a.timestamp !== b.timestamp) {
		return a.timestamp - b.timestamp;
	}
	return a._id < b._id ? -1 : a._id > b._id ? 1 : 0;
}
