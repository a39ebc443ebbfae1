// ─── Event Variants ──────────────────────────────────────────────────────────

import { z } from 'zod';

/**
 * What an event looks like on disk and on the wire. Variant fields sit next
 * to the common ones.
 */
export const StoredEventSchema = z
	.object({
		_id: z.string().min(1),
		timestamp: z.number().int(),
		event_type: z.string().min(1),
	})
	.passthrough();

export type StoredEvent = z.infer<typeof StoredEventSchema>;

export interface Attachment {
	name: string;
	/** base64 */
	data: string;
}

// ─── Variants ────────────────────────────────────────────────────────────────

export const TEXT_FORMATS = ['TEXT', 'MARKDOWN', 'HTML'] as const;

export const TextEventSchema = z
	.object({
		title: z.string().default(''),
		text: z.string().default(''),
		textFormat: z.enum(TEXT_FORMATS).default('TEXT'),
	})
	.strict();

export type TextEventInput = z.input<typeof TextEventSchema>;
export type TextEvent = z.output<typeof TextEventSchema>;

/**
 * Closed set of event variants. Each entry validates its payload and turns
 * it into the variant's wire fields.
 */
export type TimelineEventBody = { eventType: 'TEXT'; payload: TextEvent };

export type EventType = TimelineEventBody['eventType'];

interface EventKind {
	parse(payload: unknown): TimelineEventBody;
	serialize(body: TimelineEventBody): Record<string, unknown>;
}

const EVENT_KINDS: Record<EventType, EventKind> = {
	TEXT: {
		parse: (payload) => ({ eventType: 'TEXT', payload: TextEventSchema.parse(payload ?? {}) }),
		serialize: (body) => ({
			title: body.payload.title,
			text: body.payload.text,
			text_format: body.payload.textFormat,
		}),
	},
};

export function isEventType(value: string): value is EventType {
	return Object.prototype.hasOwnProperty.call(EVENT_KINDS, value);
}

/**
 * Validate a payload for the given variant. Throws ZodError on a bad payload.
 */
export function parseEventBody(eventType: EventType, payload: unknown): TimelineEventBody {
	return EVENT_KINDS[eventType].parse(payload);
}

export function serializeEvent(
	eventId: string,
	timestamp: number,
	body: TimelineEventBody,
	attachments: readonly Attachment[],
): StoredEvent {
	const record: StoredEvent = {
		...EVENT_KINDS[body.eventType].serialize(body),
		timestamp,
		event_type: body.eventType,
		_id: eventId,
	};
	if (attachments.length > 0) {
		record.attachments = attachments.map((a) => ({ name: a.name, data: a.data }));
	}
	return record;
}
