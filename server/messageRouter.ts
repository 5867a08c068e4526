/**
 * messageRouter.ts - Inbound event dispatch
 *
 * RESPONSIBILITY: validate → mutate → describe broadcasts
 * - Parses the raw payload into a ClientEvent
 * - Applies the mutation to the room's DrawingState
 * - Returns the messages to fan out; it never sends anything itself
 *
 * One event's mutation and its broadcasts come out of a single
 * synchronous step, which RoomManager runs under the room's lock.
 */

import { v4 as uuidv4 } from 'uuid';
import type { DrawingState, Stroke } from './drawingState';
import { parseClientEvent } from './protocol';
import type { ClientEvent, ClientEventType, ServerMessage, StrokeEvent } from './protocol';

const DEFAULT_REACTION = '👍';

export type RouteSender = {
    userId: string;
    nickname: string;
    color: string;
};

export type RouteContext = {
    state: DrawingState;
    sender: RouteSender;
    now: number;
};

/**
 * One outbound message for the room's sessions.
 * `excludeUserId` leaves the sender out of the fan-out.
 */
export type Dispatch = {
    message: ServerMessage;
    excludeUserId?: string;
};

export type RouteResult = {
    // null when the event type is unknown and was ignored
    eventType: ClientEventType | null;
    dispatches: Dispatch[];
};

function toStroke(event: StrokeEvent, sender: RouteSender, now: number): Stroke {
    const stroke: Stroke = {
        id: event.id ?? uuidv4(),
        userId: sender.userId,
        points: event.points.map(point => ({ x: point.x, y: point.y })),
        color: event.color,
        size: event.size,
        layerId: event.layerId,
        tool: event.tool,
        timestamp: now
    };
    if (event.text !== undefined) {
        stroke.text = event.text;
    }
    return stroke;
}

/**
 * Apply one already-validated event.
 */
export function applyEvent(context: RouteContext, event: ClientEvent): Dispatch[] {
    const { state, sender, now } = context;

    switch (event.type) {
        case 'stroke': {
            const stroke = toStroke(event, sender, now);
            state.addStroke(stroke);
            return [{ message: { type: 'stroke', stroke }, excludeUserId: sender.userId }];
        }

        case 'undo': {
            const removed = state.removeLastStrokeBy(sender.userId);
            if (!removed) return [];
            return [{ message: { type: 'remove_stroke', strokeId: removed.id, userId: sender.userId } }];
        }

        case 'add_layer': {
            const layer = state.addLayer({ id: event.id, name: event.name });
            return [{ message: { type: 'layer_added', layer } }];
        }

        case 'clear_layer': {
            const removed = state.clearLayer(event.layerId);
            return [{ message: { type: 'layer_cleared', layerId: event.layerId, removed } }];
        }

        case 'cursor':
            // Ephemeral: nothing is stored
            return [{
                message: { type: 'cursor', userId: sender.userId, x: event.x, y: event.y, color: sender.color },
                excludeUserId: sender.userId
            }];

        case 'chat': {
            const message = state.appendChat(sender.userId, sender.nickname, event.text, now);
            return [{ message: { type: 'chat', message } }];
        }

        case 'start_timer': {
            const timer = state.startTimer(event.duration, now);
            return [{ message: { type: 'timer_started', timerEnd: timer.timerEnd, duration: timer.duration } }];
        }

        case 'stop_timer':
            state.stopTimer();
            return [{ message: { type: 'timer_stopped' } }];

        case 'save_thumbnail':
            state.saveThumbnail(event.thumbnail);
            return [];

        case 'reaction':
            return [{
                message: {
                    type: 'reaction',
                    userId: sender.userId,
                    emoji: event.emoji ?? DEFAULT_REACTION,
                    x: event.x ?? 0,
                    y: event.y ?? 0
                }
            }];

        default: {
            const unhandled: never = event;
            return unhandled;
        }
    }
}

/**
 * Parse and apply one raw payload.
 *
 * @throws ValidationError for malformed payloads (nothing is mutated)
 */
export function routeEvent(context: RouteContext, raw: unknown): RouteResult {
    const event = parseClientEvent(raw);
    if (!event) {
        return { eventType: null, dispatches: [] };
    }
    return { eventType: event.type, dispatches: applyEvent(context, event) };
}
