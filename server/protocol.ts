/**
 * protocol.ts - Wire format between clients and the room server
 *
 * Every message travels on the Socket.IO `message` event as one JSON
 * object tagged by `type`.
 *
 * Inbound events are a closed union validated with zod at the boundary:
 * - unknown `type` values are ignored
 * - a known `type` with missing or malformed fields raises ValidationError
 */

import { z } from 'zod';
import { DEFAULT_LAYER_ID, TOOLS } from './drawingState';
import type { ChatMessage, Layer, RoomView, Stroke, Tool } from './drawingState';
import { ValidationError } from './errors';
import type { RoomStats } from './rooms';
import type { UserSummary } from './session';

export const SOCKET_EVENT = 'message';

// ==========================================
// 1. Client -> Server
// ==========================================

const finiteNumber = z.number().finite();

const pointSchema = z.object({
    x: finiteNumber,
    y: finiteNumber
});

// Shapes defined by two corners need both of them
const TWO_POINT_TOOLS: readonly Tool[] = ['line', 'rect', 'circle'];

const strokeEventSchema = z
    .object({
        type: z.literal('stroke'),
        id: z.string().min(1).optional(),
        points: z.array(pointSchema),
        color: z.string().min(1),
        size: finiteNumber.positive(),
        layerId: z.string().min(1).default(DEFAULT_LAYER_ID),
        tool: z.enum(TOOLS).default('brush'),
        text: z.string().optional()
    })
    .superRefine((event, ctx) => {
        const required = TWO_POINT_TOOLS.includes(event.tool) ? 2 : 1;
        if (event.points.length < required) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['points'],
                message: `${event.tool} needs at least ${required} point(s)`
            });
        }
    });

const clientEventSchemas = {
    stroke: strokeEventSchema,
    undo: z.object({ type: z.literal('undo') }),
    add_layer: z.object({
        type: z.literal('add_layer'),
        id: z.string().min(1).optional(),
        name: z.string().min(1).optional()
    }),
    clear_layer: z.object({
        type: z.literal('clear_layer'),
        layerId: z.string().min(1)
    }),
    cursor: z.object({
        type: z.literal('cursor'),
        x: finiteNumber,
        y: finiteNumber
    }),
    chat: z.object({
        type: z.literal('chat'),
        text: z.string().min(1)
    }),
    start_timer: z.object({
        type: z.literal('start_timer'),
        duration: finiteNumber
    }),
    stop_timer: z.object({ type: z.literal('stop_timer') }),
    save_thumbnail: z.object({
        type: z.literal('save_thumbnail'),
        thumbnail: z.string()
    }),
    reaction: z.object({
        type: z.literal('reaction'),
        emoji: z.string().optional(),
        x: finiteNumber.optional(),
        y: finiteNumber.optional()
    })
};

export type ClientEventType = keyof typeof clientEventSchemas;

export type ClientEvent = {
    [K in ClientEventType]: z.infer<(typeof clientEventSchemas)[K]>;
}[ClientEventType];

export type StrokeEvent = z.infer<typeof strokeEventSchema>;

function isClientEventType(value: string): value is ClientEventType {
    return Object.prototype.hasOwnProperty.call(clientEventSchemas, value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate one inbound payload.
 *
 * @returns the typed event, or null for an unknown event type
 * @throws ValidationError when the payload is not an object or a known
 *         event type is missing required fields
 */
export function parseClientEvent(raw: unknown): ClientEvent | null {
    if (!isRecord(raw) || typeof raw.type !== 'string') {
        throw new ValidationError('Invalid message format');
    }

    const type = raw.type;
    if (!isClientEventType(type)) {
        return null;
    }

    const result = clientEventSchemas[type].safeParse(raw);
    if (!result.success) {
        const detail = result.error.issues
            .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
            .join('; ');
        throw new ValidationError(`Invalid ${type} event: ${detail}`, type);
    }
    return result.data;
}

// ==========================================
// 2. Server -> Client
// ==========================================

export type ServerMessage =
    | {
        // Sent once, to the joining session only
        type: 'init';
        userId: string;
        room: RoomView;
        users: UserSummary[];
        stats: RoomStats;
        yourColor: string;
    }
    | {
        type: 'user_joined';
        userId: string;
        nickname: string;
        color: string;
        users: UserSummary[];
    }
    | {
        type: 'user_left';
        userId: string;
        nickname: string;
        users: UserSummary[];
    }
    | { type: 'stroke'; stroke: Stroke }
    | { type: 'remove_stroke'; strokeId: string; userId: string }
    | { type: 'layer_added'; layer: Layer }
    | { type: 'layer_cleared'; layerId: string; removed: number }
    | { type: 'cursor'; userId: string; x: number; y: number; color: string }
    | { type: 'chat'; message: ChatMessage }
    | { type: 'timer_started'; timerEnd: number; duration: number }
    | { type: 'timer_stopped' }
    | { type: 'reaction'; userId: string; emoji: string; x: number; y: number }
    | { type: 'error'; message: string };

export type ServerMessageType = ServerMessage['type'];

export function errorReply(message: string): ServerMessage {
    return { type: 'error', message };
}
