import { beforeEach, describe, expect, it } from 'vitest';
import { DrawingState } from '../../server/drawingState';
import { ValidationError } from '../../server/errors';
import { routeEvent } from '../../server/messageRouter';
import type { RouteContext } from '../../server/messageRouter';

const sender = { userId: 'user1', nickname: 'Alice', color: '#FF6B6B' };

describe('routeEvent', () => {
    let state: DrawingState;
    let context: RouteContext;

    beforeEach(() => {
        state = DrawingState.create('room1', 0);
        context = { state, sender, now: 1_000 };
    });

    it('should append a stroke and broadcast it to everyone but the sender', () => {
        const result = routeEvent(context, {
            type: 'stroke',
            id: 's1',
            points: [{ x: 1, y: 2, pressure: 0.5 }],
            color: '#000',
            size: 4
        });

        const stroke = {
            id: 's1',
            userId: 'user1',
            points: [{ x: 1, y: 2 }],
            color: '#000',
            size: 4,
            layerId: 'layer_0',
            tool: 'brush',
            timestamp: 1_000
        };
        expect(result.eventType).toBe('stroke');
        expect(result.dispatches).toEqual([{ message: { type: 'stroke', stroke }, excludeUserId: 'user1' }]);
        expect(state.strokes).toEqual([stroke]);
    });

    it('should generate a stroke id when none is given', () => {
        routeEvent(context, { type: 'stroke', points: [{ x: 0, y: 0 }], color: '#000', size: 1 });
        expect(state.strokes[0].id).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should attribute strokes to the sender, not the payload', () => {
        routeEvent(context, {
            type: 'stroke',
            id: 's1',
            userId: 'someone-else',
            points: [{ x: 0, y: 0 }],
            color: '#000',
            size: 1
        });
        expect(state.strokes[0].userId).toBe('user1');
    });

    it('should undo the sender\'s newest stroke', () => {
        state.addStroke({ id: 's1', userId: 'user1', points: [{ x: 0, y: 0 }], color: '#000', size: 1, layerId: 'layer_0', tool: 'brush', timestamp: 1 });
        state.addStroke({ id: 's2', userId: 'user2', points: [{ x: 0, y: 0 }], color: '#000', size: 1, layerId: 'layer_0', tool: 'brush', timestamp: 2 });

        const result = routeEvent(context, { type: 'undo' });

        expect(result.dispatches).toEqual([{ message: { type: 'remove_stroke', strokeId: 's1', userId: 'user1' } }]);
        expect(state.strokes.map(stroke => stroke.id)).toEqual(['s2']);
    });

    it('should not broadcast an undo with nothing to remove', () => {
        const result = routeEvent(context, { type: 'undo' });

        expect(result.eventType).toBe('undo');
        expect(result.dispatches).toEqual([]);
    });

    it('should add a layer and broadcast it to everyone', () => {
        const result = routeEvent(context, { type: 'add_layer', id: 'l1', name: 'Ink' });

        expect(result.dispatches).toEqual([{
            message: {
                type: 'layer_added',
                layer: { id: 'l1', name: 'Ink', visible: true, locked: false, opacity: 1, order: 1 }
            }
        }]);
    });

    it('should clear a layer and report the removed count', () => {
        state.addStroke({ id: 's1', userId: 'user2', points: [{ x: 0, y: 0 }], color: '#000', size: 1, layerId: 'layer_0', tool: 'brush', timestamp: 1 });

        const result = routeEvent(context, { type: 'clear_layer', layerId: 'layer_0' });

        expect(result.dispatches).toEqual([{ message: { type: 'layer_cleared', layerId: 'layer_0', removed: 1 } }]);
        expect(state.strokeCount).toBe(0);
    });

    it('should relay cursors with the sender color and store nothing', () => {
        const result = routeEvent(context, { type: 'cursor', x: 15, y: 25 });

        expect(result.dispatches).toEqual([{
            message: { type: 'cursor', userId: 'user1', x: 15, y: 25, color: '#FF6B6B' },
            excludeUserId: 'user1'
        }]);
        expect(state.strokeCount).toBe(0);
    });

    it('should record chat with the sender nickname and echo it to everyone', () => {
        const result = routeEvent(context, { type: 'chat', text: 'hello' });

        expect(result.dispatches).toHaveLength(1);
        const [dispatch] = result.dispatches;
        expect(dispatch.excludeUserId).toBeUndefined();
        expect(dispatch.message).toMatchObject({
            type: 'chat',
            message: { userId: 'user1', nickname: 'Alice', text: 'hello', timestamp: 1_000 }
        });
        expect(state.chatHistory()).toHaveLength(1);
    });

    it('should clamp timer durations and compute the end time', () => {
        const result = routeEvent(context, { type: 'start_timer', duration: 7200 });

        expect(result.dispatches).toEqual([{
            message: { type: 'timer_started', timerEnd: 1_000 + 3_600_000, duration: 3600 }
        }]);
        expect(state.timerEnd).toBe(3_601_000);

        const stopped = routeEvent(context, { type: 'stop_timer' });
        expect(stopped.dispatches).toEqual([{ message: { type: 'timer_stopped' } }]);
        expect(state.timerEnd).toBeNull();
    });

    it('should store thumbnails without broadcasting', () => {
        const result = routeEvent(context, { type: 'save_thumbnail', thumbnail: 'data:image/png;base64,AA' });

        expect(result.dispatches).toEqual([]);
        expect(state.thumbnail).toBe('data:image/png;base64,AA');
    });

    it('should fill reaction defaults and broadcast to everyone', () => {
        const result = routeEvent(context, { type: 'reaction' });

        expect(result.dispatches).toEqual([{
            message: { type: 'reaction', userId: 'user1', emoji: '👍', x: 0, y: 0 }
        }]);
    });

    it('should ignore unknown event types', () => {
        const result = routeEvent(context, { type: 'teleport' });

        expect(result).toEqual({ eventType: null, dispatches: [] });
    });

    it('should leave state untouched when validation fails', () => {
        expect(() => routeEvent(context, { type: 'stroke', points: [{ x: 1, y: 1 }], color: '#000', size: 1, tool: 'line' }))
            .toThrow(ValidationError);
        expect(state.strokeCount).toBe(0);
    });
});
