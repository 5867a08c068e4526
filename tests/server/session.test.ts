import { describe, expect, it } from 'vitest';
import { Session } from '../../server/session';
import { FakeTransport } from '../helpers';

function createSession(transport = new FakeTransport('c1')) {
    return new Session({ userId: 'u1', connectionId: 'c1', nickname: 'Alice', roomId: 'r', transport });
}

describe('Session', () => {
    it('should start in connecting', () => {
        const session = createSession();
        expect(session.status).toBe('connecting');
        expect(session.isJoined).toBe(false);
    });

    it('should follow the lifecycle in order', () => {
        const session = createSession();

        expect(session.transition('authenticating')).toBe(true);
        expect(session.transition('joined')).toBe(true);
        expect(session.isJoined).toBe(true);
        expect(session.transition('disconnected')).toBe(true);
        expect(session.status).toBe('disconnected');
    });

    it('should refuse to skip or go back', () => {
        const session = createSession();

        expect(session.transition('joined')).toBe(false);
        expect(session.status).toBe('connecting');

        session.transition('authenticating');
        expect(session.transition('connecting')).toBe(false);
        expect(session.status).toBe('authenticating');
    });

    it('should treat disconnected as terminal', () => {
        const session = createSession();
        session.transition('disconnected');

        expect(session.transition('disconnected')).toBe(false);
        expect(session.transition('authenticating')).toBe(false);
        expect(session.status).toBe('disconnected');
    });

    it('should send through its transport and summarize itself', () => {
        const transport = new FakeTransport('c1');
        const session = createSession(transport);
        session.color = '#4ECDC4';

        session.send({ type: 'timer_stopped' });

        expect(transport.sent).toEqual([{ type: 'timer_stopped' }]);
        expect(session.toSummary()).toEqual({ id: 'u1', nickname: 'Alice', color: '#4ECDC4' });
    });
});
