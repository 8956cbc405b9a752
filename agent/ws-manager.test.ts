import { describe, it, expect } from 'vitest';
import type { WsEvent } from '@weather-sentinel/shared';
import { ALL_INCIDENTS, WsManager, type LiveSocket } from './ws-manager';

function fakeSocket(readyState = 1) {
    const sent: string[] = [];
    const closeListeners: Array<() => void> = [];
    const socket: LiveSocket = {
        readyState,
        send: (data) => {
            sent.push(data);
        },
        on: (_event, listener) => closeListeners.push(listener),
    };
    return { socket, sent, close: () => closeListeners.forEach((listener) => listener()) };
}

const event = (incidentId: string): WsEvent => ({
    event_type: 'approval_requested',
    incident_id: incidentId,
    timestamp: '2026-10-18T09:00:00.000Z',
    payload: {},
});

describe('WsManager', () => {
    it('delivers to the incident room and to watchers of every incident', () => {
        const manager = new WsManager();
        const incident = fakeSocket();
        const other = fakeSocket();
        const watcher = fakeSocket();
        manager.subscribe('INC-1', incident.socket);
        manager.subscribe('INC-2', other.socket);
        manager.subscribe(ALL_INCIDENTS, watcher.socket);

        const delivered = manager.broadcast(event('INC-1'));

        expect(delivered).toBe(2);
        expect(incident.sent.map((data) => JSON.parse(data))).toEqual([event('INC-1')]);
        expect(watcher.sent).toHaveLength(1);
        expect(other.sent).toEqual([]);
    });

    it('sends once to a socket in both rooms', () => {
        const manager = new WsManager();
        const client = fakeSocket();
        manager.subscribe('INC-1', client.socket);
        manager.subscribe(ALL_INCIDENTS, client.socket);

        expect(manager.broadcast(event('INC-1'))).toBe(1);
        expect(client.sent).toHaveLength(1);
    });

    it('skips sockets that are not open', () => {
        const manager = new WsManager();
        manager.subscribe('INC-1', fakeSocket(3).socket);

        expect(manager.broadcast(event('INC-1'))).toBe(0);
    });

    it('forgets sockets once they close', () => {
        const manager = new WsManager();
        const client = fakeSocket();
        manager.subscribe('INC-1', client.socket);
        expect(manager.getSubscriberCount('INC-1')).toBe(1);

        client.close();

        expect(manager.getSubscriberCount('INC-1')).toBe(0);
    });

    it('drops a socket whose send throws', () => {
        const manager = new WsManager();
        const broken: LiveSocket = {
            readyState: 1,
            send: () => {
                throw new Error('socket reset');
            },
            on: () => undefined,
        };
        manager.subscribe('INC-1', broken);
        manager.subscribe(ALL_INCIDENTS, broken);

        expect(manager.broadcast(event('INC-1'))).toBe(0);
        expect(manager.getSubscriberCount('INC-1')).toBe(0);
        expect(manager.getSubscriberCount(ALL_INCIDENTS)).toBe(0);
    });
});
