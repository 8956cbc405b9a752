import type { WsEvent } from '@weather-sentinel/shared';

// ws.WebSocket.OPEN
const OPEN = 1;

/**
 * The part of a ws socket the manager relies on
 */
export interface LiveSocket {
    readonly readyState: number;
    send(data: string): void;
    on(event: 'close', listener: () => void): unknown;
}

export const ALL_INCIDENTS = '*';

/**
 * WebSocket connection manager
 * Room-based broadcasting of approval events, per incident or for every incident
 */
export class WsManager {
    // Map of incident_id (or ALL_INCIDENTS) -> Set of WebSocket connections
    private rooms: Map<string, Set<LiveSocket>> = new Map();

    subscribe(room: string, ws: LiveSocket): void {
        let members = this.rooms.get(room);
        if (!members) {
            members = new Set();
            this.rooms.set(room, members);
        }
        members.add(ws);

        ws.on('close', () => {
            this.unsubscribe(room, ws);
        });
    }

    unsubscribe(room: string, ws: LiveSocket): void {
        const members = this.rooms.get(room);
        if (members) {
            members.delete(ws);
            if (members.size === 0) {
                this.rooms.delete(room);
            }
        }
    }

    /**
     * Send to the incident's room and to clients watching every incident.
     * Returns the number of sockets that accepted the message.
     */
    broadcast(event: WsEvent): number {
        const targets = new Set<LiveSocket>([
            ...(this.rooms.get(event.incident_id) ?? []),
            ...(this.rooms.get(ALL_INCIDENTS) ?? []),
        ]);

        const message = JSON.stringify(event);
        let delivered = 0;
        targets.forEach((ws) => {
            if (ws.readyState !== OPEN) return;
            try {
                ws.send(message);
                delivered += 1;
            } catch {
                this.drop(ws);
            }
        });
        return delivered;
    }

    private drop(ws: LiveSocket): void {
        for (const room of Array.from(this.rooms.keys())) {
            this.unsubscribe(room, ws);
        }
    }

    getSubscriberCount(room: string): number {
        return this.rooms.get(room)?.size ?? 0;
    }
}
