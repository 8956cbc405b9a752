import { nanoid } from 'nanoid';
import type {
    ApprovalDecision,
    ApprovalRequest,
    ApprovalStatus,
    Severity,
    WsEventType,
} from '@weather-sentinel/shared';
import { ApprovalStore } from './approval-store';
import { silentLogger, type Logger } from './logger';

export class InvalidStateError extends Error {
    constructor(
        readonly requestId: string,
        readonly status: ApprovalStatus,
    ) {
        super(`Approval request ${requestId} is already ${status}`);
        this.name = 'InvalidStateError';
    }
}

export class ApprovalNotFoundError extends Error {
    constructor(readonly requestId: string) {
        super(`Approval request ${requestId} not found`);
        this.name = 'ApprovalNotFoundError';
    }
}

export interface ApprovalSubject {
    incident_id: string;
    location: string;
    severity: Severity;
    disaster_type: string;
}

export interface ApprovalEvent {
    event_type: WsEventType;
    request: ApprovalRequest;
}

export type ApprovalListener = (event: ApprovalEvent) => void;

export interface ApprovalGateOptions {
    timeoutMs: number;
    logger?: Logger;
    now?: () => Date;
}

/**
 * Suspend/resume point for human oversight.
 * Requests are resolved exactly once: by an operator decision or by the expiry timer, whichever comes first.
 */
export class ApprovalGate {
    private store = new ApprovalStore();
    private timers = new Map<string, NodeJS.Timeout>();
    private waiters = new Map<string, Array<(request: ApprovalRequest) => void>>();
    private listeners = new Set<ApprovalListener>();
    private log: Logger;
    private now: () => Date;

    constructor(private options: ApprovalGateOptions) {
        this.log = (options.logger ?? silentLogger).child({ component: 'approval-gate' });
        this.now = options.now ?? (() => new Date());
    }

    requestApproval(subject: ApprovalSubject): ApprovalRequest {
        const existing = this.store.findPending(subject.incident_id);
        if (existing) {
            this.log.debug({ request_id: existing.id, incident_id: subject.incident_id }, 'approval already pending');
            return existing;
        }

        const requestedAt = this.now();
        const request: ApprovalRequest = {
            id: `APR${nanoid(10)}`,
            incident_id: subject.incident_id,
            location: subject.location,
            severity: subject.severity,
            disaster_type: subject.disaster_type,
            requested_at: requestedAt.toISOString(),
            expires_at: new Date(requestedAt.getTime() + this.options.timeoutMs).toISOString(),
            status: 'pending',
            resolved_at: null,
            resolved_by: null,
            note: null,
        };
        this.store.create(request);
        this.timers.set(
            request.id,
            setTimeout(() => this.expire(request.id), this.options.timeoutMs),
        );

        this.log.info(
            { request_id: request.id, incident_id: request.incident_id, expires_at: request.expires_at },
            `approval requested for ${request.severity} ${request.disaster_type} in ${request.location}`,
        );
        this.emit({ event_type: 'approval_requested', request });
        return request;
    }

    resolve(
        requestId: string,
        decision: ApprovalDecision,
        details: { resolvedBy?: string; note?: string } = {},
    ): ApprovalRequest {
        const request = this.store.get(requestId);
        if (!request) throw new ApprovalNotFoundError(requestId);
        if (request.status !== 'pending') throw new InvalidStateError(requestId, request.status);
        if (this.now().getTime() >= Date.parse(request.expires_at)) {
            this.expire(requestId);
            throw new InvalidStateError(requestId, 'expired');
        }

        const resolved = this.settle(requestId, decision, details.resolvedBy ?? 'operator', details.note ?? null);
        this.log.info({ request_id: requestId, decision, resolved_by: resolved.resolved_by }, 'approval resolved');
        return resolved;
    }

    /**
     * Resolves once the request is approved, rejected or expired
     */
    waitForResolution(requestId: string): Promise<ApprovalRequest> {
        const request = this.store.get(requestId);
        if (!request) return Promise.reject(new ApprovalNotFoundError(requestId));
        if (request.status !== 'pending') return Promise.resolve(request);

        return new Promise((resolve) => {
            const list = this.waiters.get(requestId) ?? [];
            list.push(resolve);
            this.waiters.set(requestId, list);
        });
    }

    get(requestId: string): ApprovalRequest | undefined {
        return this.store.get(requestId);
    }

    list(filter: { status?: ApprovalStatus } = {}): ApprovalRequest[] {
        return this.store.list(filter.status);
    }

    subscribe(listener: ApprovalListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * Drop the settled requests of an incident. A pending request is kept.
     */
    forget(incidentId: string): void {
        this.store.removeSettled(incidentId);
    }

    /**
     * Clear expiry timers. Pending requests stay pending.
     */
    dispose(): void {
        for (const timer of this.timers.values()) clearTimeout(timer);
        this.timers.clear();
    }

    private expire(requestId: string): void {
        const request = this.store.get(requestId);
        if (!request || request.status !== 'pending') return;

        this.settle(requestId, 'expired', null, null);
        this.log.warn({ request_id: requestId, incident_id: request.incident_id }, 'approval request expired');
    }

    private settle(
        requestId: string,
        status: Exclude<ApprovalStatus, 'pending'>,
        resolvedBy: string | null,
        note: string | null,
    ): ApprovalRequest {
        const timer = this.timers.get(requestId);
        if (timer) clearTimeout(timer);
        this.timers.delete(requestId);

        const resolved = this.store.update(requestId, {
            status,
            resolved_at: this.now().toISOString(),
            resolved_by: resolvedBy,
            note,
        });
        if (!resolved) throw new ApprovalNotFoundError(requestId);

        const waiting = this.waiters.get(requestId) ?? [];
        this.waiters.delete(requestId);
        waiting.forEach((wake) => wake(resolved));

        this.emit({ event_type: 'approval_resolved', request: resolved });
        return resolved;
    }

    private emit(event: ApprovalEvent): void {
        this.listeners.forEach((listener) => {
            try {
                listener(event);
            } catch (err) {
                this.log.error({ err, event_type: event.event_type }, 'approval listener failed');
            }
        });
    }
}
