import type { ApprovalRequest, ApprovalStatus } from '@weather-sentinel/shared';

/**
 * In-memory approval request store
 * At most one pending request per incident; settled requests stay until their incident is forgotten.
 */
export class ApprovalStore {
    private requests: Map<string, ApprovalRequest> = new Map();
    private pendingByIncident: Map<string, string> = new Map();

    create(request: ApprovalRequest): void {
        this.requests.set(request.id, request);
        if (request.status === 'pending') {
            this.pendingByIncident.set(request.incident_id, request.id);
        }
    }

    get(id: string): ApprovalRequest | undefined {
        return this.requests.get(id);
    }

    findPending(incidentId: string): ApprovalRequest | undefined {
        const id = this.pendingByIncident.get(incidentId);
        return id ? this.requests.get(id) : undefined;
    }

    update(id: string, updates: Partial<Omit<ApprovalRequest, 'id' | 'incident_id'>>): ApprovalRequest | undefined {
        const request = this.requests.get(id);
        if (!request) return undefined;

        const updated: ApprovalRequest = { ...request, ...updates };
        this.requests.set(id, updated);
        if (updated.status !== 'pending' && this.pendingByIncident.get(updated.incident_id) === id) {
            this.pendingByIncident.delete(updated.incident_id);
        }
        return updated;
    }

    removeSettled(incidentId: string): void {
        for (const [id, request] of this.requests) {
            if (request.incident_id === incidentId && request.status !== 'pending') this.requests.delete(id);
        }
    }

    list(status?: ApprovalStatus): ApprovalRequest[] {
        const all = Array.from(this.requests.values());
        return status ? all.filter((r) => r.status === status) : all;
    }
}
