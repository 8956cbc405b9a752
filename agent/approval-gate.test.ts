import { afterEach, describe, it, expect, vi } from 'vitest';
import { ApprovalGate, ApprovalNotFoundError, InvalidStateError, type ApprovalEvent, type ApprovalSubject } from './approval-gate';

const subject: ApprovalSubject = {
    incident_id: 'INC-1',
    location: 'Lisbon',
    severity: 'Medium',
    disaster_type: 'Flood',
};

const fixedNow = () => new Date('2026-10-18T09:00:00.000Z');

describe('ApprovalGate', () => {
    let gate: ApprovalGate;

    afterEach(() => {
        gate.dispose();
        vi.useRealTimers();
    });

    it('creates one pending request per incident', () => {
        gate = new ApprovalGate({ timeoutMs: 15 * 60_000, now: fixedNow });

        const first = gate.requestApproval(subject);
        const again = gate.requestApproval(subject);

        expect(again.id).toBe(first.id);
        expect(first).toMatchObject({
            incident_id: 'INC-1',
            status: 'pending',
            requested_at: '2026-10-18T09:00:00.000Z',
            expires_at: '2026-10-18T09:15:00.000Z',
            resolved_by: null,
        });
        expect(gate.list({ status: 'pending' })).toHaveLength(1);
    });

    it('resolves a request exactly once', () => {
        gate = new ApprovalGate({ timeoutMs: 60_000, now: fixedNow });
        const request = gate.requestApproval(subject);

        const approved = gate.resolve(request.id, 'approved', { resolvedBy: 'duty-officer', note: 'river gauge confirms' });

        expect(approved).toMatchObject({
            status: 'approved',
            resolved_by: 'duty-officer',
            note: 'river gauge confirms',
            resolved_at: '2026-10-18T09:00:00.000Z',
        });
        expect(() => gate.resolve(request.id, 'rejected')).toThrow(InvalidStateError);
        expect(() => gate.resolve(request.id, 'rejected')).toThrow(`Approval request ${request.id} is already approved`);
        expect(gate.get(request.id)?.status).toBe('approved');
    });

    it('defaults the resolver to operator', () => {
        gate = new ApprovalGate({ timeoutMs: 60_000 });
        const request = gate.requestApproval(subject);

        expect(gate.resolve(request.id, 'rejected')).toMatchObject({ resolved_by: 'operator', note: null });
    });

    it('opens a fresh request once the previous one is settled', () => {
        gate = new ApprovalGate({ timeoutMs: 60_000 });
        const first = gate.requestApproval(subject);
        gate.resolve(first.id, 'rejected');

        const second = gate.requestApproval(subject);

        expect(second.id).not.toBe(first.id);
        expect(gate.list()).toHaveLength(2);
    });

    it('throws for unknown requests', async () => {
        gate = new ApprovalGate({ timeoutMs: 60_000 });

        expect(() => gate.resolve('APR-missing', 'approved')).toThrow(ApprovalNotFoundError);
        await expect(gate.waitForResolution('APR-missing')).rejects.toBeInstanceOf(ApprovalNotFoundError);
    });

    it('expires pending requests and refuses late decisions', async () => {
        vi.useFakeTimers();
        gate = new ApprovalGate({ timeoutMs: 1000 });
        const request = gate.requestApproval(subject);
        const waiting = gate.waitForResolution(request.id);

        vi.advanceTimersByTime(999);
        expect(gate.get(request.id)?.status).toBe('pending');

        vi.advanceTimersByTime(1);
        const settled = await waiting;

        expect(settled.status).toBe('expired');
        expect(settled.resolved_by).toBeNull();
        expect(() => gate.resolve(request.id, 'approved')).toThrow(`Approval request ${request.id} is already expired`);
        expect(gate.get(request.id)?.status).toBe('expired');
    });

    it('does not expire a request resolved before the deadline', async () => {
        vi.useFakeTimers();
        gate = new ApprovalGate({ timeoutMs: 1000 });
        const request = gate.requestApproval(subject);
        gate.resolve(request.id, 'approved');

        vi.advanceTimersByTime(5000);

        expect(gate.get(request.id)?.status).toBe('approved');
        await expect(gate.waitForResolution(request.id)).resolves.toMatchObject({ status: 'approved' });
    });

    it('refuses a decision arriving after the deadline before the timer has fired', async () => {
        let clock = new Date('2026-10-18T09:00:00.000Z');
        gate = new ApprovalGate({ timeoutMs: 1000, now: () => clock });
        const request = gate.requestApproval(subject);
        const waiting = gate.waitForResolution(request.id);

        clock = new Date('2026-10-18T09:00:01.000Z');

        expect(() => gate.resolve(request.id, 'approved')).toThrow(`Approval request ${request.id} is already expired`);
        expect(gate.get(request.id)).toMatchObject({
            status: 'expired',
            resolved_by: null,
            resolved_at: '2026-10-18T09:00:01.000Z',
        });
        await expect(waiting).resolves.toMatchObject({ status: 'expired' });
    });

    it('forgets the settled requests of an incident', () => {
        gate = new ApprovalGate({ timeoutMs: 60_000 });
        const settled = gate.requestApproval(subject);
        gate.resolve(settled.id, 'rejected');
        const pending = gate.requestApproval(subject);
        const other = gate.requestApproval({ ...subject, incident_id: 'INC-2' });
        gate.resolve(other.id, 'approved');

        gate.forget('INC-1');

        expect(gate.get(settled.id)).toBeUndefined();
        expect(gate.list().map((r) => r.id)).toEqual([pending.id, other.id]);
    });

    it('notifies subscribers and isolates failing listeners', () => {
        gate = new ApprovalGate({ timeoutMs: 60_000 });
        const events: ApprovalEvent[] = [];
        gate.subscribe(() => {
            throw new Error('listener down');
        });
        const unsubscribe = gate.subscribe((event) => events.push(event));

        const request = gate.requestApproval(subject);
        gate.resolve(request.id, 'approved');
        unsubscribe();
        gate.requestApproval({ ...subject, incident_id: 'INC-2' });

        expect(events.map((e) => [e.event_type, e.request.status])).toEqual([
            ['approval_requested', 'pending'],
            ['approval_resolved', 'approved'],
        ]);
    });
});
