import Fastify from 'fastify';
import websocket from '@fastify/websocket';
import { z } from 'zod';
import type { ApiResponse, ApprovalRequest, AuditRecord, Incident, WsEvent } from '@weather-sentinel/shared';
import { ApprovalNotFoundError, InvalidStateError, type ApprovalGate } from './approval-gate';
import type { AuditLog } from './audit';
import { silentLogger, type Logger } from './logger';
import type { WorkflowEngine } from './workflow';
import { ALL_INCIDENTS, WsManager } from './ws-manager';

export interface ApprovalServerDeps {
    gate: ApprovalGate;
    audit: AuditLog;
    incidents: Pick<WorkflowEngine, 'get' | 'list'>;
    logger?: Logger;
}

const statusQuerySchema = z.object({
    status: z.enum(['pending', 'approved', 'rejected', 'expired']).optional(),
});

const resolveBodySchema = z.object({
    decision: z.enum(['approved', 'rejected']),
    resolved_by: z.string().min(1).max(200).optional(),
    note: z.string().max(2000).optional(),
});

/**
 * Operator console API: list and resolve approval requests, inspect incidents and their audit trail
 */
export function buildApprovalServer(deps: ApprovalServerDeps) {
    const { gate, audit, incidents } = deps;
    const app = Fastify({ logger: (deps.logger ?? silentLogger).child({ component: 'approval-api' }) });
    const wsManager = new WsManager();

    const unsubscribe = gate.subscribe((event) => {
        const wsEvent: WsEvent = {
            event_type: event.event_type,
            incident_id: event.request.incident_id,
            timestamp: new Date().toISOString(),
            payload: { request: event.request },
        };
        wsManager.broadcast(wsEvent);
    });
    app.addHook('onClose', async () => {
        unsubscribe();
    });

    app.register(websocket);

    /**
     * GET /approvals - List approval requests, optionally by status
     */
    app.get('/approvals', async (request, reply) => {
        const query = statusQuerySchema.safeParse(request.query);
        if (!query.success) {
            const response: ApiResponse = { success: false, error: 'Invalid status filter' };
            return reply.code(400).send(response);
        }
        const response: ApiResponse<ApprovalRequest[]> = {
            success: true,
            data: gate.list({ status: query.data.status }),
        };
        return reply.send(response);
    });

    /**
     * GET /approvals/:id - Get one approval request
     */
    app.get<{
        Params: { id: string };
    }>('/approvals/:id', async (request, reply) => {
        const approval = gate.get(request.params.id);
        if (!approval) {
            const response: ApiResponse = { success: false, error: 'Approval request not found' };
            return reply.code(404).send(response);
        }
        const response: ApiResponse<ApprovalRequest> = { success: true, data: approval };
        return reply.send(response);
    });

    /**
     * POST /approvals/:id/resolve - Approve or reject a pending request
     */
    app.post<{
        Params: { id: string };
    }>('/approvals/:id/resolve', async (request, reply) => {
        const body = resolveBodySchema.safeParse(request.body);
        if (!body.success) {
            const response: ApiResponse = {
                success: false,
                error: 'Body must be { decision: "approved" | "rejected", resolved_by?, note? }',
            };
            return reply.code(400).send(response);
        }

        try {
            const resolved = gate.resolve(request.params.id, body.data.decision, {
                resolvedBy: body.data.resolved_by,
                note: body.data.note,
            });
            const response: ApiResponse<ApprovalRequest> = { success: true, data: resolved };
            return reply.send(response);
        } catch (err) {
            if (err instanceof ApprovalNotFoundError) {
                const response: ApiResponse = { success: false, error: err.message };
                return reply.code(404).send(response);
            }
            if (err instanceof InvalidStateError) {
                const response: ApiResponse = { success: false, error: err.message };
                return reply.code(409).send(response);
            }
            throw err;
        }
    });

    /**
     * GET /incidents - Incidents of this run
     */
    app.get('/incidents', async (request, reply) => {
        const response: ApiResponse<Incident[]> = { success: true, data: incidents.list() };
        return reply.send(response);
    });

    /**
     * GET /incidents/:id - Incident details
     */
    app.get<{
        Params: { id: string };
    }>('/incidents/:id', async (request, reply) => {
        const incident = incidents.get(request.params.id);
        if (!incident) {
            const response: ApiResponse = { success: false, error: 'Incident not found' };
            return reply.code(404).send(response);
        }
        const response: ApiResponse<Incident> = { success: true, data: incident };
        return reply.send(response);
    });

    /**
     * GET /incidents/:id/audit - Audit records in transition order
     */
    app.get<{
        Params: { id: string };
    }>('/incidents/:id/audit', async (request, reply) => {
        const records = audit.historyOf(request.params.id);
        if (records.length === 0) {
            const response: ApiResponse = { success: false, error: 'No audit records for incident' };
            return reply.code(404).send(response);
        }
        const response: ApiResponse<AuditRecord[]> = { success: true, data: records };
        return reply.send(response);
    });

    /**
     * WebSocket endpoint - Live approval events
     * GET /ws?incident_id=INC123 (omit incident_id to follow every incident)
     */
    app.register(async (fastify) => {
        fastify.get('/ws', { websocket: true }, (socket, request) => {
            const url = new URL(request.url, `http://${request.headers.host ?? 'localhost'}`);
            const room = url.searchParams.get('incident_id') ?? ALL_INCIDENTS;

            wsManager.subscribe(room, socket);
            app.log.info({ room }, 'console subscribed to approval events');
        });
    });

    /**
     * Health check
     */
    app.get('/health', async () => {
        return {
            status: 'ok',
            service: 'approval-console',
            audit: audit.health(),
            pending_approvals: gate.list({ status: 'pending' }).length,
        };
    });

    return app;
}
