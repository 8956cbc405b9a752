import fs from 'fs';
import path from 'path';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import {
    IncidentState,
    TERMINAL_STATES,
    type AuditEventKind,
    type AuditRecord,
} from '@weather-sentinel/shared';
import { CapabilityError, describeError } from './retry';
import { silentLogger, type Logger } from './logger';

/**
 * Legal transitions of the incident state machine. ABORTED is reachable from any non-terminal state.
 */
export const TRANSITIONS: Readonly<Record<IncidentState, readonly IncidentState[]>> = {
    [IncidentState.PENDING_OBSERVATION]: [IncidentState.OBSERVED],
    [IncidentState.OBSERVED]: [IncidentState.CLASSIFIED],
    [IncidentState.CLASSIFIED]: [IncidentState.POLICY_DECIDED],
    [IncidentState.POLICY_DECIDED]: [
        IncidentState.AWAITING_APPROVAL,
        IncidentState.DISPATCHED,
        IncidentState.DISPATCH_FAILED,
    ],
    [IncidentState.AWAITING_APPROVAL]: [IncidentState.APPROVED, IncidentState.REJECTED, IncidentState.EXPIRED],
    [IncidentState.APPROVED]: [IncidentState.DISPATCHED, IncidentState.DISPATCH_FAILED],
    [IncidentState.REJECTED]: [IncidentState.DONE],
    [IncidentState.EXPIRED]: [IncidentState.DONE],
    [IncidentState.DISPATCHED]: [],
    [IncidentState.DISPATCH_FAILED]: [],
    [IncidentState.DONE]: [],
    [IncidentState.ABORTED]: [],
};

export function canTransition(from: IncidentState, to: IncidentState): boolean {
    if (to === IncidentState.ABORTED) return !TERMINAL_STATES.has(from);
    return TRANSITIONS[from].includes(to);
}

/**
 * Destination for audit records. Append is the only operation a sink must support.
 */
export interface AuditSink {
    append(record: AuditRecord): Promise<void>;
}

export class MemoryAuditSink implements AuditSink {
    readonly records: AuditRecord[] = [];

    async append(record: AuditRecord): Promise<void> {
        this.records.push(record);
    }
}

/**
 * One JSON line per record. Appends are chained so concurrent writers never interleave.
 */
export class JsonlAuditSink implements AuditSink {
    private tail: Promise<void> = Promise.resolve();

    constructor(readonly filePath: string) {}

    async init(): Promise<void> {
        await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.promises.appendFile(this.filePath, '');
    }

    append(record: AuditRecord): Promise<void> {
        const line = `${JSON.stringify(record)}\n`;
        const write = this.tail.then(() => fs.promises.appendFile(this.filePath, line));
        // keep the chain alive after a failed write; the caller still sees the rejection
        this.tail = write.catch(() => undefined);
        return write.catch((err: unknown) => {
            throw new CapabilityError('Unavailable', `audit sink write failed: ${describeError(err)}`, {
                retryable: false,
                cause: err,
            });
        });
    }
}

export interface AuditHealth {
    degraded: boolean;
    failures: number;
    last_error: string | null;
}

/**
 * Append-only audit log for incident transitions.
 * A sink outage never fails the workflow; it is surfaced as degraded logging instead.
 */
export class AuditLog {
    private history = new Map<string, AuditRecord[]>();
    private failures = 0;
    private lastError: string | null = null;
    private degraded = false;
    private log: Logger;
    private now: () => Date;

    constructor(
        private sink: AuditSink,
        options: { logger?: Logger; now?: () => Date } = {},
    ) {
        this.log = (options.logger ?? silentLogger).child({ component: 'audit' });
        this.now = options.now ?? (() => new Date());
    }

    async record(
        incidentId: string,
        kind: AuditEventKind,
        from: IncidentState,
        to: IncidentState,
        payload: Record<string, unknown> = {},
    ): Promise<AuditRecord> {
        const entries = this.history.get(incidentId) ?? [];
        const record: AuditRecord = Object.freeze({
            id: `AUD${nanoid(10)}`,
            incident_id: incidentId,
            seq: entries.length + 1,
            kind,
            from,
            to,
            ts: this.now().toISOString(),
            payload,
        });
        entries.push(record);
        this.history.set(incidentId, entries);

        try {
            await this.sink.append(record);
            if (this.degraded) {
                this.degraded = false;
                this.log.info({ failures: this.failures }, 'audit sink recovered');
            }
        } catch (err) {
            this.failures += 1;
            this.lastError = describeError(err);
            this.degraded = true;
            this.log.warn(
                { degraded_logging: true, incident_id: incidentId, kind, err: this.lastError },
                'audit sink unavailable; continuing with degraded logging',
            );
        }
        return record;
    }

    /**
     * Records for one incident, in transition order
     */
    historyOf(incidentId: string): AuditRecord[] {
        return [...(this.history.get(incidentId) ?? [])];
    }

    /**
     * Drop the in-memory history of an incident; the sink keeps its copy.
     */
    forget(incidentId: string): void {
        this.history.delete(incidentId);
    }

    health(): AuditHealth {
        return { degraded: this.degraded, failures: this.failures, last_error: this.lastError };
    }
}

/**
 * Rebuild the final state of an incident from its audit records
 */
export function replayState(records: readonly AuditRecord[]): IncidentState {
    let state = IncidentState.PENDING_OBSERVATION;
    const ordered = [...records].sort((a, b) => a.seq - b.seq);

    ordered.forEach((record, index) => {
        if (record.seq !== index + 1) {
            throw new Error(`Audit gap for ${record.incident_id}: expected seq ${index + 1}, got ${record.seq}`);
        }
        if (record.from !== state || !canTransition(state, record.to)) {
            throw new Error(
                `Illegal transition in audit trail for ${record.incident_id}: ${record.from} -> ${record.to} (replayed state ${state})`,
            );
        }
        state = record.to;
    });

    return state;
}

const auditRecordSchema = z.object({
    id: z.string(),
    incident_id: z.string(),
    seq: z.number().int().positive(),
    kind: z.enum([
        'observed',
        'classified',
        'policy-decided',
        'approval-requested',
        'approval-resolved',
        'dispatched',
        'dispatch-failed',
        'completed',
        'aborted',
    ]),
    from: z.nativeEnum(IncidentState),
    to: z.nativeEnum(IncidentState),
    ts: z.string(),
    payload: z.record(z.string(), z.unknown()),
});

export interface AuditTrail {
    records: AuditRecord[];
    skipped: number;
}

export async function readAuditTrail(filePath: string): Promise<AuditTrail> {
    let content: string;
    try {
        content = await fs.promises.readFile(filePath, 'utf8');
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
            return { records: [], skipped: 0 };
        }
        throw err;
    }

    const records: AuditRecord[] = [];
    let skipped = 0;
    for (const line of content.split('\n')) {
        if (!line.trim()) continue;
        try {
            const parsed = auditRecordSchema.safeParse(JSON.parse(line));
            if (parsed.success) {
                records.push(parsed.data);
            } else {
                skipped += 1;
            }
        } catch {
            skipped += 1;
        }
    }
    return { records, skipped };
}

export interface UnfinishedIncident {
    incident_id: string;
    state: IncidentState;
    last_record: AuditRecord;
}

/**
 * Incidents whose trail stops short of a terminal state (e.g. the process exited while awaiting approval)
 */
export function findUnfinished(records: readonly AuditRecord[]): UnfinishedIncident[] {
    const byIncident = new Map<string, AuditRecord[]>();
    for (const record of records) {
        const list = byIncident.get(record.incident_id) ?? [];
        list.push(record);
        byIncident.set(record.incident_id, list);
    }

    const unfinished: UnfinishedIncident[] = [];
    for (const [incidentId, list] of byIncident) {
        const sorted = [...list].sort((a, b) => a.seq - b.seq);
        const last = sorted[sorted.length - 1];
        if (!TERMINAL_STATES.has(last.to)) {
            unfinished.push({ incident_id: incidentId, state: last.to, last_record: last });
        }
    }
    return unfinished;
}
