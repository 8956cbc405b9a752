/**
 * Severity levels a classifier may assign
 */
export const SEVERITIES = ['Critical', 'High', 'Medium', 'Low'] as const;
export type Severity = (typeof SEVERITIES)[number];

/**
 * Incident state machine
 */
export enum IncidentState {
    PENDING_OBSERVATION = 'PENDING_OBSERVATION',
    OBSERVED = 'OBSERVED',
    CLASSIFIED = 'CLASSIFIED',
    POLICY_DECIDED = 'POLICY_DECIDED',
    AWAITING_APPROVAL = 'AWAITING_APPROVAL',
    APPROVED = 'APPROVED',
    REJECTED = 'REJECTED',
    EXPIRED = 'EXPIRED',
    DISPATCHED = 'DISPATCHED',
    DISPATCH_FAILED = 'DISPATCH_FAILED',
    DONE = 'DONE',
    ABORTED = 'ABORTED',
}

export const TERMINAL_STATES: ReadonlySet<IncidentState> = new Set([
    IncidentState.DISPATCHED,
    IncidentState.DISPATCH_FAILED,
    IncidentState.DONE,
    IncidentState.ABORTED,
]);

export type AbortReason = 'observation-unavailable' | 'classification-failed' | 'internal-error';

/**
 * Weather snapshot for one location. Frozen once created.
 */
export interface Observation {
    location: string;
    observed_at: string; // ISO timestamp
    temperature_c: number;
    wind_speed_ms: number;
    humidity_pct: number;
    pressure_hpa: number;
    precipitation_mm: number;
    cloud_cover_pct: number | null;
    description: string;
    raw: Record<string, unknown>;
}

export interface Assessment {
    observation_ref: { location: string; observed_at: string };
    disaster_type: string;
    severity: Severity;
    rationale: string;
    confidence: number | null;
    // true when the classifier named no recognised severity and Medium was assumed
    severity_inferred: boolean;
}

export type ApprovalStatus = 'pending' | 'approved' | 'rejected' | 'expired';
export type ApprovalDecision = 'approved' | 'rejected';

export interface ApprovalRequest {
    id: string;
    incident_id: string;
    location: string;
    severity: Severity;
    disaster_type: string;
    requested_at: string;
    expires_at: string;
    status: ApprovalStatus;
    resolved_at: string | null;
    resolved_by: string | null;
    note: string | null;
}

export type Department = 'emergency-response' | 'public-works' | 'civil-defense';

export interface DispatchOutcome {
    status: IncidentState.DISPATCHED | IncidentState.DISPATCH_FAILED;
    attempts: number;
    department: Department;
    subject: string;
    error: string | null;
    dispatched_at: string | null;
}

/**
 * Incident structure: one observation carried through classification, gating and dispatch
 */
export interface Incident {
    id: string;
    location: string;
    cycle: number;
    state: IncidentState;
    created_at: string;
    updated_at: string;
    observation: Observation | null;
    assessment: Assessment | null;
    approval: ApprovalRequest | null;
    dispatch: DispatchOutcome | null;
    abort_reason: AbortReason | null;
}

/**
 * Audit event kinds
 */
export type AuditEventKind =
    | 'observed'
    | 'classified'
    | 'policy-decided'
    | 'approval-requested'
    | 'approval-resolved'
    | 'dispatched'
    | 'dispatch-failed'
    | 'completed'
    | 'aborted';

/**
 * Append-only record of one incident transition
 */
export interface AuditRecord {
    id: string;
    incident_id: string;
    seq: number;
    kind: AuditEventKind;
    from: IncidentState;
    to: IncidentState;
    ts: string;
    payload: Record<string, unknown>;
}

/**
 * Approval console WebSocket event types
 */
export type WsEventType = 'approval_requested' | 'approval_resolved';

/**
 * WebSocket event envelope
 */
export interface WsEvent {
    event_type: WsEventType;
    incident_id: string;
    timestamp: string;
    payload: Record<string, unknown>;
}

/**
 * API response wrapper
 */
export interface ApiResponse<T = unknown> {
    success: boolean;
    data?: T;
    error?: string;
}
