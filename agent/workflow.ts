import { nanoid } from 'nanoid';
import {
    IncidentState,
    TERMINAL_STATES,
    type AbortReason,
    type Assessment,
    type AuditEventKind,
    type Incident,
    type Observation,
} from '@weather-sentinel/shared';
import type { ApprovalGate } from './approval-gate';
import { canTransition, type AuditLog } from './audit';
import type { Classifier, ClassifierResult, Notifier, ObservationSource, ResponsePlanner } from './capabilities';
import { silentLogger, type Logger } from './logger';
import { buildAlert, PLAN_UNAVAILABLE } from './message';
import { parseSeverity, routeDepartment, type SeverityPolicy } from './policy';
import { describeError, withRetry, withTimeout, type RetryPolicy, type RetryResult } from './retry';

export interface WorkflowSettings {
    retry: RetryPolicy;
    timeouts: { observationMs: number; classifierMs: number; notifierMs: number };
    recipients: string[];
}

export interface WorkflowDeps {
    source: ObservationSource;
    classifier: Classifier;
    notifier: Notifier;
    planner?: ResponsePlanner;
    gate: ApprovalGate;
    audit: AuditLog;
    policy: SeverityPolicy;
    settings: WorkflowSettings;
    logger?: Logger;
    now?: () => Date;
    sleep?: (ms: number) => Promise<void>;
    /** Finished incidents kept for the console API, together with their audit history and approvals */
    retainedIncidents?: number;
}

const RETAINED_INCIDENTS = 1000;

/**
 * Build an Assessment from raw classifier output.
 * An unrecognised severity falls back to Medium, which always routes through human approval by default.
 */
export function toAssessment(observation: Observation, result: ClassifierResult): Assessment {
    const severity = parseSeverity(result.severity);
    return Object.freeze({
        observation_ref: { location: observation.location, observed_at: observation.observed_at },
        disaster_type: result.disaster_type || 'Unclassified',
        severity: severity ?? 'Medium',
        rationale: result.rationale,
        confidence: result.confidence,
        severity_inferred: severity === null,
    });
}

/**
 * Drives one incident per (location, polling cycle) through
 * observation → classification → severity gate → optional approval → dispatch.
 */
export class WorkflowEngine {
    private live = new Map<string, Promise<Incident>>();
    private incidents = new Map<string, Incident>();
    private log: Logger;
    private now: () => Date;

    constructor(private deps: WorkflowDeps) {
        this.log = (deps.logger ?? silentLogger).child({ component: 'workflow' });
        this.now = deps.now ?? (() => new Date());
    }

    /**
     * Runs the workflow for one location. Never rejects: every incident ends in a terminal state.
     */
    runIncident(location: string, cycle: number): Promise<Incident> {
        const key = `${location}#${cycle}`;
        const running = this.live.get(key);
        if (running) return running;

        const incident = this.createIncident(location, cycle);
        const run = this.execute(incident).finally(() => this.live.delete(key));
        this.live.set(key, run);
        return run;
    }

    runCycle(locations: string[], cycle: number): Promise<Incident[]> {
        return Promise.all(locations.map((location) => this.runIncident(location, cycle)));
    }

    get(incidentId: string): Incident | undefined {
        return this.incidents.get(incidentId);
    }

    list(): Incident[] {
        return Array.from(this.incidents.values());
    }

    private createIncident(location: string, cycle: number): Incident {
        const createdAt = this.now().toISOString();
        const incident: Incident = {
            id: `INC${nanoid(8).toUpperCase()}`,
            location,
            cycle,
            state: IncidentState.PENDING_OBSERVATION,
            created_at: createdAt,
            updated_at: createdAt,
            observation: null,
            assessment: null,
            approval: null,
            dispatch: null,
            abort_reason: null,
        };

        this.incidents.set(incident.id, incident);
        this.evictFinished();
        return incident;
    }

    private async execute(incident: Incident): Promise<Incident> {
        const log = this.log.child({ incident_id: incident.id, location: incident.location, cycle: incident.cycle });
        const { source, classifier, gate, policy, settings } = this.deps;

        try {
            log.info('checking weather conditions');

            const observed = await this.attempt(log, 'observation', settings.timeouts.observationMs, (ms) =>
                source.fetch(incident.location, ms),
            );
            if (!observed.ok) {
                return await this.abort(incident, log, 'observation-unavailable', observed);
            }
            const observation = observed.value;
            incident.observation = observation;
            await this.transition(incident, IncidentState.OBSERVED, 'observed', {
                attempts: observed.attempts,
                observed_at: observation.observed_at,
                temperature_c: observation.temperature_c,
                wind_speed_ms: observation.wind_speed_ms,
                humidity_pct: observation.humidity_pct,
                pressure_hpa: observation.pressure_hpa,
                precipitation_mm: observation.precipitation_mm,
            });

            const classified = await this.attempt(log, 'classification', settings.timeouts.classifierMs, (ms) =>
                classifier.classify(observation, ms),
            );
            if (!classified.ok) {
                return await this.abort(incident, log, 'classification-failed', classified);
            }
            const assessment = toAssessment(observation, classified.value);
            incident.assessment = assessment;
            if (assessment.severity_inferred) {
                log.warn({ raw_severity: classified.value.severity }, 'unrecognised severity; assuming Medium');
            }
            await this.transition(incident, IncidentState.CLASSIFIED, 'classified', {
                attempts: classified.attempts,
                disaster_type: assessment.disaster_type,
                severity: assessment.severity,
                severity_inferred: assessment.severity_inferred,
                raw_severity: classified.value.severity,
                rationale: assessment.rationale,
                confidence: assessment.confidence,
            });

            const decision = policy.decide(assessment.severity);
            await this.transition(incident, IncidentState.POLICY_DECIDED, 'policy-decided', {
                severity: assessment.severity,
                requires_approval: decision.requiresApproval,
                source: decision.source,
            });
            log.info(
                { severity: assessment.severity, requires_approval: decision.requiresApproval },
                `${assessment.disaster_type} assessed as ${assessment.severity}`,
            );

            if (decision.requiresApproval) {
                const request = gate.requestApproval({
                    incident_id: incident.id,
                    location: incident.location,
                    severity: assessment.severity,
                    disaster_type: assessment.disaster_type,
                });
                incident.approval = request;
                await this.transition(incident, IncidentState.AWAITING_APPROVAL, 'approval-requested', {
                    request_id: request.id,
                    expires_at: request.expires_at,
                });

                const resolved = await gate.waitForResolution(request.id);
                incident.approval = resolved;
                const next =
                    resolved.status === 'approved'
                        ? IncidentState.APPROVED
                        : resolved.status === 'rejected'
                          ? IncidentState.REJECTED
                          : IncidentState.EXPIRED;
                await this.transition(incident, next, 'approval-resolved', {
                    request_id: resolved.id,
                    status: resolved.status,
                    resolved_by: resolved.resolved_by,
                    note: resolved.note,
                });

                if (next !== IncidentState.APPROVED) {
                    log.info({ status: resolved.status }, 'alert not sent; approval was not granted');
                    await this.transition(incident, IncidentState.DONE, 'completed', {
                        dispatched: false,
                        reason: `approval-${resolved.status}`,
                    });
                    return incident;
                }
            }

            await this.dispatch(incident, observation, assessment, log);
            return incident;
        } catch (err) {
            log.error({ err }, 'workflow error');
            if (!TERMINAL_STATES.has(incident.state)) {
                incident.abort_reason = 'internal-error';
                await this.transition(incident, IncidentState.ABORTED, 'aborted', {
                    reason: 'internal-error',
                    error: describeError(err),
                });
            }
            return incident;
        }
    }

    private async dispatch(incident: Incident, observation: Observation, assessment: Assessment, log: Logger) {
        if (incident.dispatch) {
            throw new Error(`Incident ${incident.id} was already dispatched`);
        }
        const { notifier, settings } = this.deps;
        const department = routeDepartment(assessment);
        const plan = await this.draftPlan(incident, assessment, department, log);
        const alert = buildAlert(
            { observation, assessment, department, plan, approval: incident.approval },
            this.now(),
        );

        const sent = await this.attempt(log, 'dispatch', settings.timeouts.notifierMs, (ms) =>
            notifier.send(settings.recipients, alert.subject, alert.body, ms),
        );

        if (sent.ok) {
            incident.dispatch = {
                status: IncidentState.DISPATCHED,
                attempts: sent.attempts,
                department,
                subject: alert.subject,
                error: null,
                dispatched_at: this.now().toISOString(),
            };
            await this.transition(incident, IncidentState.DISPATCHED, 'dispatched', {
                attempts: sent.attempts,
                department,
                subject: alert.subject,
                recipients: settings.recipients.length,
                message_id: sent.value.message_id,
            });
            log.info({ attempts: sent.attempts, department }, 'alert dispatched');
            return;
        }

        const error = describeError(sent.error);
        incident.dispatch = {
            status: IncidentState.DISPATCH_FAILED,
            attempts: sent.attempts,
            department,
            subject: alert.subject,
            error,
            dispatched_at: null,
        };
        await this.transition(incident, IncidentState.DISPATCH_FAILED, 'dispatch-failed', {
            attempts: sent.attempts,
            department,
            subject: alert.subject,
            error,
        });
        log.error({ attempts: sent.attempts, error }, 'alert dispatch failed');
    }

    private async draftPlan(
        incident: Incident,
        assessment: Assessment,
        department: ReturnType<typeof routeDepartment>,
        log: Logger,
    ): Promise<string> {
        const { planner, settings } = this.deps;
        if (!planner) return PLAN_UNAVAILABLE;

        const ms = settings.timeouts.classifierMs;
        try {
            return await withTimeout(
                () =>
                    planner.plan(
                        {
                            location: incident.location,
                            disaster_type: assessment.disaster_type,
                            severity: assessment.severity,
                            department,
                        },
                        ms,
                    ),
                ms,
                'response plan',
            );
        } catch (err) {
            log.warn({ err: describeError(err), department }, 'response plan unavailable; sending alert without it');
            return PLAN_UNAVAILABLE;
        }
    }

    /**
     * Each attempt is bounded by `timeoutMs` here, whether or not the capability honours it
     */
    private attempt<T>(
        log: Logger,
        step: string,
        timeoutMs: number,
        fn: (timeoutMs: number) => Promise<T>,
    ): Promise<RetryResult<T>> {
        return withRetry(() => withTimeout(() => fn(timeoutMs), timeoutMs, step), this.deps.settings.retry, {
            sleep: this.deps.sleep,
            onAttemptFailed: (err, attempt, willRetry) => {
                log.warn({ step, attempt, will_retry: willRetry, err: describeError(err) }, `${step} attempt failed`);
            },
        });
    }

    /**
     * Drop the oldest finished incidents beyond the retention cap. In-flight incidents are never dropped.
     */
    private evictFinished(): void {
        let excess = this.incidents.size - (this.deps.retainedIncidents ?? RETAINED_INCIDENTS);
        for (const [id, incident] of this.incidents) {
            if (excess <= 0) return;
            if (!TERMINAL_STATES.has(incident.state)) continue;
            this.incidents.delete(id);
            this.deps.audit.forget(id);
            this.deps.gate.forget(id);
            excess -= 1;
        }
    }

    private async abort(
        incident: Incident,
        log: Logger,
        reason: AbortReason,
        failure: { error: unknown; attempts: number },
    ): Promise<Incident> {
        const error = describeError(failure.error);
        incident.abort_reason = reason;
        await this.transition(incident, IncidentState.ABORTED, 'aborted', {
            reason,
            error,
            attempts: failure.attempts,
        });
        log.error({ reason, attempts: failure.attempts, error }, 'incident aborted');
        return incident;
    }

    private async transition(
        incident: Incident,
        to: IncidentState,
        kind: AuditEventKind,
        payload: Record<string, unknown>,
    ): Promise<void> {
        const from = incident.state;
        if (!canTransition(from, to)) {
            throw new Error(`Illegal transition ${from} -> ${to} for incident ${incident.id}`);
        }
        incident.state = to;
        incident.updated_at = this.now().toISOString();
        await this.deps.audit.record(incident.id, kind, from, to, payload);
    }
}
