import type { Department, Observation, Severity } from '@weather-sentinel/shared';

/**
 * External capabilities the workflow engine depends on.
 * Each call carries an explicit timeout and fails with a CapabilityError.
 */

export interface ObservationSource {
    fetch(location: string, timeoutMs: number): Promise<Observation>;
}

/**
 * Raw classifier judgement. `severity` is free text; the engine normalises it.
 */
export interface ClassifierResult {
    disaster_type: string;
    severity: string;
    rationale: string;
    confidence: number | null;
}

export interface Classifier {
    classify(observation: Observation, timeoutMs: number): Promise<ClassifierResult>;
}

export interface PlanRequest {
    location: string;
    disaster_type: string;
    severity: Severity;
    department: Department;
}

export interface ResponsePlanner {
    plan(request: PlanRequest, timeoutMs: number): Promise<string>;
}

export interface NotifierAck {
    message_id: string | null;
}

export interface Notifier {
    send(recipients: string[], subject: string, body: string, timeoutMs: number): Promise<NotifierAck>;
}
