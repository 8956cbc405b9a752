import { SEVERITIES, type Assessment, type Department, type Severity } from '@weather-sentinel/shared';

export type SeverityApprovalMap = Record<Severity, boolean>;

export interface PolicyDecision {
    requiresApproval: boolean;
    severity: Severity | null;
    source: 'default' | 'override' | 'fail-safe';
}

export interface SeverityPolicy {
    decide(severity: string): PolicyDecision;
}

// Critical and High bypass approval
export const DEFAULT_APPROVAL_MAP: Readonly<SeverityApprovalMap> = {
    Critical: false,
    High: false,
    Medium: true,
    Low: true,
};

export function isSeverity(value: string): value is Severity {
    return (SEVERITIES as readonly string[]).includes(value);
}

/**
 * Normalise free-form classifier output to a severity level.
 * Returns null unless exactly one level is named.
 */
export function parseSeverity(raw: unknown): Severity | null {
    if (typeof raw !== 'string') return null;

    const text = raw.trim().toLowerCase();
    const named = SEVERITIES.filter((level) => new RegExp(`\\b${level.toLowerCase()}\\b`).test(text));
    return named.length === 1 ? named[0] : null;
}

export function createSeverityPolicy(overrides: Partial<SeverityApprovalMap> = {}): SeverityPolicy {
    const map: SeverityApprovalMap = { ...DEFAULT_APPROVAL_MAP, ...overrides };

    return {
        decide(severity: string): PolicyDecision {
            if (!isSeverity(severity)) {
                return { requiresApproval: true, severity: null, source: 'fail-safe' };
            }
            return {
                requiresApproval: map[severity],
                severity,
                source: overrides[severity] === undefined ? 'default' : 'override',
            };
        },
    };
}

/**
 * Pick the department whose response plan goes into the alert
 */
export function routeDepartment(assessment: Pick<Assessment, 'disaster_type' | 'severity'>): Department {
    if (assessment.severity === 'Critical' || assessment.severity === 'High') {
        return 'emergency-response';
    }

    const disaster = assessment.disaster_type.trim().toLowerCase();
    if (disaster.includes('flood') || disaster.includes('storm')) {
        return 'public-works';
    }
    return 'civil-defense';
}
