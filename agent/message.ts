import type { ApprovalRequest, Assessment, Department, Observation } from '@weather-sentinel/shared';

export interface AlertMessage {
    subject: string;
    body: string;
}

export interface AlertInput {
    observation: Observation;
    assessment: Assessment;
    department: Department;
    plan: string;
    approval: ApprovalRequest | null;
}

const DEPARTMENT_LABEL: Record<Department, string> = {
    'emergency-response': 'Emergency Response',
    'public-works': 'Public Works',
    'civil-defense': 'Civil Defense',
};

export const PLAN_UNAVAILABLE = 'Response plan unavailable; follow standing procedures for this hazard.';

const formatTimestamp = (date: Date) => date.toISOString().replace('T', ' ').slice(0, 19) + ' UTC';

/**
 * Rationale-enriched alert built from the assessment and the observation it was derived from
 */
export function buildAlert(input: AlertInput, now: Date = new Date()): AlertMessage {
    const { observation, assessment, department, plan, approval } = input;

    const subject = `Weather Alert: ${assessment.severity} severity ${assessment.disaster_type} in ${observation.location}`;

    const lines = [
        `Weather Report for ${observation.location}`,
        '',
        'Current Weather Conditions:',
        `- Weather Description: ${observation.description}`,
        `- Temperature: ${observation.temperature_c}°C`,
        `- Wind Speed: ${observation.wind_speed_ms} m/s`,
        `- Humidity: ${observation.humidity_pct}%`,
        `- Pressure: ${observation.pressure_hpa} hPa`,
        `- Precipitation (1h): ${observation.precipitation_mm} mm`,
    ];
    if (observation.cloud_cover_pct !== null) {
        lines.push(`- Cloud Cover: ${observation.cloud_cover_pct}%`);
    }

    lines.push(
        '',
        `Disaster Type: ${assessment.disaster_type}`,
        `Severity Level: ${assessment.severity}${assessment.severity_inferred ? ' (assumed; classifier gave no level)' : ''}`,
        `Rationale: ${assessment.rationale || 'n/a'}`,
        '',
        `${DEPARTMENT_LABEL[department]} Plan:`,
        plan,
        '',
        `This is an automated weather alert generated at ${formatTimestamp(now)}`,
    );

    if (approval?.status === 'approved') {
        lines.push(`Note: This ${assessment.severity.toLowerCase()} severity alert has been verified by a human operator (${approval.resolved_by ?? 'operator'}).`);
    }

    return { subject, body: lines.join('\n') };
}
