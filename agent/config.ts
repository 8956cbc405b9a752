import { z } from 'zod';
import { SEVERITIES } from '@weather-sentinel/shared';
import type { SeverityApprovalMap } from './policy';

// An empty variable takes the default
const blankAsUnset = (value: unknown) => (value === '' ? undefined : value);

const intFromEnv = (fallback: number) =>
    z.preprocess(blankAsUnset, z.coerce.number().int().nonnegative().default(fallback));

const positiveIntFromEnv = (fallback: number) =>
    z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(fallback));

const listFromEnv = z
    .string()
    .default('')
    .transform((value) =>
        value
            .split(',')
            .map((item) => item.trim())
            .filter(Boolean),
    );

const booleanFromEnv = z
    .enum(['true', 'false', '1', '0', ''])
    .default('false')
    .transform((value) => value === 'true' || value === '1');

/**
 * Parse `Critical=false,Low=true` into a partial severity → requires-approval map
 */
export function parseSeverityApproval(raw: string): Partial<SeverityApprovalMap> {
    const overrides: Partial<SeverityApprovalMap> = {};
    for (const entry of raw.split(',').map((e) => e.trim()).filter(Boolean)) {
        const [name, value] = entry.split('=').map((part) => part.trim());
        const severity = SEVERITIES.find((level) => level.toLowerCase() === name?.toLowerCase());
        if (!severity) {
            throw new Error(`Unknown severity in SEVERITY_APPROVAL: "${name}"`);
        }
        if (value !== 'true' && value !== 'false') {
            throw new Error(`SEVERITY_APPROVAL value for ${severity} must be true or false, got "${value}"`);
        }
        overrides[severity] = value === 'true';
    }
    return overrides;
}

const envSchema = z
    .object({
        OPENAI_API_KEY: z.string().min(1, 'Missing OPENAI_API_KEY in environment.'),
        MODEL_TEXT: z.string().default('gpt-4o'),
        OPENWEATHER_API_KEY: z.string().min(1, 'Missing OPENWEATHER_API_KEY in environment.'),
        OPENWEATHER_BASE_URL: z.string().url().default('https://api.openweathermap.org/data/2.5'),
        ALERT_WEBHOOK_URL: z.string().url().optional(),
        ALERT_RECIPIENTS: listFromEnv,
        DRY_RUN: booleanFromEnv,
        MONITOR_LOCATIONS: listFromEnv,
        POLL_INTERVAL_MS: positiveIntFromEnv(60_000),
        APPROVAL_TIMEOUT_MS: positiveIntFromEnv(15 * 60_000),
        RETRY_BUDGET: intFromEnv(3),
        RETRY_BASE_DELAY_MS: intFromEnv(500),
        RETRY_MAX_DELAY_MS: positiveIntFromEnv(8_000),
        OBSERVATION_TIMEOUT_MS: positiveIntFromEnv(10_000),
        CLASSIFIER_TIMEOUT_MS: positiveIntFromEnv(30_000),
        NOTIFIER_TIMEOUT_MS: positiveIntFromEnv(10_000),
        SEVERITY_APPROVAL: z.string().default(''),
        AUDIT_LOG_PATH: z.string().default('data/audit.jsonl'),
        APPROVAL_API_PORT: intFromEnv(4010),
        LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    })
    .superRefine((env, ctx) => {
        if (!env.DRY_RUN && !env.ALERT_WEBHOOK_URL) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['ALERT_WEBHOOK_URL'],
                message: 'Missing ALERT_WEBHOOK_URL in environment (or set DRY_RUN=true).',
            });
        }
        if (!env.DRY_RUN && env.ALERT_RECIPIENTS.length === 0) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['ALERT_RECIPIENTS'],
                message: 'Missing ALERT_RECIPIENTS in environment (or set DRY_RUN=true).',
            });
        }
    });

export interface AgentConfig {
    openaiApiKey: string;
    modelText: string;
    openWeatherApiKey: string;
    openWeatherBaseUrl: string;
    alertWebhookUrl: string | null;
    alertRecipients: string[];
    dryRun: boolean;
    locations: string[];
    pollIntervalMs: number;
    approvalTimeoutMs: number;
    retry: { retries: number; baseDelayMs: number; maxDelayMs: number };
    timeouts: { observationMs: number; classifierMs: number; notifierMs: number };
    severityApproval: Partial<SeverityApprovalMap>;
    auditLogPath: string;
    approvalApiPort: number;
    logLevel: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    }
    const e = parsed.data;

    return {
        openaiApiKey: e.OPENAI_API_KEY,
        modelText: e.MODEL_TEXT,
        openWeatherApiKey: e.OPENWEATHER_API_KEY,
        openWeatherBaseUrl: e.OPENWEATHER_BASE_URL,
        alertWebhookUrl: e.ALERT_WEBHOOK_URL ?? null,
        alertRecipients: e.ALERT_RECIPIENTS,
        dryRun: e.DRY_RUN,
        locations: e.MONITOR_LOCATIONS,
        pollIntervalMs: e.POLL_INTERVAL_MS,
        approvalTimeoutMs: e.APPROVAL_TIMEOUT_MS,
        retry: {
            retries: e.RETRY_BUDGET,
            baseDelayMs: e.RETRY_BASE_DELAY_MS,
            maxDelayMs: e.RETRY_MAX_DELAY_MS,
        },
        timeouts: {
            observationMs: e.OBSERVATION_TIMEOUT_MS,
            classifierMs: e.CLASSIFIER_TIMEOUT_MS,
            notifierMs: e.NOTIFIER_TIMEOUT_MS,
        },
        severityApproval: parseSeverityApproval(e.SEVERITY_APPROVAL),
        auditLogPath: e.AUDIT_LOG_PATH,
        approvalApiPort: e.APPROVAL_API_PORT,
        logLevel: e.LOG_LEVEL,
    };
}
