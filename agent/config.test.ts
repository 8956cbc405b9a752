import { describe, it, expect } from 'vitest';
import { loadConfig, parseSeverityApproval } from './config';

const baseEnv = {
    OPENAI_API_KEY: 'test-key',
    OPENWEATHER_API_KEY: 'test-weather-key',
    ALERT_WEBHOOK_URL: 'http://localhost:8025/alerts',
    ALERT_RECIPIENTS: 'ops@example.org',
};

describe('loadConfig', () => {
    it('applies defaults', () => {
        const config = loadConfig(baseEnv);

        expect(config.modelText).toBe('gpt-4o');
        expect(config.openWeatherBaseUrl).toBe('https://api.openweathermap.org/data/2.5');
        expect(config.pollIntervalMs).toBe(60_000);
        expect(config.approvalTimeoutMs).toBe(900_000);
        expect(config.retry).toEqual({ retries: 3, baseDelayMs: 500, maxDelayMs: 8000 });
        expect(config.timeouts).toEqual({ observationMs: 10_000, classifierMs: 30_000, notifierMs: 10_000 });
        expect(config.severityApproval).toEqual({});
        expect(config.alertRecipients).toEqual(['ops@example.org']);
        expect(config.locations).toEqual([]);
        expect(config.dryRun).toBe(false);
        expect(config.auditLogPath).toBe('data/audit.jsonl');
        expect(config.approvalApiPort).toBe(4010);
    });

    it('parses numbers, lists and severity overrides', () => {
        const config = loadConfig({
            ...baseEnv,
            RETRY_BUDGET: '5',
            APPROVAL_TIMEOUT_MS: '120000',
            ALERT_RECIPIENTS: 'ops@example.org, duty@example.org',
            MONITOR_LOCATIONS: 'Lisbon,Porto,,Faro',
            SEVERITY_APPROVAL: 'high=true, Low=false',
        });

        expect(config.retry.retries).toBe(5);
        expect(config.approvalTimeoutMs).toBe(120_000);
        expect(config.alertRecipients).toEqual(['ops@example.org', 'duty@example.org']);
        expect(config.locations).toEqual(['Lisbon', 'Porto', 'Faro']);
        expect(config.severityApproval).toEqual({ High: true, Low: false });
    });

    it('requires a webhook unless running dry', () => {
        const { ALERT_WEBHOOK_URL: _omitted, ...withoutWebhook } = baseEnv;

        expect(() => loadConfig(withoutWebhook)).toThrow(/ALERT_WEBHOOK_URL/);

        const dry = loadConfig({ ...withoutWebhook, DRY_RUN: 'true' });
        expect(dry.dryRun).toBe(true);
        expect(dry.alertWebhookUrl).toBeNull();
    });

    it('requires recipients unless running dry', () => {
        const { ALERT_RECIPIENTS: _omitted, ...withoutRecipients } = baseEnv;

        expect(() => loadConfig(withoutRecipients)).toThrow(
            'ALERT_RECIPIENTS: Missing ALERT_RECIPIENTS in environment (or set DRY_RUN=true).',
        );
        expect(() => loadConfig({ ...baseEnv, ALERT_RECIPIENTS: ' , ' })).toThrow(/ALERT_RECIPIENTS/);
        expect(loadConfig({ ...withoutRecipients, DRY_RUN: 'true' }).alertRecipients).toEqual([]);
    });

    it('rejects a missing API key', () => {
        const { OPENAI_API_KEY: _omitted, ...env } = baseEnv;

        expect(() => loadConfig(env)).toThrow(/OPENAI_API_KEY/);
    });

    it('rejects malformed numbers', () => {
        expect(() => loadConfig({ ...baseEnv, RETRY_BUDGET: 'three' })).toThrow(/RETRY_BUDGET/);
    });

    it('rejects a zero interval or timeout', () => {
        expect(() => loadConfig({ ...baseEnv, POLL_INTERVAL_MS: '0' })).toThrow(/POLL_INTERVAL_MS/);
        expect(() => loadConfig({ ...baseEnv, NOTIFIER_TIMEOUT_MS: '0' })).toThrow(/NOTIFIER_TIMEOUT_MS/);
        expect(loadConfig({ ...baseEnv, RETRY_BUDGET: '0' }).retry.retries).toBe(0);
    });

    it('treats empty numeric variables as unset', () => {
        const config = loadConfig({ ...baseEnv, POLL_INTERVAL_MS: '', RETRY_BUDGET: '', APPROVAL_TIMEOUT_MS: '' });

        expect(config.pollIntervalMs).toBe(60_000);
        expect(config.retry.retries).toBe(3);
        expect(config.approvalTimeoutMs).toBe(900_000);
    });
});

describe('parseSeverityApproval', () => {
    it('returns an empty map for an empty string', () => {
        expect(parseSeverityApproval('')).toEqual({});
    });

    it('rejects unknown levels and non-boolean values', () => {
        expect(() => parseSeverityApproval('Extreme=true')).toThrow('Unknown severity in SEVERITY_APPROVAL: "Extreme"');
        expect(() => parseSeverityApproval('Low=maybe')).toThrow(
            'SEVERITY_APPROVAL value for Low must be true or false, got "maybe"',
        );
    });
});
