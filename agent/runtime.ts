import OpenAI from 'openai';
import { HttpClient } from '@weather-sentinel/shared';
import { ApprovalGate } from './approval-gate';
import { buildApprovalServer } from './approval-server';
import { AuditLog, JsonlAuditSink, findUnfinished, readAuditTrail } from './audit';
import type { Notifier } from './capabilities';
import type { AgentConfig } from './config';
import type { Logger } from './logger';
import { MonitorDaemon } from './monitor';
import { createSeverityPolicy } from './policy';
import { OpenAIClassifier, OpenAIResponsePlanner } from './tools/classifier';
import { LogNotifier, WebhookNotifier } from './tools/notifier';
import { OpenWeatherSource } from './tools/weatherSource';
import { WorkflowEngine } from './workflow';

export interface Runtime {
    engine: WorkflowEngine;
    gate: ApprovalGate;
    audit: AuditLog;
    daemon: MonitorDaemon;
    server: ReturnType<typeof buildApprovalServer>;
}

/**
 * Wire capabilities, audit sink, approval gate, engine, daemon and console API.
 * Throws if a required capability cannot be initialised.
 */
export async function createRuntime(config: AgentConfig, locations: string[], logger: Logger): Promise<Runtime> {
    const sink = new JsonlAuditSink(config.auditLogPath);
    await sink.init();

    const trail = await readAuditTrail(config.auditLogPath);
    if (trail.skipped > 0) {
        logger.warn({ skipped: trail.skipped, path: config.auditLogPath }, 'skipped malformed audit lines');
    }
    for (const unfinished of findUnfinished(trail.records)) {
        logger.warn(
            {
                incident_id: unfinished.incident_id,
                state: unfinished.state,
                last_record_at: unfinished.last_record.ts,
            },
            'incident from a previous run did not reach a terminal state',
        );
    }

    const openai = new OpenAI({ apiKey: config.openaiApiKey });
    const weatherClient = new HttpClient(config.openWeatherBaseUrl, { timeout: config.timeouts.observationMs });

    let notifier: Notifier;
    if (config.dryRun) {
        notifier = new LogNotifier(logger);
    } else if (config.alertWebhookUrl) {
        notifier = new WebhookNotifier(new HttpClient(config.alertWebhookUrl, { timeout: config.timeouts.notifierMs }));
    } else {
        throw new Error('ALERT_WEBHOOK_URL is required unless DRY_RUN=true');
    }

    const audit = new AuditLog(sink, { logger });
    const gate = new ApprovalGate({ timeoutMs: config.approvalTimeoutMs, logger });
    const engine = new WorkflowEngine({
        source: new OpenWeatherSource(config.openWeatherApiKey, weatherClient),
        classifier: new OpenAIClassifier(openai, config.modelText),
        planner: new OpenAIResponsePlanner(openai, config.modelText),
        notifier,
        gate,
        audit,
        policy: createSeverityPolicy(config.severityApproval),
        settings: {
            retry: config.retry,
            timeouts: config.timeouts,
            recipients: config.alertRecipients,
        },
        logger,
    });

    const daemon = new MonitorDaemon(engine, locations, { intervalMs: config.pollIntervalMs, logger });
    const server = buildApprovalServer({ gate, audit, incidents: engine, logger });

    return { engine, gate, audit, daemon, server };
}
