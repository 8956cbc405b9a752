import { isAxiosError } from 'axios';
import { nanoid } from 'nanoid';
import type { HttpClient } from '@weather-sentinel/shared';
import type { Notifier, NotifierAck } from '../capabilities';
import { CapabilityError, withTimeout } from '../retry';
import { silentLogger, type Logger } from '../logger';

/**
 * Transient: no response, timeouts, 5xx and 429. Terminal: any other rejection (bad recipient, auth).
 */
export function toNotifierError(err: unknown): CapabilityError {
    if (err instanceof CapabilityError) {
        return err.kind === 'Timeout'
            ? err
            : new CapabilityError(err.retryable ? 'Transient' : 'Terminal', err.message, {
                  retryable: err.retryable,
                  cause: err,
              });
    }

    if (isAxiosError(err)) {
        const status = err.response?.status;
        if (status === undefined) {
            return new CapabilityError('Transient', `Alert relay unreachable: ${err.message}`, {
                retryable: true,
                cause: err,
            });
        }
        if (status === 429 || status >= 500) {
            return new CapabilityError('Transient', `Alert relay unavailable (${status})`, { retryable: true, cause: err });
        }
        return new CapabilityError('Terminal', `Alert relay rejected the message (${status})`, {
            retryable: false,
            cause: err,
        });
    }

    const message = err instanceof Error ? err.message : String(err);
    return new CapabilityError('Transient', message, { retryable: true, cause: err });
}

interface RelayResponse {
    id?: string;
}

/**
 * Sends alerts to an HTTP relay that fans them out to the recipients (email, SMS, chat)
 */
export class WebhookNotifier implements Notifier {
    constructor(
        private client: HttpClient,
        private path: string = '',
    ) {}

    async send(recipients: string[], subject: string, body: string, timeoutMs: number): Promise<NotifierAck> {
        if (recipients.length === 0) {
            throw new CapabilityError('Terminal', 'No alert recipients configured', { retryable: false });
        }

        try {
            const response = await withTimeout(
                (signal) =>
                    this.client.post<RelayResponse | string>(
                        this.path,
                        { recipients, subject, body },
                        { timeout: timeoutMs, signal },
                    ),
                timeoutMs,
                'alert dispatch',
            );
            return { message_id: typeof response === 'object' && response?.id ? response.id : null };
        } catch (err) {
            throw toNotifierError(err);
        }
    }
}

/**
 * Dry-run transport: writes the alert to the log instead of sending it
 */
export class LogNotifier implements Notifier {
    private log: Logger;

    constructor(logger: Logger = silentLogger) {
        this.log = logger.child({ component: 'notifier' });
    }

    async send(recipients: string[], subject: string, body: string): Promise<NotifierAck> {
        const messageId = `DRY${nanoid(8)}`;
        this.log.info({ message_id: messageId, recipients, subject }, `[dry-run] alert\n${body}`);
        return { message_id: messageId };
    }
}
