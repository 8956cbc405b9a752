import type { Incident } from '@weather-sentinel/shared';
import { silentLogger, type Logger } from './logger';
import type { WorkflowEngine } from './workflow';

export interface MonitorOptions {
    intervalMs: number;
    logger?: Logger;
}

export interface CycleReport {
    cycle: number;
    started: string[];
    skipped: string[];
    incidents: Incident[];
}

/**
 * Polling daemon: one workflow instance per monitored location per cycle
 */
export class MonitorDaemon {
    private inFlight = new Map<string, Promise<Incident>>();
    private timer: NodeJS.Timeout | null = null;
    private cycle = 0;
    private stopped = false;
    private log: Logger;

    constructor(
        private engine: WorkflowEngine,
        private locations: string[],
        private options: MonitorOptions,
    ) {
        this.log = (options.logger ?? silentLogger).child({ component: 'monitor' });
    }

    start(): void {
        if (this.timer || this.stopped) return;

        this.log.info(
            { locations: this.locations, interval_ms: this.options.intervalMs },
            `monitoring ${this.locations.length} location(s)`,
        );
        this.tick();
        this.timer = setInterval(() => this.tick(), this.options.intervalMs);
    }

    /**
     * Start a polling cycle. Locations whose previous incident is still running are skipped.
     */
    async runCycle(): Promise<CycleReport> {
        this.cycle += 1;
        const cycle = this.cycle;
        const started: string[] = [];
        const skipped: string[] = [];
        const runs: Promise<Incident>[] = [];

        for (const location of new Set(this.locations)) {
            if (this.inFlight.has(location)) {
                skipped.push(location);
                continue;
            }
            const run = this.engine.runIncident(location, cycle).finally(() => this.inFlight.delete(location));
            this.inFlight.set(location, run);
            started.push(location);
            runs.push(run);
        }

        if (skipped.length > 0) {
            this.log.info({ cycle, skipped }, 'previous incident still in flight; skipping location');
        }
        this.log.info({ cycle, started }, `cycle ${cycle} started`);

        const incidents = await Promise.all(runs);
        this.log.info(
            { cycle, outcomes: incidents.map((i) => ({ location: i.location, state: i.state })) },
            `cycle ${cycle} completed`,
        );
        return { cycle, started, skipped, incidents };
    }

    /**
     * Cancel between cycles: no new cycle starts, in-flight incidents run to a terminal state
     */
    async stop(): Promise<void> {
        this.stopped = true;
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        const pending = Array.from(this.inFlight.values());
        if (pending.length > 0) {
            this.log.info({ in_flight: pending.length }, 'waiting for in-flight incidents');
        }
        await Promise.all(pending);
        this.log.info('monitor stopped');
    }

    get currentCycle(): number {
        return this.cycle;
    }

    private tick(): void {
        if (this.stopped) return;
        this.runCycle().catch((err: unknown) => {
            this.log.error({ err }, 'polling cycle failed');
        });
    }
}
