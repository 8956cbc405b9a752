import { isAxiosError } from 'axios';
import { z } from 'zod';
import { HttpClient, type Observation } from '@weather-sentinel/shared';
import type { ObservationSource } from '../capabilities';
import { CapabilityError, withTimeout } from '../retry';

const KELVIN_OFFSET = 273.15;

const currentWeatherSchema = z.object({
    dt: z.number().optional(),
    weather: z.array(z.object({ description: z.string().optional() })).optional(),
    main: z.object({
        temp: z.number(),
        humidity: z.number(),
        pressure: z.number(),
        sea_level: z.number().optional(),
    }),
    wind: z.object({ speed: z.number() }).partial().optional(),
    clouds: z.object({ all: z.number() }).partial().optional(),
    rain: z.object({ '1h': z.number() }).partial().optional(),
    snow: z.object({ '1h': z.number() }).partial().optional(),
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Map an OpenWeatherMap current-weather payload to an Observation
 */
export function toObservation(location: string, payload: unknown, fetchedAt: Date = new Date()): Observation {
    const parsed = currentWeatherSchema.safeParse(payload);
    if (!parsed.success) {
        throw new CapabilityError('ProviderError', `Unexpected weather payload for ${location}: ${parsed.error.message}`, {
            retryable: false,
        });
    }
    const data = parsed.data;
    const observedAt = data.dt !== undefined ? new Date(data.dt * 1000) : fetchedAt;

    return Object.freeze({
        location,
        observed_at: observedAt.toISOString(),
        temperature_c: Math.round((data.main.temp - KELVIN_OFFSET) * 10) / 10,
        wind_speed_ms: data.wind?.speed ?? 0,
        humidity_pct: data.main.humidity,
        pressure_hpa: data.main.pressure,
        precipitation_mm: (data.rain?.['1h'] ?? 0) + (data.snow?.['1h'] ?? 0),
        cloud_cover_pct: data.clouds?.all ?? null,
        description: data.weather?.[0]?.description ?? 'N/A',
        raw: isRecord(payload) ? payload : {},
    });
}

export function toSourceError(location: string, err: unknown): CapabilityError {
    if (err instanceof CapabilityError) return err;

    if (isAxiosError(err)) {
        if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT' || err.code === 'ERR_CANCELED') {
            return new CapabilityError('Timeout', `Weather request for ${location} timed out`, {
                retryable: true,
                cause: err,
            });
        }
        const status = err.response?.status;
        if (status === 404) {
            return new CapabilityError('NotFound', `Unknown location: ${location}`, { retryable: false, cause: err });
        }
        if (status === 401 || status === 403) {
            return new CapabilityError('ProviderError', `Weather provider rejected credentials (${status})`, {
                retryable: false,
                cause: err,
            });
        }
        return new CapabilityError('ProviderError', `Weather provider error${status ? ` (${status})` : ''}: ${err.message}`, {
            retryable: true,
            cause: err,
        });
    }

    const message = err instanceof Error ? err.message : String(err);
    return new CapabilityError('ProviderError', message, { retryable: true, cause: err });
}

/**
 * Observation source backed by the OpenWeatherMap current-weather API
 */
export class OpenWeatherSource implements ObservationSource {
    constructor(
        private apiKey: string,
        private client: HttpClient,
    ) {}

    async fetch(location: string, timeoutMs: number): Promise<Observation> {
        try {
            const payload = await withTimeout(
                (signal) =>
                    this.client.get<unknown>('/weather', {
                        params: { q: location, appid: this.apiKey },
                        timeout: timeoutMs,
                        signal,
                    }),
                timeoutMs,
                `weather fetch for ${location}`,
            );
            return toObservation(location, payload);
        } catch (err) {
            throw toSourceError(location, err);
        }
    }
}
