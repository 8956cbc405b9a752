import { APIConnectionError, APIConnectionTimeoutError, APIError } from 'openai';
import { describe, it, expect } from 'vitest';
import type { Observation } from '@weather-sentinel/shared';
import { CapabilityError } from '../retry';
import { describeConditions, parseClassifierOutput, toModelError } from './classifier';

function thrownBy(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    throw new Error('expected the call to throw');
}

describe('parseClassifierOutput', () => {
    it('returns the raw judgement', () => {
        const result = parseClassifierOutput(
            JSON.stringify({ disaster_type: ' Flood ', severity: 'high', rationale: ' 40mm in one hour. ', confidence: 0.9 }),
        );

        expect(result).toEqual({ disaster_type: 'Flood', severity: 'high', rationale: '40mm in one hour.', confidence: 0.9 });
    });

    it('fills missing optional fields', () => {
        expect(parseClassifierOutput('{"disaster_type":"Heatwave"}')).toEqual({
            disaster_type: 'Heatwave',
            severity: '',
            rationale: '',
            confidence: null,
        });
    });

    it('treats a null or non-string severity as unknown', () => {
        for (const severity of [null, 3, ['High']]) {
            expect(parseClassifierOutput(JSON.stringify({ disaster_type: 'Flood', severity, confidence: 0.4 }))).toEqual({
                disaster_type: 'Flood',
                severity: '',
                rationale: '',
                confidence: 0.4,
            });
        }
    });

    it('drops a confidence outside 0..1', () => {
        for (const confidence of [7, -0.1, '0.5', null]) {
            expect(
                parseClassifierOutput(JSON.stringify({ disaster_type: 'Flood', severity: 'High', confidence })).confidence,
            ).toBeNull();
        }
        expect(parseClassifierOutput('{"disaster_type":"Flood","confidence":1}').confidence).toBe(1);
    });

    it('reports malformed output as retryable', () => {
        for (const content of [null, '', 'It looks stormy', '{"severity":"High"}', '{"disaster_type":""}']) {
            expect(thrownBy(() => parseClassifierOutput(content))).toMatchObject({
                kind: 'MalformedOutput',
                retryable: true,
            });
        }
    });
});

describe('toModelError', () => {
    it('maps client failures to capability errors', () => {
        expect(toModelError(new APIConnectionTimeoutError())).toMatchObject({ kind: 'Timeout', retryable: true });
        expect(toModelError(new APIConnectionError({ message: 'socket hang up' }))).toMatchObject({
            kind: 'ModelUnavailable',
            retryable: true,
        });
        expect(toModelError(APIError.generate(429, undefined, 'rate limited', undefined))).toMatchObject({
            kind: 'ModelUnavailable',
            retryable: true,
        });
        expect(toModelError(APIError.generate(401, undefined, 'bad key', undefined))).toMatchObject({
            kind: 'ModelUnavailable',
            retryable: false,
        });
    });

    it('passes capability errors through', () => {
        const error = new CapabilityError('MalformedOutput', 'not JSON', { retryable: true });

        expect(toModelError(error)).toBe(error);
    });
});

describe('describeConditions', () => {
    it('lists the measured values', () => {
        const observation: Observation = {
            location: 'Lisbon',
            observed_at: '2026-10-18T09:00:00.000Z',
            temperature_c: 14.2,
            wind_speed_ms: 21.5,
            humidity_pct: 91,
            pressure_hpa: 987,
            precipitation_mm: 12.4,
            cloud_cover_pct: 100,
            description: 'heavy intensity rain',
            raw: {},
        };

        expect(describeConditions(observation).split('\n')).toEqual([
            'Location: Lisbon',
            'Observed at: 2026-10-18T09:00:00.000Z',
            '- Description: heavy intensity rain',
            '- Wind Speed: 21.5 m/s',
            '- Temperature: 14.2°C',
            '- Humidity: 91%',
            '- Pressure: 987 hPa',
            '- Precipitation (1h): 12.4 mm',
        ]);
    });
});
