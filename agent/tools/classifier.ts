import OpenAI, {
    APIConnectionError,
    APIConnectionTimeoutError,
    APIError,
    APIUserAbortError,
} from 'openai';
import { z } from 'zod';
import type { Observation } from '@weather-sentinel/shared';
import type { Classifier, ClassifierResult, PlanRequest, ResponsePlanner } from '../capabilities';
import { CapabilityError, withTimeout } from '../retry';

export const DISASTER_TYPES = [
    'Hurricane',
    'Flood',
    'Heatwave',
    'Severe Storm',
    'Winter Storm',
    'No Immediate Threat',
] as const;

const SYSTEM_INSTRUCTIONS = `You are a weather emergency analyst. Based on current weather conditions, identify
whether there is a potential weather disaster and how severe it is.

RULES:
- Categorize into exactly one of: ${DISASTER_TYPES.join(', ')}
- Severity must be exactly one of: Critical, High, Medium, Low
- Keep the rationale to one or two sentences referencing the measured values
- Do not speculate beyond the data provided

OUTPUT FORMAT (JSON only):
{
  "disaster_type": "Severe Storm",
  "severity": "High",
  "rationale": "Brief justification",
  "confidence": 0.0-1.0
}`;

const textOrEmpty = z.unknown().transform((value) => (typeof value === 'string' ? value : ''));

// Only disaster_type is required; anything else the model gets wrong degrades to a neutral value
const outputSchema = z.object({
    disaster_type: z.string().min(1),
    severity: textOrEmpty,
    rationale: textOrEmpty,
    confidence: z
        .unknown()
        .transform((value) => (typeof value === 'number' && value >= 0 && value <= 1 ? value : null)),
});

export function describeConditions(observation: Observation): string {
    return [
        `Location: ${observation.location}`,
        `Observed at: ${observation.observed_at}`,
        `- Description: ${observation.description}`,
        `- Wind Speed: ${observation.wind_speed_ms} m/s`,
        `- Temperature: ${observation.temperature_c}°C`,
        `- Humidity: ${observation.humidity_pct}%`,
        `- Pressure: ${observation.pressure_hpa} hPa`,
        `- Precipitation (1h): ${observation.precipitation_mm} mm`,
    ].join('\n');
}

/**
 * Parse the model's JSON answer. Severity is passed through untouched; the engine normalises it.
 */
export function parseClassifierOutput(content: string | null | undefined): ClassifierResult {
    if (!content) {
        throw new CapabilityError('MalformedOutput', 'No response from classifier', { retryable: true });
    }

    let json: unknown;
    try {
        json = JSON.parse(content);
    } catch (err) {
        throw new CapabilityError('MalformedOutput', 'Classifier returned invalid JSON', { retryable: true, cause: err });
    }

    const parsed = outputSchema.safeParse(json);
    if (!parsed.success) {
        throw new CapabilityError('MalformedOutput', `Invalid classifier output: ${parsed.error.message}`, {
            retryable: true,
        });
    }

    return {
        disaster_type: parsed.data.disaster_type.trim(),
        severity: parsed.data.severity,
        rationale: parsed.data.rationale.trim(),
        confidence: parsed.data.confidence,
    };
}

export function toModelError(err: unknown): CapabilityError {
    if (err instanceof CapabilityError) return err;

    if (err instanceof APIConnectionTimeoutError || err instanceof APIUserAbortError) {
        return new CapabilityError('Timeout', 'Model request timed out', { retryable: true, cause: err });
    }
    if (err instanceof APIConnectionError) {
        return new CapabilityError('ModelUnavailable', `Model unreachable: ${err.message}`, { retryable: true, cause: err });
    }
    if (err instanceof APIError) {
        const status = err.status ?? 0;
        const retryable = status === 429 || status >= 500;
        return new CapabilityError('ModelUnavailable', `Model request failed (${status}): ${err.message}`, {
            retryable,
            cause: err,
        });
    }

    const message = err instanceof Error ? err.message : String(err);
    return new CapabilityError('ModelUnavailable', message, { retryable: true, cause: err });
}

/**
 * Classifier backed by an OpenAI chat model in JSON mode
 */
export class OpenAIClassifier implements Classifier {
    constructor(
        private openai: OpenAI,
        private model: string,
    ) {}

    async classify(observation: Observation, timeoutMs: number): Promise<ClassifierResult> {
        try {
            const content = await withTimeout(
                async (signal) => {
                    const response = await this.openai.chat.completions.create(
                        {
                            model: this.model,
                            messages: [
                                { role: 'system', content: SYSTEM_INSTRUCTIONS },
                                {
                                    role: 'user',
                                    content: `${describeConditions(observation)}\n\nClassify these conditions as JSON.`,
                                },
                            ],
                            response_format: { type: 'json_object' },
                            temperature: 0,
                            max_tokens: 300,
                        },
                        { timeout: timeoutMs, maxRetries: 0, signal },
                    );
                    return response.choices[0]?.message?.content;
                },
                timeoutMs,
                `classification for ${observation.location}`,
            );
            return parseClassifierOutput(content);
        } catch (err) {
            throw toModelError(err);
        }
    }
}

const DEPARTMENT_FOCUS: Record<PlanRequest['department'], string> = {
    'emergency-response': 'Create an emergency response plan. Include immediate actions needed.',
    'public-works': 'Create a public works response plan. Focus on infrastructure protection.',
    'civil-defense': 'Create a civil defense response plan. Focus on public safety measures.',
};

/**
 * Drafts the department response plan included in the alert
 */
export class OpenAIResponsePlanner implements ResponsePlanner {
    constructor(
        private openai: OpenAI,
        private model: string,
    ) {}

    async plan(request: PlanRequest, timeoutMs: number): Promise<string> {
        try {
            const content = await withTimeout(
                async (signal) => {
                    const response = await this.openai.chat.completions.create(
                        {
                            model: this.model,
                            messages: [
                                {
                                    role: 'system',
                                    content: 'You write short, numbered response plans for weather emergencies. Plain text only.',
                                },
                                {
                                    role: 'user',
                                    content: `${DEPARTMENT_FOCUS[request.department]}\nSituation: ${request.disaster_type} with ${request.severity} severity in ${request.location}.`,
                                },
                            ],
                            temperature: 0.3,
                            max_tokens: 500,
                        },
                        { timeout: timeoutMs, maxRetries: 0, signal },
                    );
                    return response.choices[0]?.message?.content;
                },
                timeoutMs,
                `response plan for ${request.location}`,
            );
            if (!content?.trim()) {
                throw new CapabilityError('MalformedOutput', 'Empty response plan', { retryable: false });
            }
            return content.trim();
        } catch (err) {
            throw toModelError(err);
        }
    }
}
