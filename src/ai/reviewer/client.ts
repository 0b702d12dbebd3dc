/**
 * Vertex AI reasoning client for the clinical reviewer.
 * Supports two modes:
 * 1. Deployed endpoint — calls via REST to a Model Garden deployment
 * 2. Publisher model (Gemini) — calls via Vertex AI SDK, also the endpoint fallback
 */

import {
    VertexAI,
    Content,
    GenerateContentResult,
    HarmCategory,
    HarmBlockThreshold,
    ClientError,
    GoogleAuthError,
} from '@google-cloud/vertexai';
import { GoogleAuth } from 'google-auth-library';
import { z } from 'zod';
import { ReviewerConfig } from '../../config/reviewer.config';
import { ReviewerUnavailableError, TransientReviewerError, errorMessage } from '../../utils/errors';
import logger from '../../utils/logger';

export interface ReasoningResponse {
    text: string;
    tokensUsed?: number;
    inferenceTimeMs: number;
    finishReason?: string;
}

export interface ReasoningCallOptions {
    signal?: AbortSignal;
}

/**
 * Transport to the external reasoning service. Implementations throw
 * TransientReviewerError for retryable failures and ReviewerUnavailableError otherwise.
 */
export interface ReasoningClient {
    readonly name: string;
    generateJson(systemInstruction: string, prompt: string, options?: ReasoningCallOptions): Promise<ReasoningResponse>;
}

const RETRYABLE_STATUS = [408, 429, 500, 502, 503, 504];

const EndpointResponseSchema = z.object({
    candidates: z
        .array(
            z.object({
                content: z.object({ parts: z.array(z.object({ text: z.string().optional() })).optional() }).optional(),
                finishReason: z.string().optional(),
            }),
        )
        .optional(),
    usageMetadata: z.object({ totalTokenCount: z.number().optional() }).optional(),
    error: z.object({ message: z.string().optional() }).optional(),
});

export class VertexReasoningClient implements ReasoningClient {
    readonly name = 'vertex-ai';
    private readonly vertexAI: VertexAI;
    private readonly auth: GoogleAuth;

    constructor(private readonly config: ReviewerConfig) {
        if (!config.projectId) {
            throw new ReviewerUnavailableError('GCP project id is not configured for the clinical reviewer');
        }

        this.vertexAI = new VertexAI({ project: config.projectId, location: config.location });
        this.auth = new GoogleAuth({
            scopes: ['https://www.googleapis.com/auth/cloud-platform'],
        });

        logger.info(
            {
                projectId: config.projectId,
                location: config.location,
                endpointId: config.endpointId || 'none',
                model: config.model,
            },
            'Reasoning client initialized',
        );
    }

    /**
     * Smart routing: use the deployed endpoint if configured, otherwise the publisher model.
     */
    async generateJson(systemInstruction: string, prompt: string, options: ReasoningCallOptions = {}): Promise<ReasoningResponse> {
        const contents: Content[] = [{ role: 'user', parts: [{ text: prompt }] }];

        if (this.config.endpointId) {
            try {
                return await this.callEndpoint(this.config.endpointId, contents, systemInstruction, options.signal);
            } catch (error) {
                if (options.signal?.aborted) throw error;
                logger.warn(
                    { endpoint: this.config.endpointId, error: errorMessage(error) },
                    'Endpoint call failed, falling back to publisher model',
                );
            }
        }

        return this.callPublisherModel(contents, systemInstruction);
    }

    /**
     * Call a deployed endpoint via REST API.
     */
    private async callEndpoint(
        endpointId: string,
        contents: Content[],
        systemInstruction: string,
        signal?: AbortSignal,
    ): Promise<ReasoningResponse> {
        const startTime = Date.now();

        let token: string | null | undefined;
        try {
            const client = await this.auth.getClient();
            token = (await client.getAccessToken()).token;
        } catch (error) {
            throw new ReviewerUnavailableError(`Could not obtain access token: ${errorMessage(error)}`);
        }
        if (!token) {
            throw new ReviewerUnavailableError('Access token was empty');
        }

        const { projectId, location, generationConfig } = this.config;
        const url = `https://${location}-aiplatform.googleapis.com/v1/projects/${projectId}/locations/${location}/endpoints/${endpointId}:generateContent`;

        let resp: Response;
        try {
            resp = await fetch(url, {
                method: 'POST',
                headers: {
                    Authorization: `Bearer ${token}`,
                    'Content-Type': 'application/json',
                },
                body: JSON.stringify({
                    contents,
                    generationConfig: { ...generationConfig, responseMimeType: 'application/json' },
                    systemInstruction: { role: 'user', parts: [{ text: systemInstruction }] },
                }),
                signal,
            });
        } catch (error) {
            throw new TransientReviewerError(`Endpoint request failed: ${errorMessage(error)}`);
        }

        const body: unknown = await resp.json().catch(() => ({}));
        const parsed = EndpointResponseSchema.safeParse(body);
        if (!resp.ok) {
            const detail = parsed.success ? parsed.data.error?.message : undefined;
            const message = `Endpoint error ${resp.status}: ${detail || resp.statusText}`;
            throw RETRYABLE_STATUS.includes(resp.status)
                ? new TransientReviewerError(message)
                : new ReviewerUnavailableError(message);
        }

        if (!parsed.success) {
            throw new ReviewerUnavailableError('Endpoint returned an unexpected payload');
        }
        const candidate = parsed.data.candidates?.[0];
        return {
            text: candidate?.content?.parts?.[0]?.text || '',
            tokensUsed: parsed.data.usageMetadata?.totalTokenCount,
            inferenceTimeMs: Date.now() - startTime,
            finishReason: candidate?.finishReason,
        };
    }

    /**
     * Call a publisher model (Gemini) via Vertex AI SDK.
     */
    private async callPublisherModel(contents: Content[], systemInstruction: string): Promise<ReasoningResponse> {
        const startTime = Date.now();

        const model = this.vertexAI.getGenerativeModel({
            model: this.config.model,
            generationConfig: { ...this.config.generationConfig, responseMimeType: 'application/json' },
            safetySettings: [
                { category: HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT, threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH },
                { category: HarmCategory.HARM_CATEGORY_HARASSMENT, threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH },
                { category: HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT, threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH },
                { category: HarmCategory.HARM_CATEGORY_HATE_SPEECH, threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH },
            ],
            systemInstruction: { role: 'system', parts: [{ text: systemInstruction }] },
        });

        let result: GenerateContentResult;
        try {
            result = await model.generateContent({ contents });
        } catch (error) {
            // 4xx and credential problems will not improve on retry.
            if (error instanceof ClientError || error instanceof GoogleAuthError) {
                throw new ReviewerUnavailableError(`Publisher model rejected the request: ${error.message}`);
            }
            throw new TransientReviewerError(`Publisher model call failed: ${errorMessage(error)}`);
        }

        const response = result.response;
        const candidate = response.candidates?.[0];
        return {
            text: candidate?.content?.parts?.[0]?.text || '',
            tokensUsed: response.usageMetadata?.totalTokenCount,
            inferenceTimeMs: Date.now() - startTime,
            finishReason: candidate?.finishReason,
        };
    }
}
