import { GoogleGenAI } from '@google/genai';
import { ModelBackend, ModelResponse } from '../types';
import { AppError, ErrorType, classifyError } from '../utils/errors';

export interface GeminiOptions {
  model: string;
  temperature: number;
  apiKey?: string;
  // Vertex AI is used when no API key is given
  project?: string;
  location?: string;
}

/**
 * Gemini text generation through the @google/genai SDK.
 * Errors leave here as classified AppErrors so callers can decide whether to retry.
 */
export class GeminiModel implements ModelBackend {
  private client: GoogleGenAI;
  readonly modelId: string;

  constructor(private options: GeminiOptions) {
    if (options.apiKey) {
      this.client = new GoogleGenAI({ apiKey: options.apiKey });
    } else if (options.project) {
      this.client = new GoogleGenAI({
        vertexai: true,
        project: options.project,
        location: options.location ?? 'us-central1',
      });
    } else {
      throw new AppError({
        type: ErrorType.CONFIGURATION_ERROR,
        message: 'Either GOOGLE_API_KEY or PROJECT_ID is required for the Gemini model',
        retryable: false,
      });
    }
    this.modelId = options.model;
  }

  async generate(prompt: string): Promise<ModelResponse> {
    let text: string | undefined;
    let usage: ModelResponse['usage'];

    try {
      const response = await this.client.models.generateContent({
        model: this.modelId,
        contents: prompt,
        config: {
          temperature: this.options.temperature,
          topP: 1.0,
          topK: 40,
          maxOutputTokens: 8192,
        },
      });
      text = response.text;
      usage = {
        inputTokens: response.usageMetadata?.promptTokenCount,
        outputTokens: response.usageMetadata?.candidatesTokenCount,
      };
    } catch (error: unknown) {
      throw classifyError(error, { model: this.modelId });
    }

    if (!text) {
      throw new AppError({
        type: ErrorType.PARSING_ERROR,
        message: 'Empty response from Gemini',
        retryable: false,
        context: { model: this.modelId },
      });
    }

    return { text, usage };
  }
}
