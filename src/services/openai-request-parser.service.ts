import { inject, injectable } from 'tsyringe';
import OpenAI from 'openai';
import { AppConfig, OpenAIConfig } from '../config/app.config';
import {
  CandidateRequest,
  ParsedRequestResponseSchema,
  toCandidateRequest
} from '../types/request-parse.types';
import { OPERATIONAL_FLAGS } from '../types/vessel.types';
import { isNetworkError, retryWithBackoff } from '../utils/retry.util';
import { IRequestParser } from './request-parser.interface';
import { PatternRequestParserService } from './pattern-request-parser.service';

@injectable()
export class OpenAIRequestParserService implements IRequestParser {
  private readonly client: OpenAI;
  private readonly fallbackParser: PatternRequestParserService;

  constructor(
    @inject('AppConfig') private config: AppConfig,
    @inject('OpenAIConfig') private openaiConfig: OpenAIConfig
  ) {
    this.client = new OpenAI({
      apiKey: openaiConfig.apiKey
    });
    this.fallbackParser = new PatternRequestParserService();
  }

  async parse(text: string): Promise<CandidateRequest> {
    try {
      return await retryWithBackoff(
        () => this.callOpenAI(text),
        this.config.retry,
        this.isRetryableError
      );
    } catch (error) {
      console.error('[Request Parser] OpenAI parsing failed, using pattern fallback:', error);
      return this.fallbackParser.parse(text);
    }
  }

  private async callOpenAI(text: string): Promise<CandidateRequest> {
    const response = await this.client.responses.create({
      model: this.openaiConfig.model,
      instructions: this.buildSystemInstructions(),
      input: text,
      max_output_tokens: this.openaiConfig.maxTokens
    });

    return this.parseResponse(response.output_text);
  }

  private buildSystemInstructions(): string {
    const flagLines = Object.entries(OPERATIONAL_FLAGS)
      .map(([name, kind]) =>
        kind.type === 'boolean'
          ? `- ${name}: true or false`
          : `- ${name}: one of ${kind.values.join(', ')}`
      )
      .join('\n');

    return `You extract port call parameters from a shipping agent's request. Do not calculate anything.

Port codes are three letters (for example DUR for Durban, CPT for Cape Town, RCB for Richards Bay).
Dates must be ISO 8601: YYYY-MM-DD or a date-time with an offset.
Only include flags the request states explicitly. Recognised flags:
${flagLines}

Respond ONLY with a valid JSON object in this exact format, using null for anything not stated:
{
  "port": "three-letter code" or null,
  "grossTonnage": number or null,
  "arrivalDate": "ISO 8601" or null,
  "departureDate": "ISO 8601" or null,
  "flags": { "flag_name": value }
}`;
  }

  private parseResponse(outputText: string): CandidateRequest {
    try {
      const jsonMatch = outputText.match(/\{[\s\S]*\}/);
      if (!jsonMatch) {
        throw new Error('No JSON found in response');
      }

      const parsed: unknown = JSON.parse(jsonMatch[0]);
      return toCandidateRequest(ParsedRequestResponseSchema.parse(parsed));
    } catch (error) {
      throw new Error(`Failed to parse OpenAI response: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private isRetryableError(error: Error): boolean {
    // Retry on network errors
    if (isNetworkError(error)) {
      return true;
    }

    // Retry on OpenAI rate limits and server errors
    if (error instanceof OpenAI.APIError) {
      const status = error.status;
      return status === 429 || (status !== undefined && status >= 500);
    }

    return false;
  }
}
