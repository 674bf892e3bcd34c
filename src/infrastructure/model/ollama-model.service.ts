import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { lastValueFrom } from 'rxjs';
import { AxiosResponse } from 'axios';
import { MalformedAgentOutputError } from '../../core/domain/errors/review.errors';
import { ModelKind, ModelRepository, ModelRequest } from '../../core/domain/repositories/model.repository';
import { toTransportError } from './transport-error';

interface OllamaChatResponse {
  model?: string;
  message?: {
    role: string;
    content?: string;
  };
  done?: boolean;
}

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';
export const DEFAULT_OLLAMA_MODEL = 'mistral';

@Injectable()
export class OllamaModelService implements ModelRepository {
  private readonly logger = new Logger(OllamaModelService.name);
  private readonly baseUrl: string;
  private readonly models: Record<ModelKind, string>;

  constructor(
    private readonly configService: ConfigService,
    private readonly httpService: HttpService,
  ) {
    this.baseUrl = this.configService.get<string>('OLLAMA_BASE_URL', DEFAULT_OLLAMA_BASE_URL).replace(/\/+$/, '');
    this.models = {
      code: this.configService.get<string>('OLLAMA_MODEL_CODE', DEFAULT_OLLAMA_MODEL),
      general: this.configService.get<string>('OLLAMA_MODEL_GENERAL', DEFAULT_OLLAMA_MODEL),
    };
  }

  modelFor(kind: ModelKind): string {
    return this.models[kind];
  }

  async complete(request: ModelRequest, signal: AbortSignal): Promise<string> {
    const model = this.modelFor(request.modelKind);
    let response: AxiosResponse<OllamaChatResponse>;

    try {
      response = await lastValueFrom(
        this.httpService.post<OllamaChatResponse>(
          `${this.baseUrl}/api/chat`,
          {
            model,
            messages: request.messages,
            stream: false,
            options: {
              temperature: request.temperature,
              num_predict: request.maxTokens,
            },
          },
          { signal },
        ),
      );
    } catch (error) {
      throw toTransportError('Ollama', error);
    }

    const content = response.data.message?.content;
    if (typeof content !== 'string' || content.trim() === '') {
      throw new MalformedAgentOutputError(`Ollama model ${model} returned no message content`);
    }

    this.logger.verbose(`Ollama ${model} answered with ${content.length} character(s)`);
    return content;
  }
}
