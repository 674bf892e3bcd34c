import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { lastValueFrom } from 'rxjs';
import { AxiosResponse } from 'axios';
import { MalformedAgentOutputError, ModelTransportError } from '../../core/domain/errors/review.errors';
import { ModelRepository, ModelRequest } from '../../core/domain/repositories/model.repository';
import { toTransportError } from './transport-error';

interface ClaudeResponse {
  content?: {
    type: string;
    text?: string;
  }[];
}

export const DEFAULT_CLAUDE_MODEL = 'claude-3-5-sonnet-latest';

@Injectable()
export class ClaudeModelService implements ModelRepository {
  private readonly logger = new Logger(ClaudeModelService.name);
  private readonly apiKey: string;
  private readonly apiUrl: string = 'https://api.anthropic.com/v1/messages';
  private readonly model: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly httpService: HttpService,
  ) {
    this.apiKey = this.configService.get<string>('CLAUDE_API_KEY', '');
    this.model = this.configService.get<string>('CLAUDE_MODEL', DEFAULT_CLAUDE_MODEL);
  }

  async complete(request: ModelRequest, signal: AbortSignal): Promise<string> {
    if (!this.apiKey) {
      throw new ModelTransportError('CLAUDE_API_KEY not configured', undefined, 'ENOCONFIG');
    }

    // system prompts travel outside the message list
    const system = request.messages
      .filter(message => message.role === 'system')
      .map(message => message.content)
      .join('\n\n');
    const messages = request.messages
      .filter(message => message.role !== 'system')
      .map(message => ({ role: message.role, content: message.content }));

    let response: AxiosResponse<ClaudeResponse>;
    try {
      response = await lastValueFrom(
        this.httpService.post<ClaudeResponse>(
          this.apiUrl,
          {
            model: this.model,
            max_tokens: request.maxTokens,
            temperature: request.temperature,
            ...(system ? { system } : {}),
            messages,
          },
          {
            headers: {
              'x-api-key': this.apiKey,
              'anthropic-version': '2023-06-01',
              'content-type': 'application/json',
            },
            signal,
          },
        ),
      );
    } catch (error) {
      throw toTransportError('Claude', error);
    }

    const text = (response.data.content ?? [])
      .filter(block => block.type === 'text' && typeof block.text === 'string')
      .map(block => block.text)
      .join('');
    if (text.trim() === '') {
      throw new MalformedAgentOutputError(`Claude model ${this.model} returned no text content`);
    }

    this.logger.verbose(`Claude ${this.model} answered with ${text.length} character(s)`);
    return text;
  }
}
