import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ModelRepository } from '../../core/domain/repositories/model.repository';
import { ClaudeModelService } from './claude-model.service';
import { OllamaModelService } from './ollama-model.service';

export enum ModelProvider {
  OLLAMA = 'ollama',
  CLAUDE = 'claude',
}

export function parseModelProvider(value: string | undefined): ModelProvider | undefined {
  const normalized = (value ?? ModelProvider.OLLAMA).trim().toLowerCase();
  return Object.values(ModelProvider).find(provider => provider === normalized);
}

/**
 * Picks the model transport named by MODEL_PROVIDER.
 */
@Injectable()
export class ModelFactoryService {
  private readonly logger = new Logger(ModelFactoryService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly ollamaService: OllamaModelService,
    private readonly claudeService: ClaudeModelService,
  ) {}

  getProvider(): ModelProvider {
    const raw = this.configService.get<string>('MODEL_PROVIDER');
    const provider = parseModelProvider(raw);
    if (!provider) {
      throw new Error(`Unsupported MODEL_PROVIDER "${raw}": expected one of ${Object.values(ModelProvider).join(', ')}`);
    }
    return provider;
  }

  getRepository(): ModelRepository {
    const provider = this.getProvider();
    this.logger.log(`Using the ${provider} model transport`);
    switch (provider) {
      case ModelProvider.CLAUDE:
        return this.claudeService;
      case ModelProvider.OLLAMA:
        return this.ollamaService;
    }
  }
}
