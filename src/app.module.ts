import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { HttpModule } from '@nestjs/axios';

// Core domain providers
import { AgentRegistry, createAgentRegistry } from './core/agents/agent.registry';
import { loadReviewSettings, ReviewSettings } from './core/config/review.settings';
import { OrchestrationContext } from './core/orchestration/orchestration.context';
import { AgentRunner } from './core/services/agent-runner.service';
import { ReportBuilder } from './core/services/report-builder.service';
import { TaskScheduler } from './core/services/task-scheduler.service';
import { SubmitReviewUseCase } from './core/usecases/submit-review.usecase';
import { GetReviewUseCase } from './core/usecases/get-review.usecase';
import { CancelReviewUseCase } from './core/usecases/cancel-review.usecase';
import {
  MODEL_REPOSITORY_TOKEN,
  REVIEW_REPOSITORY_TOKEN,
  REVIEW_SETTINGS_TOKEN,
} from './core/domain/repositories/injection-tokens';

// Infrastructure providers
import { OllamaModelService } from './infrastructure/model/ollama-model.service';
import { ClaudeModelService } from './infrastructure/model/claude-model.service';
import { ModelFactoryService } from './infrastructure/model/model.factory.service';
import { InMemoryReviewRepository } from './infrastructure/persistence/in-memory-review.repository';

// Controllers
import { ReviewController } from './presentation/controllers/review.controller';
import { HealthController } from './presentation/controllers/health.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
    }),
    HttpModule,
  ],
  controllers: [
    ReviewController,
    HealthController,
  ],
  providers: [
    // Services
    OllamaModelService,
    ClaudeModelService,
    ModelFactoryService,
    AgentRunner,
    ReportBuilder,
    TaskScheduler,

    {
      provide: REVIEW_SETTINGS_TOKEN,
      useFactory: (configService: ConfigService) => loadReviewSettings(configService),
      inject: [ConfigService],
    },
    // one rate limiter and one worker pool for the whole process
    {
      provide: OrchestrationContext,
      useFactory: (settings: ReviewSettings) => OrchestrationContext.fromSettings(settings),
      inject: [REVIEW_SETTINGS_TOKEN],
    },
    {
      provide: AgentRegistry,
      useFactory: (settings: ReviewSettings) => createAgentRegistry(settings.enabledAgents),
      inject: [REVIEW_SETTINGS_TOKEN],
    },
    {
      provide: MODEL_REPOSITORY_TOKEN,
      useFactory: (modelFactory: ModelFactoryService) => modelFactory.getRepository(),
      inject: [ModelFactoryService],
    },
    {
      provide: REVIEW_REPOSITORY_TOKEN,
      useClass: InMemoryReviewRepository,
    },

    // Use cases
    SubmitReviewUseCase,
    GetReviewUseCase,
    CancelReviewUseCase,
  ],
})
export class AppModule {}
