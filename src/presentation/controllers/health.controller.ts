import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { AgentRegistry } from '../../core/agents/agent.registry';
import { TaskScheduler } from '../../core/services/task-scheduler.service';

export const SERVICE_NAME = 'review-orchestrator';
export const SERVICE_VERSION = '1.0.0';

export interface HealthStatus {
  status: 'healthy';
  service: string;
  version: string;
  agents: string[];
  active_reviews: number;
  timestamp: string;
}

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly registry: AgentRegistry,
    private readonly scheduler: TaskScheduler,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Liveness probe listing the enabled agents' })
  check(): HealthStatus {
    return {
      status: 'healthy',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      agents: this.registry.names(),
      active_reviews: this.scheduler.activeReviews,
      timestamp: new Date().toISOString(),
    };
  }
}
