import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Delete,
  Get,
  Header,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  ParseUUIDPipe,
  Post,
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CreateReviewDto } from '../dtos/create-review.dto';
import { ReviewRecordJson, ReviewStatus } from '../../core/domain/entities/review.entity';
import { ReviewConflictError, ReviewNotFoundError, ReviewRejectedError } from '../../core/domain/errors/review.errors';
import { SubmitReviewUseCase } from '../../core/usecases/submit-review.usecase';
import { GetReviewUseCase } from '../../core/usecases/get-review.usecase';
import { CancelReviewUseCase } from '../../core/usecases/cancel-review.usecase';
import { renderReportMarkdown } from '../../core/services/report-markdown.renderer';

export interface ReviewTicket {
  review_id: string;
  status: ReviewStatus;
  message: string;
  started_at: string;
  tasks_total: number;
}

/**
 * Turns domain errors into HTTP errors; anything else is left to Nest's exception filter.
 */
function toHttpError(error: unknown): unknown {
  if (error instanceof ReviewRejectedError) {
    return new BadRequestException(error.message);
  }
  if (error instanceof ReviewConflictError) {
    return new ConflictException(error.message);
  }
  if (error instanceof ReviewNotFoundError) {
    return new NotFoundException(error.message);
  }
  return error;
}

@ApiTags('reviews')
@Controller('reviews')
export class ReviewController {
  constructor(
    private readonly submitReviewUseCase: SubmitReviewUseCase,
    private readonly getReviewUseCase: GetReviewUseCase,
    private readonly cancelReviewUseCase: CancelReviewUseCase,
  ) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({
    summary: 'Start a multi-agent review of a pull request',
    description: 'Schedules every (file, agent) pair of the request and returns at once; poll the review for its report',
  })
  @ApiBody({ type: CreateReviewDto })
  @ApiResponse({ status: 202, description: 'The review has been scheduled.' })
  @ApiResponse({ status: 400, description: 'Invalid input, no reviewable files or unknown agents.' })
  @ApiResponse({ status: 409, description: 'The pull request is already under review.' })
  createReview(@Body() createReviewDto: CreateReviewDto): ReviewTicket {
    try {
      const handle = this.submitReviewUseCase.execute(createReviewDto.toReviewRequest());
      return {
        review_id: handle.id,
        status: ReviewStatus.IN_PROGRESS,
        message: `Review started: ${handle.tasksTotal} task(s) scheduled`,
        started_at: handle.startedAt.toISOString(),
        tasks_total: handle.tasksTotal,
      };
    } catch (error) {
      throw toHttpError(error);
    }
  }

  @Get(':id')
  @ApiOperation({ summary: 'Status of a review, with its report once sealed' })
  @ApiParam({ name: 'id', description: 'Review id returned when the review was started' })
  @ApiResponse({ status: 200, description: 'The review status record.' })
  @ApiResponse({ status: 404, description: 'No such review.' })
  async getReview(@Param('id', ParseUUIDPipe) id: string): Promise<ReviewRecordJson> {
    const record = await this.getReviewUseCase.execute(id);
    if (!record) {
      throw new NotFoundException(`Review ${id} not found`);
    }
    return record.toJSON();
  }

  @Get(':id/markdown')
  @Header('Content-Type', 'text/markdown; charset=utf-8')
  @ApiOperation({ summary: 'Sealed report rendered as a pull-request comment' })
  @ApiParam({ name: 'id', description: 'Review id returned when the review was started' })
  @ApiResponse({ status: 200, description: 'The markdown report.' })
  @ApiResponse({ status: 404, description: 'No such review.' })
  @ApiResponse({ status: 409, description: 'The review is still running or was cancelled.' })
  async getReviewMarkdown(@Param('id', ParseUUIDPipe) id: string): Promise<string> {
    const record = await this.getReviewUseCase.execute(id);
    if (!record) {
      throw new NotFoundException(`Review ${id} not found`);
    }
    if (!record.report) {
      throw new ConflictException(`Review ${id} has no report (status: ${record.status})`);
    }
    return renderReportMarkdown(record.report);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Cancel a running review and discard its partial results' })
  @ApiParam({ name: 'id', description: 'Review id returned when the review was started' })
  @ApiResponse({ status: 204, description: 'The review has been cancelled.' })
  @ApiResponse({ status: 404, description: 'No such review.' })
  @ApiResponse({ status: 409, description: 'The review has already finished.' })
  cancelReview(@Param('id', ParseUUIDPipe) id: string): void {
    try {
      this.cancelReviewUseCase.execute(id);
    } catch (error) {
      throw toHttpError(error);
    }
  }
}
