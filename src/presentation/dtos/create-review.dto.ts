import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  ArrayUnique,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsPositive,
  IsString,
  ValidateNested,
} from 'class-validator';
import { ReviewFile, ReviewRequest } from '../../core/domain/entities/review-request.entity';

export class ReviewFileDto {
  @ApiProperty({
    description: 'Path of the changed file, relative to the repository root',
    example: 'src/auth/login.ts',
  })
  @IsNotEmpty()
  @IsString()
  file_path!: string;

  @ApiProperty({
    description: 'Unified diff of the change',
    example: '@@ -10,3 +10,4 @@\n+const query = `SELECT * FROM users WHERE id = ${id}`;',
  })
  @IsString()
  diff!: string;

  @ApiProperty({
    description: 'Full content of the file after the change',
    required: false,
  })
  @IsOptional()
  @IsString()
  content?: string;
}

export class CreateReviewDto {
  @ApiProperty({
    description: 'Repository being reviewed',
    example: 'acme/storefront',
  })
  @IsNotEmpty()
  @IsString()
  repo!: string;

  @ApiProperty({
    description: 'The pull request number',
    example: 42,
  })
  @IsInt()
  @IsPositive()
  pr_number!: number;

  @ApiProperty({
    description: 'Changed files of the pull request',
    type: [ReviewFileDto],
  })
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => ReviewFileDto)
  files!: ReviewFileDto[];

  @ApiProperty({
    description: 'Agents to run; every enabled agent when omitted',
    example: ['Security', 'Performance'],
    required: false,
    type: [String],
  })
  @IsOptional()
  @IsArray()
  @ArrayUnique()
  @IsString({ each: true })
  agents?: string[];

  toReviewRequest(): ReviewRequest {
    return {
      repoName: this.repo,
      prNumber: this.pr_number,
      files: this.files.map(file => new ReviewFile(file.file_path, file.diff, file.content)),
      agents: this.agents,
    };
  }
}
