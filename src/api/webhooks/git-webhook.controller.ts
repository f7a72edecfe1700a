import {
  Controller,
  Post,
  Body,
  Headers,
  HttpCode,
  HttpStatus,
  BadRequestException,
  NotFoundException,
  UnauthorizedException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiBody, ApiOperation, ApiTags } from '@nestjs/swagger';
import { PipelinesService } from '../pipelines/pipelines.service';
import { RunsService } from '../runs/runs.service';
import type { PushResult } from '../runs/runs.service';
import { PipelineConfigError } from '../../common/errors';
import type { Env } from '../../config/env.validation';
import type { GitWebhookPayload } from '../../queue/dto';
import { getRepoFromPayload, toPushEvent } from './push-event';
import { RawBody, verifyWebhookSignature } from './webhook-signature';

@Controller('webhooks/git')
@ApiTags('webhooks')
export class GitWebhookController {
  constructor(
    private readonly pipelinesService: PipelinesService,
    private readonly runsService: RunsService,
    private readonly config: ConfigService<Env, true>,
  ) {}

  /**
   * Receive Git push webhook (GitHub, GitLab, or any POST with repo/repository).
   * Resolves the pipeline by repository; queues a run when the branch passes the trigger gate.
   * Pushes to other branches are accepted and ignored.
   */
  @Post('push')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Receive a git push webhook and queue a docs run' })
  @ApiBody({
    description:
      'GitHub/GitLab push payload. repo comes from repo/repository/project, branch from ref, commit from after. The full body is stored in trigger_metadata.',
    schema: { type: 'object', additionalProperties: true },
  })
  async handlePush(
    @Body() body: GitWebhookPayload,
    @RawBody() rawBody: Buffer | undefined,
    @Headers('x-hub-signature-256') signature: string | undefined,
  ): Promise<PushResult> {
    const secret = this.config.get('WEBHOOK_SECRET', { infer: true });
    if (secret && !verifyWebhookSignature(rawBody, signature, secret)) {
      throw new UnauthorizedException('Invalid or missing X-Hub-Signature-256');
    }

    const repo = getRepoFromPayload(body);
    if (!repo) {
      throw new BadRequestException(
        'Missing repo. Send repo, repository.full_name, repository.clone_url, or project.path_with_namespace',
      );
    }

    const pipeline = await this.pipelinesService.findByRepository(repo);
    if (!pipeline) {
      throw new NotFoundException(`No pipeline found for repository: ${repo}`);
    }

    try {
      return await this.runsService.handlePush(pipeline, toPushEvent(body), body);
    } catch (err) {
      if (err instanceof PipelineConfigError) {
        throw new UnprocessableEntityException({ message: err.message, issues: err.issues });
      }
      throw err;
    }
  }
}
