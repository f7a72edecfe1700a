import {
  Controller,
  Get,
  Post,
  Body,
  Param,
  Query,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { RunsService } from './runs.service';
import { TriggerRunDto } from '../../dto/trigger-run.dto';
import { PipelineConfigError } from '../../common/errors';

@ApiTags('runs')
@Controller('runs')
export class RunsController {
  constructor(private readonly runsService: RunsService) {}

  @Get()
  @ApiOperation({ summary: 'List runs (optionally filtered by pipelineId)' })
  async findAll(@Query('pipelineId') pipelineId?: string) {
    return this.runsService.findAll(pipelineId);
  }

  // Logs for a step (must be before :id routes)
  @Get(':runId/steps/:stepId/logs')
  @ApiOperation({ summary: 'Get log lines for a run step' })
  async getStepLogs(@Param('runId') _runId: string, @Param('stepId') stepId: string) {
    return this.runsService.getStepLogs(stepId);
  }

  @Get(':id/steps')
  @ApiOperation({ summary: 'Get a run with its steps (status view)' })
  async findOneWithSteps(@Param('id') id: string) {
    const result = await this.runsService.findOneWithSteps(id);
    if (!result) throw new NotFoundException('Run not found');
    return result;
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one run' })
  async findOne(@Param('id') id: string) {
    const run = await this.runsService.findOne(id);
    if (!run) throw new NotFoundException('Run not found');
    return run;
  }

  @Post()
  @ApiOperation({ summary: 'Trigger a docs run manually (no branch gate)' })
  async trigger(@Body() body: TriggerRunDto) {
    try {
      return await this.runsService.triggerRun({
        pipelineId: body.pipelineId,
        branch: body.branch,
        commit: body.commit,
        triggerMetadata: body.trigger_metadata ?? null,
      });
    } catch (err) {
      if (err instanceof PipelineConfigError) {
        throw new UnprocessableEntityException({ message: err.message, issues: err.issues });
      }
      if (err instanceof Error && err.message === 'Pipeline not found') {
        throw new NotFoundException(err.message);
      }
      throw err;
    }
  }
}
