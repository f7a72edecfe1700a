import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Body,
  Param,
  HttpCode,
  HttpStatus,
  NotFoundException,
  BadRequestException,
  ConflictException,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { PipelinesService } from './pipelines.service';
import { CreatePipelineDto } from '../../dto/create-pipeline.dto';
import { UpdatePipelineDto } from '../../dto/update-pipeline.dto';
import { PipelineConfigError } from '../../common/errors';
import { parsePipelineConfig } from '../../queue/dto';
import type { DocsPipelineConfig } from '../../queue/dto';

/** PipelineConfigError -> 400 with the zod issues; anything else propagates. */
function rethrowConfigError(err: unknown): never {
  if (err instanceof PipelineConfigError) {
    throw new BadRequestException({ message: 'Invalid pipeline config', issues: err.issues });
  }
  throw err;
}

function rethrowNotFound(err: unknown): never {
  if (err instanceof Error && err.message === 'Pipeline not found') {
    throw new NotFoundException(err.message);
  }
  throw err;
}

@ApiTags('pipelines')
@Controller('pipelines')
export class PipelinesController {
  constructor(private readonly pipelinesService: PipelinesService) {}

  @Get()
  @ApiOperation({ summary: 'List pipelines' })
  async findAll() {
    return this.pipelinesService.findAll();
  }

  @Post('validate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Validate a pipeline config and return it with defaults filled in' })
  validate(@Body() config: Record<string, unknown>): DocsPipelineConfig {
    try {
      return parsePipelineConfig(config);
    } catch (err) {
      rethrowConfigError(err);
    }
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one pipeline' })
  async findOne(@Param('id') id: string) {
    const pipeline = await this.pipelinesService.findOne(id);
    if (!pipeline) throw new NotFoundException('Pipeline not found');
    return pipeline;
  }

  @Post()
  @ApiOperation({ summary: 'Create a pipeline (config is validated and defaults are filled in)' })
  async create(@Body() dto: CreatePipelineDto) {
    if (await this.pipelinesService.findByRepository(dto.repository)) {
      throw new ConflictException(`A pipeline for ${dto.repository} already exists`);
    }
    return this.pipelinesService.create(dto).catch(rethrowConfigError);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a pipeline' })
  async update(@Param('id') id: string, @Body() dto: UpdatePipelineDto) {
    const pipeline = await this.pipelinesService.findOne(id);
    if (!pipeline) throw new NotFoundException('Pipeline not found');
    return this.pipelinesService.update(id, dto).catch(rethrowConfigError);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a pipeline' })
  async remove(@Param('id') id: string) {
    await this.pipelinesService.remove(id).catch(rethrowNotFound);
  }
}
