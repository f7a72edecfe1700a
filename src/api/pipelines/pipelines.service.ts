import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Pipeline } from '../../database/entities/pipeline.entity';
import { parsePipelineConfig } from '../../queue/dto';

export interface PipelineInput {
  name: string;
  repository: string;
  config?: Record<string, unknown>;
}

/**
 * Pipeline definitions. Configs are validated and stored with defaults filled in,
 * so what the API returns is exactly what a run will use.
 */
@Injectable()
export class PipelinesService {
  constructor(private readonly dataSource: DataSource) {}

  private get repo() {
    return this.dataSource.getRepository(Pipeline);
  }

  async findAll(): Promise<Pipeline[]> {
    return this.repo.find({ order: { created_at: 'DESC' } });
  }

  async findOne(id: string): Promise<Pipeline | null> {
    return this.repo.findOne({ where: { id } });
  }

  async findByRepository(repo: string): Promise<Pipeline | null> {
    return this.repo.findOne({ where: { repository: repo } });
  }

  /** @throws PipelineConfigError when config is invalid */
  async create(dto: PipelineInput): Promise<Pipeline> {
    const config = parsePipelineConfig(dto.config ?? {});
    const pipeline = this.repo.create({ name: dto.name, repository: dto.repository, config });
    return this.repo.save(pipeline);
  }

  /** @throws PipelineConfigError when config is invalid */
  async update(id: string, dto: Partial<PipelineInput>): Promise<Pipeline> {
    const pipeline = await this.repo.findOne({ where: { id } });
    if (!pipeline) throw new Error('Pipeline not found');
    if (dto.name !== undefined) pipeline.name = dto.name;
    if (dto.repository !== undefined) pipeline.repository = dto.repository;
    if (dto.config !== undefined) pipeline.config = parsePipelineConfig(dto.config);
    return this.repo.save(pipeline);
  }

  async remove(id: string): Promise<void> {
    const result = await this.repo.delete(id);
    if (result.affected === 0) throw new Error('Pipeline not found');
  }
}
