import { Module } from '@nestjs/common';
import { CommandRunner } from './command-runner.service';
import { PIPELINE_STEPS, PipelineRunnerService } from './pipeline-runner.service';
import { DocGeneratorService } from './steps/doc-generator.service';
import { PublisherService } from './steps/publisher.service';
import { SourceFetcherService } from './steps/source-fetcher.service';
import { ToolchainInstallerService } from './steps/toolchain-installer.service';

@Module({
  providers: [
    CommandRunner,
    SourceFetcherService,
    ToolchainInstallerService,
    DocGeneratorService,
    PublisherService,
    {
      provide: PIPELINE_STEPS,
      useFactory: (
        fetcher: SourceFetcherService,
        installer: ToolchainInstallerService,
        generator: DocGeneratorService,
        publisher: PublisherService,
      ) => [fetcher, installer, generator, publisher],
      inject: [SourceFetcherService, ToolchainInstallerService, DocGeneratorService, PublisherService],
    },
    PipelineRunnerService,
  ],
  exports: [PipelineRunnerService],
})
export class PipelineModule {}
