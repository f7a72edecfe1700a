/**
 * Database entities: pipelines, pipeline_runs, run_steps, step_logs.
 */
export { Pipeline } from './pipeline.entity';
export { PipelineRun } from './pipeline-run.entity';
export { RunStep } from './run-step.entity';
export { StepLog } from './step-log.entity';
