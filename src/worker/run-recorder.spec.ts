import { RunRecorder } from './run-recorder';
import type { StepName } from '../pipeline/pipeline.types';

describe('RunRecorder', () => {
  const stepIds = new Map<StepName, string>([
    ['checkout', 'step-1'],
    ['toolchain', 'step-2'],
    ['docs', 'step-3'],
    ['publish', 'step-4'],
  ]);

  const setup = () => {
    const order: string[] = [];
    const runQueue = {
      updateRunState: jest.fn(async () => undefined),
      markStepRunning: jest.fn(async () => undefined),
      markStepFinished: jest.fn(async (stepId: string) => {
        order.push(`finish:${stepId}`);
      }),
    };
    const logStream = {
      appendLog: jest.fn(async (stepId: string, line: string) => {
        order.push(`log:${stepId}:${line}`);
        return { id: String(order.length) };
      }),
    };
    return { order, runQueue, logStream, recorder: new RunRecorder('run-1', stepIds, runQueue, logStream) };
  };

  it('writes log lines in order before the step finishes', async () => {
    const { order, recorder } = setup();

    recorder.log('docs', 'Compiling crate', 'info');
    recorder.log('docs', 'Finished', 'info');
    await recorder.stepFinished('docs', { status: 'success', exitCode: 0 });

    expect(order).toEqual(['log:step-3:Compiling crate', 'log:step-3:Finished', 'finish:step-3']);
  });

  it('stores the failure message as an error line of the failed step', async () => {
    const { logStream, runQueue, recorder } = setup();
    const outcome = { status: 'failed' as const, exitCode: 101, error: 'cargo doc --no-deps exited with code 101' };

    await recorder.stepFinished('docs', outcome);

    expect(logStream.appendLog).toHaveBeenCalledWith('step-3', 'cargo doc --no-deps exited with code 101', 'error');
    expect(runQueue.markStepFinished).toHaveBeenCalledWith('step-3', outcome);
  });

  it('keeps recording when a log insert fails', async () => {
    const { logStream, order, recorder } = setup();
    logStream.appendLog.mockRejectedValueOnce(new Error('connection reset'));

    recorder.log('checkout', 'lost', 'info');
    recorder.log('checkout', 'kept', 'info');
    await recorder.flush();

    expect(order).toEqual(['log:step-1:kept']);
  });

  it('forwards state changes and step starts', async () => {
    const { runQueue, recorder } = setup();

    await recorder.stateChanged('generated', { outputDigest: 'f00d' });
    await recorder.stepStarted('publish');

    expect(runQueue.updateRunState).toHaveBeenCalledWith('run-1', 'generated', { outputDigest: 'f00d' });
    expect(runQueue.markStepRunning).toHaveBeenCalledWith('step-4');
  });

  it('rejects a step without a row', async () => {
    const recorder = new RunRecorder('run-2', new Map(), setup().runQueue, setup().logStream);

    await expect(recorder.stepStarted('checkout')).rejects.toThrow('Run run-2 has no checkout step row');
  });
});
