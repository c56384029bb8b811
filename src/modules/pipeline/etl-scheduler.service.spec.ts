import { Test } from '@nestjs/testing';
import { EtlPipelineService } from './etl-pipeline.service';
import { EtlSchedulerService } from './etl-scheduler.service';

describe('EtlSchedulerService', () => {
  let scheduler: EtlSchedulerService;
  let run: jest.Mock;

  beforeEach(async () => {
    run = jest.fn();
    const moduleRef = await Test.createTestingModule({
      providers: [
        EtlSchedulerService,
        { provide: EtlPipelineService, useValue: { run } },
      ],
    }).compile();

    scheduler = moduleRef.get(EtlSchedulerService);
  });

  it('skips a tick while a run is in progress', async () => {
    let finish: () => void = () => undefined;
    run.mockReturnValueOnce(
      new Promise<void>((resolve) => {
        finish = resolve;
      }),
    );

    const first = scheduler.runScheduled();
    expect(scheduler.getStatus()).toEqual({ isRunning: true });
    await scheduler.runScheduled();
    finish();
    await first;

    expect(run).toHaveBeenCalledTimes(1);
    expect(scheduler.getStatus()).toEqual({ isRunning: false });
  });

  it('keeps running after a failed run', async () => {
    run.mockRejectedValueOnce(new Error('extract failed')).mockResolvedValueOnce(undefined);

    await expect(scheduler.runScheduled()).resolves.toBeUndefined();
    await expect(scheduler.runScheduled()).resolves.toBeUndefined();
    expect(run).toHaveBeenCalledTimes(2);
  });
});
