import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  JobPriority,
  JobScheduler,
  JobStatus,
  jobKey,
  type JobSchedulerConfig,
  type JobSpec,
} from '../../../src/lsp/task-queue.js';
import { SchedulerDisposedError, WaitTimeoutError } from '../../../src/lsp/errors.js';
import { deferred, delay } from '../../helpers/test-utils.js';

type Kind = 'walk' | 'parse' | 'decode';

function createScheduler(config: Partial<JobSchedulerConfig<Kind>> = {}): JobScheduler<Kind> {
  return new JobScheduler<Kind>({ maxConcurrent: 1, defaultWaitTimeoutMs: 0, ...config });
}

function spec(
  kind: Kind,
  target: string,
  run: () => Promise<void>,
  extra: Partial<JobSpec<Kind>> = {}
): JobSpec<Kind> {
  return { kind, target, priority: JobPriority.BACKGROUND, scopes: ['/ws'], run, ...extra };
}

describe('JobScheduler', () => {
  it('执行任务并在完成后解除等待', async () => {
    const scheduler = createScheduler();
    let executed = false;

    scheduler.submit(spec('parse', 'file:///ws/a.tf', async () => { executed = true; }));
    await scheduler.wait('/ws');

    assert.equal(executed, true);
    assert.equal(scheduler.getOutcome('parse', 'file:///ws/a.tf'), JobStatus.COMPLETED);
    assert.deepEqual(scheduler.getStats(), { pending: 0, running: 0, completed: 1, failed: 0, coalesced: 0, total: 1 });
  });

  it('同一轮提交的同身份任务被合并，只执行最后一次的闭包', async () => {
    const scheduler = createScheduler();
    const runs: string[] = [];

    scheduler.submit(spec('parse', 'file:///ws/a.tf', async () => { runs.push('first'); }));
    scheduler.submit(spec('parse', 'file:///ws/a.tf', async () => { runs.push('second'); }));
    await scheduler.wait();

    assert.deepEqual(runs, ['second']);
    assert.equal(scheduler.getStats().coalesced, 1);
  });

  it('执行中的同身份提交在其结束后按顺序执行', async () => {
    const scheduler = createScheduler();
    const runs: string[] = [];
    const started = deferred();
    const release = deferred();

    scheduler.submit(spec('parse', 'file:///ws/a.tf', async () => {
      runs.push('first');
      started.resolve();
      await release.promise;
    }));
    await started.promise;
    scheduler.submit(spec('parse', 'file:///ws/a.tf', async () => { runs.push('second'); }));

    assert.equal(scheduler.getStats().pending, 1);
    assert.equal(scheduler.outstanding('/ws'), 2);
    release.resolve();
    await scheduler.wait('/ws');

    assert.deepEqual(runs, ['first', 'second']);
  });

  it('前台任务先于后台任务，同优先级保持提交顺序', async () => {
    const scheduler = createScheduler();
    const runs: string[] = [];

    scheduler.submit(spec('parse', 'file:///ws/a.tf', async () => { runs.push('A'); }));
    scheduler.submit(spec('parse', 'file:///ws/b.tf', async () => { runs.push('B'); }));
    scheduler.submit(
      spec('parse', 'file:///ws/c.tf', async () => { runs.push('C'); }, { priority: JobPriority.FOREGROUND })
    );
    await scheduler.wait();

    assert.deepEqual(runs, ['C', 'A', 'B']);
  });

  it('合并时保留较高优先级并合并作用域', async () => {
    const scheduler = createScheduler();
    const runs: string[] = [];

    scheduler.submit(spec('parse', 'file:///ws/a.tf', async () => { runs.push('A1'); }, { scopes: ['/ws/one'] }));
    scheduler.submit(spec('parse', 'file:///ws/b.tf', async () => { runs.push('B'); }, { scopes: ['/ws/one'] }));
    scheduler.submit(
      spec('parse', 'file:///ws/a.tf', async () => { runs.push('A2'); }, {
        priority: JobPriority.FOREGROUND,
        scopes: ['/ws/two'],
      })
    );

    assert.equal(scheduler.outstanding('/ws/two'), 1);
    assert.equal(scheduler.outstanding('/ws/one'), 2);
    await scheduler.wait();

    assert.deepEqual(runs, ['A2', 'B']);
  });

  it('并发数不超过 maxConcurrent', async () => {
    const scheduler = createScheduler({ maxConcurrent: 2 });
    const release = deferred();

    for (const name of ['a', 'b', 'c', 'd']) {
      scheduler.submit(spec('parse', `file:///ws/${name}.tf`, () => release.promise));
    }
    await delay(10);

    assert.equal(scheduler.getRunningJobs().length, 2);
    assert.equal(scheduler.getStats().pending, 2);
    release.resolve();
    await scheduler.wait();
    assert.equal(scheduler.getStats().completed, 4);
  });

  it('缺失的前置任务由 prerequisiteFactory 补交并先执行', async () => {
    const runs: string[] = [];
    const scheduler = createScheduler({
      prerequisiteFactory: (kind, target, dependent) =>
        kind === 'parse'
          ? spec('parse', target, async () => { runs.push(`parse ${target}`); }, { priority: dependent.priority, scopes: [] })
          : undefined,
    });

    scheduler.submit(
      spec('decode', 'file:///ws/a.tf', async () => { runs.push('decode'); }, { dependsOn: ['parse'] })
    );
    await scheduler.wait('/ws');

    assert.deepEqual(runs, ['parse file:///ws/a.tf', 'decode']);
    assert.equal(scheduler.getOutcome('parse', 'file:///ws/a.tf'), JobStatus.COMPLETED);
  });

  it('无法补交前置任务时依赖任务失败', async () => {
    const scheduler = createScheduler();
    const failures: string[] = [];
    scheduler.on('job:failed', ({ job, error }) => failures.push(`${job.id}: ${error.message}`));

    scheduler.submit(spec('decode', 'file:///ws/a.tf', async () => undefined, { dependsOn: ['parse'] }));
    await scheduler.wait();

    assert.deepEqual(failures, [
      `${jobKey('decode', 'file:///ws/a.tf')}: Prerequisite parse is unavailable for file:///ws/a.tf`,
    ]);
    assert.equal(scheduler.getOutcome('decode', 'file:///ws/a.tf'), JobStatus.FAILED);
  });

  it('任务抛错只影响该任务，worker 继续处理后续任务', async () => {
    const scheduler = createScheduler();
    let laterRan = false;

    scheduler.submit(spec('parse', 'file:///ws/bad.tf', async () => { throw new Error('broken input'); }));
    scheduler.submit(spec('parse', 'file:///ws/good.tf', async () => { laterRan = true; }));
    await scheduler.wait();

    assert.equal(laterRan, true);
    assert.equal(scheduler.getFailure('file:///ws/bad.tf')?.error.message, 'broken input');
    assert.equal(scheduler.getFailure('file:///ws/bad.tf')?.kind, 'parse');
    assert.equal(scheduler.getStats().failed, 1);
    assert.equal(scheduler.getStats().completed, 1);
  });

  it('成功执行后清除该目标上的失败记录', async () => {
    const scheduler = createScheduler();

    scheduler.submit(spec('parse', 'file:///ws/a.tf', async () => { throw new Error('first'); }));
    await scheduler.wait();
    scheduler.submit(spec('parse', 'file:///ws/a.tf', async () => undefined));
    await scheduler.wait();

    assert.equal(scheduler.getFailure('file:///ws/a.tf'), undefined);
  });

  it('wait 超时时报告剩余任务数', async () => {
    const scheduler = createScheduler();
    const release = deferred();
    scheduler.submit(spec('walk', 'file:///ws', () => release.promise));

    await assert.rejects(scheduler.wait('/ws', { timeoutMs: 20 }), (error: unknown) => {
      assert.ok(error instanceof WaitTimeoutError);
      assert.equal(error.outstanding, 1);
      assert.equal(error.message, 'deadline exceeded after 20ms while 1 jobs still outstanding in /ws');
      return true;
    });

    release.resolve();
    await scheduler.wait('/ws');
  });

  it('wait 只关心给定作用域及其子路径', async () => {
    const scheduler = createScheduler();
    const release = deferred();
    scheduler.submit(spec('walk', 'file:///ws/a', () => release.promise, { scopes: ['/ws/a'] }));

    await scheduler.wait('/ws/b');
    await scheduler.wait('/ws/ab');

    let settled = false;
    const pending = scheduler.wait('/ws').then(() => { settled = true; });
    await delay(10);
    assert.equal(settled, false);

    release.resolve();
    await pending;
    assert.equal(settled, true);
  });

  it('任务执行期间派生的任务在父任务完成前已计入作用域', async () => {
    const scheduler = createScheduler({ maxConcurrent: 2 });
    const runs: string[] = [];

    scheduler.submit(spec('walk', 'file:///ws', async () => {
      runs.push('walk');
      await delay(5);
      scheduler.submit(spec('parse', 'file:///ws/child.tf', async () => {
        await delay(5);
        runs.push('child');
      }));
    }));
    await scheduler.wait('/ws');

    assert.deepEqual(runs, ['walk', 'child']);
  });

  it('作用域内全部完成后发出 idle 事件', async () => {
    const scheduler = createScheduler();
    let idle = 0;
    scheduler.on('idle', () => { idle++; });

    scheduler.submit(spec('parse', 'file:///ws/a.tf', async () => undefined));
    scheduler.submit(spec('parse', 'file:///ws/b.tf', async () => undefined));
    await scheduler.wait();

    assert.equal(idle, 1);
  });

  it('监听器抛错不影响调度', async () => {
    const scheduler = createScheduler();
    scheduler.on('job:completed', () => { throw new Error('listener failure'); });

    scheduler.submit(spec('parse', 'file:///ws/a.tf', async () => undefined));
    await scheduler.wait();

    assert.equal(scheduler.getOutcome('parse', 'file:///ws/a.tf'), JobStatus.COMPLETED);
  });

  it('forget 清除目标的结果记录', async () => {
    const scheduler = createScheduler();
    scheduler.submit(spec('parse', 'file:///ws/a.tf', async () => undefined));
    await scheduler.wait();

    scheduler.forget('file:///ws/a.tf');
    assert.equal(scheduler.getOutcome('parse', 'file:///ws/a.tf'), undefined);
  });

  it('在执行中被 forget 的目标结束后不再记录结果', async () => {
    const scheduler = createScheduler();
    scheduler.submit(spec('parse', 'file:///ws/a.tf', async () => {
      scheduler.forget('file:///ws/a.tf');
    }));
    await scheduler.wait();

    assert.equal(scheduler.getOutcome('parse', 'file:///ws/a.tf'), undefined);
  });

  it('hasPending 反映排队中与执行中补交的任务', async () => {
    const scheduler = createScheduler();
    const started = deferred();
    const release = deferred();

    scheduler.submit(spec('parse', 'file:///ws/a.tf', async () => {
      started.resolve();
      await release.promise;
    }));
    assert.equal(scheduler.hasPending('parse', 'file:///ws/a.tf'), true);
    assert.equal(scheduler.hasPending('decode', 'file:///ws/a.tf'), false);

    await started.promise;
    assert.equal(scheduler.hasPending('parse', 'file:///ws/a.tf'), false);

    scheduler.submit(spec('parse', 'file:///ws/a.tf', async () => undefined));
    assert.equal(scheduler.hasPending('parse', 'file:///ws/a.tf'), true);

    release.resolve();
    await scheduler.wait();
    assert.equal(scheduler.hasPending('parse', 'file:///ws/a.tf'), false);
  });

  it('dispose 后拒绝新任务与等待者', async () => {
    const scheduler = createScheduler();
    const release = deferred();
    scheduler.submit(spec('walk', 'file:///ws', () => release.promise));
    const waiting = scheduler.wait('/ws');

    scheduler.dispose();

    await assert.rejects(waiting, SchedulerDisposedError);
    assert.throws(() => scheduler.submit(spec('parse', 'file:///ws/a.tf', async () => undefined)), SchedulerDisposedError);
    await assert.rejects(scheduler.wait(), SchedulerDisposedError);
    release.resolve();
  });
});
