import { describe, it, expect } from 'vitest';
import { ResultAsync } from 'neverthrow';
import { MonitorTestController } from '../../src/monitortest/lifecycle-controller.js';
import type { MonitorTestError } from '../../src/errors/app-error.js';
import { Err } from '../../src/errors/factories.js';
import { FakeMonitorTest } from '../fakes/monitor-test.fake.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

const WINDOW = { beginningMs: 0, endMs: 1_000 };
const START = { beginningMs: 0, plannedEndMs: 1_000, signal: new AbortController().signal };

describe('MonitorTestController', () => {
  it('walks every phase in order', async () => {
    const test = new FakeMonitorTest();
    const controller = new MonitorTestController('fake', test);

    expectOk(await controller.startCollection(START));
    expect(controller.state).toBe('collecting');
    expectOk(await controller.collectData(WINDOW));
    expect(controller.state).toBe('collected');
    expectOk(await controller.constructComputedIntervals({ window: WINDOW, startingIntervals: [], recordedResources: [] }));
    expect(controller.state).toBe('intervals_computed');
    expectOk(await controller.evaluateTestsFromConstructedIntervals([]));
    expect(controller.state).toBe('evaluated');
    expectOk(await controller.writeContentToStorage({
      store: { writeText: () => ResultAsync.fromSafePromise(Promise.resolve()) },
      timeSuffix: '20240101-000000',
      finalIntervals: [],
      finalResources: [],
    }));
    expect(controller.state).toBe('persisted');
    expectOk(await controller.cleanup());
    expect(controller.state).toBe('cleaned_up');

    expect(test.calls).toEqual([
      'startCollection',
      'collectData',
      'constructComputedIntervals',
      'evaluateTestsFromConstructedIntervals',
      'writeContentToStorage',
      'cleanup',
    ]);
  });

  it('rejects a phase called out of order without invoking the test', async () => {
    const test = new FakeMonitorTest();
    const controller = new MonitorTestController('fake', test);

    const error = expectErr(await controller.collectData(WINDOW));

    expect(error).toEqual({
      _tag: 'LifecycleViolation',
      plugin: 'fake',
      phase: 'collectData',
      state: 'uninitialized',
      message: 'Monitor test "fake" cannot run collectData in state uninitialized: expected state collecting',
    });
    expect(test.calls).toEqual([]);
    expect(controller.state).toBe('uninitialized');
  });

  it('rejects a second call of the same phase', async () => {
    const controller = new MonitorTestController('fake', new FakeMonitorTest());

    expectOk(await controller.startCollection(START));
    const error = expectErr(await controller.startCollection(START));

    expect(error.message).toBe(
      'Monitor test "fake" cannot run startCollection in state collecting: expected state uninitialized'
    );
    expect(controller.state).toBe('collecting');
  });

  it('rejects any phase while another is still running', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    class SlowStart extends FakeMonitorTest {
      override startCollection(): ResultAsync<void, MonitorTestError> {
        return ResultAsync.fromSafePromise(gate);
      }
    }
    const controller = new MonitorTestController('slow', new SlowStart());

    const pending = controller.startCollection(START);
    const concurrent = expectErr(await controller.collectData(WINDOW));
    const earlyCleanup = expectErr(await controller.cleanup());
    release();
    expectOk(await pending);

    expect(concurrent.message).toBe(
      'Monitor test "slow" cannot run collectData in state uninitialized: startCollection is still running'
    );
    expect(earlyCleanup.message).toBe(
      'Monitor test "slow" cannot run cleanup in state uninitialized: startCollection is still running'
    );
    expect(controller.state).toBe('collecting');
  });

  it('aborts on a returned error and then accepts only cleanup', async () => {
    const failure = Err.listFailed('namespaces', 'forbidden');
    const test = new FakeMonitorTest({ failAt: { phase: 'collectData', error: failure } });
    const controller = new MonitorTestController('fake', test);

    expectOk(await controller.startCollection(START));
    expect(expectErr(await controller.collectData(WINDOW))).toEqual(failure);
    expect(controller.state).toBe('aborted');

    const next = expectErr(await controller.constructComputedIntervals({ window: WINDOW, startingIntervals: [], recordedResources: [] }));
    expect(next._tag).toBe('LifecycleViolation');

    expectOk(await controller.cleanup());
    expect(controller.state).toBe('cleaned_up');
    expect(test.calls).toEqual(['startCollection', 'collectData', 'cleanup']);
  });

  it('turns a thrown error into an unexpected error and aborts', async () => {
    const controller = new MonitorTestController('fake', new FakeMonitorTest({ throwAt: 'startCollection' }));

    const error = expectErr(await controller.startCollection(START));

    expect(error._tag).toBe('Unexpected');
    expect(error.message).toBe('Monitor test "fake" threw during startCollection');
    expect(controller.state).toBe('aborted');
  });

  it('runs cleanup once, even from the initial state', async () => {
    const test = new FakeMonitorTest();
    const controller = new MonitorTestController('fake', test);

    expectOk(await controller.cleanup());
    const second = expectErr(await controller.cleanup());

    expect(second.message).toBe('Monitor test "fake" cannot run cleanup in state cleaned_up: cleanup already ran');
    expect(test.calls).toEqual(['cleanup']);
  });

  it('counts a failed cleanup as done', async () => {
    const failure = Err.unexpected('could not stop sampler', undefined);
    const controller = new MonitorTestController('fake', new FakeMonitorTest({ failAt: { phase: 'cleanup', error: failure } }));

    expect(expectErr(await controller.cleanup())).toEqual(failure);
    expect(controller.state).toBe('cleaned_up');
  });
});
