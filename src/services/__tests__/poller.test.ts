import { HashtagPoller } from '../poller';
import type { PassResult } from '../runner';
import { createWelcomeContext, type WelcomeContext } from '@/core/context';
import { FetchError } from '@/core/errors';

const EMPTY_PASS: PassResult = {
  fetched: 0,
  decisions: [],
  sent: [],
  simulated: [],
  failed: [],
  sinceId: '100'
};

describe('HashtagPoller', () => {
  let runOnce: jest.Mock<Promise<PassResult>, [WelcomeContext]>;
  let initializeCursor: jest.Mock<Promise<void>, [WelcomeContext]>;
  let context: WelcomeContext;

  beforeEach(() => {
    jest.useFakeTimers();
    runOnce = jest.fn<Promise<PassResult>, [WelcomeContext]>().mockResolvedValue(EMPTY_PASS);
    initializeCursor = jest.fn<Promise<void>, [WelcomeContext]>().mockResolvedValue(undefined);
    context = createWelcomeContext('introductions', '100');
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should run a pass immediately and then once per interval', async () => {
    const poller = new HashtagPoller({ runOnce, initializeCursor }, context, 5);

    await poller.start();
    await jest.advanceTimersByTimeAsync(0);
    expect(runOnce).toHaveBeenCalledTimes(1);
    expect(runOnce).toHaveBeenCalledWith(context);

    await jest.advanceTimersByTimeAsync(5000);
    expect(runOnce).toHaveBeenCalledTimes(2);

    await jest.advanceTimersByTimeAsync(5000);
    expect(runOnce).toHaveBeenCalledTimes(3);

    await poller.stop();
  });

  it('should not start twice', async () => {
    const poller = new HashtagPoller({ runOnce, initializeCursor }, context, 5);

    await poller.start();
    await poller.start();
    await jest.advanceTimersByTimeAsync(0);

    expect(runOnce).toHaveBeenCalledTimes(1);
    await poller.stop();
  });

  it('should keep polling after a failed pass', async () => {
    runOnce.mockRejectedValueOnce(new FetchError('Timeline request returned 502: Bad Gateway', { status: 502 }));
    const poller = new HashtagPoller({ runOnce, initializeCursor }, context, 5);

    await poller.start();
    await jest.advanceTimersByTimeAsync(5000);

    expect(runOnce).toHaveBeenCalledTimes(2);
    expect(poller.getStatus()).toMatchObject({ failedPasses: 1, completedPasses: 1 });
    await poller.stop();
  });

  it('should initialize the cursor once, inside the first pass', async () => {
    const poller = new HashtagPoller({ runOnce, initializeCursor }, context, 5);

    await poller.start();
    await jest.advanceTimersByTimeAsync(5000);

    expect(initializeCursor).toHaveBeenCalledTimes(1);
    expect(initializeCursor).toHaveBeenCalledWith(context);
    expect(runOnce).toHaveBeenCalledTimes(2);
    await poller.stop();
  });

  it('should retry the cursor lookup on the next pass when it fails', async () => {
    initializeCursor.mockRejectedValueOnce(new FetchError('Timeline request returned 503: Service Unavailable', { status: 503 }));
    const poller = new HashtagPoller({ runOnce, initializeCursor }, context, 5);

    await poller.start();
    await jest.advanceTimersByTimeAsync(0);

    expect(runOnce).not.toHaveBeenCalled();
    expect(poller.getStatus()).toMatchObject({ failedPasses: 1, completedPasses: 0 });

    await jest.advanceTimersByTimeAsync(5000);

    expect(initializeCursor).toHaveBeenCalledTimes(2);
    expect(runOnce).toHaveBeenCalledTimes(1);
    expect(poller.getStatus()).toMatchObject({ failedPasses: 1, completedPasses: 1 });
    await poller.stop();
  });

  it('should schedule nothing after stop', async () => {
    const poller = new HashtagPoller({ runOnce, initializeCursor }, context, 5);

    await poller.start();
    await jest.advanceTimersByTimeAsync(0);
    await poller.stop();
    await jest.advanceTimersByTimeAsync(20000);

    expect(runOnce).toHaveBeenCalledTimes(1);
    expect(poller.getStatus().running).toBe(false);
    expect(await poller.healthCheck()).toBe(false);
  });

  it('should let a running pass finish before stopping', async () => {
    let finishPass: (result: PassResult) => void = () => undefined;
    runOnce.mockReturnValueOnce(new Promise<PassResult>((resolve) => {
      finishPass = resolve;
    }));
    const poller = new HashtagPoller({ runOnce, initializeCursor }, context, 5);

    await poller.start();
    let stopped = false;
    const stopping = poller.stop().then(() => {
      stopped = true;
    });

    await jest.advanceTimersByTimeAsync(0);
    expect(stopped).toBe(false);

    finishPass(EMPTY_PASS);
    await stopping;

    expect(stopped).toBe(true);
    expect(poller.getStatus().completedPasses).toBe(1);
    await jest.advanceTimersByTimeAsync(20000);
    expect(runOnce).toHaveBeenCalledTimes(1);
  });

  it('should report status from the shared context', async () => {
    const poller = new HashtagPoller({ runOnce, initializeCursor }, context, 30);
    context.seen.add('a1');

    await poller.start();
    await jest.advanceTimersByTimeAsync(0);

    expect(poller.getStatus()).toEqual({
      running: true,
      hashtag: 'introductions',
      intervalSeconds: 30,
      sinceId: '100',
      seenAuthors: 1,
      completedPasses: 1,
      failedPasses: 0
    });
    expect(await poller.healthCheck()).toBe(true);
    await poller.stop();
  });
});
