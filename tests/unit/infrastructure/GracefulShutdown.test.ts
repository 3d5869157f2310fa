import {
  GracefulShutdown,
  initGracefulShutdown,
  onShutdown,
} from '../../../src/infrastructure/shutdown/GracefulShutdown';
import { setGlobalLoggerConfig } from '../../../src/infrastructure/logging';

describe('GracefulShutdown', () => {
  let exit: jest.Mock<void, [number]>;

  beforeEach(() => {
    setGlobalLoggerConfig({ customHandler: jest.fn() });
    GracefulShutdown.reset();
    exit = jest.fn<void, [number]>();
    GracefulShutdown.getInstance().setExitHandler(exit);
  });

  afterEach(() => {
    GracefulShutdown.reset();
    setGlobalLoggerConfig({});
    jest.restoreAllMocks();
  });

  it('should return the same instance', () => {
    expect(GracefulShutdown.getInstance()).toBe(GracefulShutdown.getInstance());
  });

  it('should run handlers in reverse registration order', async () => {
    const order: string[] = [];
    onShutdown(async () => {
      order.push('first');
    });
    onShutdown(async () => {
      order.push('second');
    });

    await GracefulShutdown.getInstance().shutdown('SIGINT');

    expect(order).toEqual(['second', 'first']);
  });

  it('should exit with 130 on SIGINT and 143 on SIGTERM', async () => {
    await GracefulShutdown.getInstance().shutdown('SIGINT');
    expect(exit).toHaveBeenCalledWith(130);

    GracefulShutdown.reset();
    const other = GracefulShutdown.getInstance();
    other.setExitHandler(exit);
    await other.shutdown('SIGTERM');
    expect(exit).toHaveBeenLastCalledWith(143);
  });

  it('should keep going when a handler fails', async () => {
    const after = jest.fn().mockResolvedValue(undefined);
    onShutdown(after);
    onShutdown(() => Promise.reject(new Error('close failed')));

    await GracefulShutdown.getInstance().shutdown('SIGTERM');

    expect(after).toHaveBeenCalled();
    expect(exit).toHaveBeenCalledWith(143);
  });

  it('should not run twice', async () => {
    const handler = jest.fn().mockResolvedValue(undefined);
    onShutdown(handler);
    const shutdown = GracefulShutdown.getInstance();

    await shutdown.shutdown('SIGINT');
    await shutdown.shutdown('SIGINT');

    expect(handler).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
  });

  it('should listen for SIGINT and SIGTERM once', () => {
    const on = jest.spyOn(process, 'on').mockImplementation(() => process);

    initGracefulShutdown();
    initGracefulShutdown();

    expect(on.mock.calls.map(call => call[0])).toEqual(['SIGINT', 'SIGTERM']);
  });
});
