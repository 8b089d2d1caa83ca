import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  handleCommandMessage,
  startCommandSubscriber,
} from '../../src/infrastructure/mqtt/command-subscriber.js';
import type { CommandHandler } from '../../src/infrastructure/mqtt/command-subscriber.js';
import { UnknownCommandError } from '../../src/domain/errors.js';
import { FakeControlPlane, fakeLogger } from '../helpers.js';

function fakeHandler() {
  return {
    execute: vi.fn<CommandHandler['execute']>().mockResolvedValue('payload'),
    control: vi.fn<CommandHandler['control']>().mockResolvedValue(undefined),
    serviceConfig: vi.fn<CommandHandler['serviceConfig']>().mockResolvedValue(undefined),
  };
}

describe('handleCommandMessage', () => {
  let handler: ReturnType<typeof fakeHandler>;
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    handler = fakeHandler();
    log = fakeLogger();
  });

  it('routes exec requests with the trailing colon removed from bn', async () => {
    await handleCommandMessage(handler, log, '[{"bn":"req-1:","n":"exec","vs":"ls,-l"}]');

    expect(handler.execute).toHaveBeenCalledWith('req-1', 'ls,-l');
    expect(handler.control).not.toHaveBeenCalled();
  });

  it('routes control requests', async () => {
    await handleCommandMessage(handler, log, '[{"bn":"req-2","n":"control","vs":"edgex-ping"}]');
    expect(handler.control).toHaveBeenCalledWith('req-2', 'edgex-ping');
  });

  it('routes config requests', async () => {
    await handleCommandMessage(handler, log, '[{"bn":"req-3:","n":"config","vs":"view"}]');
    expect(handler.serviceConfig).toHaveBeenCalledWith('req-3', 'view');
  });

  it('uses an empty id when bn is absent', async () => {
    await handleCommandMessage(handler, log, '[{"n":"exec","vs":"uptime"}]');
    expect(handler.execute).toHaveBeenCalledWith('', 'uptime');
  });

  it('drops malformed packs with a warning', async () => {
    await handleCommandMessage(handler, log, 'garbage');

    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error) }),
      'Malformed control-plane request, skipping',
    );
    expect(handler.execute).not.toHaveBeenCalled();
  });

  it('drops records without a string value', async () => {
    await handleCommandMessage(handler, log, '[{"bn":"req-4","n":"exec"}]');

    expect(log.warn).toHaveBeenCalledWith(
      { id: 'req-4', name: 'exec' },
      'Control-plane request has no string value, skipping',
    );
    expect(handler.execute).not.toHaveBeenCalled();
  });

  it('drops unsupported command types', async () => {
    await handleCommandMessage(handler, log, '[{"bn":"req-5","n":"term","vs":"open"}]');

    expect(log.warn).toHaveBeenCalledWith(
      { id: 'req-5', name: 'term' },
      'Unsupported control-plane command type, skipping',
    );
  });

  it('logs dispatch failures instead of throwing', async () => {
    handler.control.mockRejectedValueOnce(new UnknownCommandError('bogus'));

    await handleCommandMessage(handler, log, '[{"bn":"req-6","n":"control","vs":"bogus,x"}]');

    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(UnknownCommandError), id: 'req-6', name: 'control' }),
      'Control-plane command failed',
    );
  });
});

describe('startCommandSubscriber', () => {
  it('subscribes to the control channel request topic and dispatches deliveries', async () => {
    const controlPlane = new FakeControlPlane();
    const handler = fakeHandler();

    await startCommandSubscriber(controlPlane, handler, 'ctrl-1', fakeLogger());
    controlPlane.deliver('channels/ctrl-1/messages/req', '[{"bn":"req-7:","n":"exec","vs":"date"}]');

    await vi.waitFor(() => {
      expect(handler.execute).toHaveBeenCalledWith('req-7', 'date');
    });
  });

  it('cleanup function unsubscribes', async () => {
    const controlPlane = new FakeControlPlane();

    const stop = await startCommandSubscriber(controlPlane, fakeHandler(), 'ctrl-1', fakeLogger());
    expect(controlPlane.handlers.has('channels/ctrl-1/messages/req')).toBe(true);

    await stop();

    expect(controlPlane.handlers.size).toBe(0);
  });
});
