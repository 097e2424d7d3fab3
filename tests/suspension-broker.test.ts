import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { InvariantViolationError, SessionCancelledError } from '../src/errors';
import type { Logger } from '../src/logger';
import { SuspensionBroker } from '../src/suspension-broker';
import type { PendingQuestion } from '../src/types/graph.types';

const question = (id: string): PendingQuestion => ({
  id,
  nodeId: 'clarify',
  kind: 'free_text',
  message: 'Who should receive this campaign?',
  createdAt: '2024-11-01T09:00:00.000Z',
});

describe('SuspensionBroker', () => {
  let warn: jest.Mock<(message: string) => void>;
  let broker: SuspensionBroker;

  beforeEach(() => {
    warn = jest.fn<(message: string) => void>();
    const logger: Logger = {
      debug: () => {},
      info: () => {},
      warn,
      error: () => {},
      child: () => logger,
    };
    broker = new SuspensionBroker('client-1', logger);
  });

  it('should deliver a reply to the matching question', async () => {
    const reply = broker.open(question('q_1'));
    expect(broker.pending?.id).toBe('q_1');

    expect(broker.resolve('q_1', 'gym members')).toBe(true);

    await expect(reply).resolves.toBe('gym members');
    expect(broker.pending).toBeNull();
  });

  it('should drop a reply for another question', () => {
    void broker.open(question('q_2'));

    expect(broker.resolve('q_1', 'late answer')).toBe(false);
    expect(broker.pending?.id).toBe('q_2');
    expect(warn).toHaveBeenCalledWith(
      'Ignoring reply for question q_1: open question is q_2'
    );
  });

  it('should drop a reply when nothing is open', () => {
    expect(broker.resolve('q_1', 'hello')).toBe(false);
    expect(warn).toHaveBeenCalledWith(
      'Ignoring reply for question q_1: no question is open'
    );
  });

  it('should drop a second reply to the same question', async () => {
    const reply = broker.open(question('q_1'));
    broker.resolve('q_1', 'first');

    expect(broker.resolve('q_1', 'second')).toBe(false);
    await expect(reply).resolves.toBe('first');
  });

  it('should refuse a second open question', () => {
    void broker.open(question('q_1'));

    expect(() => broker.open(question('q_2'))).toThrow(InvariantViolationError);
    expect(broker.pending?.id).toBe('q_1');
  });

  it('should reject the waiter on cancel', async () => {
    const reply = broker.open(question('q_1'));

    broker.cancel('client disconnected');

    await expect(reply).rejects.toThrow(SessionCancelledError);
    await expect(reply).rejects.toThrow('Session cancelled: client disconnected');
    expect(broker.pending).toBeNull();
  });

  it('should notify whenOpen now or on the next open', async () => {
    const upcoming = broker.whenOpen();
    void broker.open(question('q_1'));

    await expect(upcoming).resolves.toMatchObject({ id: 'q_1' });
    await expect(broker.whenOpen()).resolves.toMatchObject({ id: 'q_1' });
  });

  it('should reject pending whenOpen calls on cancel', async () => {
    const upcoming = broker.whenOpen();

    broker.cancel('client disconnected');

    await expect(upcoming).rejects.toThrow('Session cancelled: client disconnected');
  });

  it('should not notify a closed listener when a later question opens', async () => {
    const upcoming = broker.whenOpen();
    broker.close('run completed');
    void broker.open(question('q_2'));

    await expect(upcoming).rejects.toThrow(SessionCancelledError);
    await expect(broker.whenOpen()).resolves.toMatchObject({ id: 'q_2' });
  });
});
