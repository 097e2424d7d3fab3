/**
 * Session and SessionRegistry Tests
 * Session lifecycle, checkpoint cleanup and registry bookkeeping
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { z } from 'zod';
import { CheckpointStore } from '../src/checkpoint-store';
import { START, END } from '../src/constants';
import { SessionAlreadyActiveError, SessionNotFoundError } from '../src/errors';
import { WorkflowGraphBuilder } from '../src/graph';
import { Session } from '../src/session';
import { SessionRegistry } from '../src/session-registry';
import { MessageRecorder, sequentialIds } from './helpers';

const State = z.object({
  answer: z.string().default(''),
});

type Schema = typeof State;

const workflow = new WorkflowGraphBuilder({ schema: State })
  .addNode({
    id: 'ask',
    kind: 'interactive',
    action: () => ({ question: { kind: 'free_text', message: 'Anything?' } }),
    validate: (_state, reply) => ({ isValid: true, state: { answer: reply } }),
  })
  .addNode({
    id: 'check',
    kind: 'automatic',
    action: (state) => {
      if (state.answer === 'explode') {
        throw new Error('node exploded');
      }
      return {};
    },
  })
  .addEdge(START, 'ask')
  .addEdge('ask', 'check')
  .addEdge('check', END);

describe('Session', () => {
  let recorder: MessageRecorder;
  let checkpoints: CheckpointStore<Schema>;

  const createSession = (id = 'client-1'): Session<Schema> =>
    new Session({
      id,
      graph: workflow.compile({
        id,
        emit: recorder.emit,
        checkpoints,
        createQuestionId: sequentialIds(),
      }),
      emit: recorder.emit,
      checkpoints,
    });

  beforeEach(() => {
    recorder = new MessageRecorder();
    checkpoints = new CheckpointStore(State);
  });

  it('should complete and delete its checkpoints', async () => {
    const session = createSession();
    session.start({});
    await recorder.nextQuestion();

    expect(session.status).toBe('suspended');
    expect(await checkpoints.exists('client-1')).toBe(true);

    session.reply('q_1', 'yes');

    expect(await session.done).toBe('completed');
    expect(session.state.answer).toBe('yes');
    expect(await checkpoints.exists('client-1')).toBe(false);
  });

  it('should report a failure to the client and settle as failed', async () => {
    const session = createSession();
    session.start({});
    await recorder.nextQuestion();

    session.reply('q_1', 'explode');

    expect(await session.done).toBe('failed');
    expect(recorder.ofType('error')).toEqual([
      expect.objectContaining({
        message: 'Something went wrong while configuring your campaign: node exploded',
      }),
    ]);
    expect(await checkpoints.exists('client-1')).toBe(false);
  });

  it('should keep the checkpoint when cancelled', async () => {
    const session = createSession();
    session.start({});
    await recorder.nextQuestion();

    session.cancel('client disconnected');

    expect(await session.done).toBe('cancelled');
    expect(await checkpoints.exists('client-1')).toBe(true);
  });

  it('should resume from the checkpoint on the same question', async () => {
    const first = createSession();
    first.start({});
    await recorder.nextQuestion();
    first.cancel('client disconnected');
    await first.done;

    const second = createSession();
    const question = await second.resume();

    expect(question?.id).toBe('q_1');
    expect(recorder.questions.map((m) => m.question_id)).toEqual(['q_1', 'q_1']);

    expect(second.reply('q_1', 'later')).toBe(true);
    expect(await second.done).toBe('completed');
    expect(second.state.answer).toBe('later');
  });

  it('should resume to nothing without a checkpoint', async () => {
    const session = createSession();

    expect(await session.resume()).toBeNull();
    expect(session.status).toBe('running');
  });

  it('should notify settled listeners once', async () => {
    const session = createSession();
    const seen: string[] = [];
    session.onSettled((_session, status) => seen.push(status));

    session.start({});
    await recorder.nextQuestion();
    session.reply('q_1', 'ok');
    await session.done;

    expect(seen).toEqual(['completed']);
  });
});

describe('SessionRegistry', () => {
  let recorder: MessageRecorder;
  let registry: SessionRegistry<Schema>;

  beforeEach(() => {
    recorder = new MessageRecorder();
    registry = new SessionRegistry<Schema>(
      (id) =>
        new Session({
          id,
          graph: workflow.compile({ id, emit: recorder.emit, createQuestionId: sequentialIds(id) }),
          emit: recorder.emit,
        })
    );
  });

  it('should create, find and get sessions', () => {
    const session = registry.create('client-1');

    expect(registry.has('client-1')).toBe(true);
    expect(registry.get('client-1')).toBe(session);
    expect(registry.find('client-2')).toBeUndefined();
    expect(registry.size).toBe(1);
  });

  it('should refuse a second live session for the same id', () => {
    registry.create('client-1');

    expect(() => registry.create('client-1')).toThrow(SessionAlreadyActiveError);
  });

  it('should throw for an unknown id', () => {
    expect(() => registry.get('nobody')).toThrow(SessionNotFoundError);
    expect(() => registry.get('nobody')).toThrow('No active session for client nobody');
  });

  it('should remove a session once it settles', async () => {
    const session = registry.create('client-1');
    session.start({});
    await recorder.nextQuestion();

    session.reply('client-1_1', 'done');
    await session.done;

    expect(registry.has('client-1')).toBe(false);
  });

  it('should unregister immediately on cancel', async () => {
    const session = registry.create('client-1');
    session.start({});
    await recorder.nextQuestion();

    expect(registry.cancel('client-1', 'reset')).toBe(true);
    expect(registry.has('client-1')).toBe(false);
    expect(registry.cancel('client-1', 'reset')).toBe(false);
    expect(await session.done).toBe('cancelled');
  });

  it('should not let a settling session evict its successor', async () => {
    const old = registry.create('client-1');
    old.start({});
    await recorder.nextQuestion();
    registry.cancel('client-1', 'reset');

    const successor = registry.create('client-1');
    await old.done;

    expect(registry.get('client-1')).toBe(successor);
  });

  it('should keep sessions of different clients apart', async () => {
    const a = registry.create('client-a');
    const b = registry.create('client-b');
    a.start({});
    b.start({});
    await recorder.nextQuestion();
    await recorder.nextQuestion();

    expect(b.reply('client-a_1', 'wrong session')).toBe(false);
    expect(a.reply('client-a_1', 'from a')).toBe(true);
    expect(b.reply('client-b_1', 'from b')).toBe(true);

    await Promise.all([a.done, b.done]);
    expect(a.state.answer).toBe('from a');
    expect(b.state.answer).toBe('from b');
    expect(registry.size).toBe(0);
  });

  it('should cancel everything on cancelAll', async () => {
    registry.create('client-a').start({});
    registry.create('client-b').start({});
    await recorder.nextQuestion();
    await recorder.nextQuestion();

    await registry.cancelAll('server shutting down');

    expect(registry.size).toBe(0);
  });
});
