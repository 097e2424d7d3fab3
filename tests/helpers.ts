/**
 * Shared fakes for the engine and campaign tests
 */

import type { TextCompletion } from '../src/clients/completion';
import type { ContactList, ListProvider } from '../src/clients/list-provider';
import type { Location } from '../src/campaign/campaign-state';
import { CompletionError, ListProviderError } from '../src/errors';
import type { Emitter, OutboundMessage } from '../src/messages';

type Waiter = {
  predicate: (message: OutboundMessage) => boolean;
  resolve: (message: OutboundMessage) => void;
};

/**
 * Records emitted messages and lets a test wait for the next one that
 * matches. Each recorded message is handed out at most once.
 */
export class MessageRecorder {
  readonly messages: OutboundMessage[] = [];
  private readonly claimed = new Set<number>();
  private waiters: Waiter[] = [];

  readonly emit: Emitter = (message) => {
    const index = this.messages.push(message) - 1;
    const waiter = this.waiters.find((w) => w.predicate(message));
    if (waiter) {
      this.claimed.add(index);
      this.waiters = this.waiters.filter((w) => w !== waiter);
      waiter.resolve(message);
    }
  };

  /** Frame sender for the connection manager */
  readonly sendFrame = (data: string): void => {
    const message: OutboundMessage = JSON.parse(data);
    this.emit(message);
  };

  next(predicate: (message: OutboundMessage) => boolean): Promise<OutboundMessage> {
    const index = this.messages.findIndex(
      (message, i) => !this.claimed.has(i) && predicate(message)
    );
    if (index >= 0) {
      this.claimed.add(index);
      return Promise.resolve(this.messages[index]);
    }
    return new Promise((resolve) => {
      this.waiters.push({ predicate, resolve });
    });
  }

  /** Next message that carries a question id */
  nextQuestion(): Promise<OutboundMessage> {
    return this.next((message) => message.question_id !== undefined);
  }

  ofType(type: OutboundMessage['type']): OutboundMessage[] {
    return this.messages.filter((message) => message.type === type);
  }

  get questions(): OutboundMessage[] {
    return this.messages.filter((message) => message.question_id !== undefined);
  }
}

export type CompletionScript = {
  extract?: string | Error;
  refine?: (string | Error)[];
  rank?: string | Error;
  /** Every call waits for this before answering */
  hold?: Promise<void>;
};

/**
 * Completion fake that answers by prompt kind. Anything not scripted fails
 * like an unreachable service.
 */
export function fakeCompletion(script: CompletionScript = {}): {
  complete: TextCompletion;
  prompts: string[];
} {
  const prompts: string[] = [];
  const refinements = [...(script.refine ?? [])];

  const answer = (response: string | Error | undefined): string => {
    if (response === undefined) {
      throw new CompletionError('Not scripted');
    }
    if (response instanceof Error) {
      throw response;
    }
    return response;
  };

  const complete: TextCompletion = async (prompt) => {
    prompts.push(prompt);
    await script.hold;
    if (prompt.startsWith('You are an expert at parsing')) {
      return answer(script.extract);
    }
    if (prompt.startsWith('You are updating')) {
      return answer(refinements.shift());
    }
    if (prompt.startsWith('You match existing')) {
      return answer(script.rank);
    }
    throw new CompletionError('Unknown prompt');
  };

  return { complete, prompts };
}

export function fakeListProvider(result: ContactList[] | Error = []): {
  listProvider: ListProvider;
  calls: (Location | null)[];
} {
  const calls: (Location | null)[] = [];
  const listProvider: ListProvider = async (location) => {
    calls.push(location);
    if (result instanceof Error) {
      throw result;
    }
    return result;
  };
  return { listProvider, calls };
}

export function failingListProvider(status = 401): ListProvider {
  return async () => {
    throw new ListProviderError(`Contact-list request failed with HTTP ${status}`, status);
  };
}

/** Deterministic question ids: q_1, q_2, ... */
export function sequentialIds(prefix = 'q'): () => string {
  let next = 0;
  return () => `${prefix}_${++next}`;
}

export function extraction(fields: {
  audience?: string;
  offer?: string;
  schedule?: string;
  missing?: { field: string; question: string }[];
  defaults?: Record<string, string>;
}): string {
  return JSON.stringify({
    audience: fields.audience ?? '',
    offer: fields.offer ?? '',
    schedule: fields.schedule ?? '',
    missing: fields.missing ?? [],
    defaults: fields.defaults ?? {},
  });
}
